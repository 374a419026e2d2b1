import { describe, it, expect } from 'vitest';
import { parseDocument } from '../../src/parsers/Parser.js';
import { resolveSlide } from '../../src/style/StyleResolver.js';
import { LayoutEngine, countBoxes, splitEvenly } from '../../src/layout/LayoutEngine.js';
import type { MeasurementProvider } from '../../src/text/MeasurementProvider.js';
import type { Box, SlideLayout } from '../../src/types/layout.js';
import type { Viewport } from '../../src/types/geometry.js';
import { createLogger } from '../../src/utils/Logger.js';

const logger = createLogger('silent');

/** Ten units per character, one line of the text size. */
const measurer: MeasurementProvider = {
  measure: (text, size) => ({ width: text.length * 10, height: size }),
};

function layout(source: string, viewport: Viewport, provider: MeasurementProvider = measurer): SlideLayout {
  const [slide] = parseDocument(source, logger);
  if (!slide) {
    throw new Error('Expected one slide');
  }
  return new LayoutEngine(provider, logger).layoutSlide(resolveSlide(slide, viewport, {}, logger));
}

function child(box: Box | undefined, index: number = 0): Box {
  const found = box?.children[index];
  if (!found) {
    throw new Error(`Box has no child ${index}`);
  }
  return found;
}

function rect(box: Box): [number, number, number, number] {
  return [box.x, box.y, box.width, box.height];
}

function everyBox(box: Box): Box[] {
  return [box, ...box.children.flatMap(everyBox)];
}

describe('LayoutEngine', () => {
  describe('splitEvenly', () => {
    it('should give the remainder to the earliest parts', () => {
      expect(splitEvenly(5, 2)).toEqual([3, 2]);
      expect(splitEvenly(10, 3)).toEqual([4, 3, 3]);
      expect(splitEvenly(100, 2)).toEqual([50, 50]);
    });

    it('should keep fractional space on the first part', () => {
      expect(splitEvenly(5.5, 2)).toEqual([3, 2.5]);
    });

    it('should never produce negative parts', () => {
      expect(splitEvenly(0, 3)).toEqual([0, 0, 0]);
      expect(splitEvenly(-5, 2)).toEqual([0, 0]);
      expect(splitEvenly(Number.NaN, 2)).toEqual([0, 0]);
    });

    it('should return nothing for no parts', () => {
      expect(splitEvenly(10, 0)).toEqual([]);
    });
  });

  describe('Slides', () => {
    it('should place a lone text root at the origin', () => {
      const result = layout(
        '[ text("Hello"){size:24, fill:"#FFFFFF"} slide{width:1920,height:1080,bg:"#000000"} ]',
        { width: 800, height: 600 }
      );

      expect(result.width).toBe(1920);
      expect(result.height).toBe(1080);
      expect(result.background?.value).toBe('#000000');
      expect(result.root.kind).toBe('text');
      expect(rect(result.root)).toEqual([0, 0, 50, 24]);
      expect(result.root.text).toEqual({
        value: 'Hello',
        size: 24,
        fill: { r: 255, g: 255, b: 255, a: 255 },
        fillHex: '#FFFFFF',
        intrinsicWidth: 50,
        intrinsicHeight: 24,
        overflow: false,
      });
    });

    it('should inset the root by the slide margin', () => {
      const result = layout('[ centre(text("a")) slide { margin: 20 } ]', { width: 200, height: 100 });

      expect(rect(result.root)).toEqual([20, 20, 160, 60]);
    });

    it('should carry element names onto boxes', () => {
      const result = layout('[ centre(title :: text("a")) ]', { width: 100, height: 100 });

      expect(child(result.root).name).toBe('title');
      expect(result.root.name).toBeUndefined();
    });

    it('should freeze box trees', () => {
      const result = layout('[ centre(text("a")) ]', { width: 100, height: 100 });

      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(child(result.root))).toBe(true);
    });

    it('should produce equal trees for equal inputs', () => {
      const source = '[ row(text("a"), column(text("b"), text("c"))) ]';

      expect(layout(source, { width: 300, height: 200 })).toEqual(layout(source, { width: 300, height: 200 }));
    });
  });

  describe('centre', () => {
    it('should fill its constraint and centre the child', () => {
      const result = layout('[ centre(padding(text("Hi")){amount:10}) ]', { width: 200, height: 100 });
      const padding = child(result.root);
      const text = child(padding);

      expect(rect(result.root)).toEqual([0, 0, 200, 100]);
      expect(rect(padding)).toEqual([80, 32, 40, 36]);
      expect(rect(text)).toEqual([90, 42, 20, 16]);
    });

    it('should floor odd offsets', () => {
      const result = layout('[ centre(text("abc")) ]', { width: 101, height: 21 });

      expect(rect(child(result.root))).toEqual([35, 2, 30, 16]);
    });
  });

  describe('padding', () => {
    it('should wrap its child with the amount on every side', () => {
      const result = layout('[ padding(text("abc")){amount:5} ]', { width: 100, height: 50 });

      expect(rect(result.root)).toEqual([0, 0, 40, 26]);
      expect(rect(child(result.root))).toEqual([5, 5, 30, 16]);
    });

    it('should use the default amount', () => {
      const result = layout('[ padding(text("a")) ]', { width: 100, height: 100 });

      expect(rect(result.root)).toEqual([0, 0, 34, 40]);
      expect(rect(child(result.root))).toEqual([12, 12, 10, 16]);
    });

    it('should clamp to the constraint when the child overflows', () => {
      const result = layout('[ padding(text("abc")){amount:5} ]', { width: 30, height: 20 });
      const text = child(result.root);

      expect(rect(result.root)).toEqual([0, 0, 30, 20]);
      expect(rect(text)).toEqual([5, 5, 20, 10]);
      expect(text.text?.overflow).toBe(true);
    });

    it('should survive an amount larger than the viewport', () => {
      const result = layout('[ padding(text("a")){amount:500} ]', { width: 200, height: 100 });
      const text = child(result.root);

      expect(rect(result.root)).toEqual([0, 0, 200, 100]);
      expect(text.width).toBe(0);
      expect(text.height).toBe(0);
    });
  });

  describe('row', () => {
    it('should split width evenly between children', () => {
      const result = layout('[ row(centre(text("a")), centre(text("b"))) ]', { width: 100, height: 40 });

      expect(rect(child(result.root, 0))).toEqual([0, 0, 50, 40]);
      expect(rect(child(result.root, 1))).toEqual([50, 0, 50, 40]);
    });

    it('should give the extra unit of an odd width to the first child', () => {
      const result = layout('[ row(centre(text("a")), centre(text("b"))) ]', { width: 101, height: 40 });

      expect(child(result.root, 0).width).toBe(51);
      expect(child(result.root, 1).width).toBe(50);
      expect(child(result.root, 1).x).toBe(51);
      expect(result.root.width).toBe(101);
    });

    it('should pack children by their actual widths', () => {
      const result = layout('[ row(text("ab"), text("c")) ]', { width: 200, height: 100 });

      expect(rect(result.root)).toEqual([0, 0, 30, 16]);
      expect(rect(child(result.root, 0))).toEqual([0, 0, 20, 16]);
      expect(rect(child(result.root, 1))).toEqual([20, 0, 10, 16]);
    });

    it('should take the tallest child as its height', () => {
      const result = layout('[ row(text("a"), text("b"){size:30}) ]', { width: 200, height: 100 });

      expect(result.root.height).toBe(30);
    });

    it('should leave the gap between children', () => {
      const result = layout('[ row(text("a"), text("b")){gap:8} ]', { width: 200, height: 100 });

      expect(child(result.root, 1).x).toBe(18);
      expect(result.root.width).toBe(28);
    });

    it('should clip text to its slot', () => {
      const result = layout('[ row(text("abcdefghij"), text("b")) ]', { width: 100, height: 100 });
      const first = child(result.root, 0);

      expect(first.width).toBe(50);
      expect(first.text?.intrinsicWidth).toBe(100);
      expect(first.text?.overflow).toBe(true);
      expect(child(result.root, 1).x).toBe(50);
    });
  });

  describe('column', () => {
    it('should split height evenly between children', () => {
      const result = layout('[ column(centre(text("a")), centre(text("b")), centre(text("c"))) ]', {
        width: 60,
        height: 100,
      });

      expect(result.root.children.map(rect)).toEqual([
        [0, 0, 60, 34],
        [0, 34, 60, 33],
        [0, 67, 60, 33],
      ]);
    });

    it('should stack children by their actual heights with the gap', () => {
      const result = layout('[ column(text("ab"), text("c")){gap:4} ]', { width: 200, height: 100 });

      expect(rect(result.root)).toEqual([0, 0, 20, 36]);
      expect(rect(child(result.root, 1))).toEqual([0, 20, 10, 16]);
    });
  });

  describe('Totality', () => {
    const sources = [
      '[ centre(text("a")) ]',
      '[ padding(padding(text("abc")){amount:40}){amount:40} ]',
      '[ row(text("a"), column(text("b"), centre(text("c"))), padding(text("d"))){gap:30} ]',
      '[ column(row(text("wide text"), text("x")), text("y")){gap:100} slide { margin: 60 } ]',
    ];
    const viewports = [0, 1, 7, 50, 333].map((n) => ({ width: n, height: n }));

    for (const source of sources) {
      it(`should never produce negative sizes: ${source}`, () => {
        for (const viewport of viewports) {
          const boxes = everyBox(layout(source, viewport).root);

          for (const box of boxes) {
            expect(box.width).toBeGreaterThanOrEqual(0);
            expect(box.height).toBeGreaterThanOrEqual(0);
          }
        }
      });
    }

    it('should clamp unusable measurements to zero', () => {
      const broken: MeasurementProvider = { measure: () => ({ width: Number.NaN, height: -5 }) };
      const result = layout('[ text("a") ]', { width: 100, height: 100 }, broken);

      expect(rect(result.root)).toEqual([0, 0, 0, 0]);
      expect(result.root.text?.overflow).toBe(false);
    });

    it('should lay out a degenerate viewport', () => {
      const result = layout('[ centre(text("a")) ]', { width: -10, height: Number.NaN });

      expect(result.width).toBe(0);
      expect(result.height).toBe(0);
      expect(rect(child(result.root))).toEqual([0, 0, 0, 0]);
    });

    it('should count every box', () => {
      const result = layout('[ row(text("a"), padding(text("b"))) ]', { width: 100, height: 100 });

      expect(countBoxes(result.root)).toBe(4);
    });
  });
});
