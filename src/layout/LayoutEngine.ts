/**
 * Constraints-down, sizes-up layout.
 *
 * Each node receives the maximum space its parent can give, reports the size it
 * chose, and is placed by its parent afterwards. Placement is deferred through a
 * closure so that every box is created once, already at its absolute position.
 */

import type { Constraint, Point } from '../types/geometry.js';
import { Colors, clampLength } from '../types/geometry.js';
import type { ContentNode, TextNode } from '../types/nodes.js';
import type { Box, ResolvedStyle, SlideLayout, StyledSlide, TextPayload } from '../types/layout.js';
import type { MeasurementProvider } from '../text/MeasurementProvider.js';
import { getColour, getNumber } from '../style/StyleResolver.js';
import { deepFreeze } from '../utils/freeze.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * A node that has been sized but not yet positioned.
 */
interface SizedNode {
  width: number;
  height: number;
  place(x: number, y: number): Box;
}

/**
 * Splits `total` into `count` parts of `floor(total / count)`, handing the
 * remainder out one unit at a time to the earliest parts.
 */
export function splitEvenly(total: number, count: number): number[] {
  if (count <= 0) {
    return [];
  }

  const space = clampLength(total);
  const base = Math.floor(space / count);
  const remainder = space - base * count;

  return Array.from({ length: count }, (_, i) => base + Math.min(1, Math.max(0, remainder - i)));
}

/**
 * Lays out styled slides into box trees.
 */
export class LayoutEngine {
  private readonly logger: ILogger;

  constructor(
    private readonly measurer: MeasurementProvider,
    logger?: ILogger
  ) {
    this.logger = logger ?? createLogger('warn', 'LayoutEngine');
  }

  /**
   * Lays out a slide. The content root gets the slide size minus its margin on
   * every side and sits at `(margin, margin)`.
   */
  layoutSlide(styled: StyledSlide): SlideLayout {
    const { slide, width, height, margin, background } = styled;
    const constraint: Constraint = {
      maxWidth: clampLength(width - 2 * margin),
      maxHeight: clampLength(height - 2 * margin),
    };

    const root = this.layoutContent(slide.root, styled.styles, constraint, { x: margin, y: margin });

    this.logger.debug('Laid out slide', {
      index: slide.index,
      width,
      height,
      boxes: countBoxes(root),
    });

    return deepFreeze({ index: slide.index, width, height, background, root });
  }

  /**
   * Lays out a content tree under a constraint and places it at `origin`.
   * Total: any structurally valid tree yields a box tree with non-negative sizes.
   */
  layoutContent(
    node: ContentNode,
    styles: ReadonlyMap<number, ResolvedStyle>,
    constraint: Constraint,
    origin: Point = { x: 0, y: 0 }
  ): Box {
    const sanitized: Constraint = {
      maxWidth: clampLength(constraint.maxWidth),
      maxHeight: clampLength(constraint.maxHeight),
    };
    return deepFreeze(this.size(node, styles, sanitized).place(origin.x, origin.y));
  }

  private size(node: ContentNode, styles: ReadonlyMap<number, ResolvedStyle>, constraint: Constraint): SizedNode {
    const style = styles.get(node.id) ?? {};
    const { maxWidth, maxHeight } = constraint;

    switch (node.kind) {
      case 'centre': {
        const child = this.size(node.child, styles, constraint);
        const dx = Math.floor(clampLength(maxWidth - child.width) / 2);
        const dy = Math.floor(clampLength(maxHeight - child.height) / 2);

        return {
          width: maxWidth,
          height: maxHeight,
          place: (x, y) => makeBox(node, x, y, maxWidth, maxHeight, [child.place(x + dx, y + dy)]),
        };
      }

      case 'padding': {
        const amount = clampLength(getNumber(style, 'amount'));
        const child = this.size(node.child, styles, {
          maxWidth: clampLength(maxWidth - 2 * amount),
          maxHeight: clampLength(maxHeight - 2 * amount),
        });
        const width = Math.min(maxWidth, child.width + 2 * amount);
        const height = Math.min(maxHeight, child.height + 2 * amount);

        return {
          width,
          height,
          place: (x, y) => makeBox(node, x, y, width, height, [child.place(x + amount, y + amount)]),
        };
      }

      case 'row': {
        const gap = clampLength(getNumber(style, 'gap'));
        const gaps = gap * (node.children.length - 1);
        const slots = splitEvenly(maxWidth - gaps, node.children.length);
        const children = node.children.map((child, i) =>
          this.size(child, styles, { maxWidth: slots[i] ?? 0, maxHeight })
        );
        const width = Math.min(maxWidth, sum(children.map((c) => c.width)) + gaps);
        const height = Math.max(0, ...children.map((c) => c.height));

        return {
          width,
          height,
          place: (x, y) => {
            let cursor = x;
            const boxes = children.map((child) => {
              const box = child.place(cursor, y);
              cursor += child.width + gap;
              return box;
            });
            return makeBox(node, x, y, width, height, boxes);
          },
        };
      }

      case 'column': {
        const gap = clampLength(getNumber(style, 'gap'));
        const gaps = gap * (node.children.length - 1);
        const slots = splitEvenly(maxHeight - gaps, node.children.length);
        const children = node.children.map((child, i) =>
          this.size(child, styles, { maxWidth, maxHeight: slots[i] ?? 0 })
        );
        const width = Math.max(0, ...children.map((c) => c.width));
        const height = Math.min(maxHeight, sum(children.map((c) => c.height)) + gaps);

        return {
          width,
          height,
          place: (x, y) => {
            let cursor = y;
            const boxes = children.map((child) => {
              const box = child.place(x, cursor);
              cursor += child.height + gap;
              return box;
            });
            return makeBox(node, x, y, width, height, boxes);
          },
        };
      }

      case 'text': {
        const text = this.measureText(node, style, constraint);
        return {
          width: text.width,
          height: text.height,
          place: (x, y) => makeBox(node, x, y, text.width, text.height, [], text.payload),
        };
      }
    }
  }

  private measureText(
    node: TextNode,
    style: ResolvedStyle,
    constraint: Constraint
  ): { width: number; height: number; payload: TextPayload } {
    const size = clampLength(getNumber(style, 'size'));
    const fill = getColour(style, 'fill');
    const measured = this.measurer.measure(node.value, size);
    const intrinsicWidth = clampLength(measured.width);
    const intrinsicHeight = clampLength(measured.height);

    if (intrinsicWidth !== measured.width || intrinsicHeight !== measured.height) {
      this.logger.warn('Measurement provider returned an unusable size', {
        nodeId: node.id,
        width: measured.width,
        height: measured.height,
      });
    }

    const width = Math.min(intrinsicWidth, constraint.maxWidth);
    const height = Math.min(intrinsicHeight, constraint.maxHeight);
    const overflow = width < intrinsicWidth || height < intrinsicHeight;

    if (overflow) {
      this.logger.debug('Text overflows its constraint', {
        nodeId: node.id,
        intrinsicWidth,
        intrinsicHeight,
        maxWidth: constraint.maxWidth,
        maxHeight: constraint.maxHeight,
      });
    }

    return {
      width,
      height,
      payload: {
        value: node.value,
        size,
        fill: fill?.rgba ?? Colors.black,
        fillHex: fill?.value ?? '#000000',
        intrinsicWidth,
        intrinsicHeight,
        overflow,
      },
    };
  }
}

/**
 * Lays out one styled slide.
 */
export function layoutSlide(styled: StyledSlide, measurer: MeasurementProvider, logger?: ILogger): SlideLayout {
  return new LayoutEngine(measurer, logger).layoutSlide(styled);
}

/**
 * Counts the boxes in a tree, root included.
 */
export function countBoxes(box: Box): number {
  return 1 + sum(box.children.map(countBoxes));
}

function makeBox(
  node: ContentNode,
  x: number,
  y: number,
  width: number,
  height: number,
  children: Box[],
  text?: TextPayload
): Box {
  return {
    kind: node.kind,
    nodeId: node.id,
    ...(node.name !== undefined ? { name: node.name } : {}),
    x,
    y,
    width,
    height,
    children,
    ...(text ? { text } : {}),
  };
}

function sum(values: number[]): number {
  return values.reduce((total, value) => total + value, 0);
}
