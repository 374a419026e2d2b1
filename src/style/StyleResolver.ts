import type { Viewport } from '../types/geometry.js';
import { clampLength } from '../types/geometry.js';
import type { ContentNode, Slide, StyleBlock, StyleProperties, StyleValue } from '../types/nodes.js';
import { SLIDE_TARGET, isContentKind, walkContent } from '../types/nodes.js';
import type { Colour, ResolvedStyle, StyledSlide } from '../types/layout.js';
import type { StyleDefaults } from '../types/options.js';
import { DEFAULT_COMPILE_OPTIONS } from '../types/options.js';
import type { PropertyKey } from '../core/constants.js';
import { UnresolvedStyleTarget } from '../core/errors.js';
import { parseHexColour } from './ColourResolver.js';
import { deepFreeze, freezeMap } from '../utils/freeze.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Right-biased, key-wise union of style layers. Later layers win per key;
 * keys a layer leaves out fall through to the earlier value.
 */
export function mergeStyles(...layers: ReadonlyArray<StyleProperties | undefined>): ResolvedStyle {
  const merged = new Map<string, StyleValue>();
  for (const layer of layers) {
    if (!layer) {
      continue;
    }
    for (const [key, value] of Object.entries(layer)) {
      merged.set(key, value);
    }
  }
  return deepFreeze(Object.fromEntries(merged));
}

/**
 * Reads a number property, falling back when it is absent or not a number.
 */
export function getNumber(style: ResolvedStyle, key: PropertyKey | string, fallback: number = 0): number {
  const value = style[key];
  return value?.type === 'number' ? value.value : fallback;
}

/**
 * Reads a colour property, or null when the key is unset.
 */
export function getColour(style: ResolvedStyle, key: PropertyKey | string): Colour | null {
  const value = style[key];
  return value?.type === 'colour' ? value : null;
}

/**
 * Resolves named, kind and slide style blocks into a concrete style per node.
 *
 * Cascade, lowest precedence first:
 * built-in defaults -> `slide {}` -> kind block (`text {}`) -> named block -> the node's own parameters.
 */
export class StyleResolver {
  private readonly logger: ILogger;
  private readonly defaults: StyleDefaults;
  private readonly defaultFill: Colour;

  constructor(defaults: Partial<StyleDefaults> = {}, logger?: ILogger) {
    this.logger = logger ?? createLogger('warn', 'StyleResolver');
    this.defaults = {
      defaultTextSize: defaults.defaultTextSize ?? DEFAULT_COMPILE_OPTIONS.defaultTextSize,
      defaultTextFill: defaults.defaultTextFill ?? DEFAULT_COMPILE_OPTIONS.defaultTextFill,
      defaultPaddingAmount: defaults.defaultPaddingAmount ?? DEFAULT_COMPILE_OPTIONS.defaultPaddingAmount,
      defaultGap: defaults.defaultGap ?? DEFAULT_COMPILE_OPTIONS.defaultGap,
    };

    const rgba = parseHexColour(this.defaults.defaultTextFill);
    if (!rgba) {
      throw new Error(`Default text fill must be #RRGGBB or #RRGGBBAA, got ${JSON.stringify(this.defaults.defaultTextFill)}`);
    }
    this.defaultFill = { type: 'colour', value: this.defaults.defaultTextFill, rgba };
  }

  /**
   * Resolves every node of a slide against a viewport.
   * Throws UnresolvedStyleTarget when a named block matches no element.
   */
  resolveSlide(slide: Slide, viewport: Viewport): StyledSlide {
    const nodesByName = new Map<string, ContentNode>();
    const nodes: ContentNode[] = [];

    walkContent(slide.root, (node) => {
      nodes.push(node);
      if (node.name !== undefined) {
        nodesByName.set(node.name, node);
      }
    });

    const slideBlock = this.findBlock(slide.styleBlocks, SLIDE_TARGET);
    const kindBlocks = new Map<string, StyleBlock>();
    const namedBlocks = new Map<string, StyleBlock>();

    for (const block of slide.styleBlocks) {
      if (block.target === SLIDE_TARGET) {
        continue;
      }
      if (isContentKind(block.target)) {
        kindBlocks.set(block.target, block);
        continue;
      }
      if (!nodesByName.has(block.target)) {
        throw new UnresolvedStyleTarget(block.position, block.target);
      }
      namedBlocks.set(block.target, block);
    }

    const base = mergeStyles(this.builtInDefaults(viewport), slideBlock?.properties);
    const styles = new Map<number, ResolvedStyle>();

    for (const node of nodes) {
      const named = node.name !== undefined ? namedBlocks.get(node.name) : undefined;
      styles.set(
        node.id,
        mergeStyles(base, kindBlocks.get(node.kind)?.properties, named?.properties, node.params.properties)
      );
    }

    const width = clampLength(getNumber(base, 'width', viewport.width));
    const height = clampLength(getNumber(base, 'height', viewport.height));
    const margin = clampLength(getNumber(base, 'margin'));
    const background = getColour(base, 'bg');

    this.logger.debug('Resolved slide styles', {
      index: slide.index,
      nodes: nodes.length,
      kindBlocks: kindBlocks.size,
      namedBlocks: namedBlocks.size,
      width,
      height,
    });

    return deepFreeze({ slide, width, height, margin, background, styles: freezeMap(styles) });
  }

  /**
   * Lowest layer of the cascade.
   */
  private builtInDefaults(viewport: Viewport): StyleProperties {
    return {
      width: { type: 'number', value: clampLength(viewport.width) },
      height: { type: 'number', value: clampLength(viewport.height) },
      margin: { type: 'number', value: 0 },
      size: { type: 'number', value: this.defaults.defaultTextSize },
      fill: this.defaultFill,
      amount: { type: 'number', value: this.defaults.defaultPaddingAmount },
      gap: { type: 'number', value: this.defaults.defaultGap },
    };
  }

  private findBlock(blocks: readonly StyleBlock[], target: string): StyleBlock | undefined {
    return blocks.find((block) => block.target === target);
  }
}

/**
 * Resolves one slide with default style settings.
 */
export function resolveSlide(
  slide: Slide,
  viewport: Viewport,
  defaults?: Partial<StyleDefaults>,
  logger?: ILogger
): StyledSlide {
  return new StyleResolver(defaults, logger).resolveSlide(slide, viewport);
}
