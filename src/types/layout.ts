import type { Rgba } from './geometry.js';
import type { ContentKind, Slide, StyleProperties, StyleValue } from './nodes.js';

/**
 * Effective property values of one node after the cascade.
 */
export type ResolvedStyle = StyleProperties;

/**
 * A resolved colour: the literal as written plus its channels.
 */
export type Colour = Extract<StyleValue, { type: 'colour' }>;

/**
 * A slide with every node's style resolved against a viewport.
 */
export interface StyledSlide {
  readonly slide: Slide;
  /** Slide width in pixels */
  readonly width: number;
  /** Slide height in pixels */
  readonly height: number;
  /** Inset of the content root from the slide edges */
  readonly margin: number;
  /** Background colour, or null when the slide has none */
  readonly background: Colour | null;
  /** Resolved style per node id */
  readonly styles: ReadonlyMap<number, ResolvedStyle>;
}

/**
 * Leaf payload of a text box, enough to draw it without the AST.
 */
export interface TextPayload {
  readonly value: string;
  readonly size: number;
  readonly fill: Readonly<Rgba>;
  /** Fill as written in source (`#RRGGBB` or `#RRGGBBAA`) */
  readonly fillHex: string;
  /** Size reported by the measurement provider */
  readonly intrinsicWidth: number;
  readonly intrinsicHeight: number;
  /** True when the intrinsic size was clamped to the constraint */
  readonly overflow: boolean;
}

/**
 * A positioned, sized layout box. Coordinates are absolute within the slide.
 */
export interface Box {
  readonly kind: ContentKind;
  readonly nodeId: number;
  readonly name?: string;
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
  readonly children: readonly Box[];
  readonly text?: TextPayload;
}

/**
 * Everything a renderer needs for one slide.
 */
export interface SlideLayout {
  /** Zero-based slide index */
  readonly index: number;
  readonly width: number;
  readonly height: number;
  readonly background: Colour | null;
  readonly root: Box;
}
