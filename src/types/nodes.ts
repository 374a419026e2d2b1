import type { Rgba } from './geometry.js';
import type { SourcePosition } from './tokens.js';

/**
 * Content kinds understood by the language.
 */
export const CONTENT_KINDS = ['centre', 'padding', 'row', 'column', 'text'] as const;

/**
 * A content-kind keyword.
 */
export type ContentKind = (typeof CONTENT_KINDS)[number];

/**
 * Reserved style-block target addressing the slide itself.
 */
export const SLIDE_TARGET = 'slide';

/**
 * Checks whether an identifier names a content kind.
 */
export function isContentKind(identifier: string): identifier is ContentKind {
  return CONTENT_KINDS.some((kind) => kind === identifier);
}

/**
 * A style or parameter value.
 */
export type StyleValue =
  | { type: 'number'; value: number }
  | { type: 'string'; value: string }
  | { type: 'colour'; value: string; rgba: Readonly<Rgba> };

/**
 * Key-value pairs from a `{ key: value }` block.
 */
export type StyleProperties = Readonly<Record<string, StyleValue>>;

/**
 * A `{ key: value }` block as written in source, with per-key positions.
 */
export interface PropertyBlock {
  readonly properties: StyleProperties;
  readonly positions: Readonly<Record<string, SourcePosition>>;
}

/**
 * Fields shared by every content node.
 */
interface ContentNodeBase {
  /** Pre-order index of the node within its slide */
  readonly id: number;
  /** Optional name used to match named style blocks */
  readonly name?: string;
  /** Attached parameter block (`text(...){size: 24}`) */
  readonly params: PropertyBlock;
  readonly position: SourcePosition;
}

export interface CentreNode extends ContentNodeBase {
  readonly kind: 'centre';
  readonly child: ContentNode;
}

export interface PaddingNode extends ContentNodeBase {
  readonly kind: 'padding';
  readonly child: ContentNode;
}

export interface RowNode extends ContentNodeBase {
  readonly kind: 'row';
  readonly children: readonly ContentNode[];
}

export interface ColumnNode extends ContentNodeBase {
  readonly kind: 'column';
  readonly children: readonly ContentNode[];
}

export interface TextNode extends ContentNodeBase {
  readonly kind: 'text';
  readonly value: string;
}

/**
 * A layout-tree element. Closed union, discriminated by `kind`.
 */
export type ContentNode = CentreNode | PaddingNode | RowNode | ColumnNode | TextNode;

/**
 * A `{ key: value }` directive targeting the slide, a content kind or a named element.
 */
export interface StyleBlock extends PropertyBlock {
  readonly target: string;
  readonly position: SourcePosition;
}

/**
 * One slide as parsed: a content root plus its style blocks in source order.
 */
export interface Slide {
  /** Zero-based slide index within the document */
  readonly index: number;
  readonly root: ContentNode;
  readonly styleBlocks: readonly StyleBlock[];
  readonly position: SourcePosition;
}

/**
 * Returns the direct children of a node, in order.
 */
export function childrenOf(node: ContentNode): readonly ContentNode[] {
  switch (node.kind) {
    case 'centre':
    case 'padding':
      return [node.child];
    case 'row':
    case 'column':
      return node.children;
    case 'text':
      return [];
  }
}

/**
 * Visits every node of a tree in pre-order.
 */
export function walkContent(node: ContentNode, visit: (node: ContentNode) => void): void {
  visit(node);
  for (const child of childrenOf(node)) {
    walkContent(child, visit);
  }
}
