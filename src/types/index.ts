/**
 * Type definitions for slidetree.
 */

// Options and configuration
export type { CompileOptions, LogLevel, ResolvedCompileOptions, StyleDefaults } from './options.js';
export { DEFAULT_COMPILE_OPTIONS } from './options.js';

// Results
export type { CompileError, CompileStage, DeckCompileResult } from './results.js';

// Geometry
export type { Rgba, Point, Size, Rect, Constraint, Viewport } from './geometry.js';
export { Colors, clampLength } from './geometry.js';

// Tokens
export type { SourcePosition, Token, TokenKind } from './tokens.js';
export { TOKEN_DESCRIPTIONS, describeToken } from './tokens.js';

// Syntax tree
export type {
  ContentKind,
  ContentNode,
  CentreNode,
  PaddingNode,
  RowNode,
  ColumnNode,
  TextNode,
  StyleValue,
  StyleProperties,
  PropertyBlock,
  StyleBlock,
  Slide,
} from './nodes.js';
export { CONTENT_KINDS, SLIDE_TARGET, isContentKind, childrenOf, walkContent } from './nodes.js';

// Styled slides and boxes
export type { ResolvedStyle, Colour, StyledSlide, TextPayload, Box, SlideLayout } from './layout.js';
