/**
 * slidetree - slide source to positioned box trees
 *
 * Lexes, parses, style-resolves and lays out presentations written in a small
 * plain-text slide language. Rendering the resulting boxes is left to the caller.
 */

// Main entry point
export {
  DeckCompiler,
  createCompiler,
  compileDeck,
  resolveCompileOptions,
} from './core/index.js';
export type { IDeckCompiler, DeckCompilerConfig } from './core/index.js';
export { describeDeck, countNodes } from './core/index.js';

// Errors
export {
  SlideSyntaxError,
  LexError,
  ParseError,
  UnknownContentKind,
  InvalidParameterValue,
  InvalidColour,
  UnresolvedStyleTarget,
  toCompileError,
} from './core/index.js';

// Types - Options and Results
export type {
  CompileOptions,
  ResolvedCompileOptions,
  LogLevel,
  CompileError,
  CompileStage,
  DeckCompileResult,
} from './types/index.js';
export { DEFAULT_COMPILE_OPTIONS } from './types/index.js';

// Types - Syntax tree, styles and boxes
export type {
  SourcePosition,
  Token,
  TokenKind,
  ContentKind,
  ContentNode,
  StyleValue,
  StyleProperties,
  StyleBlock,
  Slide,
  ResolvedStyle,
  Colour,
  StyledSlide,
  TextPayload,
  Box,
  SlideLayout,
  Rgba,
  Point,
  Size,
  Rect,
  Constraint,
  Viewport,
} from './types/index.js';
export { CONTENT_KINDS, SLIDE_TARGET, Colors, walkContent } from './types/index.js';
export { PROPERTY_TYPES } from './core/index.js';

// Pipeline stages (for advanced usage)
export { Lexer, tokenize, Parser, parseDocument, printDocument, printSlide } from './parsers/index.js';
export { StyleResolver, resolveSlide, mergeStyles, getNumber, getColour } from './style/index.js';
export { parseHexColour, rgbaToHex, rgbaToCss } from './style/index.js';
export { LayoutEngine, layoutSlide, LayoutCache } from './layout/index.js';

// Text measurement
export { FixedAdvanceMeasurementProvider, CanvasMeasurementProvider } from './text/index.js';
export type { MeasurementProvider, TextMeasuringContext } from './text/index.js';

// Logger
export { createLogger, Logger } from './utils/index.js';
export type { ILogger, LogEntry, LogSink } from './utils/index.js';
