import type { SlideLayout } from './layout.js';
import type { Slide } from './nodes.js';
import type { SourcePosition } from './tokens.js';

/**
 * Stage of the pipeline at which a compile error occurred.
 */
export type CompileStage = 'lex' | 'parse' | 'resolve' | 'layout';

/**
 * Detailed error information for compile failures.
 */
export interface CompileError {
  /**
   * Stable error code, e.g. 'PARSE_ERROR'.
   */
  code: string;

  /**
   * Pipeline stage that failed.
   */
  stage: CompileStage;

  /**
   * Human-readable error message.
   */
  message: string;

  /**
   * Source position, when the error points at authored text.
   */
  position?: SourcePosition;

  /**
   * Stack trace if available.
   */
  stack?: string;
}

/**
 * Result of compiling a whole deck.
 */
export interface DeckCompileResult {
  /**
   * Whether every stage succeeded.
   */
  success: boolean;

  /**
   * Parsed slides. Empty when compilation failed.
   */
  ast: readonly Slide[];

  /**
   * Laid-out slides in document order. Empty when compilation failed.
   */
  slides: SlideLayout[];

  /**
   * Total number of slides in the deck.
   */
  totalSlides: number;

  /**
   * The error that aborted compilation.
   */
  error?: CompileError;
}
