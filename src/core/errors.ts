import type { SourcePosition } from '../types/tokens.js';
import type { CompileError, CompileStage } from '../types/results.js';

/**
 * Base class for authoring errors found in slide source.
 */
export class SlideSyntaxError extends Error {
  readonly code: string;
  readonly stage: CompileStage;
  readonly position: SourcePosition;

  constructor(code: string, stage: CompileStage, message: string, position: SourcePosition) {
    super(`${message} (line ${position.line}, column ${position.column})`);
    this.name = new.target.name;
    this.code = code;
    this.stage = stage;
    this.position = position;
  }
}

/**
 * An unrecognized character or malformed literal.
 */
export class LexError extends SlideSyntaxError {
  readonly reason: string;

  constructor(position: SourcePosition, reason: string) {
    super('LEX_ERROR', 'lex', reason, position);
    this.reason = reason;
  }
}

/**
 * Source that does not follow the grammar.
 */
export class ParseError extends SlideSyntaxError {
  readonly expected: string;
  readonly found: string;

  constructor(position: SourcePosition, expected: string, found: string, code: string = 'PARSE_ERROR') {
    super(code, 'parse', `Expected ${expected}, found ${found}`, position);
    this.expected = expected;
    this.found = found;
  }
}

/**
 * A content expression whose identifier is not a content kind.
 */
export class UnknownContentKind extends ParseError {
  readonly kind: string;

  constructor(position: SourcePosition, kind: string) {
    super(position, 'a content kind (centre, padding, row, column, text)', `"${kind}"`, 'UNKNOWN_CONTENT_KIND');
    this.kind = kind;
  }
}

/**
 * A parameter or style value of the wrong type or out of range.
 */
export class InvalidParameterValue extends SlideSyntaxError {
  readonly key: string;
  readonly value: string;

  constructor(position: SourcePosition, key: string, value: string, reason: string) {
    super('INVALID_PARAMETER_VALUE', 'parse', `Invalid value ${value} for "${key}": ${reason}`, position);
    this.key = key;
    this.value = value;
  }
}

/**
 * A colour string that is not `#RRGGBB` or `#RRGGBBAA`.
 */
export class InvalidColour extends SlideSyntaxError {
  readonly value: string;

  constructor(position: SourcePosition, value: string) {
    super('INVALID_COLOUR', 'parse', `Invalid colour ${JSON.stringify(value)}, expected #RRGGBB or #RRGGBBAA`, position);
    this.value = value;
  }
}

/**
 * A named style block whose target matches no element in its slide.
 */
export class UnresolvedStyleTarget extends SlideSyntaxError {
  readonly target: string;

  constructor(position: SourcePosition, target: string) {
    super('UNRESOLVED_STYLE_TARGET', 'resolve', `Style block targets "${target}", but no element has that name`, position);
    this.target = target;
  }
}

/**
 * Converts any thrown value into a CompileError record.
 */
export function toCompileError(error: unknown, stage: CompileStage): CompileError {
  if (error instanceof SlideSyntaxError) {
    return {
      code: error.code,
      stage: error.stage,
      message: error.message,
      position: error.position,
      stack: error.stack,
    };
  }

  return {
    code: 'INTERNAL_ERROR',
    stage,
    message: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  };
}
