/**
 * Lexer for slide source text.
 * Turns source into a token stream; comments and whitespace never reach the parser.
 */

import type { SourcePosition, Token, TokenKind } from '../types/tokens.js';
import { LexError } from '../core/errors.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Single-character punctuation tokens.
 */
const PUNCTUATION: Readonly<Record<string, TokenKind>> = {
  '[': 'lbracket',
  ']': 'rbracket',
  '{': 'lbrace',
  '}': 'rbrace',
  '(': 'lparen',
  ')': 'rparen',
  ',': 'comma',
};

/**
 * Characters allowed after a backslash inside a string literal.
 */
const STRING_ESCAPES: Readonly<Record<string, string>> = {
  '"': '"',
  '\\': '\\',
  n: '\n',
  t: '\t',
};

const IDENTIFIER_START = /[A-Za-z_]/;
const IDENTIFIER_PART = /[A-Za-z0-9_-]/;
const DIGIT = /[0-9]/;
const WHITESPACE = /[ \t\r\n\f\v\uFEFF]/;

/**
 * Restartable token sequence over a source string.
 * Each iteration scans from the beginning and ends with one `eof` token.
 */
export class Lexer implements Iterable<Token> {
  private readonly logger: ILogger;

  constructor(
    private readonly source: string,
    logger?: ILogger
  ) {
    this.logger = logger ?? createLogger('warn', 'Lexer');
  }

  *[Symbol.iterator](): Iterator<Token> {
    const scanner = new Scanner(this.source);
    let count = 0;

    for (;;) {
      const token = scanner.next();
      if (token.kind === 'comment') {
        continue;
      }
      count++;
      yield token;
      if (token.kind === 'eof') {
        break;
      }
    }

    this.logger.debug('Tokenized source', { length: this.source.length, tokens: count });
  }

  /**
   * Scans the whole source into an array.
   */
  tokenize(): Token[] {
    return [...this];
  }
}

/**
 * Tokenizes source text, throwing LexError on the first unrecognized character.
 */
export function tokenize(source: string, logger?: ILogger): Token[] {
  return new Lexer(source, logger).tokenize();
}

/**
 * Cursor over the source that produces one token at a time, comments included.
 */
class Scanner {
  private offset = 0;
  private line = 1;
  private column = 1;

  constructor(private readonly source: string) {}

  next(): Token {
    this.skipWhitespace();

    const start = this.position();
    const char = this.peek();

    if (char === undefined) {
      return { kind: 'eof', text: '', position: start };
    }

    const punctuation = PUNCTUATION[char];
    if (punctuation) {
      this.advance();
      return { kind: punctuation, text: char, position: start };
    }

    if (char === ':') {
      this.advance();
      if (this.peek() === ':') {
        this.advance();
        return { kind: 'define', text: '::', position: start };
      }
      return { kind: 'colon', text: ':', position: start };
    }

    if (char === '/' && this.peek(1) === '/') {
      return this.scanComment(start);
    }

    if (char === '"') {
      return this.scanString(start);
    }

    if (DIGIT.test(char) || (char === '-' && DIGIT.test(this.peek(1) ?? ''))) {
      return this.scanNumber(start);
    }

    if (IDENTIFIER_START.test(char)) {
      return this.scanIdentifier(start);
    }

    throw new LexError(start, `Unexpected character ${JSON.stringify(char)}`);
  }

  private scanComment(start: SourcePosition): Token {
    const begin = this.offset;
    while (this.peek() !== undefined && this.peek() !== '\n') {
      this.advance();
    }
    return { kind: 'comment', text: this.source.slice(begin, this.offset), position: start };
  }

  private scanString(start: SourcePosition): Token {
    this.advance(); // opening quote
    let value = '';

    for (;;) {
      const char = this.peek();

      if (char === undefined || char === '\n') {
        throw new LexError(start, 'Unterminated string literal');
      }

      if (char === '"') {
        this.advance();
        return { kind: 'string', text: value, position: start };
      }

      if (char === '\\') {
        const escapePosition = this.position();
        this.advance();
        const escaped = this.peek();
        const replacement = escaped === undefined ? undefined : STRING_ESCAPES[escaped];
        if (replacement === undefined) {
          throw new LexError(escapePosition, `Invalid escape sequence \\${escaped ?? ''}`);
        }
        this.advance();
        value += replacement;
        continue;
      }

      this.advance();
      value += char;
    }
  }

  private scanNumber(start: SourcePosition): Token {
    const begin = this.offset;
    if (this.peek() === '-') {
      this.advance();
    }
    this.consumeDigits();

    if (this.peek() === '.' && DIGIT.test(this.peek(1) ?? '')) {
      this.advance();
      this.consumeDigits();
    }

    const next = this.peek();
    if (next !== undefined && IDENTIFIER_PART.test(next)) {
      throw new LexError(this.position(), `Unexpected character ${JSON.stringify(next)} in number literal`);
    }

    return { kind: 'number', text: this.source.slice(begin, this.offset), position: start };
  }

  private scanIdentifier(start: SourcePosition): Token {
    const begin = this.offset;
    while (IDENTIFIER_PART.test(this.peek() ?? '')) {
      this.advance();
    }
    return { kind: 'identifier', text: this.source.slice(begin, this.offset), position: start };
  }

  private consumeDigits(): void {
    while (DIGIT.test(this.peek() ?? '')) {
      this.advance();
    }
  }

  private skipWhitespace(): void {
    while (WHITESPACE.test(this.peek() ?? '')) {
      this.advance();
    }
  }

  private peek(ahead: number = 0): string | undefined {
    return this.source[this.offset + ahead];
  }

  private advance(): void {
    if (this.source[this.offset] === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    this.offset++;
  }

  private position(): SourcePosition {
    return { offset: this.offset, line: this.line, column: this.column };
  }
}
