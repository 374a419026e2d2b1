import { describe, it, expect } from 'vitest';
import { Lexer, tokenize } from '../../src/parsers/Lexer.js';
import { LexError } from '../../src/core/errors.js';

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected an error to be thrown');
}

describe('Lexer', () => {
  describe('Token recognition', () => {
    it('should tokenize a minimal slide', () => {
      const tokens = tokenize('[ text("Hi") ]');

      expect(tokens.map((t) => t.kind)).toEqual([
        'lbracket',
        'identifier',
        'lparen',
        'string',
        'rparen',
        'rbracket',
        'eof',
      ]);
      expect(tokens.map((t) => t.text)).toEqual(['[', 'text', '(', 'Hi', ')', ']', '']);
    });

    it('should distinguish the naming operator from a colon', () => {
      const tokens = tokenize('title :: text { size: 3 }');

      expect(tokens.map((t) => t.kind)).toEqual([
        'identifier',
        'define',
        'identifier',
        'lbrace',
        'identifier',
        'colon',
        'number',
        'rbrace',
        'eof',
      ]);
    });

    it('should lex negative and decimal numbers', () => {
      const tokens = tokenize('-12 3.5 0');

      expect(tokens.filter((t) => t.kind === 'number').map((t) => t.text)).toEqual(['-12', '3.5', '0']);
    });

    it('should unescape string literals', () => {
      const [token] = tokenize('"a\\"b\\\\c\\nd"');

      expect(token?.kind).toBe('string');
      expect(token?.text).toBe('a"b\\c\nd');
    });

    it('should discard line comments', () => {
      const tokens = tokenize('// title slide\n[ text("a") ] // trailing');

      expect(tokens.map((t) => t.kind)).toEqual([
        'lbracket',
        'identifier',
        'lparen',
        'string',
        'rparen',
        'rbracket',
        'eof',
      ]);
    });

    it('should keep // inside strings', () => {
      const [token] = tokenize('"http://example.test"');

      expect(token?.text).toBe('http://example.test');
    });
  });

  describe('Source positions', () => {
    it('should track line, column and offset', () => {
      const tokens = tokenize('[\n  centre(');
      const centre = tokens[1];

      expect(centre?.text).toBe('centre');
      expect(centre?.position).toEqual({ offset: 4, line: 2, column: 3 });
    });

    it('should place eof after the last character', () => {
      const tokens = tokenize('[]');

      expect(tokens[2]?.position).toEqual({ offset: 2, line: 1, column: 3 });
    });
  });

  describe('Restartable iteration', () => {
    it('should produce the same tokens on every iteration', () => {
      const lexer = new Lexer('[ row(text("a"), text("b")) ]');

      const first = [...lexer];
      const second = [...lexer];

      expect(second).toEqual(first);
      expect(first[first.length - 1]?.kind).toBe('eof');
    });
  });

  describe('Errors', () => {
    it('should fail on the first unrecognized character', () => {
      const error = catchError(() => tokenize('[ text("a") @ ]'));

      expect(error).toBeInstanceOf(LexError);
      if (error instanceof LexError) {
        expect(error.position).toEqual({ offset: 12, line: 1, column: 13 });
        expect(error.reason).toBe('Unexpected character "@"');
        expect(error.code).toBe('LEX_ERROR');
      }
    });

    it('should reject an unterminated string', () => {
      expect(() => tokenize('[ text("open ]')).toThrow(LexError);
    });

    it('should reject a newline inside a string', () => {
      expect(() => tokenize('"one\ntwo"')).toThrow(LexError);
    });

    it('should reject unknown escape sequences', () => {
      expect(() => tokenize('"\\q"')).toThrow(LexError);
    });

    it('should reject numbers running into identifiers', () => {
      expect(() => tokenize('12px')).toThrow(LexError);
    });
  });
});
