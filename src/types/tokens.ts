/**
 * Position of a character in the source text.
 * `offset` is 0-based; `line` and `column` are 1-based.
 */
export interface SourcePosition {
  offset: number;
  line: number;
  column: number;
}

/**
 * Token kinds produced by the lexer.
 */
export type TokenKind =
  | 'lbracket'   // [
  | 'rbracket'   // ]
  | 'lbrace'     // {
  | 'rbrace'     // }
  | 'lparen'     // (
  | 'rparen'     // )
  | 'colon'      // :
  | 'define'     // ::
  | 'comma'      // ,
  | 'identifier'
  | 'string'
  | 'number'
  | 'comment'
  | 'eof';

/**
 * A lexical token.
 */
export interface Token {
  kind: TokenKind;
  /** Source slice, or the unescaped value for string tokens */
  text: string;
  position: SourcePosition;
}

/**
 * Human-readable description of a token kind, used in error messages.
 */
export const TOKEN_DESCRIPTIONS: Readonly<Record<TokenKind, string>> = {
  lbracket: "'['",
  rbracket: "']'",
  lbrace: "'{'",
  rbrace: "'}'",
  lparen: "'('",
  rparen: "')'",
  colon: "':'",
  define: "'::'",
  comma: "','",
  identifier: 'identifier',
  string: 'string literal',
  number: 'number literal',
  comment: 'comment',
  eof: 'end of input',
};

/**
 * Describes a concrete token for error messages, e.g. `identifier "foo"`.
 */
export function describeToken(token: Token): string {
  switch (token.kind) {
    case 'identifier':
    case 'number':
      return `${TOKEN_DESCRIPTIONS[token.kind]} "${token.text}"`;
    case 'string':
      return `${TOKEN_DESCRIPTIONS.string} ${JSON.stringify(token.text)}`;
    default:
      return TOKEN_DESCRIPTIONS[token.kind];
  }
}
