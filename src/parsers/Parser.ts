/**
 * Recursive-descent parser for slide source.
 *
 * ```
 * document   := slide*
 * slide      := '[' (content | styleBlock)* ']'
 * content    := (name '::')? identifier '(' argList? ')' paramBlock?
 * styleBlock := identifier '{' (key ':' value ','?)* '}'
 * ```
 *
 * A slide holds exactly one content expression, its root. Style blocks may
 * appear before or after it.
 */

import type { SourcePosition, Token, TokenKind } from '../types/tokens.js';
import { TOKEN_DESCRIPTIONS, describeToken } from '../types/tokens.js';
import type {
  ContentKind,
  ContentNode,
  PropertyBlock,
  Slide,
  StyleBlock,
  StyleValue,
} from '../types/nodes.js';
import { SLIDE_TARGET, isContentKind } from '../types/nodes.js';
import { PROPERTY_TYPES, isPropertyKey } from '../core/constants.js';
import { InvalidColour, InvalidParameterValue, ParseError, UnknownContentKind } from '../core/errors.js';
import { parseHexColour } from '../style/ColourResolver.js';
import { Lexer } from './Lexer.js';
import { deepFreeze } from '../utils/freeze.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Positional argument of a content call.
 */
type Argument =
  | { type: 'string'; value: string; token: Token }
  | { type: 'content'; node: ContentNode; token: Token };

/**
 * Per-slide bookkeeping while parsing.
 */
interface SlideScope {
  nextId: number;
  names: Set<string>;
}

const EMPTY_BLOCK: PropertyBlock = { properties: {}, positions: {} };

/**
 * Parses a token stream into slide ASTs.
 */
export class Parser {
  private readonly logger: ILogger;
  private readonly tokens: Token[];
  private index = 0;

  constructor(tokens: Iterable<Token>, logger?: ILogger) {
    this.logger = logger ?? createLogger('warn', 'Parser');
    this.tokens = [...tokens].filter((token) => token.kind !== 'comment');

    const last = this.tokens[this.tokens.length - 1];
    if (last?.kind !== 'eof') {
      const offset = last ? last.position.offset + last.text.length : 0;
      const position = last
        ? { offset, line: last.position.line, column: last.position.column + last.text.length }
        : { offset: 0, line: 1, column: 1 };
      this.tokens.push({ kind: 'eof', text: '', position });
    }
  }

  /**
   * Parses every slide in the token stream.
   */
  parseDocument(): Slide[] {
    const slides: Slide[] = [];

    while (this.peek().kind !== 'eof') {
      slides.push(this.parseSlide(slides.length));
    }

    this.logger.debug('Parsed document', { slides: slides.length });
    return deepFreeze(slides);
  }

  private parseSlide(index: number): Slide {
    const open = this.expect('lbracket');
    const scope: SlideScope = { nextId: 0, names: new Set() };
    const styleBlocks: StyleBlock[] = [];
    const targets = new Set<string>();
    let root: ContentNode | undefined;

    for (;;) {
      const token = this.peek();

      if (token.kind === 'rbracket') {
        break;
      }

      if (token.kind !== 'identifier') {
        throw new ParseError(token.position, "a content expression, a style block or ']'", describeToken(token));
      }

      const following = this.peek(1);

      if (following.kind === 'lbrace') {
        if (targets.has(token.text)) {
          throw new ParseError(token.position, 'one style block per target', `a duplicate style block for "${token.text}"`);
        }
        targets.add(token.text);
        styleBlocks.push(this.parseStyleBlock());
        continue;
      }

      if (following.kind === 'lparen' || following.kind === 'define') {
        if (root) {
          throw new ParseError(token.position, "a style block or ']'", 'a second content expression (multiple content roots)');
        }
        root = this.parseContent(scope);
        continue;
      }

      throw new ParseError(following.position, `'(' or '{' after "${token.text}"`, describeToken(following));
    }

    const close = this.expect('rbracket');

    if (!root) {
      throw new ParseError(close.position, 'a content expression', TOKEN_DESCRIPTIONS.rbracket);
    }

    this.logger.debug('Parsed slide', { index, nodes: scope.nextId, styleBlocks: styleBlocks.length });

    return { index, root, styleBlocks, position: open.position };
  }

  private parseContent(scope: SlideScope): ContentNode {
    const start = this.peek();
    let name: string | undefined;

    if (this.peek(1).kind === 'define') {
      name = this.parseName(scope);
    }

    const kindToken = this.expect('identifier');
    if (!isContentKind(kindToken.text)) {
      throw new UnknownContentKind(kindToken.position, kindToken.text);
    }

    const kind: ContentKind = kindToken.text;
    const id = scope.nextId++;
    const args = this.parseArguments(scope);
    const close = this.previous();
    const params = this.peek().kind === 'lbrace' ? this.parsePropertyBlock() : EMPTY_BLOCK;
    const base = { id, ...(name !== undefined ? { name } : {}), params, position: start.position };

    switch (kind) {
      case 'centre':
      case 'padding': {
        const child = this.singleArgument(args, close, kind, 'content');
        return { kind, child, ...base };
      }
      case 'row':
      case 'column': {
        if (args.length === 0) {
          throw new ParseError(close.position, `at least one content argument to ${kind}()`, TOKEN_DESCRIPTIONS.rparen);
        }
        const children = args.map((arg) => {
          if (arg.type !== 'content') {
            throw new ParseError(arg.token.position, `a content expression in ${kind}()`, describeToken(arg.token));
          }
          return arg.node;
        });
        return { kind, children, ...base };
      }
      case 'text': {
        const value = this.singleArgument(args, close, kind, 'string');
        return { kind, value, ...base };
      }
    }
  }

  /**
   * Consumes `name ::` and checks the name is usable.
   */
  private parseName(scope: SlideScope): string {
    const token = this.expect('identifier');
    this.expect('define');

    if (isContentKind(token.text) || token.text === SLIDE_TARGET) {
      throw new ParseError(token.position, 'an element name', `the reserved word "${token.text}"`);
    }
    if (scope.names.has(token.text)) {
      throw new ParseError(token.position, 'a unique element name', `a second element named "${token.text}"`);
    }

    scope.names.add(token.text);
    return token.text;
  }

  private parseArguments(scope: SlideScope): Argument[] {
    this.expect('lparen');
    const args: Argument[] = [];

    while (this.peek().kind !== 'rparen') {
      const token = this.peek();

      if (token.kind === 'string') {
        this.advance();
        args.push({ type: 'string', value: token.text, token });
      } else if (token.kind === 'identifier') {
        args.push({ type: 'content', node: this.parseContent(scope), token });
      } else {
        throw new ParseError(token.position, "an argument or ')'", describeToken(token));
      }

      if (this.peek().kind === 'comma') {
        this.advance();
      } else if (this.peek().kind !== 'rparen') {
        throw new ParseError(this.peek().position, "',' or ')'", describeToken(this.peek()));
      }
    }

    this.expect('rparen');
    return args;
  }

  /**
   * Checks a call has exactly one argument of the given type.
   */
  private singleArgument(args: Argument[], close: Token, kind: ContentKind, type: 'content'): ContentNode;
  private singleArgument(args: Argument[], close: Token, kind: ContentKind, type: 'string'): string;
  private singleArgument(args: Argument[], close: Token, kind: ContentKind, type: Argument['type']): ContentNode | string {
    const description = type === 'content' ? 'a content expression' : 'a string literal';
    const [first, second] = args;

    if (!first) {
      throw new ParseError(close.position, `${description} in ${kind}()`, TOKEN_DESCRIPTIONS.rparen);
    }
    if (second) {
      throw new ParseError(second.token.position, `exactly one argument to ${kind}()`, describeToken(second.token));
    }
    if (first.type !== type) {
      throw new ParseError(first.token.position, `${description} in ${kind}()`, describeToken(first.token));
    }

    return first.type === 'content' ? first.node : first.value;
  }

  private parseStyleBlock(): StyleBlock {
    const target = this.expect('identifier');
    const block = this.parsePropertyBlock();
    return { target: target.text, ...block, position: target.position };
  }

  private parsePropertyBlock(): PropertyBlock {
    this.expect('lbrace');
    const properties = new Map<string, StyleValue>();
    const positions = new Map<string, SourcePosition>();

    while (this.peek().kind !== 'rbrace') {
      const key = this.expect('identifier');
      this.expect('colon');

      if (properties.has(key.text)) {
        throw new ParseError(key.position, 'each key once per block', `a second "${key.text}"`);
      }

      properties.set(key.text, this.parseValue(key.text, this.advance()));
      positions.set(key.text, key.position);

      if (this.peek().kind === 'comma') {
        this.advance();
      }
    }

    this.expect('rbrace');
    // own data properties, `__proto__` included
    return { properties: Object.fromEntries(properties), positions: Object.fromEntries(positions) };
  }

  private parseValue(key: string, token: Token): StyleValue {
    const expected = isPropertyKey(key) ? PROPERTY_TYPES[key] : undefined;

    if (expected === undefined) {
      this.logger.warn('Unrecognized property key', { key, line: token.position.line, column: token.position.column });
    }

    switch (token.kind) {
      case 'number': {
        const value = Number(token.text);
        if (expected === 'colour') {
          throw new InvalidParameterValue(token.position, key, token.text, 'expected a colour string');
        }
        if (value < 0) {
          throw new InvalidParameterValue(token.position, key, token.text, 'must not be negative');
        }
        if (!Number.isFinite(value)) {
          throw new InvalidParameterValue(token.position, key, token.text, 'must be finite');
        }
        return { type: 'number', value: Object.is(value, -0) ? 0 : value };
      }
      case 'string': {
        if (expected === 'number') {
          throw new InvalidParameterValue(token.position, key, JSON.stringify(token.text), 'expected a number');
        }
        if (expected === 'colour') {
          const rgba = parseHexColour(token.text);
          if (!rgba) {
            throw new InvalidColour(token.position, token.text);
          }
          return { type: 'colour', value: token.text, rgba };
        }
        return { type: 'string', value: token.text };
      }
      default:
        throw new ParseError(token.position, `a string or number value for "${key}"`, describeToken(token));
    }
  }

  private peek(ahead: number = 0): Token {
    const index = Math.min(this.index + ahead, this.tokens.length - 1);
    const token = this.tokens[index];
    if (!token) {
      throw new Error('Token stream is empty');
    }
    return token;
  }

  private previous(): Token {
    return this.tokens[this.index - 1] ?? this.peek();
  }

  private advance(): Token {
    const token = this.peek();
    if (token.kind !== 'eof') {
      this.index++;
    }
    return token;
  }

  private expect(kind: TokenKind): Token {
    const token = this.peek();
    if (token.kind !== kind) {
      throw new ParseError(token.position, TOKEN_DESCRIPTIONS[kind], describeToken(token));
    }
    return this.advance();
  }
}

/**
 * Parses source text (or an already-lexed token stream) into slides.
 * Throws LexError, ParseError, InvalidParameterValue or InvalidColour.
 */
export function parseDocument(input: string | Iterable<Token>, logger?: ILogger): Slide[] {
  const tokens = typeof input === 'string' ? new Lexer(input, logger?.child('Lexer')) : input;
  return new Parser(tokens, logger).parseDocument();
}
