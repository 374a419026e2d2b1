export {
  SlideSyntaxError,
  LexError,
  ParseError,
  UnknownContentKind,
  InvalidParameterValue,
  InvalidColour,
  UnresolvedStyleTarget,
  toCompileError,
} from './errors.js';

export { PROPERTY_TYPES, isPropertyKey } from './constants.js';
export type { PropertyKey } from './constants.js';

export { describeDeck, countNodes } from './describeDeck.js';

export {
  DeckCompiler,
  createCompiler,
  compileDeck,
  resolveCompileOptions,
} from './DeckCompiler.js';
export type { IDeckCompiler, DeckCompilerConfig } from './DeckCompiler.js';
