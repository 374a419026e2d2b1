/**
 * Parser module: source text to slide ASTs and back.
 */

export { Lexer, tokenize } from './Lexer.js';

export { Parser, parseDocument } from './Parser.js';

export { printDocument, printSlide, printContent } from './Printer.js';
