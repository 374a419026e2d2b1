export { StyleResolver, resolveSlide, mergeStyles, getNumber, getColour } from './StyleResolver.js';

export { isColourLiteral, parseHexColour, rgbaToHex, rgbaToCss } from './ColourResolver.js';
