import type { Rgba } from '../types/geometry.js';

/**
 * Accepted colour literal forms: `#RRGGBB` and `#RRGGBBAA`.
 */
const COLOUR_LITERAL = /^#(?:[0-9A-Fa-f]{6}|[0-9A-Fa-f]{8})$/;

/**
 * Checks whether a string is a valid colour literal.
 */
export function isColourLiteral(value: string): boolean {
  return COLOUR_LITERAL.test(value);
}

/**
 * Parses a `#RRGGBB` or `#RRGGBBAA` literal to RGBA.
 * Returns undefined for anything else; shorthand and named colours are not accepted.
 */
export function parseHexColour(value: string): Rgba | undefined {
  if (!isColourLiteral(value)) {
    return undefined;
  }

  const hex = value.slice(1);
  const r = parseInt(hex.substring(0, 2), 16);
  const g = parseInt(hex.substring(2, 4), 16);
  const b = parseInt(hex.substring(4, 6), 16);
  const a = hex.length === 8 ? parseInt(hex.substring(6, 8), 16) : 255;

  return { r, g, b, a };
}

/**
 * Converts RGBA to a lowercase hex string, with the alpha pair only when asked for.
 */
export function rgbaToHex(color: Rgba, includeAlpha: boolean = false): string {
  const toHex = (n: number) => Math.round(Math.max(0, Math.min(255, n))).toString(16).padStart(2, '0');
  const hex = `#${toHex(color.r)}${toHex(color.g)}${toHex(color.b)}`;
  return includeAlpha ? hex + toHex(color.a) : hex;
}

/**
 * Converts RGBA to a CSS color string.
 */
export function rgbaToCss(color: Rgba): string {
  if (color.a === 255) {
    return `rgb(${color.r}, ${color.g}, ${color.b})`;
  }
  return `rgba(${color.r}, ${color.g}, ${color.b}, ${(color.a / 255).toFixed(3)})`;
}
