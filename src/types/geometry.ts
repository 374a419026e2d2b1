/**
 * RGBA color with values 0-255 for each channel.
 */
export interface Rgba {
  r: number;
  g: number;
  b: number;
  a: number;
}

/**
 * 2D point in slide coordinate space.
 */
export interface Point {
  x: number;
  y: number;
}

/**
 * Size with width and height.
 */
export interface Size {
  width: number;
  height: number;
}

/**
 * Rectangle with position and dimensions.
 */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Maximum space a parent hands down to a child during layout.
 */
export interface Constraint {
  maxWidth: number;
  maxHeight: number;
}

/**
 * Outer dimensions a deck is laid out against.
 */
export interface Viewport {
  width: number;
  height: number;
}

/**
 * Common RGBA colors.
 */
export const Colors: Readonly<Record<'transparent' | 'black' | 'white', Readonly<Rgba>>> = {
  transparent: { r: 0, g: 0, b: 0, a: 0 },
  black: { r: 0, g: 0, b: 0, a: 255 },
  white: { r: 255, g: 255, b: 255, a: 255 },
};

/**
 * Clamps a derived length to a finite, non-negative number.
 */
export function clampLength(value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    return 0;
  }
  return value;
}
