/**
 * Shared constants for the slide language.
 */

/**
 * Value type expected for each recognized property key.
 * Keys not listed here are accepted as written.
 */
export const PROPERTY_TYPES = {
  width: 'number',        // slide width in pixels
  height: 'number',       // slide height in pixels
  margin: 'number',       // inset of the content root from the slide edges
  bg: 'colour',           // slide background
  size: 'number',         // text size
  fill: 'colour',         // text colour
  amount: 'number',       // padding on every side
  gap: 'number',          // spacing between row/column children
} as const;

/**
 * A recognized property key.
 */
export type PropertyKey = keyof typeof PROPERTY_TYPES;

/**
 * Checks whether a key is one of the recognized properties.
 */
export function isPropertyKey(key: string): key is PropertyKey {
  return Object.prototype.hasOwnProperty.call(PROPERTY_TYPES, key);
}
