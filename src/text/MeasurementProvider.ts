import type { Size } from '../types/geometry.js';
import { clampLength } from '../types/geometry.js';

/**
 * Supplies the intrinsic size of a run of text.
 * Implementations must be pure and deterministic for a fixed font configuration.
 */
export interface MeasurementProvider {
  measure(text: string, size: number): Size;
}

/**
 * Configuration for FixedAdvanceMeasurementProvider.
 */
export interface FixedAdvanceConfig {
  /** Advance of every character as a fraction of the text size */
  advance?: number;
  /** Line height as a multiple of the text size */
  lineHeight?: number;
}

/**
 * Font-free measurement: every character advances by the same fraction of the text size.
 * Useful headless and in tests.
 */
export class FixedAdvanceMeasurementProvider implements MeasurementProvider {
  private readonly advance: number;
  private readonly lineHeight: number;

  constructor(config: FixedAdvanceConfig = {}) {
    this.advance = config.advance ?? 0.5;
    this.lineHeight = config.lineHeight ?? 1.2;
  }

  measure(text: string, size: number): Size {
    const characters = [...text].length;
    return {
      width: clampLength(Math.ceil(characters * size * this.advance)),
      height: clampLength(Math.ceil(size * this.lineHeight)),
    };
  }
}
