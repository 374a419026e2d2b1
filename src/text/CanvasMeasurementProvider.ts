/**
 * Measures text with a Skia-backed canvas 2D context.
 * Font families are resolved through a fallback chain the way CSS does.
 */

import { createCanvas } from '@napi-rs/canvas';
import type { Size } from '../types/geometry.js';
import { clampLength } from '../types/geometry.js';
import type { MeasurementProvider } from './MeasurementProvider.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * The part of a canvas 2D context used for measuring.
 */
export interface TextMeasuringContext {
  font: string;
  measureText(text: string): { width: number };
}

/**
 * Configuration for CanvasMeasurementProvider.
 */
export interface CanvasMeasurementConfig {
  /** Primary font family */
  fontFamily?: string;
  /** Line height as a multiple of the text size */
  lineHeight?: number;
  /** Context to measure with; a 1x1 canvas is created when omitted */
  context?: TextMeasuringContext;
  /** Logger instance */
  logger?: ILogger;
}

/**
 * Font substitution fallback chains.
 */
const FONT_FALLBACK_CHAINS: Readonly<Record<string, readonly string[]>> = {
  'Liberation Serif': ['Liberation Serif', 'Times New Roman', 'Georgia', 'serif'],
  'Liberation Sans': ['Liberation Sans', 'Arial', 'Helvetica', 'sans-serif'],
  'Liberation Mono': ['Liberation Mono', 'Courier New', 'monospace'],
  'sans-serif': ['Arial', 'Helvetica', 'sans-serif'],
  'serif': ['Georgia', 'Times New Roman', 'serif'],
  'monospace': ['Courier New', 'monospace'],
};

const DEFAULT_FALLBACK: readonly string[] = ['Arial', 'Helvetica', 'sans-serif'];

/**
 * Builds a CSS font-family list with fallbacks, quoting names that contain spaces.
 */
export function fontFamilyWithFallbacks(fontFamily: string): string {
  const fallbacks = [...(FONT_FALLBACK_CHAINS[fontFamily] ?? DEFAULT_FALLBACK)];
  if (!fallbacks.includes(fontFamily)) {
    fallbacks.unshift(fontFamily);
  }
  return fallbacks.map((family) => (family.includes(' ') ? `"${family}"` : family)).join(', ');
}

/**
 * MeasurementProvider backed by canvas text metrics. Results are cached per font and text.
 */
export class CanvasMeasurementProvider implements MeasurementProvider {
  private readonly logger: ILogger;
  private readonly family: string;
  private readonly lineHeight: number;
  private context: TextMeasuringContext | null;
  private readonly cache: Map<string, Size> = new Map();

  constructor(config: CanvasMeasurementConfig = {}) {
    this.logger = config.logger ?? createLogger('warn', 'CanvasMeasurementProvider');
    this.family = fontFamilyWithFallbacks(config.fontFamily ?? 'sans-serif');
    this.lineHeight = config.lineHeight ?? 1.2;
    this.context = config.context ?? null;
  }

  /**
   * CSS font shorthand for a text size, e.g. `24px Arial, Helvetica, sans-serif`.
   */
  fontString(size: number): string {
    return `${size}px ${this.family}`;
  }

  measure(text: string, size: number): Size {
    const font = this.fontString(size);
    const cacheKey = `${font}\u0000${text}`;
    const cached = this.cache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const ctx = this.getContext();
    ctx.font = font;
    const measuredWidth = ctx.measureText(text).width;

    const result: Size = {
      width: clampLength(Math.ceil(measuredWidth)),
      height: clampLength(Math.ceil(size * this.lineHeight)),
    };

    if (!Number.isFinite(measuredWidth) || measuredWidth < 0) {
      this.logger.warn('Canvas reported an unusable text width', { font, width: measuredWidth });
    }

    this.cache.set(cacheKey, result);
    this.logger.debug('Measured text', { font, length: text.length, width: result.width, height: result.height });

    return result;
  }

  /**
   * Clears the measurement cache.
   */
  clearCache(): void {
    this.cache.clear();
  }

  private getContext(): TextMeasuringContext {
    if (!this.context) {
      this.context = createCanvas(1, 1).getContext('2d');
    }
    return this.context;
  }
}
