import type { CompileOptions, ResolvedCompileOptions } from '../types/options.js';
import { DEFAULT_COMPILE_OPTIONS } from '../types/options.js';
import type { CompileStage, DeckCompileResult } from '../types/results.js';
import type { Viewport } from '../types/geometry.js';
import type { Slide } from '../types/nodes.js';
import type { SlideLayout, StyledSlide } from '../types/layout.js';
import { parseDocument } from '../parsers/Parser.js';
import { StyleResolver } from '../style/StyleResolver.js';
import { isColourLiteral } from '../style/ColourResolver.js';
import { LayoutEngine } from '../layout/LayoutEngine.js';
import { LayoutCache } from '../layout/LayoutCache.js';
import type { MeasurementProvider } from '../text/MeasurementProvider.js';
import { CanvasMeasurementProvider } from '../text/CanvasMeasurementProvider.js';
import { toCompileError } from './errors.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Configuration for a DeckCompiler.
 */
export interface DeckCompilerConfig extends CompileOptions {
  /** Text measurement; defaults to canvas text metrics */
  measurer?: MeasurementProvider;
  /** Logger instance; one at `logLevel` is created when omitted */
  logger?: ILogger;
}

/**
 * Interface for the deck compiler.
 */
export interface IDeckCompiler {
  /**
   * Parses source into slide ASTs. Throws on the first authoring error.
   */
  parse(source: string): Slide[];

  /**
   * Resolves the style cascade of every slide against a viewport.
   */
  resolve(slides: readonly Slide[], viewport?: Viewport): StyledSlide[];

  /**
   * Lays out parsed slides. Call again with a new viewport to re-derive box trees on resize.
   */
  layout(slides: readonly Slide[], viewport?: Viewport): SlideLayout[];

  /**
   * Runs the whole pipeline, reporting failure as a result record.
   */
  compile(source: string, viewport?: Viewport): DeckCompileResult;
}

/**
 * Merges options over the defaults and checks the ones the cascade depends on.
 */
export function resolveCompileOptions(options: CompileOptions = {}): ResolvedCompileOptions {
  const merged: Required<CompileOptions> = { ...DEFAULT_COMPILE_OPTIONS };
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }

  if (!isColourLiteral(merged.defaultTextFill)) {
    throw new Error(`defaultTextFill must be #RRGGBB or #RRGGBBAA, got ${JSON.stringify(merged.defaultTextFill)}`);
  }

  for (const key of ['defaultTextSize', 'defaultPaddingAmount', 'defaultGap'] as const) {
    const value = merged[key];
    if (!Number.isFinite(value) || value < 0) {
      throw new Error(`${key} must be a non-negative number, got ${value}`);
    }
  }

  return Object.freeze(merged);
}

/**
 * Compiles slide source into positioned box trees.
 */
export class DeckCompiler implements IDeckCompiler {
  private readonly logger: ILogger;
  private readonly options: ResolvedCompileOptions;
  private readonly resolver: StyleResolver;
  private readonly engine: LayoutEngine;
  private readonly cache: LayoutCache | null;

  constructor(config: DeckCompilerConfig = {}) {
    const { measurer, logger, ...options } = config;
    this.options = resolveCompileOptions(options);
    this.logger = logger ?? createLogger(this.options.logLevel, 'DeckCompiler');
    this.resolver = new StyleResolver(this.options, this.logger.child('Style'));
    this.engine = new LayoutEngine(
      measurer ?? new CanvasMeasurementProvider({ logger: this.logger.child('Measure') }),
      this.logger.child('Layout')
    );
    this.cache = this.options.cacheLayouts ? new LayoutCache() : null;
  }

  /**
   * Viewport used when a call does not pass one.
   */
  get defaultViewport(): Viewport {
    return { width: this.options.viewportWidth, height: this.options.viewportHeight };
  }

  /**
   * Cache statistics, or null when caching is off.
   */
  get cacheStats(): { hits: number; misses: number } | null {
    return this.cache?.stats ?? null;
  }

  parse(source: string): Slide[] {
    return parseDocument(source, this.logger.child('Parser'));
  }

  resolve(slides: readonly Slide[], viewport: Viewport = this.defaultViewport): StyledSlide[] {
    const checked = this.checkViewport(viewport);
    return slides.map((slide) => this.resolver.resolveSlide(slide, checked));
  }

  layout(slides: readonly Slide[], viewport: Viewport = this.defaultViewport): SlideLayout[] {
    const checked = this.checkViewport(viewport);

    return slides.map((slide) => {
      const cached = this.cache?.get(slide, checked);
      if (cached) {
        return cached;
      }

      const layout = this.engine.layoutSlide(this.resolver.resolveSlide(slide, checked));
      this.cache?.set(slide, checked, layout);
      return layout;
    });
  }

  compile(source: string, viewport: Viewport = this.defaultViewport): DeckCompileResult {
    let stage: CompileStage = 'parse';

    try {
      const ast = this.parse(source);
      stage = 'layout';
      const slides = this.layout(ast, viewport);

      this.logger.info('Compiled deck', {
        slides: slides.length,
        viewportWidth: viewport.width,
        viewportHeight: viewport.height,
      });

      return { success: true, ast, slides, totalSlides: slides.length };
    } catch (error) {
      const compileError = toCompileError(error, stage);

      this.logger.error('Failed to compile deck', {
        code: compileError.code,
        stage: compileError.stage,
        error: compileError.message,
      });

      return { success: false, ast: [], slides: [], totalSlides: 0, error: compileError };
    }
  }

  /**
   * Clamps an unusable viewport to zero size; layout never fails on it.
   */
  private checkViewport(viewport: Viewport): Viewport {
    const valid = (n: number) => Number.isFinite(n) && n >= 0;
    if (valid(viewport.width) && valid(viewport.height)) {
      return viewport;
    }

    this.logger.warn('Degenerate viewport clamped to zero', { ...viewport });
    return {
      width: valid(viewport.width) ? viewport.width : 0,
      height: valid(viewport.height) ? viewport.height : 0,
    };
  }
}

/**
 * Creates a new DeckCompiler instance.
 */
export function createCompiler(config?: DeckCompilerConfig): IDeckCompiler {
  return new DeckCompiler(config);
}

/**
 * Convenience function to compile a deck in one call.
 */
export function compileDeck(source: string, config?: DeckCompilerConfig): DeckCompileResult {
  return new DeckCompiler(config).compile(source);
}
