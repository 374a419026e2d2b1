/**
 * Logging level for the compiler.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Options for compiling slide source into layouts.
 */
export interface CompileOptions {
  /**
   * Viewport width in pixels. Slides without an explicit `width` take this.
   * @default 1920
   */
  viewportWidth?: number;

  /**
   * Viewport height in pixels. Slides without an explicit `height` take this.
   * @default 1080
   */
  viewportHeight?: number;

  /**
   * Text size used when no block sets `size`.
   * @default 16
   */
  defaultTextSize?: number;

  /**
   * Text fill used when no block sets `fill` (hex string, e.g. '#000000').
   * @default '#000000'
   */
  defaultTextFill?: string;

  /**
   * Padding amount used when no block sets `amount`.
   * @default 12
   */
  defaultPaddingAmount?: number;

  /**
   * Spacing between row and column children when no block sets `gap`.
   * @default 0
   */
  defaultGap?: number;

  /**
   * Logging level for diagnostic output.
   * @default 'warn'
   */
  logLevel?: LogLevel;

  /**
   * Reuse box trees for a slide laid out again at the same viewport.
   * @default false
   */
  cacheLayouts?: boolean;
}

/**
 * Default compile options.
 */
export const DEFAULT_COMPILE_OPTIONS: Readonly<Required<CompileOptions>> = {
  viewportWidth: 1920,
  viewportHeight: 1080,
  defaultTextSize: 16,
  defaultTextFill: '#000000',
  defaultPaddingAmount: 12,
  defaultGap: 0,
  logLevel: 'warn',
  cacheLayouts: false,
};

/**
 * Compile options after merging with defaults.
 */
export type ResolvedCompileOptions = Readonly<Required<CompileOptions>>;

/**
 * The subset of options the style cascade reads for its built-in defaults.
 */
export type StyleDefaults = Pick<
  ResolvedCompileOptions,
  'defaultTextSize' | 'defaultTextFill' | 'defaultPaddingAmount' | 'defaultGap'
>;
