import { fileURLToPath } from 'node:url';
import type { ChartType } from './deck.js';
import type { ImageProvider } from '../images/ImageProvider.js';

/**
 * Logging level for the engine.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Text regions with their own auto-fit character budget.
 */
export type TextRole = 'title' | 'body' | 'column';

/**
 * Auto-fit policy for text placeholders.
 *
 * Text longer than the role budget is shrunk in `scaleStep` decrements down
 * to `minScale`; at scale `s` a placeholder holds `budget / s²` characters.
 * Whatever still does not fit at the floor is truncated and suffixed with
 * `ellipsis`.
 */
export interface AutoFitOptions {
  /** Character budget at 100% font scale, per text role */
  budgets: Record<TextRole, number>;
  /** Font scale decrement per step (0.1 = 10 percentage points) */
  scaleStep: number;
  /** Lowest font scale the policy will apply */
  minScale: number;
  /** Marker appended to truncated text */
  ellipsis: string;
}

/**
 * Default auto-fit policy.
 */
export const DEFAULT_AUTO_FIT_OPTIONS: AutoFitOptions = {
  budgets: {
    title: 120,
    body: 500,
    column: 300,
  },
  scaleStep: 0.1,
  minScale: 0.5,
  ellipsis: '…',
};

/**
 * Image shipped with the package, used when a slide's image cannot be fetched.
 */
export const DEFAULT_FALLBACK_IMAGE_PATH = fileURLToPath(
  new URL('../../assets/fallback-image.png', import.meta.url)
);

/**
 * Options for creating a deck renderer.
 */
export interface DeckEngineOptions {
  /**
   * Logging level for diagnostic output.
   * @default 'warn'
   */
  logLevel?: LogLevel;

  /**
   * Image used when the provider yields nothing usable and the slide input
   * names no fallback of its own.
   */
  fallbackImagePath?: string;

  /**
   * Time allowed for one image provider request, in milliseconds.
   * @default 5000
   */
  imageFetchTimeoutMs?: number;

  /**
   * Maximum image provider requests in flight for one render.
   * @default 4
   */
  imageConcurrency?: number;

  /**
   * Chart type used when a chart slide does not declare one.
   * @default 'bar'
   */
  defaultChartType?: ChartType;

  /**
   * Overrides for the text auto-fit policy.
   */
  autoFit?: Partial<AutoFitOptions>;

  /**
   * External image lookup. Without one every image slide uses its fallback.
   */
  imageProvider?: ImageProvider;
}

/**
 * Default engine options.
 */
export const DEFAULT_ENGINE_OPTIONS: Required<Omit<DeckEngineOptions, 'imageProvider' | 'autoFit'>> & {
  autoFit: AutoFitOptions;
} = {
  logLevel: 'warn',
  fallbackImagePath: DEFAULT_FALLBACK_IMAGE_PATH,
  imageFetchTimeoutMs: 5000,
  imageConcurrency: 4,
  defaultChartType: 'bar',
  autoFit: DEFAULT_AUTO_FIT_OPTIONS,
};

/**
 * Engine options after merging with defaults.
 */
export interface ResolvedEngineOptions {
  logLevel: LogLevel;
  fallbackImagePath: string;
  imageFetchTimeoutMs: number;
  imageConcurrency: number;
  defaultChartType: ChartType;
  autoFit: AutoFitOptions;
  /** Undefined means every image slide uses its fallback image. */
  imageProvider: ImageProvider | undefined;
}

/**
 * Merges user options over the defaults.
 */
export function resolveEngineOptions(options: DeckEngineOptions = {}): ResolvedEngineOptions {
  return {
    logLevel: options.logLevel ?? DEFAULT_ENGINE_OPTIONS.logLevel,
    fallbackImagePath: options.fallbackImagePath ?? DEFAULT_ENGINE_OPTIONS.fallbackImagePath,
    imageFetchTimeoutMs: options.imageFetchTimeoutMs ?? DEFAULT_ENGINE_OPTIONS.imageFetchTimeoutMs,
    imageConcurrency: options.imageConcurrency ?? DEFAULT_ENGINE_OPTIONS.imageConcurrency,
    defaultChartType: options.defaultChartType ?? DEFAULT_ENGINE_OPTIONS.defaultChartType,
    autoFit: {
      ...DEFAULT_AUTO_FIT_OPTIONS,
      ...options.autoFit,
      budgets: { ...DEFAULT_AUTO_FIT_OPTIONS.budgets, ...options.autoFit?.budgets },
    },
    imageProvider: options.imageProvider,
  };
}

/**
 * Per-request render options.
 */
export interface RenderRequestOptions {
  /** Output filename hint; derived from the deck title when omitted */
  filename?: string;
  /** Aborts in-flight image fetches and the render when the caller goes away */
  signal?: AbortSignal;
}
