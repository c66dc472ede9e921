import { z } from 'zod';
import { EngineConfigurationError } from './errors.js';
import { UnsplashImageProvider } from '../images/UnsplashImageProvider.js';
import type { DeckEngineOptions } from '../types/index.js';

const envSchema = z.object({
  DECK_TEMPLATE_PATH: z.string().min(1).optional(),
  DECK_FALLBACK_IMAGE: z.string().min(1).optional(),
  DECK_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
  DECK_IMAGE_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  DECK_IMAGE_CONCURRENCY: z.coerce.number().int().positive().optional(),
  DECK_DEFAULT_CHART: z.enum(['bar', 'line', 'pie']).optional(),
  UNSPLASH_ACCESS_KEY: z.string().optional(),
});

/**
 * Engine settings read from the environment.
 */
export interface EnvironmentConfig {
  /** Template location, when configured */
  templatePath?: string;
  options: DeckEngineOptions;
}

/**
 * Reads engine options from environment variables. Empty variables count
 * as unset. An Unsplash provider is configured when `UNSPLASH_ACCESS_KEY`
 * is set.
 *
 * @throws EngineConfigurationError naming the first invalid variable
 */
export function loadEngineOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const variable = issue?.path.join('.') ?? 'environment';
    throw new EngineConfigurationError(`Invalid ${variable}: ${issue?.message ?? parsed.error.message}`, { variable });
  }

  const vars = parsed.data;
  const logLevel = vars.DECK_LOG_LEVEL;
  const options: DeckEngineOptions = {
    ...(logLevel ? { logLevel } : {}),
    ...(vars.DECK_FALLBACK_IMAGE ? { fallbackImagePath: vars.DECK_FALLBACK_IMAGE } : {}),
    ...(vars.DECK_IMAGE_TIMEOUT_MS ? { imageFetchTimeoutMs: vars.DECK_IMAGE_TIMEOUT_MS } : {}),
    ...(vars.DECK_IMAGE_CONCURRENCY ? { imageConcurrency: vars.DECK_IMAGE_CONCURRENCY } : {}),
    ...(vars.DECK_DEFAULT_CHART ? { defaultChartType: vars.DECK_DEFAULT_CHART } : {}),
    ...(vars.UNSPLASH_ACCESS_KEY ? { imageProvider: new UnsplashImageProvider({ accessKey: vars.UNSPLASH_ACCESS_KEY }) } : {}),
  };

  return { templatePath: vars.DECK_TEMPLATE_PATH, options };
}
