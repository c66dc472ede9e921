import { z } from 'zod';
import type { ImageFetchOptions, ImageProvider, ProvidedImage } from './ImageProvider.js';
import { errorMessage } from '../core/errors.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

const SEARCH_URL = 'https://api.unsplash.com/search/photos';

const searchResponseSchema = z.object({
  results: z
    .array(
      z.object({
        urls: z.object({
          regular: z.string().url(),
        }),
      })
    )
    .default([]),
});

export interface UnsplashImageProviderOptions {
  /** Unsplash API access key; without one the provider never finds anything */
  accessKey?: string;
  /** Photo orientation filter */
  orientation?: 'landscape' | 'portrait' | 'squarish';
  logger?: ILogger;
}

/**
 * Image provider backed by the Unsplash search API. Takes the first photo
 * matching the query.
 */
export class UnsplashImageProvider implements ImageProvider {
  private readonly logger: ILogger;

  constructor(private readonly options: UnsplashImageProviderOptions = {}) {
    this.logger = options.logger ?? createLogger('warn', 'UnsplashImageProvider');
  }

  async fetch(query: string, { signal }: ImageFetchOptions): Promise<ProvidedImage | undefined> {
    const { accessKey } = this.options;
    if (!accessKey || query.trim() === '') {
      return undefined;
    }

    const url = new URL(SEARCH_URL);
    url.searchParams.set('query', query);
    url.searchParams.set('per_page', '1');
    url.searchParams.set('orientation', this.options.orientation ?? 'landscape');

    try {
      const response = await fetch(url, {
        headers: { Authorization: `Client-ID ${accessKey}` },
        signal,
      });
      if (!response.ok) {
        this.logger.warn('Unsplash search failed', { query, status: response.status });
        return undefined;
      }

      const parsed = searchResponseSchema.safeParse(await response.json());
      const photoUrl = parsed.success ? parsed.data.results[0]?.urls.regular : undefined;
      if (!photoUrl) {
        this.logger.debug('No Unsplash result', { query });
        return undefined;
      }

      const photo = await fetch(photoUrl, { signal });
      if (!photo.ok) {
        this.logger.warn('Unsplash photo download failed', { query, status: photo.status });
        return undefined;
      }

      return {
        data: Buffer.from(await photo.arrayBuffer()),
        contentType: photo.headers.get('content-type') ?? '',
      };
    } catch (error) {
      this.logger.warn('Unsplash request failed', { query, error: errorMessage(error) });
      return undefined;
    }
  }
}
