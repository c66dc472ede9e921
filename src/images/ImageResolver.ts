import * as fs from 'fs/promises';
import pLimit from 'p-limit';
import type { ImageProvider, ProvidedImage } from './ImageProvider.js';
import { errorMessage } from '../core/errors.js';
import type { ImageDescriptor, ImageSource } from '../types/index.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import { ImageDecoder, type DecodedImage } from '../utils/ImageDecoder.js';

/**
 * 1×1 transparent PNG used when even the fallback file is unreadable.
 */
const BUILT_IN_PLACEHOLDER: DecodedImage = {
  data: Buffer.from(
    'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mP8z8BQDwAEhQGAhKmMIQAAAABJRU5ErkJggg==',
    'base64'
  ),
  width: 1,
  height: 1,
  format: 'png',
};

/**
 * One image to resolve, tagged with the slide it belongs to.
 */
export interface ImageRequest {
  slideIndex: number;
  descriptor: ImageDescriptor;
}

/**
 * Image bytes ready to embed, tagged with their slide.
 */
export interface ResolvedImage {
  slideIndex: number;
  query: string;
  source: ImageSource;
  image: DecodedImage;
}

/**
 * Options for ImageResolver.
 */
export interface ImageResolverOptions {
  /** Without a provider every request resolves to its fallback */
  provider?: ImageProvider;
  /** Time allowed per provider request, in milliseconds */
  timeoutMs: number;
  /** Provider requests in flight per `resolveAll` call */
  concurrency: number;
  logger?: ILogger;
}

/**
 * Turns image descriptors into embeddable bytes.
 *
 * Every request ends with bytes: provider output when it arrives in time and
 * decodes as an image, otherwise the descriptor's fallback file, otherwise a
 * built-in placeholder. Decoded fallback files are cached per path for the
 * lifetime of the resolver; a failed read is not cached.
 */
export class ImageResolver {
  private readonly logger: ILogger;
  private readonly decoder: ImageDecoder;
  private readonly fallbackCache = new Map<string, Promise<DecodedImage>>();

  constructor(private readonly options: ImageResolverOptions) {
    this.logger = options.logger ?? createLogger('warn', 'ImageResolver');
    this.decoder = new ImageDecoder({ logger: this.logger.child('Decoder') });
  }

  /**
   * Resolves a batch on a bounded pool. Results come back in request order.
   */
  async resolveAll(requests: readonly ImageRequest[], signal?: AbortSignal): Promise<ResolvedImage[]> {
    const limit = pLimit(Math.max(1, this.options.concurrency));
    return Promise.all(requests.map((request) => limit(() => this.resolve(request, signal))));
  }

  /**
   * Resolves one image. Never rejects.
   */
  async resolve(request: ImageRequest, signal?: AbortSignal): Promise<ResolvedImage> {
    const { slideIndex, descriptor } = request;
    const fetched = await this.fetchFromProvider(descriptor.query, signal);

    if (fetched) {
      const image = await this.decodeProvided(fetched, descriptor.query);
      if (image) {
        this.logger.debug('Image resolved from provider', { slideIndex, query: descriptor.query });
        return { slideIndex, query: descriptor.query, source: 'provider', image };
      }
    }

    this.logger.warn('Using fallback image', { slideIndex, query: descriptor.query });
    return {
      slideIndex,
      query: descriptor.query,
      source: 'fallback',
      image: await this.loadFallback(descriptor.fallbackPath),
    };
  }

  /**
   * Loads a fallback file, decoding it once per path.
   */
  loadFallback(path: string): Promise<DecodedImage> {
    let cached = this.fallbackCache.get(path);
    if (!cached) {
      cached = this.readFallback(path);
      this.fallbackCache.set(path, cached);
    }
    return cached;
  }

  private async readFallback(path: string): Promise<DecodedImage> {
    try {
      return await this.decoder.decode(await fs.readFile(path));
    } catch (error) {
      this.fallbackCache.delete(path);
      this.logger.error('Fallback image unreadable, using built-in placeholder', {
        path,
        error: errorMessage(error),
      });
      return BUILT_IN_PLACEHOLDER;
    }
  }

  /**
   * Asks the provider for an image within the timeout. Resolves to
   * `undefined` on timeout, cancellation, rejection or an empty result.
   */
  private async fetchFromProvider(query: string, signal?: AbortSignal): Promise<ProvidedImage | undefined> {
    const { provider, timeoutMs } = this.options;
    if (!provider || signal?.aborted) {
      return undefined;
    }

    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort(signal?.reason);
    signal?.addEventListener('abort', forwardAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const stopped = new Promise<undefined>((resolve) => {
      timer = setTimeout(() => {
        this.logger.warn('Image provider timed out', { query, timeoutMs });
        controller.abort(new Error(`Image fetch timed out after ${timeoutMs}ms`));
      }, timeoutMs);
      controller.signal.addEventListener('abort', () => resolve(undefined), { once: true });
    });

    const fetched = Promise.resolve()
      .then(() => provider.fetch(query, { timeoutMs, signal: controller.signal }))
      .catch((error: unknown) => {
        this.logger.warn('Image provider failed', { query, error: errorMessage(error) });
        return undefined;
      });

    try {
      return await Promise.race([fetched, stopped]);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  private async decodeProvided(fetched: ProvidedImage, query: string): Promise<DecodedImage | undefined> {
    if (!fetched.contentType.toLowerCase().startsWith('image/') || fetched.data.length === 0) {
      this.logger.warn('Image provider returned a non-image payload', {
        query,
        contentType: fetched.contentType,
        size: fetched.data.length,
      });
      return undefined;
    }

    try {
      return await this.decoder.decode(fetched.data);
    } catch (error) {
      this.logger.warn('Provider image could not be decoded', { query, error: errorMessage(error) });
      return undefined;
    }
  }
}
