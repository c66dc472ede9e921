/**
 * Image payload returned by a provider.
 */
export interface ProvidedImage {
  data: Buffer;
  /** MIME type reported by the source, e.g. `image/jpeg` */
  contentType: string;
}

/**
 * Per-request options passed to a provider.
 */
export interface ImageFetchOptions {
  /** Time the caller is willing to wait, in milliseconds */
  timeoutMs: number;
  /** Aborted on timeout or when the render is cancelled */
  signal: AbortSignal;
}

/**
 * External image lookup keyed by a topic query.
 *
 * Implementations resolve to `undefined` when nothing matches. Rejections
 * are tolerated: the resolver treats them like an empty result.
 */
export interface ImageProvider {
  fetch(query: string, options: ImageFetchOptions): Promise<ProvidedImage | undefined>;
}
