export type { ImageProvider, ImageFetchOptions, ProvidedImage } from './ImageProvider.js';
export { ImageResolver } from './ImageResolver.js';
export type { ImageRequest, ResolvedImage, ImageResolverOptions } from './ImageResolver.js';
export { UnsplashImageProvider } from './UnsplashImageProvider.js';
export type { UnsplashImageProviderOptions } from './UnsplashImageProvider.js';
