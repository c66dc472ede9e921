/**
 * Identifies image payloads and reads their pixel dimensions.
 * Formats a presentation cannot embed are converted to PNG through sharp.
 */

import sharp from 'sharp';
import type { ILogger } from './Logger.js';
import { createLogger } from './Logger.js';

/**
 * Image formats recognised from magic bytes.
 */
export type ImageFormat = 'png' | 'jpeg' | 'gif' | 'bmp' | 'webp' | 'unknown';

/**
 * Result of decoding an image.
 */
export interface DecodedImage {
  /** Bytes ready to embed (converted to PNG when the source was not embeddable) */
  data: Buffer;
  /** Image width in pixels */
  width: number;
  /** Image height in pixels */
  height: number;
  /** Format of `data` */
  format: Exclude<ImageFormat, 'unknown' | 'webp'>;
}

/**
 * Configuration for ImageDecoder.
 */
export interface ImageDecoderConfig {
  /** Logger instance */
  logger?: ILogger;
}

/**
 * Image signature bytes for format detection.
 */
const IMAGE_SIGNATURES = {
  png: [0x89, 0x50, 0x4e, 0x47],  // .PNG
  jpeg: [0xff, 0xd8, 0xff],       // JPEG SOI marker
  gif: [0x47, 0x49, 0x46],        // GIF
  bmp: [0x42, 0x4d],              // BM
  webp: [0x52, 0x49, 0x46, 0x46], // RIFF (WebP container)
} as const;

/**
 * Decodes image payloads for embedding.
 */
export class ImageDecoder {
  private readonly logger: ILogger;

  constructor(config: ImageDecoderConfig = {}) {
    this.logger = config.logger ?? createLogger('warn', 'ImageDecoder');
  }

  /**
   * Detects the image format from the buffer's magic bytes.
   */
  detectFormat(buffer: Buffer): ImageFormat {
    if (buffer.length < 4) {
      return 'unknown';
    }
    if (this.matchesSignature(buffer, IMAGE_SIGNATURES.png)) {
      return 'png';
    }
    if (this.matchesSignature(buffer, IMAGE_SIGNATURES.jpeg)) {
      return 'jpeg';
    }
    if (this.matchesSignature(buffer, IMAGE_SIGNATURES.gif)) {
      return 'gif';
    }
    if (this.matchesSignature(buffer, IMAGE_SIGNATURES.bmp)) {
      return 'bmp';
    }
    // RIFF container tagged WEBP
    if (
      this.matchesSignature(buffer, IMAGE_SIGNATURES.webp) &&
      buffer.length >= 12 &&
      buffer.toString('ascii', 8, 12) === 'WEBP'
    ) {
      return 'webp';
    }
    return 'unknown';
  }

  private matchesSignature(buffer: Buffer, signature: readonly number[]): boolean {
    if (buffer.length < signature.length) {
      return false;
    }
    return signature.every((byte, i) => buffer[i] === byte);
  }

  /**
   * Decodes an image, converting non-embeddable formats to PNG.
   *
   * @throws Error if the bytes are not a readable image
   */
  async decode(buffer: Buffer): Promise<DecodedImage> {
    const detected = this.detectFormat(buffer);

    try {
      if (detected !== 'unknown' && detected !== 'webp') {
        const metadata = await sharp(buffer).metadata();
        if (!metadata.width || !metadata.height) {
          throw new Error('image has no dimensions');
        }
        return { data: buffer, width: metadata.width, height: metadata.height, format: detected };
      }

      // Anything else sharp can read (WebP, TIFF, AVIF...) is re-encoded.
      const { data, info } = await sharp(buffer).png().toBuffer({ resolveWithObject: true });
      this.logger.debug('Converted image to PNG', { from: detected, size: buffer.length });
      return { data, width: info.width, height: info.height, format: 'png' };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.debug('Failed to decode image', { format: detected, size: buffer.length, error: message });
      throw new Error(`Failed to decode image: ${message}`);
    }
  }

  /**
   * Gets the MIME type for an image format.
   */
  getMimeType(format: ImageFormat): string {
    switch (format) {
      case 'png':
        return 'image/png';
      case 'jpeg':
        return 'image/jpeg';
      case 'gif':
        return 'image/gif';
      case 'bmp':
        return 'image/bmp';
      case 'webp':
        return 'image/webp';
      default:
        return 'application/octet-stream';
    }
  }

  /**
   * Gets the file extension (without dot) used for a format's media part.
   */
  getExtension(format: ImageFormat): string {
    switch (format) {
      case 'png':
        return 'png';
      case 'jpeg':
        return 'jpeg';
      case 'gif':
        return 'gif';
      case 'bmp':
        return 'bmp';
      case 'webp':
        return 'webp';
      default:
        return 'bin';
    }
  }
}
