import type { SlideDeckSpec, SlideKind } from './deck.js';

/**
 * A slide rendered with the ContentOnly layout because its own kind had no
 * layout in the template.
 */
export interface DegradedSlide {
  /** Zero-based slide index */
  slideIndex: number;
  /** Kind the slide declared */
  requestedKind: SlideKind;
  /** Kind of the layout actually used */
  renderedKind: SlideKind;
}

/**
 * Where the bytes of a slide image came from.
 */
export type ImageSource = 'provider' | 'fallback';

/**
 * Image outcome for one image-bearing slide.
 */
export interface SlideImageReport {
  slideIndex: number;
  query: string;
  source: ImageSource;
}

/**
 * Result of rendering one deck.
 */
export interface RenderedDeck {
  /**
   * The rendered presentation package (PPTX bytes).
   */
  data: Buffer;

  /**
   * Safe output filename with a `.pptx` extension.
   */
  filename: string;

  /**
   * Number of slides in the package.
   */
  slideCount: number;

  /**
   * The validated structure that was rendered.
   */
  structure: SlideDeckSpec;

  /**
   * Slides that fell back to the ContentOnly layout.
   */
  degradedSlides: DegradedSlide[];

  /**
   * Image outcome per image-bearing slide, in slide order.
   */
  images: SlideImageReport[];
}
