import type { SlidePartContext } from './SlideParts.js';

/**
 * What every binder needs to know about the slide it is filling.
 */
export interface BindContext {
  /** Zero-based slide index, for errors and logs */
  slideIndex: number;
  /** Deck language tag written on text runs */
  language: string;
  parts: SlidePartContext;
}
