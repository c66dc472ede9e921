/**
 * Type definitions for deckforge.
 */

// Options and configuration
export type {
  DeckEngineOptions,
  ResolvedEngineOptions,
  RenderRequestOptions,
  AutoFitOptions,
  TextRole,
  LogLevel,
} from './options.js';
export {
  DEFAULT_ENGINE_OPTIONS,
  DEFAULT_AUTO_FIT_OPTIONS,
  DEFAULT_FALLBACK_IMAGE_PATH,
  resolveEngineOptions,
} from './options.js';

// Results
export type { RenderedDeck, DegradedSlide, ImageSource, SlideImageReport } from './results.js';

// Deck model
export type {
  SlideKind,
  ChartType,
  TextFormatting,
  TextRun,
  RichText,
  BulletPoint,
  BulletList,
  ImageDescriptor,
  TableStyle,
  TableContent,
  ChartSeriesSpec,
  ChartContent,
  TitleSlideSpec,
  ContentOnlySlideSpec,
  ImageSideSlideSpec,
  ImageFullSlideSpec,
  TableSlideSpec,
  ChartSlideSpec,
  TwoColumnsSlideSpec,
  SlideSpec,
  ImageSlideSpec,
  DeckMetadata,
  SlideDeckSpec,
} from './deck.js';
export { SLIDE_KINDS, isImageSlide } from './deck.js';

// Template
export type {
  PlaceholderRole,
  PlaceholderSlot,
  TableGrid,
  LayoutHandle,
  ResolvedLayout,
  LayoutCatalog,
} from './template.js';

// Geometry
export type { Size, Rect, CropRect } from './geometry.js';
export { splitHorizontally, unionRects } from './geometry.js';

// Elements
export type { PlaceholderType, PlaceholderReference } from './elements.js';
export { isPlaceholderType } from './elements.js';
