/**
 * deckforge - template-driven PPTX rendering
 *
 * Renders structured slide decks into presentation packages using the
 * layouts of a PowerPoint template.
 */

// Main entry point
export { DeckRenderer } from './core/DeckRenderer.js';
export type { IDeckRenderer } from './core/DeckRenderer.js';
export { loadEngineOptionsFromEnv } from './core/config.js';
export type { EnvironmentConfig } from './core/config.js';

// Deck model
export { createSlideDeck, createDeckSchema, detectSlideKind, parseSlideKind, deriveFilename } from './model/index.js';
export type { DeckSchemaOptions } from './model/index.js';

// Types - Options and Results
export type {
  DeckEngineOptions,
  ResolvedEngineOptions,
  RenderRequestOptions,
  AutoFitOptions,
  TextRole,
  LogLevel,
  RenderedDeck,
  DegradedSlide,
  ImageSource,
  SlideImageReport,
} from './types/index.js';
export {
  DEFAULT_ENGINE_OPTIONS,
  DEFAULT_AUTO_FIT_OPTIONS,
  DEFAULT_FALLBACK_IMAGE_PATH,
  resolveEngineOptions,
} from './types/index.js';

// Types - Deck
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
  SlideSpec,
  ImageSlideSpec,
  DeckMetadata,
  SlideDeckSpec,
} from './types/index.js';
export { SLIDE_KINDS, isImageSlide } from './types/index.js';

// Types - Template
export type { PlaceholderRole, PlaceholderSlot, TableGrid, LayoutHandle, ResolvedLayout, LayoutCatalog } from './types/index.js';

// Errors
export {
  DeckError,
  SchemaValidationError,
  TemplateCatalogError,
  ChartDataMismatchError,
  TableGridMismatchError,
  DocumentAssemblyError,
  RenderCancelledError,
  EngineConfigurationError,
} from './core/errors.js';
export type { DeckErrorCode } from './core/errors.js';

// Images
export { UnsplashImageProvider } from './images/index.js';
export type { ImageProvider, ImageFetchOptions, ProvidedImage, UnsplashImageProviderOptions } from './images/index.js';

// Core components (for advanced usage)
export { TemplateCatalog } from './core/TemplateCatalog.js';
export { LayoutResolver } from './core/LayoutResolver.js';
export { DocumentAssembler } from './core/DocumentAssembler.js';
export { inspectPackage, DeckInspector } from './core/DeckInspector.js';
export type {
  PackageSummary,
  SlideSummary,
  TextShapeSummary,
  TableSummary,
  ImageSummary,
} from './core/DeckInspector.js';
export type { ChartData, ChartSeriesData } from './parsers/index.js';
export { AutoFitPolicy } from './text/index.js';
export type { FittedText } from './text/index.js';

// Logger
export { createLogger, createMemoryLogger, Logger } from './utils/Logger.js';
export type { ILogger, LogEntry, LogSink } from './utils/Logger.js';
