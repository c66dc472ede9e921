import * as fs from 'fs/promises';
import { DocumentAssembler } from './DocumentAssembler.js';
import { LayoutResolver } from './LayoutResolver.js';
import { TemplateCatalog } from './TemplateCatalog.js';
import { WorkingCopy } from './WorkingCopy.js';
import { EngineConfigurationError, RenderCancelledError, TemplateCatalogError, errorMessage } from './errors.js';
import { SlideBinder } from '../binding/SlideBinder.js';
import { ImageResolver, type ResolvedImage } from '../images/ImageResolver.js';
import { createSlideDeck } from '../model/createSlideDeck.js';
import { deriveFilename } from '../model/filename.js';
import { AutoFitPolicy } from '../text/AutoFitPolicy.js';
import type {
  DeckEngineOptions,
  DegradedSlide,
  RenderedDeck,
  RenderRequestOptions,
  ResolvedEngineOptions,
  SlideDeckSpec,
} from '../types/index.js';
import { isImageSlide, resolveEngineOptions } from '../types/index.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Interface for the deck renderer.
 */
export interface IDeckRenderer {
  /**
   * Renders a validated deck to a presentation package.
   */
  render(deck: SlideDeckSpec, options?: RenderRequestOptions): Promise<RenderedDeck>;

  /**
   * Validates loose deck JSON, then renders it.
   */
  renderJson(input: unknown, options?: RenderRequestOptions): Promise<RenderedDeck>;

  /**
   * Validates loose deck JSON with this renderer's defaults.
   */
  createDeck(input: unknown): SlideDeckSpec;
}

function throwIfCancelled(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new RenderCancelledError(stage);
  }
}

/**
 * Main entry point: renders slide decks against one template.
 *
 * The template is loaded and cataloged once; the renderer is then safe to
 * share across concurrent renders, each working on its own copy of the
 * template.
 */
export class DeckRenderer implements IDeckRenderer {
  private readonly logger: ILogger;
  private readonly layoutResolver: LayoutResolver;
  private readonly slideBinder: SlideBinder;
  private readonly imageResolver: ImageResolver;
  private readonly assembler: DocumentAssembler;

  private constructor(
    private readonly template: Buffer,
    readonly catalog: TemplateCatalog,
    readonly options: ResolvedEngineOptions,
    logger: ILogger
  ) {
    this.logger = logger;
    this.layoutResolver = new LayoutResolver(catalog, logger.child('Layouts'));
    this.slideBinder = new SlideBinder(new AutoFitPolicy(options.autoFit), catalog.slideSize, logger.child('Binder'));
    this.imageResolver = new ImageResolver({
      provider: options.imageProvider,
      timeoutMs: options.imageFetchTimeoutMs,
      concurrency: options.imageConcurrency,
      logger: logger.child('Images'),
    });
    this.assembler = new DocumentAssembler(logger.child('Assembler'));
  }

  /**
   * Loads a template (path or bytes), builds its catalog and checks the
   * engine options.
   *
   * @throws TemplateCatalogError if the template is unreadable or unusable
   * @throws EngineConfigurationError on invalid options or an unreadable fallback image
   */
  static async create(template: Buffer | string, options: DeckEngineOptions = {}, logger?: ILogger): Promise<DeckRenderer> {
    const resolved = resolveEngineOptions(options);
    const log = logger ?? createLogger(resolved.logLevel, 'DeckRenderer');

    if (!(Number.isInteger(resolved.imageFetchTimeoutMs) && resolved.imageFetchTimeoutMs > 0)) {
      throw new EngineConfigurationError('imageFetchTimeoutMs must be a positive integer', {
        imageFetchTimeoutMs: resolved.imageFetchTimeoutMs,
      });
    }
    if (!(Number.isInteger(resolved.imageConcurrency) && resolved.imageConcurrency > 0)) {
      throw new EngineConfigurationError('imageConcurrency must be a positive integer', {
        imageConcurrency: resolved.imageConcurrency,
      });
    }
    try {
      await fs.access(resolved.fallbackImagePath);
    } catch (error) {
      throw new EngineConfigurationError(
        `Fallback image is not readable: ${resolved.fallbackImagePath}`,
        { fallbackImagePath: resolved.fallbackImagePath },
        { cause: error }
      );
    }

    let bytes: Buffer;
    if (typeof template === 'string') {
      try {
        bytes = await fs.readFile(template);
      } catch (error) {
        throw new TemplateCatalogError(`Cannot read template ${template}: ${errorMessage(error)}`, { path: template }, { cause: error });
      }
    } else {
      bytes = Buffer.from(template);
    }

    const catalog = await TemplateCatalog.build(bytes, log.child('Catalog'));
    log.info('Deck renderer ready', { kinds: catalog.kinds(), slideSize: catalog.slideSize });
    return new DeckRenderer(bytes, catalog, resolved, log);
  }

  createDeck(input: unknown): SlideDeckSpec {
    return createSlideDeck(input, {
      fallbackImagePath: this.options.fallbackImagePath,
      defaultChartType: this.options.defaultChartType,
    });
  }

  async renderJson(input: unknown, options: RenderRequestOptions = {}): Promise<RenderedDeck> {
    throwIfCancelled(options.signal, 'validation');
    return this.render(this.createDeck(input), options);
  }

  /**
   * Renders a deck.
   *
   * @throws RenderCancelledError when the signal aborts before assembly
   * @throws TableGridMismatchError or ChartDataMismatchError from binding
   * @throws DocumentAssemblyError on package-level faults
   */
  async render(deck: SlideDeckSpec, options: RenderRequestOptions = {}): Promise<RenderedDeck> {
    const { signal } = options;
    throwIfCancelled(signal, 'layout resolution');

    const layouts = deck.slides.map((slide, index) => this.layoutResolver.resolve(slide, index));
    const degradedSlides: DegradedSlide[] = layouts.flatMap((resolved, slideIndex) => {
      const slide = deck.slides[slideIndex];
      return resolved.degraded && slide
        ? [{ slideIndex, requestedKind: slide.kind, renderedKind: resolved.layout.kind }]
        : [];
    });

    const images = await this.imageResolver.resolveAll(
      deck.slides.flatMap((slide, slideIndex) => (isImageSlide(slide) ? [{ slideIndex, descriptor: slide.image }] : [])),
      signal
    );
    throwIfCancelled(signal, 'image resolution');
    const imagesBySlide = new Map<number, ResolvedImage>(images.map((image) => [image.slideIndex, image]));

    const bound = deck.slides.map((slide, slideIndex) => {
      const resolved = layouts[slideIndex];
      if (!resolved) {
        throw new TemplateCatalogError('No layout resolved for slide', { slideIndex });
      }
      return this.slideBinder.bind({
        slide,
        slideIndex,
        resolved,
        language: deck.language,
        image: imagesBySlide.get(slideIndex)?.image,
      });
    });
    throwIfCancelled(signal, 'binding');

    const copy = await WorkingCopy.checkout(this.template);
    const data = await this.assembler.assemble(copy, {
      slides: bound,
      metadata: deck.metadata,
      language: deck.language,
    });

    const filename = deriveFilename(options.filename, deck);
    this.logger.info('Deck rendered', {
      filename,
      slides: bound.length,
      degraded: degradedSlides.length,
      bytes: data.length,
    });

    return {
      data,
      filename,
      slideCount: bound.length,
      structure: deck,
      degradedSlides,
      images: images.map(({ slideIndex, query, source }) => ({ slideIndex, query, source })),
    };
  }
}
