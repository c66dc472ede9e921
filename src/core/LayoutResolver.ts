import { TemplateCatalogError } from './errors.js';
import { REQUIRED_KIND } from './TemplateCatalog.js';
import type { LayoutCatalog, ResolvedLayout, SlideSpec } from '../types/index.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Picks the template layout for each slide, falling back to the ContentOnly
 * layout when the template has none for the slide's kind.
 */
export class LayoutResolver {
  private readonly logger: ILogger;

  constructor(
    private readonly catalog: LayoutCatalog,
    logger?: ILogger
  ) {
    this.logger = logger ?? createLogger('warn', 'LayoutResolver');
  }

  /**
   * Resolves a slide's layout.
   *
   * @throws TemplateCatalogError if the ContentOnly layout is unavailable
   */
  resolve(slide: SlideSpec, slideIndex: number): ResolvedLayout {
    const layout = this.catalog.resolve(slide.kind);
    if (layout) {
      return { layout, degraded: false };
    }

    const fallback = this.catalog.resolve(REQUIRED_KIND);
    if (!fallback) {
      throw new TemplateCatalogError('Template has no "Content Only" layout to fall back to', {
        slideIndex,
        requestedKind: slide.kind,
      });
    }

    this.logger.warn('No layout for slide kind, using ContentOnly', {
      slideIndex,
      requestedKind: slide.kind,
      layout: fallback.name,
    });
    return { layout: fallback, degraded: true };
  }
}
