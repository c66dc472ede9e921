import { PptxParser } from './PptxParser.js';
import { PlaceholderResolver, type ResolvedPlaceholder } from './PlaceholderResolver.js';
import { TemplateCatalogError, errorMessage } from './errors.js';
import type {
  LayoutCatalog,
  LayoutHandle,
  PlaceholderRole,
  PlaceholderSlot,
  PlaceholderType,
  Rect,
  Size,
  SlideKind,
} from '../types/index.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import { deepFreeze } from '../utils/deepFreeze.js';

/**
 * Normalised layout names and the slide kind each one serves.
 * Besides the engine's own names, the stock names of the default Office
 * layouts with the same structure are recognised.
 */
const LAYOUT_NAME_KINDS: ReadonlyMap<string, SlideKind> = new Map([
  ['title slide', 'Title'],
  ['title', 'Title'],
  ['content only', 'ContentOnly'],
  ['title and content', 'ContentOnly'],
  ['image right', 'ImageRight'],
  ['image left', 'ImageLeft'],
  ['image full', 'ImageFull'],
  ['table', 'Table'],
  ['chart', 'Chart'],
  ['two columns', 'TwoColumns'],
  ['two content', 'TwoColumns'],
]);

/**
 * Layout kind every template must provide.
 */
export const REQUIRED_KIND: SlideKind = 'ContentOnly';

const TITLE_TYPES: ReadonlySet<PlaceholderType> = new Set(['title', 'ctrTitle']);
const BODY_TYPES: ReadonlySet<PlaceholderType> = new Set(['body', 'subTitle', 'obj']);
const PICTURE_TYPES: ReadonlySet<PlaceholderType> = new Set(['pic', 'clipArt']);

/**
 * Lower-cases a layout name, treats `_` and `-` as spaces and collapses whitespace.
 */
export function normalizeLayoutName(name: string): string {
  return name.toLowerCase().replace(/[_-]+/g, ' ').replace(/\s+/g, ' ').trim();
}

/**
 * Maps a layout name to the slide kind it serves, if any.
 */
export function classifyLayoutName(name: string): SlideKind | undefined {
  return LAYOUT_NAME_KINDS.get(normalizeLayoutName(name));
}

function byPosition(a: { bounds: Rect }, b: { bounds: Rect }): number {
  return a.bounds.y - b.bounds.y || a.bounds.x - b.bounds.x;
}

function overlapsVertically(a: Rect, b: Rect): boolean {
  return a.y < b.y + b.height && b.y < a.y + a.height;
}

/**
 * Assigns semantic roles to a layout's placeholders.
 *
 * Typed placeholders map directly (title, picture, table, chart). Body-like
 * placeholders are split by position: without a title placeholder the
 * topmost becomes the title; candidates side by side with the topmost one
 * become the left and right columns; otherwise the topmost is the body.
 * The first placeholder claiming a role keeps it.
 */
export function assignRoles(placeholders: readonly ResolvedPlaceholder[]): PlaceholderSlot[] {
  const slots = new Map<PlaceholderRole, PlaceholderSlot>();
  const claim = (role: PlaceholderRole, placeholder: ResolvedPlaceholder): void => {
    if (slots.has(role)) return;
    slots.set(role, {
      role,
      type: placeholder.ref.type,
      idx: placeholder.ref.idx,
      bounds: placeholder.bounds,
      fixedGrid: placeholder.fixedGrid,
    });
  };

  const sorted = [...placeholders].sort(byPosition);
  const bodyCandidates: ResolvedPlaceholder[] = [];

  for (const placeholder of sorted) {
    const { type } = placeholder.ref;
    if (TITLE_TYPES.has(type)) {
      claim('title', placeholder);
    } else if (PICTURE_TYPES.has(type)) {
      claim('picture', placeholder);
    } else if (type === 'tbl') {
      claim('table', placeholder);
    } else if (type === 'chart') {
      claim('chart', placeholder);
    } else if (BODY_TYPES.has(type)) {
      bodyCandidates.push(placeholder);
    }
  }

  if (!slots.has('title')) {
    const promoted = bodyCandidates.shift();
    if (promoted) claim('title', promoted);
  }

  const [first] = bodyCandidates;
  if (first) {
    const sideBySide = bodyCandidates.filter(
      (candidate) => overlapsVertically(candidate.bounds, first.bounds)
    );
    const xs = new Set(sideBySide.map((candidate) => candidate.bounds.x));

    if (sideBySide.length >= 2 && xs.size >= 2) {
      const byX = [...sideBySide].sort((a, b) => a.bounds.x - b.bounds.x);
      const left = byX[0];
      const right = byX[byX.length - 1];
      if (left && right) {
        claim('column-left', left);
        claim('column-right', right);
      }
      const rest = bodyCandidates.find((candidate) => candidate !== left && candidate !== right);
      if (rest) claim('body', rest);
    } else {
      claim('body', first);
    }
  }

  return [...slots.values()].sort(byPosition);
}

/**
 * Read-only index of a template's layouts by slide kind, built once per
 * template and shared by all renders.
 */
export class TemplateCatalog implements LayoutCatalog {
  private constructor(
    readonly slideSize: Size,
    private readonly layouts: ReadonlyMap<SlideKind, LayoutHandle>,
    /** Names of all layouts in the template, classified or not */
    readonly layoutNames: readonly string[]
  ) {
    Object.freeze(this);
  }

  /**
   * Scans the template's layouts once and classifies them.
   *
   * @throws TemplateCatalogError if the template cannot be read, has no
   * layouts, or lacks the ContentOnly layout
   */
  static async build(template: Buffer, logger?: ILogger): Promise<TemplateCatalog> {
    const log = logger ?? createLogger('warn', 'TemplateCatalog');
    const parser = new PptxParser(log.child('Parser'));
    const resolver = new PlaceholderResolver(log.child('Placeholders'));

    try {
      await parser.open(template);
      const presentation = await parser.getPresentation();
      const slideSize: Size = Object.freeze({ width: presentation.slideWidth, height: presentation.slideHeight });
      const layouts = await parser.getSlideLayouts();

      if (layouts.length === 0) {
        throw new TemplateCatalogError('Template contains no slide layouts');
      }

      const masterPlaceholders = new Map<string, ReturnType<PlaceholderResolver['collectPlaceholders']>>();
      const handles = new Map<SlideKind, LayoutHandle>();
      const layoutNames: string[] = [];

      for (const layout of layouts) {
        const name = layout.name ?? '';
        layoutNames.push(name);

        const kind = classifyLayoutName(name);
        if (!kind) {
          log.debug('Layout not classified', { name, path: layout.path });
          continue;
        }
        if (handles.has(kind)) {
          log.debug('Duplicate layout for kind ignored', { kind, name, path: layout.path });
          continue;
        }

        let fromMaster = masterPlaceholders.get(layout.master.path);
        if (!fromMaster) {
          fromMaster = resolver.collectPlaceholders(layout.master.content);
          masterPlaceholders.set(layout.master.path, fromMaster);
        }

        const resolved = resolver
          .collectPlaceholders(layout.content)
          .map((placeholder) => resolver.resolvePlaceholder(placeholder, fromMaster, slideSize));
        const slots = assignRoles(resolved);

        handles.set(
          kind,
          deepFreeze<LayoutHandle>({
            kind,
            layoutId: layout.path,
            name,
            roles: slots.map((slot) => slot.role),
            slots: Object.fromEntries(slots.map((slot) => [slot.role, slot])),
          })
        );
        log.debug('Layout classified', { kind, name, roles: slots.map((slot) => slot.role) });
      }

      if (!handles.has(REQUIRED_KIND)) {
        throw new TemplateCatalogError('Template has no "Content Only" layout', { layouts: layoutNames });
      }

      log.info('Template catalog built', {
        layouts: layoutNames.length,
        kinds: [...handles.keys()],
      });

      return new TemplateCatalog(slideSize, handles, Object.freeze(layoutNames));
    } catch (error) {
      if (error instanceof TemplateCatalogError) {
        throw error;
      }
      throw new TemplateCatalogError(`Failed to read template: ${errorMessage(error)}`, {}, { cause: error });
    } finally {
      parser.close();
    }
  }

  /**
   * Looks up the layout for a slide kind.
   */
  resolve(kind: SlideKind): LayoutHandle | undefined {
    return this.layouts.get(kind);
  }

  /**
   * Kinds the template provides a layout for.
   */
  kinds(): readonly SlideKind[] {
    return [...this.layouts.keys()];
  }
}
