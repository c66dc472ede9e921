import { describe, it, expect, beforeAll } from 'vitest';
import { TemplateCatalog, assignRoles, classifyLayoutName, normalizeLayoutName } from '../../src/core/TemplateCatalog.js';
import { LayoutResolver } from '../../src/core/LayoutResolver.js';
import type { ResolvedPlaceholder } from '../../src/core/PlaceholderResolver.js';
import { TemplateCatalogError } from '../../src/core/errors.js';
import { buildTemplateFixture } from '../../src/testing/index.js';
import { createMemoryLogger } from '../../src/utils/Logger.js';
import type { PlaceholderType, Rect } from '../../src/types/index.js';

const TITLE_REGION: Rect = { x: 609600, y: 274320, width: 10972800, height: 1028700 };
const BODY_REGION: Rect = { x: 609600, y: 1508760, width: 10972800, height: 4800600 };

function placeholder(type: PlaceholderType, bounds: Rect, idx?: number): ResolvedPlaceholder {
  return { ref: { type, ...(idx !== undefined ? { idx } : {}) }, element: 'p:sp', bounds, boundsSource: 'layout' };
}

async function captureCatalogError(build: Promise<TemplateCatalog>): Promise<TemplateCatalogError> {
  try {
    await build;
  } catch (error) {
    if (error instanceof TemplateCatalogError) return error;
    throw error;
  }
  throw new Error('expected a catalog error');
}

describe('layout names', () => {
  it('should normalise separators and case', () => {
    expect(normalizeLayoutName('  Image_Right ')).toBe('image right');
    expect(normalizeLayoutName('Two--Columns')).toBe('two columns');
  });

  it('should recognise engine and stock layout names', () => {
    expect(classifyLayoutName('Content Only')).toBe('ContentOnly');
    expect(classifyLayoutName('Title and Content')).toBe('ContentOnly');
    expect(classifyLayoutName('TWO_CONTENT')).toBe('TwoColumns');
    expect(classifyLayoutName('image-full')).toBe('ImageFull');
    expect(classifyLayoutName('Blank')).toBeUndefined();
  });
});

describe('assignRoles', () => {
  it('should map typed placeholders directly', () => {
    const slots = assignRoles([
      placeholder('pic', { x: 6000, y: 1000, width: 100, height: 100 }, 2),
      placeholder('title', { x: 0, y: 0, width: 100, height: 100 }),
      placeholder('body', { x: 0, y: 1000, width: 100, height: 100 }, 1),
    ]);

    expect(slots.map((slot) => [slot.role, slot.idx])).toEqual([
      ['title', undefined],
      ['body', 1],
      ['picture', 2],
    ]);
  });

  it('should split side-by-side bodies into columns', () => {
    const slots = assignRoles([
      placeholder('title', { x: 0, y: 0, width: 200, height: 50 }),
      placeholder('body', { x: 110, y: 100, width: 90, height: 300 }, 2),
      placeholder('body', { x: 0, y: 120, width: 90, height: 300 }, 1),
    ]);

    expect(slots.map((slot) => [slot.role, slot.idx])).toEqual([
      ['title', undefined],
      ['column-right', 2],
      ['column-left', 1],
    ]);
  });

  it('should promote the topmost body to title when the layout has none', () => {
    const slots = assignRoles([
      placeholder('obj', { x: 0, y: 500, width: 100, height: 100 }, 2),
      placeholder('body', { x: 0, y: 0, width: 100, height: 100 }, 1),
    ]);

    expect(slots.map((slot) => [slot.role, slot.idx])).toEqual([
      ['title', 1],
      ['body', 2],
    ]);
  });

  it('should keep the first placeholder claiming a role', () => {
    const slots = assignRoles([
      placeholder('title', { x: 0, y: 0, width: 100, height: 100 }),
      placeholder('ctrTitle', { x: 0, y: 200, width: 100, height: 100 }),
    ]);

    expect(slots).toHaveLength(1);
    expect(slots[0]?.type).toBe('title');
  });
});

describe('TemplateCatalog', () => {
  let catalog: TemplateCatalog;

  beforeAll(async () => {
    catalog = await TemplateCatalog.build(await buildTemplateFixture({ tableGrid: { rows: 3, columns: 2 } }));
  });

  it('should classify one layout per slide kind', () => {
    expect([...catalog.kinds()].sort()).toEqual(
      ['Chart', 'ContentOnly', 'ImageFull', 'ImageLeft', 'ImageRight', 'Table', 'Title', 'TwoColumns'].sort()
    );
    expect(catalog.slideSize).toEqual({ width: 12192000, height: 6858000 });
    expect(catalog.layoutNames).toHaveLength(8);
  });

  it('should inherit bounds the layout leaves to the master', () => {
    const layout = catalog.resolve('ContentOnly');

    expect(layout?.roles).toEqual(['title', 'body']);
    expect(layout?.slots.title?.bounds).toEqual(TITLE_REGION);
    expect(layout?.slots.body).toMatchObject({ type: 'obj', idx: 1, bounds: BODY_REGION });
  });

  it('should order roles by position', () => {
    expect(catalog.resolve('ImageRight')?.roles).toEqual(['title', 'body', 'picture']);
    expect(catalog.resolve('ImageLeft')?.roles).toEqual(['title', 'picture', 'body']);
    expect(catalog.resolve('TwoColumns')?.roles).toEqual(['title', 'column-left', 'column-right']);
  });

  it('should carry the fixed grid of a table placeholder', () => {
    expect(catalog.resolve('Table')?.slots.table?.fixedGrid).toEqual({ rows: 3, columns: 2 });
  });

  it('should be immutable', () => {
    const slot = catalog.resolve('Chart')?.slots.chart;

    expect(Object.isFrozen(catalog)).toBe(true);
    expect(Object.isFrozen(catalog.resolve('Chart')?.slots)).toBe(true);
    expect(slot && Object.isFrozen(slot.bounds)).toBe(true);
    expect(Object.isFrozen(catalog.resolve('Table')?.slots.table?.fixedGrid)).toBe(true);
  });

  it('should recognise stock layout names', async () => {
    const stock = await TemplateCatalog.build(
      await buildTemplateFixture({
        layouts: [{ name: 'Title and Content', placeholders: [{ type: 'title' }, { idx: 1 }] }],
      })
    );

    expect(stock.kinds()).toEqual(['ContentOnly']);
  });

  it('should reject a template without a content layout', async () => {
    const error = await captureCatalogError(
      buildTemplateFixture({ omitLayouts: ['Content Only'] }).then((bytes) => TemplateCatalog.build(bytes))
    );

    expect(error.message).toBe('Template has no "Content Only" layout');
    expect(error.code).toBe('TEMPLATE_CATALOG');
  });

  it('should reject bytes that are not a package', async () => {
    const error = await captureCatalogError(TemplateCatalog.build(Buffer.from('not a presentation')));

    expect(error.message.startsWith('Failed to read template: ')).toBe(true);
  });
});

describe('LayoutResolver', () => {
  it('should use the layout of the slide kind', async () => {
    const catalog = await TemplateCatalog.build(await buildTemplateFixture());
    const resolver = new LayoutResolver(catalog);

    const resolved = resolver.resolve({ kind: 'Chart', title: 'Sales', chart: { type: 'bar', categories: ['a'], series: [] } }, 0);

    expect(resolved.degraded).toBe(false);
    expect(resolved.layout.name).toBe('Chart');
  });

  it('should degrade to the content layout and warn', async () => {
    const { logger, entries } = createMemoryLogger('warn');
    const catalog = await TemplateCatalog.build(await buildTemplateFixture({ omitLayouts: ['Chart'] }));
    const resolver = new LayoutResolver(catalog, logger);

    const resolved = resolver.resolve({ kind: 'Chart', title: 'Sales', chart: { type: 'bar', categories: ['a'], series: [] } }, 3);

    expect(resolved.degraded).toBe(true);
    expect(resolved.layout.kind).toBe('ContentOnly');
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: 'warn',
      message: 'No layout for slide kind, using ContentOnly',
      data: { slideIndex: 3, requestedKind: 'Chart', layout: 'Content Only' },
    });
  });
});
