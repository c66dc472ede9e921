import { z } from 'zod';
import type {
  ChartContent,
  ChartType,
  DeckMetadata,
  ImageDescriptor,
  SlideKind,
  SlideSpec,
  TableContent,
  TextFormatting,
} from '../types/index.js';

/**
 * Settings the schema needs to fill in omitted values.
 */
export interface DeckSchemaOptions {
  /** Fallback image for descriptors that name none */
  fallbackImagePath: string;
  /** Chart type for charts that declare none */
  defaultChartType: ChartType;
}

/**
 * Kind tags keyed by their letters only, lower-cased: `ContentOnly`,
 * `content_only` and `Content Only` all read `contentonly`.
 */
const KIND_TAGS: ReadonlyMap<string, SlideKind> = new Map([
  ['title', 'Title'],
  ['titleslide', 'Title'],
  ['contentonly', 'ContentOnly'],
  ['imageright', 'ImageRight'],
  ['imageleft', 'ImageLeft'],
  ['imagefull', 'ImageFull'],
  ['table', 'Table'],
  ['chart', 'Chart'],
  ['twocolumns', 'TwoColumns'],
]);

/**
 * Maps a kind tag or layout key to a slide kind.
 */
export function parseSlideKind(tag: string): SlideKind | undefined {
  return KIND_TAGS.get(tag.toLowerCase().replace(/[^a-z]/g, ''));
}

const colorSchema = z
  .string()
  .regex(/^#?[0-9a-fA-F]{6}$/, 'expected a hex color #RRGGBB')
  .transform((color) => `#${color.replace('#', '').toUpperCase()}`);

const formattingSchema = z.object({
  bold: z.boolean().optional(),
  italic: z.boolean().optional(),
  color: colorSchema.optional(),
  size: z.number().positive().max(400).optional(),
});

const runSchema = formattingSchema
  .extend({
    text: z.string(),
    formatting: formattingSchema.optional(),
    hyperlink: z.string().url().optional(),
  })
  .transform(({ text, formatting, hyperlink, bold, italic, color, size }) => {
    const merged: TextFormatting = {
      ...formatting,
      ...(bold !== undefined ? { bold } : {}),
      ...(italic !== undefined ? { italic } : {}),
      ...(color !== undefined ? { color } : {}),
      ...(size !== undefined ? { size } : {}),
    };
    return {
      text,
      ...(Object.keys(merged).length > 0 ? { formatting: merged } : {}),
      ...(hyperlink ? { hyperlink } : {}),
    };
  });

/** Body text: a string, a list of runs, or `{ runs }` */
const richTextSchema = z.union([
  z.string().transform((text) => [{ text }]),
  z.array(runSchema),
  z.object({ runs: z.array(runSchema) }).transform(({ runs }) => runs),
]);

const bulletSchema = z.union([
  z.string().transform((text) => ({ text, level: 0 })),
  z.object({
    text: z.string(),
    level: z.number().int().min(0).max(5).default(0),
    formatting: formattingSchema.optional(),
  }),
]);

/** A list of bullets, or `{ items, numbered }` */
const bulletListSchema = z.union([
  z.array(bulletSchema).transform((items) => ({ items, numbered: false })),
  z.object({
    items: z.array(bulletSchema),
    numbered: z.boolean().default(false),
  }),
]);

const cellSchema = z.union([z.string(), z.number().finite().transform(String)]);

/** A table: `{ header | headers, rows, style }` or rows whose first row is the header */
const tableSchema = z
  .union([
    z.array(z.array(cellSchema)).min(1).transform((rows) => ({ header: rows[0], rows: rows.slice(1), style: undefined })),
    z.object({
      header: z.array(cellSchema).optional(),
      headers: z.array(cellSchema).optional(),
      rows: z.array(z.array(cellSchema)).default([]),
      style: z.string().optional(),
    }).transform(({ header, headers, rows, style }) => ({ header: header ?? headers, rows, style })),
  ])
  .superRefine((table, ctx) => {
    if (!table.header || table.header.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'table has no header row', path: ['header'] });
      return;
    }
    const columns = table.header.length;
    table.rows.forEach((row, index) => {
      if (row.length !== columns) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `row has ${row.length} cells, header has ${columns}`,
          path: ['rows', index],
        });
      }
    });
  })
  .transform(
    (table): TableContent => ({
      header: table.header ?? [],
      rows: table.rows,
      style: table.style === 'header_colored' ? 'header_colored' : 'plain',
    })
  );

const seriesSchema = z
  .object({
    name: z.string(),
    values: z.array(z.number().finite()).optional(),
    data: z.array(z.number().finite()).optional(),
  })
  .transform(({ name, values, data }) => ({ name, values: values ?? data ?? [] }));

function chartSchema(defaultType: ChartType) {
  return z
    .object({
      type: z.enum(['bar', 'column', 'line', 'pie']).optional(),
      categories: z.array(cellSchema).min(1),
      series: z.array(seriesSchema).min(1),
    })
    .superRefine((chart, ctx) => {
      const expected = chart.categories.length;
      chart.series.forEach((series, index) => {
        if (series.values.length !== expected) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `series "${series.name}" has ${series.values.length} values for ${expected} categories`,
            path: ['series', index, 'values'],
          });
        }
      });
    })
    .transform(({ type, categories, series }): ChartContent => ({
      type: type === undefined ? defaultType : type === 'column' ? 'bar' : type,
      categories,
      series,
    }));
}

const imageInputSchema = z.union([
  z.string().transform((query) => ({ query, position: undefined })),
  z.object({
    query: z.string().optional(),
    path: z.string().optional(),
    position: z.enum(['left', 'right', 'full']).optional(),
  }).transform(({ query, path, position }) => ({ query: query ?? path, position })),
]);

const textSchema = z.union([z.string(), z.number().finite().transform(String)]);

/**
 * Loose slide shape accepted from upstream generators. Field aliases:
 * `content` for `body`, `bullet_points` for `bullets`, `layout` as a kind hint.
 */
const rawSlideSchema = (options: DeckSchemaOptions) =>
  z.object({
    kind: z.string().optional(),
    layout: z.string().optional(),
    title: textSchema.optional(),
    headline: textSchema.optional(),
    subtitle: textSchema.optional(),
    body: richTextSchema.optional(),
    content: richTextSchema.optional(),
    bullets: bulletListSchema.optional(),
    bullet_points: bulletListSchema.optional(),
    table: tableSchema.optional(),
    chart: chartSchema(options.defaultChartType).optional(),
    image: imageInputSchema.optional(),
    left: bulletListSchema.optional(),
    right: bulletListSchema.optional(),
  });

type RawSlide = z.output<ReturnType<typeof rawSlideSchema>>;

/**
 * Picks a kind for a slide without an explicit one, by content:
 * chart, table, image (by position), two columns, layout hint, then ContentOnly.
 */
export function detectSlideKind(slide: {
  chart?: unknown;
  table?: unknown;
  image?: { position?: 'left' | 'right' | 'full' };
  left?: unknown;
  right?: unknown;
  headline?: unknown;
  layout?: string;
}): SlideKind {
  if (slide.chart) return 'Chart';
  if (slide.table) return 'Table';
  if (slide.image) {
    switch (slide.image.position) {
      case 'left':
        return 'ImageLeft';
      case 'full':
        return 'ImageFull';
      default:
        return 'ImageRight';
    }
  }
  if (slide.left && slide.right) return 'TwoColumns';
  if (slide.headline !== undefined) return 'Title';
  const hinted = slide.layout ? parseSlideKind(slide.layout) : undefined;
  return hinted ?? 'ContentOnly';
}

function toSlideSpec(raw: RawSlide, options: DeckSchemaOptions, ctx: z.RefinementCtx): SlideSpec {
  const fail = (message: string, path: (string | number)[] = []): SlideSpec => {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message, path });
    return z.NEVER;
  };

  let kind: SlideKind;
  if (raw.kind !== undefined) {
    const parsed = parseSlideKind(raw.kind);
    if (!parsed) return fail(`unknown slide kind "${raw.kind}"`, ['kind']);
    kind = parsed;
  } else {
    kind = detectSlideKind(raw);
  }

  const title = raw.title?.trim() ?? '';
  const body = raw.body ?? raw.content;
  const bullets = raw.bullets ?? raw.bullet_points;
  const image = (): ImageDescriptor | undefined => {
    const query = raw.image?.query?.trim();
    if (!query) return undefined;
    return { query, fallbackPath: options.fallbackImagePath };
  };
  const requireTitle = (): boolean => {
    if (title !== '') return true;
    fail(`${kind} slide needs a title`, ['title']);
    return false;
  };

  switch (kind) {
    case 'Title': {
      const headline = (raw.headline ?? raw.title)?.trim();
      if (!headline) return fail('Title slide needs a headline', ['headline']);
      return raw.subtitle !== undefined ? { kind, headline, subtitle: raw.subtitle } : { kind, headline };
    }
    case 'ContentOnly': {
      if (!requireTitle()) return z.NEVER;
      if (!body && !bullets) return fail('ContentOnly slide needs a body or bullets', ['body']);
      return { kind, title, ...(body ? { body } : {}), ...(bullets ? { bullets } : {}) };
    }
    case 'ImageRight':
    case 'ImageLeft': {
      if (!requireTitle()) return z.NEVER;
      const descriptor = image();
      if (!descriptor) return fail(`${kind} slide needs an image query`, ['image']);
      return { kind, title, image: descriptor, ...(body ? { body } : {}), ...(bullets ? { bullets } : {}) };
    }
    case 'ImageFull': {
      const descriptor = image();
      if (!descriptor) return fail('ImageFull slide needs an image query', ['image']);
      return title !== '' ? { kind, title, image: descriptor } : { kind, image: descriptor };
    }
    case 'Table': {
      if (!requireTitle()) return z.NEVER;
      if (!raw.table) return fail('Table slide needs a table', ['table']);
      return { kind, title, table: raw.table };
    }
    case 'Chart': {
      if (!requireTitle()) return z.NEVER;
      if (!raw.chart) return fail('Chart slide needs a chart', ['chart']);
      return { kind, title, chart: raw.chart };
    }
    case 'TwoColumns': {
      if (!requireTitle()) return z.NEVER;
      if (!raw.left || !raw.right) return fail('TwoColumns slide needs left and right lists', [raw.left ? 'right' : 'left']);
      return { kind, title, left: raw.left, right: raw.right };
    }
  }
}

/**
 * Builds the deck schema. Output values are complete `SlideDeckSpec`s
 * apart from freezing.
 */
export function createDeckSchema(options: DeckSchemaOptions) {
  const slideSchema = rawSlideSchema(options).transform((raw, ctx) => toSlideSpec(raw, options, ctx));
  const metadataSchema = z.object({
    title: z.string().optional(),
    subtitle: z.string().optional(),
    author: z.string().optional(),
    subject: z.string().optional(),
  });

  return metadataSchema
    .extend({
      language: z
        .string()
        .regex(/^[A-Za-z]{2,3}(-[A-Za-z0-9]{2,8})*$/, 'expected a language tag such as "en" or "fr-CA"')
        .default('en'),
      slideCount: z.number().int().nonnegative().optional(),
      slides: z.array(slideSchema).min(1, 'deck has no slides'),
      metadata: metadataSchema.optional(),
    })
    .superRefine((deck, ctx) => {
      if (deck.slideCount !== undefined && deck.slideCount !== deck.slides.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `slideCount is ${deck.slideCount} but the deck has ${deck.slides.length} slides`,
        });
      }
    })
    .transform(({ language, slides, metadata, title, subtitle, author, subject }) => ({
      language,
      slideCount: slides.length,
      slides,
      metadata: mergeMetadata({ title, subtitle, author, subject }, metadata),
    }));
}

/**
 * Merges top-level metadata fields with a nested `metadata` object, which wins.
 */
function mergeMetadata(topLevel: DeckMetadata, nested: DeckMetadata | undefined): DeckMetadata {
  const merged: { -readonly [K in keyof DeckMetadata]: DeckMetadata[K] } = {};
  for (const key of ['title', 'subtitle', 'author', 'subject'] as const) {
    const value = nested?.[key] ?? topLevel[key];
    if (value !== undefined) merged[key] = value;
  }
  return merged;
}
