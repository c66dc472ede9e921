/**
 * Structured slide-deck model.
 *
 * Values of these types are produced by `createSlideDeck`, which validates
 * the loose upstream JSON and deep-freezes the result. Nothing downstream
 * re-checks row or series lengths.
 */

/**
 * Slide kinds, one per template layout the engine knows how to fill.
 */
export const SLIDE_KINDS = [
  'Title',
  'ContentOnly',
  'ImageRight',
  'ImageLeft',
  'ImageFull',
  'Table',
  'Chart',
  'TwoColumns',
] as const;

export type SlideKind = (typeof SLIDE_KINDS)[number];

/**
 * Chart types the chart binder can emit.
 */
export type ChartType = 'bar' | 'line' | 'pie';

/**
 * Character-level formatting for a run of text.
 */
export interface TextFormatting {
  readonly bold?: boolean;
  readonly italic?: boolean;
  /** Hex color `#RRGGBB` */
  readonly color?: string;
  /** Font size in points */
  readonly size?: number;
}

/**
 * A run of text with optional formatting and hyperlink.
 */
export interface TextRun {
  readonly text: string;
  readonly formatting?: TextFormatting;
  readonly hyperlink?: string;
}

/**
 * Rich text: an ordered list of runs forming one paragraph.
 */
export type RichText = readonly TextRun[];

/**
 * A single bullet point.
 */
export interface BulletPoint {
  readonly text: string;
  /** Indentation level 0-5 */
  readonly level: number;
  readonly formatting?: TextFormatting;
}

/**
 * An ordered bullet list.
 */
export interface BulletList {
  readonly items: readonly BulletPoint[];
  /** Auto-number the items (`1.`, `2.`, ...) instead of bullet glyphs */
  readonly numbered: boolean;
}

/**
 * Image request attached to an image-bearing slide.
 * The fallback path is always set, so a render can always end with bytes.
 */
export interface ImageDescriptor {
  /** Topic hint sent to the image provider */
  readonly query: string;
  /** Local image used when the provider yields nothing usable */
  readonly fallbackPath: string;
}

/**
 * Table style variants.
 */
export type TableStyle = 'plain' | 'header_colored';

/**
 * Table payload: header plus body rows, all the same width.
 */
export interface TableContent {
  readonly header: readonly string[];
  readonly rows: readonly (readonly string[])[];
  readonly style: TableStyle;
}

/**
 * One named chart series; `values.length` equals the category count.
 */
export interface ChartSeriesSpec {
  readonly name: string;
  readonly values: readonly number[];
}

/**
 * Chart payload.
 */
export interface ChartContent {
  readonly type: ChartType;
  readonly categories: readonly string[];
  readonly series: readonly ChartSeriesSpec[];
}

export interface TitleSlideSpec {
  readonly kind: 'Title';
  readonly headline: string;
  readonly subtitle?: string;
}

export interface ContentOnlySlideSpec {
  readonly kind: 'ContentOnly';
  readonly title: string;
  readonly body?: RichText;
  readonly bullets?: BulletList;
}

export interface ImageSideSlideSpec {
  readonly kind: 'ImageRight' | 'ImageLeft';
  readonly title: string;
  readonly body?: RichText;
  readonly bullets?: BulletList;
  readonly image: ImageDescriptor;
}

export interface ImageFullSlideSpec {
  readonly kind: 'ImageFull';
  readonly title?: string;
  readonly image: ImageDescriptor;
}

export interface TableSlideSpec {
  readonly kind: 'Table';
  readonly title: string;
  readonly table: TableContent;
}

export interface ChartSlideSpec {
  readonly kind: 'Chart';
  readonly title: string;
  readonly chart: ChartContent;
}

export interface TwoColumnsSlideSpec {
  readonly kind: 'TwoColumns';
  readonly title: string;
  readonly left: BulletList;
  readonly right: BulletList;
}

/**
 * Tagged variant over all slide kinds.
 */
export type SlideSpec =
  | TitleSlideSpec
  | ContentOnlySlideSpec
  | ImageSideSlideSpec
  | ImageFullSlideSpec
  | TableSlideSpec
  | ChartSlideSpec
  | TwoColumnsSlideSpec;

/**
 * Slides that carry an image descriptor.
 */
export type ImageSlideSpec = ImageSideSlideSpec | ImageFullSlideSpec;

/**
 * Presentation metadata written to the package's core properties.
 */
export interface DeckMetadata {
  readonly title?: string;
  readonly subtitle?: string;
  readonly author?: string;
  readonly subject?: string;
}

/**
 * A validated, immutable slide deck.
 */
export interface SlideDeckSpec {
  /** Content language tag, e.g. `en` or `fr` */
  readonly language: string;
  /** Always equal to `slides.length` */
  readonly slideCount: number;
  readonly slides: readonly SlideSpec[];
  readonly metadata: DeckMetadata;
}

/**
 * Narrows a slide to the image-bearing variants.
 */
export function isImageSlide(slide: SlideSpec): slide is ImageSlideSpec {
  return slide.kind === 'ImageRight' || slide.kind === 'ImageLeft' || slide.kind === 'ImageFull';
}
