import { buildOrderedXml, XML_DECLARATION, type OrderedXmlNode } from '../core/PackageXml.js';
import { defaultPlaceholderBounds } from '../core/PlaceholderResolver.js';
import type {
  BulletList,
  LayoutHandle,
  PlaceholderRole,
  PlaceholderSlot,
  Rect,
  ResolvedLayout,
  RichText,
  Size,
  SlideSpec,
} from '../types/index.js';
import { splitHorizontally, unionRects } from '../types/index.js';
import type { AutoFitPolicy } from '../text/AutoFitPolicy.js';
import { bulletParagraphs, plainParagraphs, richTextParagraphs, type TextParagraph } from '../text/TextModel.js';
import type { DecodedImage } from '../utils/ImageDecoder.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import type { BindContext } from './BindContext.js';
import { ChartBinder } from './ChartBinder.js';
import { ImageBinder } from './ImageBinder.js';
import { buildSlideElement, placeholderTarget, type ShapeTarget } from './ShapeXml.js';
import { SlidePartContext, type SlideAttachment } from './SlideParts.js';
import { TableBinder } from './TableBinder.js';
import { TextBinder } from './TextBinder.js';

/** Gap between the halves of a split region (0.25 inch) */
const REGION_GAP_EMU = 228600;

/**
 * A slide's content bound to its layout, ready for assembly.
 */
export interface BoundSlide {
  slideIndex: number;
  layout: LayoutHandle;
  /** Serialized slide part */
  xml: string;
  /** Relationship targets besides the layout (rId1) */
  attachments: SlideAttachment[];
}

/**
 * Input for binding one slide.
 */
export interface SlideBindingInput {
  slide: SlideSpec;
  slideIndex: number;
  resolved: ResolvedLayout;
  language: string;
  /** Resolved image bytes for image slides */
  image?: DecodedImage;
}

/**
 * Fills a layout's placeholders with one slide's content.
 *
 * Content goes into the placeholder of its role. When the layout has no
 * placeholder for a visual (picture, table, chart), the visual is placed as
 * a free shape in the layout's body region, sharing it half and half with
 * any accompanying text.
 */
export class SlideBinder {
  private readonly logger: ILogger;
  private readonly textBinder: TextBinder;
  private readonly tableBinder: TableBinder;
  private readonly chartBinder: ChartBinder;
  private readonly imageBinder: ImageBinder;

  constructor(
    autoFit: AutoFitPolicy,
    private readonly slideSize: Size,
    logger?: ILogger
  ) {
    this.logger = logger ?? createLogger('warn', 'SlideBinder');
    this.textBinder = new TextBinder(autoFit, this.logger.child('Text'));
    this.tableBinder = new TableBinder(this.logger.child('Table'));
    this.chartBinder = new ChartBinder(this.logger.child('Chart'));
    this.imageBinder = new ImageBinder(this.logger.child('Image'));
  }

  /**
   * Binds one slide.
   *
   * @throws TableGridMismatchError or ChartDataMismatchError from the binders
   */
  bind(input: SlideBindingInput): BoundSlide {
    const { slide, slideIndex, resolved, language } = input;
    const layout = resolved.layout;
    const context: BindContext = { slideIndex, language, parts: new SlidePartContext() };
    const shapes: OrderedXmlNode[] = [];

    const slot = (role: PlaceholderRole): PlaceholderSlot | undefined => layout.slots[role];
    const addTitle = (text: string | undefined): void => {
      if (text === undefined) return;
      const titleSlot = slot('title');
      const target = titleSlot
        ? placeholderTarget(titleSlot)
        : { bounds: defaultPlaceholderBounds('title', this.slideSize) };
      shapes.push(this.textBinder.bind(target, plainParagraphs(text), 'title', context));
    };

    switch (slide.kind) {
      case 'Title': {
        addTitle(slide.headline);
        if (slide.subtitle !== undefined) {
          shapes.push(this.textBinder.bind(this.textTarget(layout), plainParagraphs(slide.subtitle), 'body', context));
        }
        break;
      }
      case 'ContentOnly': {
        addTitle(slide.title);
        shapes.push(
          this.textBinder.bind(this.textTarget(layout), bodyParagraphs(slide.body, slide.bullets), 'body', context)
        );
        break;
      }
      case 'ImageRight':
      case 'ImageLeft': {
        addTitle(slide.title);
        const text = bodyParagraphs(slide.body, slide.bullets);
        const [imageTarget, textTarget] = this.planVisual(
          layout,
          'picture',
          text.length > 0,
          slide.kind === 'ImageLeft' ? 'left' : 'right'
        );
        if (input.image) {
          shapes.push(this.imageBinder.bind(imageTarget, input.image, context));
        } else {
          this.logger.warn('Image slide bound without image bytes', { slideIndex });
        }
        if (textTarget) {
          shapes.push(this.textBinder.bind(textTarget, text, 'body', context));
        }
        break;
      }
      case 'ImageFull': {
        addTitle(slide.title);
        const [imageTarget] = this.planVisual(layout, 'picture', false, 'right');
        if (input.image) {
          shapes.push(this.imageBinder.bind(imageTarget, input.image, context));
        } else {
          this.logger.warn('Image slide bound without image bytes', { slideIndex });
        }
        break;
      }
      case 'Table': {
        addTitle(slide.title);
        const [tableTarget] = this.planVisual(layout, 'table', false, 'right');
        shapes.push(this.tableBinder.bind(tableTarget, slide.table, context));
        break;
      }
      case 'Chart': {
        addTitle(slide.title);
        const [chartTarget] = this.planVisual(layout, 'chart', false, 'right');
        shapes.push(this.chartBinder.bind(chartTarget, slide.chart, context));
        break;
      }
      case 'TwoColumns': {
        addTitle(slide.title);
        const [leftTarget, rightTarget] = this.planColumns(layout);
        shapes.push(this.textBinder.bind(leftTarget, bulletParagraphs(slide.left), 'column', context));
        shapes.push(this.textBinder.bind(rightTarget, bulletParagraphs(slide.right), 'column', context));
        break;
      }
    }

    const xml = XML_DECLARATION + buildOrderedXml([buildSlideElement(shapes)]);
    this.logger.debug('Slide bound', {
      slideIndex,
      kind: slide.kind,
      layout: layout.name,
      degraded: resolved.degraded,
      shapes: shapes.length,
      attachments: context.parts.attachments.length,
    });

    return { slideIndex, layout, xml, attachments: context.parts.attachments };
  }

  /**
   * Region for free content: the body placeholder, else the columns, else
   * any visual placeholder, else the default body area.
   */
  private bodyRegion(layout: LayoutHandle): Rect {
    const bounds = (roles: PlaceholderRole[]): Rect[] =>
      roles.flatMap((role) => {
        const found = layout.slots[role];
        return found ? [found.bounds] : [];
      });

    return (
      layout.slots.body?.bounds ??
      unionRects(bounds(['column-left', 'column-right'])) ??
      unionRects(bounds(['picture', 'table', 'chart'])) ??
      defaultPlaceholderBounds('body', this.slideSize)
    );
  }

  private textTarget(layout: LayoutHandle): ShapeTarget {
    const body = layout.slots.body;
    return body ? placeholderTarget(body) : { bounds: this.bodyRegion(layout) };
  }

  /**
   * Plans a visual and its optional text. With a placeholder for the visual,
   * text goes to the body placeholder. Without one, the visual takes the body
   * region, or its declared half when text shares the region.
   */
  private planVisual(
    layout: LayoutHandle,
    role: 'picture' | 'table' | 'chart',
    withText: boolean,
    side: 'left' | 'right'
  ): [ShapeTarget, ShapeTarget | undefined] {
    const visualSlot = layout.slots[role];
    if (visualSlot) {
      return [placeholderTarget(visualSlot), withText ? this.textTarget(layout) : undefined];
    }

    const region = this.bodyRegion(layout);
    if (!withText) {
      return [{ bounds: region }, undefined];
    }

    const [left, right] = splitHorizontally(region, REGION_GAP_EMU);
    const visualBounds = side === 'left' ? left : right;
    const textBounds = side === 'left' ? right : left;
    const body = layout.slots.body;
    const textTarget: ShapeTarget = body ? { slot: body, bounds: textBounds, overrideBounds: true } : { bounds: textBounds };
    return [{ bounds: visualBounds }, textTarget];
  }

  /**
   * Column placeholders when the layout has both, else the two halves of
   * the body region.
   */
  private planColumns(layout: LayoutHandle): [ShapeTarget, ShapeTarget] {
    const left = layout.slots['column-left'];
    const right = layout.slots['column-right'];
    if (left && right) {
      return [placeholderTarget(left), placeholderTarget(right)];
    }

    const [leftBounds, rightBounds] = splitHorizontally(this.bodyRegion(layout), REGION_GAP_EMU);
    return [{ bounds: leftBounds }, { bounds: rightBounds }];
  }
}

/**
 * Body text followed by bullets, as the body placeholder shows them.
 */
function bodyParagraphs(body: RichText | undefined, bullets: BulletList | undefined): TextParagraph[] {
  return [...(body ? richTextParagraphs(body) : []), ...(bullets ? bulletParagraphs(bullets) : [])];
}
