import { ChartReader, type ChartData } from '../parsers/ChartReader.js';
import type { CropRect } from '../types/index.js';
import { ImageDecoder } from '../utils/ImageDecoder.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import {
  PptxParser,
  getXmlAttr,
  getXmlChild,
  getXmlChildren,
  getXmlText,
  resolvePartPath,
  type PptxXmlNode,
} from './PptxParser.js';
import { RELATIONSHIP_TYPES } from './constants.js';
import { percentageToDecimal } from './UnitConverter.js';

/**
 * A text shape as written on a slide.
 */
export interface TextShapeSummary {
  name: string;
  /** Placeholder type; absent for free text boxes */
  placeholder?: string;
  /** Paragraph texts joined with newlines */
  text: string;
  /** Font scale from `a:normAutofit`, 1 when absent */
  fontScale: number;
}

/**
 * A table as a grid of cell texts, header row first.
 */
export interface TableSummary {
  rows: number;
  columns: number;
  cells: string[][];
}

/**
 * An embedded picture.
 */
export interface ImageSummary {
  path: string;
  contentType: string;
  byteSize: number;
  crop: CropRect;
}

/**
 * One slide of a package.
 */
export interface SlideSummary {
  index: number;
  path: string;
  layoutName?: string;
  texts: TextShapeSummary[];
  tables: TableSummary[];
  charts: ChartData[];
  images: ImageSummary[];
}

/**
 * Structural summary of a presentation package.
 */
export interface PackageSummary {
  slideCount: number;
  slideSize: { width: number; height: number };
  properties: {
    title?: string;
    creator?: string;
    subject?: string;
    language?: string;
  };
  slides: SlideSummary[];
}

/**
 * Reads presentation packages back into summaries.
 */
export class DeckInspector {
  private readonly logger: ILogger;
  private readonly chartReader: ChartReader;
  private readonly decoder = new ImageDecoder();

  constructor(logger?: ILogger) {
    this.logger = logger ?? createLogger('warn', 'DeckInspector');
    this.chartReader = new ChartReader(this.logger.child('Charts'));
  }

  async inspect(bytes: Buffer): Promise<PackageSummary> {
    const parser = new PptxParser(this.logger.child('Parser'));
    await parser.open(bytes);
    try {
      const presentation = await parser.getPresentation();
      const slides: SlideSummary[] = [];
      for (let index = 0; index < presentation.slideCount; index++) {
        slides.push(await this.inspectSlide(parser, index));
      }
      return {
        slideCount: presentation.slideCount,
        slideSize: { width: presentation.slideWidth, height: presentation.slideHeight },
        properties: await this.readProperties(parser),
        slides,
      };
    } finally {
      parser.close();
    }
  }

  private async readProperties(parser: PptxParser): Promise<PackageSummary['properties']> {
    const rel = (await parser.getRelationships('_rels/.rels')).find(
      (entry) => entry.type === RELATIONSHIP_TYPES.coreProperties
    );
    const path = rel ? resolvePartPath('', rel.target) : undefined;
    if (!path || !parser.fileExists(path)) return {};

    const core = getXmlChild(await parser.readXml(path), 'cp:coreProperties');
    const read = (tag: string): string | undefined => getXmlText(core, tag) || undefined;
    return {
      title: read('dc:title'),
      creator: read('dc:creator'),
      subject: read('dc:subject'),
      language: read('dc:language'),
    };
  }

  private async inspectSlide(parser: PptxParser, index: number): Promise<SlideSummary> {
    const slide = await parser.getSlide(index);
    const layoutName = slide.layoutRelId
      ? (await parser.getSlideLayout(slide.path, slide.layoutRelId)).name
      : undefined;

    const summary: SlideSummary = {
      index,
      path: slide.path,
      ...(layoutName ? { layoutName } : {}),
      texts: [],
      tables: [],
      charts: [],
      images: [],
    };
    await this.collectShapes(parser, slide.path, getXmlChild(getXmlChild(slide.content, 'p:cSld'), 'p:spTree'), summary);
    return summary;
  }

  /**
   * Walks a shape tree, descending into groups.
   */
  private async collectShapes(
    parser: PptxParser,
    slidePath: string,
    tree: PptxXmlNode | undefined,
    summary: SlideSummary
  ): Promise<void> {
    for (const shape of getXmlChildren(tree, 'p:sp')) {
      const txBody = getXmlChild(shape, 'p:txBody');
      if (!txBody) continue;
      const nvSpPr = getXmlChild(shape, 'p:nvSpPr');
      const ph = getXmlChild(getXmlChild(nvSpPr, 'p:nvPr'), 'p:ph');
      const fontScale = getXmlAttr(getXmlChild(getXmlChild(txBody, 'a:bodyPr'), 'a:normAutofit'), 'fontScale');
      summary.texts.push({
        name: getXmlAttr(getXmlChild(nvSpPr, 'p:cNvPr'), 'name') ?? '',
        ...(ph ? { placeholder: getXmlAttr(ph, 'type') ?? 'obj' } : {}),
        text: readText(txBody),
        fontScale: fontScale ? percentageToDecimal(parseInt(fontScale, 10)) : 1,
      });
    }

    for (const frame of getXmlChildren(tree, 'p:graphicFrame')) {
      const graphicData = getXmlChild(getXmlChild(frame, 'a:graphic'), 'a:graphicData');
      const table = getXmlChild(graphicData, 'a:tbl');
      if (table) {
        const cells = getXmlChildren(table, 'a:tr').map((row) =>
          getXmlChildren(row, 'a:tc').map((cell) => readText(getXmlChild(cell, 'a:txBody')))
        );
        summary.tables.push({ rows: cells.length, columns: cells[0]?.length ?? 0, cells });
        continue;
      }

      const chartRelId = getXmlAttr(getXmlChild(graphicData, 'c:chart'), 'r:id');
      if (chartRelId) {
        const { path } = await parser.getRelatedPart(slidePath, chartRelId);
        const chart = await this.chartReader.readChart(parser, path);
        if (chart) summary.charts.push(chart);
      }
    }

    for (const picture of getXmlChildren(tree, 'p:pic')) {
      const blipFill = getXmlChild(picture, 'p:blipFill');
      const embed = getXmlAttr(getXmlChild(blipFill, 'a:blip'), 'r:embed');
      if (!embed) continue;

      const rel = (await parser.getPartRelationships(slidePath)).find(
        (entry) => entry.id === embed && entry.type === RELATIONSHIP_TYPES.image
      );
      if (!rel) {
        this.logger.warn('Picture without image relationship', { slide: slidePath, relId: embed });
        continue;
      }
      const { path, data } = await parser.getRelatedPart(slidePath, embed);
      const sourceRect = getXmlChild(blipFill, 'a:srcRect');
      const edge = (name: string): number => parseInt(getXmlAttr(sourceRect, name) ?? '0', 10);
      summary.images.push({
        path,
        contentType: this.decoder.getMimeType(this.decoder.detectFormat(data)),
        byteSize: data.length,
        crop: { left: edge('l'), top: edge('t'), right: edge('r'), bottom: edge('b') },
      });
    }

    for (const group of getXmlChildren(tree, 'p:grpSp')) {
      await this.collectShapes(parser, slidePath, group, summary);
    }
  }
}

/**
 * Paragraph texts of a text body, joined with newlines.
 */
function readText(txBody: PptxXmlNode | undefined): string {
  return getXmlChildren(txBody, 'a:p')
    .map((paragraph) =>
      [...getXmlChildren(paragraph, 'a:r'), ...getXmlChildren(paragraph, 'a:fld')]
        .map((run) => getXmlText(run, 'a:t') ?? '')
        .join('')
    )
    .join('\n');
}

/**
 * Summarizes a presentation package.
 */
export async function inspectPackage(bytes: Buffer, logger?: ILogger): Promise<PackageSummary> {
  return new DeckInspector(logger).inspect(bytes);
}
