/**
 * Reads chart parts (c:chartSpace) back into chart data.
 * Understands literal data (`c:strLit`/`c:numLit`) and cached workbook
 * references (`c:strRef`/`c:numRef`).
 */

import type { PptxParser, PptxXmlNode } from '../core/PptxParser.js';
import { getXmlAttr, getXmlChild, getXmlChildren, getXmlText } from '../core/PptxParser.js';
import type { ChartType } from '../types/index.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * A single data series in a chart.
 */
export interface ChartSeriesData {
  name: string;
  values: number[];
}

/**
 * Chart data read from a chart part.
 */
export interface ChartData {
  type: ChartType;
  categories: string[];
  series: ChartSeriesData[];
  /** Legend position code (`b`, `r`, `t`, `l`), when a legend is shown */
  legendPosition?: string;
}

/**
 * Plot elements read as chart types; column charts count as bar charts.
 */
const PLOT_TYPES: ReadonlyArray<[string, ChartType]> = [
  ['c:barChart', 'bar'],
  ['c:bar3DChart', 'bar'],
  ['c:lineChart', 'line'],
  ['c:line3DChart', 'line'],
  ['c:pieChart', 'pie'],
  ['c:pie3DChart', 'pie'],
  ['c:doughnutChart', 'pie'],
];

/**
 * Parses chart XML from a package.
 */
export class ChartReader {
  private readonly logger: ILogger;

  constructor(logger?: ILogger) {
    this.logger = logger ?? createLogger('warn', 'ChartReader');
  }

  /**
   * Reads the chart at `chartPath`. Returns undefined for chart kinds the
   * engine does not write.
   */
  async readChart(parser: PptxParser, chartPath: string): Promise<ChartData | undefined> {
    const xml = await parser.readXml(chartPath);
    const chart = getXmlChild(getXmlChild(xml, 'c:chartSpace'), 'c:chart');
    const plotArea = getXmlChild(chart, 'c:plotArea');
    if (!plotArea) {
      this.logger.warn('No plotArea in chart', { path: chartPath });
      return undefined;
    }

    for (const [element, type] of PLOT_TYPES) {
      const plot = getXmlChild(plotArea, element);
      if (!plot) continue;

      const seriesNodes = getXmlChildren(plot, 'c:ser');
      const first = seriesNodes[0];
      const legendPosition = getXmlAttr(getXmlChild(getXmlChild(chart, 'c:legend'), 'c:legendPos'), 'val');
      const data: ChartData = {
        type,
        categories: first ? this.readPoints(getXmlChild(first, 'c:cat')) : [],
        series: seriesNodes.map((ser, index) => this.readSeries(ser, index)),
        ...(legendPosition ? { legendPosition } : {}),
      };
      this.logger.debug('Chart read', {
        path: chartPath,
        type,
        categories: data.categories.length,
        series: data.series.length,
      });
      return data;
    }

    this.logger.warn('Unsupported chart type', { path: chartPath });
    return undefined;
  }

  private readSeries(ser: PptxXmlNode, index: number): ChartSeriesData {
    const tx = getXmlChild(ser, 'c:tx');
    const name = getXmlText(tx, 'c:v') ?? this.readPoints(tx)[0] ?? `Series ${index + 1}`;
    const values = this.readPoints(getXmlChild(ser, 'c:val')).map((value) => {
      const parsed = parseFloat(value);
      return isNaN(parsed) ? 0 : parsed;
    });
    return { name, values };
  }

  /**
   * Reads the points of a data source, sorted by index.
   */
  private readPoints(source: PptxXmlNode | undefined): string[] {
    const container =
      getXmlChild(source, 'c:strLit') ??
      getXmlChild(source, 'c:numLit') ??
      getXmlChild(getXmlChild(source, 'c:strRef'), 'c:strCache') ??
      getXmlChild(getXmlChild(source, 'c:numRef'), 'c:numCache');
    if (!container) return [];

    return getXmlChildren(container, 'c:pt')
      .map((pt) => ({ idx: parseInt(getXmlAttr(pt, 'idx') ?? '0', 10), text: getXmlText(pt, 'c:v') ?? '' }))
      .sort((a, b) => a.idx - b.idx)
      .map((pt) => pt.text);
  }
}
