import {
  buildOrderedXml,
  createElement,
  createTextElement,
  XML_DECLARATION,
  type OrderedXmlNode,
  type OrderedXmlOutput,
} from '../core/PackageXml.js';
import { GRAPHIC_DATA_URIS, NAMESPACES } from '../core/constants.js';
import { ChartDataMismatchError } from '../core/errors.js';
import type { ChartContent, ChartSeriesSpec, ChartType } from '../types/index.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import type { BindContext } from './BindContext.js';
import { buildGraphicFrame, type ShapeTarget } from './ShapeXml.js';

/** Axis ids linking the category and value axes of bar and line charts */
const CATEGORY_AXIS_ID = '500000001';
const VALUE_AXIS_ID = '500000002';

function val(tag: string, value: string): OrderedXmlNode {
  return createElement(tag, { val: value });
}

/**
 * Writes charts as chart parts with literal (workbook-free) data.
 */
export class ChartBinder {
  private readonly logger: ILogger;

  constructor(logger?: ILogger) {
    this.logger = logger ?? createLogger('warn', 'ChartBinder');
  }

  /**
   * Builds the chart frame and attaches its chart part to the slide.
   *
   * @throws ChartDataMismatchError when a series length disagrees with the
   * category count
   */
  bind(target: ShapeTarget, chart: ChartContent, context: BindContext): OrderedXmlNode {
    for (const series of chart.series) {
      if (series.values.length !== chart.categories.length) {
        throw new ChartDataMismatchError(context.slideIndex, series.name, chart.categories.length, series.values.length);
      }
    }

    const relId = context.parts.attachChart(this.buildChartPart(chart, context.language));
    this.logger.debug('Chart bound', {
      slideIndex: context.slideIndex,
      type: chart.type,
      categories: chart.categories.length,
      series: chart.series.length,
    });

    const id = context.parts.nextShapeId();
    const reference = createElement('c:chart', { 'xmlns:c': NAMESPACES.c, 'xmlns:r': NAMESPACES.r, 'r:id': relId });
    return buildGraphicFrame(id, `Chart ${id - 1}`, target, GRAPHIC_DATA_URIS.chart, reference);
  }

  /**
   * Serializes a chart part (`c:chartSpace`).
   */
  buildChartPart(chart: ChartContent, language: string): string {
    const space = createElement(
      'c:chartSpace',
      { 'xmlns:c': NAMESPACES.c, 'xmlns:a': NAMESPACES.a, 'xmlns:r': NAMESPACES.r },
      [
        val('c:date1904', '0'),
        val('c:lang', language),
        val('c:roundedCorners', '0'),
        createElement('c:chart', {}, [
          val('c:autoTitleDeleted', '1'),
          createElement('c:plotArea', {}, [createElement('c:layout'), ...this.buildPlot(chart)]),
          createElement('c:legend', {}, [val('c:legendPos', chart.type === 'pie' ? 'r' : 'b'), val('c:overlay', '0')]),
          val('c:plotVisOnly', '1'),
          val('c:dispBlanksAs', 'gap'),
        ]),
      ]
    );
    return XML_DECLARATION + buildOrderedXml([space]);
  }

  private buildPlot(chart: ChartContent): OrderedXmlOutput {
    const series = chart.series.map((entry, index) => this.buildSeries(entry, index, chart.categories, chart.type));
    const axisIds = [val('c:axId', CATEGORY_AXIS_ID), val('c:axId', VALUE_AXIS_ID)];

    switch (chart.type) {
      case 'bar':
        return [
          createElement('c:barChart', {}, [
            val('c:barDir', 'col'),
            val('c:grouping', 'clustered'),
            val('c:varyColors', '0'),
            ...series,
            val('c:gapWidth', '150'),
            ...axisIds,
          ]),
          ...this.buildAxes(),
        ];
      case 'line':
        return [
          createElement('c:lineChart', {}, [
            val('c:grouping', 'standard'),
            val('c:varyColors', '0'),
            ...series,
            val('c:marker', '1'),
            ...axisIds,
          ]),
          ...this.buildAxes(),
        ];
      case 'pie':
        return [
          createElement('c:pieChart', {}, [val('c:varyColors', '1'), ...series, val('c:firstSliceAng', '0')]),
        ];
    }
  }

  private buildSeries(series: ChartSeriesSpec, index: number, categories: readonly string[], type: ChartType): OrderedXmlNode {
    const children: OrderedXmlOutput = [
      val('c:idx', String(index)),
      val('c:order', String(index)),
      createElement('c:tx', {}, [createTextElement('c:v', series.name)]),
    ];
    if (type === 'line') {
      children.push(createElement('c:marker', {}, [val('c:symbol', 'circle')]));
    }
    children.push(
      createElement('c:cat', {}, [
        createElement('c:strLit', {}, [
          val('c:ptCount', String(categories.length)),
          ...categories.map((category, i) => createElement('c:pt', { idx: String(i) }, [createTextElement('c:v', category)])),
        ]),
      ]),
      createElement('c:val', {}, [
        createElement('c:numLit', {}, [
          createTextElement('c:formatCode', 'General'),
          val('c:ptCount', String(series.values.length)),
          ...series.values.map((value, i) => createElement('c:pt', { idx: String(i) }, [createTextElement('c:v', String(value))])),
        ]),
      ])
    );
    if (type === 'line') {
      children.push(val('c:smooth', '0'));
    }
    return createElement('c:ser', {}, children);
  }

  private buildAxes(): OrderedXmlOutput {
    const scaling = createElement('c:scaling', {}, [val('c:orientation', 'minMax')]);
    return [
      createElement('c:catAx', {}, [
        val('c:axId', CATEGORY_AXIS_ID),
        scaling,
        val('c:delete', '0'),
        val('c:axPos', 'b'),
        val('c:crossAx', VALUE_AXIS_ID),
        val('c:crosses', 'autoZero'),
        val('c:auto', '1'),
        val('c:lblAlgn', 'ctr'),
        val('c:lblOffset', '100'),
      ]),
      createElement('c:valAx', {}, [
        val('c:axId', VALUE_AXIS_ID),
        createElement('c:scaling', {}, [val('c:orientation', 'minMax')]),
        val('c:delete', '0'),
        val('c:axPos', 'l'),
        createElement('c:majorGridlines'),
        createElement('c:numFmt', { formatCode: 'General', sourceLinked: '0' }),
        val('c:crossAx', CATEGORY_AXIS_ID),
        val('c:crosses', 'autoZero'),
        val('c:crossBetween', 'between'),
      ]),
    ];
  }
}
