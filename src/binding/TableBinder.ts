import { createElement, createTextElement, type OrderedXmlNode } from '../core/PackageXml.js';
import { GRAPHIC_DATA_URIS } from '../core/constants.js';
import { TableGridMismatchError } from '../core/errors.js';
import type { TableContent, TableGrid } from '../types/index.js';
import { buildTextBody } from '../text/TextBodyBuilder.js';
import { plainParagraphs } from '../text/TextModel.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import type { BindContext } from './BindContext.js';
import { buildGraphicFrame, type ShapeTarget } from './ShapeXml.js';

/** Built-in "Medium Style 2 - Accent 1" table style */
const DEFAULT_TABLE_STYLE_ID = '{5C22544A-7EE6-4342-B048-85BDC9FD1C3A}';

/** Header fill and text color of the `header_colored` style */
const HEADER_FILL = '003366';
const HEADER_TEXT = 'FFFFFF';

/**
 * Writes tables as DrawingML tables in a graphic frame.
 */
export class TableBinder {
  private readonly logger: ILogger;

  constructor(logger?: ILogger) {
    this.logger = logger ?? createLogger('warn', 'TableBinder');
  }

  /**
   * Builds the table frame. When the template fixes the grid, the table
   * must match it exactly; otherwise the grid is sized to the data and
   * columns share the width equally.
   *
   * @throws TableGridMismatchError on a fixed-grid mismatch
   */
  bind(target: ShapeTarget, table: TableContent, context: BindContext): OrderedXmlNode {
    const grid: TableGrid = { rows: table.rows.length + 1, columns: table.header.length };
    const fixedGrid = target.slot?.fixedGrid;
    if (fixedGrid && (fixedGrid.rows !== grid.rows || fixedGrid.columns !== grid.columns)) {
      throw new TableGridMismatchError(context.slideIndex, fixedGrid, grid);
    }

    const { width, height } = target.bounds;
    const columnWidth = Math.floor(width / grid.columns);
    const rowHeight = Math.floor(height / grid.rows);
    const columnWidths = table.header.map((_, index) =>
      index === grid.columns - 1 ? width - columnWidth * (grid.columns - 1) : columnWidth
    );

    const headerRow = this.buildRow(table.header, rowHeight, context, table.style === 'header_colored' ? 'colored' : 'plain');
    const bodyRows = table.rows.map((row) => this.buildRow(row, rowHeight, context));

    const tbl = createElement('a:tbl', {}, [
      createElement('a:tblPr', { firstRow: '1', bandRow: '1' }, [
        createTextElement('a:tableStyleId', DEFAULT_TABLE_STYLE_ID),
      ]),
      createElement(
        'a:tblGrid',
        {},
        columnWidths.map((w) => createElement('a:gridCol', { w: String(w) }))
      ),
      headerRow,
      ...bodyRows,
    ]);

    this.logger.debug('Table bound', { slideIndex: context.slideIndex, ...grid, style: table.style });

    const id = context.parts.nextShapeId();
    return buildGraphicFrame(id, `Table ${id - 1}`, target, GRAPHIC_DATA_URIS.table, tbl);
  }

  private buildRow(
    cells: readonly string[],
    height: number,
    context: BindContext,
    header?: 'plain' | 'colored'
  ): OrderedXmlNode {
    return createElement(
      'a:tr',
      { h: String(height) },
      cells.map((text) => {
        const formatting = header
          ? { bold: true, ...(header === 'colored' ? { color: HEADER_TEXT } : {}) }
          : undefined;
        const paragraphs = plainParagraphs(text).map((paragraph) => ({
          ...paragraph,
          runs: paragraph.runs.map((run) => (formatting ? { ...run, formatting } : run)),
        }));
        const cellProperties =
          header === 'colored'
            ? createElement('a:tcPr', {}, [createElement('a:solidFill', {}, [createElement('a:srgbClr', { val: HEADER_FILL })])])
            : createElement('a:tcPr');

        return createElement('a:tc', {}, [
          buildTextBody(paragraphs, {
            language: context.language,
            registerHyperlink: (url) => context.parts.attachHyperlink(url),
            tag: 'a:txBody',
          }),
          cellProperties,
        ]);
      })
    );
  }
}
