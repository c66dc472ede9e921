import { describe, it, expect } from 'vitest';
import { buildOrderedXml } from '../../src/core/PackageXml.js';
import { ChartDataMismatchError, TableGridMismatchError } from '../../src/core/errors.js';
import { ChartBinder } from '../../src/binding/ChartBinder.js';
import { ImageBinder, centerCrop } from '../../src/binding/ImageBinder.js';
import { SlidePartContext } from '../../src/binding/SlideParts.js';
import { TableBinder } from '../../src/binding/TableBinder.js';
import type { BindContext } from '../../src/binding/BindContext.js';
import type { ShapeTarget } from '../../src/binding/ShapeXml.js';
import type { ChartContent, TableContent } from '../../src/types/index.js';

function context(slideIndex = 0): BindContext {
  return { slideIndex, language: 'en', parts: new SlidePartContext() };
}

const freeTarget: ShapeTarget = { bounds: { x: 0, y: 0, width: 1000, height: 200 } };

function count(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

describe('SlidePartContext', () => {
  it('should allocate shape ids from 2 and relationship ids from rId2', () => {
    const parts = new SlidePartContext();

    expect(parts.nextShapeId()).toBe(2);
    expect(parts.nextShapeId()).toBe(3);
    expect(parts.attachChart('<c:chartSpace/>')).toBe('rId2');
    expect(parts.attachHyperlink('https://example.com')).toBe('rId3');
  });

  it('should reuse the relationship of a repeated hyperlink', () => {
    const parts = new SlidePartContext();

    const first = parts.attachHyperlink('https://example.com/a');
    const second = parts.attachHyperlink('https://example.com/a');

    expect(second).toBe(first);
    expect(parts.attachments).toHaveLength(1);
  });
});

describe('TableBinder', () => {
  const table: TableContent = { header: ['A', 'B', 'C'], rows: [['1', '2', '3']], style: 'plain' };

  it('should size the grid to the data', () => {
    const xml = buildOrderedXml([new TableBinder().bind(freeTarget, table, context())]);

    expect(count(xml, '<a:tr ')).toBe(2);
    expect(count(xml, '<a:tc>')).toBe(6);
    expect(xml).toContain('<a:tblGrid><a:gridCol w="333"/><a:gridCol w="333"/><a:gridCol w="334"/></a:tblGrid>');
    expect(xml).toContain('<p:cNvPr id="2" name="Table 1"/>');
  });

  it('should write the header row in bold', () => {
    const xml = buildOrderedXml([new TableBinder().bind(freeTarget, table, context())]);

    expect(xml).toContain('<a:r><a:rPr lang="en" b="1" dirty="0"/><a:t>A</a:t></a:r>');
    expect(xml).toContain('<a:r><a:rPr lang="en" dirty="0"/><a:t>1</a:t></a:r>');
  });

  it('should fill the header of colored tables', () => {
    const xml = buildOrderedXml([
      new TableBinder().bind(freeTarget, { ...table, style: 'header_colored' }, context()),
    ]);

    expect(count(xml, '<a:tcPr><a:solidFill><a:srgbClr val="003366"/></a:solidFill></a:tcPr>')).toBe(3);
  });

  it('should accept data that matches a fixed grid', () => {
    const target: ShapeTarget = {
      slot: { role: 'table', type: 'tbl', idx: 1, bounds: freeTarget.bounds, fixedGrid: { rows: 2, columns: 3 } },
      bounds: freeTarget.bounds,
    };

    const xml = buildOrderedXml([new TableBinder().bind(target, table, context())]);

    expect(xml).toContain('<p:nvPr><p:ph type="tbl" idx="1"/></p:nvPr>');
  });

  it('should reject data that does not match a fixed grid', () => {
    const target: ShapeTarget = {
      slot: { role: 'table', type: 'tbl', idx: 1, bounds: freeTarget.bounds, fixedGrid: { rows: 3, columns: 3 } },
      bounds: freeTarget.bounds,
    };

    expect(() => new TableBinder().bind(target, table, context(4))).toThrow(TableGridMismatchError);
    expect(() => new TableBinder().bind(target, table, context(4))).toThrow(
      'Table is 2x3 but the template grid is 3x3'
    );
  });
});

describe('ChartBinder', () => {
  const chart: ChartContent = {
    type: 'bar',
    categories: ['Q1', 'Q2'],
    series: [{ name: 'North', values: [10, 12.5] }],
  };

  it('should attach a chart part and reference it from the frame', () => {
    const ctx = context();

    const xml = buildOrderedXml([new ChartBinder().bind(freeTarget, chart, ctx)]);

    expect(ctx.parts.attachments.map((attachment) => [attachment.kind, attachment.relId])).toEqual([['chart', 'rId2']]);
    expect(xml).toContain('r:id="rId2"');
    expect(xml).toContain('<a:graphicData uri="http://schemas.openxmlformats.org/drawingml/2006/chart">');
  });

  it('should write literal categories and values', () => {
    const part = new ChartBinder().buildChartPart(chart, 'en-GB');

    expect(part.startsWith('<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n<c:chartSpace')).toBe(true);
    expect(part).toContain('<c:lang val="en-GB"/>');
    expect(part).toContain('<c:barChart><c:barDir val="col"/>');
    expect(part).toContain('<c:pt idx="1"><c:v>Q2</c:v></c:pt>');
    expect(part).toContain('<c:pt idx="1"><c:v>12.5</c:v></c:pt>');
  });

  it('should write pie charts without axes', () => {
    const part = new ChartBinder().buildChartPart({ ...chart, type: 'pie' }, 'en');

    expect(part).toContain('<c:pieChart><c:varyColors val="1"/>');
    expect(part).not.toContain('<c:catAx>');
    expect(part).toContain('<c:legendPos val="r"/>');
  });

  it('should reject series that do not match the categories', () => {
    const bad: ChartContent = { ...chart, series: [{ name: 'South', values: [1] }] };

    expect(() => new ChartBinder().bind(freeTarget, bad, context(2))).toThrow(ChartDataMismatchError);
    expect(() => new ChartBinder().bind(freeTarget, bad, context(2))).toThrow(
      'Chart series "South" has 1 values for 2 categories'
    );
  });
});

describe('centerCrop', () => {
  it('should trim the sides of a wide image', () => {
    expect(centerCrop({ width: 2000, height: 1000 }, { width: 1000, height: 1000 })).toEqual({
      left: 25000,
      top: 0,
      right: 25000,
      bottom: 0,
    });
  });

  it('should trim the top and bottom of a tall image', () => {
    expect(centerCrop({ width: 1000, height: 2000 }, { width: 1000, height: 1000 })).toEqual({
      left: 0,
      top: 25000,
      right: 0,
      bottom: 25000,
    });
  });

  it('should not crop matching or empty sizes', () => {
    const none = { left: 0, top: 0, right: 0, bottom: 0 };
    expect(centerCrop({ width: 1600, height: 900 }, { width: 3200, height: 1800 })).toEqual(none);
    expect(centerCrop({ width: 0, height: 900 }, { width: 100, height: 100 })).toEqual(none);
  });
});

describe('ImageBinder', () => {
  it('should embed the image and write its crop', () => {
    const ctx = context();
    const image = { data: Buffer.from('png'), width: 200, height: 100, format: 'png' as const };

    const xml = buildOrderedXml([
      new ImageBinder().bind({ bounds: { x: 0, y: 0, width: 100, height: 100 } }, image, ctx),
    ]);

    expect(ctx.parts.attachments).toEqual([{ kind: 'image', relId: 'rId2', image }]);
    expect(xml).toContain('<a:blip r:embed="rId2"/><a:srcRect l="25000" r="25000"/>');
    expect(xml).toContain('<p:cNvPr id="2" name="Picture 1"/>');
  });
});
