/**
 * Writes paragraphs as DrawingML text bodies (`p:txBody` / `a:txBody`).
 */

import { createElement, createTextElement, type OrderedXmlNode, type OrderedXmlOutput } from '../core/PackageXml.js';
import { decimalToPercentage, pointsToFontSize } from '../core/UnitConverter.js';
import type { TextFormatting, TextRun } from '../types/index.js';
import type { TextParagraph } from './TextModel.js';

/** Left margin per indentation level for shapes that carry their own bullets */
const INDENT_PER_LEVEL_EMU = 342900;

/** Color of hyperlinked runs without a color of their own */
const HYPERLINK_COLOR = '0000FF';

export interface TextBodyOptions {
  /** Language tag written on every run */
  language: string;
  /** Registers an external link and returns its relationship id */
  registerHyperlink: (url: string) => string;
  /**
   * Font scale written as `a:normAutofit fontScale`. Without one the body
   * gets no autofit element (table cells).
   */
  fontScale?: number;
  /**
   * Write bullet glyphs and indents explicitly. Placeholders inherit them
   * from the layout, free shapes do not.
   */
  explicitBullets?: boolean;
  /** Element name, `p:txBody` for shapes, `a:txBody` for table cells */
  tag?: 'p:txBody' | 'a:txBody';
}

/**
 * Builds run properties (`a:rPr`) or end-of-paragraph properties.
 */
export function buildRunProperties(
  tag: 'a:rPr' | 'a:endParaRPr',
  language: string,
  formatting: TextFormatting = {},
  hyperlinkRelId?: string
): OrderedXmlNode {
  const attributes: Record<string, string> = { lang: language };
  if (formatting.bold) attributes['b'] = '1';
  if (formatting.italic) attributes['i'] = '1';
  if (formatting.size !== undefined) attributes['sz'] = String(pointsToFontSize(formatting.size));
  if (hyperlinkRelId) attributes['u'] = 'sng';
  attributes['dirty'] = '0';

  const children: OrderedXmlOutput = [];
  const color = formatting.color?.replace('#', '') ?? (hyperlinkRelId ? HYPERLINK_COLOR : undefined);
  if (color) {
    children.push(createElement('a:solidFill', {}, [createElement('a:srgbClr', { val: color })]));
  }
  if (hyperlinkRelId) {
    children.push(createElement('a:hlinkClick', { 'r:id': hyperlinkRelId }));
  }
  return createElement(tag, attributes, children);
}

function buildRun(run: TextRun, options: TextBodyOptions): OrderedXmlNode {
  const relId = run.hyperlink ? options.registerHyperlink(run.hyperlink) : undefined;
  return createElement('a:r', {}, [
    buildRunProperties('a:rPr', options.language, run.formatting, relId),
    createTextElement('a:t', run.text),
  ]);
}

function buildParagraphProperties(paragraph: TextParagraph, explicit: boolean): OrderedXmlNode | undefined {
  const attributes: Record<string, string> = {};
  const children: OrderedXmlOutput = [];

  if (explicit && paragraph.bullet !== 'none') {
    const margin = INDENT_PER_LEVEL_EMU * (paragraph.level + 1);
    attributes['marL'] = String(margin);
    attributes['indent'] = String(-INDENT_PER_LEVEL_EMU);
  }
  if (paragraph.level > 0) {
    attributes['lvl'] = String(paragraph.level);
  }

  switch (paragraph.bullet) {
    case 'none':
      children.push(createElement('a:buNone'));
      break;
    case 'number':
      children.push(createElement('a:buFont', { typeface: '+mj-lt' }));
      children.push(createElement('a:buAutoNum', { type: 'arabicPeriod' }));
      break;
    case 'bullet':
      if (explicit) {
        children.push(createElement('a:buFont', { typeface: 'Arial' }));
        children.push(createElement('a:buChar', { char: '•' }));
      }
      break;
  }

  if (Object.keys(attributes).length === 0 && children.length === 0) {
    return undefined;
  }
  return createElement('a:pPr', attributes, children);
}

/**
 * Builds one `a:p`.
 */
export function buildParagraph(paragraph: TextParagraph, options: TextBodyOptions): OrderedXmlNode {
  const children: OrderedXmlOutput = [];
  const properties = buildParagraphProperties(paragraph, options.explicitBullets ?? false);
  if (properties) children.push(properties);
  for (const run of paragraph.runs) {
    children.push(buildRun(run, options));
  }
  children.push(buildRunProperties('a:endParaRPr', options.language));
  return createElement('a:p', {}, children);
}

/**
 * Builds a text body. An empty paragraph list still yields one empty
 * paragraph, which the schema requires.
 */
export function buildTextBody(paragraphs: readonly TextParagraph[], options: TextBodyOptions): OrderedXmlNode {
  const bodyProperties: OrderedXmlOutput = [];
  if (options.fontScale !== undefined) {
    bodyProperties.push(
      options.fontScale < 1
        ? createElement('a:normAutofit', { fontScale: String(decimalToPercentage(options.fontScale)) })
        : createElement('a:normAutofit')
    );
  }

  const bodyAttributes: Record<string, string> = options.explicitBullets ? { wrap: 'square', rtlCol: '0' } : {};
  const content = paragraphs.length > 0 ? paragraphs : [{ runs: [], level: 0, bullet: 'none' as const }];

  return createElement(options.tag ?? 'p:txBody', {}, [
    createElement('a:bodyPr', bodyAttributes, bodyProperties),
    createElement('a:lstStyle'),
    ...content.map((paragraph) => buildParagraph(paragraph, options)),
  ]);
}
