/**
 * Paragraph model shared by the text, table and auto-fit code.
 */

import type { BulletList, RichText, TextRun } from '../types/index.js';

/**
 * Bullet marker of a paragraph.
 */
export type BulletStyle = 'none' | 'bullet' | 'number';

/**
 * A paragraph ready to be written as `a:p`.
 */
export interface TextParagraph {
  readonly runs: readonly TextRun[];
  /** Indentation level 0-5 */
  readonly level: number;
  readonly bullet: BulletStyle;
}

/**
 * One unbulleted paragraph holding a plain string.
 */
export function plainParagraphs(text: string): TextParagraph[] {
  return richTextParagraphs([{ text }]);
}

/** Paragraph separators; a vertical tab is the soft break generators emit */
const LINE_BREAK = /\r\n|[\n\r\v]/;

/**
 * Splits rich text into paragraphs at line breaks, keeping each run's
 * formatting on both sides of a break.
 */
export function richTextParagraphs(text: RichText): TextParagraph[] {
  const paragraphs: TextRun[][] = [[]];
  for (const run of text) {
    run.text.split(LINE_BREAK).forEach((line, index) => {
      if (index > 0) paragraphs.push([]);
      if (line !== '') paragraphs[paragraphs.length - 1]?.push({ ...run, text: line });
    });
  }
  return paragraphs.map((runs) => ({ runs, level: 0, bullet: 'none' }));
}

/**
 * One paragraph per bullet item.
 */
export function bulletParagraphs(list: BulletList): TextParagraph[] {
  const bullet: BulletStyle = list.numbered ? 'number' : 'bullet';
  return list.items.map((item) => ({
    runs: [item.formatting ? { text: item.text, formatting: item.formatting } : { text: item.text }],
    level: item.level,
    bullet,
  }));
}

/**
 * Counts the characters of all runs; paragraph breaks are not counted.
 */
export function textLength(paragraphs: readonly TextParagraph[]): number {
  return paragraphs.reduce(
    (total, paragraph) => total + paragraph.runs.reduce((sum, run) => sum + run.text.length, 0),
    0
  );
}
