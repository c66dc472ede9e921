#!/usr/bin/env node
/**
 * Prints the structure of a PPTX file.
 *
 * Usage: tsx scripts/inspect-deck.ts <file.pptx>
 */

import * as fs from 'node:fs/promises';
import { inspectPackage } from '../src/index.js';

async function main(): Promise<void> {
  const pptxPath = process.argv[2];
  if (!pptxPath) {
    console.error('Usage: tsx scripts/inspect-deck.ts <file.pptx>');
    process.exit(1);
  }

  const summary = await inspectPackage(await fs.readFile(pptxPath));
  console.log(`${pptxPath}: ${summary.slideCount} slides${summary.properties.title ? ` "${summary.properties.title}"` : ''}`);

  for (const slide of summary.slides) {
    console.log(`\nSlide ${slide.index + 1} (${slide.layoutName ?? 'no layout'})`);
    for (const text of slide.texts) {
      const scale = text.fontScale < 1 ? ` @${Math.round(text.fontScale * 100)}%` : '';
      console.log(`  [${text.placeholder ?? 'text'}${scale}] ${text.text.replace(/\n/g, ' / ').slice(0, 80)}`);
    }
    for (const table of slide.tables) {
      console.log(`  [table ${table.rows}x${table.columns}] ${table.cells.map((row) => row.join(' | ')).join(' // ')}`);
    }
    for (const chart of slide.charts) {
      console.log(`  [${chart.type} chart] ${chart.categories.join(', ')}; ${chart.series.map((s) => s.name).join(', ')}`);
    }
    for (const image of slide.images) {
      console.log(`  [image] ${image.contentType}, ${image.byteSize} bytes`);
    }
  }
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
