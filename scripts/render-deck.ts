#!/usr/bin/env node
/**
 * Renders a deck JSON file to a PPTX file.
 *
 * Usage: tsx scripts/render-deck.ts <deck.json> [output-dir]
 * The template comes from DECK_TEMPLATE_PATH (.env is read).
 */

import dotenv from 'dotenv';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { DeckRenderer, DeckError, loadEngineOptionsFromEnv } from '../src/index.js';

dotenv.config();

async function main(): Promise<void> {
  const deckPath = process.argv[2];
  const outputDir = process.argv[3] || './output';

  if (!deckPath) {
    console.error('Usage: tsx scripts/render-deck.ts <deck.json> [output-dir]');
    process.exit(1);
  }

  const { templatePath, options } = loadEngineOptionsFromEnv();
  if (!templatePath) {
    console.error('DECK_TEMPLATE_PATH is not set (see scripts/generate-template.ts)');
    process.exit(1);
  }

  const input: unknown = JSON.parse(await fs.readFile(deckPath, 'utf-8'));
  const renderer = await DeckRenderer.create(templatePath, { logLevel: 'info', ...options });

  const startTime = Date.now();
  const result = await renderer.renderJson(input, { filename: path.basename(deckPath, '.json') });

  await fs.mkdir(outputDir, { recursive: true });
  const outputPath = path.join(outputDir, result.filename);
  await fs.writeFile(outputPath, result.data);

  console.log(`Rendered ${result.slideCount} slides to ${outputPath} in ${Date.now() - startTime}ms`);
  for (const degraded of result.degradedSlides) {
    console.log(`  ! Slide ${degraded.slideIndex + 1}: ${degraded.requestedKind} rendered as ${degraded.renderedKind}`);
  }
  for (const image of result.images) {
    console.log(`  • Slide ${image.slideIndex + 1}: image "${image.query}" from ${image.source}`);
  }
}

main().catch((error: unknown) => {
  if (error instanceof DeckError) {
    console.error(`${error.name} [${error.code}]: ${error.message}`);
  } else {
    console.error('Error:', error instanceof Error ? error.stack ?? error.message : error);
  }
  process.exit(1);
});
