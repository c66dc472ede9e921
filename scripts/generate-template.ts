#!/usr/bin/env node
/**
 * Writes a starter template with one layout per slide kind.
 *
 * Usage: tsx scripts/generate-template.ts [output-path]
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { buildTemplateFixture } from '../src/testing/index.js';

async function main(): Promise<void> {
  const outputPath = process.argv[2] || './templates/default.pptx';

  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, await buildTemplateFixture({ title: 'Starter Template' }));
  console.log(`Template written to ${outputPath}`);
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
