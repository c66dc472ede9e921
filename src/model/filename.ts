import type { SlideDeckSpec } from '../types/index.js';

const DEFAULT_BASENAME = 'presentation';
const MAX_BASENAME_LENGTH = 100;

/**
 * Builds a safe `.pptx` filename from a hint, else from the deck's title or
 * first slide. Keeps letters, digits, spaces, `-`, `_` and `.`.
 */
export function deriveFilename(hint: string | undefined, deck: SlideDeckSpec): string {
  const [first] = deck.slides;
  const firstTitle = first?.kind === 'Title' ? first.headline : first && 'title' in first ? first.title : undefined;

  const candidates = [hint, deck.metadata.title, firstTitle];
  for (const candidate of candidates) {
    const basename = sanitize(candidate ?? '');
    if (basename) return `${basename}.pptx`;
  }
  return `${DEFAULT_BASENAME}.pptx`;
}

function sanitize(name: string): string {
  return name
    .replace(/\.pptx$/i, '')
    .replace(/[^\p{L}\p{N} ._-]/gu, '')
    .replace(/\s+/g, ' ')
    .replace(/^[ .]+|[ .]+$/g, '')
    .slice(0, MAX_BASENAME_LENGTH)
    .trim();
}
