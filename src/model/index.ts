export { createSlideDeck } from './createSlideDeck.js';
export { createDeckSchema, detectSlideKind, parseSlideKind } from './DeckSchema.js';
export type { DeckSchemaOptions } from './DeckSchema.js';
export { deriveFilename } from './filename.js';
