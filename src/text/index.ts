/**
 * Text model, auto-fit and DrawingML text bodies.
 */

export { AutoFitPolicy, type FittedText } from './AutoFitPolicy.js';
export {
  plainParagraphs,
  richTextParagraphs,
  bulletParagraphs,
  textLength,
  type TextParagraph,
  type BulletStyle,
} from './TextModel.js';
export { buildTextBody, buildParagraph, buildRunProperties, type TextBodyOptions } from './TextBodyBuilder.js';
