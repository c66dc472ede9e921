import type { OrderedXmlNode } from '../core/PackageXml.js';
import type { TextRole } from '../types/index.js';
import type { AutoFitPolicy } from '../text/AutoFitPolicy.js';
import { buildTextBody } from '../text/TextBodyBuilder.js';
import type { TextParagraph } from '../text/TextModel.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import type { BindContext } from './BindContext.js';
import { buildTextShape, type ShapeTarget } from './ShapeXml.js';

/**
 * Fills title, body and column placeholders with auto-fitted text.
 */
export class TextBinder {
  private readonly logger: ILogger;

  constructor(
    private readonly autoFit: AutoFitPolicy,
    logger?: ILogger
  ) {
    this.logger = logger ?? createLogger('warn', 'TextBinder');
  }

  /**
   * Builds a text shape. Never throws for long text: it is shrunk, then
   * truncated.
   */
  bind(target: ShapeTarget, paragraphs: readonly TextParagraph[], role: TextRole, context: BindContext): OrderedXmlNode {
    const fitted = this.autoFit.fit(paragraphs, role);

    if (fitted.truncated) {
      this.logger.warn('Text truncated to fit placeholder', {
        slideIndex: context.slideIndex,
        role,
        length: fitted.originalLength,
        fontScale: fitted.fontScale,
      });
    } else if (fitted.fontScale < 1) {
      this.logger.debug('Text shrunk to fit placeholder', {
        slideIndex: context.slideIndex,
        role,
        fontScale: fitted.fontScale,
      });
    }

    const id = context.parts.nextShapeId();
    const name = target.slot ? `${capitalize(role)} ${id - 1}` : `TextBox ${id - 1}`;
    const body = buildTextBody(fitted.paragraphs, {
      language: context.language,
      registerHyperlink: (url) => context.parts.attachHyperlink(url),
      fontScale: fitted.fontScale,
      explicitBullets: !target.slot,
    });
    return buildTextShape(id, name, target, body);
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
