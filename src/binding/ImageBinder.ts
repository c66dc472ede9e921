import { createElement, type OrderedXmlNode } from '../core/PackageXml.js';
import { PERCENTAGE_WHOLE } from '../core/UnitConverter.js';
import type { CropRect, Size } from '../types/index.js';
import type { DecodedImage } from '../utils/ImageDecoder.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import type { BindContext } from './BindContext.js';
import { buildPicture, type ShapeTarget } from './ShapeXml.js';

/**
 * Crop that fills `box` with an image of `image` size without distortion,
 * trimming the longer axis equally on both sides.
 */
export function centerCrop(image: Size, box: Size): CropRect {
  const none: CropRect = { left: 0, top: 0, right: 0, bottom: 0 };
  if (image.width <= 0 || image.height <= 0 || box.width <= 0 || box.height <= 0) {
    return none;
  }

  const imageRatio = image.width / image.height;
  const boxRatio = box.width / box.height;

  if (imageRatio > boxRatio) {
    const inset = Math.round(((1 - boxRatio / imageRatio) / 2) * PERCENTAGE_WHOLE);
    return { ...none, left: inset, right: inset };
  }
  if (imageRatio < boxRatio) {
    const inset = Math.round(((1 - imageRatio / boxRatio) / 2) * PERCENTAGE_WHOLE);
    return { ...none, top: inset, bottom: inset };
  }
  return none;
}

function buildSourceRect(crop: CropRect): OrderedXmlNode {
  const attributes: Record<string, string> = {};
  if (crop.left) attributes['l'] = String(crop.left);
  if (crop.top) attributes['t'] = String(crop.top);
  if (crop.right) attributes['r'] = String(crop.right);
  if (crop.bottom) attributes['b'] = String(crop.bottom);
  return createElement('a:srcRect', attributes);
}

/**
 * Places resolved image bytes into a picture region.
 */
export class ImageBinder {
  private readonly logger: ILogger;

  constructor(logger?: ILogger) {
    this.logger = logger ?? createLogger('warn', 'ImageBinder');
  }

  bind(target: ShapeTarget, image: DecodedImage, context: BindContext): OrderedXmlNode {
    const relId = context.parts.attachImage(image);
    const crop = centerCrop(image, target.bounds);
    this.logger.debug('Image bound', {
      slideIndex: context.slideIndex,
      format: image.format,
      width: image.width,
      height: image.height,
      crop,
    });

    const id = context.parts.nextShapeId();
    return buildPicture(id, `Picture ${id - 1}`, target, relId, buildSourceRect(crop));
  }
}
