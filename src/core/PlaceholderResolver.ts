import type { PptxXmlNode } from './PptxParser.js';
import { getXmlAttr, getXmlChild, getXmlChildren } from './PptxParser.js';
import { NON_VISUAL_PROPERTIES, PLACEHOLDER_ELEMENT_TYPES } from './constants.js';
import { isPlaceholderType } from '../types/index.js';
import type { PlaceholderType, PlaceholderReference, Rect, Size, TableGrid } from '../types/index.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Element a placeholder sits on.
 */
export type PlaceholderElementType = (typeof PLACEHOLDER_ELEMENT_TYPES)[number];

/**
 * A placeholder shape found on a layout or master.
 */
export interface ShapePlaceholder {
  /** Placeholder type and index */
  ref: PlaceholderReference;
  /** Element carrying the placeholder */
  element: PlaceholderElementType;
  /** Shape name (`cNvPr/@name`) */
  name?: string;
  /** Bounds declared on the shape itself */
  bounds?: Rect;
  /** Table grid when the shape already holds a table */
  fixedGrid?: TableGrid;
}

/**
 * Placeholder with its bounds resolved through the inheritance chain.
 */
export interface ResolvedPlaceholder extends Omit<ShapePlaceholder, 'bounds'> {
  bounds: Rect;
  /** Where the bounds came from */
  boundsSource: 'layout' | 'master' | 'default';
}

/**
 * Placeholder types a master defines for layouts to inherit from.
 * Title-like placeholders inherit from the master title, footers from their
 * own kind, everything else from the master body.
 */
function masterTypeFor(type: PlaceholderType): PlaceholderType {
  switch (type) {
    case 'title':
    case 'ctrTitle':
      return 'title';
    case 'dt':
    case 'ftr':
    case 'sldNum':
    case 'hdr':
      return type;
    default:
      return 'body';
  }
}

/**
 * Resolves layout placeholders against their slide master: extracts
 * placeholder references and bounds, and fills in bounds the layout leaves
 * to the master.
 */
export class PlaceholderResolver {
  private readonly logger: ILogger;

  constructor(logger?: ILogger) {
    this.logger = logger ?? createLogger('warn', 'PlaceholderResolver');
  }

  /**
   * Extracts placeholder reference from a shape element.
   */
  extractPlaceholderRef(shapeNode: PptxXmlNode, element: PlaceholderElementType = 'p:sp'): PlaceholderReference | undefined {
    // Look for nvSpPr|nvPicPr|nvGraphicFramePr -> nvPr -> ph
    const nonVisual = getXmlChild(shapeNode, NON_VISUAL_PROPERTIES[element]);
    const ph = getXmlChild(getXmlChild(nonVisual, 'p:nvPr'), 'p:ph');
    if (!ph) return undefined;

    const rawType = getXmlAttr(ph, 'type') ?? 'obj';
    const idx = getXmlAttr(ph, 'idx');

    if (!isPlaceholderType(rawType)) {
      this.logger.debug('Unknown placeholder type', { type: rawType });
      return undefined;
    }

    return {
      type: rawType,
      idx: idx !== undefined ? parseInt(idx, 10) : undefined,
      hasCustomPrompt: getXmlAttr(ph, 'hasCustomPrompt') === '1',
    };
  }

  /**
   * Extracts the bounds a shape declares in its own transform.
   */
  extractBounds(shapeNode: PptxXmlNode, element: PlaceholderElementType = 'p:sp'): Rect | undefined {
    const xfrm =
      element === 'p:graphicFrame'
        ? getXmlChild(shapeNode, 'p:xfrm')
        : getXmlChild(getXmlChild(shapeNode, 'p:spPr'), 'a:xfrm');
    const off = getXmlChild(xfrm, 'a:off');
    const ext = getXmlChild(xfrm, 'a:ext');
    if (!off || !ext) return undefined;

    const rect = {
      x: parseInt(getXmlAttr(off, 'x') ?? '', 10),
      y: parseInt(getXmlAttr(off, 'y') ?? '', 10),
      width: parseInt(getXmlAttr(ext, 'cx') ?? '', 10),
      height: parseInt(getXmlAttr(ext, 'cy') ?? '', 10),
    };
    return Object.values(rect).every(Number.isFinite) ? rect : undefined;
  }

  /**
   * Collects the placeholder shapes of a layout or master (`p:sldLayout` / `p:sldMaster` content).
   */
  collectPlaceholders(partContent: PptxXmlNode): ShapePlaceholder[] {
    const spTree = getXmlChild(getXmlChild(partContent, 'p:cSld'), 'p:spTree');
    const placeholders: ShapePlaceholder[] = [];

    for (const element of PLACEHOLDER_ELEMENT_TYPES) {
      for (const shape of getXmlChildren(spTree, element)) {
        const ref = this.extractPlaceholderRef(shape, element);
        if (!ref) continue;

        const cNvPr = getXmlChild(getXmlChild(shape, NON_VISUAL_PROPERTIES[element]), 'p:cNvPr');
        placeholders.push({
          ref,
          element,
          name: getXmlAttr(cNvPr, 'name'),
          bounds: this.extractBounds(shape, element),
          fixedGrid: element === 'p:graphicFrame' ? this.extractTableGrid(shape) : undefined,
        });
      }
    }

    return placeholders;
  }

  /**
   * Reads the grid of a table already present in a graphic frame.
   */
  private extractTableGrid(frame: PptxXmlNode): TableGrid | undefined {
    const graphicData = getXmlChild(getXmlChild(frame, 'a:graphic'), 'a:graphicData');
    const table = getXmlChild(graphicData, 'a:tbl');
    if (!table) return undefined;

    const columns = getXmlChildren(getXmlChild(table, 'a:tblGrid'), 'a:gridCol').length;
    const rows = getXmlChildren(table, 'a:tr').length;
    return rows > 0 && columns > 0 ? { rows, columns } : undefined;
  }

  /**
   * Finds the master placeholder a layout placeholder inherits from.
   * Matches on index first, then on the inherited type.
   */
  findPlaceholderShape(
    candidates: readonly ShapePlaceholder[],
    type: PlaceholderType,
    idx: number | undefined
  ): ShapePlaceholder | undefined {
    const inheritedType = masterTypeFor(type);
    if (idx !== undefined) {
      const byIndex = candidates.find(
        (candidate) => candidate.ref.idx === idx && masterTypeFor(candidate.ref.type) === inheritedType
      );
      if (byIndex) return byIndex;
    }
    return candidates.find((candidate) => candidate.ref.type === inheritedType);
  }

  /**
   * Resolves a layout placeholder's bounds: its own transform, else the
   * master placeholder's, else a default region of the slide.
   */
  resolvePlaceholder(
    placeholder: ShapePlaceholder,
    masterPlaceholders: readonly ShapePlaceholder[],
    slideSize: Size
  ): ResolvedPlaceholder {
    if (placeholder.bounds) {
      return { ...placeholder, bounds: placeholder.bounds, boundsSource: 'layout' };
    }

    const inherited = this.findPlaceholderShape(masterPlaceholders, placeholder.ref.type, placeholder.ref.idx);
    if (inherited?.bounds) {
      return { ...placeholder, bounds: inherited.bounds, boundsSource: 'master' };
    }

    this.logger.debug('Placeholder has no bounds in layout or master, using default region', {
      type: placeholder.ref.type,
      idx: placeholder.ref.idx,
    });
    return { ...placeholder, bounds: this.defaultBounds(placeholder.ref.type, slideSize), boundsSource: 'default' };
  }

  /**
   * Default region for a placeholder type.
   */
  defaultBounds(type: PlaceholderType, slideSize: Size): Rect {
    return defaultPlaceholderBounds(type, slideSize);
  }
}

/**
 * Default region for a placeholder type: a title band across the top or
 * the body area below it.
 */
export function defaultPlaceholderBounds(type: PlaceholderType, slideSize: Size): Rect {
  const marginX = Math.round(slideSize.width * 0.05);
  const width = slideSize.width - 2 * marginX;

  if (masterTypeFor(type) === 'title') {
    return {
      x: marginX,
      y: Math.round(slideSize.height * 0.04),
      width,
      height: Math.round(slideSize.height * 0.15),
    };
  }

  return {
    x: marginX,
    y: Math.round(slideSize.height * 0.22),
    width,
    height: Math.round(slideSize.height * 0.7),
  };
}
