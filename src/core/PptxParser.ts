import JSZip from 'jszip';
import { XMLParser, type X2jOptions } from 'fast-xml-parser';
import * as fs from 'fs/promises';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import { RELATIONSHIP_TYPES } from './constants.js';

/**
 * Raw slide data extracted from PPTX.
 */
export interface SlideData {
  /** Slide index (0-based) */
  index: number;
  /** Slide XML content parsed as object */
  content: PptxXmlNode;
  /** Slide layout relationship ID */
  layoutRelId?: string;
  /** Path to the slide file within the PPTX */
  path: string;
}

/**
 * Raw slide layout data.
 */
export interface SlideLayoutData {
  /** Layout name (`p:cSld/@name`) */
  name?: string;
  /** Layout XML content */
  content: PptxXmlNode;
  /** Master relationship ID */
  masterRelId?: string;
  /** Path to the layout file */
  path: string;
}

/**
 * Raw slide master data.
 */
export interface SlideMasterData {
  /** Master name */
  name?: string;
  /** Master XML content */
  content: PptxXmlNode;
  /** Path to the master file */
  path: string;
}

/**
 * Presentation-level data.
 */
export interface PresentationData {
  /** Slide width in EMU */
  slideWidth: number;
  /** Slide height in EMU */
  slideHeight: number;
  /** Slide relationship IDs in order */
  slideIds: string[];
  /** Number of slides */
  slideCount: number;
  /** Presentation XML content */
  content: PptxXmlNode;
}

/**
 * A relationship entry in a .rels file.
 */
export interface Relationship {
  id: string;
  type: string;
  target: string;
  targetMode?: string;
}

/**
 * Generic XML node type from fast-xml-parser.
 */
export type PptxXmlNode = Record<string, unknown>;

/**
 * XML attribute prefix used by fast-xml-parser.
 */
export const ATTR_PREFIX = '@_';

/**
 * Root elements of the parts this parser reads.
 */
const ROOT_ELEMENTS = {
  presentation: 'p:presentation',
  slide: 'p:sld',
  slideLayout: 'p:sldLayout',
  slideMaster: 'p:sldMaster',
  relationships: 'Relationships',
  relationship: 'Relationship',
};

/**
 * XML element names that should always be parsed as arrays.
 * These elements can appear multiple times in PPTX XML.
 */
const ARRAY_ELEMENTS = [
  'p:sp',
  'p:pic',
  'p:grpSp',
  'p:cxnSp',
  'p:graphicFrame',
  'a:p',
  'a:r',
  'a:tr',
  'a:tc',
  'a:gridCol',
  'p:sldId',
  'p:sldLayoutId',
  'Relationship',
  'Override',
  'Default',
  'c:ser',
  'c:pt',
] as const;

/**
 * Default XML parser options.
 */
const XML_PARSER_OPTIONS: Partial<X2jOptions> = {
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  removeNSPrefix: false,
  parseAttributeValue: false,
  trimValues: true,
  parseTagValue: false,
  isArray: (name: string): boolean => {
    return ARRAY_ELEMENTS.some((el) => name === el);
  },
};

/**
 * Builds the path of the relationships part for a package part,
 * e.g. `ppt/slides/slide1.xml` -> `ppt/slides/_rels/slide1.xml.rels`.
 */
export function getRelsPath(partPath: string): string {
  const lastSlash = partPath.lastIndexOf('/');
  if (lastSlash === -1) {
    return `_rels/${partPath}.rels`;
  }
  const dir = partPath.substring(0, lastSlash);
  const filename = partPath.substring(lastSlash + 1);
  return `${dir}/_rels/${filename}.rels`;
}

/**
 * Resolves a relationship target against the part that declares it.
 */
export function resolvePartPath(basePath: string, relativePath: string): string {
  if (relativePath.startsWith('/')) {
    return relativePath.slice(1);
  }

  const segments = basePath.split('/').slice(0, -1);
  for (const segment of relativePath.split('/')) {
    if (segment === '..') {
      segments.pop();
    } else if (segment !== '.' && segment !== '') {
      segments.push(segment);
    }
  }
  return segments.join('/');
}

/**
 * Builds the relationship target that leads from one part to another,
 * e.g. `ppt/slides/slide1.xml` -> `ppt/slideLayouts/slideLayout2.xml` gives
 * `../slideLayouts/slideLayout2.xml`.
 */
export function relativePartPath(fromPart: string, toPart: string): string {
  const fromDir = fromPart.split('/').slice(0, -1);
  const target = toPart.split('/');
  let common = 0;
  while (common < fromDir.length && common < target.length - 1 && fromDir[common] === target[common]) {
    common++;
  }
  return [...fromDir.slice(common).map(() => '..'), ...target.slice(common)].join('/');
}

/**
 * Read-only parser for PPTX packages.
 * Handles ZIP extraction and XML parsing.
 *
 * **Caching Behavior:**
 * Parsed XML and relationship arrays are cached by part path for the
 * lifetime of one open package. Caches are cleared by `open()` and `close()`.
 *
 * **Lifecycle:** short-lived, one package per instance.
 *
 * @example
 * ```typescript
 * const parser = new PptxParser();
 * try {
 *   await parser.open(pptxBuffer);
 *   const layouts = await parser.getSlideLayouts();
 * } finally {
 *   parser.close();
 * }
 * ```
 */
export class PptxParser {
  private zip: JSZip | null = null;
  private readonly logger: ILogger;
  private readonly xmlParser: XMLParser;
  /** Cache for parsed relationship arrays, keyed by .rels file path. */
  private relationshipCache: Map<string, Relationship[]> = new Map();
  /** Cache for parsed XML content, keyed by file path within the PPTX. */
  private xmlCache: Map<string, PptxXmlNode> = new Map();
  /** Path to the main presentation XML file, discovered from _rels/.rels */
  private presentationPath: string | null = null;

  constructor(logger?: ILogger) {
    this.logger = logger ?? createLogger('warn', 'PptxParser');
    this.xmlParser = new XMLParser(XML_PARSER_OPTIONS);
  }

  /**
   * Opens a PPTX file from a file path or Buffer.
   */
  async open(input: Buffer | string): Promise<void> {
    let data: Buffer;

    if (typeof input === 'string') {
      this.logger.debug('Opening PPTX from file path', { path: input });
      data = await fs.readFile(input);
    } else {
      this.logger.debug('Opening PPTX from buffer', { size: input.length });
      data = input;
    }

    try {
      this.zip = await JSZip.loadAsync(data);
      this.relationshipCache.clear();
      this.xmlCache.clear();
      this.presentationPath = null;
      this.logger.debug('PPTX opened');
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error('Failed to open PPTX', { error: message });
      throw new Error(`Failed to open PPTX file: ${message}`);
    }
  }

  /**
   * Ensures the parser has an open PPTX file.
   */
  private ensureOpen(): JSZip {
    if (!this.zip) {
      throw new Error('No PPTX file is open. Call open() first.');
    }
    return this.zip;
  }

  /**
   * Reads and parses an XML file from the PPTX.
   */
  async readXml(path: string): Promise<PptxXmlNode> {
    const cached = this.xmlCache.get(path);
    if (cached) {
      return cached;
    }

    const zip = this.ensureOpen();
    const file = zip.file(path);

    if (!file) {
      throw new Error(`File not found in PPTX: ${path}`);
    }

    const content = await file.async('string');
    const parsed = this.xmlParser.parse(content) as PptxXmlNode;
    this.xmlCache.set(path, parsed);

    return parsed;
  }

  /**
   * Reads a binary file from the PPTX.
   */
  async readBinary(path: string): Promise<Buffer> {
    const zip = this.ensureOpen();
    const file = zip.file(path);

    if (!file) {
      throw new Error(`File not found in PPTX: ${path}`);
    }

    return file.async('nodebuffer');
  }

  /**
   * Checks if a file exists in the PPTX.
   */
  fileExists(path: string): boolean {
    const zip = this.ensureOpen();
    return zip.file(path) !== null;
  }

  /**
   * Parses relationships from a .rels file. A missing file has none.
   */
  async getRelationships(relPath: string): Promise<Relationship[]> {
    const cached = this.relationshipCache.get(relPath);
    if (cached) {
      return cached;
    }

    if (!this.fileExists(relPath)) {
      this.logger.debug('Relationships file not found', { path: relPath });
      return [];
    }

    const xml = await this.readXml(relPath);
    const rels = getXmlChild(xml, ROOT_ELEMENTS.relationships);
    const relationships = getXmlChildren(rels, ROOT_ELEMENTS.relationship).map((rel) => ({
      id: getXmlAttr(rel, 'Id') ?? '',
      type: getXmlAttr(rel, 'Type') ?? '',
      target: getXmlAttr(rel, 'Target') ?? '',
      targetMode: getXmlAttr(rel, 'TargetMode'),
    }));

    this.relationshipCache.set(relPath, relationships);
    return relationships;
  }

  /**
   * Gets the relationships declared by a part.
   */
  async getPartRelationships(partPath: string): Promise<Relationship[]> {
    return this.getRelationships(getRelsPath(partPath));
  }

  /**
   * Finds the path to the main presentation XML file by reading _rels/.rels.
   * Handles packages where the presentation is not at ppt/presentation.xml.
   */
  async findPresentationPath(): Promise<string> {
    if (this.presentationPath) {
      return this.presentationPath;
    }

    const rootRels = await this.getRelationships('_rels/.rels');
    // Match the main officeDocument relationship exactly, not extended-properties.
    const officeDocument = rootRels.find((rel) => rel.type === RELATIONSHIP_TYPES.officeDocument);

    if (officeDocument?.target) {
      this.presentationPath = resolvePartPath('', officeDocument.target);
      this.logger.debug('Found presentation path from .rels', { path: this.presentationPath });
    } else {
      this.logger.warn('No officeDocument relationship found, using default presentation path');
      this.presentationPath = 'ppt/presentation.xml';
    }
    return this.presentationPath;
  }

  /**
   * Gets presentation data.
   */
  async getPresentation(): Promise<PresentationData> {
    const presentationPath = await this.findPresentationPath();
    const xml = await this.readXml(presentationPath);

    const presentation = getXmlChild(xml, ROOT_ELEMENTS.presentation);
    if (!presentation) {
      throw new Error('Invalid PPTX: missing presentation element');
    }

    const sldSz = getXmlChild(presentation, 'p:sldSz');
    const slideWidth = parseInt(getXmlAttr(sldSz, 'cx') ?? '9144000', 10);
    const slideHeight = parseInt(getXmlAttr(sldSz, 'cy') ?? '6858000', 10);

    const slideIds = getXmlChildren(getXmlChild(presentation, 'p:sldIdLst'), 'p:sldId')
      .map((sldId) => getXmlAttr(sldId, 'r:id'))
      .filter((rId): rId is string => rId !== undefined);

    this.logger.debug('Presentation data loaded', {
      slideWidth,
      slideHeight,
      slideCount: slideIds.length,
    });

    return {
      slideWidth,
      slideHeight,
      slideIds,
      slideCount: slideIds.length,
      content: presentation,
    };
  }

  /**
   * Gets slide data by index (0-based), in presentation order.
   */
  async getSlide(index: number): Promise<SlideData> {
    const presentation = await this.getPresentation();
    const presentationPath = await this.findPresentationPath();

    if (index < 0 || index >= presentation.slideCount) {
      throw new Error(`Slide index ${index} out of range (0-${presentation.slideCount - 1})`);
    }

    const slideRelId = presentation.slideIds[index];
    const rels = await this.getPartRelationships(presentationPath);
    const slideRel = rels.find((r) => r.id === slideRelId);

    if (!slideRel) {
      throw new Error(`Relationship not found for slide ${index}: ${slideRelId}`);
    }

    const slidePath = resolvePartPath(presentationPath, slideRel.target);
    const xml = await this.readXml(slidePath);

    const slide = getXmlChild(xml, ROOT_ELEMENTS.slide);
    if (!slide) {
      throw new Error(`Invalid slide XML: missing slide element in ${slidePath}`);
    }

    const slideRels = await this.getPartRelationships(slidePath);
    const layoutRel = slideRels.find((r) => r.type === RELATIONSHIP_TYPES.slideLayout);

    this.logger.debug('Slide loaded', { index, path: slidePath });

    return {
      index,
      content: slide,
      layoutRelId: layoutRel?.id,
      path: slidePath,
    };
  }

  /**
   * Gets the layout a slide is based on.
   */
  async getSlideLayout(slidePath: string, layoutRelId: string): Promise<SlideLayoutData> {
    const rels = await this.getPartRelationships(slidePath);
    const target = rels.find((r) => r.id === layoutRelId)?.target;

    if (!target) {
      throw new Error(`Layout relationship not found: ${layoutRelId}`);
    }

    return this.readSlideLayout(resolvePartPath(slidePath, target));
  }

  /**
   * Reads a slide layout part.
   */
  async readSlideLayout(layoutPath: string): Promise<SlideLayoutData> {
    const xml = await this.readXml(layoutPath);

    const layout = getXmlChild(xml, ROOT_ELEMENTS.slideLayout);
    if (!layout) {
      throw new Error(`Invalid layout XML: missing slideLayout element in ${layoutPath}`);
    }

    const layoutRels = await this.getPartRelationships(layoutPath);
    const masterRel = layoutRels.find((r) => r.type === RELATIONSHIP_TYPES.slideMaster);

    return {
      name: getXmlAttr(getXmlChild(layout, 'p:cSld'), 'name') ?? getXmlAttr(layout, 'matchingName'),
      content: layout,
      masterRelId: masterRel?.id,
      path: layoutPath,
    };
  }

  /**
   * Reads a slide master part.
   */
  async readSlideMaster(masterPath: string): Promise<SlideMasterData> {
    const xml = await this.readXml(masterPath);

    const master = getXmlChild(xml, ROOT_ELEMENTS.slideMaster);
    if (!master) {
      throw new Error(`Invalid master XML: missing slideMaster element in ${masterPath}`);
    }

    return {
      name: getXmlAttr(getXmlChild(master, 'p:cSld'), 'name'),
      content: master,
      path: masterPath,
    };
  }

  /**
   * Gets every slide master, in presentation order.
   */
  async getSlideMasters(): Promise<SlideMasterData[]> {
    const presentationPath = await this.findPresentationPath();
    const rels = await this.getPartRelationships(presentationPath);
    const masters: SlideMasterData[] = [];

    for (const rel of rels.filter((r) => r.type === RELATIONSHIP_TYPES.slideMaster)) {
      masters.push(await this.readSlideMaster(resolvePartPath(presentationPath, rel.target)));
    }
    return masters;
  }

  /**
   * Gets every slide layout of every master, in master order.
   * Layout order follows each master's `p:sldLayoutIdLst`.
   */
  async getSlideLayouts(): Promise<Array<SlideLayoutData & { master: SlideMasterData }>> {
    const layouts: Array<SlideLayoutData & { master: SlideMasterData }> = [];

    for (const master of await this.getSlideMasters()) {
      const rels = await this.getPartRelationships(master.path);
      const layoutRels = new Map(
        rels.filter((r) => r.type === RELATIONSHIP_TYPES.slideLayout).map((r) => [r.id, r])
      );
      const orderedIds = getXmlChildren(getXmlChild(master.content, 'p:sldLayoutIdLst'), 'p:sldLayoutId')
        .map((entry) => getXmlAttr(entry, 'r:id'))
        .filter((rId): rId is string => rId !== undefined && layoutRels.has(rId));
      const ids = orderedIds.length > 0 ? orderedIds : [...layoutRels.keys()];

      for (const id of ids) {
        const rel = layoutRels.get(id);
        if (!rel) continue;
        const layout = await this.readSlideLayout(resolvePartPath(master.path, rel.target));
        layouts.push({ ...layout, master });
      }
    }

    this.logger.debug('Slide layouts enumerated', { count: layouts.length });
    return layouts;
  }

  /**
   * Gets a part a slide references by relationship ID.
   */
  async getRelatedPart(partPath: string, relationshipId: string): Promise<{ path: string; data: Buffer }> {
    const rels = await this.getPartRelationships(partPath);
    const target = rels.find((r) => r.id === relationshipId)?.target;

    if (!target) {
      throw new Error(`Relationship not found: ${relationshipId}`);
    }

    const path = resolvePartPath(partPath, target);
    return { path, data: await this.readBinary(path) };
  }

  /**
   * Closes the PPTX file and clears all internal caches.
   * After calling `close()`, the parser cannot be used until `open()` is called again.
   */
  close(): void {
    this.zip = null;
    this.relationshipCache.clear();
    this.xmlCache.clear();
    this.presentationPath = null;
    this.logger.debug('PPTX closed');
  }
}

/**
 * Utility function to extract attribute value from XML node.
 */
export function getXmlAttr(node: PptxXmlNode | undefined, attr: string): string | undefined {
  if (!node) return undefined;
  const value = node[`${ATTR_PREFIX}${attr}`];
  return value !== undefined ? String(value) : undefined;
}

/**
 * Utility function to get a child element from XML node.
 * Returns the first element when the child repeats.
 */
export function getXmlChild(node: PptxXmlNode | undefined, path: string): PptxXmlNode | undefined {
  if (!node) return undefined;
  const child = node[path];
  if (Array.isArray(child)) {
    return isXmlNode(child[0]) ? child[0] : undefined;
  }
  if (isXmlNode(child)) return child;
  // Self-closing elements without attributes parse as empty strings.
  return child === '' ? {} : undefined;
}

/**
 * Utility function to get a child element as array.
 */
export function getXmlChildren(node: PptxXmlNode | undefined, path: string): PptxXmlNode[] {
  if (!node) return [];
  const child = node[path];
  if (child === undefined) return [];
  const items: unknown[] = Array.isArray(child) ? child : [child];
  return items.map((item) => (isXmlNode(item) ? item : {}));
}

/**
 * Gets the text content of an element (`#text` or a bare string value).
 */
export function getXmlText(node: PptxXmlNode | undefined, path: string): string | undefined {
  if (!node) return undefined;
  const child = node[path];
  const first: unknown = Array.isArray(child) ? child[0] : child;
  if (typeof first === 'string' || typeof first === 'number') {
    return String(first);
  }
  if (isXmlNode(first)) {
    const text = first['#text'];
    return text !== undefined ? String(text) : '';
  }
  return undefined;
}

function isXmlNode(value: unknown): value is PptxXmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
