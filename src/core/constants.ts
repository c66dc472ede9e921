/**
 * Shared OpenXML constants: namespaces, relationship types and content types.
 */

/**
 * XML namespaces declared on generated parts.
 */
export const NAMESPACES = {
  a: 'http://schemas.openxmlformats.org/drawingml/2006/main',
  r: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships',
  p: 'http://schemas.openxmlformats.org/presentationml/2006/main',
  c: 'http://schemas.openxmlformats.org/drawingml/2006/chart',
  relationships: 'http://schemas.openxmlformats.org/package/2006/relationships',
  contentTypes: 'http://schemas.openxmlformats.org/package/2006/content-types',
} as const;

const RELATIONSHIP_BASE = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';

/**
 * Relationship types used by the engine.
 */
export const RELATIONSHIP_TYPES = {
  officeDocument: `${RELATIONSHIP_BASE}/officeDocument`,
  slide: `${RELATIONSHIP_BASE}/slide`,
  slideLayout: `${RELATIONSHIP_BASE}/slideLayout`,
  slideMaster: `${RELATIONSHIP_BASE}/slideMaster`,
  notesSlide: `${RELATIONSHIP_BASE}/notesSlide`,
  image: `${RELATIONSHIP_BASE}/image`,
  chart: `${RELATIONSHIP_BASE}/chart`,
  hyperlink: `${RELATIONSHIP_BASE}/hyperlink`,
  coreProperties: 'http://schemas.openxmlformats.org/package/2006/relationships/metadata/core-properties',
  extendedProperties: `${RELATIONSHIP_BASE}/extended-properties`,
} as const;

/**
 * Content types of parts the engine writes.
 */
export const CONTENT_TYPES = {
  slide: 'application/vnd.openxmlformats-officedocument.presentationml.slide+xml',
  chart: 'application/vnd.openxmlformats-officedocument.drawingml.chart+xml',
  coreProperties: 'application/vnd.openxmlformats-package.core-properties+xml',
  extendedProperties: 'application/vnd.openxmlformats-officedocument.extended-properties+xml',
} as const;

/**
 * Namespaces of the extended (application) properties part.
 */
export const EXTENDED_PROPERTIES_NAMESPACES = {
  properties: 'http://schemas.openxmlformats.org/officeDocument/2006/extended-properties',
  vt: 'http://schemas.openxmlformats.org/officeDocument/2006/docPropsVTypes',
} as const;

/**
 * Namespaces of the core properties part.
 */
export const CORE_PROPERTIES_NAMESPACES = {
  cp: 'http://schemas.openxmlformats.org/package/2006/metadata/core-properties',
  dc: 'http://purl.org/dc/elements/1.1/',
  dcterms: 'http://purl.org/dc/terms/',
  dcmitype: 'http://purl.org/dc/dcmitype/',
  xsi: 'http://www.w3.org/2001/XMLSchema-instance',
} as const;

/**
 * `a:graphicData` URIs.
 */
export const GRAPHIC_DATA_URIS = {
  table: 'http://schemas.openxmlformats.org/drawingml/2006/table',
  chart: 'http://schemas.openxmlformats.org/drawingml/2006/chart',
} as const;

/**
 * Shape element types that can carry a placeholder in a shape tree (p:spTree).
 */
export const PLACEHOLDER_ELEMENT_TYPES = ['p:sp', 'p:pic', 'p:graphicFrame'] as const;

/**
 * Non-visual property container for each placeholder-capable element.
 */
export const NON_VISUAL_PROPERTIES: Record<(typeof PLACEHOLDER_ELEMENT_TYPES)[number], string> = {
  'p:sp': 'p:nvSpPr',
  'p:pic': 'p:nvPicPr',
  'p:graphicFrame': 'p:nvGraphicFramePr',
};

/**
 * First identifier PowerPoint accepts for `p:sldId/@id`.
 */
export const FIRST_SLIDE_ID = 256;
