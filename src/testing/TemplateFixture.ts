/**
 * TemplateFixture - builds template packages in memory
 *
 * Produces small but complete presentation templates (master, named
 * layouts, theme, optional sample slides with notes and charts) for tests
 * and for the starter template script.
 */

import JSZip from 'jszip';
import {
  buildOrderedXml,
  createElement,
  createTextElement,
  XML_DECLARATION,
  type OrderedXmlNode,
  type OrderedXmlOutput,
} from '../core/PackageXml.js';
import {
  CONTENT_TYPES,
  CORE_PROPERTIES_NAMESPACES,
  EXTENDED_PROPERTIES_NAMESPACES,
  GRAPHIC_DATA_URIS,
  NAMESPACES,
  RELATIONSHIP_TYPES,
} from '../core/constants.js';
import { WIDESCREEN_SLIDE_HEIGHT_EMU, WIDESCREEN_SLIDE_WIDTH_EMU } from '../core/UnitConverter.js';
import type { PlaceholderType, Rect, Size, TableGrid } from '../types/index.js';

/**
 * A placeholder on a fixture layout.
 */
export interface FixturePlaceholder {
  type?: PlaceholderType;
  idx?: number;
  /** Omit to inherit the master's bounds */
  bounds?: Rect;
  /** Writes the placeholder as a graphic frame holding a table of this grid */
  tableGrid?: TableGrid;
}

/**
 * A named fixture layout.
 */
export interface FixtureLayout {
  name: string;
  placeholders: FixturePlaceholder[];
}

/**
 * Options for building a fixture template.
 */
export interface TemplateFixtureOptions {
  /** Defaults to the widescreen 13.33 × 7.5 inch slide */
  slideSize?: Size;
  /** Defaults to one layout per slide kind */
  layouts?: FixtureLayout[];
  /** Layout names to leave out of the default set */
  omitLayouts?: string[];
  /** Slides already present in the template, each with a notes slide and a chart */
  sampleSlides?: number;
  /** Fixed grid for the Table layout's table placeholder */
  tableGrid?: TableGrid;
  /** Title written to the template's core properties */
  title?: string;
}

const PRESENTATION_CONTENT_TYPES = {
  presentation: 'application/vnd.openxmlformats-officedocument.presentationml.presentation.main+xml',
  slideMaster: 'application/vnd.openxmlformats-officedocument.presentationml.slideMaster+xml',
  slideLayout: 'application/vnd.openxmlformats-officedocument.presentationml.slideLayout+xml',
  notesSlide: 'application/vnd.openxmlformats-officedocument.presentationml.notesSlide+xml',
  theme: 'application/vnd.openxmlformats-officedocument.theme+xml',
  relationships: 'application/vnd.openxmlformats-package.relationships+xml',
  spreadsheet: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
} as const;

const THEME_RELATIONSHIP = `${NAMESPACES.r}/theme`;
const PACKAGE_RELATIONSHIP = `${NAMESPACES.r}/package`;

/** Template creation timestamp kept by renders */
export const FIXTURE_CREATED = '2020-01-01T00:00:00Z';

const PNS = { 'xmlns:a': NAMESPACES.a, 'xmlns:r': NAMESPACES.r, 'xmlns:p': NAMESPACES.p };

/**
 * Placeholder regions of the default layouts on a slide of the given size.
 */
function regions(size: Size): Record<'title' | 'body' | 'left' | 'right', Rect> {
  const marginX = Math.round(size.width * 0.05);
  const width = size.width - 2 * marginX;
  const top = Math.round(size.height * 0.22);
  const height = Math.round(size.height * 0.7);
  const gap = 228600;
  const half = Math.floor((width - gap) / 2);
  return {
    title: { x: marginX, y: Math.round(size.height * 0.04), width, height: Math.round(size.height * 0.15) },
    body: { x: marginX, y: top, width, height },
    left: { x: marginX, y: top, width: half, height },
    right: { x: marginX + half + gap, y: top, width: width - half - gap, height },
  };
}

/**
 * One layout per slide kind, named as the catalog expects.
 */
export function defaultFixtureLayouts(size: Size = { width: WIDESCREEN_SLIDE_WIDTH_EMU, height: WIDESCREEN_SLIDE_HEIGHT_EMU }, tableGrid?: TableGrid): FixtureLayout[] {
  const r = regions(size);
  const title: FixturePlaceholder = { type: 'title' };
  return [
    { name: 'Title Slide', placeholders: [{ type: 'ctrTitle', bounds: r.title }, { type: 'subTitle', idx: 1, bounds: r.body }] },
    { name: 'Content Only', placeholders: [title, { idx: 1 }] },
    { name: 'Image Right', placeholders: [title, { type: 'body', idx: 1, bounds: r.left }, { type: 'pic', idx: 2, bounds: r.right }] },
    { name: 'Image Left', placeholders: [title, { type: 'pic', idx: 1, bounds: r.left }, { type: 'body', idx: 2, bounds: r.right }] },
    { name: 'Image Full', placeholders: [title, { type: 'pic', idx: 1, bounds: r.body }] },
    { name: 'Table', placeholders: [title, { type: 'tbl', idx: 1, bounds: r.body, ...(tableGrid ? { tableGrid } : {}) }] },
    { name: 'Chart', placeholders: [title, { type: 'chart', idx: 1, bounds: r.body }] },
    { name: 'Two Columns', placeholders: [title, { type: 'body', idx: 1, bounds: r.left }, { type: 'body', idx: 2, bounds: r.right }] },
  ];
}

function part(root: OrderedXmlNode): string {
  return XML_DECLARATION + buildOrderedXml([root]);
}

function relationships(entries: Array<{ id: string; type: string; target: string }>): string {
  return part(
    createElement(
      'Relationships',
      { xmlns: NAMESPACES.relationships },
      entries.map((entry) => createElement('Relationship', { Id: entry.id, Type: entry.type, Target: entry.target }))
    )
  );
}

function transform(bounds: Rect, tag: 'a:xfrm' | 'p:xfrm' = 'a:xfrm'): OrderedXmlNode {
  return createElement(tag, {}, [
    createElement('a:off', { x: String(bounds.x), y: String(bounds.y) }),
    createElement('a:ext', { cx: String(bounds.width), cy: String(bounds.height) }),
  ]);
}

function emptyTextBody(): OrderedXmlNode {
  return createElement('p:txBody', {}, [createElement('a:bodyPr'), createElement('a:lstStyle'), createElement('a:p')]);
}

function groupProperties(): OrderedXmlOutput {
  return [
    createElement('p:nvGrpSpPr', {}, [createElement('p:cNvPr', { id: '1', name: '' }), createElement('p:cNvGrpSpPr'), createElement('p:nvPr')]),
    createElement('p:grpSpPr'),
  ];
}

function placeholderShape(placeholder: FixturePlaceholder, id: number): OrderedXmlNode {
  const ph: Record<string, string> = {};
  if (placeholder.type) ph['type'] = placeholder.type;
  if (placeholder.idx !== undefined) ph['idx'] = String(placeholder.idx);
  const name = `${placeholder.type ?? 'Content'} Placeholder ${id - 1}`;
  const nvPr = createElement('p:nvPr', {}, [createElement('p:ph', ph)]);

  if (placeholder.tableGrid && placeholder.bounds) {
    const { rows, columns } = placeholder.tableGrid;
    const width = Math.floor(placeholder.bounds.width / columns);
    const height = Math.floor(placeholder.bounds.height / rows);
    const cell = createElement('a:tc', {}, [
      createElement('a:txBody', {}, [createElement('a:bodyPr'), createElement('a:lstStyle'), createElement('a:p')]),
      createElement('a:tcPr'),
    ]);
    return createElement('p:graphicFrame', {}, [
      createElement('p:nvGraphicFramePr', {}, [
        createElement('p:cNvPr', { id: String(id), name }),
        createElement('p:cNvGraphicFramePr', {}, [createElement('a:graphicFrameLocks', { noGrp: '1' })]),
        nvPr,
      ]),
      transform(placeholder.bounds, 'p:xfrm'),
      createElement('a:graphic', {}, [
        createElement('a:graphicData', { uri: GRAPHIC_DATA_URIS.table }, [
          createElement('a:tbl', {}, [
            createElement('a:tblPr', { firstRow: '1' }),
            createElement('a:tblGrid', {}, Array.from({ length: columns }, () => createElement('a:gridCol', { w: String(width) }))),
            ...Array.from({ length: rows }, () =>
              createElement('a:tr', { h: String(height) }, Array.from({ length: columns }, () => cell))
            ),
          ]),
        ]),
      ]),
    ]);
  }

  return createElement('p:sp', {}, [
    createElement('p:nvSpPr', {}, [
      createElement('p:cNvPr', { id: String(id), name }),
      createElement('p:cNvSpPr', {}, [createElement('a:spLocks', { noGrp: '1' })]),
      nvPr,
    ]),
    createElement('p:spPr', {}, placeholder.bounds ? [transform(placeholder.bounds)] : []),
    emptyTextBody(),
  ]);
}

function shapeTree(shapes: OrderedXmlOutput): OrderedXmlNode {
  return createElement('p:spTree', {}, [...groupProperties(), ...shapes]);
}

function masterPart(size: Size, layoutCount: number): string {
  const r = regions(size);
  const placeholders = [
    placeholderShape({ type: 'title', bounds: r.title }, 2),
    placeholderShape({ type: 'body', idx: 1, bounds: r.body }, 3),
  ];
  const levels = [1, 2, 3].map((level) =>
    createElement(`a:lvl${level}pPr`, { marL: String(228600 * level), indent: '-228600' }, [
      createElement('a:buChar', { char: '•' }),
      createElement('a:defRPr', { sz: String(2800 - level * 400) }),
    ])
  );
  return part(
    createElement('p:sldMaster', PNS, [
      createElement('p:cSld', {}, [shapeTree(placeholders)]),
      createElement('p:clrMap', {
        bg1: 'lt1', tx1: 'dk1', bg2: 'lt2', tx2: 'dk2',
        accent1: 'accent1', accent2: 'accent2', accent3: 'accent3',
        accent4: 'accent4', accent5: 'accent5', accent6: 'accent6',
        hlink: 'hlink', folHlink: 'folHlink',
      }),
      createElement(
        'p:sldLayoutIdLst',
        {},
        Array.from({ length: layoutCount }, (_, i) =>
          createElement('p:sldLayoutId', { id: String(2147483649 + i), 'r:id': `rId${i + 1}` })
        )
      ),
      createElement('p:txStyles', {}, [
        createElement('p:titleStyle', {}, [createElement('a:lvl1pPr', {}, [createElement('a:defRPr', { sz: '4400' })])]),
        createElement('p:bodyStyle', {}, levels),
        createElement('p:otherStyle'),
      ]),
    ])
  );
}

function layoutPart(layout: FixtureLayout): string {
  return part(
    createElement('p:sldLayout', { ...PNS, preserve: '1' }, [
      createElement('p:cSld', { name: layout.name }, [
        shapeTree(layout.placeholders.map((placeholder, i) => placeholderShape(placeholder, i + 2))),
      ]),
      createElement('p:clrMapOvr', {}, [createElement('a:masterClrMapping')]),
    ])
  );
}

function themePart(): string {
  const color = (tag: string, value: string): OrderedXmlNode =>
    createElement(tag, {}, [createElement('a:srgbClr', { val: value })]);
  const solid = createElement('a:solidFill', {}, [createElement('a:schemeClr', { val: 'phClr' })]);
  const line = (w: string): OrderedXmlNode => createElement('a:ln', { w }, [solid]);
  const effect = createElement('a:effectStyle', {}, [createElement('a:effectLst')]);
  const fonts = (latin: string): OrderedXmlOutput => [
    createElement('a:latin', { typeface: latin }),
    createElement('a:ea', { typeface: '' }),
    createElement('a:cs', { typeface: '' }),
  ];

  return part(
    createElement('a:theme', { 'xmlns:a': NAMESPACES.a, name: 'Fixture' }, [
      createElement('a:themeElements', {}, [
        createElement('a:clrScheme', { name: 'Fixture' }, [
          createElement('a:dk1', {}, [createElement('a:sysClr', { val: 'windowText', lastClr: '000000' })]),
          createElement('a:lt1', {}, [createElement('a:sysClr', { val: 'window', lastClr: 'FFFFFF' })]),
          color('a:dk2', '1F2937'),
          color('a:lt2', 'F3F4F6'),
          color('a:accent1', '2563EB'),
          color('a:accent2', 'DC2626'),
          color('a:accent3', '16A34A'),
          color('a:accent4', 'CA8A04'),
          color('a:accent5', '7C3AED'),
          color('a:accent6', '0891B2'),
          color('a:hlink', '0000FF'),
          color('a:folHlink', '800080'),
        ]),
        createElement('a:fontScheme', { name: 'Fixture' }, [
          createElement('a:majorFont', {}, fonts('Calibri Light')),
          createElement('a:minorFont', {}, fonts('Calibri')),
        ]),
        createElement('a:fmtScheme', { name: 'Fixture' }, [
          createElement('a:fillStyleLst', {}, [solid, solid, solid]),
          createElement('a:lnStyleLst', {}, [line('6350'), line('12700'), line('19050')]),
          createElement('a:effectStyleLst', {}, [effect, effect, effect]),
          createElement('a:bgFillStyleLst', {}, [solid, solid, solid]),
        ]),
      ]),
    ])
  );
}

function sampleSlidePart(index: number): string {
  return part(
    createElement('p:sld', PNS, [
      createElement('p:cSld', {}, [
        shapeTree([
          createElement('p:sp', {}, [
            createElement('p:nvSpPr', {}, [
              createElement('p:cNvPr', { id: '2', name: 'Title 1' }),
              createElement('p:cNvSpPr'),
              createElement('p:nvPr', {}, [createElement('p:ph', { type: 'title' })]),
            ]),
            createElement('p:spPr'),
            createElement('p:txBody', {}, [
              createElement('a:bodyPr'),
              createElement('a:p', {}, [createElement('a:r', {}, [createTextElement('a:t', `Sample ${index}`)])]),
            ]),
          ]),
        ]),
      ]),
    ])
  );
}

function notesPart(): string {
  return part(createElement('p:notes', PNS, [createElement('p:cSld', {}, [shapeTree([])])]));
}

function sampleChartPart(): string {
  return part(
    createElement('c:chartSpace', { 'xmlns:c': NAMESPACES.c, 'xmlns:a': NAMESPACES.a, 'xmlns:r': NAMESPACES.r }, [
      createElement('c:chart', {}, [createElement('c:plotArea', {}, [createElement('c:layout')])]),
      createElement('c:externalData', { 'r:id': 'rId1' }),
    ])
  );
}

function corePart(title: string): string {
  const namespaces = Object.fromEntries(
    Object.entries(CORE_PROPERTIES_NAMESPACES).map(([prefix, uri]) => [`xmlns:${prefix}`, uri])
  );
  return part(
    createElement('cp:coreProperties', namespaces, [
      createTextElement('dc:title', title),
      createTextElement('dc:creator', 'Template Author'),
      createTextElement('dcterms:created', FIXTURE_CREATED, { 'xsi:type': 'dcterms:W3CDTF' }),
      createTextElement('dcterms:modified', FIXTURE_CREATED, { 'xsi:type': 'dcterms:W3CDTF' }),
    ])
  );
}

/**
 * Application properties as PowerPoint saves them, listing the sample slide titles.
 */
function appPart(sampleSlides: number): string {
  const titles = Array.from({ length: sampleSlides }, (_, i) => createTextElement('vt:lpstr', `Sample ${i + 1}`));
  return part(
    createElement(
      'Properties',
      { xmlns: EXTENDED_PROPERTIES_NAMESPACES.properties, 'xmlns:vt': EXTENDED_PROPERTIES_NAMESPACES.vt },
      [
        createTextElement('Application', 'Microsoft Office PowerPoint'),
        createTextElement('Words', String(sampleSlides * 2)),
        createTextElement('Paragraphs', String(sampleSlides)),
        createTextElement('Slides', String(sampleSlides)),
        createTextElement('Notes', String(sampleSlides)),
        createTextElement('HiddenSlides', '0'),
        createElement('HeadingPairs', {}, [
          createElement('vt:vector', { size: '2', baseType: 'variant' }, [
            createElement('vt:variant', {}, [createTextElement('vt:lpstr', 'Slide Titles')]),
            createElement('vt:variant', {}, [createTextElement('vt:i4', String(sampleSlides))]),
          ]),
        ]),
        createElement('TitlesOfParts', {}, [
          createElement('vt:vector', { size: String(sampleSlides), baseType: 'lpstr' }, titles),
        ]),
      ]
    )
  );
}

/**
 * Builds a template package.
 */
export async function buildTemplateFixture(options: TemplateFixtureOptions = {}): Promise<Buffer> {
  const size = options.slideSize ?? { width: WIDESCREEN_SLIDE_WIDTH_EMU, height: WIDESCREEN_SLIDE_HEIGHT_EMU };
  const omitted = new Set(options.omitLayouts ?? []);
  const layouts = (options.layouts ?? defaultFixtureLayouts(size, options.tableGrid)).filter(
    (layout) => !omitted.has(layout.name)
  );
  const sampleSlides = options.sampleSlides ?? 0;

  const zip = new JSZip();
  const overrides: Array<[string, string]> = [
    ['/ppt/presentation.xml', PRESENTATION_CONTENT_TYPES.presentation],
    ['/ppt/slideMasters/slideMaster1.xml', PRESENTATION_CONTENT_TYPES.slideMaster],
    ['/ppt/theme/theme1.xml', PRESENTATION_CONTENT_TYPES.theme],
    ['/docProps/core.xml', CONTENT_TYPES.coreProperties],
    ['/docProps/app.xml', CONTENT_TYPES.extendedProperties],
  ];

  zip.file(
    '_rels/.rels',
    relationships([
      { id: 'rId1', type: RELATIONSHIP_TYPES.officeDocument, target: 'ppt/presentation.xml' },
      { id: 'rId2', type: RELATIONSHIP_TYPES.coreProperties, target: 'docProps/core.xml' },
      { id: 'rId3', type: RELATIONSHIP_TYPES.extendedProperties, target: 'docProps/app.xml' },
    ])
  );
  zip.file('docProps/core.xml', corePart(options.title ?? 'Fixture Template'));
  zip.file('docProps/app.xml', appPart(sampleSlides));
  zip.file('ppt/theme/theme1.xml', themePart());
  zip.file('ppt/slideMasters/slideMaster1.xml', masterPart(size, layouts.length));
  zip.file(
    'ppt/slideMasters/_rels/slideMaster1.xml.rels',
    relationships([
      ...layouts.map((_, i) => ({
        id: `rId${i + 1}`,
        type: RELATIONSHIP_TYPES.slideLayout,
        target: `../slideLayouts/slideLayout${i + 1}.xml`,
      })),
      { id: `rId${layouts.length + 1}`, type: THEME_RELATIONSHIP, target: '../theme/theme1.xml' },
    ])
  );

  layouts.forEach((layout, i) => {
    const path = `ppt/slideLayouts/slideLayout${i + 1}.xml`;
    zip.file(path, layoutPart(layout));
    zip.file(
      `ppt/slideLayouts/_rels/slideLayout${i + 1}.xml.rels`,
      relationships([{ id: 'rId1', type: RELATIONSHIP_TYPES.slideMaster, target: '../slideMasters/slideMaster1.xml' }])
    );
    overrides.push([`/${path}`, PRESENTATION_CONTENT_TYPES.slideLayout]);
  });

  const presentationRels = [
    { id: 'rId1', type: RELATIONSHIP_TYPES.slideMaster, target: 'slideMasters/slideMaster1.xml' },
    { id: 'rId2', type: THEME_RELATIONSHIP, target: 'theme/theme1.xml' },
  ];
  const slideIds: OrderedXmlOutput = [];

  for (let n = 1; n <= sampleSlides; n++) {
    zip.file(`ppt/slides/slide${n}.xml`, sampleSlidePart(n));
    zip.file(
      `ppt/slides/_rels/slide${n}.xml.rels`,
      relationships([
        { id: 'rId1', type: RELATIONSHIP_TYPES.slideLayout, target: '../slideLayouts/slideLayout1.xml' },
        { id: 'rId2', type: RELATIONSHIP_TYPES.notesSlide, target: `../notesSlides/notesSlide${n}.xml` },
        { id: 'rId3', type: RELATIONSHIP_TYPES.chart, target: `../charts/chart${n}.xml` },
      ])
    );
    zip.file(`ppt/notesSlides/notesSlide${n}.xml`, notesPart());
    zip.file(`ppt/charts/chart${n}.xml`, sampleChartPart());
    zip.file(
      `ppt/charts/_rels/chart${n}.xml.rels`,
      relationships([{ id: 'rId1', type: PACKAGE_RELATIONSHIP, target: `../embeddings/Microsoft_Excel_Worksheet${n}.xlsx` }])
    );
    zip.file(`ppt/embeddings/Microsoft_Excel_Worksheet${n}.xlsx`, Buffer.from('placeholder workbook'));

    const relId = `rId${presentationRels.length + 1}`;
    presentationRels.push({ id: relId, type: RELATIONSHIP_TYPES.slide, target: `slides/slide${n}.xml` });
    slideIds.push(createElement('p:sldId', { id: String(255 + n), 'r:id': relId }));
    overrides.push(
      [`/ppt/slides/slide${n}.xml`, CONTENT_TYPES.slide],
      [`/ppt/notesSlides/notesSlide${n}.xml`, PRESENTATION_CONTENT_TYPES.notesSlide],
      [`/ppt/charts/chart${n}.xml`, CONTENT_TYPES.chart]
    );
  }

  zip.file(
    'ppt/presentation.xml',
    part(
      createElement('p:presentation', PNS, [
        createElement('p:sldMasterIdLst', {}, [createElement('p:sldMasterId', { id: '2147483648', 'r:id': 'rId1' })]),
        ...(slideIds.length > 0 ? [createElement('p:sldIdLst', {}, slideIds)] : []),
        createElement('p:sldSz', { cx: String(size.width), cy: String(size.height) }),
        createElement('p:notesSz', { cx: '6858000', cy: '9144000' }),
      ])
    )
  );
  zip.file('ppt/_rels/presentation.xml.rels', relationships(presentationRels));

  zip.file(
    '[Content_Types].xml',
    part(
      createElement('Types', { xmlns: NAMESPACES.contentTypes }, [
        createElement('Default', { Extension: 'rels', ContentType: PRESENTATION_CONTENT_TYPES.relationships }),
        createElement('Default', { Extension: 'xml', ContentType: 'application/xml' }),
        createElement('Default', { Extension: 'xlsx', ContentType: PRESENTATION_CONTENT_TYPES.spreadsheet }),
        ...overrides.map(([partName, contentType]) => createElement('Override', { PartName: partName, ContentType: contentType })),
      ])
    )
  );

  return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}
