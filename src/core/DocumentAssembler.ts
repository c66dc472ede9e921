import {
  childrenOf,
  createElement,
  createTextElement,
  findElement,
  rootElement,
  tagOf,
  type OrderedXmlNode,
  type OrderedXmlOutput,
} from './PackageXml.js';
import { getRelsPath, relativePartPath, resolvePartPath } from './PptxParser.js';
import {
  CONTENT_TYPES,
  CORE_PROPERTIES_NAMESPACES,
  FIRST_SLIDE_ID,
  RELATIONSHIP_TYPES,
} from './constants.js';
import { DeckError, DocumentAssemblyError, errorMessage } from './errors.js';
import { ContentTypes, RelationshipSet, type WorkingCopy } from './WorkingCopy.js';
import type { BoundSlide } from '../binding/SlideBinder.js';
import { LAYOUT_RELATIONSHIP_ID } from '../binding/SlideParts.js';
import type { DeckMetadata } from '../types/index.js';
import { ImageDecoder } from '../utils/ImageDecoder.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Elements of `p:presentation` that precede `p:sldIdLst`.
 */
const BEFORE_SLIDE_LIST = new Set(['p:sldMasterIdLst', 'p:notesMasterIdLst', 'p:handoutMasterIdLst']);

const DEFAULT_CORE_PROPERTIES_PATH = 'docProps/core.xml';

/**
 * Application properties that describe the template's own slides.
 */
const STALE_APP_PROPERTIES = new Set(['Words', 'Paragraphs', 'MMClips', 'HeadingPairs', 'TitlesOfParts']);

/**
 * What the package is assembled from.
 */
export interface AssemblyInput {
  slides: readonly BoundSlide[];
  metadata: DeckMetadata;
  language: string;
  /** Timestamp written to the core properties */
  now?: Date;
}

/**
 * Part names allocated while assembling, numbered after the template's own.
 */
class PartNames {
  private readonly counters = new Map<string, number>();

  constructor(existing: readonly string[]) {
    for (const path of existing) {
      const match = /^ppt\/(slides\/slide|charts\/chart|media\/image)(\d+)\./.exec(path);
      if (match?.[1] && match[2]) {
        this.counters.set(match[1], Math.max(this.counters.get(match[1]) ?? 0, parseInt(match[2], 10)));
      }
    }
  }

  next(stem: 'slides/slide' | 'charts/chart' | 'media/image', extension: string): string {
    const value = (this.counters.get(stem) ?? 0) + 1;
    this.counters.set(stem, value);
    return `ppt/${stem}${value}.${extension}`;
  }
}

/**
 * Writes bound slides into a working copy of the template and serializes it.
 *
 * The template's own slides are removed first, with their notes and chart
 * parts; then one slide part per bound slide is added in order, with its
 * media, charts and relationships, and the core properties are rewritten.
 */
export class DocumentAssembler {
  private readonly logger: ILogger;
  private readonly decoder = new ImageDecoder();

  constructor(logger?: ILogger) {
    this.logger = logger ?? createLogger('warn', 'DocumentAssembler');
  }

  /**
   * Assembles the package.
   *
   * @throws DocumentAssemblyError on any package-level fault
   */
  async assemble(copy: WorkingCopy, input: AssemblyInput): Promise<Buffer> {
    try {
      const rootRels = RelationshipSet.parse(await copy.readOrdered('_rels/.rels'));
      const presentationPath = this.findPart(rootRels, RELATIONSHIP_TYPES.officeDocument, 'ppt/presentation.xml');
      const presentationRelsPath = getRelsPath(presentationPath);

      const presentation = await copy.readOrdered(presentationPath);
      const presentationRels = RelationshipSet.parse(await copy.readOrdered(presentationRelsPath));
      const contentTypes = new ContentTypes(await copy.readOrdered(ContentTypes.PATH));

      const removed = await this.removeTemplateSlides(copy, presentationPath, presentationRels, contentTypes);
      const slideList = this.slideList(rootElement(presentation, 'p:presentation'));
      slideList.splice(0, slideList.length);

      const names = new PartNames(copy.list('ppt/'));
      input.slides.forEach((slide, position) => {
        const slidePath = names.next('slides/slide', 'xml');
        this.writeSlide(copy, slidePath, slide, names, contentTypes);

        const relId = presentationRels.add(RELATIONSHIP_TYPES.slide, relativePartPath(presentationPath, slidePath));
        slideList.push(createElement('p:sldId', { id: String(FIRST_SLIDE_ID + position), 'r:id': relId }));
        contentTypes.setOverride(slidePath, CONTENT_TYPES.slide);
      });

      await this.writeCoreProperties(copy, rootRels, contentTypes, input);
      await this.writeAppProperties(copy, rootRels, input.slides.length);

      copy.writeOrdered(presentationPath, presentation);
      copy.writeOrdered(presentationRelsPath, presentationRels.toNodes());
      copy.writeOrdered(ContentTypes.PATH, contentTypes.toNodes());
      copy.writeOrdered('_rels/.rels', rootRels.toNodes());

      this.logger.debug('Package assembled', { removedSlides: removed, slides: input.slides.length });
      return await copy.toBuffer();
    } catch (error) {
      if (error instanceof DeckError) {
        throw error;
      }
      throw new DocumentAssemblyError(`Failed to assemble presentation: ${errorMessage(error)}`, {}, { cause: error });
    }
  }

  private findPart(relationships: RelationshipSet, type: string, fallback: string): string {
    const entry = relationships.entries().find((candidate) => candidate.type === type);
    return entry ? resolvePartPath('', entry.target) : fallback;
  }

  /**
   * Returns the children of `p:sldIdLst`, creating the list in schema order
   * when the template has none.
   */
  private slideList(presentation: OrderedXmlNode): OrderedXmlOutput {
    const children = childrenOf(presentation);
    const existing = findElement(children, 'p:sldIdLst');
    if (existing) {
      return childrenOf(existing);
    }

    const list = createElement('p:sldIdLst');
    let insertAt = 0;
    children.forEach((child, index) => {
      const tag = tagOf(child);
      if (tag && BEFORE_SLIDE_LIST.has(tag)) insertAt = index + 1;
    });
    children.splice(insertAt, 0, list);
    return childrenOf(list);
  }

  /**
   * Deletes the template's slides with their notes and chart parts.
   */
  private async removeTemplateSlides(
    copy: WorkingCopy,
    presentationPath: string,
    presentationRels: RelationshipSet,
    contentTypes: ContentTypes
  ): Promise<number> {
    const slideRels = presentationRels.remove((entry) => entry.type === RELATIONSHIP_TYPES.slide);

    for (const rel of slideRels) {
      const slidePath = resolvePartPath(presentationPath, rel.target);
      const owned = await this.ownedParts(copy, slidePath);
      for (const part of [slidePath, ...owned]) {
        copy.remove(part);
        copy.remove(getRelsPath(part));
        contentTypes.removeOverride(part);
      }
    }
    return slideRels.length;
  }

  /**
   * Parts that belong to a slide alone: notes slides and charts, with the
   * embedded workbooks charts point to.
   */
  private async ownedParts(copy: WorkingCopy, slidePath: string): Promise<string[]> {
    const relsPath = getRelsPath(slidePath);
    if (!copy.exists(relsPath)) return [];

    const owned: string[] = [];
    for (const rel of RelationshipSet.parse(await copy.readOrdered(relsPath)).entries()) {
      if (rel.external) continue;
      if (rel.type !== RELATIONSHIP_TYPES.notesSlide && rel.type !== RELATIONSHIP_TYPES.chart) continue;

      const part = resolvePartPath(slidePath, rel.target);
      owned.push(part);

      const partRels = getRelsPath(part);
      if (rel.type === RELATIONSHIP_TYPES.chart && copy.exists(partRels)) {
        for (const chartRel of RelationshipSet.parse(await copy.readOrdered(partRels)).entries()) {
          const target = resolvePartPath(part, chartRel.target);
          if (!chartRel.external && target.startsWith('ppt/embeddings/')) owned.push(target);
        }
      }
    }
    return owned;
  }

  private writeSlide(
    copy: WorkingCopy,
    slidePath: string,
    slide: BoundSlide,
    names: PartNames,
    contentTypes: ContentTypes
  ): void {
    const rels = RelationshipSet.empty();
    rels.add(RELATIONSHIP_TYPES.slideLayout, relativePartPath(slidePath, slide.layout.layoutId), {
      id: LAYOUT_RELATIONSHIP_ID,
    });

    for (const attachment of slide.attachments) {
      switch (attachment.kind) {
        case 'image': {
          const extension = this.decoder.getExtension(attachment.image.format);
          const mediaPath = names.next('media/image', extension);
          copy.write(mediaPath, attachment.image.data);
          contentTypes.ensureDefault(extension, this.decoder.getMimeType(attachment.image.format));
          rels.add(RELATIONSHIP_TYPES.image, relativePartPath(slidePath, mediaPath), { id: attachment.relId });
          break;
        }
        case 'chart': {
          const chartPath = names.next('charts/chart', 'xml');
          copy.write(chartPath, attachment.xml);
          contentTypes.setOverride(chartPath, CONTENT_TYPES.chart);
          rels.add(RELATIONSHIP_TYPES.chart, relativePartPath(slidePath, chartPath), { id: attachment.relId });
          break;
        }
        case 'hyperlink':
          rels.add(RELATIONSHIP_TYPES.hyperlink, attachment.url, { id: attachment.relId, external: true });
          break;
      }
    }

    copy.write(slidePath, slide.xml);
    copy.writeOrdered(getRelsPath(slidePath), rels.toNodes());
  }

  /**
   * Updates the slide counts of the application properties part, when the
   * template has one, and drops the statistics and title list of its slides.
   */
  private async writeAppProperties(copy: WorkingCopy, rootRels: RelationshipSet, slideCount: number): Promise<void> {
    const rel = rootRels.entries().find((entry) => entry.type === RELATIONSHIP_TYPES.extendedProperties);
    const appPath = rel ? resolvePartPath('', rel.target) : undefined;
    if (!appPath || !copy.exists(appPath)) return;

    const nodes = await copy.readOrdered(appPath);
    const root = findElement(nodes, 'Properties');
    if (!root) return;

    const children = childrenOf(root);
    const kept = children.filter((child) => !STALE_APP_PROPERTIES.has(tagOf(child) ?? ''));
    const counts: Array<[string, number]> = [
      ['Slides', slideCount],
      ['Notes', 0],
      ['HiddenSlides', 0],
    ];
    for (const [tag, value] of counts) {
      const element = createTextElement(tag, String(value));
      const index = kept.findIndex((child) => tagOf(child) === tag);
      if (index >= 0) {
        kept[index] = element;
      } else if (tag === 'Slides') {
        kept.push(element);
      }
    }
    children.splice(0, children.length, ...kept);
    copy.writeOrdered(appPath, nodes);
  }

  /**
   * Rewrites the core properties part, registering it when the template has none.
   */
  private async writeCoreProperties(
    copy: WorkingCopy,
    rootRels: RelationshipSet,
    contentTypes: ContentTypes,
    input: AssemblyInput
  ): Promise<void> {
    const existing = rootRels.entries().find((entry) => entry.type === RELATIONSHIP_TYPES.coreProperties);
    const corePath = existing ? resolvePartPath('', existing.target) : DEFAULT_CORE_PROPERTIES_PATH;
    if (!existing) {
      rootRels.add(RELATIONSHIP_TYPES.coreProperties, corePath);
    }
    contentTypes.setOverride(corePath, CONTENT_TYPES.coreProperties);

    const previous = copy.exists(corePath) ? await copy.readOrdered(corePath) : [];
    const previousRoot = findElement(previous, 'cp:coreProperties');
    const created = previousRoot && findElement(childrenOf(previousRoot), 'dcterms:created');
    const timestamp = (input.now ?? new Date()).toISOString().replace(/\.\d{3}Z$/, 'Z');
    const { metadata } = input;

    const properties: OrderedXmlOutput = [];
    const text = (tag: string, value: string | undefined): void => {
      if (value !== undefined && value !== '') properties.push(createTextElement(tag, value));
    };
    text('dc:title', metadata.title);
    text('dc:subject', metadata.subject);
    text('dc:creator', metadata.author);
    text('dc:description', metadata.subtitle);
    text('dc:language', input.language);
    text('cp:lastModifiedBy', metadata.author);
    properties.push(
      created ?? createTextElement('dcterms:created', timestamp, { 'xsi:type': 'dcterms:W3CDTF' }),
      createTextElement('dcterms:modified', timestamp, { 'xsi:type': 'dcterms:W3CDTF' })
    );

    const namespaces = Object.fromEntries(
      Object.entries(CORE_PROPERTIES_NAMESPACES).map(([prefix, uri]) => [`xmlns:${prefix}`, uri])
    );
    copy.writeOrdered(corePath, [createElement('cp:coreProperties', namespaces, properties)]);
  }
}

