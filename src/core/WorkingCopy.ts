import JSZip from 'jszip';
import {
  attributesOf,
  buildOrderedXml,
  childrenOf,
  createElement,
  rootElement,
  tagOf,
  XML_DECLARATION,
  parseXmlPreservingOrder,
  type OrderedXmlNode,
  type OrderedXmlOutput,
} from './PackageXml.js';
import { NAMESPACES } from './constants.js';

/**
 * A private, mutable copy of the template package for one render.
 *
 * Each checkout loads the shared template bytes into a new zip, so
 * concurrent renders never see each other's changes.
 */
export class WorkingCopy {
  private constructor(private readonly zip: JSZip) {}

  static async checkout(template: Buffer): Promise<WorkingCopy> {
    return new WorkingCopy(await JSZip.loadAsync(template));
  }

  exists(path: string): boolean {
    return this.zip.file(path) !== null;
  }

  /**
   * Lists part paths, optionally under a folder prefix.
   */
  list(prefix = ''): string[] {
    const paths: string[] = [];
    this.zip.forEach((path, file) => {
      if (!file.dir && path.startsWith(prefix)) paths.push(path);
    });
    return paths;
  }

  async readText(path: string): Promise<string> {
    const file = this.zip.file(path);
    if (!file) {
      throw new Error(`Part not found: ${path}`);
    }
    return file.async('string');
  }

  /**
   * Reads a part as ordered XML.
   */
  async readOrdered(path: string): Promise<OrderedXmlOutput> {
    return parseXmlPreservingOrder(await this.readText(path));
  }

  /**
   * Writes ordered XML back, adding the declaration when the nodes lack one.
   */
  writeOrdered(path: string, nodes: OrderedXmlOutput): void {
    const hasDeclaration = nodes.some((node) => tagOf(node) === '?xml');
    const xml = buildOrderedXml(nodes);
    this.write(path, hasDeclaration ? xml : XML_DECLARATION + xml);
  }

  write(path: string, data: string | Buffer): void {
    this.zip.file(path, data);
  }

  remove(path: string): void {
    this.zip.remove(path);
  }

  /**
   * Serializes the package.
   */
  async toBuffer(): Promise<Buffer> {
    return this.zip.generateAsync({
      type: 'nodebuffer',
      compression: 'DEFLATE',
      compressionOptions: { level: 6 },
      mimeType: 'application/vnd.openxmlformats-officedocument.presentationml.presentation',
    });
  }
}

/**
 * One entry of a relationships part.
 */
export interface RelationshipEntry {
  id: string;
  type: string;
  target: string;
  external: boolean;
}

/**
 * Editable relationships part (`*.rels`).
 */
export class RelationshipSet {
  private readonly nodes: OrderedXmlOutput;
  private readonly root: OrderedXmlNode;

  private constructor(nodes: OrderedXmlOutput) {
    this.nodes = nodes;
    this.root = rootElement(nodes, 'Relationships');
  }

  static parse(nodes: OrderedXmlOutput): RelationshipSet {
    return new RelationshipSet(nodes);
  }

  static empty(): RelationshipSet {
    return new RelationshipSet([createElement('Relationships', { xmlns: NAMESPACES.relationships })]);
  }

  entries(): RelationshipEntry[] {
    return childrenOf(this.root)
      .filter((node) => tagOf(node) === 'Relationship')
      .map((node) => {
        const attributes = attributesOf(node);
        return {
          id: attributes['Id'] ?? '',
          type: attributes['Type'] ?? '',
          target: attributes['Target'] ?? '',
          external: attributes['TargetMode'] === 'External',
        };
      });
  }

  /**
   * Adds a relationship under the next free `rIdN`, or under `id` when given.
   */
  add(type: string, target: string, options: { id?: string; external?: boolean } = {}): string {
    const id = options.id ?? this.nextId();
    const attributes: Record<string, string> = { Id: id, Type: type, Target: target };
    if (options.external) attributes['TargetMode'] = 'External';
    childrenOf(this.root).push(createElement('Relationship', attributes));
    return id;
  }

  /**
   * Removes relationships matching the predicate and returns them.
   */
  remove(predicate: (entry: RelationshipEntry) => boolean): RelationshipEntry[] {
    const children = childrenOf(this.root);
    const removed: RelationshipEntry[] = [];
    const entries = this.entries();
    const kept = children.filter((node) => {
      if (tagOf(node) !== 'Relationship') return true;
      const id = attributesOf(node)['Id'];
      const entry = entries.find((candidate) => candidate.id === id);
      if (entry && predicate(entry)) {
        removed.push(entry);
        return false;
      }
      return true;
    });
    children.splice(0, children.length, ...kept);
    return removed;
  }

  private nextId(): string {
    const used = this.entries()
      .map((entry) => /^rId(\d+)$/.exec(entry.id)?.[1])
      .filter((digits): digits is string => digits !== undefined)
      .map((digits) => parseInt(digits, 10));
    return `rId${Math.max(0, ...used) + 1}`;
  }

  toNodes(): OrderedXmlOutput {
    return this.nodes;
  }
}

/**
 * Editable `[Content_Types].xml`.
 */
export class ContentTypes {
  static readonly PATH = '[Content_Types].xml';
  private readonly root: OrderedXmlNode;

  constructor(private readonly nodes: OrderedXmlOutput) {
    this.root = rootElement(nodes, 'Types');
  }

  /**
   * Registers a content type for an extension unless one is registered.
   */
  ensureDefault(extension: string, contentType: string): void {
    const exists = childrenOf(this.root).some(
      (node) => tagOf(node) === 'Default' && attributesOf(node)['Extension']?.toLowerCase() === extension.toLowerCase()
    );
    if (!exists) {
      // Defaults precede overrides
      const children = childrenOf(this.root);
      const firstOverride = children.findIndex((node) => tagOf(node) === 'Override');
      const entry = createElement('Default', { Extension: extension, ContentType: contentType });
      children.splice(firstOverride === -1 ? children.length : firstOverride, 0, entry);
    }
  }

  /**
   * Sets the content type of a part (`partPath` without leading slash).
   */
  setOverride(partPath: string, contentType: string): void {
    this.removeOverride(partPath);
    childrenOf(this.root).push(createElement('Override', { PartName: `/${partPath}`, ContentType: contentType }));
  }

  removeOverride(partPath: string): void {
    const children = childrenOf(this.root);
    const kept = children.filter(
      (node) => !(tagOf(node) === 'Override' && attributesOf(node)['PartName'] === `/${partPath}`)
    );
    children.splice(0, children.length, ...kept);
  }

  overrides(): Array<{ partName: string; contentType: string }> {
    return childrenOf(this.root)
      .filter((node) => tagOf(node) === 'Override')
      .map((node) => {
        const attributes = attributesOf(node);
        return { partName: attributes['PartName'] ?? '', contentType: attributes['ContentType'] ?? '' };
      });
  }

  toNodes(): OrderedXmlOutput {
    return this.nodes;
  }
}
