import { XMLBuilder, XMLParser, type X2jOptions, type XmlBuilderOptions } from 'fast-xml-parser';
import { ATTR_PREFIX } from './PptxParser.js';

/**
 * Declaration written at the top of every generated part.
 */
export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n';

/**
 * Key under which preserveOrder output stores an element's attributes.
 */
const ORDERED_ATTRS_KEY = ':@';

/**
 * Represents a single element in the ordered XML output from fast-xml-parser.
 * Each element has one key (the tag name) with children as value, and optionally ':@' for attributes.
 */
export interface OrderedXmlNode {
  [tagName: string]: OrderedXmlOutput | string | Record<string, string> | undefined;
}

/**
 * Type representing the output of fast-xml-parser with preserveOrder: true.
 * Returns an array of elements in document order.
 */
export type OrderedXmlOutput = OrderedXmlNode[];

/**
 * XML parser options with preserveOrder enabled.
 * Format: [{ tagName: [...children], ':@': { attrs } }, ...]
 */
const ORDERED_XML_PARSER_OPTIONS: Partial<X2jOptions> = {
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  removeNSPrefix: false,
  parseAttributeValue: false,
  trimValues: true,
  parseTagValue: false,
  preserveOrder: true,
};

const BUILDER_OPTIONS: Partial<XmlBuilderOptions> = {
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  suppressEmptyNode: true,
  suppressBooleanAttributes: false,
  format: false,
};

const orderedXmlParser = new XMLParser(ORDERED_XML_PARSER_OPTIONS);
const orderedXmlBuilder = new XMLBuilder({ ...BUILDER_OPTIONS, preserveOrder: true });

/**
 * Parses an XML string with preserved document order.
 * Used for parts the engine edits in place, where schema order matters.
 */
export function parseXmlPreservingOrder(xmlString: string): OrderedXmlOutput {
  return orderedXmlParser.parse(xmlString) as OrderedXmlOutput;
}

/**
 * Serializes ordered XML back to a string. The declaration round-trips
 * as a `?xml` node.
 */
export function buildOrderedXml(nodes: OrderedXmlOutput): string {
  return String(orderedXmlBuilder.build(nodes));
}

/**
 * Gets the tag name of an ordered element.
 */
export function tagOf(node: OrderedXmlNode): string | undefined {
  return Object.keys(node).find((key) => key !== ORDERED_ATTRS_KEY);
}

/**
 * Finds the first element with the given tag among siblings.
 */
export function findElement(nodes: OrderedXmlOutput, tag: string): OrderedXmlNode | undefined {
  return nodes.find((node) => tagOf(node) === tag);
}

/**
 * Gets the children array of an ordered element, creating it when the
 * element was self-closing.
 */
export function childrenOf(node: OrderedXmlNode): OrderedXmlOutput {
  const tag = tagOf(node);
  if (!tag) return [];
  const value = node[tag];
  if (Array.isArray(value)) {
    return value;
  }
  const children: OrderedXmlOutput = [];
  node[tag] = children;
  return children;
}

/**
 * Gets an ordered element's attributes without the `@_` prefix.
 */
export function attributesOf(node: OrderedXmlNode): Record<string, string> {
  const raw = node[ORDERED_ATTRS_KEY];
  const attributes: Record<string, string> = {};
  if (raw && typeof raw === 'object' && !Array.isArray(raw)) {
    for (const [key, value] of Object.entries(raw)) {
      attributes[key.startsWith(ATTR_PREFIX) ? key.slice(ATTR_PREFIX.length) : key] = String(value);
    }
  }
  return attributes;
}

/**
 * Characters XML 1.0 does not allow: C0 controls other than tab, line feed
 * and carriage return, U+FFFE/U+FFFF, and unpaired surrogates.
 */
const NON_XML_CHARS =
  /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

/**
 * Makes a string writable as XML content. Disallowed characters are written
 * in the OOXML `_xHHHH_` escape form; unpaired surrogates are dropped.
 */
export function toXmlText(value: string): string {
  return value.replace(NON_XML_CHARS, (char) => {
    const code = char.charCodeAt(0);
    if (code >= 0xd800 && code <= 0xdfff) return '';
    return `_x${code.toString(16).toUpperCase().padStart(4, '0')}_`;
  });
}

/**
 * Creates an ordered element.
 */
export function createElement(
  tag: string,
  attributes: Record<string, string> = {},
  children: OrderedXmlOutput = []
): OrderedXmlNode {
  const node: OrderedXmlNode = { [tag]: children };
  if (Object.keys(attributes).length > 0) {
    node[ORDERED_ATTRS_KEY] = Object.fromEntries(
      Object.entries(attributes).map(([key, value]) => [`${ATTR_PREFIX}${key}`, toXmlText(value)])
    );
  }
  return node;
}

/**
 * Creates an ordered element holding only text.
 */
export function createTextElement(tag: string, text: string, attributes: Record<string, string> = {}): OrderedXmlNode {
  return createElement(tag, attributes, [{ '#text': toXmlText(text) }]);
}

/**
 * Returns the text content of an ordered element.
 */
export function textOf(node: OrderedXmlNode): string {
  return childrenOf(node)
    .map((child) => child['#text'])
    .filter((text): text is string => typeof text === 'string')
    .join('');
}

/**
 * Gets the root element of a parsed part (skipping the declaration).
 *
 * @throws Error when the part has no element with the expected tag
 */
export function rootElement(nodes: OrderedXmlOutput, tag: string): OrderedXmlNode {
  const root = findElement(nodes, tag);
  if (!root) {
    throw new Error(`Missing root element <${tag}>`);
  }
  return root;
}
