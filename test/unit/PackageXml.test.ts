import { describe, it, expect } from 'vitest';
import {
  attributesOf,
  buildOrderedXml,
  childrenOf,
  createElement,
  createTextElement,
  findElement,
  parseXmlPreservingOrder,
  rootElement,
  tagOf,
  textOf,
  toXmlText,
} from '../../src/core/PackageXml.js';

describe('PackageXml', () => {
  describe('parseXmlPreservingOrder', () => {
    it('should maintain interleaved element order', () => {
      const xml = `
        <parent>
          <a:moveTo><a:pt x="0" y="0"/></a:moveTo>
          <a:lnTo><a:pt x="100" y="0"/></a:lnTo>
          <a:moveTo><a:pt x="50" y="50"/></a:moveTo>
        </parent>
      `;

      const parent = rootElement(parseXmlPreservingOrder(xml), 'parent');
      const tags = childrenOf(parent).map(tagOf);

      expect(tags).toEqual(['a:moveTo', 'a:lnTo', 'a:moveTo']);
    });

    it('should expose attributes without prefix', () => {
      const [node] = parseXmlPreservingOrder('<a:off x="10" y="20"/>');

      expect(node).toBeDefined();
      expect(node && attributesOf(node)).toEqual({ x: '10', y: '20' });
    });

    it('should keep attribute values as strings', () => {
      const [node] = parseXmlPreservingOrder('<p:sldId id="256" r:id="rId2"/>');

      expect(node && attributesOf(node)['id']).toBe('256');
    });

    it('should read text content', () => {
      const [node] = parseXmlPreservingOrder('<a:t>Hello</a:t>');

      expect(node && textOf(node)).toBe('Hello');
    });
  });

  describe('childrenOf', () => {
    it('should give a self-closing element a mutable children array', () => {
      const [list] = parseXmlPreservingOrder('<p:sldIdLst/>');
      expect(list).toBeDefined();
      if (!list) return;

      childrenOf(list).push(createElement('p:sldId', { id: '256' }));

      expect(buildOrderedXml([list])).toBe('<p:sldIdLst><p:sldId id="256"/></p:sldIdLst>');
    });
  });

  describe('findElement', () => {
    it('should find the first sibling with a tag', () => {
      const nodes = [createTextElement('a', '1'), createTextElement('b', '2'), createTextElement('a', '3')];

      const found = findElement(nodes, 'a');

      expect(found && textOf(found)).toBe('1');
    });

    it('should return undefined when no sibling matches', () => {
      expect(findElement([createElement('a')], 'b')).toBeUndefined();
    });
  });

  describe('rootElement', () => {
    it('should skip the XML declaration', () => {
      const nodes = parseXmlPreservingOrder('<?xml version="1.0"?><Types><Default Extension="xml"/></Types>');

      expect(tagOf(rootElement(nodes, 'Types'))).toBe('Types');
    });

    it('should throw when the root is missing', () => {
      expect(() => rootElement([], 'Types')).toThrow('Missing root element <Types>');
    });
  });

  describe('buildOrderedXml', () => {
    it('should serialize created elements in order', () => {
      const node = createElement('a:xfrm', {}, [
        createElement('a:off', { x: '1', y: '2' }),
        createElement('a:ext', { cx: '3', cy: '4' }),
      ]);

      expect(buildOrderedXml([node])).toBe('<a:xfrm><a:off x="1" y="2"/><a:ext cx="3" cy="4"/></a:xfrm>');
    });

    it('should escape text content', () => {
      expect(buildOrderedXml([createTextElement('a:t', 'R&D <draft>')])).toBe('<a:t>R&amp;D &lt;draft&gt;</a:t>');
    });

    it('should escape characters XML does not allow', () => {
      expect(buildOrderedXml([createTextElement('c:v', 'bell\u0007 esc\u001b')])).toBe('<c:v>bell_x0007_ esc_x001B_</c:v>');
    });

    it('should escape attribute values', () => {
      expect(buildOrderedXml([createElement('p:cNvPr', { name: 'Tab\u000bStop' })])).toBe('<p:cNvPr name="Tab_x000B_Stop"/>');
    });

    it('should round-trip a parsed part', () => {
      const xml = '<p:sld><p:cSld><p:spTree><p:sp/><p:pic/><p:sp/></p:spTree></p:cSld></p:sld>';

      expect(buildOrderedXml(parseXmlPreservingOrder(xml))).toBe(xml);
    });
  });
});

describe('toXmlText', () => {
  it('should keep tabs, line breaks and surrogate pairs', () => {
    expect(toXmlText('a\tb\r\nc \u{1F680}')).toBe('a\tb\r\nc \u{1F680}');
  });

  it('should drop unpaired surrogates', () => {
    expect(toXmlText('x\uD83Dy\uDE80z')).toBe('xyz');
  });

  it('should escape non-characters', () => {
    expect(toXmlText('\uFFFE')).toBe('_xFFFE_');
  });
});
