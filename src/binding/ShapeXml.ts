/**
 * PresentationML shape skeletons shared by the binders.
 */

import { createElement, type OrderedXmlNode, type OrderedXmlOutput } from '../core/PackageXml.js';
import { NAMESPACES } from '../core/constants.js';
import type { PlaceholderSlot, Rect } from '../types/index.js';

/**
 * Where a binder puts a shape: into a layout placeholder, optionally moved,
 * or as a free shape.
 */
export interface ShapeTarget {
  /** Placeholder the shape binds to; absent for free shapes */
  slot?: PlaceholderSlot;
  bounds: Rect;
  /** Write `bounds` on a placeholder shape instead of inheriting the layout's */
  overrideBounds?: boolean;
}

/**
 * Targets a placeholder at its layout position.
 */
export function placeholderTarget(slot: PlaceholderSlot): ShapeTarget {
  return { slot, bounds: slot.bounds };
}

/**
 * Builds an `a:xfrm` (or `p:xfrm` for graphic frames).
 */
export function buildTransform(bounds: Rect, tag: 'a:xfrm' | 'p:xfrm' = 'a:xfrm'): OrderedXmlNode {
  return createElement(tag, {}, [
    createElement('a:off', { x: String(Math.round(bounds.x)), y: String(Math.round(bounds.y)) }),
    createElement('a:ext', { cx: String(Math.round(bounds.width)), cy: String(Math.round(bounds.height)) }),
  ]);
}

/**
 * Builds `p:nvPr`, with a `p:ph` reference when the shape fills a placeholder.
 */
function buildApplicationProperties(slot: PlaceholderSlot | undefined): OrderedXmlNode {
  if (!slot) {
    return createElement('p:nvPr');
  }
  const attributes: Record<string, string> = {};
  if (slot.type !== 'obj') attributes['type'] = slot.type;
  if (slot.idx !== undefined) attributes['idx'] = String(slot.idx);
  return createElement('p:nvPr', {}, [createElement('p:ph', attributes)]);
}

function buildShapeProperties(target: ShapeTarget, forceTransform: boolean): OrderedXmlNode {
  const children: OrderedXmlOutput = [];
  if (!target.slot || target.overrideBounds || forceTransform) {
    children.push(buildTransform(target.bounds));
  }
  if (!target.slot) {
    children.push(createElement('a:prstGeom', { prst: 'rect' }, [createElement('a:avLst')]));
  }
  return createElement('p:spPr', {}, children);
}

/**
 * Builds a text shape (`p:sp`) around a text body.
 */
export function buildTextShape(id: number, name: string, target: ShapeTarget, textBody: OrderedXmlNode): OrderedXmlNode {
  const shapeLocks = target.slot
    ? [createElement('a:spLocks', { noGrp: '1' })]
    : [];
  return createElement('p:sp', {}, [
    createElement('p:nvSpPr', {}, [
      createElement('p:cNvPr', { id: String(id), name }),
      createElement('p:cNvSpPr', target.slot ? {} : { txBox: '1' }, shapeLocks),
      buildApplicationProperties(target.slot),
    ]),
    buildShapeProperties(target, false),
    textBody,
  ]);
}

/**
 * Builds a picture (`p:pic`) showing an embedded image.
 */
export function buildPicture(id: number, name: string, target: ShapeTarget, relId: string, sourceRect: OrderedXmlNode): OrderedXmlNode {
  return createElement('p:pic', {}, [
    createElement('p:nvPicPr', {}, [
      createElement('p:cNvPr', { id: String(id), name }),
      createElement('p:cNvPicPr', {}, [createElement('a:picLocks', { noGrp: '1', noChangeAspect: '1' })]),
      buildApplicationProperties(target.slot),
    ]),
    createElement('p:blipFill', {}, [
      createElement('a:blip', { 'r:embed': relId }),
      sourceRect,
      createElement('a:stretch', {}, [createElement('a:fillRect')]),
    ]),
    createElement('p:spPr', {}, [
      buildTransform(target.bounds),
      createElement('a:prstGeom', { prst: 'rect' }, [createElement('a:avLst')]),
    ]),
  ]);
}

/**
 * Builds a graphic frame (`p:graphicFrame`) around table or chart data.
 */
export function buildGraphicFrame(
  id: number,
  name: string,
  target: ShapeTarget,
  uri: string,
  content: OrderedXmlNode
): OrderedXmlNode {
  return createElement('p:graphicFrame', {}, [
    createElement('p:nvGraphicFramePr', {}, [
      createElement('p:cNvPr', { id: String(id), name }),
      createElement('p:cNvGraphicFramePr', {}, [createElement('a:graphicFrameLocks', { noGrp: '1' })]),
      buildApplicationProperties(target.slot),
    ]),
    buildTransform(target.bounds, 'p:xfrm'),
    createElement('a:graphic', {}, [createElement('a:graphicData', { uri }, [content])]),
  ]);
}

/**
 * Wraps shapes in a slide (`p:sld`) element.
 */
export function buildSlideElement(shapes: OrderedXmlOutput): OrderedXmlNode {
  const zero = { x: '0', y: '0' };
  const empty = { cx: '0', cy: '0' };
  return createElement(
    'p:sld',
    { 'xmlns:a': NAMESPACES.a, 'xmlns:r': NAMESPACES.r, 'xmlns:p': NAMESPACES.p },
    [
      createElement('p:cSld', {}, [
        createElement('p:spTree', {}, [
          createElement('p:nvGrpSpPr', {}, [
            createElement('p:cNvPr', { id: '1', name: '' }),
            createElement('p:cNvGrpSpPr'),
            createElement('p:nvPr'),
          ]),
          createElement('p:grpSpPr', {}, [
            createElement('a:xfrm', {}, [
              createElement('a:off', zero),
              createElement('a:ext', empty),
              createElement('a:chOff', zero),
              createElement('a:chExt', empty),
            ]),
          ]),
          ...shapes,
        ]),
      ]),
      createElement('p:clrMapOvr', {}, [createElement('a:masterClrMapping')]),
    ]
  );
}
