/**
 * Size with width and height, in EMU unless noted otherwise.
 */
export interface Size {
  width: number;
  height: number;
}

/**
 * Rectangle with position and dimensions, in EMU.
 */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Crop insets as OpenXML percentages (100000 = 100%).
 */
export interface CropRect {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

/**
 * Splits a rectangle into two halves side by side.
 */
export function splitHorizontally(rect: Rect, gap: number = 0): [Rect, Rect] {
  const half = Math.floor((rect.width - gap) / 2);
  return [
    { x: rect.x, y: rect.y, width: half, height: rect.height },
    { x: rect.x + half + gap, y: rect.y, width: rect.width - half - gap, height: rect.height },
  ];
}

/**
 * Smallest rectangle covering all given rectangles.
 */
export function unionRects(rects: readonly Rect[]): Rect | undefined {
  if (rects.length === 0) return undefined;
  const left = Math.min(...rects.map((rect) => rect.x));
  const top = Math.min(...rects.map((rect) => rect.y));
  const right = Math.max(...rects.map((rect) => rect.x + rect.width));
  const bottom = Math.max(...rects.map((rect) => rect.y + rect.height));
  return { x: left, y: top, width: right - left, height: bottom - top };
}
