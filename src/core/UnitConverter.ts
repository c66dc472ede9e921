/**
 * ECMA-376 unit conversions.
 *
 * EMU (English Metric Unit) is the base unit used in OpenXML.
 * 1 inch = 914400 EMU
 */

/** Widescreen 16:9 slide width in EMU (13.333 inches) */
export const WIDESCREEN_SLIDE_WIDTH_EMU = 12192000;

/** Widescreen 16:9 slide height in EMU (7.5 inches) */
export const WIDESCREEN_SLIDE_HEIGHT_EMU = 6858000;

/** OpenXML percentage unit for 100% (`fontScale`, `srcRect`) */
export const PERCENTAGE_WHOLE = 100000;

/**
 * Converts points to font size (hundredths of point), as `a:rPr/@sz` takes it.
 */
export function pointsToFontSize(points: number): number {
  return Math.round(points * 100);
}

/**
 * Converts percentage (100000 = 100%) to decimal.
 */
export function percentageToDecimal(percentage: number): number {
  return percentage / PERCENTAGE_WHOLE;
}

/**
 * Converts a decimal (1 = 100%) to an OpenXML percentage.
 */
export function decimalToPercentage(decimal: number): number {
  return Math.round(decimal * PERCENTAGE_WHOLE);
}
