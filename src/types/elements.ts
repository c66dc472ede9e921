/**
 * Placeholder types defined by ECMA-376 (ST_PlaceholderType).
 * An untyped `p:ph` element is an `obj` placeholder.
 */
export type PlaceholderType =
  | 'title'
  | 'body'
  | 'ctrTitle'
  | 'subTitle'
  | 'dt'
  | 'ftr'
  | 'sldNum'
  | 'hdr'
  | 'obj'
  | 'chart'
  | 'tbl'
  | 'clipArt'
  | 'dgm'
  | 'media'
  | 'sldImg'
  | 'pic';

const PLACEHOLDER_TYPES: ReadonlySet<string> = new Set<PlaceholderType>([
  'title', 'body', 'ctrTitle', 'subTitle', 'dt', 'ftr', 'sldNum', 'hdr',
  'obj', 'chart', 'tbl', 'clipArt', 'dgm', 'media', 'sldImg', 'pic',
]);

/**
 * Narrows a raw `type` attribute to a placeholder type.
 */
export function isPlaceholderType(value: string): value is PlaceholderType {
  return PLACEHOLDER_TYPES.has(value);
}

/**
 * Placeholder reference found on a shape's `p:nvPr/p:ph` element.
 */
export interface PlaceholderReference {
  /** Placeholder type (`obj` when the attribute is absent) */
  type: PlaceholderType;
  /** Placeholder index */
  idx?: number;
  /** Whether the layout defines a custom prompt */
  hasCustomPrompt?: boolean;
}
