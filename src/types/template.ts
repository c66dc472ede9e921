import type { SlideKind } from './deck.js';
import type { PlaceholderType } from './elements.js';
import type { Rect, Size } from './geometry.js';

/**
 * Semantic roles a layout placeholder can be assigned at catalog build time.
 */
export type PlaceholderRole =
  | 'title'
  | 'body'
  | 'picture'
  | 'table'
  | 'chart'
  | 'column-left'
  | 'column-right';

/**
 * Fixed table grid carried by a template table placeholder.
 */
export interface TableGrid {
  readonly rows: number;
  readonly columns: number;
}

/**
 * A placeholder of a layout, classified by role.
 */
export interface PlaceholderSlot {
  readonly role: PlaceholderRole;
  /** Placeholder type as declared on the layout shape */
  readonly type: PlaceholderType;
  /** Placeholder index, needed to bind slide shapes to the layout shape */
  readonly idx?: number;
  /** Bounds in EMU, inherited from the master when the layout omits them */
  readonly bounds: Rect;
  /** Present when the layout shape already defines a table grid */
  readonly fixedGrid?: TableGrid;
}

/**
 * A classified template layout.
 */
export interface LayoutHandle {
  readonly kind: SlideKind;
  /** Layout part path inside the package, e.g. `ppt/slideLayouts/slideLayout2.xml` */
  readonly layoutId: string;
  /** Layout name as written in the template */
  readonly name: string;
  /** Roles in the order their placeholders appear on the layout */
  readonly roles: readonly PlaceholderRole[];
  /** Slot per role; roles the layout lacks are absent */
  readonly slots: Readonly<Partial<Record<PlaceholderRole, PlaceholderSlot>>>;
}

/**
 * Layout chosen for one slide.
 */
export interface ResolvedLayout {
  readonly layout: LayoutHandle;
  /** True when the slide's own kind had no layout and ContentOnly was used */
  readonly degraded: boolean;
}

/**
 * Read-only view of a template catalog.
 */
export interface LayoutCatalog {
  readonly slideSize: Size;
  resolve(kind: SlideKind): LayoutHandle | undefined;
  kinds(): readonly SlideKind[];
}
