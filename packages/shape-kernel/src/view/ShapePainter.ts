import type { Rect } from "../math/types.js";
import type { ShapeGeometry } from "../model/geometry.js";
import type { ShapeStyle } from "../model/style.js";

/**
 * Pixel output, supplied by the host. Per redraw the editor calls `paint`
 * once per entity in z-order, `paintSelectionBounds` right after each
 * selected entity, then `paint` for the staging preview if there is one.
 */
export interface ShapePainter {
  clear?(): void;
  paint(geometry: ShapeGeometry, style: ShapeStyle, selected: boolean): void;
  paintSelectionBounds(bounds: Rect): void;
}
