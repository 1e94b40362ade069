import type { ShapeStyle } from "../model/style.js";

export const EDITOR_COLORS = {
  PREVIEW: "#808080",
  SELECTION_BOUNDS: "#ff0000"
};

export const LINE_WIDTHS = {
  SELECTION_OUTLINE: 1
};

/** Outline-only gray for the shape a tool is still staging, at the width it will be committed with. */
export function previewStyle(strokeWidth: number): ShapeStyle {
  return {
    outlineColor: EDITOR_COLORS.PREVIEW,
    fillColor: EDITOR_COLORS.PREVIEW,
    filled: false,
    strokeWidth
  };
}
