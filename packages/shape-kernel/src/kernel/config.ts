import { z } from "zod";
import {
  DEFAULT_SHAPE_STYLE,
  shapeStyleSchema,
  type ShapeStyle
} from "../model/style.js";
import { TOOL_TYPES } from "../tools/Tool.js";
import { DEFAULT_KEYMAP, type KeyBinding } from "./keymap.js";

export type EditorConfig = {
  /** Degrees per rotate key press; positive turns clockwise. */
  rotationStepDeg: number;
  /** Scale factor per wheel notch turned away from the user; the other way divides. */
  wheelScaleFactor: number;
  defaultStyle: ShapeStyle;
  keymap: readonly KeyBinding[];
};

export const DEFAULT_EDITOR_CONFIG: EditorConfig = {
  rotationStepDeg: 15,
  wheelScaleFactor: 1.1,
  defaultStyle: DEFAULT_SHAPE_STYLE,
  keymap: DEFAULT_KEYMAP
};

const keyBindingSchema = z.object({
  key: z.string().min(1),
  command: z.enum(["ROTATE.CW", "ROTATE.CCW", "EDIT.DELETE", "TOOL.COMMIT", "TOOL.CANCEL", "UI.TOOL"]),
  tool: z.enum(TOOL_TYPES).optional()
});

export const editorConfigOverridesSchema = z
  .object({
    rotationStepDeg: z.number().finite().refine((v) => v !== 0, "must not be zero"),
    wheelScaleFactor: z.number().finite().gt(1),
    defaultStyle: shapeStyleSchema.partial(),
    keymap: z.array(keyBindingSchema)
  })
  .partial();

export type EditorConfigOverrides = z.input<typeof editorConfigOverridesSchema>;

/** Merges validated overrides onto the defaults. Invalid overrides throw a `ZodError`. */
export function resolveEditorConfig(overrides: EditorConfigOverrides = {}): EditorConfig {
  const parsed = editorConfigOverridesSchema.parse(overrides);
  return {
    rotationStepDeg: parsed.rotationStepDeg ?? DEFAULT_EDITOR_CONFIG.rotationStepDeg,
    wheelScaleFactor: parsed.wheelScaleFactor ?? DEFAULT_EDITOR_CONFIG.wheelScaleFactor,
    defaultStyle: { ...DEFAULT_EDITOR_CONFIG.defaultStyle, ...parsed.defaultStyle },
    keymap: parsed.keymap ?? DEFAULT_EDITOR_CONFIG.keymap
  };
}
