import { z } from "zod";

export type ShapeStyle = Readonly<{
  outlineColor: string;
  fillColor: string;
  filled: boolean;
  strokeWidth: number;
}>;

export type ShapeStylePatch = Partial<ShapeStyle>;

export const DEFAULT_SHAPE_STYLE: ShapeStyle = {
  outlineColor: "#000000",
  fillColor: "#ffffff",
  filled: false,
  strokeWidth: 2
};

const HEX_COLOR = /^#[0-9a-fA-F]{6}$/;

/** `#rrggbb`, any case on input, lowercase after parsing. */
export const hexColorSchema = z
  .string()
  .regex(HEX_COLOR, "expected a #rrggbb color")
  .transform((value) => value.toLowerCase());

export const strokeWidthSchema = z.number().int().positive();

export const shapeStyleSchema = z.object({
  outlineColor: hexColorSchema,
  fillColor: hexColorSchema,
  filled: z.boolean(),
  strokeWidth: strokeWidthSchema
});

export function normalizeHexColor(value: string): string {
  return value.toLowerCase();
}

export function applyStylePatch(style: ShapeStyle, patch: ShapeStylePatch): ShapeStyle {
  return {
    outlineColor: patch.outlineColor ?? style.outlineColor,
    fillColor: patch.fillColor ?? style.fillColor,
    filled: patch.filled ?? style.filled,
    strokeWidth: patch.strokeWidth ?? style.strokeWidth
  };
}
