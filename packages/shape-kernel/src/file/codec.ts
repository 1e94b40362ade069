import { z } from "zod";
import { InvalidGeometryError, ShapeParseError } from "../errors.js";
import {
  closePath,
  createCircle,
  createPath,
  createRectangle,
  rectangleCorners,
  type RectangleGeometry,
  type ShapeGeometry
} from "../model/geometry.js";
import { normalizeHexColor, shapeStyleSchema, type ShapeStyle } from "../model/style.js";
import type { Point } from "../math/types.js";

export const SHAPE_RECORD_TYPES = ["CIRCLE", "RECTANGLE", "PATH"] as const;

export type ShapeRecordType = (typeof SHAPE_RECORD_TYPES)[number];

/** Flat, type-tagged form of a shape; only exists at the save/load boundary. */
export type ShapeRecord = {
  type: ShapeRecordType;
  params: number[];
  outlineColor: string;
  fillColor: string;
  filled: boolean;
  strokeWidth: number;
};

export type DecodedShape = {
  geometry: ShapeGeometry;
  style: ShapeStyle;
};

export type DecodeResult<T> = { ok: true; value: T } | { ok: false; error: ShapeParseError };

export type RecordFailure = {
  index: number;
  error: ShapeParseError;
};

export type DecodedDocument = {
  shapes: DecodedShape[];
  failures: RecordFailure[];
};

export const shapeRecordSchema = shapeStyleSchema.extend({
  type: z.string(),
  params: z.array(z.number())
});

const documentSchema = z.array(z.unknown());

const ROTATION_EPSILON = 1e-9;

function isAxisAligned(rect: RectangleGeometry): boolean {
  return rect.rotation < ROTATION_EPSILON || 360 - rect.rotation < ROTATION_EPSILON;
}

function flatten(points: readonly Point[]): number[] {
  const out: number[] = [];
  for (const p of points) out.push(p.x, p.y);
  return out;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(record)"}: ${issue.message}`).join("; ");
}

/**
 * Rectangles that have been rotated have no slot for their angle in the
 * record format and are written as a PATH through their four corners.
 */
export function encodeShape(geometry: ShapeGeometry, style: ShapeStyle): ShapeRecord {
  const base = {
    outlineColor: normalizeHexColor(style.outlineColor),
    fillColor: normalizeHexColor(style.fillColor),
    filled: style.filled,
    strokeWidth: style.strokeWidth
  };

  switch (geometry.kind) {
    case "circle":
      return { type: "CIRCLE", params: [geometry.center.x, geometry.center.y, geometry.radius], ...base };
    case "rectangle":
      if (isAxisAligned(geometry)) {
        return { type: "RECTANGLE", params: [geometry.x, geometry.y, geometry.width, geometry.height], ...base };
      }
      return { type: "PATH", params: flatten(rectangleCorners(geometry)), ...base };
    case "path":
      return { type: "PATH", params: flatten(closePath(geometry.points)), ...base };
  }
}

function geometryFromParams(type: string, params: readonly number[]): DecodeResult<ShapeGeometry> {
  const arityError = (expected: string) => ({
    ok: false as const,
    error: new ShapeParseError("BAD_ARITY", `${type} expects ${expected} params, got ${params.length}`)
  });

  try {
    switch (type) {
      case "CIRCLE": {
        if (params.length !== 3) return arityError("3");
        const [cx, cy, r] = params;
        return { ok: true, value: createCircle({ x: cx, y: cy }, r) };
      }
      case "RECTANGLE": {
        if (params.length !== 4) return arityError("4");
        const [x, y, w, h] = params;
        return { ok: true, value: createRectangle(x, y, w, h) };
      }
      case "PATH": {
        if (params.length < 4 || params.length % 2 !== 0) return arityError("an even number (at least 4) of");
        const points: Point[] = [];
        for (let i = 0; i < params.length; i += 2) {
          points.push({ x: params[i], y: params[i + 1] });
        }
        return { ok: true, value: createPath(points, true) };
      }
      default:
        return { ok: false, error: new ShapeParseError("UNKNOWN_TYPE", `unknown shape type "${type}"`) };
    }
  } catch (error) {
    if (error instanceof InvalidGeometryError) {
      return { ok: false, error: new ShapeParseError("INVALID_GEOMETRY", error.message, { cause: error }) };
    }
    throw error;
  }
}

export function decodeShape(input: unknown): DecodeResult<DecodedShape> {
  const parsed = shapeRecordSchema.safeParse(input);
  if (!parsed.success) {
    return { ok: false, error: new ShapeParseError("INVALID_RECORD", formatIssues(parsed.error)) };
  }

  const record = parsed.data;
  const geometry = geometryFromParams(record.type, record.params);
  if (!geometry.ok) return geometry;

  return {
    ok: true,
    value: {
      geometry: geometry.value,
      style: {
        outlineColor: record.outlineColor,
        fillColor: record.fillColor,
        filled: record.filled,
        strokeWidth: record.strokeWidth
      }
    }
  };
}

export function encodeDocument(records: readonly ShapeRecord[], options?: { pretty?: boolean }): string {
  return options?.pretty === false ? JSON.stringify(records) : JSON.stringify(records, null, 2);
}

/**
 * Document-level problems (not JSON, not an array) throw; a bad record only
 * fails itself and is reported with its index.
 */
export function decodeDocument(text: string): DecodedDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ShapeParseError("MALFORMED_JSON", "document is not valid JSON", { cause: error });
  }

  const list = documentSchema.safeParse(raw);
  if (!list.success) {
    throw new ShapeParseError("INVALID_DOCUMENT", "document must be a JSON array of shape records");
  }

  const shapes: DecodedShape[] = [];
  const failures: RecordFailure[] = [];
  list.data.forEach((item, index) => {
    const decoded = decodeShape(item);
    if (decoded.ok) shapes.push(decoded.value);
    else failures.push({ index, error: decoded.error });
  });
  return { shapes, failures };
}
