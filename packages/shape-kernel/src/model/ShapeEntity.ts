import { createId } from "@sketchpad/utils";
import { decodeShape, encodeShape, type DecodeResult, type ShapeRecord } from "../file/codec.js";
import type { Point, Rect, Transform2D } from "../math/types.js";
import { boundingBox, containsPoint, transformGeometry, type ShapeGeometry, type ShapeKind } from "./geometry.js";
import { applyStylePatch, type ShapeStyle, type ShapeStylePatch } from "./style.js";

/**
 * A drawable shape: geometry plus style plus selection flag.
 *
 * Transforms are destructive. `applyTransform` replaces the geometry with the
 * baked result, so repeated small transforms accumulate floating-point drift.
 */
export class ShapeEntity {
  readonly id: string;
  private _geometry: ShapeGeometry;
  private _style: ShapeStyle;
  private _selected = false;

  constructor(geometry: ShapeGeometry, style: ShapeStyle, id: string = createId(geometry.kind)) {
    this.id = id;
    this._geometry = geometry;
    this._style = style;
  }

  static fromRecord(record: unknown, id?: string): DecodeResult<ShapeEntity> {
    const decoded = decodeShape(record);
    if (!decoded.ok) return decoded;
    return { ok: true, value: new ShapeEntity(decoded.value.geometry, decoded.value.style, id) };
  }

  get kind(): ShapeKind {
    return this._geometry.kind;
  }

  get geometry(): ShapeGeometry {
    return this._geometry;
  }

  get style(): ShapeStyle {
    return this._style;
  }

  get selected(): boolean {
    return this._selected;
  }

  setSelected(selected: boolean): void {
    this._selected = selected;
  }

  setStyle(patch: ShapeStylePatch): void {
    this._style = applyStylePatch(this._style, patch);
  }

  replaceStyle(style: ShapeStyle): void {
    this._style = { ...style };
  }

  applyTransform(m: Transform2D): void {
    this._geometry = transformGeometry(this._geometry, m);
  }

  contains(p: Point): boolean {
    return containsPoint(this._geometry, p);
  }

  bounds(): Rect {
    return boundingBox(this._geometry);
  }

  toRecord(): ShapeRecord {
    return encodeShape(this._geometry, this._style);
  }
}
