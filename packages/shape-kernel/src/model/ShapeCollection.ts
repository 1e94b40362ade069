import { DocumentIOError } from "../errors.js";
import { decodeDocument, encodeDocument, type RecordFailure, type ShapeRecord } from "../file/codec.js";
import type { DocumentSink, DocumentSource } from "../file/document.js";
import type { Point } from "../math/types.js";
import { createCircle, createPath, createRectangle, type ShapeGeometry } from "./geometry.js";
import { ShapeEntity } from "./ShapeEntity.js";
import type { ShapeStyle } from "./style.js";

export type LoadReport = {
  loaded: number;
  failures: RecordFailure[];
};

/**
 * Ordered shape registry. Insertion order is z-order: the last entity is
 * drawn on top and hit-tested first.
 */
export class ShapeCollection {
  private shapes: ShapeEntity[] = [];

  get size(): number {
    return this.shapes.length;
  }

  all(): readonly ShapeEntity[] {
    return this.shapes;
  }

  get(id: string): ShapeEntity | undefined {
    return this.shapes.find((s) => s.id === id);
  }

  has(id: string): boolean {
    return this.shapes.some((s) => s.id === id);
  }

  selected(): ShapeEntity[] {
    return this.shapes.filter((s) => s.selected);
  }

  add(geometry: ShapeGeometry, style: ShapeStyle): ShapeEntity {
    const entity = new ShapeEntity(geometry, { ...style });
    this.shapes.push(entity);
    return entity;
  }

  addCircle(cx: number, cy: number, radius: number, style: ShapeStyle): ShapeEntity {
    return this.add(createCircle({ x: cx, y: cy }, radius), style);
  }

  addRectangle(x: number, y: number, width: number, height: number, style: ShapeStyle): ShapeEntity {
    return this.add(createRectangle(x, y, width, height), style);
  }

  addPath(vertices: readonly Point[], style: ShapeStyle): ShapeEntity {
    return this.add(createPath(vertices, true), style);
  }

  /** Entities whose geometry contains `p`, topmost first. */
  hitTest(p: Point): ShapeEntity[] {
    const hits: ShapeEntity[] = [];
    for (let i = this.shapes.length - 1; i >= 0; i--) {
      const shape = this.shapes[i];
      if (shape.contains(p)) hits.push(shape);
    }
    return hits;
  }

  /** Clears every selection, then selects the given ids. */
  selectOnly(ids: readonly string[]): void {
    const wanted = new Set(ids);
    for (const s of this.shapes) s.setSelected(wanted.has(s.id));
  }

  deselectAll(): void {
    for (const s of this.shapes) s.setSelected(false);
  }

  /** Removes every selected entity; survivors keep their relative order. */
  deleteSelected(): string[] {
    const removed = this.shapes.filter((s) => s.selected).map((s) => s.id);
    if (removed.length > 0) {
      this.shapes = this.shapes.filter((s) => !s.selected);
    }
    return removed;
  }

  clear(): string[] {
    const removed = this.shapes.map((s) => s.id);
    this.shapes = [];
    return removed;
  }

  toRecords(): ShapeRecord[] {
    return this.shapes.map((s) => s.toRecord());
  }

  saveTo(sink: DocumentSink, options?: { pretty?: boolean }): void {
    const text = encodeDocument(this.toRecords(), options);
    try {
      sink.write(text);
    } catch (error) {
      if (error instanceof DocumentIOError) throw error;
      throw new DocumentIOError("WRITE_FAILED", "Cannot write document", { cause: error });
    }
  }

  /**
   * Replaces the whole collection. The replacement is built aside and swapped
   * in only once the document has been read and parsed; records that fail to
   * decode are skipped and reported.
   */
  loadFrom(source: DocumentSource): LoadReport {
    let text: string;
    try {
      text = source.read();
    } catch (error) {
      if (error instanceof DocumentIOError) throw error;
      throw new DocumentIOError("READ_FAILED", "Cannot read document", { cause: error });
    }

    const decoded = decodeDocument(text);
    const next = decoded.shapes.map((s) => new ShapeEntity(s.geometry, s.style));
    this.shapes = next;
    return { loaded: next.length, failures: decoded.failures };
  }
}
