import {
  EDITOR_COLORS,
  LINE_WIDTHS,
  rectangleCorners,
  type Point,
  type Rect,
  type ShapeGeometry,
  type ShapePainter,
  type ShapeStyle
} from "@sketchpad/shape-kernel";

export type CanvasPaint = string | object;

/**
 * The subset of `CanvasRenderingContext2D` the painter uses. A browser
 * context satisfies it as is.
 */
export interface Canvas2DContext {
  lineWidth: number;
  strokeStyle: CanvasPaint;
  fillStyle: CanvasPaint;

  save(): void;
  restore(): void;
  setLineDash(segments: number[]): void;

  beginPath(): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  closePath(): void;
  rect(x: number, y: number, width: number, height: number): void;
  arc(x: number, y: number, radius: number, startAngle: number, endAngle: number, counterclockwise?: boolean): void;

  fill(fillRule?: "nonzero" | "evenodd"): void;
  stroke(): void;
  clearRect(x: number, y: number, width: number, height: number): void;
  fillRect(x: number, y: number, width: number, height: number): void;
}

export type PainterError = {
  message: string;
  cause: unknown;
};

export type Canvas2DPainterOptions = {
  width: number;
  height: number;
  backgroundColor?: string;
  /** Receives paint failures. Without it they are thrown. */
  onError?: (error: PainterError) => void;
};

const SELECTION_DASH = [4, 4];

export class Canvas2DShapePainter implements ShapePainter {
  private width: number;
  private height: number;

  constructor(
    private readonly ctx: Canvas2DContext,
    private readonly options: Canvas2DPainterOptions,
  ) {
    this.width = options.width;
    this.height = options.height;
  }

  resize(width: number, height: number): void {
    this.width = Math.max(0, width);
    this.height = Math.max(0, height);
  }

  clear(): void {
    const ctx = this.ctx;
    ctx.clearRect(0, 0, this.width, this.height);
    const bg = this.options.backgroundColor;
    if (bg) {
      ctx.save();
      ctx.fillStyle = bg;
      ctx.fillRect(0, 0, this.width, this.height);
      ctx.restore();
    }
  }

  /** Selection is shown by `paintSelectionBounds`, so the shape itself is drawn the same either way. */
  paint(geometry: ShapeGeometry, style: ShapeStyle): void {
    const ctx = this.ctx;
    ctx.save();
    try {
      ctx.lineWidth = style.strokeWidth;
      ctx.strokeStyle = style.outlineColor;
      ctx.fillStyle = style.fillColor;
      ctx.setLineDash([]);

      this.tracePath(geometry);
      if (style.filled && this.isFillable(geometry)) ctx.fill("nonzero");
      ctx.stroke();
    } catch (cause) {
      this.report(`Painting ${geometry.kind} failed`, cause);
    } finally {
      ctx.restore();
    }
  }

  paintSelectionBounds(bounds: Rect): void {
    const ctx = this.ctx;
    ctx.save();
    try {
      ctx.lineWidth = LINE_WIDTHS.SELECTION_OUTLINE;
      ctx.strokeStyle = EDITOR_COLORS.SELECTION_BOUNDS;
      ctx.setLineDash(SELECTION_DASH);
      ctx.beginPath();
      ctx.rect(bounds.x, bounds.y, bounds.width, bounds.height);
      ctx.stroke();
    } catch (cause) {
      this.report("Painting selection bounds failed", cause);
    } finally {
      ctx.restore();
    }
  }

  private isFillable(geometry: ShapeGeometry): boolean {
    return geometry.kind !== "path" || geometry.closed;
  }

  private tracePath(geometry: ShapeGeometry): void {
    const ctx = this.ctx;
    ctx.beginPath();
    switch (geometry.kind) {
      case "circle":
        ctx.arc(geometry.center.x, geometry.center.y, geometry.radius, 0, Math.PI * 2, false);
        return;
      case "rectangle":
        if (geometry.rotation === 0) {
          ctx.rect(geometry.x, geometry.y, geometry.width, geometry.height);
          return;
        }
        this.tracePolyline(rectangleCorners(geometry), true);
        return;
      case "path":
        this.tracePolyline(geometry.points, geometry.closed);
        return;
    }
  }

  private tracePolyline(points: readonly Point[], closed: boolean): void {
    const ctx = this.ctx;
    points.forEach((p, i) => {
      if (i === 0) ctx.moveTo(p.x, p.y);
      else ctx.lineTo(p.x, p.y);
    });
    if (closed) ctx.closePath();
  }

  private report(message: string, cause: unknown): void {
    if (!this.options.onError) throw new Error(message, { cause });
    this.options.onError({ message, cause });
  }
}
