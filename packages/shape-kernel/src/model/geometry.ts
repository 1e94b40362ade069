import { Box2, Vec2, ringContainsPoint } from "@sketchpad/geometry";
import { InvalidGeometryError } from "../errors.js";
import { rectFromBox } from "../math/rect.js";
import { degToRad, normalizeDegrees } from "../math/scalar.js";
import { applyTransformToPoint, decomposeSimilarity } from "../math/transform.js";
import type { Point, Rect, Transform2D } from "../math/types.js";

export type CircleGeometry = {
  kind: "circle";
  center: Point;
  radius: number;
};

/**
 * `x, y, width, height` describe the unrotated rectangle; `rotation` (degrees,
 * clockwise on screen) turns it about its own center.
 */
export type RectangleGeometry = {
  kind: "rectangle";
  x: number;
  y: number;
  width: number;
  height: number;
  rotation: number;
};

/**
 * A committed path is always `closed`: the edge from the last vertex back to
 * the first is part of its outline, fill and hit region. Open paths only
 * exist while the path tool is still collecting vertices.
 */
export type PathGeometry = {
  kind: "path";
  points: Point[];
  closed: boolean;
};

export type ShapeGeometry = CircleGeometry | RectangleGeometry | PathGeometry;

export type ShapeKind = ShapeGeometry["kind"];

function assertFinite(label: string, ...values: number[]): void {
  for (const v of values) {
    if (!Number.isFinite(v)) throw new InvalidGeometryError(`${label} must be finite, got ${v}`);
  }
}

export function createCircle(center: Point, radius: number): CircleGeometry {
  assertFinite("circle", center.x, center.y, radius);
  if (radius < 0) throw new InvalidGeometryError(`circle radius must not be negative, got ${radius}`);
  return { kind: "circle", center: { x: center.x, y: center.y }, radius };
}

export function createRectangle(x: number, y: number, width: number, height: number, rotation = 0): RectangleGeometry {
  assertFinite("rectangle", x, y, width, height, rotation);
  if (width < 0 || height < 0) {
    throw new InvalidGeometryError(`rectangle size must not be negative, got ${width}x${height}`);
  }
  return { kind: "rectangle", x, y, width, height, rotation: normalizeDegrees(rotation) };
}

export function createPath(points: readonly Point[], closed = true): PathGeometry {
  if (points.length === 0) throw new InvalidGeometryError("path needs at least one vertex");
  for (const p of points) assertFinite("path vertex", p.x, p.y);
  const copy = points.map((p) => ({ x: p.x, y: p.y }));
  return { kind: "path", points: closed ? closePath(copy) : copy, closed };
}

/**
 * Closing makes the first→last edge implicit, so a trailing vertex that
 * repeats the first one is dropped (as long as two vertices remain).
 */
export function closePath(points: readonly Point[]): Point[] {
  const out = points.map((p) => ({ x: p.x, y: p.y }));
  if (out.length > 2 && Vec2.equals(out[0], out[out.length - 1])) {
    out.pop();
  }
  return out;
}

export function rectangleCenter(rect: RectangleGeometry): Point {
  return { x: rect.x + rect.width / 2, y: rect.y + rect.height / 2 };
}

/** Corners in outline order, rotation applied. */
export function rectangleCorners(rect: RectangleGeometry): Point[] {
  const corners = [
    { x: rect.x, y: rect.y },
    { x: rect.x + rect.width, y: rect.y },
    { x: rect.x + rect.width, y: rect.y + rect.height },
    { x: rect.x, y: rect.y + rect.height }
  ];
  if (rect.rotation === 0) return corners;
  const center = rectangleCenter(rect);
  const rad = degToRad(rect.rotation);
  return corners.map((p) => Vec2.rotateAround(p, center, rad));
}

export function containsPoint(geometry: ShapeGeometry, p: Point): boolean {
  switch (geometry.kind) {
    case "circle":
      return Vec2.dist(geometry.center, p) <= geometry.radius;
    case "rectangle": {
      const local =
        geometry.rotation === 0
          ? p
          : Vec2.rotateAround(p, rectangleCenter(geometry), -degToRad(geometry.rotation));
      return (
        local.x >= geometry.x &&
        local.x <= geometry.x + geometry.width &&
        local.y >= geometry.y &&
        local.y <= geometry.y + geometry.height
      );
    }
    case "path":
      return ringContainsPoint(geometry.points, p, "nonzero");
  }
}

export function boundingBox(geometry: ShapeGeometry): Rect {
  switch (geometry.kind) {
    case "circle":
      return rectFromBox(Box2.fromCenter(geometry.center, geometry.radius, geometry.radius));
    case "rectangle":
      if (geometry.rotation === 0) {
        return { x: geometry.x, y: geometry.y, width: geometry.width, height: geometry.height };
      }
      return rectFromBox(Box2.create(rectangleCorners(geometry)));
    case "path":
      return rectFromBox(Box2.create(geometry.points));
  }
}

/**
 * Bakes `m` into a new geometry of the same kind. Only similarities (uniform
 * scale, rotation, translation) are accepted so circles stay circles.
 */
export function transformGeometry<T extends ShapeGeometry>(geometry: T, m: Transform2D): T;
export function transformGeometry(geometry: ShapeGeometry, m: Transform2D): ShapeGeometry {
  const parts = decomposeSimilarity(m);
  if (!parts) {
    throw new InvalidGeometryError("only uniform scale, rotation and translation can be applied to a shape");
  }

  switch (geometry.kind) {
    case "circle":
      return createCircle(applyTransformToPoint(m, geometry.center), geometry.radius * parts.scale);
    case "rectangle": {
      const center = applyTransformToPoint(m, rectangleCenter(geometry));
      const width = geometry.width * parts.scale;
      const height = geometry.height * parts.scale;
      return createRectangle(
        center.x - width / 2,
        center.y - height / 2,
        width,
        height,
        geometry.rotation + parts.rotationDeg,
      );
    }
    case "path":
      return {
        kind: "path",
        points: geometry.points.map((p) => applyTransformToPoint(m, p)),
        closed: geometry.closed
      };
  }
}
