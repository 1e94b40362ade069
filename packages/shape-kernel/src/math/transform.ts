import type { Point, Transform2D } from "./types.js";
import { degToRad, nearlyEqual, radToDeg } from "./scalar.js";

export function translationTransform(tx: number, ty: number): Transform2D {
  return { a: 1, b: 0, c: 0, d: 1, e: tx, f: ty };
}

export function scaleTransform(sx: number, sy: number = sx): Transform2D {
  return { a: sx, b: 0, c: 0, d: sy, e: 0, f: 0 };
}

/**
 * Rotation by `angleDeg`. With y pointing down (screen space) a positive
 * angle turns clockwise.
 */
export function rotationTransform(angleDeg: number): Transform2D {
  const rad = degToRad(angleDeg);
  const cos = Math.cos(rad);
  const sin = Math.sin(rad);
  return { a: cos, b: sin, c: -sin, d: cos, e: 0, f: 0 };
}

export function multiplyTransform(a: Transform2D, b: Transform2D): Transform2D {
  return {
    a: a.a * b.a + a.c * b.b,
    b: a.b * b.a + a.d * b.b,
    c: a.a * b.c + a.c * b.d,
    d: a.b * b.c + a.d * b.d,
    e: a.a * b.e + a.c * b.f + a.e,
    f: a.b * b.e + a.d * b.f + a.f
  };
}

export function applyTransformToPoint(m: Transform2D, p: Point): Point {
  return {
    x: m.a * p.x + m.c * p.y + m.e,
    y: m.b * p.x + m.d * p.y + m.f
  };
}

/** translate(center) · rotate(angle) · translate(-center) */
export function rotateAroundTransform(center: Point, angleDeg: number): Transform2D {
  return multiplyTransform(
    translationTransform(center.x, center.y),
    multiplyTransform(rotationTransform(angleDeg), translationTransform(-center.x, -center.y)),
  );
}

/** translate(center) · scale(factor) · translate(-center) */
export function scaleAroundTransform(center: Point, factor: number): Transform2D {
  return multiplyTransform(
    translationTransform(center.x, center.y),
    multiplyTransform(scaleTransform(factor), translationTransform(-center.x, -center.y)),
  );
}

export type SimilarityParts = {
  scale: number;
  rotationDeg: number;
};

/**
 * Splits a uniform-scale + rotation + translation matrix into its scale and
 * rotation. Returns null for shears, non-uniform scales and reflections.
 */
export function decomposeSimilarity(m: Transform2D, epsilon = 1e-9): SimilarityParts | null {
  const scale = Math.hypot(m.a, m.b);
  if (!Number.isFinite(scale) || scale <= 0) return null;
  const tolerance = epsilon * Math.max(1, scale);
  if (!nearlyEqual(m.a, m.d, tolerance) || !nearlyEqual(m.b, -m.c, tolerance)) return null;
  return { scale, rotationDeg: radToDeg(Math.atan2(m.b, m.a)) };
}
