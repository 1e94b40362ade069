import type { Vec2 } from "./vec2.js";

export type FillRule = "nonzero" | "evenodd";

const ON_EDGE_EPSILON = 1e-9;

/**
 * Signed area test: > 0 when `p` lies left of the directed edge a→b,
 * < 0 when right, 0 when collinear.
 */
export function isLeft(a: Vec2, b: Vec2, p: Vec2): number {
  return (b.x - a.x) * (p.y - a.y) - (p.x - a.x) * (b.y - a.y);
}

export function distanceToSegment(p: Vec2, a: Vec2, b: Vec2): number {
  const abx = b.x - a.x;
  const aby = b.y - a.y;
  const abLen2 = abx * abx + aby * aby;
  if (abLen2 <= 0) return Math.hypot(p.x - a.x, p.y - a.y);

  const t = Math.min(1, Math.max(0, ((p.x - a.x) * abx + (p.y - a.y) * aby) / abLen2));
  return Math.hypot(p.x - (a.x + abx * t), p.y - (a.y + aby * t));
}

/**
 * Winding number of the implicitly closed ring around `p`
 * (edge from the last vertex back to the first included).
 */
export function windingNumber(ring: readonly Vec2[], p: Vec2): number {
  let wn = 0;
  const n = ring.length;
  for (let i = 0; i < n; i++) {
    const a = ring[i];
    const b = ring[(i + 1) % n];
    if (a.y <= p.y) {
      if (b.y > p.y && isLeft(a, b, p) > 0) wn++;
    } else if (b.y <= p.y && isLeft(a, b, p) < 0) {
      wn--;
    }
  }
  return wn;
}

export function isOnRingBoundary(ring: readonly Vec2[], p: Vec2, epsilon = ON_EDGE_EPSILON): boolean {
  const n = ring.length;
  if (n === 1) return distanceToSegment(p, ring[0], ring[0]) <= epsilon;
  for (let i = 0; i < n; i++) {
    if (distanceToSegment(p, ring[i], ring[(i + 1) % n]) <= epsilon) return true;
  }
  return false;
}

export function ringContainsPoint(ring: readonly Vec2[], p: Vec2, rule: FillRule = "nonzero"): boolean {
  if (ring.length === 0) return false;
  if (isOnRingBoundary(ring, p)) return true;
  if (ring.length < 3) return false;

  const wn = windingNumber(ring, p);
  return rule === "nonzero" ? wn !== 0 : wn % 2 !== 0;
}
