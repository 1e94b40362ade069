export interface Vec2 {
  x: number;
  y: number;
}

export const Vec2 = {
  sub: (a: Vec2, b: Vec2): Vec2 => ({ x: a.x - b.x, y: a.y - b.y }),

  dist: (a: Vec2, b: Vec2): number => Math.hypot(a.x - b.x, a.y - b.y),

  /** Radians; positive turns from +x towards +y. */
  rotate: (v: Vec2, angle: number): Vec2 => {
    const c = Math.cos(angle);
    const s = Math.sin(angle);
    return { x: v.x * c - v.y * s, y: v.x * s + v.y * c };
  },

  rotateAround: (v: Vec2, pivot: Vec2, angle: number): Vec2 => {
    const r = Vec2.rotate({ x: v.x - pivot.x, y: v.y - pivot.y }, angle);
    return { x: r.x + pivot.x, y: r.y + pivot.y };
  },

  /** Exact comparison. */
  equals: (a: Vec2, b: Vec2): boolean => a.x === b.x && a.y === b.y
};
