import type { Vec2 } from "./vec2.js";

export interface Box2 {
  min: Vec2;
  max: Vec2;
}

export const Box2 = {
  /** Without points the box is empty (inverted infinite bounds). */
  create: (points?: readonly Vec2[]): Box2 => {
    let box: Box2 = {
      min: { x: Infinity, y: Infinity },
      max: { x: -Infinity, y: -Infinity }
    };
    for (const p of points ?? []) box = Box2.expand(box, p);
    return box;
  },

  fromCenter: (center: Vec2, halfWidth: number, halfHeight: number): Box2 => ({
    min: { x: center.x - halfWidth, y: center.y - halfHeight },
    max: { x: center.x + halfWidth, y: center.y + halfHeight }
  }),

  isEmpty: (box: Box2): boolean => box.min.x > box.max.x || box.min.y > box.max.y,

  expand: (box: Box2, p: Vec2): Box2 => ({
    min: { x: Math.min(box.min.x, p.x), y: Math.min(box.min.y, p.y) },
    max: { x: Math.max(box.max.x, p.x), y: Math.max(box.max.y, p.y) }
  }),

  width: (box: Box2): number => box.max.x - box.min.x,
  height: (box: Box2): number => box.max.y - box.min.y
};
