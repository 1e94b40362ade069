import { Box2 } from "@sketchpad/geometry";
import type { Point, Rect } from "./types.js";

export function rectFromPoints(p1: Point, p2: Point): Rect {
  const x = Math.min(p1.x, p2.x);
  const y = Math.min(p1.y, p2.y);
  const width = Math.abs(p1.x - p2.x);
  const height = Math.abs(p1.y - p2.y);
  return { x, y, width, height };
}

export function rectFromBox(box: Box2): Rect {
  return { x: box.min.x, y: box.min.y, width: Box2.width(box), height: Box2.height(box) };
}

export function rectCenter(rect: Rect): Point {
  return { x: rect.x + rect.width / 2, y: rect.y + rect.height / 2 };
}
