import test from "node:test";
import assert from "node:assert/strict";
import {
  applyTransformToPoint,
  decomposeSimilarity,
  multiplyTransform,
  rotateAroundTransform,
  rotationTransform,
  scaleAroundTransform,
  scaleTransform,
  translationTransform
} from "../src/math/transform.js";
import { rectCenter } from "../src/math/rect.js";
import type { Point, Rect, Transform2D } from "../src/math/types.js";
import { createPath, createRectangle, transformGeometry } from "../src/model/geometry.js";
import { ShapeEntity } from "../src/model/ShapeEntity.js";
import { DEFAULT_SHAPE_STYLE } from "../src/model/style.js";

const EPS = 1e-9;

function assertPointClose(actual: Point, expected: Point, eps = EPS): void {
  assert.ok(
    Math.abs(actual.x - expected.x) <= eps && Math.abs(actual.y - expected.y) <= eps,
    `(${actual.x}, ${actual.y}) != (${expected.x}, ${expected.y})`,
  );
}

function assertTransformClose(actual: Transform2D, expected: Transform2D): void {
  for (const key of ["a", "b", "c", "d", "e", "f"] as const) {
    assert.ok(Math.abs(actual[key] - expected[key]) <= EPS, `${key}: ${actual[key]} != ${expected[key]}`);
  }
}

function assertRectClose(actual: Rect, expected: Rect, eps: number): void {
  for (const key of ["x", "y", "width", "height"] as const) {
    assert.ok(Math.abs(actual[key] - expected[key]) <= eps, `${key}: ${actual[key]} != ${expected[key]}`);
  }
}

test("multiplyTransform applies the right operand first", () => {
  const m = multiplyTransform(translationTransform(10, 0), scaleTransform(2));
  assert.deepEqual(applyTransformToPoint(m, { x: 1, y: 1 }), { x: 12, y: 2 });
});

test("positive rotation turns clockwise on a y-down screen", () => {
  assertPointClose(applyTransformToPoint(rotationTransform(90), { x: 1, y: 0 }), { x: 0, y: 1 });
});

test("opposite rotations and reciprocal scales cancel out", () => {
  const identity = translationTransform(0, 0);
  assertTransformClose(multiplyTransform(rotationTransform(30), rotationTransform(-30)), identity);
  assertTransformClose(multiplyTransform(scaleTransform(4), scaleTransform(0.25)), identity);
});

test("pivoted builders keep the pivot fixed", () => {
  const pivot = { x: 40, y: -12 };
  assertPointClose(applyTransformToPoint(rotateAroundTransform(pivot, 37), pivot), pivot);
  assertPointClose(applyTransformToPoint(scaleAroundTransform(pivot, 3), pivot), pivot);
  assertPointClose(applyTransformToPoint(scaleAroundTransform(pivot, 2), { x: 41, y: -12 }), { x: 42, y: -12 });
});

test("decomposeSimilarity recovers scale and angle, rejects shear", () => {
  const parts = decomposeSimilarity(multiplyTransform(rotationTransform(30), scaleTransform(2)));
  assert.ok(parts);
  assert.ok(Math.abs(parts.scale - 2) < EPS);
  assert.ok(Math.abs(parts.rotationDeg - 30) < EPS);

  assert.equal(decomposeSimilarity({ a: 1, b: 0, c: 0.5, d: 1, e: 0, f: 0 }), null);
  assert.equal(decomposeSimilarity(scaleTransform(2, 3)), null);
  assert.equal(decomposeSimilarity(scaleTransform(-1, 1)), null);
});

test("24 rotations of 15 degrees about the own center restore the bounding box", () => {
  const entity = new ShapeEntity(createRectangle(10, 20, 30, 5), DEFAULT_SHAPE_STYLE);
  const original = entity.bounds();

  for (let i = 0; i < 24; i++) {
    entity.applyTransform(rotateAroundTransform(rectCenter(entity.bounds()), 15));
  }

  assertRectClose(entity.bounds(), original, 1e-6);
});

test("24 rotations of 15 degrees about a fixed pivot bring a path back", () => {
  const start = createPath([
    { x: 0, y: 0 },
    { x: 12, y: 3 },
    { x: 4, y: 9 }
  ]);
  let path = start;
  const step = rotateAroundTransform({ x: 5, y: 5 }, 15);
  for (let i = 0; i < 24; i++) path = transformGeometry(path, step);

  path.points.forEach((p, i) => assertPointClose(p, start.points[i], 1e-6));
});

test("one wheel notch up then down is a round trip", () => {
  const rect = createRectangle(0, 0, 10, 20);
  const center = { x: 5, y: 10 };
  const up = transformGeometry(rect, scaleAroundTransform(center, 1.1));
  assert.ok(Math.abs(up.width - 11) < EPS);
  assert.ok(Math.abs(up.height - 22) < EPS);

  const back = transformGeometry(up, scaleAroundTransform(center, 1 / 1.1));
  assertRectClose({ x: back.x, y: back.y, width: back.width, height: back.height }, { x: 0, y: 0, width: 10, height: 20 }, EPS);
});
