import test from "node:test";
import assert from "node:assert/strict";
import { ShapeParseError } from "../src/errors.js";
import { decodeDocument, decodeShape, encodeDocument, encodeShape, type ShapeRecord } from "../src/file/codec.js";
import { rectFromPoints } from "../src/math/rect.js";
import { createCircle, createPath, createRectangle, type ShapeGeometry } from "../src/model/geometry.js";
import { DEFAULT_SHAPE_STYLE } from "../src/model/style.js";

const style = DEFAULT_SHAPE_STYLE;

function record(type: string, params: number[]): Record<string, unknown> {
  return { type, params, outlineColor: "#000000", fillColor: "#ffffff", filled: false, strokeWidth: 2 };
}

function decodeError(input: unknown): ShapeParseError {
  const result = decodeShape(input);
  assert.equal(result.ok, false);
  if (result.ok) throw new Error("expected a decode failure");
  return result.error;
}

test("circle encodes as CIRCLE [cx, cy, r]", () => {
  const encoded = encodeShape(createCircle({ x: 100, y: 100 }, 50), style);
  assert.deepEqual(encoded, record("CIRCLE", [100, 100, 50]));
});

test("rectangle dragged from bottom-right to top-left encodes its min corner and size", () => {
  const r = rectFromPoints({ x: 40, y: 25 }, { x: 10, y: 20 });
  const encoded = encodeShape(createRectangle(r.x, r.y, r.width, r.height), style);
  assert.equal(encoded.type, "RECTANGLE");
  assert.deepEqual(encoded.params, [10, 20, 30, 5]);
});

test("a rotated rectangle is written as the PATH through its corners", () => {
  const encoded = encodeShape(createRectangle(0, 0, 10, 10, 90), style);
  assert.equal(encoded.type, "PATH");
  const expected = [10, 0, 10, 10, 0, 10, 0, 0];
  assert.equal(encoded.params.length, expected.length);
  encoded.params.forEach((v, i) => assert.ok(Math.abs(v - expected[i]) < 1e-9, `param ${i}: ${v}`));
});

test("a full turn leaves a RECTANGLE record", () => {
  assert.equal(encodeShape(createRectangle(0, 0, 10, 10, 360), style).type, "RECTANGLE");
});

test("closing a path that already ends at its start point changes nothing", () => {
  const open = createPath(
    [
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 10, y: 10 },
      { x: 0, y: 0 }
    ],
    false,
  );
  const closed = createPath(open.points, true);

  assert.deepEqual(encodeShape(open, style).params, [0, 0, 10, 0, 10, 10]);
  assert.deepEqual(encodeShape(closed, style).params, [0, 0, 10, 0, 10, 10]);
});

test("colors are written lowercase and read case-insensitively", () => {
  const encoded = encodeShape(createCircle({ x: 0, y: 0 }, 1), { ...style, outlineColor: "#FF00AA" });
  assert.equal(encoded.outlineColor, "#ff00aa");

  const decoded = decodeShape({ ...record("CIRCLE", [0, 0, 1]), fillColor: "#ABCDEF" });
  assert.equal(decoded.ok, true);
  if (decoded.ok) assert.equal(decoded.value.style.fillColor, "#abcdef");
});

test("each variant survives encode then decode", () => {
  const shapes: ShapeGeometry[] = [
    createCircle({ x: 3, y: 4 }, 5),
    createRectangle(1, 2, 3, 4),
    createPath([
      { x: 0, y: 0 },
      { x: 5, y: 1 },
      { x: 2, y: 6 }
    ])
  ];
  const customStyle = { outlineColor: "#123456", fillColor: "#abcdef", filled: true, strokeWidth: 6 };

  for (const geometry of shapes) {
    const decoded = decodeShape(encodeShape(geometry, customStyle));
    assert.equal(decoded.ok, true);
    if (decoded.ok) {
      assert.deepEqual(decoded.value.geometry, geometry);
      assert.deepEqual(decoded.value.style, customStyle);
    }
  }
});

test("wrong arity is reported per type", () => {
  const circle = decodeError(record("CIRCLE", [1, 2, 3, 4]));
  assert.equal(circle.code, "BAD_ARITY");
  assert.equal(circle.message, "CIRCLE expects 3 params, got 4");

  assert.equal(decodeError(record("RECTANGLE", [1, 2, 3])).code, "BAD_ARITY");
  assert.equal(decodeError(record("PATH", [1, 2, 3, 4, 5])).code, "BAD_ARITY");
  assert.equal(decodeError(record("PATH", [1, 2])).code, "BAD_ARITY");
});

test("unknown types, bad structure and bad geometry are separate failures", () => {
  const unknown = decodeError(record("TRIANGLE", [0, 0, 1, 1, 2, 0]));
  assert.equal(unknown.code, "UNKNOWN_TYPE");
  assert.equal(unknown.message, 'unknown shape type "TRIANGLE"');

  const { filled: _filled, ...missingFilled } = record("CIRCLE", [0, 0, 1]);
  const invalid = decodeError(missingFilled);
  assert.equal(invalid.code, "INVALID_RECORD");
  assert.match(invalid.message, /^filled: /);

  assert.equal(decodeError({ ...record("CIRCLE", [0, 0, 1]), outlineColor: "red" }).code, "INVALID_RECORD");
  assert.equal(decodeError({ ...record("CIRCLE", [0, 0, 1]), strokeWidth: 0 }).code, "INVALID_RECORD");
  assert.equal(decodeError(record("CIRCLE", [0, 0, -1])).code, "INVALID_GEOMETRY");
  assert.equal(decodeError("CIRCLE").code, "INVALID_RECORD");
});

test("encodeDocument pretty-prints with two spaces by default", () => {
  const records: ShapeRecord[] = [encodeShape(createCircle({ x: 1, y: 2 }, 3), style)];
  assert.equal(encodeDocument(records), JSON.stringify(records, null, 2));
  assert.equal(encodeDocument(records, { pretty: false }), JSON.stringify(records));
});

test("compact and pretty documents decode the same way", () => {
  const records = [record("CIRCLE", [100, 100, 50]), record("RECTANGLE", [10, 20, 30, 5])];
  const compact = decodeDocument(JSON.stringify(records));
  const pretty = decodeDocument(JSON.stringify(records, null, 2));
  assert.deepEqual(compact, pretty);
  assert.equal(compact.shapes.length, 2);
  assert.deepEqual(compact.failures, []);
});

test("decodeDocument isolates bad records and keeps their index", () => {
  const doc = decodeDocument(
    JSON.stringify([record("CIRCLE", [1, 1, 1]), record("CIRCLE", [1, 1]), record("RECTANGLE", [0, 0, 2, 2])]),
  );
  assert.equal(doc.shapes.length, 2);
  assert.equal(doc.failures.length, 1);
  assert.equal(doc.failures[0].index, 1);
  assert.equal(doc.failures[0].error.code, "BAD_ARITY");
});

test("decodeDocument throws on documents that are not a record array", () => {
  assert.throws(
    () => decodeDocument("[{"),
    (error: unknown) => error instanceof ShapeParseError && error.code === "MALFORMED_JSON",
  );
  assert.throws(
    () => decodeDocument('{"type":"CIRCLE"}'),
    (error: unknown) => error instanceof ShapeParseError && error.code === "INVALID_DOCUMENT",
  );
});
