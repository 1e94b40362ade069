import test from "node:test";
import assert from "node:assert/strict";
import { distanceToSegment, ringContainsPoint, windingNumber } from "../src/polygon.js";

const square = [
  { x: 0, y: 0 },
  { x: 10, y: 0 },
  { x: 10, y: 10 },
  { x: 0, y: 10 }
];

// The same square traversed twice: winding number 2 inside.
const doubleSquare = [...square, ...square];

test("windingNumber: simple ring winds once around interior points", () => {
  assert.equal(windingNumber(square, { x: 5, y: 5 }), 1);
  assert.equal(windingNumber(square, { x: 15, y: 5 }), 0);
});

test("windingNumber: reversed ring winds negatively", () => {
  assert.equal(windingNumber([...square].reverse(), { x: 5, y: 5 }), -1);
});

test("ringContainsPoint: the ring is implicitly closed", () => {
  // Open triangle list; the closing edge (0,10)->(0,0) is implied.
  const tri = [
    { x: 0, y: 0 },
    { x: 10, y: 10 },
    { x: 0, y: 10 }
  ];
  assert.equal(ringContainsPoint(tri, { x: 2, y: 8 }), true);
  assert.equal(ringContainsPoint(tri, { x: 8, y: 2 }), false);
});

test("ringContainsPoint: self-overlapping ring differs between nonzero and evenodd", () => {
  assert.equal(windingNumber(doubleSquare, { x: 5, y: 5 }), 2);
  assert.equal(ringContainsPoint(doubleSquare, { x: 5, y: 5 }, "nonzero"), true);
  assert.equal(ringContainsPoint(doubleSquare, { x: 5, y: 5 }, "evenodd"), false);
});

test("ringContainsPoint: bow-tie lobes are inside, the outside notch is not", () => {
  const bowTie = [
    { x: 0, y: 0 },
    { x: 10, y: 10 },
    { x: 10, y: 0 },
    { x: 0, y: 10 }
  ];
  assert.equal(ringContainsPoint(bowTie, { x: 2, y: 5 }), true);
  assert.equal(ringContainsPoint(bowTie, { x: 8, y: 5 }), true);
  assert.equal(ringContainsPoint(bowTie, { x: 5, y: 2 }), false);
});

test("ringContainsPoint: boundary points count as inside", () => {
  assert.equal(ringContainsPoint(square, { x: 10, y: 4 }), true);
  assert.equal(ringContainsPoint(square, { x: 0, y: 0 }), true);
});

test("ringContainsPoint: degenerate rings only contain their edges", () => {
  const segment = [
    { x: 0, y: 0 },
    { x: 10, y: 0 }
  ];
  assert.equal(ringContainsPoint(segment, { x: 5, y: 0 }), true);
  assert.equal(ringContainsPoint(segment, { x: 5, y: 1 }), false);
  assert.equal(ringContainsPoint([], { x: 0, y: 0 }), false);
});

test("distanceToSegment: clamps to the nearest endpoint", () => {
  assert.equal(distanceToSegment({ x: 13, y: 4 }, { x: 0, y: 0 }, { x: 10, y: 0 }), 5);
  assert.equal(distanceToSegment({ x: 5, y: -2 }, { x: 0, y: 0 }, { x: 10, y: 0 }), 2);
});
