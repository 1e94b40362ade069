export { Vec2 } from "./vec2.js";
export { Box2 } from "./box2.js";
export {
  distanceToSegment,
  isLeft,
  isOnRingBoundary,
  ringContainsPoint,
  windingNumber,
  type FillRule
} from "./polygon.js";
