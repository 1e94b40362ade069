export {
  Canvas2DShapePainter,
  type Canvas2DContext,
  type Canvas2DPainterOptions,
  type CanvasPaint,
  type PainterError
} from "./Canvas2DShapePainter.js";
