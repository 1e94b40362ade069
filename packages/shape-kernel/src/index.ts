export type { Point, Rect, Transform2D } from "./math/types.js";
export { nearlyEqual, degToRad, radToDeg, normalizeDegrees } from "./math/scalar.js";
export { rectFromPoints, rectFromBox, rectCenter } from "./math/rect.js";
export {
  translationTransform,
  scaleTransform,
  rotationTransform,
  multiplyTransform,
  applyTransformToPoint,
  rotateAroundTransform,
  scaleAroundTransform,
  decomposeSimilarity,
  type SimilarityParts
} from "./math/transform.js";

export {
  ShapeParseError,
  DocumentIOError,
  InvalidGeometryError,
  InvalidStyleError,
  isEditorError,
  type ShapeParseErrorCode,
  type DocumentIOErrorCode,
  type EditorError
} from "./errors.js";

export * from "./model/geometry.js";
export * from "./model/style.js";
export { ShapeEntity } from "./model/ShapeEntity.js";
export { ShapeCollection, type LoadReport } from "./model/ShapeCollection.js";

export * from "./file/codec.js";
export * from "./file/document.js";

export type {
  InputModifiers,
  InputPointerEvent,
  InputPointerEventType,
  InputKeyEvent,
  InteractionState,
  Tool,
  ToolCommand,
  ToolContext,
  ToolEventResult,
  ToolType
} from "./tools/Tool.js";
export { TOOL_TYPES, isToolType, handledStop, unhandled } from "./tools/Tool.js";
export { SelectionTool } from "./tools/SelectionTool.js";
export { BaseTool } from "./kernel/tools/BaseTool.js";
export { DrawCircleTool } from "./kernel/tools/DrawCircleTool.js";
export { DrawRectangleTool } from "./kernel/tools/DrawRectangleTool.js";
export { DrawPathTool } from "./kernel/tools/DrawPathTool.js";
export { DrawToolFactory } from "./kernel/tools/DrawToolFactory.js";
export { ToolManager } from "./kernel/tools/ToolManager.js";

export type {
  DocumentChangeReason,
  IShapeEditor,
  ShapeEditorEvent,
  ShapeEditorEventHandler,
  StyleEditor
} from "./kernel/IShapeEditor.js";
export { ShapeEditor } from "./kernel/ShapeEditor.js";
export {
  DEFAULT_EDITOR_CONFIG,
  editorConfigOverridesSchema,
  resolveEditorConfig,
  type EditorConfig,
  type EditorConfigOverrides
} from "./kernel/config.js";
export {
  DEFAULT_KEYMAP,
  matchShortcut,
  normalizeShortcutKey,
  type EditorCommand,
  type KeyBinding
} from "./kernel/keymap.js";

export type { ShapePainter } from "./view/ShapePainter.js";
export { EDITOR_COLORS, LINE_WIDTHS, previewStyle } from "./view/constants.js";
