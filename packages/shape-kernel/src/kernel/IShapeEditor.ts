import type { RecordFailure } from "../file/codec.js";
import type { DocumentSink, DocumentSource } from "../file/document.js";
import type { Rect } from "../math/types.js";
import type { ShapeGeometry } from "../model/geometry.js";
import type { LoadReport } from "../model/ShapeCollection.js";
import type { ShapeEntity } from "../model/ShapeEntity.js";
import type { ShapeStyle } from "../model/style.js";
import type { InputKeyEvent, InputPointerEvent, InteractionState, ToolType } from "../tools/Tool.js";
import type { ShapePainter } from "../view/ShapePainter.js";
import type { EditorConfig } from "./config.js";
import type { EditorCommand } from "./keymap.js";

export type DocumentChangeReason = "add" | "move" | "rotate" | "scale" | "delete" | "style" | "new" | "load";

export type ShapeEditorEvent =
  | { type: "DOCUMENT.CHANGED"; reason: DocumentChangeReason; shapeCount: number }
  | { type: "SELECTION.CHANGED"; selectedIds: string[]; bounds: Rect | null }
  | { type: "TOOL.CHANGED"; tool: ToolType }
  | { type: "PREVIEW.CHANGED"; preview: ShapeGeometry | null }
  | { type: "DOCUMENT.LOADED"; loaded: number; failures: RecordFailure[] }
  | { type: "DOCUMENT.SAVED"; shapeCount: number };

export type ShapeEditorEventHandler = (event: ShapeEditorEvent) => void;

/**
 * Asks the user for a new style. Resolves with `null` when the dialog is
 * cancelled.
 */
export interface StyleEditor {
  requestStyle(current: ShapeStyle): Promise<ShapeStyle | null>;
}

export interface IShapeEditor {
  on(handler: ShapeEditorEventHandler): () => void;

  getConfig(): EditorConfig;

  setActiveTool(tool: ToolType): void;
  getActiveTool(): ToolType;

  getCurrentStyle(): ShapeStyle;
  setOutlineColor(color: string): void;
  setFillColor(color: string): void;
  setStrokeWidth(width: number): void;
  setFillEnabled(filled: boolean): void;

  handlePointerEvent(event: InputPointerEvent): boolean;
  handleKeyDown(event: InputKeyEvent): boolean;
  executeCommand(command: EditorCommand, tool?: ToolType): boolean;

  rotateSelected(angleDeg: number): boolean;
  scaleSelected(factor: number): boolean;
  deleteSelected(): string[];
  editSelectedStyle(editor: StyleEditor): Promise<boolean>;

  newDocument(): void;
  save(sink: DocumentSink): void;
  load(source: DocumentSource): LoadReport;

  render(painter: ShapePainter): void;

  getShapes(): readonly ShapeEntity[];
  getSelection(): string[];
  getSelectionBounds(): Rect | null;
  getInteractionState(): InteractionState;
  getPreview(): ShapeGeometry | null;
}

export type { InputKeyEvent, InputPointerEvent, InteractionState, ToolType } from "../tools/Tool.js";
