import type { z } from "zod";
import { InvalidStyleError } from "../errors.js";
import type { DocumentSink, DocumentSource } from "../file/document.js";
import { Box2 } from "@sketchpad/geometry";
import { rectCenter, rectFromBox } from "../math/rect.js";
import { rotateAroundTransform, scaleAroundTransform, translationTransform } from "../math/transform.js";
import type { Point, Rect } from "../math/types.js";
import type { ShapeGeometry } from "../model/geometry.js";
import { ShapeCollection, type LoadReport } from "../model/ShapeCollection.js";
import type { ShapeEntity } from "../model/ShapeEntity.js";
import { hexColorSchema, shapeStyleSchema, strokeWidthSchema, type ShapeStyle } from "../model/style.js";
import type { InputKeyEvent, InputPointerEvent, InteractionState, ToolContext, ToolType } from "../tools/Tool.js";
import { previewStyle } from "../view/constants.js";
import type { ShapePainter } from "../view/ShapePainter.js";
import { resolveEditorConfig, type EditorConfig, type EditorConfigOverrides } from "./config.js";
import type {
  DocumentChangeReason,
  IShapeEditor,
  ShapeEditorEvent,
  ShapeEditorEventHandler,
  StyleEditor
} from "./IShapeEditor.js";
import { matchShortcut, type EditorCommand } from "./keymap.js";
import { ToolManager } from "./tools/ToolManager.js";

export class ShapeEditor implements IShapeEditor {
  private handlers = new Set<ShapeEditorEventHandler>();

  private readonly config: EditorConfig;
  private collection = new ShapeCollection();
  private toolManager = new ToolManager();

  private currentStyle: ShapeStyle;
  private preview: ShapeGeometry | null = null;

  constructor(config: EditorConfigOverrides = {}) {
    this.config = resolveEditorConfig(config);
    this.currentStyle = this.config.defaultStyle;
  }

  on(handler: ShapeEditorEventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  getConfig(): EditorConfig {
    return this.config;
  }

  /** Drops whatever the previous tool had staged and clears the selection. */
  setActiveTool(tool: ToolType): void {
    this.toolManager.setTool(tool, this.toolContext());
    this.emit({ type: "TOOL.CHANGED", tool });
    this.updateSelection([]);
  }

  getActiveTool(): ToolType {
    return this.toolManager.activeToolType;
  }

  getCurrentStyle(): ShapeStyle {
    return this.currentStyle;
  }

  setOutlineColor(color: string): void {
    const outlineColor = parseStyleField(hexColorSchema, color, "outline color");
    this.currentStyle = { ...this.currentStyle, outlineColor };
  }

  setFillColor(color: string): void {
    const fillColor = parseStyleField(hexColorSchema, color, "fill color");
    this.currentStyle = { ...this.currentStyle, fillColor };
  }

  setStrokeWidth(width: number): void {
    const strokeWidth = parseStyleField(strokeWidthSchema, width, "stroke width");
    this.currentStyle = { ...this.currentStyle, strokeWidth };
  }

  setFillEnabled(filled: boolean): void {
    this.currentStyle = { ...this.currentStyle, filled };
  }

  handlePointerEvent(event: InputPointerEvent): boolean {
    if (event.type === "wheel") {
      const notches = event.deltaY ?? 0;
      if (!Number.isFinite(notches) || notches === 0) return false;
      return this.scaleSelected(this.config.wheelScaleFactor ** -notches);
    }
    return this.toolManager.onPointerEvent(event, this.toolContext()).handled;
  }

  handleKeyDown(event: InputKeyEvent): boolean {
    const binding = matchShortcut(this.config.keymap, event.key, event.modifiers);
    if (!binding) return false;
    return this.executeCommand(binding.command, binding.tool);
  }

  executeCommand(command: EditorCommand, tool?: ToolType): boolean {
    switch (command) {
      case "ROTATE.CW":
        return this.rotateSelected(this.config.rotationStepDeg);
      case "ROTATE.CCW":
        return this.rotateSelected(-this.config.rotationStepDeg);
      case "EDIT.DELETE":
        return this.deleteSelected().length > 0;
      case "TOOL.COMMIT":
        return this.toolManager.onCommand("commit", this.toolContext()).handled;
      case "TOOL.CANCEL":
        return this.toolManager.onCommand("cancel", this.toolContext()).handled;
      case "UI.TOOL":
        if (!tool) return false;
        this.setActiveTool(tool);
        return true;
    }
  }

  /** Rotates every selected entity about its own bounding-box center. */
  rotateSelected(angleDeg: number): boolean {
    const targets = this.collection.selected();
    if (targets.length === 0 || angleDeg === 0) return false;
    for (const entity of targets) {
      entity.applyTransform(rotateAroundTransform(rectCenter(entity.bounds()), angleDeg));
    }
    this.documentChanged("rotate");
    this.emitSelection();
    return true;
  }

  /** Uniformly scales every selected entity about its own bounding-box center. */
  scaleSelected(factor: number): boolean {
    if (!Number.isFinite(factor) || factor <= 0) {
      throw new RangeError(`Scale factor must be a positive number, got ${factor}`);
    }
    const targets = this.collection.selected();
    if (targets.length === 0 || factor === 1) return false;
    for (const entity of targets) {
      entity.applyTransform(scaleAroundTransform(rectCenter(entity.bounds()), factor));
    }
    this.documentChanged("scale");
    this.emitSelection();
    return true;
  }

  deleteSelected(): string[] {
    const removed = this.collection.deleteSelected();
    if (removed.length > 0) {
      this.documentChanged("delete");
      this.emitSelection();
    }
    return removed;
  }

  /**
   * Opens the style editor for the first selected entity. The answer is
   * applied whole, and dropped if the entity was deleted while waiting.
   */
  async editSelectedStyle(editor: StyleEditor): Promise<boolean> {
    const target = this.collection.selected()[0];
    if (!target) return false;

    const next = await editor.requestStyle(target.style);
    if (!next) return false;
    if (this.collection.get(target.id) !== target) return false;

    const parsed = shapeStyleSchema.safeParse(next);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new InvalidStyleError(`Style editor returned an invalid style: ${issue ? issue.message : "unknown issue"}`);
    }
    target.replaceStyle(parsed.data);
    this.documentChanged("style");
    return true;
  }

  newDocument(): void {
    this.resetTool();
    const hadSelection = this.collection.selected().length > 0;
    this.collection.clear();
    this.documentChanged("new");
    if (hadSelection) this.emitSelection();
  }

  save(sink: DocumentSink): void {
    this.collection.saveTo(sink);
    this.emit({ type: "DOCUMENT.SAVED", shapeCount: this.collection.size });
  }

  /** Throws before touching the current document if it cannot be read or parsed. */
  load(source: DocumentSource): LoadReport {
    const hadSelection = this.collection.selected().length > 0;
    const report = this.collection.loadFrom(source);
    this.resetTool();
    this.emit({ type: "DOCUMENT.LOADED", loaded: report.loaded, failures: report.failures });
    this.documentChanged("load");
    if (hadSelection) this.emitSelection();
    return report;
  }

  render(painter: ShapePainter): void {
    painter.clear?.();
    for (const entity of this.collection.all()) {
      painter.paint(entity.geometry, entity.style, entity.selected);
      if (entity.selected) painter.paintSelectionBounds(entity.bounds());
    }
    if (this.preview) {
      painter.paint(this.preview, previewStyle(this.currentStyle.strokeWidth), false);
    }
  }

  getShapes(): readonly ShapeEntity[] {
    return this.collection.all();
  }

  getSelection(): string[] {
    return this.collection.selected().map((s) => s.id);
  }

  getSelectionBounds(): Rect | null {
    let box = Box2.create();
    for (const entity of this.collection.selected()) {
      const b = entity.bounds();
      box = Box2.expand(box, { x: b.x, y: b.y });
      box = Box2.expand(box, { x: b.x + b.width, y: b.y + b.height });
    }
    return Box2.isEmpty(box) ? null : rectFromBox(box);
  }

  getInteractionState(): InteractionState {
    return this.toolManager.getInteractionState();
  }

  getPreview(): ShapeGeometry | null {
    return this.preview;
  }

  private toolContext(): ToolContext {
    return {
      hitTest: (p: Point) => this.collection.hitTest(p).map((s) => s.id),
      isSelected: (id: string) => this.collection.get(id)?.selected ?? false,
      setSelection: (ids: string[]) => this.updateSelection(ids),
      translateShape: (id: string, delta: Point) => {
        const entity = this.collection.get(id);
        if (!entity || (delta.x === 0 && delta.y === 0)) return;
        entity.applyTransform(translationTransform(delta.x, delta.y));
        this.documentChanged("move");
      },
      addCircle: (center: Point, radius: number) => {
        this.collection.addCircle(center.x, center.y, radius, this.currentStyle);
        this.documentChanged("add");
      },
      addRectangle: (x: number, y: number, width: number, height: number) => {
        this.collection.addRectangle(x, y, width, height, this.currentStyle);
        this.documentChanged("add");
      },
      addPath: (vertices: Point[]) => {
        this.collection.addPath(vertices, this.currentStyle);
        this.documentChanged("add");
      },
      setPreview: (geometry: ShapeGeometry | null) => {
        if (geometry === null && this.preview === null) return;
        this.preview = geometry;
        this.emit({ type: "PREVIEW.CHANGED", preview: geometry });
      },
      finishTool: () => {
        this.toolManager.setTool("none", this.toolContext());
        this.emit({ type: "TOOL.CHANGED", tool: "none" });
      }
    };
  }

  private resetTool(): void {
    const previous = this.toolManager.activeToolType;
    this.toolManager.setTool("none", this.toolContext());
    if (previous !== "none") this.emit({ type: "TOOL.CHANGED", tool: "none" });
  }

  private updateSelection(ids: readonly string[]): void {
    const before = this.getSelection();
    this.collection.selectOnly(ids);
    const after = this.getSelection();
    if (before.length === after.length && before.every((id, i) => id === after[i])) return;
    this.emitSelection();
  }

  private documentChanged(reason: DocumentChangeReason): void {
    this.emit({ type: "DOCUMENT.CHANGED", reason, shapeCount: this.collection.size });
  }

  private emitSelection(): void {
    this.emit({ type: "SELECTION.CHANGED", selectedIds: this.getSelection(), bounds: this.getSelectionBounds() });
  }

  private emit(event: ShapeEditorEvent): void {
    for (const handler of this.handlers) {
      handler(event);
    }
  }
}

function parseStyleField<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, label: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) throw new InvalidStyleError(`Invalid ${label}: ${String(value)}`);
  return parsed.data;
}
