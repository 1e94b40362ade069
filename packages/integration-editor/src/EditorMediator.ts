import { Topics, type EventBus, type NormalizedModifiers, type UIStyleChangedPayload } from "@sketchpad/event-bus";
import {
  FileDocument,
  isEditorError,
  isToolType,
  withDocumentExtension,
  type DocumentSink,
  type DocumentSource,
  type EditorCommand,
  type InputModifiers,
  type InputPointerEvent,
  type IShapeEditor,
  type ShapeEditorEvent,
  type ShapeStyle,
  type StyleEditor
} from "@sketchpad/shape-kernel";

export const STYLE_EDITOR_SERVICE = "style-editor";
export const STYLE_EDITOR_METHOD = "requestStyle";

export type DocumentOpener = (path: string) => DocumentSource & DocumentSink;

export type EditorMediatorOptions = {
  /** Defaults to a `.json` file on disk. */
  openDocument?: DocumentOpener;
};

const EDITOR_COMMANDS: ReadonlySet<string> = new Set<EditorCommand>([
  "ROTATE.CW",
  "ROTATE.CCW",
  "EDIT.DELETE",
  "TOOL.COMMIT",
  "TOOL.CANCEL"
]);

function isEditorCommand(command: string): command is EditorCommand {
  return EDITOR_COMMANDS.has(command);
}

const RIGHT_BUTTON = 2;

/**
 * Connects the bus to the editor: input and UI topics drive the editor,
 * editor events are republished as EDITOR.* topics. Failures of bus-driven
 * operations are published on EDITOR.ERROR.
 */
export class EditorMediator {
  private unsubscribes: Array<() => void> = [];
  private readonly openDocument: DocumentOpener;

  constructor(
    private readonly bus: EventBus,
    private readonly editor: IShapeEditor,
    options: EditorMediatorOptions = {},
  ) {
    this.openDocument = options.openDocument ?? ((path) => new FileDocument(withDocumentExtension(path)));
  }

  attach() {
    this.unsubscribes.push(
      this.bus.subscribe(Topics.UI_COMMAND, (payload) => {
        this.guard(payload.command, () => this.runCommand(payload.command, payload.params));
      }),
    );

    this.unsubscribes.push(
      this.bus.subscribe(Topics.UI_TOOL_CHANGED, (payload) => {
        if (!isToolType(payload.tool)) {
          this.publishError("UI.TOOL", "UNKNOWN_TOOL", `Unknown tool "${payload.tool}"`);
          return;
        }
        this.editor.setActiveTool(payload.tool);
      }),
    );

    this.unsubscribes.push(
      this.bus.subscribe(Topics.UI_STYLE_CHANGED, (payload) => {
        this.guard("UI.STYLE", () => this.applyStyle(payload));
      }),
    );

    this.unsubscribes.push(
      this.bus.subscribe(Topics.INPUT_MOUSE_DOWN, (payload) => {
        if (payload.button === RIGHT_BUTTON) {
          void this.editSelectedStyle();
          return;
        }
        this.editor.handlePointerEvent(this.toPointerEvent("pointerdown", payload));
      }),
    );

    this.unsubscribes.push(
      this.bus.subscribe(Topics.INPUT_MOUSE_MOVE, (payload) => {
        this.editor.handlePointerEvent(this.toPointerEvent("pointermove", payload));
      }),
    );

    this.unsubscribes.push(
      this.bus.subscribe(Topics.INPUT_MOUSE_UP, (payload) => {
        if (payload.button === RIGHT_BUTTON) return;
        this.editor.handlePointerEvent(this.toPointerEvent("pointerup", payload));
      }),
    );

    this.unsubscribes.push(
      this.bus.subscribe(Topics.INPUT_WHEEL, (payload) => {
        // One notch per wheel event; positive deltaY turns towards the user.
        const notches = Math.sign(payload.deltaY);
        if (notches === 0) return;
        this.editor.handlePointerEvent({
          ...this.toPointerEvent("wheel", { ...payload, buttons: 0, pointerId: 1 }),
          deltaY: notches
        });
      }),
    );

    this.unsubscribes.push(
      this.bus.subscribe(Topics.INPUT_KEY_DOWN, (payload) => {
        this.guard("INPUT.KEY", () => {
          this.editor.handleKeyDown({
            key: payload.key,
            modifiers: toModifiers(payload.modifiers),
            timestamp: payload.timestamp
          });
        });
      }),
    );

    this.unsubscribes.push(
      this.editor.on((event) => {
        this.forward(event);
      }),
    );
  }

  detach() {
    for (const unsub of this.unsubscribes) unsub();
    this.unsubscribes = [];
  }

  /** Asks the UI for a style over the bus RPC and applies the answer. */
  async editSelectedStyle(): Promise<boolean> {
    const styleEditor: StyleEditor = {
      requestStyle: (current) =>
        this.bus.rpcCall<ShapeStyle | null>(STYLE_EDITOR_SERVICE, STYLE_EDITOR_METHOD, current)
    };
    try {
      return await this.editor.editSelectedStyle(styleEditor);
    } catch (error) {
      this.reportError("EDIT.STYLE", error);
      return false;
    }
  }

  private runCommand(command: string, params: Record<string, unknown> | undefined): void {
    switch (command) {
      case "FILE.NEW":
        this.editor.newDocument();
        return;
      case "FILE.SAVE":
        this.editor.save(this.openDocument(requirePath(params)));
        return;
      case "FILE.OPEN":
        this.editor.load(this.openDocument(requirePath(params)));
        return;
      case "EDIT.STYLE":
        void this.editSelectedStyle();
        return;
      default:
        if (isEditorCommand(command)) {
          this.editor.executeCommand(command);
          return;
        }
        this.publishError(command, "UNKNOWN_COMMAND", `Unknown command "${command}"`);
    }
  }

  private applyStyle(patch: UIStyleChangedPayload): void {
    if (patch.outlineColor !== undefined) this.editor.setOutlineColor(patch.outlineColor);
    if (patch.fillColor !== undefined) this.editor.setFillColor(patch.fillColor);
    if (patch.filled !== undefined) this.editor.setFillEnabled(patch.filled);
    if (patch.strokeWidth !== undefined) this.editor.setStrokeWidth(patch.strokeWidth);
  }

  private forward(event: ShapeEditorEvent): void {
    switch (event.type) {
      case "TOOL.CHANGED":
        this.bus.publish(Topics.EDITOR_TOOL_CHANGED, { tool: event.tool });
        return;
      case "SELECTION.CHANGED":
        this.bus.publish(Topics.EDITOR_SELECTION_CHANGED, {
          selectedIds: event.selectedIds,
          bounds: event.bounds ? { ...event.bounds } : null
        });
        this.requestRender("selection");
        return;
      case "DOCUMENT.CHANGED":
        this.bus.publish(Topics.EDITOR_DOCUMENT_CHANGED, { reason: event.reason, shapeCount: event.shapeCount });
        this.requestRender(event.reason);
        return;
      case "DOCUMENT.LOADED":
        this.bus.publish(Topics.EDITOR_DOCUMENT_LOADED, {
          loaded: event.loaded,
          failures: event.failures.map((f) => ({ index: f.index, code: f.error.code, message: f.error.message }))
        });
        return;
      case "DOCUMENT.SAVED":
        this.bus.publish(Topics.EDITOR_DOCUMENT_SAVED, { shapeCount: event.shapeCount });
        return;
      case "PREVIEW.CHANGED":
        this.requestRender("preview");
        return;
    }
  }

  private requestRender(reason: string): void {
    this.bus.publish(Topics.EDITOR_RENDER_REQUESTED, { reason });
  }

  private guard(operation: string, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      this.reportError(operation, error);
    }
  }

  private reportError(operation: string, error: unknown): void {
    if (isEditorError(error)) {
      this.publishError(operation, error.code, error.message);
      return;
    }
    const message = error instanceof Error ? error.message : String(error);
    this.publishError(operation, "UNEXPECTED", message);
  }

  private publishError(operation: string, code: string, message: string): void {
    this.bus.publish(Topics.EDITOR_ERROR, { operation, code, message });
  }

  private toPointerEvent(
    type: InputPointerEvent["type"],
    payload: {
      x: number;
      y: number;
      buttons: number;
      pointerId: number;
      modifiers: NormalizedModifiers;
      timestamp: number;
    },
  ): InputPointerEvent {
    return {
      type,
      pointerId: payload.pointerId,
      buttons: payload.buttons,
      position: { x: payload.x, y: payload.y },
      modifiers: toModifiers(payload.modifiers),
      timestamp: payload.timestamp
    };
  }
}

function toModifiers(modifiers: NormalizedModifiers): InputModifiers {
  return {
    alt: modifiers.altKey,
    ctrl: modifiers.ctrlKey,
    meta: modifiers.metaKey,
    shift: modifiers.shiftKey
  };
}

function requirePath(params: Record<string, unknown> | undefined): string {
  const path = params?.["path"];
  if (typeof path !== "string" || path.length === 0) {
    throw new Error("A document path is required");
  }
  return path;
}
