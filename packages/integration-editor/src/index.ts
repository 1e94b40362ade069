import {
  Topics,
  createEventBus,
  createEventLoggerMiddleware,
  type EventBus
} from "@sketchpad/event-bus";
import { ShapeEditor, type EditorConfigOverrides, type ShapePainter } from "@sketchpad/shape-kernel";
import { EditorMediator, type EditorMediatorOptions } from "./EditorMediator.js";
import { LogRecorder } from "./LogRecorder.js";
import { RenderingMediator } from "./RenderingMediator.js";

export { EditorMediator, STYLE_EDITOR_METHOD, STYLE_EDITOR_SERVICE } from "./EditorMediator.js";
export type { DocumentOpener, EditorMediatorOptions } from "./EditorMediator.js";
export { RenderingMediator } from "./RenderingMediator.js";
export { LogRecorder } from "./LogRecorder.js";
export type { LogEntry, LogRecorderOptions } from "./LogRecorder.js";

export type SketchpadOptions = EditorMediatorOptions & {
  config?: EditorConfigOverrides;
  painter?: ShapePainter;
  maxLogEntries?: number;
};

export type Sketchpad = {
  bus: EventBus;
  editor: ShapeEditor;
  logs: LogRecorder;
  dispose(): void;
};

/** Wires an editor to a fresh bus with event logging and, optionally, a painter. */
export function createSketchpad(options: SketchpadOptions = {}): Sketchpad {
  const bus = createEventBus({
    middlewares: [
      createEventLoggerMiddleware({
        logTopic: Topics.LOG_EVENT,
        ignoreTopics: [Topics.INPUT_MOUSE_MOVE, Topics.INPUT_WHEEL, Topics.EDITOR_RENDER_REQUESTED]
      })
    ]
  });
  const editor = new ShapeEditor(options.config);
  const logs = new LogRecorder(bus, { maxEntries: options.maxLogEntries });
  const mediator = new EditorMediator(bus, editor, { openDocument: options.openDocument });
  const rendering = options.painter ? new RenderingMediator(bus, editor, options.painter) : null;

  logs.attach();
  mediator.attach();
  rendering?.attach();

  return {
    bus,
    editor,
    logs,
    dispose() {
      rendering?.detach();
      mediator.detach();
      logs.detach();
      bus.destroy();
    }
  };
}
