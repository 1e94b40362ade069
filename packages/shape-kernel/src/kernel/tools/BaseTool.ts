import type {
  InputPointerEvent,
  InteractionState,
  Tool,
  ToolCommand,
  ToolContext,
  ToolEventResult,
  ToolType
} from "../../tools/Tool.js";
import { handledStop, unhandled } from "../../tools/Tool.js";

/**
 * Drawing tools share the pointer dispatch and the cancel behaviour: any
 * staging is dropped and the editor falls back to selection.
 */
export abstract class BaseTool implements Tool {
  abstract readonly type: ToolType;

  abstract getInteractionState(): InteractionState;

  onExit(context: ToolContext): void {
    context.setPreview(null);
  }

  onPointerEvent(event: InputPointerEvent, context: ToolContext): ToolEventResult {
    switch (event.type) {
      case "pointerdown":
        if ((event.buttons & 1) !== 1) return unhandled();
        this.onPrimaryClick(event, context);
        return handledStop();
      case "pointermove":
        this.onPointerMove(event, context);
        return handledStop();
      case "pointerup":
        return handledStop();
      default:
        return unhandled();
    }
  }

  onCommand(command: ToolCommand, context: ToolContext): ToolEventResult {
    if (command === "cancel") {
      context.finishTool();
      return handledStop();
    }
    return unhandled();
  }

  protected abstract onPrimaryClick(event: InputPointerEvent, context: ToolContext): void;

  protected onPointerMove(_event: InputPointerEvent, _context: ToolContext): void {
    // No-op
  }
}
