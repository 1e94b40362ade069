import type {
  InputPointerEvent,
  InteractionState,
  Tool,
  ToolCommand,
  ToolContext,
  ToolEventResult,
  ToolType
} from "../../tools/Tool.js";
import { unhandled } from "../../tools/Tool.js";
import { DrawToolFactory } from "./DrawToolFactory.js";

/**
 * Owns the active tool. Switching always builds a fresh instance, so staged
 * points and the selection click memory never survive a tool change.
 */
export class ToolManager {
  private currentTool: Tool;
  private factory: DrawToolFactory;
  private currentToolType: ToolType;

  constructor() {
    this.factory = new DrawToolFactory();
    this.currentToolType = "none";
    this.currentTool = this.factory.createTool(this.currentToolType);
  }

  get activeTool(): Tool {
    return this.currentTool;
  }

  get activeToolType(): ToolType {
    return this.currentToolType;
  }

  setTool(toolType: ToolType, context: ToolContext): void {
    this.currentTool.onExit?.(context);
    this.currentToolType = toolType;
    this.currentTool = this.factory.createTool(toolType);
    this.currentTool.onEnter?.(context);
  }

  onPointerEvent(event: InputPointerEvent, context: ToolContext): ToolEventResult {
    return this.currentTool.onPointerEvent?.(event, context) ?? unhandled();
  }

  onCommand(command: ToolCommand, context: ToolContext): ToolEventResult {
    return this.currentTool.onCommand?.(command, context) ?? unhandled();
  }

  getInteractionState(): InteractionState {
    return this.currentTool.getInteractionState();
  }
}
