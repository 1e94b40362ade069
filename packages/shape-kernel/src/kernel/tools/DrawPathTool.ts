import type { Point } from "../../math/types.js";
import { createPath } from "../../model/geometry.js";
import type {
  InputPointerEvent,
  InteractionState,
  ToolCommand,
  ToolContext,
  ToolEventResult
} from "../../tools/Tool.js";
import { handledStop } from "../../tools/Tool.js";
import { BaseTool } from "./BaseTool.js";

/**
 * Every click appends a vertex. The outline is only closed and committed on
 * the commit command; fewer than two vertices commit nothing.
 */
export class DrawPathTool extends BaseTool {
  readonly type = "path" as const;

  private vertices: Point[] = [];

  getInteractionState(): InteractionState {
    return { kind: "path-building", vertices: this.vertices.map((p) => ({ x: p.x, y: p.y })) };
  }

  protected onPrimaryClick(event: InputPointerEvent, context: ToolContext): void {
    this.vertices.push({ x: event.position.x, y: event.position.y });
    context.setPreview(createPath(this.vertices, false));
  }

  protected override onPointerMove(event: InputPointerEvent, context: ToolContext): void {
    if (this.vertices.length === 0) return;
    context.setPreview(createPath([...this.vertices, event.position], false));
  }

  override onCommand(command: ToolCommand, context: ToolContext): ToolEventResult {
    if (command !== "commit") return super.onCommand(command, context);

    const vertices = this.vertices;
    this.vertices = [];
    if (vertices.length >= 2) {
      context.addPath(vertices);
    }
    context.finishTool();
    return handledStop();
  }
}
