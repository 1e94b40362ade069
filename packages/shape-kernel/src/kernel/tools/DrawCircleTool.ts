import { Vec2 } from "@sketchpad/geometry";
import type { Point } from "../../math/types.js";
import { createCircle } from "../../model/geometry.js";
import type { InputPointerEvent, InteractionState, ToolContext } from "../../tools/Tool.js";
import { BaseTool } from "./BaseTool.js";

/** First click places the center, the second sets the radius (truncated to an integer). */
export class DrawCircleTool extends BaseTool {
  readonly type = "circle" as const;

  private center: Point | null = null;

  getInteractionState(): InteractionState {
    return { kind: "staging", tool: "circle", firstPoint: this.center };
  }

  protected onPrimaryClick(event: InputPointerEvent, context: ToolContext): void {
    if (!this.center) {
      this.center = { x: event.position.x, y: event.position.y };
      context.setPreview(createCircle(this.center, 0));
      return;
    }

    const center = this.center;
    this.center = null;
    context.addCircle(center, radiusTo(center, event.position));
    context.finishTool();
  }

  protected override onPointerMove(event: InputPointerEvent, context: ToolContext): void {
    if (!this.center) return;
    context.setPreview(createCircle(this.center, radiusTo(this.center, event.position)));
  }
}

function radiusTo(center: Point, p: Point): number {
  return Math.trunc(Vec2.dist(center, p));
}
