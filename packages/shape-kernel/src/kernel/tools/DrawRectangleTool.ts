import { rectFromPoints } from "../../math/rect.js";
import type { Point } from "../../math/types.js";
import { createRectangle } from "../../model/geometry.js";
import type { InputPointerEvent, InteractionState, ToolContext } from "../../tools/Tool.js";
import { BaseTool } from "./BaseTool.js";

export class DrawRectangleTool extends BaseTool {
  readonly type = "rectangle" as const;

  private corner: Point | null = null;

  getInteractionState(): InteractionState {
    return { kind: "staging", tool: "rectangle", firstPoint: this.corner };
  }

  protected onPrimaryClick(event: InputPointerEvent, context: ToolContext): void {
    if (!this.corner) {
      this.corner = { x: event.position.x, y: event.position.y };
      context.setPreview(createRectangle(this.corner.x, this.corner.y, 0, 0));
      return;
    }

    // Either diagonal works: the min corner and absolute size are committed.
    const r = rectFromPoints(this.corner, event.position);
    this.corner = null;
    context.addRectangle(r.x, r.y, r.width, r.height);
    context.finishTool();
  }

  protected override onPointerMove(event: InputPointerEvent, context: ToolContext): void {
    if (!this.corner) return;
    const r = rectFromPoints(this.corner, event.position);
    context.setPreview(createRectangle(r.x, r.y, r.width, r.height));
  }
}
