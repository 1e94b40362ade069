import { Vec2 } from "@sketchpad/geometry";
import type { Point } from "../math/types.js";
import type { InputPointerEvent, InteractionState, Tool, ToolContext, ToolEventResult } from "./Tool.js";
import { handledStop, unhandled } from "./Tool.js";

/**
 * Active while no drawing tool is armed. Clicking the exact same point again
 * walks down the stack of shapes under it; a new point picks the topmost.
 */
export class SelectionTool implements Tool {
  readonly type = "none" as const;

  private lastClickPoint: Point | null = null;
  private cycleIndex = 0;

  private dragTargetId: string | null = null;
  private lastMovePoint: Point | null = null;

  onPointerEvent(event: InputPointerEvent, ctx: ToolContext): ToolEventResult {
    if (event.type === "pointerdown" && (event.buttons & 1) === 1) {
      this.resolveSelection(event.position, ctx);
      this.beginDrag(event.position, ctx);
      return handledStop();
    }

    if (event.type === "pointermove") {
      if (this.dragTargetId && this.lastMovePoint) {
        const delta = Vec2.sub(event.position, this.lastMovePoint);
        this.lastMovePoint = event.position;
        ctx.translateShape(this.dragTargetId, delta);
        return handledStop();
      }
      return unhandled();
    }

    if (event.type === "pointerup") {
      this.dragTargetId = null;
      this.lastMovePoint = null;
      return handledStop();
    }

    return unhandled();
  }

  getInteractionState(): InteractionState {
    return { kind: "idle" };
  }

  private resolveSelection(p: Point, ctx: ToolContext): void {
    const hits = ctx.hitTest(p);

    if (this.lastClickPoint && Vec2.equals(p, this.lastClickPoint)) {
      if (hits.length > 0) {
        this.cycleIndex = (this.cycleIndex + 1) % hits.length;
        ctx.setSelection([hits[this.cycleIndex]]);
        return;
      }
    } else {
      this.lastClickPoint = { x: p.x, y: p.y };
      this.cycleIndex = 0;
      if (hits.length > 0) {
        ctx.setSelection([hits[0]]);
        return;
      }
    }

    ctx.setSelection([]);
  }

  private beginDrag(p: Point, ctx: ToolContext): void {
    this.dragTargetId = ctx.hitTest(p).find((id) => ctx.isSelected(id)) ?? null;
    this.lastMovePoint = this.dragTargetId ? { x: p.x, y: p.y } : null;
  }
}
