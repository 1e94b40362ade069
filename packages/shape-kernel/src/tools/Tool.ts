import type { Point } from "../math/types.js";
import type { ShapeGeometry } from "../model/geometry.js";

export type InputModifiers = {
  shift: boolean;
  alt: boolean;
  ctrl: boolean;
  meta: boolean;
};

export type InputPointerEventType = "pointerdown" | "pointermove" | "pointerup" | "wheel";

/**
 * For `wheel` events `deltaY` counts notches: negative when the wheel turns
 * away from the user.
 */
export type InputPointerEvent = {
  type: InputPointerEventType;
  pointerId: number;
  buttons: number;
  position: Point;
  deltaY?: number;
  modifiers: InputModifiers;
  timestamp: number;
};

export type InputKeyEvent = {
  key: string;
  modifiers: InputModifiers;
  timestamp: number;
};

export type ToolEventResult = {
  handled: boolean;
  propagate: boolean;
};

export function unhandled(): ToolEventResult {
  return { handled: false, propagate: true };
}

export function handledStop(): ToolEventResult {
  return { handled: true, propagate: false };
}

export const TOOL_TYPES = ["none", "circle", "rectangle", "path"] as const;

export type ToolType = (typeof TOOL_TYPES)[number];

export function isToolType(value: string): value is ToolType {
  return TOOL_TYPES.some((t) => t === value);
}

/** Signals the editor routes to the active tool before handling them itself. */
export type ToolCommand = "commit" | "cancel";

export type InteractionState =
  | { kind: "idle" }
  | { kind: "staging"; tool: "circle" | "rectangle"; firstPoint: Point | null }
  | { kind: "path-building"; vertices: Point[] };

export type ToolContext = {
  /** Entity ids whose geometry contains `p`, topmost first. */
  hitTest(p: Point): string[];
  isSelected(id: string): boolean;
  /** Replaces the selection; an empty list deselects all. */
  setSelection(ids: string[]): void;
  translateShape(id: string, delta: Point): void;

  addCircle(center: Point, radius: number): void;
  addRectangle(x: number, y: number, width: number, height: number): void;
  addPath(vertices: Point[]): void;

  setPreview(geometry: ShapeGeometry | null): void;
  /** Ends the current tool; the editor reverts to `none`. */
  finishTool(): void;
};

export interface Tool {
  readonly type: ToolType;

  onEnter?(ctx: ToolContext): void;
  onExit?(ctx: ToolContext): void;

  onPointerEvent?(event: InputPointerEvent, ctx: ToolContext): ToolEventResult;
  onCommand?(command: ToolCommand, ctx: ToolContext): ToolEventResult;

  getInteractionState(): InteractionState;
}
