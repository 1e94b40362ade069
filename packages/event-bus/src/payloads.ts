export type UIToolType = string;

export type UICommandPayload = {
  command: string;
  params?: Record<string, unknown>;
};

export type UIToolChangedPayload = {
  tool: UIToolType;
};

export type UIStyleChangedPayload = {
  outlineColor?: string;
  fillColor?: string;
  filled?: boolean;
  strokeWidth?: number;
};

export type NormalizedModifiers = {
  altKey: boolean;
  ctrlKey: boolean;
  metaKey: boolean;
  shiftKey: boolean;
};

export type InputMouseDownPayload = {
  x: number;
  y: number;
  buttons: number;
  button: number;
  pointerId: number;
  modifiers: NormalizedModifiers;
  timestamp: number;
};

export type InputMouseMovePayload = {
  x: number;
  y: number;
  buttons: number;
  pointerId: number;
  modifiers: NormalizedModifiers;
  timestamp: number;
};

export type InputMouseUpPayload = {
  x: number;
  y: number;
  buttons: number;
  button: number;
  pointerId: number;
  modifiers: NormalizedModifiers;
  timestamp: number;
};

export type InputWheelPayload = {
  x: number;
  y: number;
  deltaX: number;
  deltaY: number;
  modifiers: NormalizedModifiers;
  timestamp: number;
};

export type InputKeyDownPayload = {
  key: string;
  code: string;
  modifiers: NormalizedModifiers;
  timestamp: number;
};

export type RectPayload = {
  x: number;
  y: number;
  width: number;
  height: number;
};

export type EditorToolChangedPayload = {
  tool: UIToolType;
};

export type EditorSelectionChangedPayload = {
  selectedIds: string[];
  bounds: RectPayload | null;
};

export type EditorDocumentChangedPayload = {
  reason: string;
  shapeCount: number;
};

export type EditorDocumentLoadedPayload = {
  loaded: number;
  failures: Array<{ index: number; code: string; message: string }>;
};

export type EditorDocumentSavedPayload = {
  shapeCount: number;
};

export type EditorErrorPayload = {
  operation: string;
  code: string;
  message: string;
};

export type EditorRenderRequestedPayload = {
  reason: string;
};

export type LogEventPayload = {
  topic: string;
  payload: unknown;
};

type TopicsConst = typeof import("./topics.js").Topics;

export type TopicPayloadMap = {
  [K in TopicsConst["UI_COMMAND"]]: UICommandPayload;
} & {
  [K in TopicsConst["UI_TOOL_CHANGED"]]: UIToolChangedPayload;
} & {
  [K in TopicsConst["UI_STYLE_CHANGED"]]: UIStyleChangedPayload;
} & {
  [K in TopicsConst["INPUT_MOUSE_DOWN"]]: InputMouseDownPayload;
} & {
  [K in TopicsConst["INPUT_MOUSE_MOVE"]]: InputMouseMovePayload;
} & {
  [K in TopicsConst["INPUT_MOUSE_UP"]]: InputMouseUpPayload;
} & {
  [K in TopicsConst["INPUT_WHEEL"]]: InputWheelPayload;
} & {
  [K in TopicsConst["INPUT_KEY_DOWN"]]: InputKeyDownPayload;
} & {
  [K in TopicsConst["EDITOR_TOOL_CHANGED"]]: EditorToolChangedPayload;
} & {
  [K in TopicsConst["EDITOR_SELECTION_CHANGED"]]: EditorSelectionChangedPayload;
} & {
  [K in TopicsConst["EDITOR_DOCUMENT_CHANGED"]]: EditorDocumentChangedPayload;
} & {
  [K in TopicsConst["EDITOR_DOCUMENT_LOADED"]]: EditorDocumentLoadedPayload;
} & {
  [K in TopicsConst["EDITOR_DOCUMENT_SAVED"]]: EditorDocumentSavedPayload;
} & {
  [K in TopicsConst["EDITOR_ERROR"]]: EditorErrorPayload;
} & {
  [K in TopicsConst["EDITOR_RENDER_REQUESTED"]]: EditorRenderRequestedPayload;
} & {
  [K in TopicsConst["LOG_EVENT"]]: LogEventPayload;
};

export type KnownTopic = keyof TopicPayloadMap;
