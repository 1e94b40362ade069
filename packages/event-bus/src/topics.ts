export const Topics = {
  UI_COMMAND: "UI.COMMAND",
  UI_TOOL_CHANGED: "UI.TOOL_CHANGED",
  UI_STYLE_CHANGED: "UI.STYLE_CHANGED",

  INPUT_MOUSE_DOWN: "INPUT.MOUSE_DOWN",
  INPUT_MOUSE_MOVE: "INPUT.MOUSE_MOVE",
  INPUT_MOUSE_UP: "INPUT.MOUSE_UP",
  INPUT_WHEEL: "INPUT.WHEEL",
  INPUT_KEY_DOWN: "INPUT.KEY_DOWN",

  EDITOR_TOOL_CHANGED: "EDITOR.TOOL_CHANGED",
  EDITOR_SELECTION_CHANGED: "EDITOR.SELECTION_CHANGED",
  EDITOR_DOCUMENT_CHANGED: "EDITOR.DOCUMENT_CHANGED",
  EDITOR_DOCUMENT_LOADED: "EDITOR.DOCUMENT_LOADED",
  EDITOR_DOCUMENT_SAVED: "EDITOR.DOCUMENT_SAVED",
  EDITOR_ERROR: "EDITOR.ERROR",
  EDITOR_RENDER_REQUESTED: "EDITOR.RENDER_REQUESTED",

  LOG_EVENT: "LOG.EVENT"
} as const;
