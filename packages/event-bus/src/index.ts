export type {
  EditorDocumentChangedPayload,
  EditorDocumentLoadedPayload,
  EditorDocumentSavedPayload,
  EditorErrorPayload,
  EditorRenderRequestedPayload,
  EditorSelectionChangedPayload,
  EditorToolChangedPayload,
  InputKeyDownPayload,
  InputMouseDownPayload,
  InputMouseMovePayload,
  InputMouseUpPayload,
  InputWheelPayload,
  KnownTopic,
  LogEventPayload,
  NormalizedModifiers,
  RectPayload,
  TopicPayloadMap,
  UICommandPayload,
  UIStyleChangedPayload,
  UIToolChangedPayload
} from "./payloads.js";
export type {
  EventBus,
  EventBusHandler,
  EventBusMiddleware,
  EventBusTopic,
  RpcMethod,
  Unsubscribe
} from "./eventBus.js";
export { createEventBus, createEventLoggerMiddleware } from "./eventBus.js";
export { Topics } from "./topics.js";
