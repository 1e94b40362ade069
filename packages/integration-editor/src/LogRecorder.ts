import { Topics, type EventBus } from "@sketchpad/event-bus";
import { createId } from "@sketchpad/utils";

export type LogEntry = {
  id: string;
  time: number;
  topic: string;
  payload: unknown;
};

export type LogRecorderOptions = {
  maxEntries?: number;
  now?: () => number;
};

/** Keeps the most recent LOG.EVENT entries published by the logger middleware. */
export class LogRecorder {
  private unsubscribe: (() => void) | null = null;
  private logs: LogEntry[] = [];
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(
    private readonly bus: EventBus,
    options: LogRecorderOptions = {},
  ) {
    this.maxEntries = options.maxEntries ?? 200;
    this.now = options.now ?? Date.now;
  }

  attach() {
    if (this.unsubscribe) return;
    this.unsubscribe = this.bus.subscribe(Topics.LOG_EVENT, (payload) => {
      this.logs.push({
        id: createId("log"),
        time: this.now(),
        topic: payload.topic,
        payload: payload.payload
      });
      if (this.logs.length > this.maxEntries) {
        this.logs = this.logs.slice(this.logs.length - this.maxEntries);
      }
    });
  }

  detach() {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  entries(): readonly LogEntry[] {
    return this.logs;
  }

  clear() {
    this.logs = [];
  }
}
