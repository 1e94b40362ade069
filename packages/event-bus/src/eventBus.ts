import type { KnownTopic, TopicPayloadMap } from "./payloads.js";

export type EventBusTopic = KnownTopic | (string & {});

export type EventBusHandler<TPayload = unknown> = (payload: TPayload) => void;

export type Unsubscribe = () => void;

export type EventBusMiddleware = (
  event: {
    topic: EventBusTopic;
    payload: unknown;
  },
  next: () => void,
  bus: EventBus,
) => void;

export type RpcMethod = (...args: never[]) => unknown;

export interface RpcRequestPayload {
  requestId: string;
  args: unknown[];
}

export type RpcResponsePayload<T = unknown> =
  | { requestId: string; ok: true; result: T }
  | { requestId: string; ok: false; error: string };

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message || String(error);
  return String(error);
}

export class EventBus {
  private handlersByTopic = new Map<EventBusTopic, Set<EventBusHandler>>();
  private middlewares: EventBusMiddleware[] = [];

  constructor(options?: { middlewares?: EventBusMiddleware[] }) {
    this.middlewares = options?.middlewares ?? [];
  }

  rpcService(service: string, methods: Record<string, RpcMethod>): Unsubscribe {
    const unsubscribes: Unsubscribe[] = [];

    for (const [methodName, methodImpl] of Object.entries(methods)) {
      const requestTopic = `rpc:request:${service}:${methodName}`;

      unsubscribes.push(
        this.subscribe<RpcRequestPayload>(requestTopic, ({ requestId, args }) => {
          const responseTopic = `rpc:response:${service}:${methodName}:${requestId}`;

          void Promise.resolve()
            .then((): unknown => Reflect.apply(methodImpl, undefined, args))
            .then(
              (result) => {
                this.publish<RpcResponsePayload>(responseTopic, { requestId, ok: true, result });
              },
              (error: unknown) => {
                this.publish<RpcResponsePayload>(responseTopic, { requestId, ok: false, error: errorMessage(error) });
              },
            );
        }),
      );
    }

    return () => {
      for (const unsub of unsubscribes) unsub();
    };
  }

  rpcCall<TResult = unknown>(service: string, method: string, ...args: unknown[]): Promise<TResult> {
    return new Promise((resolve, reject) => {
      const requestTopic = `rpc:request:${service}:${method}`;
      if (!this.hasSubscribers(requestTopic)) {
        reject(new Error(`No RPC service registered for ${service}.${method}`));
        return;
      }

      const requestId = Math.random().toString(36).substring(2, 15);
      const responseTopic = `rpc:response:${service}:${method}:${requestId}`;

      const unsubscribe = this.subscribe<RpcResponsePayload<TResult>>(responseTopic, (payload) => {
        unsubscribe();

        if (payload.ok) {
          resolve(payload.result);
        } else {
          reject(new Error(payload.error));
        }
      });

      this.publish<RpcRequestPayload>(requestTopic, { requestId, args });
    });
  }

  hasSubscribers(topic: EventBusTopic): boolean {
    return (this.handlersByTopic.get(topic)?.size ?? 0) > 0;
  }

  subscribe<TTopic extends KnownTopic>(
    topic: TTopic,
    handler: EventBusHandler<TopicPayloadMap[TTopic]>,
  ): Unsubscribe;
  subscribe<TPayload>(topic: EventBusTopic, handler: EventBusHandler<TPayload>): Unsubscribe;
  subscribe(topic: EventBusTopic, handler: EventBusHandler<never>): Unsubscribe {
    const set = this.handlersByTopic.get(topic) ?? new Set<EventBusHandler>();
    set.add(handler as EventBusHandler);
    this.handlersByTopic.set(topic, set);

    return () => {
      this.unsubscribe(topic, handler);
    };
  }

  unsubscribe<TTopic extends KnownTopic>(
    topic: TTopic,
    handler: EventBusHandler<TopicPayloadMap[TTopic]>,
  ): void;
  unsubscribe<TPayload>(topic: EventBusTopic, handler: EventBusHandler<TPayload>): void;
  unsubscribe(topic: EventBusTopic, handler: EventBusHandler<never>): void {
    const set = this.handlersByTopic.get(topic);
    if (!set) return;
    set.delete(handler as EventBusHandler);
    if (set.size === 0) this.handlersByTopic.delete(topic);
  }

  publish<TTopic extends KnownTopic>(topic: TTopic, payload: TopicPayloadMap[TTopic]): void;
  publish<TPayload>(topic: EventBusTopic, payload: TPayload): void;
  publish(topic: EventBusTopic, payload: unknown): void {
    const event = { topic, payload };

    const dispatch = () => {
      const set = this.handlersByTopic.get(topic);
      if (!set) return;
      for (const handler of [...set]) {
        handler(payload);
      }
    };

    if (this.middlewares.length === 0) {
      dispatch();
      return;
    }

    let index = -1;
    const run = (i: number) => {
      if (i <= index) return;
      index = i;
      const middleware = this.middlewares[i];
      if (!middleware) {
        dispatch();
        return;
      }
      middleware(event, () => run(i + 1), this);
    };

    run(0);
  }

  destroy(): void {
    this.handlersByTopic.clear();
    this.middlewares = [];
  }
}

export function createEventBus(options?: { middlewares?: EventBusMiddleware[] }): EventBus {
  return new EventBus(options);
}

export function createEventLoggerMiddleware(options: {
  ignoreTopics?: EventBusTopic[];
  logTopic: EventBusTopic;
}): EventBusMiddleware {
  const ignore = new Set<EventBusTopic>(options.ignoreTopics ?? []);

  return (event, next, bus) => {
    next();

    if (ignore.has(event.topic) || event.topic === options.logTopic) return;
    if (event.topic.startsWith("rpc:")) return;

    bus.publish(options.logTopic, { topic: event.topic, payload: event.payload });
  };
}
