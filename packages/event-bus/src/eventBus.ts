import type { KnownTopic, TopicPayloadMap } from "./payloads.js";

export type EventBusTopic = KnownTopic | (string & {});

export type EventBusHandler<TPayload = unknown> = (payload: TPayload) => void;

export type Unsubscribe = () => void;

export type BusEvent = {
  topic: EventBusTopic;
  payload: unknown;
};

export type EventBusMiddleware = (event: BusEvent, next: () => void, bus: EventBus) => void;

/** Runs `middlewares` in order; `dispatch` runs once the last one calls `next`. */
function runMiddlewares(
  middlewares: readonly EventBusMiddleware[],
  event: BusEvent,
  dispatch: () => void,
  bus: EventBus,
): void {
  let index = -1;
  const run = (i: number) => {
    if (i <= index) return;
    index = i;
    const middleware = middlewares[i];
    if (!middleware) {
      dispatch();
      return;
    }
    middleware(event, () => run(i + 1), bus);
  };
  run(0);
}

export class EventBus {
  private handlersByTopic = new Map<EventBusTopic, Set<EventBusHandler>>();
  private middlewares: EventBusMiddleware[] = [];

  constructor(options?: { middlewares?: EventBusMiddleware[] }) {
    this.middlewares = options?.middlewares ?? [];
  }

  subscribe<TTopic extends KnownTopic>(
    topic: TTopic,
    handler: EventBusHandler<TopicPayloadMap[TTopic]>,
  ): Unsubscribe;
  subscribe<TPayload>(topic: EventBusTopic, handler: EventBusHandler<TPayload>): Unsubscribe;
  subscribe(topic: EventBusTopic, handler: EventBusHandler<unknown>): Unsubscribe {
    const set = this.handlersByTopic.get(topic) ?? new Set<EventBusHandler>();
    set.add(handler);
    this.handlersByTopic.set(topic, set);

    return () => {
      this.unsubscribe(topic, handler);
    };
  }

  /** Subscribes for the next publish of `topic` only. */
  once<TTopic extends KnownTopic>(
    topic: TTopic,
    handler: EventBusHandler<TopicPayloadMap[TTopic]>,
  ): Unsubscribe;
  once<TPayload>(topic: EventBusTopic, handler: EventBusHandler<TPayload>): Unsubscribe;
  once(topic: EventBusTopic, handler: EventBusHandler<unknown>): Unsubscribe {
    const unsubscribe = this.subscribe(topic, (payload: unknown) => {
      unsubscribe();
      handler(payload);
    });
    return unsubscribe;
  }

  /** Resolves with the payload of the next publish of `topic`. */
  waitFor<TTopic extends KnownTopic>(topic: TTopic): Promise<TopicPayloadMap[TTopic]>;
  waitFor<TPayload>(topic: EventBusTopic): Promise<TPayload>;
  waitFor(topic: EventBusTopic): Promise<unknown> {
    return new Promise((resolve) => {
      this.once(topic, resolve);
    });
  }

  unsubscribe<TTopic extends KnownTopic>(
    topic: TTopic,
    handler: EventBusHandler<TopicPayloadMap[TTopic]>,
  ): void;
  unsubscribe<TPayload>(topic: EventBusTopic, handler: EventBusHandler<TPayload>): void;
  unsubscribe(topic: EventBusTopic, handler: EventBusHandler<unknown>): void {
    const set = this.handlersByTopic.get(topic);
    if (!set) return;
    set.delete(handler);
    if (set.size === 0) this.handlersByTopic.delete(topic);
  }

  publish<TTopic extends KnownTopic>(topic: TTopic, payload: TopicPayloadMap[TTopic]): void;
  publish<TPayload>(topic: EventBusTopic, payload: TPayload): void;
  publish(topic: EventBusTopic, payload: unknown): void {
    const dispatch = () => {
      const set = this.handlersByTopic.get(topic);
      if (!set) return;
      // Handlers may unsubscribe while the topic is dispatched.
      for (const handler of [...set]) {
        handler(payload);
      }
    };

    if (this.middlewares.length === 0) {
      dispatch();
      return;
    }
    runMiddlewares(this.middlewares, { topic, payload }, dispatch, this);
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
  const ignore = new Set(options.ignoreTopics ?? []);

  return (event, next, bus) => {
    next();

    if (event.topic === options.logTopic || ignore.has(event.topic)) return;

    bus.publish(options.logTopic, { topic: event.topic, payload: event.payload });
  };
}
