export type {
  AnimatorChangePayload,
  AnimatorCommand,
  AnimatorCommandPayload,
  AnimatorFinishedPayload,
  AnimatorItemPayload,
  KnownTopic,
  LogEventPayload,
  TopicPayloadMap
} from "./payloads.js";
export type { BusEvent, EventBus, EventBusHandler, EventBusMiddleware, EventBusTopic, Unsubscribe } from "./eventBus.js";
export { createEventBus, createEventLoggerMiddleware } from "./eventBus.js";
export { Topics } from "./topics.js";
