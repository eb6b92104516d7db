export type AnimatorCommand = "RUN_PENDING" | "END_ALL" | "END_ITEM";

export type AnimatorCommandPayload = {
  command: AnimatorCommand;
  item?: unknown;
};

export type AnimatorItemPayload = {
  item: unknown; // Type cycle avoidance, actual type is ItemHandle
};

export type AnimatorChangePayload = {
  item: unknown;
  oldItem: boolean;
};

export type AnimatorFinishedPayload = {
  timestamp: number;
};

export type LogEventPayload = {
  topic: string;
  payload: unknown;
};

type TopicsConst = typeof import("./topics.js").Topics;

export type TopicPayloadMap = {
  [K in TopicsConst["ANIMATOR_COMMAND"]]: AnimatorCommandPayload;
} & {
  [K in TopicsConst["ANIMATOR_REMOVE_STARTING"]]: AnimatorItemPayload;
} & {
  [K in TopicsConst["ANIMATOR_REMOVE_FINISHED"]]: AnimatorItemPayload;
} & {
  [K in TopicsConst["ANIMATOR_ADD_STARTING"]]: AnimatorItemPayload;
} & {
  [K in TopicsConst["ANIMATOR_ADD_FINISHED"]]: AnimatorItemPayload;
} & {
  [K in TopicsConst["ANIMATOR_MOVE_STARTING"]]: AnimatorItemPayload;
} & {
  [K in TopicsConst["ANIMATOR_MOVE_FINISHED"]]: AnimatorItemPayload;
} & {
  [K in TopicsConst["ANIMATOR_CHANGE_STARTING"]]: AnimatorChangePayload;
} & {
  [K in TopicsConst["ANIMATOR_CHANGE_FINISHED"]]: AnimatorChangePayload;
} & {
  [K in TopicsConst["ANIMATOR_ANIMATIONS_FINISHED"]]: AnimatorFinishedPayload;
} & {
  [K in TopicsConst["LOG_EVENT"]]: LogEventPayload;
};

export type KnownTopic = keyof TopicPayloadMap;
