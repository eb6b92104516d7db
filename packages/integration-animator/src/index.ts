export { AnimatorMediator, isItemHandle } from "./AnimatorMediator.js";
export { AnimatorEventLog, type LogEntry } from "./AnimatorEventLog.js";
