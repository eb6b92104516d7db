import { Topics, type EventBus, type Unsubscribe } from "@listmotion/event-bus";

export type LogEntry = {
  id: string;
  time: number;
  topic: string;
  payload: unknown;
};

/** Keeps the most recent LOG.EVENT entries, oldest first. */
export class AnimatorEventLog {
  private entries: LogEntry[] = [];
  private sequence = 0;
  private unsubscribe: Unsubscribe | null = null;

  constructor(
    private readonly bus: EventBus,
    private readonly maxLogs = 200,
    private readonly now: () => number = Date.now,
  ) {}

  attach() {
    if (this.unsubscribe) return;
    this.unsubscribe = this.bus.subscribe(Topics.LOG_EVENT, (payload) => {
      const time = this.now();
      this.entries.push({
        id: `${time}-${++this.sequence}`,
        time,
        topic: payload.topic,
        payload: payload.payload
      });
      if (this.entries.length > this.maxLogs) {
        this.entries = this.entries.slice(this.entries.length - this.maxLogs);
      }
    });
  }

  detach() {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  getEntries(): readonly LogEntry[] {
    return this.entries;
  }

  clear() {
    this.entries = [];
  }
}
