import { Topics, type EventBus } from "@listmotion/event-bus";
import type { IItemAnimator, ItemAnimatorEvent, ItemHandle, ItemView } from "@listmotion/item-animator";

const VIEW_PROPERTIES = ["translationX", "translationY", "alpha", "scaleX", "scaleY"] as const;

function isItemView(value: unknown): value is ItemView {
  if (typeof value !== "object" || value === null) return false;
  return VIEW_PROPERTIES.every((key) => typeof Reflect.get(value, key) === "number");
}

export function isItemHandle(value: unknown): value is ItemHandle {
  if (typeof value !== "object" || value === null) return false;
  if (!("view" in value) || !isItemView(value.view)) return false;
  return (
    "position" in value &&
    typeof value.position === "number" &&
    "oldPosition" in value &&
    typeof value.oldPosition === "number"
  );
}

/**
 * Connects an item animator to the event bus: animator events go out as
 * ANIMATOR.* topics and ANIMATOR.COMMAND payloads drive the animator.
 */
export class AnimatorMediator {
  private unsubscribes: Array<() => void> = [];

  constructor(
    private readonly bus: EventBus,
    private readonly animator: IItemAnimator,
    private readonly now: () => number = Date.now,
  ) {}

  attach() {
    this.unsubscribes.push(
      this.bus.subscribe(Topics.ANIMATOR_COMMAND, (payload) => {
        if (payload.command === "RUN_PENDING") {
          this.animator.runPendingAnimations();
          return;
        }
        if (payload.command === "END_ALL") {
          this.animator.endAnimations();
          return;
        }
        if (payload.command === "END_ITEM") {
          if (!isItemHandle(payload.item)) {
            throw new Error("END_ITEM needs an item handle");
          }
          this.animator.endAnimation(payload.item);
        }
      }),
    );

    this.unsubscribes.push(
      this.animator.on((event: ItemAnimatorEvent) => {
        this.forward(event);
      }),
    );
  }

  detach() {
    for (const unsub of this.unsubscribes) unsub();
    this.unsubscribes = [];
  }

  private forward(event: ItemAnimatorEvent) {
    switch (event.type) {
      case "ANIMATOR.REMOVE_STARTING":
        this.bus.publish(Topics.ANIMATOR_REMOVE_STARTING, { item: event.item });
        return;
      case "ANIMATOR.REMOVE_FINISHED":
        this.bus.publish(Topics.ANIMATOR_REMOVE_FINISHED, { item: event.item });
        return;
      case "ANIMATOR.ADD_STARTING":
        this.bus.publish(Topics.ANIMATOR_ADD_STARTING, { item: event.item });
        return;
      case "ANIMATOR.ADD_FINISHED":
        this.bus.publish(Topics.ANIMATOR_ADD_FINISHED, { item: event.item });
        return;
      case "ANIMATOR.MOVE_STARTING":
        this.bus.publish(Topics.ANIMATOR_MOVE_STARTING, { item: event.item });
        return;
      case "ANIMATOR.MOVE_FINISHED":
        this.bus.publish(Topics.ANIMATOR_MOVE_FINISHED, { item: event.item });
        return;
      case "ANIMATOR.CHANGE_STARTING":
        this.bus.publish(Topics.ANIMATOR_CHANGE_STARTING, { item: event.item, oldItem: event.oldItem });
        return;
      case "ANIMATOR.CHANGE_FINISHED":
        this.bus.publish(Topics.ANIMATOR_CHANGE_FINISHED, { item: event.item, oldItem: event.oldItem });
        return;
      case "ANIMATOR.ANIMATIONS_FINISHED":
        this.bus.publish(Topics.ANIMATOR_ANIMATIONS_FINISHED, { timestamp: this.now() });
        return;
    }
  }
}
