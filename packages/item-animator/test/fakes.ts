import type { IItemAnimator, ItemAnimatorEvent } from "../src/animator/IItemAnimator.js";
import type { ItemAnimationOverride, ItemHandle, ItemView, ViewProperties } from "../src/item/ItemHandle.js";
import { NEUTRAL_VIEW_STATE } from "../src/item/viewState.js";
import type {
  AnimateOptions,
  AnimationHandle,
  AnimationListener,
  MotionDriver,
  TweenOptions
} from "../src/motion/MotionDriver.js";

export type ManualAnimation = {
  view: ItemView;
  targets: Partial<ViewProperties>;
  options: AnimateOptions;
  listener: AnimationListener | undefined;
  state: "pending" | "running" | "finished" | "cancelled";
};

export type ManualDelayedCall = {
  callback: () => void;
  delayMs: number;
  state: "waiting" | "ran" | "cancelled";
};

export type ManualTween = {
  from: number;
  to: number;
  options: TweenOptions;
  onUpdate: (value: number) => void;
  cancelled: boolean;
};

/** Driver that only moves when the test tells it to. */
export class ManualMotionDriver implements MotionDriver {
  readonly animations: ManualAnimation[] = [];
  readonly delayed: ManualDelayedCall[] = [];
  readonly tweens: ManualTween[] = [];
  private live = new Map<ItemView, ManualAnimation>();

  animate(
    view: ItemView,
    targets: Partial<ViewProperties>,
    options: AnimateOptions,
    listener?: AnimationListener,
  ): AnimationHandle {
    this.cancel(view);
    const animation: ManualAnimation = { view, targets: { ...targets }, options, listener, state: "pending" };
    this.live.set(view, animation);
    this.animations.push(animation);
    return {
      cancel: () => {
        if (this.live.get(view) === animation) this.cancel(view);
      }
    };
  }

  cancel(view: ItemView): void {
    const animation = this.live.get(view);
    if (!animation) return;
    this.live.delete(view);
    animation.state = "cancelled";
    animation.listener?.onCancel?.();
    animation.listener?.onEnd?.(true);
  }

  isAnimating(view: ItemView): boolean {
    return this.live.has(view);
  }

  postDelayed(callback: () => void, delayMs: number): AnimationHandle {
    const call: ManualDelayedCall = { callback, delayMs, state: "waiting" };
    this.delayed.push(call);
    return {
      cancel: () => {
        if (call.state === "waiting") call.state = "cancelled";
      }
    };
  }

  tween(from: number, to: number, options: TweenOptions, onUpdate: (value: number) => void): AnimationHandle {
    const tween: ManualTween = { from, to, options, onUpdate, cancelled: false };
    this.tweens.push(tween);
    return {
      cancel: () => {
        tween.cancelled = true;
      }
    };
  }

  liveAnimation(view: ItemView): ManualAnimation | undefined {
    return this.live.get(view);
  }

  start(animation: ManualAnimation): void {
    if (animation.state !== "pending") return;
    animation.state = "running";
    animation.listener?.onStart?.();
  }

  finish(animation: ManualAnimation): void {
    if (this.live.get(animation.view) !== animation) return;
    this.start(animation);
    Object.assign(animation.view, animation.targets);
    this.live.delete(animation.view);
    animation.state = "finished";
    animation.listener?.onEnd?.(false);
  }

  /** Finishes every live animation, including ones started while finishing. */
  finishAll(): void {
    for (let next = this.live.values().next(); !next.done; next = this.live.values().next()) {
      this.finish(next.value);
    }
  }

  /** Runs the oldest waiting delayed call; false when none is left. */
  runNextDelayed(): boolean {
    const call = this.delayed.find((candidate) => candidate.state === "waiting");
    if (!call) return false;
    call.state = "ran";
    call.callback();
    return true;
  }

  flush(): void {
    do {
      this.finishAll();
    } while (this.runNextDelayed());
    this.finishAll();
  }

  step(tween: ManualTween, value: number): void {
    if (!tween.cancelled) tween.onUpdate(value);
  }
}

const labels = new WeakMap<ItemHandle, string>();

export type TestItemOptions = {
  oldPosition?: number;
  position?: number;
  animation?: ItemAnimationOverride;
};

export function createItem(label: string, options: TestItemOptions = {}): ItemHandle {
  const item: ItemHandle = {
    view: { ...NEUTRAL_VIEW_STATE },
    oldPosition: options.oldPosition ?? 0,
    position: options.position ?? 0,
    animation: options.animation
  };
  labels.set(item, label);
  return item;
}

export function describeEvent(event: ItemAnimatorEvent): string {
  const name = event.type.replace("ANIMATOR.", "");
  if (event.type === "ANIMATOR.ANIMATIONS_FINISHED") return name;
  const label = labels.get(event.item) ?? "?";
  if (event.type === "ANIMATOR.CHANGE_STARTING" || event.type === "ANIMATOR.CHANGE_FINISHED") {
    return `${name}:${label}:${event.oldItem ? "old" : "new"}`;
  }
  return `${name}:${label}`;
}

/** Collects every event of `animator` as "TYPE:label" strings. */
export function recordEvents(animator: IItemAnimator): string[] {
  const events: string[] = [];
  animator.on((event) => {
    events.push(describeEvent(event));
  });
  return events;
}
