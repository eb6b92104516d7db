import { gsap } from "gsap";
import type { ItemView, ViewProperties } from "../item/ItemHandle.js";
import type {
  AnimateOptions,
  AnimationHandle,
  AnimationListener,
  MotionDriver,
  TweenOptions
} from "./MotionDriver.js";

/** Decelerating curve, (1 - (1 - t)^2). */
export const DEFAULT_EASE = "power1.out";

type GsapTween = ReturnType<typeof gsap.to>;

type LiveAnimation = {
  tween: GsapTween | null;
  listener: AnimationListener | undefined;
  started: boolean;
  done: boolean;
};

const toSeconds = (ms: number): number => ms / 1000;

export class GsapMotionDriver implements MotionDriver {
  private live = new Map<ItemView, LiveAnimation>();

  animate(
    view: ItemView,
    targets: Partial<ViewProperties>,
    options: AnimateOptions,
    listener?: AnimationListener,
  ): AnimationHandle {
    this.cancel(view);

    const entry: LiveAnimation = { tween: null, listener, started: false, done: false };
    this.live.set(view, entry);

    // A zero-duration tween completes inside gsap.to().
    const tween = gsap.to(view, {
      ...targets,
      duration: toSeconds(options.duration),
      delay: toSeconds(options.delay ?? 0),
      ease: options.ease ?? DEFAULT_EASE,
      overwrite: false,
      onStart: () => {
        this.start(entry);
      },
      onComplete: () => {
        this.complete(view, entry);
      }
    });
    if (!entry.done) {
      entry.tween = tween;
    }

    return {
      cancel: () => {
        if (this.live.get(view) === entry) this.cancel(view);
      }
    };
  }

  cancel(view: ItemView): void {
    const entry = this.live.get(view);
    if (!entry) return;
    this.live.delete(view);
    entry.done = true;
    entry.tween?.kill();
    entry.listener?.onCancel?.();
    entry.listener?.onEnd?.(true);
  }

  isAnimating(view: ItemView): boolean {
    return this.live.has(view);
  }

  postDelayed(callback: () => void, delayMs: number): AnimationHandle {
    const call = gsap.delayedCall(toSeconds(delayMs), callback);
    return {
      cancel: () => {
        call.kill();
      }
    };
  }

  tween(from: number, to: number, options: TweenOptions, onUpdate: (value: number) => void): AnimationHandle {
    const state = { value: from };
    const tween = gsap.to(state, {
      value: to,
      duration: toSeconds(options.duration),
      ease: options.ease ?? DEFAULT_EASE,
      onUpdate: () => {
        onUpdate(state.value);
      }
    });
    return {
      cancel: () => {
        tween.kill();
      }
    };
  }

  private complete(view: ItemView, entry: LiveAnimation): void {
    if (entry.done) return;
    entry.done = true;
    if (this.live.get(view) === entry) this.live.delete(view);
    // gsap skips onStart for tweens that have no duration.
    this.start(entry);
    entry.listener?.onEnd?.(false);
  }

  private start(entry: LiveAnimation): void {
    if (entry.started) return;
    entry.started = true;
    entry.listener?.onStart?.();
  }
}
