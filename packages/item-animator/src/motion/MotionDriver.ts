import type { ItemView, ViewProperties } from "../item/ItemHandle.js";

export interface AnimationListener {
  onStart?(): void;
  onCancel?(): void;
  /**
   * Called exactly once per animation. A cancelled animation reports
   * `onCancel` first and then `onEnd(true)`.
   */
  onEnd?(cancelled: boolean): void;
}

export interface AnimationHandle {
  cancel(): void;
}

export type AnimateOptions = {
  /** Milliseconds. */
  duration: number;
  /** Milliseconds before interpolation starts; `onStart` fires after it. */
  delay?: number;
  ease?: string;
};

export type TweenOptions = {
  duration: number;
  ease?: string;
};

/**
 * Frame-driven timing primitive the animators run on.
 *
 * A view carries at most one live animation: starting another one on the
 * same view cancels the previous through its listener first.
 */
export interface MotionDriver {
  animate(
    view: ItemView,
    targets: Partial<ViewProperties>,
    options: AnimateOptions,
    listener?: AnimationListener,
  ): AnimationHandle;

  /** Cancels the live animation of `view`, if any. */
  cancel(view: ItemView): void;

  isAnimating(view: ItemView): boolean;

  /** Runs `callback` after `delayMs`, on an animation frame. */
  postDelayed(callback: () => void, delayMs: number): AnimationHandle;

  tween(from: number, to: number, options: TweenOptions, onUpdate: (value: number) => void): AnimationHandle;
}
