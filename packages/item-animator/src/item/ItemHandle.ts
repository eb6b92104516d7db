import type { AnimationListener, MotionDriver } from "../motion/MotionDriver.js";

export type ViewProperties = {
  translationX: number;
  translationY: number;
  alpha: number;
  scaleX: number;
  scaleY: number;
};

/** The visual element of one list row. The animators only touch these properties. */
export interface ItemView extends ViewProperties {}

/**
 * One row of the host list. Identity is the object reference; the animators
 * hold it only while it animates.
 */
export interface ItemHandle {
  readonly view: ItemView;
  /** Position before the current update, -1 when unknown. */
  readonly oldPosition: number;
  /** Position after the current update, -1 when unknown. */
  readonly position: number;
  /** Per-item add/remove animation that replaces the animator's defaults. */
  readonly animation?: ItemAnimationOverride;
}

export type OverrideContext = {
  driver: MotionDriver;
  duration: number;
  delay: number;
  ease: string;
};

export interface ItemAnimationOverride {
  preAnimateRemove(item: ItemHandle): void;
  preAnimateAdd(item: ItemHandle): void;
  /** `listener.onEnd` must be reached once the animation is over, including after a cancel. */
  animateRemove(item: ItemHandle, listener: AnimationListener, context: OverrideContext): void;
  animateAdd(item: ItemHandle, listener: AnimationListener, context: OverrideContext): void;
}
