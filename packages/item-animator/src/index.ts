export type { ItemAnimationOverride, ItemHandle, ItemView, OverrideContext, ViewProperties } from "./item/ItemHandle.js";
export { NEUTRAL_VIEW_STATE, clearViewState, isNeutral } from "./item/viewState.js";

export type {
  AnimateOptions,
  AnimationHandle,
  AnimationListener,
  MotionDriver,
  TweenOptions
} from "./motion/MotionDriver.js";
export { DEFAULT_EASE, GsapMotionDriver } from "./motion/GsapMotionDriver.js";

export type {
  IItemAnimator,
  ItemAnimatorEvent,
  ItemAnimatorEventHandler
} from "./animator/IItemAnimator.js";
export type { AnimationCategory, AnimatorDurations, ItemAnimatorOptions } from "./animator/config.js";
export { ANIMATION_CATEGORIES, DEFAULT_DURATIONS } from "./animator/config.js";
export { BaseItemAnimator } from "./animator/BaseItemAnimator.js";
export { FadeInItemAnimator } from "./animator/FadeInItemAnimator.js";
export { ScaleInItemAnimator } from "./animator/ScaleInItemAnimator.js";

export type { EdgeDirection, OverscrollHost } from "./edge/BounceEdgeEffect.js";
export { BounceEdgeEffect } from "./edge/BounceEdgeEffect.js";
