import type { MotionDriver } from "../motion/MotionDriver.js";

export type AnimationCategory = "add" | "remove" | "move" | "change";

export const ANIMATION_CATEGORIES: readonly AnimationCategory[] = ["remove", "move", "change", "add"];

export type AnimatorDurations = Record<AnimationCategory, number>;

export const DEFAULT_DURATIONS: Readonly<AnimatorDurations> = {
  add: 120,
  remove: 120,
  move: 250,
  change: 250
};

export type ItemAnimatorOptions = {
  driver?: MotionDriver;
  durations?: Partial<AnimatorDurations>;
  ease?: string;
  /** Throws on bookkeeping invariant violations instead of repairing them. */
  debug?: boolean;
};

export function resolveDurations(
  base: Readonly<AnimatorDurations>,
  patch: Partial<AnimatorDurations> | undefined,
): AnimatorDurations {
  const next: AnimatorDurations = { ...base };
  if (!patch) return next;

  for (const category of ANIMATION_CATEGORIES) {
    const value = patch[category];
    if (value === undefined) continue;
    if (!Number.isInteger(value) || value < 0) {
      throw new Error(`${category} duration must be a non-negative integer, got ${value}`);
    }
    next[category] = value;
  }
  return next;
}
