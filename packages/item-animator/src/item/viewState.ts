import type { ItemView, ViewProperties } from "./ItemHandle.js";

export const NEUTRAL_VIEW_STATE: Readonly<ViewProperties> = {
  translationX: 0,
  translationY: 0,
  alpha: 1,
  scaleX: 1,
  scaleY: 1
};

/** Restores every animated property to its resting value. */
export function clearViewState(view: ItemView): void {
  view.translationX = NEUTRAL_VIEW_STATE.translationX;
  view.translationY = NEUTRAL_VIEW_STATE.translationY;
  view.alpha = NEUTRAL_VIEW_STATE.alpha;
  view.scaleX = NEUTRAL_VIEW_STATE.scaleX;
  view.scaleY = NEUTRAL_VIEW_STATE.scaleY;
}

export function resetTranslation(view: ItemView): void {
  view.translationX = 0;
  view.translationY = 0;
}

export function isNeutral(view: ItemView): boolean {
  return (
    view.translationX === 0 &&
    view.translationY === 0 &&
    view.alpha === 1 &&
    view.scaleX === 1 &&
    view.scaleY === 1
  );
}

/** Integer pixel offset, never -0. */
export function toPixel(value: number): number {
  const truncated = Math.trunc(value);
  return truncated === 0 ? 0 : truncated;
}

export function negate(value: number): number {
  return value === 0 ? 0 : -value;
}
