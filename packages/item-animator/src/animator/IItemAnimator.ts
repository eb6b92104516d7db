import type { ItemHandle } from "../item/ItemHandle.js";
import type { AnimatorDurations } from "./config.js";

export type ItemAnimatorEvent =
  | { type: "ANIMATOR.REMOVE_STARTING"; item: ItemHandle }
  | { type: "ANIMATOR.REMOVE_FINISHED"; item: ItemHandle }
  | { type: "ANIMATOR.ADD_STARTING"; item: ItemHandle }
  | { type: "ANIMATOR.ADD_FINISHED"; item: ItemHandle }
  | { type: "ANIMATOR.MOVE_STARTING"; item: ItemHandle }
  | { type: "ANIMATOR.MOVE_FINISHED"; item: ItemHandle }
  | { type: "ANIMATOR.CHANGE_STARTING"; item: ItemHandle; oldItem: boolean }
  | { type: "ANIMATOR.CHANGE_FINISHED"; item: ItemHandle; oldItem: boolean }
  | { type: "ANIMATOR.ANIMATIONS_FINISHED" };

export type ItemAnimatorEventHandler = (event: ItemAnimatorEvent) => void;

export interface IItemAnimator {
  on(handler: ItemAnimatorEventHandler): () => void;

  requestRemove(item: ItemHandle): boolean;
  requestAdd(item: ItemHandle): boolean;
  requestMove(item: ItemHandle, fromX: number, fromY: number, toX: number, toY: number): boolean;
  requestChange(
    oldItem: ItemHandle,
    newItem: ItemHandle,
    fromX: number,
    fromY: number,
    toX: number,
    toY: number,
  ): boolean;

  runPendingAnimations(): void;

  endAnimation(item: ItemHandle): void;
  endAnimations(): void;

  isRunning(): boolean;
  isAnimating(item: ItemHandle): boolean;
  whenIdle(): Promise<void>;

  getDurations(): AnimatorDurations;
  setDurations(patch: Partial<AnimatorDurations>): void;
}
