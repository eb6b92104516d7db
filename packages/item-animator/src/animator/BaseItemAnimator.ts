import type { ItemHandle, OverrideContext, ViewProperties } from "../item/ItemHandle.js";
import { clearViewState, negate, resetTranslation, toPixel } from "../item/viewState.js";
import { DEFAULT_EASE, GsapMotionDriver } from "../motion/GsapMotionDriver.js";
import type { AnimationListener, MotionDriver } from "../motion/MotionDriver.js";
import { DEFAULT_DURATIONS, resolveDurations, type AnimatorDurations, type ItemAnimatorOptions } from "./config.js";
import type { IItemAnimator, ItemAnimatorEvent, ItemAnimatorEventHandler } from "./IItemAnimator.js";
import { BatchRegistry, type AnimationBatch, type ChangeRecord, type MoveRecord } from "./records.js";

function removeItem(items: ItemHandle[], item: ItemHandle): boolean {
  const index = items.indexOf(item);
  if (index === -1) return false;
  items.splice(index, 1);
  return true;
}

/**
 * Batches the add, remove, move and change animations of list items and runs
 * them in the order removal, then move and change side by side, then addition.
 *
 * Subclasses supply the default add/remove animations; an item carrying an
 * {@link ItemHandle.animation} override replaces them for that item.
 */
export abstract class BaseItemAnimator implements IItemAnimator {
  private handlers = new Set<ItemAnimatorEventHandler>();

  private pendingRemovals: ItemHandle[] = [];
  private pendingAdditions: ItemHandle[] = [];
  private pendingMoves: MoveRecord[] = [];
  private pendingChanges: ChangeRecord[] = [];

  private batchSequence = 0;
  private readonly nextBatchId = () => ++this.batchSequence;
  private additionBatches = new BatchRegistry<ItemHandle>(this.nextBatchId);
  private moveBatches = new BatchRegistry<MoveRecord>(this.nextBatchId);
  private changeBatches = new BatchRegistry<ChangeRecord>(this.nextBatchId);

  protected readonly removeAnimations = new Set<ItemHandle>();
  protected readonly addAnimations = new Set<ItemHandle>();
  private readonly moveAnimations = new Set<ItemHandle>();
  /** Value is true for the old side of a change. */
  private readonly changeAnimations = new Map<ItemHandle, boolean>();

  private completionDeferrals = 0;
  private settled = true;
  private eventHolds = 0;
  private heldEvents: ItemAnimatorEvent[] = [];

  protected readonly driver: MotionDriver;
  protected readonly ease: string;
  private durations: AnimatorDurations;
  private readonly debug: boolean;

  constructor(options: ItemAnimatorOptions = {}) {
    this.driver = options.driver ?? new GsapMotionDriver();
    this.durations = resolveDurations(DEFAULT_DURATIONS, options.durations);
    this.ease = options.ease ?? DEFAULT_EASE;
    this.debug = options.debug ?? false;
  }

  on(handler: ItemAnimatorEventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  getDurations(): AnimatorDurations {
    return { ...this.durations };
  }

  setDurations(patch: Partial<AnimatorDurations>): void {
    this.durations = resolveDurations(this.durations, patch);
  }

  protected get addDuration(): number {
    return this.durations.add;
  }

  protected get removeDuration(): number {
    return this.durations.remove;
  }

  protected preAnimateRemoveImpl(item: ItemHandle): void {
    // No-op
  }

  protected preAnimateAddImpl(item: ItemHandle): void {
    // No-op
  }

  /** Starts the default remove animation; it must report through {@link createRemoveListener}. */
  protected abstract animateRemoveImpl(item: ItemHandle): void;

  /** Starts the default add animation; it must report through {@link createAddListener}. */
  protected abstract animateAddImpl(item: ItemHandle): void;

  /** Staggers removals by their previous position. */
  protected getRemoveDelay(item: ItemHandle): number {
    return Math.abs(toPixel((item.oldPosition * this.durations.remove) / 4));
  }

  /** Staggers additions by their new position. */
  protected getAddDelay(item: ItemHandle): number {
    return Math.abs(toPixel((item.position * this.durations.add) / 4));
  }

  requestRemove(item: ItemHandle): boolean {
    this.deferCompletion(() => {
      this.endAnimation(item);
      clearViewState(item.view);
      if (item.animation) {
        item.animation.preAnimateRemove(item);
      } else {
        this.preAnimateRemoveImpl(item);
      }
      this.pendingRemovals.push(item);
      this.settled = false;
    });
    return true;
  }

  requestAdd(item: ItemHandle): boolean {
    this.deferCompletion(() => {
      this.endAnimation(item);
      clearViewState(item.view);
      if (item.animation) {
        item.animation.preAnimateAdd(item);
      } else {
        this.preAnimateAddImpl(item);
      }
      this.pendingAdditions.push(item);
      this.settled = false;
    });
    return true;
  }

  requestMove(item: ItemHandle, fromX: number, fromY: number, toX: number, toY: number): boolean {
    let queued = false;
    this.deferCompletion(() => {
      queued = this.queueMove(item, fromX, fromY, toX, toY);
    });
    return queued;
  }

  requestChange(
    oldItem: ItemHandle,
    newItem: ItemHandle,
    fromX: number,
    fromY: number,
    toX: number,
    toY: number,
  ): boolean {
    if (oldItem === newItem) {
      // A reused view cannot fade into itself; animate its position only.
      return this.requestMove(oldItem, fromX, fromY, toX, toY);
    }

    this.deferCompletion(() => {
      const oldView = oldItem.view;
      const prevTranslationX = oldView.translationX;
      const prevTranslationY = oldView.translationY;
      const prevAlpha = oldView.alpha;
      this.endAnimation(oldItem);
      const deltaX = toPixel(toX - fromX - prevTranslationX);
      const deltaY = toPixel(toY - fromY - prevTranslationY);
      oldView.translationX = prevTranslationX;
      oldView.translationY = prevTranslationY;
      oldView.alpha = prevAlpha;

      this.endAnimation(newItem);
      const newView = newItem.view;
      newView.translationX = negate(deltaX);
      newView.translationY = negate(deltaY);
      newView.alpha = 0;

      this.pendingChanges.push({ oldItem, newItem, fromX, fromY, toX, toY });
      this.settled = false;
    });
    return true;
  }

  runPendingAnimations(): void {
    const removalsPending = this.pendingRemovals.length > 0;
    const movesPending = this.pendingMoves.length > 0;
    const changesPending = this.pendingChanges.length > 0;
    const additionsPending = this.pendingAdditions.length > 0;
    if (!removalsPending && !movesPending && !changesPending && !additionsPending) {
      return;
    }

    this.deferCompletion(() => {
      // Removals start right away; an item stays queued until its turn comes.
      for (let item = this.pendingRemovals.shift(); item; item = this.pendingRemovals.shift()) {
        this.doAnimateRemove(item);
      }

      if (movesPending) {
        const moves = this.moveBatches.open(this.pendingMoves);
        this.pendingMoves = [];
        this.startBatch(removalsPending, this.durations.remove, () => this.startMoves(moves));
      }

      // Changes run in parallel with moves.
      if (changesPending) {
        const changes = this.changeBatches.open(this.pendingChanges);
        this.pendingChanges = [];
        this.startBatch(removalsPending, this.durations.remove, () => this.startChanges(changes));
      }

      if (additionsPending) {
        const additions = this.additionBatches.open(this.pendingAdditions);
        this.pendingAdditions = [];
        const removeDelay = removalsPending ? this.durations.remove : 0;
        const moveDelay = movesPending ? this.durations.move : 0;
        const changeDelay = changesPending ? this.durations.change : 0;
        this.startBatch(
          removalsPending || movesPending || changesPending,
          removeDelay + Math.max(moveDelay, changeDelay),
          () => this.startAdditions(additions),
        );
      }
    });
  }

  endAnimation(item: ItemHandle): void {
    // Handlers see the teardown's events only once it is complete.
    this.completionDeferrals++;
    this.eventHolds++;
    try {
      this.cancelItem(item);
    } finally {
      this.completionDeferrals--;
      this.eventHolds--;
      if (this.eventHolds === 0) this.releaseHeldEvents();
    }
    this.dispatchFinishedWhenDone();
  }

  private cancelItem(item: ItemHandle): void {
    const view = item.view;
    // The driver reports the cancel through the listener, which leaves the in-flight set.
    this.driver.cancel(view);

    for (let i = this.pendingMoves.length - 1; i >= 0; i--) {
      if (this.pendingMoves[i].item !== item) continue;
      this.pendingMoves.splice(i, 1);
      resetTranslation(view);
      this.emit({ type: "ANIMATOR.MOVE_FINISHED", item });
    }
    this.endChangeAnimation(this.pendingChanges, item);
    if (removeItem(this.pendingRemovals, item)) {
      clearViewState(view);
      this.emit({ type: "ANIMATOR.REMOVE_FINISHED", item });
    }
    if (removeItem(this.pendingAdditions, item)) {
      clearViewState(view);
      this.emit({ type: "ANIMATOR.ADD_FINISHED", item });
    }

    for (const changes of this.changeBatches.newestFirst()) {
      this.endChangeAnimation(changes.records, item);
      this.changeBatches.dropIfEmpty(changes);
    }
    for (const moves of this.moveBatches.newestFirst()) {
      const index = moves.records.findIndex((move) => move.item === item);
      if (index === -1) continue;
      moves.records.splice(index, 1);
      this.moveBatches.dropIfEmpty(moves);
      resetTranslation(view);
      this.emit({ type: "ANIMATOR.MOVE_FINISHED", item });
    }
    for (const additions of this.additionBatches.newestFirst()) {
      if (!removeItem(additions.records, item)) continue;
      this.additionBatches.dropIfEmpty(additions);
      clearViewState(view);
      this.emit({ type: "ANIMATOR.ADD_FINISHED", item });
    }

    if (this.debug && this.isInFlight(item)) {
      throw new Error("Item is still in flight after its animation was cancelled");
    }
    this.evictInFlight(item);
  }

  endAnimations(): void {
    this.completionDeferrals++;
    try {
      for (const move of this.pendingMoves.splice(0).reverse()) {
        resetTranslation(move.item.view);
        this.emit({ type: "ANIMATOR.MOVE_FINISHED", item: move.item });
      }
      for (const item of this.pendingRemovals.splice(0).reverse()) {
        clearViewState(item.view);
        this.emit({ type: "ANIMATOR.REMOVE_FINISHED", item });
      }
      for (const item of this.pendingAdditions.splice(0).reverse()) {
        clearViewState(item.view);
        this.emit({ type: "ANIMATOR.ADD_FINISHED", item });
      }
      for (const change of this.pendingChanges.splice(0).reverse()) {
        this.endChangeRecord(change);
      }

      for (const moves of this.moveBatches.newestFirst()) {
        for (const move of moves.records.splice(0).reverse()) {
          resetTranslation(move.item.view);
          this.emit({ type: "ANIMATOR.MOVE_FINISHED", item: move.item });
        }
      }
      this.moveBatches.clear();
      for (const additions of this.additionBatches.newestFirst()) {
        for (const item of additions.records.splice(0).reverse()) {
          clearViewState(item.view);
          this.emit({ type: "ANIMATOR.ADD_FINISHED", item });
        }
      }
      this.additionBatches.clear();
      for (const changes of this.changeBatches.newestFirst()) {
        for (const change of changes.records.splice(0).reverse()) {
          this.endChangeRecord(change);
        }
      }
      this.changeBatches.clear();

      this.cancelAll([...this.removeAnimations]);
      this.cancelAll([...this.moveAnimations]);
      this.cancelAll([...this.addAnimations]);
      this.cancelAll([...this.changeAnimations.keys()]);
      // Overrides that ignore the cancel are finished here.
      for (const item of this.inFlightItems()) {
        this.evictInFlight(item);
      }
    } finally {
      this.completionDeferrals--;
    }

    this.settled = true;
    this.emit({ type: "ANIMATOR.ANIMATIONS_FINISHED" });
  }

  isRunning(): boolean {
    return (
      this.pendingAdditions.length > 0 ||
      this.pendingChanges.length > 0 ||
      this.pendingMoves.length > 0 ||
      this.pendingRemovals.length > 0 ||
      this.moveAnimations.size > 0 ||
      this.removeAnimations.size > 0 ||
      this.addAnimations.size > 0 ||
      this.changeAnimations.size > 0 ||
      this.moveBatches.size > 0 ||
      this.additionBatches.size > 0 ||
      this.changeBatches.size > 0
    );
  }

  /** Whether the item sits in any queue, batch or in-flight set. */
  isAnimating(item: ItemHandle): boolean {
    const isChangeSide = (change: ChangeRecord) => change.oldItem === item || change.newItem === item;
    const isMoveOf = (move: MoveRecord) => move.item === item;
    return (
      this.pendingRemovals.includes(item) ||
      this.pendingAdditions.includes(item) ||
      this.pendingMoves.some(isMoveOf) ||
      this.pendingChanges.some(isChangeSide) ||
      this.moveBatches.someRecord(isMoveOf) ||
      this.changeBatches.someRecord(isChangeSide) ||
      this.additionBatches.someRecord((other) => other === item) ||
      this.isInFlight(item)
    );
  }

  whenIdle(): Promise<void> {
    if (!this.isRunning()) return Promise.resolve();
    return new Promise((resolve) => {
      const off = this.on((event) => {
        if (event.type !== "ANIMATOR.ANIMATIONS_FINISHED") return;
        off();
        resolve();
      });
    });
  }

  protected createRemoveListener(item: ItemHandle): AnimationListener {
    return {
      onStart: () => {
        this.emit({ type: "ANIMATOR.REMOVE_STARTING", item });
      },
      onCancel: () => {
        clearViewState(item.view);
      },
      onEnd: this.endOnce(
        () => this.removeAnimations.delete(item),
        () => {
          clearViewState(item.view);
          this.emit({ type: "ANIMATOR.REMOVE_FINISHED", item });
        },
      )
    };
  }

  protected createAddListener(item: ItemHandle): AnimationListener {
    return {
      onStart: () => {
        this.emit({ type: "ANIMATOR.ADD_STARTING", item });
      },
      onCancel: () => {
        clearViewState(item.view);
      },
      onEnd: this.endOnce(
        () => this.addAnimations.delete(item),
        () => {
          clearViewState(item.view);
          this.emit({ type: "ANIMATOR.ADD_FINISHED", item });
        },
      )
    };
  }

  private queueMove(item: ItemHandle, fromX: number, fromY: number, toX: number, toY: number): boolean {
    const view = item.view;
    const startX = fromX + toPixel(view.translationX);
    const startY = fromY + toPixel(view.translationY);
    this.endAnimation(item);

    const deltaX = toX - startX;
    const deltaY = toY - startY;
    if (deltaX === 0 && deltaY === 0) {
      this.emit({ type: "ANIMATOR.MOVE_FINISHED", item });
      return false;
    }
    if (deltaX !== 0) view.translationX = -deltaX;
    if (deltaY !== 0) view.translationY = -deltaY;

    this.pendingMoves.push({ item, fromX: startX, fromY: startY, toX, toY });
    this.settled = false;
    return true;
  }

  private startBatch(delayed: boolean, delayMs: number, start: () => void): void {
    if (delayed) {
      this.driver.postDelayed(start, delayMs);
    } else {
      start();
    }
  }

  private startMoves(moves: AnimationBatch<MoveRecord>): void {
    if (!this.moveBatches.claim(moves)) {
      // already cancelled
      return;
    }
    this.deferCompletion(() => {
      for (const move of moves.records) {
        this.animateMoveImpl(move);
      }
      moves.records.length = 0;
    });
  }

  private startChanges(changes: AnimationBatch<ChangeRecord>): void {
    if (!this.changeBatches.claim(changes)) {
      // already cancelled
      return;
    }
    this.deferCompletion(() => {
      for (const change of changes.records) {
        this.animateChangeImpl(change);
      }
      changes.records.length = 0;
    });
  }

  private startAdditions(additions: AnimationBatch<ItemHandle>): void {
    if (!this.additionBatches.claim(additions)) {
      // already cancelled
      return;
    }
    this.deferCompletion(() => {
      for (const item of additions.records) {
        this.doAnimateAdd(item);
      }
      additions.records.length = 0;
    });
  }

  private doAnimateRemove(item: ItemHandle): void {
    this.removeAnimations.add(item);
    if (item.animation) {
      item.animation.animateRemove(
        item,
        this.createRemoveListener(item),
        this.overrideContext(this.durations.remove, this.getRemoveDelay(item)),
      );
    } else {
      this.animateRemoveImpl(item);
    }
  }

  private doAnimateAdd(item: ItemHandle): void {
    this.addAnimations.add(item);
    if (item.animation) {
      item.animation.animateAdd(
        item,
        this.createAddListener(item),
        this.overrideContext(this.durations.add, this.getAddDelay(item)),
      );
    } else {
      this.animateAddImpl(item);
    }
  }

  private animateMoveImpl(move: MoveRecord): void {
    const { item } = move;
    const view = item.view;
    const deltaX = move.toX - move.fromX;
    const deltaY = move.toY - move.fromY;
    const targets: Partial<ViewProperties> = {};
    if (deltaX !== 0) targets.translationX = 0;
    if (deltaY !== 0) targets.translationY = 0;

    this.moveAnimations.add(item);
    this.driver.animate(view, targets, { duration: this.durations.move, ease: this.ease }, {
      onStart: () => {
        this.emit({ type: "ANIMATOR.MOVE_STARTING", item });
      },
      onCancel: () => {
        if (deltaX !== 0) view.translationX = 0;
        if (deltaY !== 0) view.translationY = 0;
      },
      onEnd: this.endOnce(
        () => this.moveAnimations.delete(item),
        () => {
          this.emit({ type: "ANIMATOR.MOVE_FINISHED", item });
        },
      )
    });
  }

  private animateChangeImpl(change: ChangeRecord): void {
    const { oldItem, newItem } = change;
    const options = { duration: this.durations.change, ease: this.ease };

    if (oldItem) {
      const view = oldItem.view;
      this.changeAnimations.set(oldItem, true);
      this.driver.animate(
        view,
        { translationX: change.toX - change.fromX, translationY: change.toY - change.fromY, alpha: 0 },
        options,
        {
          onStart: () => {
            this.emit({ type: "ANIMATOR.CHANGE_STARTING", item: oldItem, oldItem: true });
          },
          onEnd: this.endOnce(
            () => this.changeAnimations.delete(oldItem),
            () => {
              clearViewState(view);
              this.emit({ type: "ANIMATOR.CHANGE_FINISHED", item: oldItem, oldItem: true });
            },
          )
        },
      );
    }

    if (newItem) {
      const view = newItem.view;
      this.changeAnimations.set(newItem, false);
      this.driver.animate(view, { translationX: 0, translationY: 0, alpha: 1 }, options, {
        onStart: () => {
          this.emit({ type: "ANIMATOR.CHANGE_STARTING", item: newItem, oldItem: false });
        },
        onEnd: this.endOnce(
          () => this.changeAnimations.delete(newItem),
          () => {
            clearViewState(view);
            this.emit({ type: "ANIMATOR.CHANGE_FINISHED", item: newItem, oldItem: false });
          },
        )
      });
    }
  }

  /** Ends whichever side of each record is `item`; drops records left with no side. */
  private endChangeAnimation(changes: ChangeRecord[], item: ItemHandle): void {
    for (let i = changes.length - 1; i >= 0; i--) {
      const change = changes[i];
      const oldItem = this.detachChangeSide(change, item);
      if (oldItem === null) continue;
      if (change.oldItem === null && change.newItem === null) {
        changes.splice(i, 1);
      }
      clearViewState(item.view);
      this.emit({ type: "ANIMATOR.CHANGE_FINISHED", item, oldItem });
    }
  }

  private endChangeRecord(change: ChangeRecord): void {
    for (const item of [change.oldItem, change.newItem]) {
      if (!item) continue;
      const oldItem = this.detachChangeSide(change, item);
      if (oldItem === null) continue;
      clearViewState(item.view);
      this.emit({ type: "ANIMATOR.CHANGE_FINISHED", item, oldItem });
    }
  }

  /** Returns whether `item` was the old side, or null when it is neither side. */
  private detachChangeSide(change: ChangeRecord, item: ItemHandle): boolean | null {
    if (change.newItem === item) {
      change.newItem = null;
      return false;
    }
    if (change.oldItem === item) {
      change.oldItem = null;
      return true;
    }
    return null;
  }

  private isInFlight(item: ItemHandle): boolean {
    return (
      this.removeAnimations.has(item) ||
      this.addAnimations.has(item) ||
      this.moveAnimations.has(item) ||
      this.changeAnimations.has(item)
    );
  }

  private inFlightItems(): ItemHandle[] {
    return [
      ...this.removeAnimations,
      ...this.moveAnimations,
      ...this.addAnimations,
      ...this.changeAnimations.keys()
    ];
  }

  private evictInFlight(item: ItemHandle): void {
    const view = item.view;
    if (this.removeAnimations.delete(item)) {
      clearViewState(view);
      this.emit({ type: "ANIMATOR.REMOVE_FINISHED", item });
    }
    if (this.addAnimations.delete(item)) {
      clearViewState(view);
      this.emit({ type: "ANIMATOR.ADD_FINISHED", item });
    }
    if (this.moveAnimations.delete(item)) {
      resetTranslation(view);
      this.emit({ type: "ANIMATOR.MOVE_FINISHED", item });
    }
    const oldItem = this.changeAnimations.get(item);
    if (oldItem !== undefined) {
      this.changeAnimations.delete(item);
      clearViewState(view);
      this.emit({ type: "ANIMATOR.CHANGE_FINISHED", item, oldItem });
    }
  }

  private cancelAll(items: ItemHandle[]): void {
    for (let i = items.length - 1; i >= 0; i--) {
      this.driver.cancel(items[i].view);
    }
  }

  private overrideContext(duration: number, delay: number): OverrideContext {
    return { driver: this.driver, duration, delay, ease: this.ease };
  }

  /**
   * Builds an `onEnd` callback that runs once, and only while the item is
   * still registered in flight.
   */
  private endOnce(leave: () => boolean, finish: () => void): () => void {
    let ended = false;
    return () => {
      if (ended) return;
      ended = true;
      if (!leave()) return;
      finish();
      this.dispatchFinishedWhenDone();
    };
  }

  private deferCompletion(work: () => void): void {
    this.completionDeferrals++;
    try {
      work();
    } finally {
      this.completionDeferrals--;
    }
    this.dispatchFinishedWhenDone();
  }

  /** Emits ANIMATIONS_FINISHED once per transition from running to idle. */
  private dispatchFinishedWhenDone(): void {
    if (this.completionDeferrals > 0 || this.settled || this.isRunning()) return;
    this.settled = true;
    this.emit({ type: "ANIMATOR.ANIMATIONS_FINISHED" });
  }

  private emit(event: ItemAnimatorEvent): void {
    if (this.eventHolds > 0) {
      this.heldEvents.push(event);
      return;
    }
    for (const handler of this.handlers) {
      handler(event);
    }
  }

  private releaseHeldEvents(): void {
    for (let event = this.heldEvents.shift(); event; event = this.heldEvents.shift()) {
      this.emit(event);
    }
  }
}
