import type { ItemHandle } from "../item/ItemHandle.js";

export type MoveRecord = {
  readonly item: ItemHandle;
  readonly fromX: number;
  readonly fromY: number;
  readonly toX: number;
  readonly toY: number;
};

/** Either side is nulled once it has finished; the record is dropped when both are. */
export type ChangeRecord = {
  oldItem: ItemHandle | null;
  newItem: ItemHandle | null;
  readonly fromX: number;
  readonly fromY: number;
  readonly toX: number;
  readonly toY: number;
};

export type AnimationBatch<T> = {
  readonly id: number;
  readonly records: T[];
};

/**
 * Batches of one category that are scheduled or starting. A batch is live
 * while its id is registered; its delayed start claims the id and does
 * nothing when the id is gone.
 */
export class BatchRegistry<T> {
  private batches = new Map<number, AnimationBatch<T>>();

  constructor(private readonly nextId: () => number) {}

  get size(): number {
    return this.batches.size;
  }

  open(records: readonly T[]): AnimationBatch<T> {
    const batch: AnimationBatch<T> = { id: this.nextId(), records: [...records] };
    this.batches.set(batch.id, batch);
    return batch;
  }

  claim(batch: AnimationBatch<T>): boolean {
    return this.batches.delete(batch.id);
  }

  someRecord(predicate: (record: T) => boolean): boolean {
    for (const batch of this.batches.values()) {
      if (batch.records.some(predicate)) return true;
    }
    return false;
  }

  newestFirst(): AnimationBatch<T>[] {
    return [...this.batches.values()].reverse();
  }

  dropIfEmpty(batch: AnimationBatch<T>): void {
    if (batch.records.length === 0) this.batches.delete(batch.id);
  }

  clear(): void {
    this.batches.clear();
  }
}
