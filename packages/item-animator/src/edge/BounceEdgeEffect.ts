import type { ItemView } from "../item/ItemHandle.js";
import { clamp } from "../math/scalar.js";
import { DEFAULT_EASE, GsapMotionDriver } from "../motion/GsapMotionDriver.js";
import type { AnimationHandle, MotionDriver } from "../motion/MotionDriver.js";

export type EdgeDirection = "top" | "bottom";

export interface OverscrollHost {
  readonly height: number;
  /** Pixels per density-independent pixel. */
  readonly density: number;
  /** -1 checks scrolling up, 1 scrolling down. */
  canScrollVertically(direction: -1 | 1): boolean;
  children(): Iterable<ItemView>;
}

const PULL_RESISTANCE = 0.35;
const MAX_OFFSET_DP = 120;
const RECOVER_DURATION = 300;

/**
 * Overscroll effect that drags the visible rows along with the finger past an
 * edge of the list and springs them back on release. It paints nothing.
 */
export class BounceEdgeEffect {
  private totalOffset = 0;
  private recovery: AnimationHandle | null = null;
  private readonly maxOffset: number;

  constructor(
    private readonly host: OverscrollHost,
    private readonly direction: EdgeDirection,
    private readonly driver: MotionDriver = new GsapMotionDriver(),
  ) {
    this.maxOffset = host.density * MAX_OFFSET_DP;
  }

  get offset(): number {
    return this.totalOffset;
  }

  onPull(deltaDistance: number): void {
    if (this.direction === "top" && this.host.canScrollVertically(-1)) return;
    if (this.direction === "bottom" && this.host.canScrollVertically(1)) return;

    this.finish();
    const sign = this.direction === "bottom" ? -1 : 1;
    const deltaOffset = sign * this.host.height * deltaDistance * PULL_RESISTANCE;
    const nextOffset = clamp(this.totalOffset + deltaOffset, -this.maxOffset, this.maxOffset);
    const realOffset = nextOffset - this.totalOffset;
    this.totalOffset = nextOffset;
    this.offsetChildren(realOffset);
  }

  onRelease(): void {
    if (this.totalOffset !== 0) {
      this.recover();
    }
  }

  /** Stops a running recovery where it is. */
  finish(): void {
    this.recovery?.cancel();
    this.recovery = null;
  }

  isFinished(): boolean {
    return this.totalOffset === 0 && this.recovery === null;
  }

  draw(): boolean {
    return false;
  }

  private recover(): void {
    this.finish();
    this.recovery = this.driver.tween(
      this.totalOffset,
      0,
      { duration: RECOVER_DURATION, ease: DEFAULT_EASE },
      (value) => {
        const delta = value - this.totalOffset;
        this.totalOffset = value;
        this.offsetChildren(delta);
        if (value === 0) this.recovery = null;
      },
    );
  }

  private offsetChildren(offset: number): void {
    if (offset === 0) return;
    for (const child of this.host.children()) {
      child.translationY += offset;
    }
  }
}
