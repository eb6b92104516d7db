import type { ItemHandle } from "../item/ItemHandle.js";
import { BaseItemAnimator } from "./BaseItemAnimator.js";

/** Shrinks removed rows to nothing and grows added rows from nothing. */
export class ScaleInItemAnimator extends BaseItemAnimator {
  protected animateRemoveImpl(item: ItemHandle): void {
    this.driver.animate(
      item.view,
      { scaleX: 0, scaleY: 0 },
      { duration: this.removeDuration, delay: this.getRemoveDelay(item), ease: this.ease },
      this.createRemoveListener(item),
    );
  }

  protected preAnimateAddImpl(item: ItemHandle): void {
    item.view.scaleX = 0;
    item.view.scaleY = 0;
  }

  protected animateAddImpl(item: ItemHandle): void {
    this.driver.animate(
      item.view,
      { scaleX: 1, scaleY: 1 },
      { duration: this.addDuration, delay: this.getAddDelay(item), ease: this.ease },
      this.createAddListener(item),
    );
  }
}
