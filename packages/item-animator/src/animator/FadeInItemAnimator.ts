import type { ItemHandle } from "../item/ItemHandle.js";
import { BaseItemAnimator } from "./BaseItemAnimator.js";

export class FadeInItemAnimator extends BaseItemAnimator {
  protected animateRemoveImpl(item: ItemHandle): void {
    this.driver.animate(
      item.view,
      { alpha: 0 },
      { duration: this.removeDuration, delay: this.getRemoveDelay(item), ease: this.ease },
      this.createRemoveListener(item),
    );
  }

  protected preAnimateAddImpl(item: ItemHandle): void {
    item.view.alpha = 0;
  }

  protected animateAddImpl(item: ItemHandle): void {
    this.driver.animate(
      item.view,
      { alpha: 1 },
      { duration: this.addDuration, delay: this.getAddDelay(item), ease: this.ease },
      this.createAddListener(item),
    );
  }
}
