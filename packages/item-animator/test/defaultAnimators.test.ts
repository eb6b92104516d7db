import test from "node:test";
import assert from "node:assert/strict";
import { FadeInItemAnimator } from "../src/animator/FadeInItemAnimator.js";
import { ScaleInItemAnimator } from "../src/animator/ScaleInItemAnimator.js";
import { isNeutral } from "../src/item/viewState.js";
import { ManualMotionDriver, createItem } from "./fakes.js";

test("FadeInItemAnimator fades removals out and additions in", () => {
  const driver = new ManualMotionDriver();
  const animator = new FadeInItemAnimator({ driver, ease: "none" });
  const r = createItem("r");
  const a = createItem("a");

  animator.requestRemove(r);
  animator.requestAdd(a);
  assert.equal(a.view.alpha, 0);
  animator.runPendingAnimations();

  assert.deepEqual(driver.animations[0].targets, { alpha: 0 });
  assert.equal(driver.animations[0].options.ease, "none");
  driver.finishAll();
  driver.runNextDelayed();
  assert.deepEqual(driver.animations[1].targets, { alpha: 1 });
  assert.deepEqual(driver.delayed.map((call) => call.delayMs), [120]);
});

test("ScaleInItemAnimator scales removals down and additions up", () => {
  const driver = new ManualMotionDriver();
  const animator = new ScaleInItemAnimator({ driver });
  const r = createItem("r");
  const a = createItem("a");

  animator.requestRemove(r);
  animator.requestAdd(a);
  assert.equal(a.view.scaleX, 0);
  assert.equal(a.view.scaleY, 0);
  animator.runPendingAnimations();

  assert.deepEqual(driver.animations[0].targets, { scaleX: 0, scaleY: 0 });
  driver.flush();
  assert.deepEqual(driver.animations[1].targets, { scaleX: 1, scaleY: 1 });
  assert.ok(isNeutral(r.view));
  assert.ok(isNeutral(a.view));
});
