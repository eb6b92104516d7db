import test from "node:test";
import assert from "node:assert/strict";
import type { ItemView } from "../src/item/ItemHandle.js";
import { NEUTRAL_VIEW_STATE } from "../src/item/viewState.js";
import { GsapMotionDriver } from "../src/motion/GsapMotionDriver.js";

const createView = (): ItemView => ({ ...NEUTRAL_VIEW_STATE });

test("animate reaches its targets and reports start and end", async () => {
  const driver = new GsapMotionDriver();
  const view = createView();
  const calls: string[] = [];

  const cancelled = await new Promise<boolean>((resolve) => {
    driver.animate(view, { alpha: 0, translationY: 20 }, { duration: 20 }, {
      onStart: () => calls.push("start"),
      onEnd: resolve
    });
  });

  assert.equal(cancelled, false);
  assert.deepEqual(calls, ["start"]);
  assert.equal(view.alpha, 0);
  assert.equal(view.translationY, 20);
  assert.equal(driver.isAnimating(view), false);
});

test("cancel reports onCancel then onEnd(true)", () => {
  const driver = new GsapMotionDriver();
  const view = createView();
  const calls: string[] = [];

  driver.animate(view, { alpha: 0 }, { duration: 1000 }, {
    onCancel: () => calls.push("cancel"),
    onEnd: (cancelled) => calls.push(`end:${cancelled}`)
  });
  assert.equal(driver.isAnimating(view), true);
  driver.cancel(view);
  driver.cancel(view);

  assert.deepEqual(calls, ["cancel", "end:true"]);
  assert.equal(driver.isAnimating(view), false);
});

test("a new animation on a view cancels the previous one", () => {
  const driver = new GsapMotionDriver();
  const view = createView();
  const calls: string[] = [];

  driver.animate(view, { alpha: 0 }, { duration: 1000 }, { onEnd: (cancelled) => calls.push(`first:${cancelled}`) });
  const handle = driver.animate(view, { alpha: 0.5 }, { duration: 1000 }, {
    onEnd: (cancelled) => calls.push(`second:${cancelled}`)
  });
  handle.cancel();

  assert.deepEqual(calls, ["first:true", "second:true"]);
});

test("postDelayed runs its callback", async () => {
  const driver = new GsapMotionDriver();
  let ran = false;
  await new Promise<void>((resolve) => {
    driver.postDelayed(() => {
      ran = true;
      resolve();
    }, 10);
  });
  assert.equal(ran, true);
});

test("tween interpolates to its end value", async () => {
  const driver = new GsapMotionDriver();
  const values: number[] = [];

  await new Promise<void>((resolve) => {
    driver.tween(0, 10, { duration: 20 }, (value) => {
      values.push(value);
      if (value === 10) resolve();
    });
  });

  assert.equal(values[values.length - 1], 10);
  assert.ok(values.every((value) => value >= 0 && value <= 10));
});

test("a zero-duration animation still reports its start before its end", async () => {
  const driver = new GsapMotionDriver();
  const view = createView();
  const calls: string[] = [];

  await new Promise<void>((resolve) => {
    driver.animate(view, { alpha: 0 }, { duration: 0 }, {
      onStart: () => calls.push("start"),
      onEnd: (cancelled) => {
        calls.push(`end:${cancelled}`);
        resolve();
      },
    });
  });

  assert.deepEqual(calls, ["start", "end:false"]);
  assert.equal(view.alpha, 0);
});
