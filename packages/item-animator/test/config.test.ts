import test from "node:test";
import assert from "node:assert/strict";
import { ScaleInItemAnimator } from "../src/animator/ScaleInItemAnimator.js";
import { DEFAULT_DURATIONS, resolveDurations } from "../src/animator/config.js";
import { ManualMotionDriver } from "./fakes.js";

test("animators start from the default durations", () => {
  const animator = new ScaleInItemAnimator({ driver: new ManualMotionDriver() });
  assert.deepEqual(animator.getDurations(), { add: 120, remove: 120, move: 250, change: 250 });
});

test("setDurations patches only the given categories", () => {
  const animator = new ScaleInItemAnimator({ driver: new ManualMotionDriver(), durations: { add: 80 } });
  animator.setDurations({ move: 400 });
  assert.deepEqual(animator.getDurations(), { add: 80, remove: 120, move: 400, change: 250 });
});

test("getDurations returns a copy", () => {
  const animator = new ScaleInItemAnimator({ driver: new ManualMotionDriver() });
  const durations = animator.getDurations();
  durations.add = 999;
  assert.equal(animator.getDurations().add, 120);
});

test("negative or fractional durations are rejected", () => {
  assert.throws(() => new ScaleInItemAnimator({ durations: { move: -1 } }), {
    message: "move duration must be a non-negative integer, got -1"
  });
  const animator = new ScaleInItemAnimator({ driver: new ManualMotionDriver() });
  assert.throws(() => animator.setDurations({ add: 1.5 }), {
    message: "add duration must be a non-negative integer, got 1.5"
  });
  assert.equal(animator.getDurations().add, 120);
});

test("resolveDurations leaves the base untouched", () => {
  const next = resolveDurations(DEFAULT_DURATIONS, { change: 0 });
  assert.equal(next.change, 0);
  assert.equal(DEFAULT_DURATIONS.change, 250);
});
