import test from "node:test";
import assert from "node:assert/strict";
import { FadeInItemAnimator } from "../src/animator/FadeInItemAnimator.js";
import { isNeutral } from "../src/item/viewState.js";
import { GsapMotionDriver } from "../src/motion/GsapMotionDriver.js";
import { createItem, recordEvents } from "./fakes.js";

test("with every duration at 0 each item still starts before it finishes", async () => {
  const animator = new FadeInItemAnimator({
    driver: new GsapMotionDriver(),
    durations: { add: 0, remove: 0, move: 0, change: 0 },
  });
  const events = recordEvents(animator);
  const r = createItem("r");
  const m = createItem("m");
  const a = createItem("a");

  animator.requestRemove(r);
  animator.requestMove(m, 0, 0, 0, 100);
  animator.requestAdd(a);
  const idle = animator.whenIdle();
  animator.runPendingAnimations();
  await idle;

  for (const [starting, finished] of [
    ["REMOVE_STARTING:r", "REMOVE_FINISHED:r"],
    ["MOVE_STARTING:m", "MOVE_FINISHED:m"],
    ["ADD_STARTING:a", "ADD_FINISHED:a"],
  ]) {
    assert.ok(events.includes(starting), starting);
    assert.ok(events.indexOf(starting) < events.indexOf(finished), finished);
  }
  assert.equal(events.filter((event) => event === "ANIMATIONS_FINISHED").length, 1);
  assert.equal(events[events.length - 1], "ANIMATIONS_FINISHED");
  assert.ok(isNeutral(r.view));
  assert.ok(isNeutral(m.view));
  assert.ok(isNeutral(a.view));
});
