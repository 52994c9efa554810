import { test } from "node:test";
import assert from "node:assert/strict";
import { setTimeout as delay } from "node:timers/promises";
import { TimerEngine } from "../src/state/timerEngine.js";
import { startTicker } from "../src/ticker.js";
import { TimerToolset } from "../src/tools/timerTool.js";
import { RecordingNotifier } from "./support/recordingNotifier.js";

test("ticker drives the engine until stopped", async () => {
  const engine = new TimerEngine({ durationSeconds: 60 });
  const toolset = new TimerToolset({ engine, notifier: new RecordingNotifier() });
  let ticks = 0;
  engine.on("tick", () => {
    ticks += 1;
  });

  toolset.start();
  const stop = startTicker(toolset, 5);
  await delay(60);
  stop();

  assert.ok(ticks > 0);
  const afterStop = ticks;
  await delay(30);
  assert.equal(ticks, afterStop);
  assert.equal(toolset.getView().statusText, "Timer running, last minute remaining: 60");
});
