import { test } from "node:test";
import assert from "node:assert/strict";
import { formatClock, isPreset, parseClock, presetSeconds } from "../src/duration.js";

test("formatClock zero-pads hours and minutes and drops seconds", () => {
  assert.equal(formatClock(0), "00:00");
  assert.equal(formatClock(59), "00:00");
  assert.equal(formatClock(60), "00:01");
  assert.equal(formatClock(3599), "00:59");
  assert.equal(formatClock(3600), "01:00");
  assert.equal(formatClock(99 * 3600 + 59 * 60), "99:59");
});

test("formatClock clamps negative values to zero", () => {
  assert.equal(formatClock(-120), "00:00");
});

test("parseClock accepts two-digit hours and minutes", () => {
  const parsed = parseClock("12:34");
  assert.ok(parsed.success);
  assert.deepEqual(parsed.data, { label: "12:34", seconds: 12 * 3600 + 34 * 60 });
});

test("parseClock trims surrounding whitespace", () => {
  const parsed = parseClock("  00:02\n");
  assert.ok(parsed.success);
  assert.deepEqual(parsed.data, { label: "00:02", seconds: 120 });
});

test("parseClock rejects malformed and out-of-range input", () => {
  for (const input of ["12:60", "1:30", "ab:cd", "123:45", "12:3", "", "12-30", "١٢:٣٠"]) {
    assert.equal(parseClock(input).success, false, input);
  }
});

test("parseClock reports the minutes range separately from the format", () => {
  const parsed = parseClock("12:60");
  assert.equal(parsed.success, false);
  assert.equal(parsed.error?.issues[0]?.message, "Minutes must be between 00 and 59.");
});

test("presets convert to seconds as HH:MM", () => {
  assert.equal(presetSeconds("00:15"), 900);
  assert.equal(presetSeconds("00:45"), 2700);
  assert.equal(presetSeconds("01:00"), 3600);
});

test("isPreset only matches the fixed list", () => {
  assert.equal(isPreset("00:30"), true);
  assert.equal(isPreset("00:20"), false);
  assert.equal(isPreset("Custom…"), false);
});
