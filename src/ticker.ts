import type { TimerToolset } from "./tools/timerTool.js";

/** Drives `handleTick` on a fixed interval. Returns a function that stops it. */
export function startTicker(toolset: TimerToolset, intervalMs = 1000): () => void {
  const interval = setInterval(() => {
    toolset.handleTick(new Date());
  }, intervalMs);

  return () => clearInterval(interval);
}
