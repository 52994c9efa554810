import { z } from "zod";
import { CUSTOM_OPTION, PRESETS, formatClock, isPreset, presetSeconds } from "../duration.js";
import type { Notifier } from "../notifier.js";
import { TimerEngine } from "../state/timerEngine.js";
import { isTimerError } from "../types.js";
import type { TimerView } from "../types.js";

export const STATUS = {
  initial: "Select a duration and press Start.",
  presetSelected: "Duration selected. Press Start when ready.",
  customSet: "Custom duration set. Press Start when ready.",
  running: "Timer running…",
  expired: "Time's up!",
  reset: "Timer reset."
} as const;

export const selectPresetInput = z.enum(PRESETS);

export function lastMinuteStatus(remainingSeconds: number): string {
  return `Timer running, last minute remaining: ${remainingSeconds}`;
}

interface TimerToolsetOptions {
  engine?: TimerEngine;
  notifier: Notifier;
}

/**
 * Presentation side of the timer: keeps the status line and picker
 * selection in step with engine events and hands expiry to the notifier.
 */
export class TimerToolset {
  private readonly engine: TimerEngine;
  private readonly notifier: Notifier;
  private statusText: string = STATUS.initial;
  private selection: string;

  constructor(options: TimerToolsetOptions) {
    this.engine = options.engine ?? new TimerEngine();
    this.notifier = options.notifier;
    const { label } = this.engine.getState();
    this.selection = isPreset(label) ? label : CUSTOM_OPTION;

    this.engine.on("tick", ({ remainingSeconds }) => {
      this.statusText = remainingSeconds <= 60 ? lastMinuteStatus(remainingSeconds) : STATUS.running;
    });
    this.engine.on("expired", ({ label }) => {
      this.statusText = STATUS.expired;
      this.notifyExpiry(label);
    });
  }

  selectPreset(input: string): TimerView {
    const preset = selectPresetInput.parse(input);
    this.engine.selectPreset(presetSeconds(preset), preset);
    this.selection = preset;
    this.statusText = STATUS.presetSelected;
    return this.getView();
  }

  /** Throws `InvalidFormat` and leaves everything untouched when the text is rejected. */
  confirmCustom(input: string): TimerView {
    this.engine.setCustomDuration(input);
    this.selection = CUSTOM_OPTION;
    this.statusText = STATUS.customSet;
    return this.getView();
  }

  start(now = new Date()): TimerView {
    try {
      const wasRunning = this.engine.getState().running;
      this.engine.start(now);
      if (!wasRunning) {
        this.statusText = STATUS.running;
      }
    } catch (error) {
      if (!isTimerError(error, "NothingToStart")) {
        throw error;
      }
      this.notifyExpiry(this.engine.getState().label);
    }
    return this.getView(now);
  }

  reset(): TimerView {
    this.engine.reset();
    this.statusText = STATUS.reset;
    return this.getView();
  }

  handleTick(now = new Date()): TimerView {
    this.engine.tick(now);
    return this.getView(now);
  }

  getView(now = new Date()): TimerView {
    const state = this.engine.getState();
    const displayedSeconds = this.engine.displayedRemaining(now);
    return {
      label: state.label,
      selection: this.selection,
      phase: state.phase,
      running: state.running,
      totalSeconds: state.totalSeconds,
      remainingSeconds: state.remainingSeconds,
      displayedSeconds,
      readout: formatClock(displayedSeconds),
      statusText: this.statusText,
      progress: progressOf(state.remainingSeconds, state.totalSeconds)
    };
  }

  private notifyExpiry(label: string): void {
    this.notifier.playAlert();
    this.notifier.showExpiryDialog(label);
  }
}

export function progressOf(remainingSeconds: number, totalSeconds: number): number {
  if (totalSeconds <= 0) {
    return 0;
  }
  return Math.min(1, Math.max(0, remainingSeconds / totalSeconds));
}
