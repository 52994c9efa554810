import { EventEmitter } from "events";
import { addSeconds, differenceInMilliseconds } from "date-fns";
import { MAX_DURATION_SECONDS, formatClock, parseClock } from "../duration.js";
import { TimerError } from "../types.js";
import type { TimerExpired, TimerState, TimerTicked } from "../types.js";

type TimerEvents = {
  tick: (event: TimerTicked) => void;
  expired: (event: TimerExpired) => void;
};

interface TimerEngineOptions {
  durationSeconds?: number;
  label?: string;
}

const DEFAULT_DURATION_SECONDS = 3600;

/**
 * Single countdown. While running the deadline is the source of truth and
 * `remainingSeconds` is only a projection refreshed by `tick`.
 */
export class TimerEngine {
  private readonly emitter = new EventEmitter();
  private state: TimerState;

  constructor(options: TimerEngineOptions = {}) {
    const durationSeconds = options.durationSeconds ?? DEFAULT_DURATION_SECONDS;
    assertDuration(durationSeconds);
    this.state = idleState(durationSeconds, options.label ?? formatClock(durationSeconds));
  }

  on<T extends keyof TimerEvents>(event: T, listener: TimerEvents[T]): () => void {
    this.emitter.on(event, listener);
    return () => this.emitter.off(event, listener);
  }

  getState(): TimerState {
    return {
      ...this.state,
      deadline: this.state.deadline ? new Date(this.state.deadline) : null
    };
  }

  selectPreset(durationSeconds: number, label = formatClock(durationSeconds)): void {
    assertDuration(durationSeconds);
    this.state = idleState(durationSeconds, label);
  }

  setCustomDuration(input: string): void {
    const parsed = parseClock(input);
    if (!parsed.success) {
      throw new TimerError("InvalidFormat", parsed.error.issues[0]?.message ?? `Invalid duration "${input}".`);
    }
    this.selectPreset(parsed.data.seconds, parsed.data.label);
  }

  start(now = new Date()): void {
    if (this.state.running) {
      return;
    }
    if (this.state.remainingSeconds <= 0) {
      this.state = { ...this.state, phase: "expired", running: false, deadline: null };
      throw new TimerError("NothingToStart", "There is no time left to count down.");
    }

    this.state = {
      ...this.state,
      phase: "running",
      running: true,
      deadline: addSeconds(now, this.state.remainingSeconds)
    };
  }

  reset(): void {
    this.state = idleState(this.state.totalSeconds, this.state.label);
  }

  tick(now = new Date()): void {
    const { deadline } = this.state;
    if (!this.state.running || !deadline) {
      return;
    }

    // A clock stepped back past the start must not show more than was selected.
    const secondsLeft = Math.ceil(differenceInMilliseconds(deadline, now) / 1000);
    const remainingSeconds = Math.min(this.state.totalSeconds, Math.max(0, secondsLeft));

    if (remainingSeconds === 0) {
      this.state = { ...this.state, remainingSeconds: 0, phase: "expired", running: false, deadline: null };
      this.emitter.emit("expired", { label: this.state.label, totalSeconds: this.state.totalSeconds });
      return;
    }

    this.state = { ...this.state, remainingSeconds };
    this.emitter.emit("tick", { remainingSeconds });
  }

  /**
   * Value for the large readout. Moves once per minute while running: 15:00
   * down to 14:01 left all show 15 minutes. Read straight from the deadline,
   * not from the last tick.
   */
  displayedRemaining(now = new Date()): number {
    const { deadline } = this.state;
    if (!this.state.running || !deadline) {
      return this.state.remainingSeconds;
    }
    const secondsLeft = differenceInMilliseconds(deadline, now) / 1000;
    const minutesLeft = Math.max(0, Math.ceil(secondsLeft / 60));
    return Math.min(Math.ceil(this.state.totalSeconds / 60) * 60, minutesLeft * 60);
  }
}

function idleState(durationSeconds: number, label: string): TimerState {
  return {
    totalSeconds: durationSeconds,
    remainingSeconds: durationSeconds,
    running: false,
    deadline: null,
    label,
    phase: "idle"
  };
}

function assertDuration(durationSeconds: number): void {
  if (!Number.isInteger(durationSeconds) || durationSeconds < 0 || durationSeconds > MAX_DURATION_SECONDS) {
    throw new RangeError(`Duration must be a whole number of seconds between 0 and ${MAX_DURATION_SECONDS}.`);
  }
}
