export type TimerPhase = "idle" | "running" | "expired";

export interface TimerState {
  totalSeconds: number;
  remainingSeconds: number;
  running: boolean;
  deadline: Date | null;
  label: string;
  phase: TimerPhase;
}

export interface TimerTicked {
  remainingSeconds: number;
}

export interface TimerExpired {
  label: string;
  totalSeconds: number;
}

export interface TimerView {
  label: string;
  selection: string;
  phase: TimerPhase;
  running: boolean;
  totalSeconds: number;
  remainingSeconds: number;
  displayedSeconds: number;
  readout: string;
  statusText: string;
  progress: number;
}

export type TimerErrorCode = "InvalidFormat" | "NothingToStart";

export class TimerError extends Error {
  readonly code: TimerErrorCode;

  constructor(code: TimerErrorCode, message: string) {
    super(message);
    this.name = "TimerError";
    this.code = code;
  }
}

export function isTimerError(error: unknown, code?: TimerErrorCode): error is TimerError {
  return error instanceof TimerError && (code === undefined || error.code === code);
}
