import { CUSTOM_OPTION, PRESETS } from "../duration.js";
import type { ExpiryDialog } from "../notifier.js";
import type { TimerView } from "../types.js";

export interface TimerReadout {
  surface: "readout";
  time: string;
  status: string;
  progress: number;
  phase: TimerView["phase"];
  cta: {
    label: "Start" | "Reset";
    action: "start" | "reset";
  };
  accessibilityLabel: string;
}

export interface DurationPicker {
  surface: "picker";
  options: string[];
  selected: string;
  customPlaceholder: "HH:MM";
  customPrompt: string;
}

export interface ExpiryAlert {
  surface: "alert";
  heading: string;
  raisedAt: string;
  cta: {
    label: "OK";
    action: "acknowledge";
  };
  accessibilityLabel: string;
}

export interface TimerStructuredContent {
  [key: string]: unknown;
  readout: TimerReadout;
  picker: DurationPicker;
  alert?: ExpiryAlert;
}

export function buildReadout(view: TimerView): TimerReadout {
  return {
    surface: "readout",
    time: view.readout,
    status: view.statusText,
    progress: view.progress,
    phase: view.phase,
    cta: view.running ? { label: "Reset", action: "reset" } : { label: "Start", action: "start" },
    accessibilityLabel: `${view.label} timer, ${view.readout} shown. ${view.statusText}`
  };
}

export function buildPicker(view: TimerView): DurationPicker {
  return {
    surface: "picker",
    options: [...PRESETS, CUSTOM_OPTION],
    selected: view.selection,
    customPlaceholder: "HH:MM",
    customPrompt: "Enter the value, format HH:MM"
  };
}

export function buildAlert(dialog: ExpiryDialog): ExpiryAlert {
  return {
    surface: "alert",
    heading: dialog.title,
    raisedAt: dialog.raisedAt,
    cta: { label: "OK", action: "acknowledge" },
    accessibilityLabel: `${dialog.title}. Press OK to dismiss.`
  };
}

export function buildTimerStructuredContent(input: {
  view: TimerView;
  dialog?: ExpiryDialog | null;
}): TimerStructuredContent {
  const { view, dialog = null } = input;
  return {
    readout: buildReadout(view),
    picker: buildPicker(view),
    alert: dialog ? buildAlert(dialog) : undefined
  };
}
