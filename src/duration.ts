import { z } from "zod";

export const PRESETS = ["00:15", "00:30", "00:45", "01:00"] as const;
export const CUSTOM_OPTION = "Custom…";

export type Preset = (typeof PRESETS)[number];

export const MAX_DURATION_SECONDS = 99 * 3600 + 59 * 60;

// Two digits each side; hours may run to 99, minutes stop at 59.
export const clockSchema = z
  .string()
  .trim()
  .regex(/^\d{2}:\d{2}$/, { message: "Use the HH:MM format, e.g. 01:30." })
  .refine(value => Number(value.slice(3)) <= 59, {
    message: "Minutes must be between 00 and 59."
  });

export interface ParsedClock {
  label: string;
  seconds: number;
}

export function parseClock(input: string): z.SafeParseReturnType<string, ParsedClock> {
  return clockSchema
    .transform(label => ({
      label,
      seconds: Number(label.slice(0, 2)) * 3600 + Number(label.slice(3)) * 60
    }))
    .safeParse(input);
}

export function presetSeconds(preset: Preset): number {
  const hours = Number(preset.slice(0, 2));
  const minutes = Number(preset.slice(3));
  return hours * 3600 + minutes * 60;
}

export function isPreset(value: string): value is Preset {
  return PRESETS.some(preset => preset === value);
}

/** Formats whole seconds as a zero-padded `HH:MM`, dropping leftover seconds. */
export function formatClock(totalSeconds: number): string {
  const clamped = Math.max(totalSeconds, 0);
  const hours = Math.floor(clamped / 3600);
  const minutes = Math.floor((clamped % 3600) / 60);
  return `${String(hours).padStart(2, "0")}:${String(minutes).padStart(2, "0")}`;
}
