import { readFileSync } from "fs";
import { z } from "zod";
import { clockSchema } from "./duration.js";

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(2091),
  TIMER_TICK_MS: z.coerce.number().int().positive().default(1000),
  TIMER_DEFAULT: clockSchema.default("01:00")
});

export interface AppConfig {
  port: number;
  tickIntervalMs: number;
  defaultDuration: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  return {
    port: parsed.data.PORT,
    tickIntervalMs: parsed.data.TIMER_TICK_MS,
    defaultDuration: parsed.data.TIMER_DEFAULT
  };
}

const packageSchema = z.object({ version: z.string() });

export function readPackageVersion(): string {
  const raw = readFileSync(new URL("../package.json", import.meta.url), "utf-8");
  return packageSchema.parse(JSON.parse(raw)).version;
}
