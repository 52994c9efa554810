import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { readPackageVersion } from "./config.js";
import { PRESETS } from "./duration.js";
import { ExpiryDialogs, FanoutNotifier, TerminalNotifier } from "./notifier.js";
import type { Notifier } from "./notifier.js";
import { TimerEngine } from "./state/timerEngine.js";
import { TimerToolset } from "./tools/timerTool.js";
import { isTimerError } from "./types.js";
import type { TimerView } from "./types.js";
import { buildTimerStructuredContent } from "./ui/builders.js";

/** The one timer every session reads and drives. */
export interface TimerContext {
  toolset: TimerToolset;
  dialogs: ExpiryDialogs;
}

export interface TimerContextOptions {
  defaultDuration?: string;
  alertNotifier?: Notifier;
}

const selectSchema = z.object({
  action: z.literal("select"),
  preset: z.enum(PRESETS, {
    required_error: `Pick one of ${PRESETS.join(", ")}.`
  })
});

const customSchema = z.object({
  action: z.literal("custom"),
  duration: z.string({ required_error: "Provide the duration as HH:MM." })
});

const simpleSchema = z.object({
  action: z.enum(["status", "start", "reset", "acknowledge"])
});

const timerInputSchema = z.discriminatedUnion("action", [selectSchema, customSchema, simpleSchema]);

type TimerInput = z.infer<typeof timerInputSchema>;

export function createTimerContext(options: TimerContextOptions = {}): TimerContext {
  const dialogs = new ExpiryDialogs();
  const engine = new TimerEngine();
  if (options.defaultDuration) {
    engine.setCustomDuration(options.defaultDuration);
  }
  const toolset = new TimerToolset({
    engine,
    notifier: new FanoutNotifier([options.alertNotifier ?? new TerminalNotifier(), dialogs])
  });

  return { toolset, dialogs };
}

/** Builds an MCP server for one connection; all of them share the context's timer. */
export function createTimerServer(context: TimerContext): McpServer {
  const { toolset, dialogs } = context;
  const server = new McpServer(
    {
      name: "Minute Timer",
      version: readPackageVersion()
    },
    {
      capabilities: {
        logging: {}
      }
    }
  );

  server.registerTool(
    "timer",
    {
      title: "Timer",
      description:
        "Pick a preset or a custom HH:MM duration, start or reset the countdown, and acknowledge the expiry alert.",
      inputSchema: {
        action: z.enum(["status", "select", "custom", "start", "reset", "acknowledge"]).optional(),
        preset: z.enum(PRESETS).optional().describe("Preset duration as HH:MM."),
        duration: z.string().optional().describe('Custom duration as HH:MM, e.g. "01:30".')
      },
      annotations: {
        readOnlyHint: false
      }
    },
    async input => {
      const parsed = timerInputSchema.safeParse({ ...input, action: input.action ?? "status" });
      if (!parsed.success) {
        return buildError(parsed.error.issues[0]?.message ?? "Invalid timer request.");
      }

      try {
        return runAction(parsed.data);
      } catch (error) {
        if (isTimerError(error, "InvalidFormat")) {
          return buildError(error.message);
        }
        throw error;
      }
    }
  );

  function runAction(input: TimerInput) {
    switch (input.action) {
      case "select": {
        const view = toolset.selectPreset(input.preset);
        return buildResult(`Selected ${view.label}.`, view);
      }
      case "custom": {
        const view = toolset.confirmCustom(input.duration);
        return buildResult(`Custom duration ${view.label} set.`, view);
      }
      case "start": {
        const view = toolset.start();
        const message = view.phase === "expired" ? "Nothing left to count down." : view.statusText;
        return buildResult(message, view);
      }
      case "reset": {
        const view = toolset.reset();
        return buildResult(view.statusText, view);
      }
      case "acknowledge": {
        const dismissed = dialogs.acknowledge();
        return buildResult(dismissed ? "Alert dismissed." : "No alert to dismiss.", toolset.getView());
      }
      case "status":
      default: {
        const view = toolset.getView();
        return buildResult(view.statusText, view);
      }
    }
  }

  function buildResult(message: string, view: TimerView) {
    return {
      content: [
        {
          type: "text" as const,
          text: message
        }
      ],
      structuredContent: buildTimerStructuredContent({ view, dialog: dialogs.pending() })
    };
  }

  return server;
}

function buildError(message: string) {
  return {
    content: [
      {
        type: "text" as const,
        text: message
      }
    ],
    isError: true
  };
}
