import express from "express";
import cors from "cors";
import { v4 as uuid } from "uuid";
import type { Express, Request, Response } from "express";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { createTimerServer } from "./server.js";
import type { TimerContext } from "./server.js";

export interface TimerHttpApp {
  app: Express;
  sessionCount(): number;
  closeSessions(): Promise<void>;
}

/**
 * Express app serving `/mcp`. Each session gets its own transport and MCP
 * server; they all drive the timer in `context`.
 */
export function createHttpApp(context: TimerContext): TimerHttpApp {
  const app = express();
  app.use(express.json({ limit: "1mb" }));
  app.use(
    cors({
      origin: "*",
      exposedHeaders: ["Mcp-Session-Id"]
    })
  );

  const transports = new Map<string, StreamableHTTPServerTransport>();

  const openSession = async () => {
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => uuid(),
      onsessioninitialized: sessionId => {
        transports.set(sessionId, transport);
      }
    });

    transport.onclose = () => {
      if (transport.sessionId) {
        transports.delete(transport.sessionId);
      }
    };

    await createTimerServer(context).connect(transport);
    return transport;
  };

  // Answers 400/404 itself and returns undefined when the request has no live session.
  const requireSession = (req: Request, res: Response, purpose: string) => {
    const sessionId = req.header("mcp-session-id");
    if (!sessionId) {
      res.status(400).json({
        error: "missing_session",
        message: `Provide an MCP-Session-Id header to ${purpose}.`
      });
      return undefined;
    }

    const transport = transports.get(sessionId);
    if (!transport) {
      res.status(404).json({
        error: "unknown_session",
        message: "Session not found. Start a new session to initialize."
      });
      return undefined;
    }
    return transport;
  };

  const failWith = (res: Response, context: string, message: string, error: unknown) => {
    console.error(context, error);
    if (!res.headersSent) {
      res.status(500).json({
        error: "internal_error",
        message
      });
    }
  };

  app.post("/mcp", async (req: Request, res: Response) => {
    try {
      if (req.header("mcp-session-id")) {
        const existing = requireSession(req, res, "continue");
        if (existing) {
          await existing.handleRequest(req, res, req.body);
        }
        return;
      }

      const transport = await openSession();
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      failWith(res, "Error handling MCP POST request", "The timer server hit an unexpected error.", error);
    }
  });

  app.get("/mcp", async (req: Request, res: Response) => {
    const transport = requireSession(req, res, "resume streaming");
    if (!transport) {
      return;
    }

    try {
      await transport.handleRequest(req, res);
    } catch (error) {
      failWith(res, "Error handling MCP GET stream", "Failed to stream timer updates.", error);
    }
  });

  app.delete("/mcp", async (req: Request, res: Response) => {
    const transport = requireSession(req, res, "close a session");
    if (!transport) {
      return;
    }

    try {
      await transport.handleRequest(req, res);
    } catch (error) {
      failWith(res, "Error handling MCP DELETE request", "Failed to close MCP session.", error);
    } finally {
      if (transport.sessionId) {
        transports.delete(transport.sessionId);
      }
    }
  });

  const closeSessions = async () => {
    await Promise.all(
      [...transports.values()].map(async transport => {
        try {
          await transport.close();
        } catch (error) {
          console.error("Error closing transport", error);
        }
      })
    );
    transports.clear();
  };

  return {
    app,
    sessionCount: () => transports.size,
    closeSessions
  };
}
