import { test } from "node:test";
import assert from "node:assert/strict";
import { once } from "node:events";
import type { Server } from "node:http";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { createHttpApp } from "../src/httpApp.js";
import { createTimerContext } from "../src/server.js";
import { RecordingNotifier } from "./support/recordingNotifier.js";

async function startApp() {
  const context = createTimerContext({ alertNotifier: new RecordingNotifier() });
  const http = createHttpApp(context);
  const server: Server = http.app.listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Expected a TCP address.");
  }
  const endpoint = new URL(`http://127.0.0.1:${address.port}/mcp`);
  const clients: Client[] = [];

  async function connect(name: string) {
    const client = new Client({ name, version: "1.0.0" });
    await client.connect(new StreamableHTTPClientTransport(endpoint));
    clients.push(client);
    return client;
  }

  async function cleanup() {
    await Promise.all(clients.map(client => client.close()));
    await http.closeSessions();
    server.closeAllConnections();
    server.close();
  }

  return { endpoint, http, connect, cleanup };
}

async function callTimer(client: Client, args: Record<string, unknown>) {
  const result = CallToolResultSchema.parse(await client.callTool({ name: "timer", arguments: args }));
  const first = result.content[0];
  return first?.type === "text" ? first.text : undefined;
}

test("streaming without a session id is a bad request", async t => {
  const { endpoint, cleanup } = await startApp();
  t.after(cleanup);

  const response = await fetch(endpoint);
  assert.equal(response.status, 400);
  assert.deepEqual(await response.json(), {
    error: "missing_session",
    message: "Provide an MCP-Session-Id header to resume streaming."
  });
});

test("unknown session ids are not found", async t => {
  const { endpoint, cleanup } = await startApp();
  t.after(cleanup);

  const closing = await fetch(endpoint, {
    method: "DELETE",
    headers: { "mcp-session-id": "no-such-session" }
  });
  assert.equal(closing.status, 404);
  assert.deepEqual(await closing.json(), {
    error: "unknown_session",
    message: "Session not found. Start a new session to initialize."
  });

  const posting = await fetch(endpoint, {
    method: "POST",
    headers: { "content-type": "application/json", "mcp-session-id": "no-such-session" },
    body: JSON.stringify({ jsonrpc: "2.0", id: 1, method: "tools/list" })
  });
  assert.equal(posting.status, 404);
});

test("concurrent sessions share one timer", async t => {
  const { http, connect, cleanup } = await startApp();
  t.after(cleanup);

  const first = await connect("first");
  const second = await connect("second");
  assert.equal(http.sessionCount(), 2);

  assert.equal(await callTimer(first, { action: "custom", duration: "00:05" }), "Custom duration 00:05 set.");
  assert.equal(await callTimer(second, { action: "status" }), "Custom duration set. Press Start when ready.");
  assert.equal(await callTimer(second, { action: "reset" }), "Timer reset.");
  assert.equal(await callTimer(first, { action: "status" }), "Timer reset.");
});
