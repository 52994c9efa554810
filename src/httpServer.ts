import { loadConfig } from "./config.js";
import { createHttpApp } from "./httpApp.js";
import { createTimerContext } from "./server.js";
import { startTicker } from "./ticker.js";

async function bootstrap() {
  const config = loadConfig();
  const context = createTimerContext({ defaultDuration: config.defaultDuration });
  const stopTicker = startTicker(context.toolset, config.tickIntervalMs);
  const { app, closeSessions } = createHttpApp(context);

  const serverInstance = app.listen(config.port, () => {
    console.log(`Timer MCP server listening on port ${config.port}`);
  });

  const shutdown = async () => {
    console.log("Shutting down timer server...");
    stopTicker();
    serverInstance.close();
    await closeSessions();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch(error => {
      console.error("Error during shutdown", error);
      process.exit(1);
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

bootstrap().catch(error => {
  console.error("Failed to start timer HTTP server", error);
  process.exit(1);
});
