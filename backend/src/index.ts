import { getConfig } from "./config/env.js";
import { logger } from "./logger.js";
import { createApp } from "./app.js";
import { createIntentResolver } from "./agents/index.js";
import { ConversationStore, OrderStore } from "./database/index.js";
import { Orchestrator } from "./orchestrator/index.js";

async function start(): Promise<void> {
  const config = getConfig();

  const orderStore = await OrderStore.fromCsv(config.ordersCsvPath);
  const conversationStore = new ConversationStore();
  const resolver = createIntentResolver(config);
  const orchestrator = new Orchestrator(
    orderStore,
    conversationStore,
    resolver,
  );

  const app = createApp({ config, orderStore, orchestrator });

  const server = app.listen(config.port, () => {
    logger.info(
      { port: config.port, env: config.nodeEnv, mode: resolver.mode },
      "Server started successfully",
    );
  });

  process.on("SIGTERM", () => {
    logger.info("SIGTERM received, shutting down gracefully");
    server.close(() => {
      logger.info("Server closed");
      process.exit(0);
    });
  });
}

start().catch((error: unknown) => {
  logger.fatal({ error }, "Failed to start server");
  process.exit(1);
});
