import { createApp } from "./app.js";
import { appConfig } from "./config.js";
import { closeRuntime } from "./runtime/ragRuntime.js";
import { logger } from "./utils/logger.js";

const app = createApp();

const server = app.listen(appConfig.PORT, () => {
  logger.info(
    { port: appConfig.PORT, collection: appConfig.COLLECTION_NAME },
    `Lorebase backend is running on http://localhost:${appConfig.PORT}`
  );
});

const shutdown = (signal: NodeJS.Signals): void => {
  logger.info({ signal }, "Shutting down");
  server.close((error) => {
    if (error) {
      logger.error({ err: error }, "HTTP server did not close cleanly");
    }
    closeRuntime()
      .then(() => process.exit(error ? 1 : 0))
      .catch((closeError: unknown) => {
        logger.error({ err: closeError }, "Failed to close the index");
        process.exit(1);
      });
  });
};

process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);
