import { createApp } from "./app.js";
import { appConfig } from "./config.js";
import { createRuntimeContainer } from "./runtime/container.js";
import { logger } from "./utils/logger.js";

const container = createRuntimeContainer(appConfig);
const app = createApp(container);

container.ensureStoreConnected().then(
  () => logger.info("Graph store connected"),
  (error: unknown) => logger.error({ err: error }, "Graph store connection failed; retrying on demand")
);

const server = app.listen(appConfig.PORT, () => {
  logger.info(`chunkgraph backend is running on http://localhost:${appConfig.PORT}`);
});

let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info({ signal }, "Shutting down");

  await new Promise<void>((resolve) => server.close(() => resolve()));
  await container.store.disconnect();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, "Shutdown failed");
        process.exit(1);
      }
    );
  });
}
