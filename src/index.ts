import { buildAppWithRuntime } from "./server.js";
import { loadRuntimeConfig } from "./infra/config.js";

const config = loadRuntimeConfig();
const { app, runtime } = buildAppWithRuntime(config);
const logger = runtime.logger.child({ component: "main" });

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, "shutting down");
  await app.close();
  process.exit(0);
}

async function main(): Promise<void> {
  await app.listen({ port: config.port, host: config.host });
  logger.info({ host: config.host, port: config.port }, "payment lifecycle API listening");

  if (config.reconciliation.enabled) {
    if (config.reconciliation.rebuildOnStart) {
      await runtime.recovery.rebuildQueue();
    }
    runtime.worker.start();
  }

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error({ err: error }, "shutdown failed");
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "startup failed");
  process.exit(1);
});
