import { loadRuntimeConfig } from "./infra/config.js";
import { createRuntime } from "./runtime.js";

// Standalone reconciliation process for deployments that keep the API workers free of polling.
const config = loadRuntimeConfig();
const runtime = createRuntime(config);
const logger = runtime.logger.child({ component: "main" });

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, "shutting down");
  await runtime.close();
  process.exit(0);
}

async function main(): Promise<void> {
  if (config.reconciliation.rebuildOnStart) {
    await runtime.recovery.rebuildQueue();
  }
  runtime.worker.start();

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
  logger.fatal({ err: error }, "worker startup failed");
  process.exit(1);
});
