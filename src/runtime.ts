import { Redis } from "ioredis";
import { Pool } from "pg";
import { CinetPayGateway } from "./adapters/gateways/cinetpay-gateway.js";
import { MockGateway } from "./adapters/gateways/mock-gateway.js";
import { InMemoryEventBus } from "./adapters/inmemory/event-bus.js";
import { InMemoryReconciliationQueue } from "./adapters/inmemory/reconciliation-queue.js";
import { InMemoryTransactionStore } from "./adapters/inmemory/transaction-store.js";
import { PostgresTransactionStore } from "./adapters/postgres/transaction-store.js";
import { RedisStreamEventBus } from "./adapters/redis/event-bus.js";
import { RedisReconciliationQueue } from "./adapters/redis/reconciliation-queue.js";
import { GatewayRouter } from "./application/gateway-router.js";
import { PaymentService } from "./application/payment-service.js";
import { QueueRecovery } from "./application/queue-recovery.js";
import { ReconciliationWorker } from "./application/reconciliation-worker.js";
import { TransactionLedger } from "./application/transaction-ledger.js";
import { WebhookIngestor } from "./application/webhook-ingestor.js";
import { AppError } from "./infra/app-error.js";
import { SystemClock, type ClockPort } from "./infra/clock.js";
import type { RuntimeConfig } from "./infra/config.js";
import { createLogger, type Logger } from "./infra/logger.js";
import { PaymentMetricsRegistry } from "./infra/metrics.js";
import type { ReferenceSuffixSource } from "./infra/reference.js";
import type { EventBusPort } from "./ports/event-bus.js";
import type { PaymentGatewayPort } from "./ports/payment-gateway.js";
import type { ReconciliationQueuePort } from "./ports/reconciliation-queue.js";
import type { TransactionStorePort } from "./ports/transaction-store.js";

export interface RuntimeOverrides {
  store?: TransactionStorePort;
  queue?: ReconciliationQueuePort;
  eventBus?: EventBusPort;
  gateways?: PaymentGatewayPort[];
  clock?: ClockPort;
  logger?: Logger;
  metrics?: PaymentMetricsRegistry;
  referenceSuffix?: ReferenceSuffixSource;
}

export interface PaymentRuntime {
  config: RuntimeConfig;
  logger: Logger;
  metrics: PaymentMetricsRegistry;
  clock: ClockPort;
  queue: ReconciliationQueuePort;
  eventBus: EventBusPort;
  gateways: GatewayRouter;
  ledger: TransactionLedger;
  payments: PaymentService;
  webhooks: WebhookIngestor;
  recovery: QueueRecovery;
  worker: ReconciliationWorker;
  close(): Promise<void>;
}

function buildGateway(config: RuntimeConfig, logger: Logger): PaymentGatewayPort {
  if (config.gateway.backend === "cinetpay") {
    return new CinetPayGateway(
      {
        baseUrl: config.gateway.baseUrl,
        apiKey: config.gateway.apiKey,
        siteId: config.gateway.siteId,
        timeoutMs: config.gateway.timeoutMs,
        language: config.gateway.language,
      },
      logger,
    );
  }
  return new MockGateway({ name: "mock", baseUrl: config.gateway.baseUrl });
}

/** Wires adapters and services from the runtime config; overrides replace individual collaborators. */
export function createRuntime(config: RuntimeConfig, overrides: RuntimeOverrides = {}): PaymentRuntime {
  const logger = overrides.logger ?? createLogger(config.logLevel);
  const metrics = overrides.metrics ?? new PaymentMetricsRegistry();
  const clock = overrides.clock ?? new SystemClock();
  const closeActions: Array<() => Promise<void>> = [];

  const postgresPool =
    !overrides.store && config.ledgerBackend === "postgres" && config.postgresUrl
      ? new Pool({ connectionString: config.postgresUrl })
      : null;
  if (postgresPool) {
    closeActions.push(async () => {
      await postgresPool.end();
    });
  }

  const needsRedis =
    (!overrides.queue && config.queueBackend === "redis") || (!overrides.eventBus && config.eventBusBackend === "redis");
  const redisClient =
    needsRedis && config.redisUrl
      ? new Redis(config.redisUrl, {
        lazyConnect: false,
        maxRetriesPerRequest: 1,
      })
      : null;
  if (redisClient) {
    closeActions.push(async () => {
      await redisClient.quit();
    });
  }

  let store: TransactionStorePort;
  if (overrides.store) {
    store = overrides.store;
  } else if (config.ledgerBackend === "postgres") {
    if (!postgresPool) {
      throw new AppError(500, "invalid_runtime_config", "Postgres ledger backend requested without PostgreSQL.");
    }
    store = new PostgresTransactionStore(postgresPool);
  } else {
    store = new InMemoryTransactionStore();
  }

  let queue: ReconciliationQueuePort;
  if (overrides.queue) {
    queue = overrides.queue;
  } else if (config.queueBackend === "redis") {
    if (!redisClient) {
      throw new AppError(500, "invalid_runtime_config", "Redis queue backend requested without Redis client.");
    }
    queue = new RedisReconciliationQueue(redisClient, { keyPrefix: config.queueKeyPrefix });
  } else {
    queue = new InMemoryReconciliationQueue();
  }

  let eventBus: EventBusPort;
  if (overrides.eventBus) {
    eventBus = overrides.eventBus;
  } else if (config.eventBusBackend === "redis") {
    if (!redisClient) {
      throw new AppError(500, "invalid_runtime_config", "Redis event bus requested without Redis client.");
    }
    eventBus = new RedisStreamEventBus(redisClient, logger.child({ component: "events" }), {
      streamKey: config.eventStreamKey,
      maxLength: 100_000,
    });
  } else {
    eventBus = new InMemoryEventBus(logger.child({ component: "events" }));
  }

  const gatewayList = overrides.gateways ?? [buildGateway(config, logger.child({ component: "gateway" }))];
  const [defaultGateway] = gatewayList;
  if (!defaultGateway) {
    throw new AppError(500, "invalid_runtime_config", "At least one payment gateway is required.");
  }
  const gateways = new GatewayRouter(gatewayList, { defaultGateway: defaultGateway.name }, { metrics });

  const ledger = new TransactionLedger(
    store,
    queue,
    eventBus,
    clock,
    logger.child({ component: "ledger" }),
    metrics,
    overrides.referenceSuffix ? { referenceSuffix: overrides.referenceSuffix } : {},
  );
  const payments = new PaymentService(ledger, gateways, queue, clock, logger.child({ component: "payments" }), {
    publicBaseUrl: config.publicBaseUrl,
    firstCheckDelayMs: config.reconciliation.firstCheckDelayMs,
    maxAttempts: config.reconciliation.maxAttempts,
  });
  const webhooks = new WebhookIngestor(
    ledger,
    gateways,
    queue,
    clock,
    logger.child({ component: "webhook" }),
    metrics,
    config.gateway.secretKey,
  );
  const recovery = new QueueRecovery(ledger, queue, clock, logger.child({ component: "recovery" }), {
    maxAttempts: config.reconciliation.maxAttempts,
  });
  const worker = new ReconciliationWorker(queue, ledger, gateways, clock, logger.child({ component: "worker" }), metrics, {
    batchSize: config.reconciliation.batchSize,
    leaseMs: config.reconciliation.leaseMs,
    tickIntervalMs: config.reconciliation.tickIntervalMs,
    errorBackoffMs: config.reconciliation.errorBackoffMs,
    backoff: {
      pollIntervalMs: config.reconciliation.pollIntervalMs,
      backoffFactor: config.reconciliation.backoffFactor,
      maxBackoffMs: config.reconciliation.maxBackoffMs,
    },
  });

  return {
    config,
    logger,
    metrics,
    clock,
    queue,
    eventBus,
    gateways,
    ledger,
    payments,
    webhooks,
    recovery,
    worker,
    async close() {
      await worker.stop();
      if (eventBus.close) {
        await eventBus.close();
      }
      if (queue.close) {
        await queue.close();
      }
      for (const closeAction of [...closeActions].reverse()) {
        await closeAction();
      }
    },
  };
}
