import { MockGateway } from "../src/adapters/gateways/mock-gateway.js";
import { InMemoryEventBus } from "../src/adapters/inmemory/event-bus.js";
import { InMemoryReconciliationQueue } from "../src/adapters/inmemory/reconciliation-queue.js";
import { InMemoryTransactionStore } from "../src/adapters/inmemory/transaction-store.js";
import { signNotification, type NotificationFields } from "../src/application/webhook-signing.js";
import type { ClockPort } from "../src/infra/clock.js";
import type { RuntimeConfig } from "../src/infra/config.js";
import { silentLogger } from "../src/infra/logger.js";
import type { ReferenceSuffixSource } from "../src/infra/reference.js";
import { createRuntime, type PaymentRuntime } from "../src/runtime.js";

export const TEST_SECRET = "test-secret";
export const TEST_API_KEY = "test-api-key";
export const START_MS = Date.parse("2026-03-01T10:00:00.000Z");

export class FakeClock implements ClockPort {
  constructor(public currentMs: number = START_MS) {}

  nowMs(): number {
    return this.currentMs;
  }

  nowIso(): string {
    return new Date(this.currentMs).toISOString();
  }

  advance(ms: number): void {
    this.currentMs += ms;
  }
}

export function testConfig(overrides: Partial<RuntimeConfig> = {}): RuntimeConfig {
  return {
    host: "127.0.0.1",
    port: 8080,
    logLevel: "silent",
    apiKeys: [TEST_API_KEY],
    publicBaseUrl: "http://payments.test",
    metricsEnabled: true,
    ledgerBackend: "memory",
    queueBackend: "memory",
    eventBusBackend: "memory",
    queueKeyPrefix: "test:reconciliation",
    eventStreamKey: "test:events",
    gateway: {
      backend: "mock",
      baseUrl: "http://gateway.test",
      apiKey: "test-gateway-key",
      siteId: "test-site",
      secretKey: TEST_SECRET,
      timeoutMs: 1000,
      signatureHeader: "x-token",
      language: "fr",
    },
    reconciliation: {
      enabled: true,
      maxAttempts: 20,
      firstCheckDelayMs: 15_000,
      pollIntervalMs: 15_000,
      backoffFactor: 1,
      maxBackoffMs: 3_600_000,
      leaseMs: 60_000,
      batchSize: 10,
      tickIntervalMs: 15_000,
      errorBackoffMs: 30_000,
      rebuildOnStart: false,
    },
    ...overrides,
  };
}

export interface TestHarness {
  runtime: PaymentRuntime;
  gateway: MockGateway;
  clock: FakeClock;
  store: InMemoryTransactionStore;
  queue: InMemoryReconciliationQueue;
  eventBus: InMemoryEventBus;
}

export interface HarnessOptions {
  config?: RuntimeConfig;
  referenceSuffix?: ReferenceSuffixSource;
  store?: InMemoryTransactionStore;
  queue?: InMemoryReconciliationQueue;
}

export function createHarness(options: HarnessOptions = {}): TestHarness {
  const config = options.config ?? testConfig();
  const logger = silentLogger();
  const gateway = new MockGateway({ name: "mock", baseUrl: "http://gateway.test" });
  const clock = new FakeClock();
  const store = options.store ?? new InMemoryTransactionStore();
  const queue = options.queue ?? new InMemoryReconciliationQueue();
  const eventBus = new InMemoryEventBus(logger);
  const runtime = createRuntime(config, {
    store,
    queue,
    eventBus,
    clock,
    logger,
    gateways: [gateway],
    ...(options.referenceSuffix ? { referenceSuffix: options.referenceSuffix } : {}),
  });
  return { runtime, gateway, clock, store, queue, eventBus };
}

export function signedNotification<TFields extends NotificationFields>(
  fields: TFields,
): { fields: TFields; signature: string } {
  return { fields, signature: signNotification(TEST_SECRET, fields) };
}

export function notificationFor(externalReference: string, extra: Record<string, string> = {}): Record<string, string> {
  return {
    cpm_site_id: "test-site",
    cpm_trans_id: externalReference,
    cpm_trans_date: "2026-03-01 10:01:00",
    cpm_amount: "5000",
    cpm_currency: "XAF",
    payment_method: "OM",
    cpm_language: "fr",
    cpm_version: "V4",
    ...extra,
  };
}
