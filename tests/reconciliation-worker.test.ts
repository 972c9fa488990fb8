import { describe, expect, it, vi } from "vitest";
import { computeNextCheckDelayMs } from "../src/application/reconciliation-policy.js";
import {
  EXHAUSTED_ERROR_MESSAGE,
  ReconciliationWorker,
  type TickSummary,
} from "../src/application/reconciliation-worker.js";
import type { CreateTransactionInput } from "../src/domain/types.js";
import { silentLogger } from "../src/infra/logger.js";
import { createHarness, notificationFor, signedNotification, START_MS, testConfig } from "./helpers.js";

const input: CreateTransactionInput = {
  payer_id: 42,
  context_id: 7,
  amount: 5000,
  currency: "XAF",
  kind: "TUITION_FEE",
};

describe("Reconciliation backoff", () => {
  it("grows by the factor and stops at the ceiling", () => {
    const policy = { pollIntervalMs: 15_000, backoffFactor: 2, maxBackoffMs: 60_000 };

    expect(computeNextCheckDelayMs(1, policy)).toBe(15_000);
    expect(computeNextCheckDelayMs(2, policy)).toBe(30_000);
    expect(computeNextCheckDelayMs(3, policy)).toBe(60_000);
    expect(computeNextCheckDelayMs(4, policy)).toBe(60_000);
  });

  it("keeps a fixed interval with factor 1", () => {
    const policy = { pollIntervalMs: 15_000, backoffFactor: 1, maxBackoffMs: 3_600_000 };

    expect(computeNextCheckDelayMs(0, policy)).toBe(15_000);
    expect(computeNextCheckDelayMs(19, policy)).toBe(15_000);
  });
});

describe("Reconciliation worker", () => {
  it("marks a transaction FAILED after the maximum number of polls", async () => {
    const { runtime, gateway, queue, clock, eventBus } = createHarness();
    const { external_reference: reference, transaction_id: id } = await runtime.payments.initiate(input);

    for (let poll = 1; poll < 20; poll += 1) {
      clock.advance(15_000);
      expect(await runtime.worker.tick()).toEqual({ claimed: 1, outcomes: { pending: 1 } });
    }
    clock.advance(15_000);
    expect(await runtime.worker.tick()).toEqual({ claimed: 1, outcomes: { exhausted: 1 } });

    expect(gateway.verifyCalls).toBe(20);
    const stored = await runtime.ledger.get(id);
    expect(stored.status).toBe("FAILED");
    expect(stored.gateway_metadata.error_message).toBe(EXHAUSTED_ERROR_MESSAGE);
    expect(await queue.get(reference)).toBeNull();
    expect(eventBus.getPublishedEvents().map((event) => event.data.status)).toEqual(["FAILED"]);

    clock.advance(15_000);
    expect(await runtime.worker.tick()).toEqual({ claimed: 0, outcomes: {} });
    expect(gateway.verifyCalls).toBe(20);
  });

  it("resolves ACCEPTED with the operator metadata and a settlement time", async () => {
    const { runtime, gateway, queue, clock } = createHarness();
    const { external_reference: reference, transaction_id: id } = await runtime.payments.initiate(input);
    gateway.setVendorStatus(reference, "ACCEPTED");
    clock.advance(15_000);

    expect(await runtime.worker.tick()).toEqual({ claimed: 1, outcomes: { resolved: 1 } });

    const stored = await runtime.ledger.get(id);
    expect(stored.status).toBe("ACCEPTED");
    expect(stored.gateway_metadata).toMatchObject({
      operator_transaction_id: `op_${reference}`,
      payment_method: "MOBILE_MONEY",
      settled_at: "2026-03-01T10:00:15.000Z",
    });
    expect(await queue.get(reference)).toBeNull();
  });

  it("does not poll before the entry is due", async () => {
    const { runtime, gateway, clock } = createHarness();
    await runtime.payments.initiate(input);
    clock.advance(14_999);

    expect(await runtime.worker.tick()).toEqual({ claimed: 0, outcomes: {} });
    expect(gateway.verifyCalls).toBe(0);
  });

  it("counts an unreachable gateway as an attempt and reschedules", async () => {
    const { runtime, gateway, queue, clock } = createHarness();
    const { external_reference: reference } = await runtime.payments.initiate(input);
    gateway.setUnavailable(true);
    clock.advance(15_000);

    expect(await runtime.worker.tick()).toEqual({ claimed: 1, outcomes: { gateway_unavailable: 1 } });

    expect(await queue.get(reference)).toEqual({
      external_reference: reference,
      next_check_at: START_MS + 30_000,
      attempts: 1,
      max_attempts: 20,
    });
  });

  it("spaces polls with the configured backoff factor", async () => {
    const base = testConfig();
    const { runtime, queue, clock } = createHarness({
      config: testConfig({ reconciliation: { ...base.reconciliation, backoffFactor: 2 } }),
    });
    const { external_reference: reference } = await runtime.payments.initiate(input);

    clock.advance(15_000);
    await runtime.worker.tick();
    expect((await queue.get(reference))?.next_check_at).toBe(START_MS + 30_000);

    clock.advance(15_000);
    await runtime.worker.tick();
    expect(await queue.get(reference)).toMatchObject({ attempts: 2, next_check_at: START_MS + 60_000 });
  });

  it("leaves a leased entry untouched when processing fails unexpectedly", async () => {
    const { runtime, gateway, queue, clock } = createHarness();
    const { external_reference: reference } = await runtime.payments.initiate(input);
    vi.spyOn(gateway, "verify").mockRejectedValueOnce(new Error("connection reset"));
    clock.advance(15_000);

    expect(await runtime.worker.tick()).toEqual({ claimed: 1, outcomes: { error: 1 } });

    expect(await queue.get(reference)).toEqual({
      external_reference: reference,
      next_check_at: START_MS + 75_000,
      attempts: 0,
      max_attempts: 20,
    });
  });

  it("skips an entry another worker claimed after this tick's lease ran out", async () => {
    const { runtime, gateway, queue, clock } = createHarness();
    const first = await runtime.payments.initiate(input);
    const second = await runtime.payments.initiate({ ...input, context_id: 8 });
    clock.advance(15_000);
    const peer = new ReconciliationWorker(queue, runtime.ledger, runtime.gateways, clock, silentLogger(), runtime.metrics, {
      batchSize: 10,
      leaseMs: 60_000,
      tickIntervalMs: 15_000,
      errorBackoffMs: 30_000,
      backoff: { pollIntervalMs: 15_000, backoffFactor: 1, maxBackoffMs: 3_600_000 },
    });
    const verify = gateway.verify.bind(gateway);
    const verified: string[] = [];
    let peerSummary: TickSummary | undefined;
    vi.spyOn(gateway, "verify").mockImplementation(async (reference) => {
      verified.push(reference);
      if (verified.length === 1) {
        // The first poll outlives the lease; the peer claims the whole batch meanwhile.
        clock.advance(61_000);
        peerSummary = await peer.tick();
      }
      return verify(reference);
    });

    const summary = await runtime.worker.tick();

    expect(peerSummary).toEqual({ claimed: 2, outcomes: { pending: 2 } });
    expect(summary).toEqual({ claimed: 2, outcomes: { pending: 1, lease_lost: 1 } });
    expect(verified.filter((reference) => reference === second.external_reference)).toHaveLength(1);
    expect(await queue.get(second.external_reference)).toEqual({
      external_reference: second.external_reference,
      next_check_at: START_MS + 91_000,
      attempts: 1,
      max_attempts: 20,
    });
    expect(verified[0]).toBe(first.external_reference);
  });

  it("drops entries whose transaction is already terminal", async () => {
    const { runtime, gateway, queue } = createHarness();
    const transaction = await runtime.ledger.create(input, { operator: "mock" });
    await runtime.ledger.applyStatus(transaction.external_reference, "REFUSED", {}, "webhook");
    await queue.enqueue(transaction.external_reference, START_MS, 20);

    expect(await runtime.worker.tick()).toEqual({ claimed: 1, outcomes: { already_terminal: 1 } });
    expect(await queue.size()).toBe(0);
    expect(gateway.verifyCalls).toBe(0);
  });

  it("drops entries without a transaction", async () => {
    const { runtime, queue } = createHarness();
    await queue.enqueue("MOCK_1_1_20260101000000000_000000", START_MS, 20);

    expect(await runtime.worker.tick()).toEqual({ claimed: 1, outcomes: { missing: 1 } });
    expect(await queue.size()).toBe(0);
  });

  it("exhausts an entry already at its attempt limit without asking the gateway", async () => {
    const { runtime, gateway, queue } = createHarness();
    const transaction = await runtime.ledger.create(input, { operator: "mock" });
    await queue.enqueue(transaction.external_reference, START_MS, 3);
    await queue.reschedule(transaction.external_reference, 3, START_MS);

    expect(await runtime.worker.tick()).toEqual({ claimed: 1, outcomes: { exhausted: 1 } });
    expect(gateway.verifyCalls).toBe(0);
    expect((await runtime.ledger.get(transaction.id)).status).toBe("FAILED");
  });

  it("claims at most one batch per tick", async () => {
    const base = testConfig();
    const { runtime, queue } = createHarness({
      config: testConfig({ reconciliation: { ...base.reconciliation, batchSize: 2 } }),
    });
    for (const suffix of ["a", "b", "c"]) {
      await queue.enqueue(`MOCK_1_1_20260101000000000_00000${suffix}`, START_MS, 20);
    }

    expect(await runtime.worker.tick()).toEqual({ claimed: 2, outcomes: { missing: 2 } });
    expect(await queue.size()).toBe(1);
  });

  it("does not publish a second event when a webhook resolves first", async () => {
    const { runtime, gateway, queue, clock, eventBus } = createHarness();
    const { external_reference: reference } = await runtime.payments.initiate(input);
    gateway.setVendorStatus(reference, "ACCEPTED");
    await runtime.webhooks.handle({
      ...signedNotification(notificationFor(reference)),
      remoteAddress: "203.0.113.10",
    });
    await queue.enqueue(reference, clock.nowMs(), 20);

    expect(await runtime.worker.tick()).toEqual({ claimed: 1, outcomes: { already_terminal: 1 } });
    expect(eventBus.getPublishedEvents()).toHaveLength(1);
  });

  it("runs ticks in the background until stopped", async () => {
    const { runtime, gateway, clock } = createHarness();
    const { external_reference: reference, transaction_id: id } = await runtime.payments.initiate(input);
    gateway.setVendorStatus(reference, "REFUSED");
    clock.advance(15_000);

    runtime.worker.start();
    expect(runtime.worker.isRunning()).toBe(true);
    await vi.waitFor(async () => {
      expect((await runtime.ledger.get(id)).status).toBe("REFUSED");
    });
    await runtime.worker.stop();

    expect(runtime.worker.isRunning()).toBe(false);
    expect((await runtime.ledger.get(id)).gateway_metadata.error_message).toBe("gateway status REFUSED");
  });
});
