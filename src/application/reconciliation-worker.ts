import { AttemptsExhaustedError, GatewayUnavailableError } from "../domain/errors.js";
import { isTerminalStatus } from "../domain/state-machine.js";
import type { QueueEntry } from "../domain/types.js";
import type { ClockPort } from "../infra/clock.js";
import type { Logger } from "../infra/logger.js";
import type { PaymentMetricsRegistry, WorkerPollOutcome } from "../infra/metrics.js";
import type { VerifyResult } from "../ports/payment-gateway.js";
import type { ReconciliationQueuePort } from "../ports/reconciliation-queue.js";
import { metadataFromVerification } from "./gateway-verification.js";
import type { GatewayRouter } from "./gateway-router.js";
import { computeNextCheckDelayMs, type BackoffPolicy } from "./reconciliation-policy.js";
import type { TransactionLedger } from "./transaction-ledger.js";

export interface ReconciliationWorkerOptions {
  batchSize: number;
  leaseMs: number;
  tickIntervalMs: number;
  errorBackoffMs: number;
  backoff: BackoffPolicy;
}

export interface TickSummary {
  claimed: number;
  outcomes: Partial<Record<WorkerPollOutcome, number>>;
}

export const EXHAUSTED_ERROR_MESSAGE = "attempts exhausted";

export class ReconciliationWorker {
  private running = false;
  private loopPromise: Promise<void> | null = null;
  private wake: (() => void) | null = null;

  constructor(
    private readonly queue: ReconciliationQueuePort,
    private readonly ledger: TransactionLedger,
    private readonly gateways: GatewayRouter,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
    private readonly metrics: PaymentMetricsRegistry,
    private readonly options: ReconciliationWorkerOptions,
  ) {}

  isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.logger.info(
      { tick_interval_ms: this.options.tickIntervalMs, batch_size: this.options.batchSize },
      "reconciliation worker started",
    );
    this.loopPromise = this.runLoop();
  }

  /** Stops claiming new entries and resolves once the in-flight tick has finished. */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.wake?.();
    if (this.loopPromise) {
      await this.loopPromise;
      this.loopPromise = null;
    }
    this.logger.info("reconciliation worker stopped");
  }

  async tick(): Promise<TickSummary> {
    const nowMs = this.clock.nowMs();
    const entries = await this.queue.dueEntries(nowMs, this.options.batchSize);
    const summary: TickSummary = { claimed: entries.length, outcomes: {} };

    // Leasing pushes claimed entries out of the due window for other workers.
    const leasedUntil = nowMs + this.options.leaseMs;
    for (const entry of entries) {
      await this.queue.reschedule(entry.external_reference, entry.attempts, leasedUntil);
    }

    for (const claimed of entries) {
      let outcome: WorkerPollOutcome;
      try {
        const entry = await this.renewLease(claimed.external_reference, leasedUntil);
        outcome = entry ? await this.processEntry(entry, this.clock.nowMs()) : "lease_lost";
      } catch (error) {
        // The lease expires and the entry is picked up again later.
        this.logger.error({ err: error, external_reference: claimed.external_reference }, "reconciliation poll failed");
        outcome = "error";
      }
      this.metrics.recordWorkerPoll(outcome);
      summary.outcomes[outcome] = (summary.outcomes[outcome] ?? 0) + 1;
    }
    return summary;
  }

  /**
   * Re-reads a claimed entry right before it is polled. When the entry no
   * longer carries this tick's lease, another worker has claimed it (or it was
   * resolved) and it is skipped; otherwise the lease is extended from now.
   */
  private async renewLease(reference: string, leasedUntil: number): Promise<QueueEntry | null> {
    const entry = await this.queue.get(reference);
    if (!entry || entry.next_check_at !== leasedUntil) {
      this.logger.debug({ external_reference: reference }, "queue entry no longer leased by this worker, skipped");
      return null;
    }
    const renewedUntil = this.clock.nowMs() + this.options.leaseMs;
    await this.queue.reschedule(reference, entry.attempts, renewedUntil);
    return { ...entry, next_check_at: renewedUntil };
  }

  private async processEntry(entry: QueueEntry, nowMs: number): Promise<WorkerPollOutcome> {
    const reference = entry.external_reference;
    const transaction = await this.ledger.findByReference(reference);
    if (!transaction) {
      this.logger.warn({ external_reference: reference }, "queue entry without transaction removed");
      await this.queue.remove(reference);
      return "missing";
    }
    if (isTerminalStatus(transaction.status)) {
      await this.queue.remove(reference);
      return "already_terminal";
    }
    if (entry.attempts >= entry.max_attempts) {
      await this.exhaust(reference, entry.attempts);
      return "exhausted";
    }

    const gateway = this.gateways.findByName(transaction.operator);
    let verification: VerifyResult | null = null;
    try {
      verification = await gateway.verify(reference);
    } catch (error) {
      if (!(error instanceof GatewayUnavailableError)) {
        throw error;
      }
      this.logger.warn({ external_reference: reference, err: error }, "gateway unavailable during reconciliation poll");
    }

    if (verification && verification.status !== "PENDING") {
      await this.ledger.applyStatus(reference, verification.status, metadataFromVerification(verification), "worker");
      return "resolved";
    }
    if (verification) {
      await this.ledger.applyStatus(reference, "PENDING", metadataFromVerification(verification), "worker");
    }

    // An unreachable gateway still counts as a poll so the entry cannot live forever.
    const attempts = entry.attempts + 1;
    if (attempts >= entry.max_attempts) {
      await this.exhaust(reference, attempts);
      return "exhausted";
    }
    const nextCheckAt = nowMs + computeNextCheckDelayMs(attempts, this.options.backoff);
    await this.queue.reschedule(reference, attempts, nextCheckAt);
    this.logger.debug({ external_reference: reference, attempts, next_check_at: nextCheckAt }, "transaction still pending");
    return verification ? "pending" : "gateway_unavailable";
  }

  private async exhaust(reference: string, attempts: number): Promise<void> {
    const error = new AttemptsExhaustedError(reference, attempts);
    this.logger.warn({ external_reference: reference, attempts, code: error.code }, error.message);
    await this.ledger.applyStatus(reference, "FAILED", { error_message: EXHAUSTED_ERROR_MESSAGE }, "worker");
    await this.queue.remove(reference);
  }

  private async runLoop(): Promise<void> {
    while (this.running) {
      let delayMs = this.options.tickIntervalMs;
      try {
        const summary = await this.tick();
        if (summary.claimed > 0) {
          this.logger.info(summary, "reconciliation tick completed");
        }
      } catch (error) {
        this.logger.error({ err: error }, "reconciliation tick failed");
        delayMs = this.options.errorBackoffMs;
      }
      if (!this.running) {
        break;
      }
      await this.sleep(delayMs);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}
