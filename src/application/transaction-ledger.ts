import { randomUUID } from "node:crypto";
import type {
  CreateTransactionInput,
  GatewayMetadata,
  TransactionRecord,
  TransactionStatistics,
  TransactionStatus,
  TransactionStatusChangedEvent,
} from "../domain/types.js";
import { InvalidAmountError, NotFoundError } from "../domain/errors.js";
import { isTerminalStatus, resolveTransition } from "../domain/state-machine.js";
import type { ClockPort } from "../infra/clock.js";
import type { Logger } from "../infra/logger.js";
import type { PaymentMetricsRegistry, StatusChangeSource } from "../infra/metrics.js";
import { generateExternalReference, randomReferenceSuffix, type ReferenceSuffixSource } from "../infra/reference.js";
import type { EventBusPort } from "../ports/event-bus.js";
import type { ReconciliationQueuePort } from "../ports/reconciliation-queue.js";
import type { TransactionPendingPageInput, TransactionStorePort } from "../ports/transaction-store.js";

export interface CreateTransactionOptions {
  operator: string;
}

interface TransactionLedgerOptions {
  referenceSuffix?: ReferenceSuffixSource;
}

function hasMetadata(metadata: GatewayMetadata): boolean {
  return Object.values(metadata).some((value) => typeof value === "string" && value.length > 0);
}

/**
 * System of record for transactions. `applyStatus` is the only path that
 * changes a status; every terminal transition clears the reconciliation entry
 * and publishes a status-changed event.
 */
export class TransactionLedger {
  private readonly referenceSuffix: ReferenceSuffixSource;

  constructor(
    private readonly store: TransactionStorePort,
    private readonly queue: ReconciliationQueuePort,
    private readonly eventBus: EventBusPort,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
    private readonly metrics: PaymentMetricsRegistry,
    options: TransactionLedgerOptions = {},
  ) {
    this.referenceSuffix = options.referenceSuffix ?? randomReferenceSuffix;
  }

  async create(input: CreateTransactionInput, options: CreateTransactionOptions): Promise<TransactionRecord> {
    if (!Number.isSafeInteger(input.amount) || input.amount <= 0) {
      throw new InvalidAmountError(input.amount);
    }

    const nowMs = this.clock.nowMs();
    const now = new Date(nowMs).toISOString();
    const externalReference = generateExternalReference(
      {
        operator: options.operator,
        payerId: input.payer_id,
        contextId: input.context_id,
        timestampMs: nowMs,
      },
      this.referenceSuffix,
    );

    const transaction = await this.store.insert({
      external_reference: externalReference,
      payer_id: input.payer_id,
      context_id: input.context_id,
      amount: input.amount,
      currency: input.currency.toUpperCase(),
      kind: input.kind,
      operator: options.operator,
      description: input.description ?? null,
      status: "PENDING",
      gateway_metadata: {},
      created_at: now,
      updated_at: now,
    });

    this.logger.info(
      {
        transaction_id: transaction.id,
        external_reference: transaction.external_reference,
        payer_id: transaction.payer_id,
        amount: transaction.amount,
        currency: transaction.currency,
      },
      "transaction created",
    );
    return transaction;
  }

  async get(id: number): Promise<TransactionRecord> {
    const transaction = await this.store.getById(id);
    if (!transaction) {
      throw new NotFoundError("Transaction", id);
    }
    return transaction;
  }

  async getByReference(externalReference: string): Promise<TransactionRecord> {
    const transaction = await this.store.getByReference(externalReference);
    if (!transaction) {
      throw new NotFoundError("Transaction", externalReference);
    }
    return transaction;
  }

  async findByReference(externalReference: string): Promise<TransactionRecord | null> {
    return this.store.getByReference(externalReference);
  }

  async listByPayer(payerId: number): Promise<TransactionRecord[]> {
    return this.store.listByPayer(payerId);
  }

  async listPending(input: TransactionPendingPageInput): Promise<TransactionRecord[]> {
    return this.store.listPending(input);
  }

  async statistics(): Promise<TransactionStatistics> {
    return this.store.statistics();
  }

  async recordGatewayMetadata(externalReference: string, metadata: GatewayMetadata): Promise<TransactionRecord> {
    const updated = await this.store.mergeMetadata(externalReference, metadata, this.clock.nowIso());
    if (!updated) {
      throw new NotFoundError("Transaction", externalReference);
    }
    return updated;
  }

  async applyStatus(
    externalReference: string,
    nextStatus: TransactionStatus,
    metadata: GatewayMetadata,
    source: StatusChangeSource,
  ): Promise<TransactionRecord> {
    const current = await this.getByReference(externalReference);
    const decision = resolveTransition(current.status, nextStatus);

    if (!decision.changed) {
      if (decision.duplicate) {
        this.logDuplicate(current, nextStatus, source);
        return current;
      }
      // PENDING -> PENDING: nothing to transition, but fresh gateway details are kept.
      return hasMetadata(metadata) ? this.recordGatewayMetadata(externalReference, metadata) : current;
    }

    const nowIso = this.clock.nowIso();
    const updated = await this.store.updateStatusIfCurrent({
      externalReference,
      expectedStatus: current.status,
      nextStatus: decision.status,
      metadata:
        decision.status === "ACCEPTED" && !metadata.settled_at ? { ...metadata, settled_at: nowIso } : metadata,
      updatedAt: nowIso,
    });

    if (!updated) {
      // A concurrent writer resolved it first.
      const latest = await this.getByReference(externalReference);
      this.logDuplicate(latest, nextStatus, source);
      return latest;
    }

    if (isTerminalStatus(updated.status)) {
      await this.onTerminal(updated, current.status, source);
    }
    return updated;
  }

  private async onTerminal(
    transaction: TransactionRecord,
    previousStatus: TransactionStatus,
    source: StatusChangeSource,
  ): Promise<void> {
    if (!isTerminalStatus(transaction.status)) {
      return;
    }
    this.metrics.recordStatusTransition(transaction.status, source);
    this.logger.info(
      {
        transaction_id: transaction.id,
        external_reference: transaction.external_reference,
        previous_status: previousStatus,
        status: transaction.status,
        source,
      },
      "transaction status changed",
    );

    try {
      await this.queue.remove(transaction.external_reference);
    } catch (error) {
      // The worker drops entries of terminal transactions on its next pass.
      this.logger.error(
        { err: error, external_reference: transaction.external_reference },
        "failed to remove reconciliation entry",
      );
    }

    const event: TransactionStatusChangedEvent = {
      id: `evt_${randomUUID()}`,
      type: "transaction.status_changed",
      occurred_at: transaction.updated_at,
      data: {
        transaction_id: transaction.id,
        external_reference: transaction.external_reference,
        payer_id: transaction.payer_id,
        context_id: transaction.context_id,
        kind: transaction.kind,
        amount: transaction.amount,
        currency: transaction.currency,
        status: transaction.status,
        previous_status: previousStatus,
      },
    };
    await this.eventBus.publish(event);
  }

  private logDuplicate(transaction: TransactionRecord, requested: TransactionStatus, source: StatusChangeSource): void {
    this.metrics.recordDuplicateResolution(source);
    this.logger.info(
      {
        transaction_id: transaction.id,
        external_reference: transaction.external_reference,
        status: transaction.status,
        requested_status: requested,
        source,
      },
      "duplicate resolution ignored",
    );
  }
}
