import type {
  GatewayMetadata,
  NewTransactionRecord,
  TransactionRecord,
  TransactionStatistics,
} from "../../domain/types.js";
import { DuplicateReferenceError } from "../../domain/errors.js";
import type {
  ConditionalStatusUpdate,
  TransactionPendingPageInput,
  TransactionStorePort,
} from "../../ports/transaction-store.js";
import { emptyStatistics, mergeGatewayMetadata } from "../../domain/transaction-records.js";

function copy(record: TransactionRecord): TransactionRecord {
  return { ...record, gateway_metadata: { ...record.gateway_metadata } };
}

export class InMemoryTransactionStore implements TransactionStorePort {
  private readonly transactions = new Map<number, TransactionRecord>();
  private readonly idsByReference = new Map<string, number>();
  private nextId = 1;

  async insert(record: NewTransactionRecord): Promise<TransactionRecord> {
    if (this.idsByReference.has(record.external_reference)) {
      throw new DuplicateReferenceError(record.external_reference);
    }
    const stored: TransactionRecord = { ...record, id: this.nextId, gateway_metadata: { ...record.gateway_metadata } };
    this.nextId += 1;
    this.transactions.set(stored.id, stored);
    this.idsByReference.set(stored.external_reference, stored.id);
    return copy(stored);
  }

  async getById(id: number): Promise<TransactionRecord | null> {
    const record = this.transactions.get(id);
    return record ? copy(record) : null;
  }

  async getByReference(externalReference: string): Promise<TransactionRecord | null> {
    const record = this.findByReference(externalReference);
    return record ? copy(record) : null;
  }

  async listByPayer(payerId: number): Promise<TransactionRecord[]> {
    return [...this.transactions.values()]
      .filter((record) => record.payer_id === payerId)
      .sort((a, b) => {
        const byCreatedAt = b.created_at.localeCompare(a.created_at);
        if (byCreatedAt !== 0) {
          return byCreatedAt;
        }
        return b.id - a.id;
      })
      .map(copy);
  }

  async listPending(input: TransactionPendingPageInput): Promise<TransactionRecord[]> {
    const afterId = input.afterId ?? 0;
    return [...this.transactions.values()]
      .filter((record) => record.status === "PENDING" && record.id > afterId)
      .sort((a, b) => a.id - b.id)
      .slice(0, Math.max(1, input.limit))
      .map(copy);
  }

  async updateStatusIfCurrent(update: ConditionalStatusUpdate): Promise<TransactionRecord | null> {
    const record = this.findByReference(update.externalReference);
    if (!record || record.status !== update.expectedStatus) {
      return null;
    }
    record.status = update.nextStatus;
    record.gateway_metadata = mergeGatewayMetadata(record.gateway_metadata, update.metadata);
    record.updated_at = update.updatedAt;
    return copy(record);
  }

  async mergeMetadata(
    externalReference: string,
    metadata: GatewayMetadata,
    updatedAt: string,
  ): Promise<TransactionRecord | null> {
    const record = this.findByReference(externalReference);
    if (!record) {
      return null;
    }
    record.gateway_metadata = mergeGatewayMetadata(record.gateway_metadata, metadata);
    record.updated_at = updatedAt;
    return copy(record);
  }

  async statistics(): Promise<TransactionStatistics> {
    const stats = emptyStatistics();
    for (const record of this.transactions.values()) {
      stats.total += 1;
      stats.by_status[record.status] += 1;
      if (record.status === "ACCEPTED") {
        stats.accepted_amount_by_currency[record.currency] =
          (stats.accepted_amount_by_currency[record.currency] ?? 0) + record.amount;
      }
    }
    return stats;
  }

  private findByReference(externalReference: string): TransactionRecord | undefined {
    const id = this.idsByReference.get(externalReference);
    return id === undefined ? undefined : this.transactions.get(id);
  }
}
