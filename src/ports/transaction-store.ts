import type {
  GatewayMetadata,
  NewTransactionRecord,
  TransactionRecord,
  TransactionStatistics,
  TransactionStatus,
} from "../domain/types.js";

export interface TransactionPendingPageInput {
  limit: number;
  afterId?: number;
}

export interface ConditionalStatusUpdate {
  externalReference: string;
  expectedStatus: TransactionStatus;
  nextStatus: TransactionStatus;
  metadata: GatewayMetadata;
  updatedAt: string;
}

export interface TransactionStorePort {
  /** Throws DuplicateReferenceError when the external reference is taken. */
  insert(record: NewTransactionRecord): Promise<TransactionRecord>;
  getById(id: number): Promise<TransactionRecord | null>;
  getByReference(externalReference: string): Promise<TransactionRecord | null>;
  listByPayer(payerId: number): Promise<TransactionRecord[]>;
  listPending(input: TransactionPendingPageInput): Promise<TransactionRecord[]>;
  /**
   * Atomic compare-and-set on status. Returns null when the row is no longer
   * in the expected status (or does not exist).
   */
  updateStatusIfCurrent(update: ConditionalStatusUpdate): Promise<TransactionRecord | null>;
  mergeMetadata(
    externalReference: string,
    metadata: GatewayMetadata,
    updatedAt: string,
  ): Promise<TransactionRecord | null>;
  statistics(): Promise<TransactionStatistics>;
}
