import type { Pool } from "pg";
import type {
  GatewayMetadata,
  NewTransactionRecord,
  TransactionKind,
  TransactionRecord,
  TransactionStatistics,
  TransactionStatus,
} from "../../domain/types.js";
import { TRANSACTION_KINDS, TRANSACTION_STATUSES } from "../../domain/types.js";
import { DuplicateReferenceError } from "../../domain/errors.js";
import { emptyStatistics, normalizeGatewayMetadata } from "../../domain/transaction-records.js";
import { AppError } from "../../infra/app-error.js";
import type {
  ConditionalStatusUpdate,
  TransactionPendingPageInput,
  TransactionStorePort,
} from "../../ports/transaction-store.js";

const UNIQUE_VIOLATION = "23505";

const TRANSACTION_COLUMNS = `
  id,
  external_reference,
  payer_id,
  context_id,
  amount,
  currency,
  kind,
  operator,
  description,
  status,
  gateway_metadata,
  created_at,
  updated_at
`;

interface TransactionRow {
  id: unknown;
  external_reference: string;
  payer_id: unknown;
  context_id: unknown;
  amount: unknown;
  currency: string;
  kind: string;
  operator: string;
  description: string | null;
  status: string;
  gateway_metadata: unknown;
  created_at: unknown;
  updated_at: unknown;
}

function mapTimestamp(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

function toNumber(value: unknown, field: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new AppError(500, "persistence_mapping_error", `Unable to map numeric field '${field}'.`);
  }
  return parsed;
}

function toStatus(value: string): TransactionStatus {
  const status = TRANSACTION_STATUSES.find((item) => item === value);
  if (!status) {
    throw new AppError(500, "persistence_mapping_error", `Unknown transaction status '${value}'.`);
  }
  return status;
}

function toKind(value: string): TransactionKind {
  const kind = TRANSACTION_KINDS.find((item) => item === value);
  if (!kind) {
    throw new AppError(500, "persistence_mapping_error", `Unknown transaction kind '${value}'.`);
  }
  return kind;
}

function mapRow(row: TransactionRow): TransactionRecord {
  return {
    id: toNumber(row.id, "id"),
    external_reference: row.external_reference,
    payer_id: toNumber(row.payer_id, "payer_id"),
    context_id: toNumber(row.context_id, "context_id"),
    amount: toNumber(row.amount, "amount"),
    currency: row.currency,
    kind: toKind(row.kind),
    operator: row.operator,
    description: row.description,
    status: toStatus(row.status),
    gateway_metadata: normalizeGatewayMetadata(row.gateway_metadata),
    created_at: mapTimestamp(row.created_at),
    updated_at: mapTimestamp(row.updated_at),
  };
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === UNIQUE_VIOLATION;
}

export class PostgresTransactionStore implements TransactionStorePort {
  constructor(private readonly pool: Pool) {}

  async insert(record: NewTransactionRecord): Promise<TransactionRecord> {
    try {
      const result = await this.pool.query<TransactionRow>(
        `
          INSERT INTO payment_transactions (
            external_reference,
            payer_id,
            context_id,
            amount,
            currency,
            kind,
            operator,
            description,
            status,
            gateway_metadata,
            created_at,
            updated_at
          )
          VALUES (
            $1,
            $2::bigint,
            $3::bigint,
            $4::bigint,
            $5,
            $6,
            $7,
            $8,
            $9,
            $10::jsonb,
            $11::timestamptz,
            $12::timestamptz
          )
          RETURNING ${TRANSACTION_COLUMNS}
        `,
        [
          record.external_reference,
          record.payer_id,
          record.context_id,
          record.amount,
          record.currency,
          record.kind,
          record.operator,
          record.description,
          record.status,
          JSON.stringify(record.gateway_metadata),
          record.created_at,
          record.updated_at,
        ],
      );
      const row = result.rows[0];
      if (!row) {
        throw new AppError(500, "persistence_error", "Transaction insert returned no row.");
      }
      return mapRow(row);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateReferenceError(record.external_reference);
      }
      throw error;
    }
  }

  async getById(id: number): Promise<TransactionRecord | null> {
    const result = await this.pool.query<TransactionRow>(
      `SELECT ${TRANSACTION_COLUMNS} FROM payment_transactions WHERE id = $1::bigint`,
      [id],
    );
    const row = result.rows[0];
    return row ? mapRow(row) : null;
  }

  async getByReference(externalReference: string): Promise<TransactionRecord | null> {
    const result = await this.pool.query<TransactionRow>(
      `SELECT ${TRANSACTION_COLUMNS} FROM payment_transactions WHERE external_reference = $1`,
      [externalReference],
    );
    const row = result.rows[0];
    return row ? mapRow(row) : null;
  }

  async listByPayer(payerId: number): Promise<TransactionRecord[]> {
    const result = await this.pool.query<TransactionRow>(
      `
        SELECT ${TRANSACTION_COLUMNS}
        FROM payment_transactions
        WHERE payer_id = $1::bigint
        ORDER BY created_at DESC, id DESC
      `,
      [payerId],
    );
    return result.rows.map(mapRow);
  }

  async listPending(input: TransactionPendingPageInput): Promise<TransactionRecord[]> {
    const result = await this.pool.query<TransactionRow>(
      `
        SELECT ${TRANSACTION_COLUMNS}
        FROM payment_transactions
        WHERE status = 'PENDING' AND id > $1::bigint
        ORDER BY id ASC
        LIMIT $2
      `,
      [input.afterId ?? 0, Math.max(1, input.limit)],
    );
    return result.rows.map(mapRow);
  }

  async updateStatusIfCurrent(update: ConditionalStatusUpdate): Promise<TransactionRecord | null> {
    // jsonb_strip_nulls keeps the merge additive: absent keys never overwrite stored ones.
    const result = await this.pool.query<TransactionRow>(
      `
        UPDATE payment_transactions
        SET status = $3,
            gateway_metadata = gateway_metadata || jsonb_strip_nulls($4::jsonb),
            updated_at = $5::timestamptz
        WHERE external_reference = $1 AND status = $2
        RETURNING ${TRANSACTION_COLUMNS}
      `,
      [
        update.externalReference,
        update.expectedStatus,
        update.nextStatus,
        JSON.stringify(normalizeGatewayMetadata(update.metadata)),
        update.updatedAt,
      ],
    );
    const row = result.rows[0];
    return row ? mapRow(row) : null;
  }

  async mergeMetadata(
    externalReference: string,
    metadata: GatewayMetadata,
    updatedAt: string,
  ): Promise<TransactionRecord | null> {
    const result = await this.pool.query<TransactionRow>(
      `
        UPDATE payment_transactions
        SET gateway_metadata = gateway_metadata || jsonb_strip_nulls($2::jsonb),
            updated_at = $3::timestamptz
        WHERE external_reference = $1
        RETURNING ${TRANSACTION_COLUMNS}
      `,
      [externalReference, JSON.stringify(normalizeGatewayMetadata(metadata)), updatedAt],
    );
    const row = result.rows[0];
    return row ? mapRow(row) : null;
  }

  async statistics(): Promise<TransactionStatistics> {
    const result = await this.pool.query<{ status: string; currency: string; count: unknown; total: unknown }>(
      `
        SELECT status, currency, COUNT(*) AS count, COALESCE(SUM(amount), 0) AS total
        FROM payment_transactions
        GROUP BY status, currency
      `,
    );
    const stats = emptyStatistics();
    for (const row of result.rows) {
      const status = toStatus(row.status);
      const count = toNumber(row.count, "count");
      stats.total += count;
      stats.by_status[status] += count;
      if (status === "ACCEPTED") {
        stats.accepted_amount_by_currency[row.currency] =
          (stats.accepted_amount_by_currency[row.currency] ?? 0) + toNumber(row.total, "total");
      }
    }
    return stats;
  }
}
