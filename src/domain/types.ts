export type TransactionStatus = "PENDING" | "ACCEPTED" | "REFUSED" | "FAILED";

export type TerminalTransactionStatus = Exclude<TransactionStatus, "PENDING">;

export type TransactionKind = "REGISTRATION_FEE" | "TUITION_FEE";

export const TRANSACTION_KINDS: readonly TransactionKind[] = ["REGISTRATION_FEE", "TUITION_FEE"];

export const TRANSACTION_STATUSES: readonly TransactionStatus[] = ["PENDING", "ACCEPTED", "REFUSED", "FAILED"];

export interface GatewayMetadata {
  payment_url?: string;
  payment_token?: string;
  operator_transaction_id?: string;
  payment_method?: string;
  error_message?: string;
  settled_at?: string;
}

export interface TransactionRecord {
  id: number;
  external_reference: string;
  payer_id: number;
  context_id: number;
  amount: number;
  currency: string;
  kind: TransactionKind;
  operator: string;
  description: string | null;
  status: TransactionStatus;
  gateway_metadata: GatewayMetadata;
  created_at: string;
  updated_at: string;
}

export type NewTransactionRecord = Omit<TransactionRecord, "id">;

export interface CreateTransactionInput {
  payer_id: number;
  context_id: number;
  amount: number;
  currency: string;
  kind: TransactionKind;
  description?: string;
}

export interface QueueEntry {
  external_reference: string;
  next_check_at: number;
  attempts: number;
  max_attempts: number;
}

export interface TransactionStatusChangedEvent {
  id: string;
  type: "transaction.status_changed";
  occurred_at: string;
  data: {
    transaction_id: number;
    external_reference: string;
    payer_id: number;
    context_id: number;
    kind: TransactionKind;
    amount: number;
    currency: string;
    status: TerminalTransactionStatus;
    previous_status: TransactionStatus;
  };
}

export interface TransactionStatistics {
  total: number;
  by_status: Record<TransactionStatus, number>;
  accepted_amount_by_currency: Record<string, number>;
}

export interface InitiatePaymentResponse {
  transaction_id: number;
  external_reference: string;
  payment_url: string;
  status: TransactionStatus;
}
