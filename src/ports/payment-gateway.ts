import type { TransactionRecord } from "../domain/types.js";

export interface InitiateUrls {
  notifyUrl: string;
  returnUrl: string;
}

export type InitiateResult =
  | { ok: true; paymentUrl: string; paymentToken: string }
  | { ok: false; errorMessage: string };

export type VerifiedStatus = "ACCEPTED" | "REFUSED" | "PENDING";

export interface OperatorMetadata {
  operatorTransactionId?: string;
  paymentMethod?: string;
  paymentDate?: string;
}

export interface VerifyResult {
  status: VerifiedStatus;
  vendorStatus: string;
  operatorMetadata: OperatorMetadata;
}

/**
 * Both calls throw GatewayUnavailableError on transport failures, timeouts,
 * server errors and unreadable responses.
 */
export interface PaymentGatewayPort {
  readonly name: string;
  initiate(transaction: TransactionRecord, urls: InitiateUrls): Promise<InitiateResult>;
  verify(externalReference: string): Promise<VerifyResult>;
}
