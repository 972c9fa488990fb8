import type { CreateTransactionInput, InitiatePaymentResponse } from "../domain/types.js";
import { GatewayRejectedError, GatewayUnavailableError } from "../domain/errors.js";
import type { ClockPort } from "../infra/clock.js";
import type { Logger } from "../infra/logger.js";
import type { InitiateResult } from "../ports/payment-gateway.js";
import type { ReconciliationQueuePort } from "../ports/reconciliation-queue.js";
import type { GatewayRouter } from "./gateway-router.js";
import type { TransactionLedger } from "./transaction-ledger.js";

export interface PaymentServiceOptions {
  publicBaseUrl: string;
  firstCheckDelayMs: number;
  maxAttempts: number;
}

export class PaymentService {
  constructor(
    private readonly ledger: TransactionLedger,
    private readonly gateways: GatewayRouter,
    private readonly queue: ReconciliationQueuePort,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
    private readonly options: PaymentServiceOptions,
  ) {}

  async initiate(input: CreateTransactionInput): Promise<InitiatePaymentResponse> {
    const gateway = this.gateways.default();
    const transaction = await this.ledger.create(input, { operator: gateway.name });
    const reference = transaction.external_reference;

    // Queued before the gateway call so a confirmation can never outrun its entry.
    try {
      await this.queue.enqueue(
        reference,
        this.clock.nowMs() + this.options.firstCheckDelayMs,
        this.options.maxAttempts,
      );
    } catch (error) {
      // Webhooks still resolve the transaction; a queue rebuild restores its polling.
      this.logger.error(
        { external_reference: reference, err: error },
        "reconciliation enqueue failed, transaction left pending without a queue entry",
      );
    }

    let result: InitiateResult;
    try {
      result = await gateway.initiate(transaction, {
        notifyUrl: `${this.options.publicBaseUrl}/payments/notification`,
        returnUrl: `${this.options.publicBaseUrl}/payments/return`,
      });
    } catch (error) {
      if (error instanceof GatewayUnavailableError) {
        this.logger.warn(
          { external_reference: reference, err: error },
          "gateway unavailable during initiation, transaction left pending for reconciliation",
        );
      }
      throw error;
    }

    if (!result.ok) {
      await this.ledger.applyStatus(reference, "FAILED", { error_message: result.errorMessage }, "initiation");
      throw new GatewayRejectedError(reference, result.errorMessage);
    }

    const updated = await this.ledger.recordGatewayMetadata(reference, {
      payment_url: result.paymentUrl,
      payment_token: result.paymentToken,
    });
    this.logger.info({ transaction_id: updated.id, external_reference: reference }, "payment initiated");

    return {
      transaction_id: updated.id,
      external_reference: reference,
      payment_url: result.paymentUrl,
      status: updated.status,
    };
  }
}
