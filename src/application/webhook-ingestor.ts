import { AuthenticationFailedError, GatewayUnavailableError } from "../domain/errors.js";
import { isTerminalStatus } from "../domain/state-machine.js";
import type { TransactionStatus } from "../domain/types.js";
import { AppError } from "../infra/app-error.js";
import type { ClockPort } from "../infra/clock.js";
import type { Logger } from "../infra/logger.js";
import type { PaymentMetricsRegistry, WebhookOutcome } from "../infra/metrics.js";
import type { VerifyResult } from "../ports/payment-gateway.js";
import type { ReconciliationQueuePort } from "../ports/reconciliation-queue.js";
import { metadataFromVerification } from "./gateway-verification.js";
import type { GatewayRouter } from "./gateway-router.js";
import type { TransactionLedger } from "./transaction-ledger.js";
import { verifyNotificationSignature, type NotificationFields } from "./webhook-signing.js";

export interface NotificationInput {
  fields: NotificationFields;
  signature: string | undefined;
  remoteAddress: string;
}

export interface NotificationResult {
  outcome: Exclude<WebhookOutcome, "authentication_failed">;
  external_reference: string;
  status?: TransactionStatus;
}

/**
 * Authenticates gateway notifications and resolves them by asking the gateway
 * for the authoritative status. The notification's own status fields are
 * never trusted.
 */
export class WebhookIngestor {
  constructor(
    private readonly ledger: TransactionLedger,
    private readonly gateways: GatewayRouter,
    private readonly queue: ReconciliationQueuePort,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
    private readonly metrics: PaymentMetricsRegistry,
    private readonly secret: string,
  ) {}

  async handle(input: NotificationInput): Promise<NotificationResult> {
    const claimedReference = input.fields.cpm_trans_id;
    if (!verifyNotificationSignature(this.secret, input.fields, input.signature)) {
      const reason = input.signature ? "signature mismatch" : "missing signature";
      this.metrics.recordWebhookOutcome("authentication_failed");
      this.logger.warn(
        { external_reference: claimedReference, remote_address: input.remoteAddress, reason },
        "notification authentication failed",
      );
      throw new AuthenticationFailedError(reason);
    }

    if (!claimedReference) {
      throw new AppError(400, "invalid_notification", "Notification is missing cpm_trans_id.");
    }
    const result = await this.resolve(claimedReference, input.fields.cpm_error_message);
    this.metrics.recordWebhookOutcome(result.outcome);
    return result;
  }

  private async resolve(reference: string, errorMessage: string | undefined): Promise<NotificationResult> {
    const transaction = await this.ledger.findByReference(reference);
    if (!transaction) {
      this.logger.warn({ external_reference: reference }, "notification for unknown transaction");
      return { outcome: "unknown_reference", external_reference: reference };
    }

    if (isTerminalStatus(transaction.status)) {
      // Routed through the ledger so the duplicate is logged and counted.
      const unchanged = await this.ledger.applyStatus(reference, transaction.status, {}, "webhook");
      return { outcome: "duplicate", external_reference: reference, status: unchanged.status };
    }

    const gateway = this.gateways.findByName(transaction.operator);
    let verification: VerifyResult;
    try {
      verification = await gateway.verify(reference);
    } catch (error) {
      if (!(error instanceof GatewayUnavailableError)) {
        throw error;
      }
      await this.queue.expedite(reference, this.clock.nowMs());
      this.logger.warn(
        { external_reference: reference, err: error },
        "gateway unavailable while verifying notification, deferred to reconciliation",
      );
      return { outcome: "gateway_unavailable", external_reference: reference, status: transaction.status };
    }

    const updated = await this.ledger.applyStatus(
      reference,
      verification.status,
      metadataFromVerification(verification, errorMessage),
      "webhook",
    );

    if (verification.status === "PENDING") {
      return { outcome: "pending", external_reference: reference, status: updated.status };
    }
    return {
      outcome: updated.status === verification.status ? "applied" : "duplicate",
      external_reference: reference,
      status: updated.status,
    };
  }
}
