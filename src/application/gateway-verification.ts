import type { GatewayMetadata } from "../domain/types.js";
import type { VerifyResult } from "../ports/payment-gateway.js";

export function metadataFromVerification(result: VerifyResult, errorMessage?: string): GatewayMetadata {
  const metadata: GatewayMetadata = {};
  const { operatorTransactionId, paymentMethod, paymentDate } = result.operatorMetadata;
  if (operatorTransactionId) {
    metadata.operator_transaction_id = operatorTransactionId;
  }
  if (paymentMethod) {
    metadata.payment_method = paymentMethod;
  }
  if (result.status === "ACCEPTED" && paymentDate) {
    metadata.settled_at = paymentDate;
  }
  if (result.status === "REFUSED") {
    metadata.error_message = errorMessage && errorMessage.length > 0 ? errorMessage : `gateway status ${result.vendorStatus}`;
  }
  return metadata;
}
