import type { GatewayMetadata, TransactionStatistics } from "./types.js";

const METADATA_KEYS = [
  "payment_url",
  "payment_token",
  "operator_transaction_id",
  "payment_method",
  "error_message",
  "settled_at",
] as const satisfies ReadonlyArray<keyof GatewayMetadata>;

/** Additive merge: only defined, non-empty incoming values are written; nothing is cleared. */
export function mergeGatewayMetadata(current: GatewayMetadata, incoming: GatewayMetadata): GatewayMetadata {
  const merged: GatewayMetadata = { ...current };
  for (const key of METADATA_KEYS) {
    const value = incoming[key];
    if (value !== undefined && value.length > 0) {
      merged[key] = value;
    }
  }
  return merged;
}

export function normalizeGatewayMetadata(value: unknown): GatewayMetadata {
  const metadata: GatewayMetadata = {};
  if (!value || typeof value !== "object") {
    return metadata;
  }
  for (const key of METADATA_KEYS) {
    const field: unknown = Reflect.get(value, key);
    if (typeof field === "string" && field.length > 0) {
      metadata[key] = field;
    }
  }
  return metadata;
}

export function emptyStatistics(): TransactionStatistics {
  return {
    total: 0,
    by_status: { PENDING: 0, ACCEPTED: 0, REFUSED: 0, FAILED: 0 },
    accepted_amount_by_currency: {},
  };
}
