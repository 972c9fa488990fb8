import { TRANSACTION_KINDS, type CreateTransactionInput, type TransactionKind } from "../domain/types.js";
import { InvalidAmountError } from "../domain/errors.js";
import { AppError } from "../infra/app-error.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value > 0;
}

function isTransactionKind(value: unknown): value is TransactionKind {
  return TRANSACTION_KINDS.some((kind) => kind === value);
}

export function parseInitiatePaymentInput(payload: unknown): CreateTransactionInput {
  if (!isObject(payload)) {
    throw new AppError(400, "invalid_request_body", "Request body must be an object.");
  }

  const { payer_id, context_id, amount, currency, kind, description } = payload;

  if (!isPositiveInteger(payer_id)) {
    throw new AppError(422, "invalid_payer_id", "payer_id must be a positive integer.");
  }
  if (!isPositiveInteger(context_id)) {
    throw new AppError(422, "invalid_context_id", "context_id must be a positive integer.");
  }
  if (!isPositiveInteger(amount)) {
    throw new InvalidAmountError(amount);
  }
  if (!isString(currency) || !/^[A-Za-z]{3}$/.test(currency.trim())) {
    throw new AppError(422, "invalid_currency", "currency must be a 3-letter ISO code.");
  }
  if (!isTransactionKind(kind)) {
    throw new AppError(422, "invalid_kind", `kind must be one of: ${TRANSACTION_KINDS.join(", ")}.`);
  }
  if (description !== undefined && (!isString(description) || description.length > 255)) {
    throw new AppError(422, "invalid_description", "description must be a string of 1 to 255 characters.");
  }

  return {
    payer_id,
    context_id,
    amount,
    currency: currency.trim().toUpperCase(),
    kind,
    ...(description !== undefined ? { description } : {}),
  };
}

/** Flattens a form or JSON notification body into string fields; other value types are dropped. */
export function normalizeNotificationFields(payload: unknown): Record<string, string> {
  if (!isObject(payload)) {
    throw new AppError(400, "invalid_notification", "Notification body must be form fields or an object.");
  }
  const fields: Record<string, string> = {};
  for (const [name, value] of Object.entries(payload)) {
    if (typeof value === "string") {
      fields[name] = value;
    } else if (typeof value === "number") {
      fields[name] = String(value);
    }
  }
  return fields;
}

export function normalizePositiveInteger(value: unknown, fieldName: string): number {
  if (typeof value !== "string") {
    throw new AppError(422, `invalid_${fieldName}`, `${fieldName} must be a string.`);
  }

  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new AppError(422, `invalid_${fieldName}`, `${fieldName} must be a positive integer.`);
  }
  return parsed;
}

export function normalizeResourceId(value: unknown, fieldName: string): string {
  if (typeof value !== "string") {
    throw new AppError(400, `invalid_${fieldName}`, `${fieldName} is required.`);
  }

  const normalized = value.trim();
  if (normalized.length === 0 || normalized.length > 255) {
    throw new AppError(
      400,
      `invalid_${fieldName}`,
      `${fieldName} length must be between 1 and 255 characters.`,
    );
  }
  return normalized;
}
