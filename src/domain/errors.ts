import { AppError } from "../infra/app-error.js";

export class InvalidAmountError extends AppError {
  constructor(amount: unknown) {
    super(422, "invalid_amount", `Amount must be a positive integer in minor units, got '${String(amount)}'.`);
    this.name = "InvalidAmountError";
  }
}

export class DuplicateReferenceError extends AppError {
  constructor(public readonly externalReference: string) {
    super(409, "duplicate_reference", `External reference '${externalReference}' already exists.`);
    this.name = "DuplicateReferenceError";
  }
}

export class GatewayRejectedError extends AppError {
  constructor(
    public readonly externalReference: string,
    public readonly gatewayMessage: string,
  ) {
    super(402, "gateway_rejected", `Payment gateway rejected the initiation: ${gatewayMessage}`);
    this.name = "GatewayRejectedError";
  }
}

export class GatewayUnavailableError extends AppError {
  constructor(
    public readonly operation: "initiate" | "verify",
    detail: string,
  ) {
    super(503, "gateway_unavailable", `Payment gateway unavailable during ${operation}: ${detail}`);
    this.name = "GatewayUnavailableError";
  }
}

export class AuthenticationFailedError extends AppError {
  constructor(public readonly reason: string) {
    // The caller only ever sees the generic message; the reason goes to server logs.
    super(400, "authentication_failed", "Notification signature is invalid.");
    this.name = "AuthenticationFailedError";
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, key: string | number) {
    super(404, "resource_not_found", `${resource} '${String(key)}' not found.`);
    this.name = "NotFoundError";
  }
}

export class AttemptsExhaustedError extends AppError {
  constructor(
    public readonly externalReference: string,
    public readonly attempts: number,
  ) {
    super(
      409,
      "attempts_exhausted",
      `Transaction '${externalReference}' was not resolved after ${attempts} verification attempts.`,
    );
    this.name = "AttemptsExhaustedError";
  }
}
