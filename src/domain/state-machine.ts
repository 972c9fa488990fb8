import type { TerminalTransactionStatus, TransactionStatus } from "./types.js";

const ALLOWED_TRANSITIONS: Record<TransactionStatus, TransactionStatus[]> = {
  PENDING: ["ACCEPTED", "REFUSED", "FAILED"],
  ACCEPTED: [],
  REFUSED: [],
  FAILED: [],
};

const TERMINAL_STATUSES: Set<TransactionStatus> = new Set(["ACCEPTED", "REFUSED", "FAILED"]);

export interface TransitionDecision {
  status: TransactionStatus;
  changed: boolean;
  /** A resolution arrived for a transaction that was already terminal. */
  duplicate: boolean;
}

export function canTransition(current: TransactionStatus, next: TransactionStatus): boolean {
  const allowed = ALLOWED_TRANSITIONS[current];
  return allowed.includes(next);
}

export function isTerminalStatus(status: TransactionStatus): status is TerminalTransactionStatus {
  return TERMINAL_STATUSES.has(status);
}

// Illegal transitions are never errors: the current status is kept.
export function resolveTransition(current: TransactionStatus, next: TransactionStatus): TransitionDecision {
  if (canTransition(current, next)) {
    return { status: next, changed: true, duplicate: false };
  }
  return { status: current, changed: false, duplicate: isTerminalStatus(current) };
}
