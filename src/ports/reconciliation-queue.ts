import type { QueueEntry } from "../domain/types.js";

export interface ReconciliationQueuePort {
  enqueue(externalReference: string, nextCheckAt: number, maxAttempts: number): Promise<void>;
  /** Oldest next_check_at first. */
  dueEntries(nowMs: number, limit: number): Promise<QueueEntry[]>;
  get(externalReference: string): Promise<QueueEntry | null>;
  /** No-op when the entry was removed in the meantime. */
  reschedule(externalReference: string, attempts: number, nextCheckAt: number): Promise<void>;
  /** Moves next_check_at earlier, never later; attempts are left as they are. No-op when absent. */
  expedite(externalReference: string, nextCheckAt: number): Promise<void>;
  remove(externalReference: string): Promise<void>;
  size(): Promise<number>;
  close?(): Promise<void>;
}
