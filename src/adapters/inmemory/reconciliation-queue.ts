import type { QueueEntry } from "../../domain/types.js";
import type { ReconciliationQueuePort } from "../../ports/reconciliation-queue.js";

export class InMemoryReconciliationQueue implements ReconciliationQueuePort {
  private readonly entries = new Map<string, QueueEntry>();

  async enqueue(externalReference: string, nextCheckAt: number, maxAttempts: number): Promise<void> {
    this.entries.set(externalReference, {
      external_reference: externalReference,
      next_check_at: nextCheckAt,
      attempts: 0,
      max_attempts: maxAttempts,
    });
  }

  async dueEntries(nowMs: number, limit: number): Promise<QueueEntry[]> {
    return [...this.entries.values()]
      .filter((entry) => entry.next_check_at <= nowMs)
      .sort((a, b) => {
        const byDue = a.next_check_at - b.next_check_at;
        if (byDue !== 0) {
          return byDue;
        }
        return a.external_reference.localeCompare(b.external_reference);
      })
      .slice(0, Math.max(1, limit))
      .map((entry) => ({ ...entry }));
  }

  async get(externalReference: string): Promise<QueueEntry | null> {
    const entry = this.entries.get(externalReference);
    return entry ? { ...entry } : null;
  }

  async reschedule(externalReference: string, attempts: number, nextCheckAt: number): Promise<void> {
    const entry = this.entries.get(externalReference);
    if (!entry) {
      return;
    }
    entry.attempts = attempts;
    entry.next_check_at = nextCheckAt;
  }

  async expedite(externalReference: string, nextCheckAt: number): Promise<void> {
    const entry = this.entries.get(externalReference);
    if (entry && nextCheckAt < entry.next_check_at) {
      entry.next_check_at = nextCheckAt;
    }
  }

  async remove(externalReference: string): Promise<void> {
    this.entries.delete(externalReference);
  }

  async size(): Promise<number> {
    return this.entries.size;
  }
}
