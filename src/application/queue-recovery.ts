import type { ClockPort } from "../infra/clock.js";
import type { Logger } from "../infra/logger.js";
import type { ReconciliationQueuePort } from "../ports/reconciliation-queue.js";
import type { TransactionLedger } from "./transaction-ledger.js";

export interface QueueRebuildResult {
  scanned: number;
  enqueued: number;
}

interface QueueRecoveryOptions {
  maxAttempts: number;
  pageSize?: number;
}

/** Re-creates missing queue entries for every PENDING transaction in the ledger. */
export class QueueRecovery {
  constructor(
    private readonly ledger: TransactionLedger,
    private readonly queue: ReconciliationQueuePort,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
    private readonly options: QueueRecoveryOptions,
  ) {}

  async rebuildQueue(): Promise<QueueRebuildResult> {
    const pageSize = this.options.pageSize ?? 100;
    const result: QueueRebuildResult = { scanned: 0, enqueued: 0 };
    let afterId: number | undefined;

    for (;;) {
      const page = await this.ledger.listPending({
        limit: pageSize,
        ...(afterId !== undefined ? { afterId } : {}),
      });
      for (const transaction of page) {
        result.scanned += 1;
        const existing = await this.queue.get(transaction.external_reference);
        if (existing) {
          continue;
        }
        await this.queue.enqueue(transaction.external_reference, this.clock.nowMs(), this.options.maxAttempts);
        result.enqueued += 1;
      }
      const last = page.at(-1);
      if (!last || page.length < pageSize) {
        break;
      }
      afterId = last.id;
    }

    this.logger.info(result, "reconciliation queue rebuilt");
    return result;
  }
}
