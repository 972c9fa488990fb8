import type { Redis } from "ioredis";
import type { QueueEntry } from "../../domain/types.js";
import { AppError } from "../../infra/app-error.js";
import type { ReconciliationQueuePort } from "../../ports/reconciliation-queue.js";

interface RedisReconciliationQueueOptions {
  keyPrefix: string;
}

// Updates the hash and the score only while the entry still exists.
const RESCHEDULE_SCRIPT = `
if redis.call("EXISTS", KEYS[2]) == 0 then
  return 0
end
redis.call("HSET", KEYS[2], "attempts", ARGV[2], "next_check_at", ARGV[3])
redis.call("ZADD", KEYS[1], ARGV[3], ARGV[1])
return 1
`;

const EXPEDITE_SCRIPT = `
local current = redis.call("HGET", KEYS[2], "next_check_at")
if not current or tonumber(current) <= tonumber(ARGV[2]) then
  return 0
end
redis.call("HSET", KEYS[2], "next_check_at", ARGV[2])
redis.call("ZADD", KEYS[1], ARGV[2], ARGV[1])
return 1
`;

function toInteger(value: string | undefined, field: string): number {
  const parsed = Number(value);
  if (value === undefined || !Number.isInteger(parsed)) {
    throw new AppError(500, "persistence_mapping_error", `Unable to map queue field '${field}'.`);
  }
  return parsed;
}

export class RedisReconciliationQueue implements ReconciliationQueuePort {
  private readonly dueKey: string;

  constructor(
    private readonly redis: Redis,
    private readonly options: RedisReconciliationQueueOptions,
  ) {
    this.dueKey = `${options.keyPrefix}:due`;
  }

  async enqueue(externalReference: string, nextCheckAt: number, maxAttempts: number): Promise<void> {
    await this.redis
      .multi()
      .hset(this.entryKey(externalReference), {
        attempts: "0",
        max_attempts: String(maxAttempts),
        next_check_at: String(nextCheckAt),
      })
      .zadd(this.dueKey, nextCheckAt, externalReference)
      .exec();
  }

  async dueEntries(nowMs: number, limit: number): Promise<QueueEntry[]> {
    const references = await this.redis.zrangebyscore(this.dueKey, "-inf", nowMs, "LIMIT", 0, Math.max(1, limit));
    const entries: QueueEntry[] = [];
    for (const reference of references) {
      const entry = await this.get(reference);
      if (entry) {
        entries.push(entry);
      } else {
        // Orphaned score without its hash.
        await this.redis.zrem(this.dueKey, reference);
      }
    }
    return entries;
  }

  async get(externalReference: string): Promise<QueueEntry | null> {
    const fields = await this.redis.hgetall(this.entryKey(externalReference));
    if (Object.keys(fields).length === 0) {
      return null;
    }
    return {
      external_reference: externalReference,
      attempts: toInteger(fields.attempts, "attempts"),
      max_attempts: toInteger(fields.max_attempts, "max_attempts"),
      next_check_at: toInteger(fields.next_check_at, "next_check_at"),
    };
  }

  async reschedule(externalReference: string, attempts: number, nextCheckAt: number): Promise<void> {
    await this.redis.eval(
      RESCHEDULE_SCRIPT,
      2,
      this.dueKey,
      this.entryKey(externalReference),
      externalReference,
      String(attempts),
      String(nextCheckAt),
    );
  }

  async expedite(externalReference: string, nextCheckAt: number): Promise<void> {
    await this.redis.eval(
      EXPEDITE_SCRIPT,
      2,
      this.dueKey,
      this.entryKey(externalReference),
      externalReference,
      String(nextCheckAt),
    );
  }

  async remove(externalReference: string): Promise<void> {
    await this.redis.multi().zrem(this.dueKey, externalReference).del(this.entryKey(externalReference)).exec();
  }

  async size(): Promise<number> {
    return this.redis.zcard(this.dueKey);
  }

  private entryKey(externalReference: string): string {
    return `${this.options.keyPrefix}:entry:${externalReference}`;
  }
}
