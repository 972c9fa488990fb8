import type { Redis } from "ioredis";
import type { TransactionStatusChangedEvent } from "../../domain/types.js";
import type { Logger } from "../../infra/logger.js";
import type { EventBusPort, TransactionEventHandler } from "../../ports/event-bus.js";
import { dispatchToSubscribers } from "../inmemory/event-bus.js";

interface RedisStreamEventBusOptions {
  streamKey: string;
  maxLength: number;
}

/**
 * Appends status events to a Redis stream for downstream workflows and fans
 * them out to in-process subscribers.
 */
export class RedisStreamEventBus implements EventBusPort {
  private readonly subscribers: TransactionEventHandler[] = [];

  constructor(
    private readonly redis: Redis,
    private readonly logger: Logger,
    private readonly options: RedisStreamEventBusOptions,
  ) {}

  async publish(event: TransactionStatusChangedEvent): Promise<void> {
    try {
      await this.redis.xadd(
        this.options.streamKey,
        "MAXLEN",
        "~",
        this.options.maxLength,
        "*",
        "event_id",
        event.id,
        "event_type",
        event.type,
        "event_json",
        JSON.stringify(event),
      );
    } catch (error) {
      this.logger.error({ err: error, event_id: event.id }, "status event stream append failed");
    }

    dispatchToSubscribers(this.subscribers, event, this.logger);
  }

  subscribe(handler: TransactionEventHandler): void {
    this.subscribers.push(handler);
  }
}
