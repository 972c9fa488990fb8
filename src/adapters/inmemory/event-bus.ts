import type { TransactionStatusChangedEvent } from "../../domain/types.js";
import type { Logger } from "../../infra/logger.js";
import type { EventBusPort, TransactionEventHandler } from "../../ports/event-bus.js";

/**
 * Hands the event to every subscriber without waiting for them. Subscribers
 * belong to other workflows; a slow or failing one must not hold up the
 * status write that published the event.
 */
export function dispatchToSubscribers(
  subscribers: readonly TransactionEventHandler[],
  event: TransactionStatusChangedEvent,
  logger: Logger,
): void {
  for (const subscriber of subscribers) {
    void Promise.resolve()
      .then(() => subscriber(event))
      .catch((error: unknown) => {
        logger.error(
          { err: error, event_id: event.id, external_reference: event.data.external_reference },
          "status event subscriber failed",
        );
      });
  }
}

export class InMemoryEventBus implements EventBusPort {
  private readonly outbox: TransactionStatusChangedEvent[] = [];
  private readonly subscribers: TransactionEventHandler[] = [];

  constructor(private readonly logger: Logger) {}

  async publish(event: TransactionStatusChangedEvent): Promise<void> {
    this.outbox.push(event);
    dispatchToSubscribers(this.subscribers, event, this.logger);
  }

  getPublishedEvents(): TransactionStatusChangedEvent[] {
    return [...this.outbox];
  }

  subscribe(handler: TransactionEventHandler): void {
    this.subscribers.push(handler);
  }
}
