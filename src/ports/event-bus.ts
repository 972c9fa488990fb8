import type { TransactionStatusChangedEvent } from "../domain/types.js";

export type TransactionEventHandler = (event: TransactionStatusChangedEvent) => Promise<void>;

export interface EventBusPort {
  publish(event: TransactionStatusChangedEvent): Promise<void>;
  subscribe(handler: TransactionEventHandler): void;
  close?(): Promise<void>;
}
