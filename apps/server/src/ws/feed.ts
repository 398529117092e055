import { ExchangeEvent, toWire } from "@taproom/core";
import { ITransactionRunner } from "@taproom/engine";

/** The part of a WebSocket the feed needs. */
export interface FeedClient {
  readonly readyState: number;
  send(data: string): void;
}

const OPEN = 1;

/**
 * Fans committed exchange events out to every connected client as JSON.
 */
export class EventFeed {
  private clients = new Set<FeedClient>();
  private readonly unsubscribe: () => void;

  constructor(runner: ITransactionRunner) {
    this.unsubscribe = runner.subscribe((event) => this.broadcast(event));
  }

  add(client: FeedClient): void {
    this.clients.add(client);
  }

  remove(client: FeedClient): void {
    this.clients.delete(client);
  }

  get size(): number {
    return this.clients.size;
  }

  broadcast(event: ExchangeEvent): void {
    const data = JSON.stringify({ type: "event", event: toWire(event) });
    for (const client of this.clients) {
      if (client.readyState === OPEN) {
        client.send(data);
      }
    }
  }

  close(): void {
    this.unsubscribe();
    this.clients.clear();
  }
}
