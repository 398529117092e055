import {
  ExchangeEvent,
  Executor,
  appendExchangeEvents,
  db,
  inSerializableTransaction,
  normalizeAddress,
} from "@taproom/core";
import { ExchangeEventListener, ExchangeUnit, ITransactionRunner } from "@taproom/engine";
import { PostgresCustodialLedger, PostgresCustodialRegistry } from "./PostgresCustody";
import { PostgresLobbyRepository, PostgresOrderRepository } from "./PostgresRepositories";

const SERIALIZATION_FAILURE = "40001";
const MAX_ATTEMPTS = 3;

export interface PostgresTransactionRunnerOptions {
  escrowAddress: string;
  onListenerError?: (err: unknown, event: ExchangeEvent) => void;
}

function isSerializationFailure(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === SERIALIZATION_FAILURE;
}

/**
 * One SERIALIZABLE transaction per operation. Orders, lobbies, balances,
 * assets and the event log share the database, so a failed operation leaves
 * all of them untouched. Transactions that lose a serialization race are
 * retried from the start.
 */
export class PostgresTransactionRunner implements ITransactionRunner {
  private readonly escrowAddress: string;
  private readonly listeners = new Set<ExchangeEventListener>();

  constructor(private readonly opts: PostgresTransactionRunnerOptions) {
    this.escrowAddress = normalizeAddress(opts.escrowAddress, "escrowAddress");
  }

  async run<T>(work: (unit: ExchangeUnit) => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        const { value, events } = await inSerializableTransaction(async (trx) => {
          const pending: ExchangeEvent[] = [];
          const value = await work(this.unitFor(trx, true, pending));
          await appendExchangeEvents(pending, trx);
          return { value, events: pending };
        });
        this.publish(events);
        return value;
      } catch (err) {
        if (attempt >= MAX_ATTEMPTS || !isSerializationFailure(err)) {
          throw err;
        }
      }
    }
  }

  async read<T>(work: (unit: ExchangeUnit) => Promise<T>): Promise<T> {
    return work(this.unitFor(db, false, []));
  }

  subscribe(listener: ExchangeEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private unitFor(executor: Executor, writable: boolean, pending: ExchangeEvent[]): ExchangeUnit {
    return {
      orders: new PostgresOrderRepository(executor, writable),
      lobbies: new PostgresLobbyRepository(executor, writable),
      ledger: new PostgresCustodialLedger(this.escrowAddress, executor),
      registry: new PostgresCustodialRegistry(executor),
      events: {
        emit: (event) => {
          if (!writable) {
            throw new Error(`Cannot emit ${event.type} from a read`);
          }
          pending.push(event);
        },
      },
    };
  }

  private publish(events: ExchangeEvent[]): void {
    for (const event of events) {
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          const onError = this.opts.onListenerError ?? ((e: unknown) => console.error(e));
          onError(err, event);
        }
      }
    }
  }
}
