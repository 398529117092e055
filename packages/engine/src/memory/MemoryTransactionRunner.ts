import { AsyncLocalStorage } from "async_hooks";
import { ExchangeEvent } from "@taproom/core";
import { IAssetRegistry } from "../interfaces/IAssetRegistry";
import { ILobbyRepository, IOrderRepository } from "../interfaces/IRepositories";
import {
  ExchangeEventListener,
  ExchangeUnit,
  ITransactionRunner,
} from "../interfaces/ITransactionRunner";
import { IValueLedger } from "../interfaces/IValueLedger";
import { Checkpointable } from "./Checkpointable";

export interface MemoryTransactionRunnerOptions {
  orders: IOrderRepository;
  lobbies: ILobbyRepository;
  ledger: IValueLedger;
  registry: IAssetRegistry;
  /** Stores snapshotted before each operation and restored if it fails */
  participants: Checkpointable[];
  onListenerError?: (err: unknown, event: ExchangeEvent) => void;
}

interface Frame {
  events: ExchangeEvent[];
  /** Set once the frame's work has settled */
  closed: boolean;
}

/**
 * Runs operations one at a time against in-process stores.
 *
 * An operation invoked while another is executing on the same async path
 * (a ledger or registry calling back into an engine) runs nested, inside its
 * own savepoint, rather than queueing behind the operation that called it.
 * A call that outlives its caller's frame, such as one fired without being
 * awaited, queues like any other operation.
 */
export class MemoryTransactionRunner implements ITransactionRunner {
  private readonly frames = new AsyncLocalStorage<Frame>();
  private readonly listeners = new Set<ExchangeEventListener>();
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly opts: MemoryTransactionRunnerOptions) {}

  run<T>(work: (unit: ExchangeUnit) => Promise<T>): Promise<T> {
    const parent = this.frames.getStore();
    if (parent && !parent.closed) {
      return this.attempt(work, parent);
    }

    const result = this.tail.then(async () => {
      const root: Frame = { events: [], closed: false };
      const value = await this.attempt(work, root);
      this.publish(root.events);
      return value;
    });
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  read<T>(work: (unit: ExchangeUnit) => Promise<T>): Promise<T> {
    return this.run(work);
  }

  subscribe(listener: ExchangeEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private async attempt<T>(work: (unit: ExchangeUnit) => Promise<T>, parent: Frame): Promise<T> {
    const frame: Frame = { events: [], closed: false };
    const restores = this.opts.participants.map((p) => p.checkpoint());
    try {
      const value = await this.frames.run(frame, () => work(this.unitFor(frame)));
      // A parent that already settled has handed its events on.
      if (parent.closed) {
        this.publish(frame.events);
      } else {
        parent.events.push(...frame.events);
      }
      return value;
    } catch (err) {
      for (const restore of restores.reverse()) restore();
      throw err;
    } finally {
      frame.closed = true;
    }
  }

  private unitFor(frame: Frame): ExchangeUnit {
    return {
      orders: this.opts.orders,
      lobbies: this.opts.lobbies,
      ledger: this.opts.ledger,
      registry: this.opts.registry,
      events: { emit: (event) => frame.events.push(event) },
    };
  }

  private publish(events: ExchangeEvent[]): void {
    const onError = this.opts.onListenerError ?? ((err: unknown) => console.error(err));
    for (const event of events) {
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          onError(err, event);
        }
      }
    }
  }
}
