import { ExchangeEvent } from "@taproom/core";
import { IAssetRegistry } from "./IAssetRegistry";
import { ILobbyRepository, IOrderRepository } from "./IRepositories";
import { IValueLedger } from "./IValueLedger";

export interface IEventSink {
  /** Queue `event`; it is published only if the surrounding operation commits. */
  emit(event: ExchangeEvent): void;
}

/**
 * Everything a single operation reads and writes.
 */
export interface ExchangeUnit {
  orders: IOrderRepository;
  lobbies: ILobbyRepository;
  ledger: IValueLedger;
  registry: IAssetRegistry;
  events: IEventSink;
}

export type ExchangeEventListener = (event: ExchangeEvent) => void;

/**
 * The host's transactional boundary. Operations run one at a time, and each
 * one's state changes, transfers and events commit together or not at all.
 */
export interface ITransactionRunner {
  run<T>(work: (unit: ExchangeUnit) => Promise<T>): Promise<T>;

  /** Like `run`, for work that writes nothing. */
  read<T>(work: (unit: ExchangeUnit) => Promise<T>): Promise<T>;

  /** Listen for committed events. Returns the unsubscribe function. */
  subscribe(listener: ExchangeEventListener): () => void;
}
