export { OrderEscrowMarket } from "./OrderEscrowMarket";
export type { OrderEscrowMarketOptions, OrderPurchase } from "./OrderEscrowMarket";
export { WagerLobbyEngine } from "./WagerLobbyEngine";
export type { WagerLobbyEngineOptions } from "./WagerLobbyEngine";
export { StaticSettingsProvider } from "./StaticSettingsProvider";
export type { StaticSettings } from "./StaticSettingsProvider";
export { checkpointOnlyAccrual, linearAccrual, getAccrualPolicy } from "./AccrualPolicy";
export type { AccrualPolicy, AccrualWindow } from "./AccrualPolicy";

export { systemClock } from "./interfaces/IClock";
export type { IClock } from "./interfaces/IClock";
export type { IValueLedger } from "./interfaces/IValueLedger";
export type { IAssetRegistry } from "./interfaces/IAssetRegistry";
export type { ISettingsProvider } from "./interfaces/ISettingsProvider";
export type { IOrderRepository, ILobbyRepository } from "./interfaces/IRepositories";
export type {
  ExchangeUnit,
  ExchangeEventListener,
  IEventSink,
  ITransactionRunner,
} from "./interfaces/ITransactionRunner";

// In-process collaborators
export { InMemoryValueLedger } from "./memory/InMemoryValueLedger";
export type { LedgerConnectOptions } from "./memory/InMemoryValueLedger";
export { InMemoryAssetRegistry } from "./memory/InMemoryAssetRegistry";
export type { RegistryConnectOptions } from "./memory/InMemoryAssetRegistry";
export { InMemoryOrderRepository } from "./memory/InMemoryOrderRepository";
export { InMemoryLobbyRepository } from "./memory/InMemoryLobbyRepository";
export { MemoryTransactionRunner } from "./memory/MemoryTransactionRunner";
export type { MemoryTransactionRunnerOptions } from "./memory/MemoryTransactionRunner";
export type { Checkpointable } from "./memory/Checkpointable";
export { ManualClock } from "./memory/ManualClock";
export { createMemoryExchange } from "./memory/createMemoryExchange";
export type { MemoryExchange, MemoryExchangeOptions } from "./memory/createMemoryExchange";
