// Database singleton (lazy proxy)
export { db, closeDb, getPoolConfig, inSerializableTransaction } from "./database";
export type { Executor } from "./database";

// Types
export type {
  Database,
  OrdersTable,
  OrderRow,
  NewOrderRow,
  OrderRowUpdate,
  OrderIndexTable,
  OrderIndexRow,
  LobbiesTable,
  LobbyRow,
  NewLobbyRow,
  LobbyRowUpdate,
  BreweryStatusesTable,
  BreweryStatusRow,
  CountersTable,
  BalancesTable,
  AssetsTable,
  ExchangeEventsTable,
  ExchangeEventRow,
  NewExchangeEventRow,
} from "./types";

// Models
export {
  findOrderById,
  insertOrder,
  updateOrder as updateOrderRecord,
  appendOrderIndex,
  countOrderIndex,
  listOrderIndex,
} from "./models/orders";

export {
  findLobbyById,
  insertLobby,
  updateLobby as updateLobbyRecord,
  findBreweryStatus,
  saveBreweryStatus,
} from "./models/lobbies";

export { takeNextId } from "./models/counters";

export {
  getBalance,
  creditBalance,
  debitBalance,
  findAssetOwner,
  insertAsset,
  moveAsset,
} from "./models/custody";

export { appendExchangeEvents } from "./models/exchangeEvents";

// Migration
export { migrateToLatest } from "./migrate";
export type { MigrateOptions } from "./migrate";

// Redis
export { createRedisClient, claimAuthSignature } from "./redis";

// Config
export { getDatabaseUrl, getRedisUrl } from "./config";
