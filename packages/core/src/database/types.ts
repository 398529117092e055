import { ColumnType, Generated, Insertable, Selectable, Updateable } from "kysely";

// NUMERIC(78, 0) and BIGINT come back from pg as strings.
type Numeric = ColumnType<string, string, string>;
type UnixSeconds = ColumnType<string, string | number, string | number>;

// ---- orders ----

export interface OrdersTable {
  id: number;
  status: string;
  asset_id: string;
  seller: string;
  buyer: string | null;
  price: Numeric;
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
}

export type OrderRow = Selectable<OrdersTable>;
export type NewOrderRow = Insertable<OrdersTable>;
export type OrderRowUpdate = Updateable<OrdersTable>;

// ---- order_index ----

export interface OrderIndexTable {
  kind: string;
  address: string;
  position: number;
  order_id: number;
}

export type OrderIndexRow = Selectable<OrderIndexTable>;

// ---- lobbies ----

export interface LobbiesTable {
  id: number;
  creator: string;
  joiner: string | null;
  is_canceled: boolean;
  start_time: UnixSeconds;
  bet_amount: Numeric;
  creator_mead_in_land: Numeric;
  joiner_mead_in_land: Numeric;
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
}

export type LobbyRow = Selectable<LobbiesTable>;
export type NewLobbyRow = Insertable<LobbiesTable>;
export type LobbyRowUpdate = Updateable<LobbiesTable>;

// ---- brewery_statuses ----

export interface BreweryStatusesTable {
  lobby_id: number;
  address: string;
  mead: Numeric;
  points: Numeric;
  is_valve_opened: boolean;
  last_updated_at: UnixSeconds;
  mead_per_second: Numeric;
}

export type BreweryStatusRow = Selectable<BreweryStatusesTable>;

// ---- counters ----

export interface CountersTable {
  name: string;
  value: UnixSeconds;
}

// ---- balances (custodial value ledger) ----

export interface BalancesTable {
  address: string;
  amount: Numeric;
}

// ---- assets (custodial asset registry) ----

export interface AssetsTable {
  asset_id: string;
  owner: string;
  updated_at: Generated<Date>;
}

// ---- exchange_events ----

export interface ExchangeEventsTable {
  id: Generated<number>;
  type: string;
  payload: string; // canonical JSON
  event_hash: string;
  created_at: Generated<Date>;
}

export type ExchangeEventRow = Selectable<ExchangeEventsTable>;
export type NewExchangeEventRow = Insertable<ExchangeEventsTable>;

// ---- master Database interface ----

export interface Database {
  orders: OrdersTable;
  order_index: OrderIndexTable;
  lobbies: LobbiesTable;
  brewery_statuses: BreweryStatusesTable;
  counters: CountersTable;
  balances: BalancesTable;
  assets: AssetsTable;
  exchange_events: ExchangeEventsTable;
}
