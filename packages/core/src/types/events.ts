interface EventBase<T extends string> {
  type: T;
  /** Unix seconds at which the operation committed */
  at: number;
}

export interface OrderCreatedEvent extends EventBase<"OrderCreated"> {
  orderId: number;
  assetId: string;
  seller: string;
  price: bigint;
}

export interface OrderUpdatedEvent extends EventBase<"OrderUpdated"> {
  orderId: number;
  seller: string;
  price: bigint;
}

export interface OrderCanceledEvent extends EventBase<"OrderCanceled"> {
  orderId: number;
  assetId: string;
  seller: string;
}

export interface OrderBoughtEvent extends EventBase<"OrderBought"> {
  orderId: number;
  assetId: string;
  seller: string;
  buyer: string;
  price: bigint;
  sellerAmount: bigint;
  treasuryAmount: bigint;
  rewardPoolAmount: bigint;
}

export interface LobbyCreatedEvent extends EventBase<"LobbyCreated"> {
  lobbyId: number;
  creator: string;
  startTime: number;
  betAmount: bigint;
}

export interface LobbyUpdatedEvent extends EventBase<"LobbyUpdated"> {
  lobbyId: number;
  creator: string;
  startTime: number;
}

export interface LobbyCanceledEvent extends EventBase<"LobbyCanceled"> {
  lobbyId: number;
  creator: string;
  joiner: string | null;
  betAmount: bigint;
}

export interface LobbyJoinedEvent extends EventBase<"LobbyJoined"> {
  lobbyId: number;
  joiner: string;
}

export interface LobbyUnjoinedEvent extends EventBase<"LobbyUnjoined"> {
  lobbyId: number;
  joiner: string;
}

export interface ValveToggledEvent extends EventBase<"ValveToggled"> {
  lobbyId: number;
  participant: string;
  isValveOpened: boolean;
}

export type OrderEvent =
  | OrderCreatedEvent
  | OrderUpdatedEvent
  | OrderCanceledEvent
  | OrderBoughtEvent;

export type LobbyEvent =
  | LobbyCreatedEvent
  | LobbyUpdatedEvent
  | LobbyCanceledEvent
  | LobbyJoinedEvent
  | LobbyUnjoinedEvent
  | ValveToggledEvent;

export type ExchangeEvent = OrderEvent | LobbyEvent;
