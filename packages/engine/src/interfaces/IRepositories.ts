import {
  BreweryStatus,
  Lobby,
  Order,
  OrderIndexKind,
  Page,
} from "@taproom/core";

/**
 * Append-only order arena plus the owned/bought id sequences.
 * Records are replaced whole on update; callers never mutate what they read.
 */
export interface IOrderRepository {
  /** Allocate the next order id (0, 1, 2, ...) */
  nextOrderId(): Promise<number>;
  insert(order: Order): Promise<void>;
  findById(id: number): Promise<Order | undefined>;
  update(order: Order): Promise<void>;

  appendIndex(kind: OrderIndexKind, address: string, orderId: number): Promise<void>;
  countIndex(kind: OrderIndexKind, address: string): Promise<number>;
  pageIndex(
    kind: OrderIndexKind,
    address: string,
    cursor: number,
    howMany: number
  ): Promise<Page<number>>;
}

export interface ILobbyRepository {
  /** Allocate the next lobby id (1, 2, 3, ...) */
  nextLobbyId(): Promise<number>;
  insert(lobby: Lobby): Promise<void>;
  findById(id: number): Promise<Lobby | undefined>;
  update(lobby: Lobby): Promise<void>;

  findBreweryStatus(lobbyId: number, address: string): Promise<BreweryStatus | undefined>;
  saveBreweryStatus(status: BreweryStatus): Promise<void>;
}
