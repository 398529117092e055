import {
  BreweryStatus,
  Executor,
  Lobby,
  Order,
  OrderIndexKind,
  Page,
  appendOrderIndex,
  countOrderIndex,
  findBreweryStatus,
  findLobbyById,
  findOrderById,
  insertLobby,
  insertOrder,
  listOrderIndex,
  saveBreweryStatus,
  takeNextId,
  updateLobbyRecord,
  updateOrderRecord,
} from "@taproom/core";
import { ILobbyRepository, IOrderRepository } from "@taproom/engine";

/**
 * Order store bound to one executor. Inside a write transaction rows are read
 * `FOR UPDATE` so conflicting operations wait for each other.
 */
export class PostgresOrderRepository implements IOrderRepository {
  constructor(
    private readonly executor: Executor,
    private readonly lockRows: boolean
  ) {}

  nextOrderId(): Promise<number> {
    return takeNextId("orders", 0, this.executor);
  }

  insert(order: Order): Promise<void> {
    return insertOrder(order, this.executor);
  }

  findById(id: number): Promise<Order | undefined> {
    return findOrderById(id, { forUpdate: this.lockRows }, this.executor);
  }

  update(order: Order): Promise<void> {
    return updateOrderRecord(order, this.executor);
  }

  appendIndex(kind: OrderIndexKind, address: string, orderId: number): Promise<void> {
    return appendOrderIndex(kind, address, orderId, this.executor);
  }

  countIndex(kind: OrderIndexKind, address: string): Promise<number> {
    return countOrderIndex(kind, address, this.executor);
  }

  async pageIndex(
    kind: OrderIndexKind,
    address: string,
    cursor: number,
    howMany: number
  ): Promise<Page<number>> {
    const items = await listOrderIndex(kind, address, cursor, howMany, this.executor);
    return { items, cursor: cursor + items.length };
  }
}

export class PostgresLobbyRepository implements ILobbyRepository {
  constructor(
    private readonly executor: Executor,
    private readonly lockRows: boolean
  ) {}

  nextLobbyId(): Promise<number> {
    return takeNextId("lobbies", 1, this.executor);
  }

  insert(lobby: Lobby): Promise<void> {
    return insertLobby(lobby, this.executor);
  }

  findById(id: number): Promise<Lobby | undefined> {
    return findLobbyById(id, { forUpdate: this.lockRows }, this.executor);
  }

  update(lobby: Lobby): Promise<void> {
    return updateLobbyRecord(lobby, this.executor);
  }

  findBreweryStatus(lobbyId: number, address: string): Promise<BreweryStatus | undefined> {
    return findBreweryStatus(lobbyId, address, this.executor);
  }

  saveBreweryStatus(status: BreweryStatus): Promise<void> {
    return saveBreweryStatus(status, this.executor);
  }
}
