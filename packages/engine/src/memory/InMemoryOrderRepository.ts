import { Order, OrderIndexKind, Page, fetchPage } from "@taproom/core";
import { IOrderRepository } from "../interfaces/IRepositories";
import { Checkpointable } from "./Checkpointable";

export class InMemoryOrderRepository implements IOrderRepository, Checkpointable {
  private counter = 0;
  private orders = new Map<number, Order>();
  private indices = new Map<string, number[]>();

  async nextOrderId(): Promise<number> {
    return this.counter++;
  }

  async insert(order: Order): Promise<void> {
    this.orders.set(order.id, { ...order });
  }

  async findById(id: number): Promise<Order | undefined> {
    const order = this.orders.get(id);
    return order && { ...order };
  }

  async update(order: Order): Promise<void> {
    this.orders.set(order.id, { ...order });
  }

  async appendIndex(kind: OrderIndexKind, address: string, orderId: number): Promise<void> {
    const key = indexKey(kind, address);
    this.indices.set(key, [...(this.indices.get(key) ?? []), orderId]);
  }

  async countIndex(kind: OrderIndexKind, address: string): Promise<number> {
    return this.indices.get(indexKey(kind, address))?.length ?? 0;
  }

  async pageIndex(
    kind: OrderIndexKind,
    address: string,
    cursor: number,
    howMany: number
  ): Promise<Page<number>> {
    return fetchPage(this.indices.get(indexKey(kind, address)) ?? [], cursor, howMany);
  }

  checkpoint(): () => void {
    const counter = this.counter;
    const orders = new Map(this.orders);
    const indices = new Map(this.indices);
    return () => {
      this.counter = counter;
      this.orders = orders;
      this.indices = indices;
    };
  }
}

function indexKey(kind: OrderIndexKind, address: string): string {
  return `${kind}:${address}`;
}
