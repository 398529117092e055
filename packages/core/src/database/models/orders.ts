import { sql } from "kysely";
import { db, Executor } from "../database";
import { OrderRow } from "../types";
import { Order, OrderIndexKind, OrderStatus } from "../../types/order";

const ORDER_STATUSES: readonly string[] = Object.values(OrderStatus);

function isOrderStatus(value: string): value is OrderStatus {
  return ORDER_STATUSES.includes(value);
}

export function rowToOrder(row: OrderRow): Order {
  if (!isOrderStatus(row.status)) {
    throw new Error(`Order ${row.id} has unknown status ${row.status}`);
  }
  return {
    id: row.id,
    status: row.status,
    assetId: row.asset_id,
    seller: row.seller,
    buyer: row.buyer,
    price: BigInt(row.price),
  };
}

export async function findOrderById(
  id: number,
  options: { forUpdate?: boolean } = {},
  executor: Executor = db
): Promise<Order | undefined> {
  let query = executor.selectFrom("orders").where("id", "=", id).selectAll();
  if (options.forUpdate) {
    query = query.forUpdate();
  }
  const row = await query.executeTakeFirst();
  return row ? rowToOrder(row) : undefined;
}

export async function insertOrder(
  order: Order,
  executor: Executor = db
): Promise<void> {
  await executor
    .insertInto("orders")
    .values({
      id: order.id,
      status: order.status,
      asset_id: order.assetId,
      seller: order.seller,
      buyer: order.buyer,
      price: order.price.toString(),
    })
    .execute();
}

export async function updateOrder(
  order: Order,
  executor: Executor = db
): Promise<void> {
  await executor
    .updateTable("orders")
    .set({
      status: order.status,
      buyer: order.buyer,
      price: order.price.toString(),
      updated_at: sql<Date>`now()`,
    })
    .where("id", "=", order.id)
    .execute();
}

/**
 * Append `orderId` to the owned/bought sequence of `address`.
 */
export async function appendOrderIndex(
  kind: OrderIndexKind,
  address: string,
  orderId: number,
  executor: Executor = db
): Promise<void> {
  const position = await countOrderIndex(kind, address, executor);
  await executor
    .insertInto("order_index")
    .values({ kind, address, position, order_id: orderId })
    .execute();
}

export async function countOrderIndex(
  kind: OrderIndexKind,
  address: string,
  executor: Executor = db
): Promise<number> {
  const result = await executor
    .selectFrom("order_index")
    .where("kind", "=", kind)
    .where("address", "=", address)
    .select(sql<string>`count(*)`.as("count"))
    .executeTakeFirst();
  return Number(result?.count ?? 0);
}

export async function listOrderIndex(
  kind: OrderIndexKind,
  address: string,
  offset: number,
  limit: number,
  executor: Executor = db
): Promise<number[]> {
  if (limit <= 0) return [];
  const rows = await executor
    .selectFrom("order_index")
    .where("kind", "=", kind)
    .where("address", "=", address)
    .where("position", ">=", offset)
    .select("order_id")
    .orderBy("position", "asc")
    .limit(limit)
    .execute();
  return rows.map((r) => r.order_id);
}
