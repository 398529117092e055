import { sql } from "kysely";
import { db, Executor } from "../database";

// ---- balances ----

export async function getBalance(
  address: string,
  executor: Executor = db
): Promise<bigint> {
  const row = await executor
    .selectFrom("balances")
    .where("address", "=", address)
    .select("amount")
    .executeTakeFirst();
  return row ? BigInt(row.amount) : 0n;
}

export async function creditBalance(
  address: string,
  amount: bigint,
  executor: Executor = db
): Promise<void> {
  await executor
    .insertInto("balances")
    .values({ address, amount: amount.toString() })
    .onConflict((oc) =>
      oc.column("address").doUpdateSet({
        amount: sql<string>`balances.amount + ${amount.toString()}::numeric`,
      })
    )
    .execute();
}

/**
 * Subtract `amount` from `address`. Returns false, changing nothing, when the
 * balance cannot cover it.
 */
export async function debitBalance(
  address: string,
  amount: bigint,
  executor: Executor = db
): Promise<boolean> {
  const result = await executor
    .updateTable("balances")
    .set({ amount: sql<string>`amount - ${amount.toString()}::numeric` })
    .where("address", "=", address)
    .where(sql<boolean>`amount >= ${amount.toString()}::numeric`)
    .executeTakeFirst();
  return Number(result.numUpdatedRows) === 1;
}

// ---- assets ----

export async function findAssetOwner(
  assetId: string,
  executor: Executor = db
): Promise<string | undefined> {
  const row = await executor
    .selectFrom("assets")
    .where("asset_id", "=", assetId)
    .select("owner")
    .executeTakeFirst();
  return row?.owner;
}

export async function insertAsset(
  assetId: string,
  owner: string,
  executor: Executor = db
): Promise<void> {
  await executor
    .insertInto("assets")
    .values({ asset_id: assetId, owner })
    .execute();
}

/**
 * Move `assetId` from `from` to `to`. Returns false, changing nothing, when
 * `from` is not the current owner.
 */
export async function moveAsset(
  assetId: string,
  from: string,
  to: string,
  executor: Executor = db
): Promise<boolean> {
  const result = await executor
    .updateTable("assets")
    .set({ owner: to, updated_at: sql<Date>`now()` })
    .where("asset_id", "=", assetId)
    .where("owner", "=", from)
    .executeTakeFirst();
  return Number(result.numUpdatedRows) === 1;
}
