import { sql } from "kysely";
import { db, Executor } from "../database";
import { BreweryStatusRow, LobbyRow } from "../types";
import { BreweryStatus, Lobby } from "../../types/lobby";

export function rowToLobby(row: LobbyRow): Lobby {
  return {
    id: row.id,
    creator: row.creator,
    joiner: row.joiner,
    isCanceled: row.is_canceled,
    startTime: Number(row.start_time),
    betAmount: BigInt(row.bet_amount),
    creatorMeadInLand: BigInt(row.creator_mead_in_land),
    joinerMeadInLand: BigInt(row.joiner_mead_in_land),
  };
}

export async function findLobbyById(
  id: number,
  options: { forUpdate?: boolean } = {},
  executor: Executor = db
): Promise<Lobby | undefined> {
  let query = executor.selectFrom("lobbies").where("id", "=", id).selectAll();
  if (options.forUpdate) {
    query = query.forUpdate();
  }
  const row = await query.executeTakeFirst();
  return row ? rowToLobby(row) : undefined;
}

export async function insertLobby(
  lobby: Lobby,
  executor: Executor = db
): Promise<void> {
  await executor
    .insertInto("lobbies")
    .values({
      id: lobby.id,
      creator: lobby.creator,
      joiner: lobby.joiner,
      is_canceled: lobby.isCanceled,
      start_time: lobby.startTime,
      bet_amount: lobby.betAmount.toString(),
      creator_mead_in_land: lobby.creatorMeadInLand.toString(),
      joiner_mead_in_land: lobby.joinerMeadInLand.toString(),
    })
    .execute();
}

export async function updateLobby(
  lobby: Lobby,
  executor: Executor = db
): Promise<void> {
  await executor
    .updateTable("lobbies")
    .set({
      joiner: lobby.joiner,
      is_canceled: lobby.isCanceled,
      start_time: lobby.startTime,
      creator_mead_in_land: lobby.creatorMeadInLand.toString(),
      joiner_mead_in_land: lobby.joinerMeadInLand.toString(),
      updated_at: sql<Date>`now()`,
    })
    .where("id", "=", lobby.id)
    .execute();
}

// ---- brewery statuses ----

export function rowToBreweryStatus(row: BreweryStatusRow): BreweryStatus {
  return {
    lobbyId: row.lobby_id,
    address: row.address,
    mead: BigInt(row.mead),
    points: BigInt(row.points),
    isValveOpened: row.is_valve_opened,
    lastUpdatedAt: Number(row.last_updated_at),
    meadPerSecond: BigInt(row.mead_per_second),
  };
}

export async function findBreweryStatus(
  lobbyId: number,
  address: string,
  executor: Executor = db
): Promise<BreweryStatus | undefined> {
  const row = await executor
    .selectFrom("brewery_statuses")
    .where("lobby_id", "=", lobbyId)
    .where("address", "=", address)
    .selectAll()
    .executeTakeFirst();
  return row ? rowToBreweryStatus(row) : undefined;
}

export async function saveBreweryStatus(
  status: BreweryStatus,
  executor: Executor = db
): Promise<void> {
  const values = {
    mead: status.mead.toString(),
    points: status.points.toString(),
    is_valve_opened: status.isValveOpened,
    last_updated_at: status.lastUpdatedAt,
    mead_per_second: status.meadPerSecond.toString(),
  };
  await executor
    .insertInto("brewery_statuses")
    .values({ lobby_id: status.lobbyId, address: status.address, ...values })
    .onConflict((oc) => oc.columns(["lobby_id", "address"]).doUpdateSet(values))
    .execute();
}
