import { db, Executor } from "../database";
import { ExchangeEvent } from "../../types/events";
import { canonicalEncode } from "../../libs/Encoding";
import { hashState } from "../../libs/Crypto";

export async function appendExchangeEvents(
  events: readonly ExchangeEvent[],
  executor: Executor = db
): Promise<void> {
  if (events.length === 0) return;
  await executor
    .insertInto("exchange_events")
    .values(
      events.map((event) => ({
        type: event.type,
        payload: canonicalEncode(event),
        event_hash: hashState(event),
      }))
    )
    .execute();
}
