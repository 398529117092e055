import { sql } from "kysely";
import { db, Executor } from "../database";

/**
 * Return the current value of counter `name` and advance it by one.
 * A counter that does not exist yet starts at `initial`.
 */
export async function takeNextId(
  name: string,
  initial: number,
  executor: Executor = db
): Promise<number> {
  const row = await executor
    .insertInto("counters")
    .values({ name, value: initial + 1 })
    .onConflict((oc) =>
      oc.column("name").doUpdateSet({
        value: sql<string>`counters.value + 1`,
      })
    )
    .returning("value")
    .executeTakeFirstOrThrow();
  return Number(row.value) - 1;
}
