import { Kysely, sql } from "kysely";

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable("lobbies")
    .ifNotExists()
    .addColumn("id", "integer", (col) => col.primaryKey())
    .addColumn("creator", "varchar(42)", (col) => col.notNull())
    .addColumn("joiner", "varchar(42)")
    .addColumn("is_canceled", "boolean", (col) => col.notNull().defaultTo(false))
    .addColumn("start_time", "bigint", (col) => col.notNull())
    .addColumn("bet_amount", "numeric(78, 0)", (col) => col.notNull())
    .addColumn("creator_mead_in_land", "numeric(78, 0)", (col) =>
      col.notNull().defaultTo(0)
    )
    .addColumn("joiner_mead_in_land", "numeric(78, 0)", (col) =>
      col.notNull().defaultTo(0)
    )
    .addColumn("created_at", "timestamptz", (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addColumn("updated_at", "timestamptz", (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .execute();

  await db.schema
    .createTable("brewery_statuses")
    .ifNotExists()
    .addColumn("lobby_id", "integer", (col) =>
      col.notNull().references("lobbies.id")
    )
    .addColumn("address", "varchar(42)", (col) => col.notNull())
    .addColumn("mead", "numeric(78, 0)", (col) => col.notNull().defaultTo(0))
    .addColumn("points", "numeric(78, 0)", (col) => col.notNull().defaultTo(0))
    .addColumn("is_valve_opened", "boolean", (col) =>
      col.notNull().defaultTo(false)
    )
    .addColumn("last_updated_at", "bigint", (col) => col.notNull())
    .addColumn("mead_per_second", "numeric(78, 0)", (col) =>
      col.notNull().defaultTo(0)
    )
    .addPrimaryKeyConstraint("brewery_statuses_pkey", ["lobby_id", "address"])
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable("brewery_statuses").execute();
  await db.schema.dropTable("lobbies").execute();
}
