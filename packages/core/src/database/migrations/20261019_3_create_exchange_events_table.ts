import { Kysely, sql } from "kysely";

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable("exchange_events")
    .ifNotExists()
    .addColumn("id", "serial", (col) => col.primaryKey())
    .addColumn("type", "varchar(32)", (col) => col.notNull())
    .addColumn("payload", "text", (col) => col.notNull())
    .addColumn("event_hash", "varchar(66)", (col) => col.notNull())
    .addColumn("created_at", "timestamptz", (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .execute();

  await db.schema
    .createIndex("exchange_events_type_idx")
    .ifNotExists()
    .on("exchange_events")
    .column("type")
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable("exchange_events").execute();
}
