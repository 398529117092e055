import { Kysely, sql } from "kysely";

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable("balances")
    .ifNotExists()
    .addColumn("address", "varchar(42)", (col) => col.primaryKey())
    .addColumn("amount", "numeric(78, 0)", (col) =>
      col.notNull().defaultTo(0).check(sql`amount >= 0`)
    )
    .execute();

  await db.schema
    .createTable("assets")
    .ifNotExists()
    .addColumn("asset_id", "varchar(78)", (col) => col.primaryKey())
    .addColumn("owner", "varchar(42)", (col) => col.notNull())
    .addColumn("updated_at", "timestamptz", (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable("assets").execute();
  await db.schema.dropTable("balances").execute();
}
