import { Kysely, sql } from "kysely";

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable("orders")
    .ifNotExists()
    .addColumn("id", "integer", (col) => col.primaryKey())
    .addColumn("status", "varchar(16)", (col) => col.notNull())
    .addColumn("asset_id", "varchar(78)", (col) => col.notNull())
    .addColumn("seller", "varchar(42)", (col) => col.notNull())
    .addColumn("buyer", "varchar(42)")
    .addColumn("price", "numeric(78, 0)", (col) => col.notNull())
    .addColumn("created_at", "timestamptz", (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addColumn("updated_at", "timestamptz", (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .execute();

  await db.schema
    .createTable("order_index")
    .ifNotExists()
    .addColumn("kind", "varchar(8)", (col) => col.notNull())
    .addColumn("address", "varchar(42)", (col) => col.notNull())
    .addColumn("position", "integer", (col) => col.notNull())
    .addColumn("order_id", "integer", (col) =>
      col.notNull().references("orders.id")
    )
    .addPrimaryKeyConstraint("order_index_pkey", ["kind", "address", "position"])
    .execute();

  await db.schema
    .createTable("counters")
    .ifNotExists()
    .addColumn("name", "varchar(32)", (col) => col.primaryKey())
    .addColumn("value", "bigint", (col) => col.notNull())
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable("order_index").execute();
  await db.schema.dropTable("orders").execute();
  await db.schema.dropTable("counters").execute();
}
