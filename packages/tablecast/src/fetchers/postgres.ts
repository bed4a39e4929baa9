import { Effect, Schema as S } from "effect";
import { NoDatabaseSelected } from "../errors.js";
import type { SqlClient } from "../services/sql-client.js";
import type { ColumnDescriptor, SchemaFetcher } from "./types.js";
import { queryRows, quoteWithDoubleQuotes, requireDatabaseName } from "./utils.js";

const DatabaseRow = S.Struct({ name: S.NullOr(S.String), schema: S.NullOr(S.String) });

const TableRow = S.Struct({ table_name: S.String });

const ColumnRow = S.Struct({
  column_name: S.String,
  data_type: S.String,
  is_nullable: S.String,
  size: S.NullOr(S.Number),
  column_comment: S.NullOr(S.String),
});
type ColumnRow = S.Schema.Type<typeof ColumnRow>;

// current_schema() is NULL when no schema on the search_path exists; tables are read from it.
export const POSTGRES_DATABASE_QUERY = "SELECT current_database() AS name, current_schema() AS schema";

export const POSTGRES_TABLES_QUERY = `
  SELECT table_name::text AS table_name
  FROM information_schema.tables
  WHERE table_schema = current_schema() AND table_type = 'BASE TABLE'
  ORDER BY table_name`;

// Enums report as USER-DEFINED; extension types (e.g. PostGIS geometry) by their udt name.
export const POSTGRES_COLUMNS_QUERY = `
  SELECT
    c.column_name::text AS column_name,
    CASE
      WHEN c.data_type = 'USER-DEFINED' AND t.typtype = 'e' THEN 'enum'
      WHEN c.data_type = 'USER-DEFINED' THEN c.udt_name::text
      ELSE c.data_type::text
    END AS data_type,
    c.is_nullable::text AS is_nullable,
    COALESCE(c.character_maximum_length, c.numeric_precision)::int AS size,
    col_description(format('%I.%I', c.table_schema, c.table_name)::regclass::oid, c.ordinal_position::int) AS column_comment
  FROM information_schema.columns c
  LEFT JOIN pg_catalog.pg_namespace n ON n.nspname = c.udt_schema
  LEFT JOIN pg_catalog.pg_type t ON t.typname = c.udt_name AND t.typnamespace = n.oid
  WHERE c.table_schema = current_schema() AND c.table_name = $1
  ORDER BY c.ordinal_position`;

const toDescriptor = (row: ColumnRow): ColumnDescriptor => ({
  name: row.column_name,
  rawType: row.data_type.toLowerCase(),
  size: row.size ?? 0,
  unsigned: false,
  nullable: row.is_nullable.toUpperCase() === "YES",
  comment: row.column_comment ?? "",
});

/** PostgreSQL schema fetcher, reading the connection's current schema. */
export const newPostgresSchemaFetcher = (client: SqlClient): SchemaFetcher => ({
  getDatabaseName: queryRows(client, DatabaseRow, POSTGRES_DATABASE_QUERY).pipe(
    Effect.flatMap(([row]) =>
      row?.schema
        ? requireDatabaseName("postgres")(row.name)
        : Effect.fail(
            new NoDatabaseSelected({
              message: "no schema selected: no schema on the search_path exists",
              driver: "postgres",
            }),
          ),
    ),
  ),

  getTableNames: queryRows(client, TableRow, POSTGRES_TABLES_QUERY).pipe(
    Effect.map(rows => rows.map(row => row.table_name)),
  ),

  getFieldDescriptors: tableName =>
    queryRows(client, ColumnRow, POSTGRES_COLUMNS_QUERY, [tableName]).pipe(Effect.map(rows => rows.map(toDescriptor))),

  quoteIdentifier: quoteWithDoubleQuotes,
});
