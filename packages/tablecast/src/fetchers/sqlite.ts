import path from "node:path";
import { Effect, Schema as S } from "effect";
import type { SqlClient } from "../services/sql-client.js";
import { parseColumnType } from "./column-type.js";
import type { ColumnDescriptor, SchemaFetcher } from "./types.js";
import { queryRows, quoteWithDoubleQuotes, requireDatabaseName } from "./utils.js";

const DatabaseFileRow = S.Struct({ file: S.NullOr(S.String) });

const TableRow = S.Struct({ name: S.String });

const TableInfoRow = S.Struct({
  name: S.String,
  type: S.String,
  not_null: S.Number,
  pk: S.Number,
});
type TableInfoRow = S.Schema.Type<typeof TableInfoRow>;

export const SQLITE_DATABASE_QUERY = "SELECT file FROM pragma_database_list WHERE name = 'main'";

export const SQLITE_TABLES_QUERY = `
  SELECT name FROM sqlite_master
  WHERE type = 'table' AND name NOT LIKE 'sqlite_%'
  ORDER BY name`;

export const SQLITE_COLUMNS_QUERY = `
  SELECT name, type, "notnull" AS not_null, pk
  FROM pragma_table_info(?)
  ORDER BY cid`;

/**
 * The database of a SQLite connection is named after its file.
 * In-memory and temporary databases have no file and so no name.
 */
export const databaseNameFromFile = (file: string | null | undefined): string =>
  file ? path.basename(file, path.extname(file)) : "";

const toDescriptor = (row: TableInfoRow): ColumnDescriptor => {
  const declared = parseColumnType(row.type);
  return {
    name: row.name,
    rawType: declared.rawType,
    size: declared.size,
    unsigned: declared.unsigned,
    // primary key columns are treated as NOT NULL even when not declared so
    nullable: row.not_null === 0 && row.pk === 0,
    comment: "",
  };
};

/** SQLite schema fetcher. */
export const newSQLite3SchemaFetcher = (client: SqlClient): SchemaFetcher => ({
  getDatabaseName: queryRows(client, DatabaseFileRow, SQLITE_DATABASE_QUERY).pipe(
    Effect.flatMap(rows => requireDatabaseName("sqlite3")(databaseNameFromFile(rows[0]?.file))),
  ),

  getTableNames: queryRows(client, TableRow, SQLITE_TABLES_QUERY).pipe(Effect.map(rows => rows.map(row => row.name))),

  getFieldDescriptors: tableName =>
    queryRows(client, TableInfoRow, SQLITE_COLUMNS_QUERY, [tableName]).pipe(Effect.map(rows => rows.map(toDescriptor))),

  quoteIdentifier: quoteWithDoubleQuotes,
});
