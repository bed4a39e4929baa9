import { Effect, Schema as S } from "effect";
import type { SqlClient } from "../services/sql-client.js";
import { parseColumnType } from "./column-type.js";
import type { ColumnDescriptor, SchemaFetcher } from "./types.js";
import { queryRows, quoteWithBackticks, requireDatabaseName } from "./utils.js";

const DatabaseRow = S.Struct({ name: S.NullOr(S.String) });

const TableRow = S.Struct({ table_name: S.String });

/** Row shape for MySQL column information. */
const ColumnRow = S.Struct({
  column_name: S.String,
  data_type: S.String,
  column_type: S.String,
  is_nullable: S.String,
  column_comment: S.NullOr(S.String),
});
type ColumnRow = S.Schema.Type<typeof ColumnRow>;

export const MYSQL_DATABASE_QUERY = "SELECT DATABASE() AS name";

export const MYSQL_TABLES_QUERY = `
  SELECT table_name AS table_name
  FROM information_schema.tables
  WHERE table_schema = DATABASE() AND table_type = 'BASE TABLE'
  ORDER BY table_name`;

export const MYSQL_COLUMNS_QUERY = `
  SELECT
    column_name AS column_name,
    data_type AS data_type,
    column_type AS column_type,
    is_nullable AS is_nullable,
    column_comment AS column_comment
  FROM information_schema.columns
  WHERE table_schema = DATABASE() AND table_name = ?
  ORDER BY ordinal_position`;

const toDescriptor = (row: ColumnRow): ColumnDescriptor => {
  const declared = parseColumnType(row.column_type);
  return {
    name: row.column_name,
    rawType: row.data_type.toLowerCase(),
    size: declared.size,
    unsigned: declared.unsigned,
    nullable: row.is_nullable.toUpperCase() === "YES",
    comment: row.column_comment ?? "",
  };
};

/** MySQL schema fetcher. */
export const newMySQLSchemaFetcher = (client: SqlClient): SchemaFetcher => ({
  getDatabaseName: queryRows(client, DatabaseRow, MYSQL_DATABASE_QUERY).pipe(
    Effect.flatMap(rows => requireDatabaseName("mysql")(rows[0]?.name)),
  ),

  getTableNames: queryRows(client, TableRow, MYSQL_TABLES_QUERY).pipe(
    Effect.map(rows => rows.map(row => row.table_name)),
  ),

  getFieldDescriptors: tableName =>
    queryRows(client, ColumnRow, MYSQL_COLUMNS_QUERY, [tableName]).pipe(Effect.map(rows => rows.map(toDescriptor))),

  quoteIdentifier: quoteWithBackticks,
});
