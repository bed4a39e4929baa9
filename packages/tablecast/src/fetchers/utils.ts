import { Effect, Schema as S } from "effect";
import { IntrospectionFailed, NoDatabaseSelected } from "../errors.js";
import type { SqlClient, SqlParam } from "../services/sql-client.js";

/**
 * Run a catalog query and decode every row with `row`.
 * Rows that don't match are reported as IntrospectionFailed.
 */
export const queryRows = <A, I>(
  client: SqlClient,
  row: S.Schema<A, I>,
  sql: string,
  params: readonly SqlParam[] = [],
): Effect.Effect<readonly A[], IntrospectionFailed> =>
  client.query(sql, params).pipe(
    Effect.flatMap(rows =>
      S.decodeUnknown(S.Array(row))(rows).pipe(
        Effect.mapError(
          error =>
            new IntrospectionFailed({
              message: `Unexpected catalog rows: ${error.message}`,
              query: sql,
              cause: error,
            }),
        ),
      ),
    ),
  );

/**
 * Fail with NoDatabaseSelected when the connection names no database.
 */
export const requireDatabaseName =
  (driver: string) =>
  (name: string | null | undefined): Effect.Effect<string, NoDatabaseSelected> =>
    name
      ? Effect.succeed(name)
      : Effect.fail(
          new NoDatabaseSelected({
            message: "no database selected",
            driver,
          }),
        );

/** `name` → `"name"`, doubling embedded quotes */
export const quoteWithDoubleQuotes = (identifier: string): string => `"${identifier.replace(/"/g, '""')}"`;

/** `name` → `` `name` ``, doubling embedded backticks */
export const quoteWithBackticks = (identifier: string): string => `\`${identifier.replace(/`/g, "``")}\``;
