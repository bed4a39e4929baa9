/**
 * Testing Utilities
 *
 * In-process stand-ins for the database collaborators, so fetchers and the
 * generation pipeline can be exercised without a server.
 *
 * ```typescript
 * import { fakeSqlClient, SqlConnectorTest } from "tablecast/testing"
 *
 * const client = fakeSqlClient("mysql", [
 *   { match: "SELECT DATABASE()", rows: [{ name: "shop" }] },
 * ])
 * const layer = SqlConnectorTest(() => Effect.succeed(client))
 * ```
 */
import { Effect, Layer, type Scope } from "effect";
import { IntrospectionFailed, type ConnectionFailed } from "./errors.js";
import type { ColumnDescriptor, SchemaFetcher } from "./fetchers/types.js";
import { quoteWithDoubleQuotes } from "./fetchers/utils.js";
import { SqlConnectorService, type SqlClient, type SqlParam } from "./services/sql-client.js";

// =============================================================================
// SQL Client
// =============================================================================

/**
 * Canned result for queries containing `match` (or matching it, for a RegExp)
 */
export interface CannedQuery {
  readonly match: string | RegExp;
  readonly rows: readonly unknown[] | ((params: readonly SqlParam[]) => readonly unknown[]);
}

export interface RecordedQuery {
  readonly sql: string;
  readonly params: readonly SqlParam[];
}

export interface FakeSqlClient extends SqlClient {
  /** Every query run so far, in order */
  readonly calls: readonly RecordedQuery[];
}

const matches = (sql: string, match: string | RegExp): boolean =>
  typeof match === "string" ? sql.includes(match) : match.test(sql);

/**
 * A SqlClient answering from canned rows. The first matching entry wins;
 * a query nothing matches fails with IntrospectionFailed.
 */
export function fakeSqlClient(driver: string, queries: readonly CannedQuery[]): FakeSqlClient {
  const calls: RecordedQuery[] = [];
  return {
    driver,
    calls,
    query: (sql, params = []) =>
      Effect.suspend((): Effect.Effect<readonly unknown[], IntrospectionFailed> => {
        calls.push({ sql, params });
        const canned = queries.find(q => matches(sql, q.match));
        if (!canned) {
          return Effect.fail(
            new IntrospectionFailed({ message: "no canned rows for query", query: sql, cause: undefined }),
          );
        }
        return Effect.succeed(typeof canned.rows === "function" ? canned.rows(params) : canned.rows);
      }),
  };
}

// =============================================================================
// SQL Connector
// =============================================================================

/**
 * SqlConnector layer that opens connections through `open`
 */
export const SqlConnectorTest = (
  open: (driver: string, dataSourceName: string) => Effect.Effect<SqlClient, ConnectionFailed, Scope.Scope>,
) => Layer.succeed(SqlConnectorService, { open });

// =============================================================================
// Schema Fetcher
// =============================================================================

/**
 * Column descriptor with sensible defaults: non-null, signed, no size, no comment
 */
export const column = (name: string, rawType: string, overrides: Partial<ColumnDescriptor> = {}): ColumnDescriptor => ({
  name,
  rawType,
  size: 0,
  unsigned: false,
  nullable: false,
  comment: "",
  ...overrides,
});

/**
 * SchemaFetcher over a fixed schema. Tables are listed in insertion order.
 */
export function staticSchemaFetcher(
  databaseName: string,
  tables: ReadonlyMap<string, readonly ColumnDescriptor[]>,
): SchemaFetcher {
  return {
    getDatabaseName: Effect.succeed(databaseName),
    getTableNames: Effect.sync(() => [...tables.keys()]),
    getFieldDescriptors: tableName => {
      const columns = tables.get(tableName);
      return columns
        ? Effect.succeed(columns)
        : Effect.fail(
            new IntrospectionFailed({
              message: `no such table: ${tableName}`,
              query: `columns of ${tableName}`,
              cause: undefined,
            }),
          );
    },
    quoteIdentifier: quoteWithDoubleQuotes,
  };
}
