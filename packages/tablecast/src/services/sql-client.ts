/**
 * SQL Client Service
 *
 * The driver collaborator: opens one connection per run for a driver name
 * and runs catalog queries on it. Rows come back untyped; fetchers decode
 * them with Schema.
 */
import { Context, Effect, Layer, type Scope } from "effect";
import Database from "better-sqlite3";
import mysql from "mysql2/promise";
import pg from "pg";
import { ConnectionFailed, IntrospectionFailed, maskDataSourceName } from "../errors.js";

export type SqlParam = string | number | null;

/**
 * An opened connection. Queries run one at a time.
 */
export interface SqlClient {
  readonly driver: string;
  readonly query: (sql: string, params?: readonly SqlParam[]) => Effect.Effect<readonly unknown[], IntrospectionFailed>;
}

/**
 * Opens connections. The connection lives as long as the surrounding scope.
 */
export interface SqlConnector {
  readonly open: (
    driver: string,
    dataSourceName: string,
  ) => Effect.Effect<SqlClient, ConnectionFailed, Scope.Scope>;
}

/**
 * Service tag for dependency injection
 */
export class SqlConnectorService extends Context.Tag("SqlConnector")<SqlConnectorService, SqlConnector>() {}

const connectionFailed = (driver: string, dataSourceName: string) => (cause: unknown) =>
  new ConnectionFailed({
    message: `Failed to connect to ${driver} database: ${cause instanceof Error ? cause.message : String(cause)}`,
    driver,
    dataSourceName: maskDataSourceName(dataSourceName),
    cause,
  });

const queryFailed = (sql: string) => (cause: unknown) =>
  new IntrospectionFailed({
    message: `Catalog query failed: ${cause instanceof Error ? cause.message : String(cause)}`,
    query: sql,
    cause,
  });

/**
 * Release errors are reported but don't fail the run: the generated output
 * is already complete when connections are closed.
 */
const logCloseFailure = (driver: string) => (cause: unknown) =>
  Effect.logWarning(`Failed to close ${driver} connection: ${cause instanceof Error ? cause.message : String(cause)}`);

// ============================================================================
// Drivers
// ============================================================================

const openPostgres = (dataSourceName: string): Effect.Effect<SqlClient, ConnectionFailed, Scope.Scope> =>
  Effect.acquireRelease(
    Effect.tryPromise({
      try: async () => {
        const client = new pg.Client({ connectionString: dataSourceName });
        await client.connect();
        return client;
      },
      catch: connectionFailed("postgres", dataSourceName),
    }),
    client => Effect.tryPromise(() => client.end()).pipe(Effect.catchAll(logCloseFailure("postgres"))),
  ).pipe(
    Effect.map(
      (client): SqlClient => ({
        driver: "postgres",
        query: (sql, params = []) =>
          Effect.tryPromise({
            try: () => client.query(sql, [...params]),
            catch: queryFailed(sql),
          }).pipe(Effect.map(result => result.rows)),
      }),
    ),
  );

const openMysql = (dataSourceName: string): Effect.Effect<SqlClient, ConnectionFailed, Scope.Scope> =>
  Effect.acquireRelease(
    Effect.tryPromise({
      try: () => mysql.createConnection(dataSourceName),
      catch: connectionFailed("mysql", dataSourceName),
    }),
    connection => Effect.tryPromise(() => connection.end()).pipe(Effect.catchAll(logCloseFailure("mysql"))),
  ).pipe(
    Effect.map(
      (connection): SqlClient => ({
        driver: "mysql",
        query: (sql, params = []) =>
          Effect.tryPromise({
            try: async () => {
              const [rows] = await connection.execute(sql, [...params]);
              return Array.isArray(rows) ? rows : [];
            },
            catch: queryFailed(sql),
          }),
      }),
    ),
  );

const openSqlite = (dataSourceName: string): Effect.Effect<SqlClient, ConnectionFailed, Scope.Scope> =>
  Effect.acquireRelease(
    Effect.try({
      try: () => new Database(dataSourceName, { readonly: true, fileMustExist: true }),
      catch: connectionFailed("sqlite3", dataSourceName),
    }),
    db => Effect.sync(() => db.close()),
  ).pipe(
    Effect.map(
      (db): SqlClient => ({
        driver: "sqlite3",
        query: (sql, params = []) =>
          Effect.try({
            try: () => db.prepare(sql).all(...params),
            catch: queryFailed(sql),
          }),
      }),
    ),
  );

const openers: Record<string, (dataSourceName: string) => Effect.Effect<SqlClient, ConnectionFailed, Scope.Scope>> = {
  postgres: openPostgres,
  mysql: openMysql,
  sqlite3: openSqlite,
};

/**
 * Create a SqlConnector backed by pg, mysql2 and better-sqlite3
 */
export function createSqlConnector(): SqlConnector {
  return {
    open: (driver, dataSourceName) => {
      const opener = openers[driver];
      return opener
        ? opener(dataSourceName)
        : Effect.fail(connectionFailed(driver, dataSourceName)(new Error(`no driver registered for ${driver}`)));
    },
  };
}

/**
 * Live layer using the real drivers
 */
export const SqlConnectorLive = Layer.succeed(SqlConnectorService, createSqlConnector());
