import type { Effect } from "effect";
import type { ConnectionError, NoDatabaseSelected } from "../errors.js";
import type { SqlClient } from "../services/sql-client.js";

/**
 * Engine-independent description of one table column.
 * Fetchers return them in the table's column order.
 */
export interface ColumnDescriptor {
  readonly name: string;
  /** Type name without size or modifiers, e.g. `varchar`, `bigint` */
  readonly rawType: string;
  /** Declared length / precision, 0 when the type has none */
  readonly size: number;
  readonly unsigned: boolean;
  readonly nullable: boolean;
  readonly comment: string;
}

/**
 * Strategy interface implemented per database engine to read the catalog.
 */
export interface SchemaFetcher {
  readonly getDatabaseName: Effect.Effect<string, ConnectionError | NoDatabaseSelected>;
  readonly getTableNames: Effect.Effect<readonly string[], ConnectionError>;
  readonly getFieldDescriptors: (tableName: string) => Effect.Effect<readonly ColumnDescriptor[], ConnectionError>;
  /** Quote an identifier so it is safe in this engine's SQL, reserved words included */
  readonly quoteIdentifier: (identifier: string) => string;
}

export type SchemaFetcherFactory = (client: SqlClient) => SchemaFetcher;
