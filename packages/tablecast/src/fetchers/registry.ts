import { Option } from "effect";
import { SUPPORTED_DRIVERS, type DriverName } from "../config.js";
import { newMySQLSchemaFetcher } from "./mysql.js";
import { newPostgresSchemaFetcher } from "./postgres.js";
import { newSQLite3SchemaFetcher } from "./sqlite.js";
import type { SchemaFetcherFactory } from "./types.js";

/** Driver name → schema fetcher constructor */
const registry: Record<DriverName, SchemaFetcherFactory> = {
  mysql: newMySQLSchemaFetcher,
  sqlite3: newSQLite3SchemaFetcher,
  postgres: newPostgresSchemaFetcher,
};

export const isSupportedDriver = (driver: string): driver is DriverName =>
  SUPPORTED_DRIVERS.some(supported => supported === driver);

/**
 * Gets the schema fetcher factory for a driver.
 * @returns None when no fetcher exists for the driver.
 */
export const getSchemaFetcherFactory = (driver: string): Option.Option<SchemaFetcherFactory> =>
  isSupportedDriver(driver) ? Option.some(registry[driver]) : Option.none();
