/**
 * tablecast - typed table accessors generated from a database schema
 *
 * Main entry point
 */

// Config
export {
  Config,
  DEFAULT_RUNTIME_MODULE,
  SUPPORTED_DRIVERS,
  splitList,
  type ConfigInput,
  type DriverName,
  type ResolvedConfig,
} from "./config.js";

// Config Loader Service
export {
  type ConfigLoader,
  type LoadOptions,
  CONFIG_FILE_NAMES,
  ConfigLoaderService,
  ConfigLoaderLive,
  createConfigLoader,
  defineConfig,
  resolveConfig,
} from "./services/config-loader.js";

// Errors
export * from "./errors.js";

// Database access
export {
  type SqlClient,
  type SqlConnector,
  type SqlParam,
  SqlConnectorService,
  SqlConnectorLive,
  createSqlConnector,
} from "./services/sql-client.js";

// Schema fetchers
export type { ColumnDescriptor, SchemaFetcher, SchemaFetcherFactory } from "./fetchers/types.js";
export { getSchemaFetcherFactory, isSupportedDriver } from "./fetchers/registry.js";
export { newMySQLSchemaFetcher } from "./fetchers/mysql.js";
export { newPostgresSchemaFetcher } from "./fetchers/postgres.js";
export { newSQLite3SchemaFetcher } from "./fetchers/sqlite.js";
export { parseColumnType, type ParsedColumnType } from "./fetchers/column-type.js";

// Type mapping and naming
export {
  type FieldCategory,
  type MappedType,
  type ScalarBase,
  type ScalarType,
  mapType,
  renderScalarType,
  resolveType,
} from "./services/type-mapper.js";
export { toExportedIdentifier, toModuleIdentifier, toWrapperTypeName } from "./services/identifiers.js";

// Emitters
export { type EmittedUnit, type UnitOptions, GENERATOR_VERSION } from "./emit/unit.js";
export { BASE_MODULE_PATH, emitBase } from "./emit/base.js";
export { emitTable, renderTable, tableModulePath, tableNames, type FieldPlan, type TableNames } from "./emit/table.js";

// File Writer
export {
  type ConfirmOverwrite,
  type FileWriter,
  type WriteOptions,
  type WriteResult,
  createFileWriter,
} from "./services/file-writer.js";

// Generate
export {
  generate,
  generateWithConfig,
  runGenerate,
  selectSchemaFetcher,
  GenerateLive,
  type GenerateError,
  type GenerateOptions,
  type GenerateResult,
  type GenerationError,
} from "./generate.js";
