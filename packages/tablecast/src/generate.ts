/**
 * Generate Orchestration Function
 *
 * Threads together the code generation pipeline:
 * 1. Load config
 * 2. Select the schema fetcher for the driver
 * 3. Connect (one connection for the whole run)
 * 4. Discover the database name and the tables
 * 5. Emit and write the base module, then one module per table
 *
 * Everything runs sequentially; the first error stops the run. Modules
 * written before the failure stay on disk, and rerunning regenerates them.
 *
 * Logging:
 * - Effect.log (INFO) - Progress messages shown by default
 * - Effect.logDebug (DEBUG) - Detailed info (table names, file paths)
 *
 * Configure via Logger.withMinimumLogLevel at the call site.
 */
import { Effect, Layer, Option } from "effect";
import type { FileSystem, Path } from "@effect/platform";
import { SUPPORTED_DRIVERS, type ResolvedConfig } from "./config.js";
import { emitBase } from "./emit/base.js";
import { emitTable } from "./emit/table.js";
import type { UnitOptions } from "./emit/unit.js";
import {
  UnsupportedDriver,
  type ConfigInvalid,
  type ConfigNotFound,
  type ConnectionFailed,
  type IntrospectionFailed,
  type NoDatabaseSelected,
  type UnknownFieldType,
  type WriteError,
} from "./errors.js";
import { getSchemaFetcherFactory } from "./fetchers/registry.js";
import type { SchemaFetcherFactory } from "./fetchers/types.js";
import { ConfigLoaderLive, ConfigLoaderService, type LoadOptions } from "./services/config-loader.js";
import { createFileWriter, type ConfirmOverwrite, type WriteResult } from "./services/file-writer.js";
import { SqlConnectorLive, SqlConnectorService } from "./services/sql-client.js";

/**
 * Options that are not part of the configuration
 */
export interface GenerateOptions {
  /** Asked before replacing an existing file when the config is interactive */
  readonly confirmOverwrite?: ConfirmOverwrite;
}

/**
 * Result of a generate operation
 */
export interface GenerateResult {
  readonly config: ResolvedConfig;
  readonly databaseName: string;
  /** Tables generated, in order */
  readonly tableNames: readonly string[];
  /** Base module first, then one result per table */
  readonly writeResults: readonly WriteResult[];
}

/**
 * All possible errors from the generation run
 */
export type GenerationError =
  | ConnectionFailed
  | IntrospectionFailed
  | NoDatabaseSelected
  | UnknownFieldType
  | WriteError;

export type GenerateError = ConfigNotFound | ConfigInvalid | GenerationError;

/**
 * Pick the schema fetcher for the driver.
 * An unsupported driver is a defect: no run can succeed with it.
 */
export const selectSchemaFetcher = (driver: string): Effect.Effect<SchemaFetcherFactory> =>
  Option.match(getSchemaFetcherFactory(driver), {
    onNone: () =>
      Effect.die(
        new UnsupportedDriver({
          message: `unsupported driver ${driver}`,
          driver,
          supported: SUPPORTED_DRIVERS,
        }),
      ),
    onSome: factory => Effect.succeed(factory),
  });

/**
 * Run generation for an already-resolved configuration.
 */
export const generateWithConfig = (
  config: ResolvedConfig,
  options: GenerateOptions = {},
): Effect.Effect<GenerateResult, GenerationError, SqlConnectorService | FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const newSchemaFetcher = yield* selectSchemaFetcher(config.driver);

    yield* Effect.log(`Connecting to ${config.driver} database...`);
    const connector = yield* SqlConnectorService;
    const client = yield* connector.open(config.driver, config.dataSourceName);
    const fetcher = newSchemaFetcher(client);

    const databaseName = yield* fetcher.getDatabaseName;
    yield* Effect.logDebug(`Database: ${databaseName}`);

    const tableNames = config.tableNames.length > 0 ? config.tableNames : yield* fetcher.getTableNames;
    yield* Effect.log(`Found ${tableNames.length} tables`);
    yield* Effect.logDebug(`Tables: ${tableNames.join(", ")}`);

    const unitOptions: UnitOptions = {
      forceCases: config.forceCases,
      runtimeModule: config.runtimeModule,
    };
    const writer = createFileWriter();
    const writeOptions = {
      outputDir: config.outputDir,
      force: !config.interactive,
      dryRun: config.dryRun,
      ...(options.confirmOverwrite ? { confirmOverwrite: options.confirmOverwrite } : {}),
    };

    const baseResult = yield* writer.write(emitBase(databaseName, tableNames, unitOptions), writeOptions);

    const tableResults = yield* Effect.forEach(tableNames, tableName =>
      Effect.log(`Generating ${tableName}`).pipe(
        Effect.zipRight(emitTable(fetcher, databaseName, tableName, unitOptions)),
        Effect.flatMap(unit => writer.write(unit, writeOptions)),
      ),
    );

    const writeResults = [baseResult, ...tableResults];
    const written = writeResults.filter(r => r.written).length;
    const dryRunSuffix = config.dryRun ? " (dry run)" : "";
    yield* Effect.log(`Wrote ${written} files${dryRunSuffix}`);

    return { config, databaseName, tableNames, writeResults };
  }).pipe(Effect.scoped);

/**
 * The main generate pipeline: load config, then run generation
 */
export const generate = (
  loadOptions: LoadOptions = {},
  options: GenerateOptions = {},
): Effect.Effect<
  GenerateResult,
  GenerateError,
  ConfigLoaderService | SqlConnectorService | FileSystem.FileSystem | Path.Path
> =>
  Effect.gen(function* () {
    yield* Effect.logDebug("Loading configuration...");
    const configLoader = yield* ConfigLoaderService;
    const config = yield* configLoader.load(loadOptions);
    return yield* generateWithConfig(config, options);
  });

/**
 * Layer that provides all services needed for generate()
 */
export const GenerateLive = Layer.mergeAll(ConfigLoaderLive, SqlConnectorLive);

/**
 * Run generate with all dependencies provided
 *
 * This is the main entry point for programmatic usage.
 * Requires FileSystem and Path from @effect/platform.
 */
export const runGenerate = (
  loadOptions: LoadOptions = {},
  options: GenerateOptions = {},
): Effect.Effect<GenerateResult, GenerateError, FileSystem.FileSystem | Path.Path> =>
  generate(loadOptions, options).pipe(Effect.provide(GenerateLive));
