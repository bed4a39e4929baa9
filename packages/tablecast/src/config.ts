/**
 * Configuration schema for tablecast
 */
import { Schema as S } from "effect";

/**
 * Driver names understood by the generator.
 * The config accepts any string; unsupported drivers are rejected when
 * a schema fetcher is selected.
 */
export const SUPPORTED_DRIVERS = ["mysql", "sqlite3", "postgres"] as const;
export type DriverName = (typeof SUPPORTED_DRIVERS)[number];

/** Module the generated code imports its query builder from */
export const DEFAULT_RUNTIME_MODULE = "@tablecast/runtime";

/**
 * Split a comma-separated flag value (`-t users,orders`) into its entries.
 * Empty entries are dropped.
 */
export const splitList = (value: string): readonly string[] =>
  value
    .split(",")
    .map(s => s.trim())
    .filter(s => s.length > 0);

/**
 * Main configuration schema
 */
export const Config = S.Struct({
  /** Driver used to open the connection: mysql, sqlite3 or postgres */
  driver: S.propertySignature(S.String).annotations({
    missingMessage: () => "is required - pass --driver or add driver to config",
  }),

  /** Driver data-source name (connection string or SQLite file path) */
  dataSourceName: S.propertySignature(
    S.String.pipe(S.minLength(1, { message: () => "must not be empty" })),
  ).annotations({
    missingMessage: () => "is required - pass --dbc or add dataSourceName to config",
  }),

  /** Directory generated modules are written to */
  outputDir: S.propertySignature(
    S.String.pipe(S.minLength(1, { message: () => "must not be empty" })),
  ).annotations({
    missingMessage: () => "is required - pass -o or add outputDir to config",
  }),

  /** Tables to generate, in order. Empty means every table of the database. */
  tableNames: S.optionalWith(S.Array(S.String), { default: () => [] }),

  /** Words whose casing is forced in generated identifiers (e.g. ID, HTML) */
  forceCases: S.optionalWith(S.Array(S.String), { default: () => [] }),

  /** Module specifier of the query-builder runtime */
  runtimeModule: S.optionalWith(S.String, { default: () => DEFAULT_RUNTIME_MODULE }),

  /** Ask before overwriting files that already exist */
  interactive: S.optionalWith(S.Boolean, { default: () => false }),

  /** Report what would be written without touching the disk */
  dryRun: S.optionalWith(S.Boolean, { default: () => false }),
});

export type Config = S.Schema.Type<typeof Config>;

/**
 * User-facing configuration input type, used by `defineConfig()`.
 */
export interface ConfigInput {
  readonly driver?: string;
  readonly dataSourceName?: string;
  readonly outputDir?: string;
  readonly tableNames?: readonly string[];
  readonly forceCases?: readonly string[];
  readonly runtimeModule?: string;
  readonly interactive?: boolean;
  readonly dryRun?: boolean;
}

/**
 * Resolved configuration with all defaults applied.
 * Built once at startup and passed by reference; never mutated.
 */
export interface ResolvedConfig {
  readonly driver: string;
  readonly dataSourceName: string;
  readonly outputDir: string;
  readonly tableNames: readonly string[];
  readonly forceCases: readonly string[];
  readonly runtimeModule: string;
  readonly interactive: boolean;
  readonly dryRun: boolean;
}
