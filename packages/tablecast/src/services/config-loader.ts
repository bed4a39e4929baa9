/**
 * Config Loader Service
 *
 * Loads tablecast.config.{ts,js,mjs,cjs,json} using lilconfig, merges CLI
 * overrides on top and validates the result with Effect Schema.
 */
import { pathToFileURL } from "node:url";
import { Context, Effect, Layer, ParseResult, Predicate, Schema as S, pipe } from "effect";
import { lilconfig } from "lilconfig";
import { tsImport } from "tsx/esm/api";
import { Config, type ConfigInput, type ResolvedConfig } from "../config.js";
import { ConfigInvalid, ConfigNotFound } from "../errors.js";

/**
 * Options accepted by {@link ConfigLoader.load}
 */
export interface LoadOptions {
  /** Explicit config file; fails with ConfigNotFound when missing */
  readonly configPath?: string;
  /** Directory to search from (default: cwd) */
  readonly searchFrom?: string;
  /** Values that win over the file (usually CLI flags) */
  readonly overrides?: ConfigInput;
}

/**
 * Config Loader service interface
 */
export interface ConfigLoader {
  /**
   * Load, merge and validate configuration.
   * A missing config file is only an error when `configPath` names one.
   */
  readonly load: (options?: LoadOptions) => Effect.Effect<ResolvedConfig, ConfigNotFound | ConfigInvalid>;
}

/**
 * ConfigLoader service tag
 */
export class ConfigLoaderService extends Context.Tag("ConfigLoader")<
  ConfigLoaderService,
  ConfigLoader
>() {}

/**
 * Default config file names to search for
 */
export const CONFIG_FILE_NAMES = [
  "tablecast.config.ts",
  "tablecast.config.js",
  "tablecast.config.mjs",
  "tablecast.config.cjs",
  "tablecast.config.json",
];

const defaultExport = (mod: unknown): unknown =>
  Predicate.isRecord(mod) && "default" in mod ? mod.default : mod;

/**
 * TypeScript config files go through tsx so plain Node can load them
 */
const importTypeScript = async (filepath: string): Promise<unknown> => {
  const mod: unknown = await tsImport(pathToFileURL(filepath).href, import.meta.url);
  return defaultExport(mod);
};

function createLilconfig() {
  return lilconfig("tablecast", {
    searchPlaces: CONFIG_FILE_NAMES,
    loaders: { ".ts": importTypeScript },
  });
}

const isMissingFile = (error: unknown): boolean =>
  Predicate.isRecord(error) && error["code"] === "ENOENT";

/**
 * Format Schema decode errors as `path: message` lines
 */
export function formatSchemaErrors(error: ParseResult.ParseError): readonly string[] {
  return ParseResult.ArrayFormatter.formatErrorSync(error).map(issue =>
    issue.path.length > 0 ? `${issue.path.map(String).join(".")}: ${issue.message}` : issue.message,
  );
}

/**
 * Drop undefined values so they don't shadow what the file provides
 */
const definedEntries = (input: ConfigInput): Record<string, unknown> =>
  Object.fromEntries(Object.entries(input).filter(([, v]) => v !== undefined));

/**
 * Merge file config and overrides, then decode into a ResolvedConfig.
 */
export const resolveConfig = (
  fileConfig: unknown,
  overrides: ConfigInput,
  source: string,
): Effect.Effect<ResolvedConfig, ConfigInvalid> => {
  const merged = {
    ...(Predicate.isRecord(fileConfig) ? fileConfig : {}),
    ...definedEntries(overrides),
  };
  return pipe(
    S.decodeUnknown(Config)(merged),
    Effect.mapError(
      parseError =>
        new ConfigInvalid({
          message: `Invalid configuration in ${source}`,
          path: source,
          errors: formatSchemaErrors(parseError),
        }),
    ),
  );
};

/**
 * Create a ConfigLoader implementation
 */
export function createConfigLoader(): ConfigLoader {
  const lc = createLilconfig();

  return {
    load: options =>
      Effect.gen(function* () {
        const searchFrom = options?.searchFrom ?? process.cwd();
        const configPath = options?.configPath;

        const result = yield* Effect.tryPromise({
          try: () => (configPath ? lc.load(configPath) : lc.search(searchFrom)),
          catch: error =>
            configPath && isMissingFile(error)
              ? new ConfigNotFound({
                  message: `Config file not found: ${configPath}`,
                  searchPaths: [configPath],
                })
              : new ConfigInvalid({
                  message: `Failed to load config: ${error instanceof Error ? error.message : String(error)}`,
                  path: configPath ?? searchFrom,
                  errors: [String(error)],
                }),
        });

        const fileConfig: unknown = result && !result.isEmpty ? result.config : {};
        const source = result?.filepath ?? "command line flags";
        if (result) {
          yield* Effect.logDebug(`Loaded config from ${result.filepath}`);
        }

        return yield* resolveConfig(fileConfig, options?.overrides ?? {}, source);
      }),
  };
}

/**
 * Live layer for ConfigLoader
 */
export const ConfigLoaderLive = Layer.succeed(ConfigLoaderService, createConfigLoader());

/**
 * Helper to define a config (provides type safety for users)
 */
export function defineConfig(config: ConfigInput): ConfigInput {
  return config;
}
