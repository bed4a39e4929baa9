#!/usr/bin/env node
/**
 * tablecast CLI
 *
 * Generates typed table accessors from a live database schema.
 *
 * Log verbosity is controlled via the built-in --log-level flag:
 *   --log-level debug   Show detailed output (table names, file paths)
 *   --log-level info    Default - show progress messages
 *   --log-level none    Suppress all output except errors
 */
import { Command, Options, Prompt } from "@effect/cli";
import { Runtime, Terminal } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Cause, Console, Effect, Exit, Option } from "effect";
import { splitList, type ConfigInput } from "./config.js";
import { UnsupportedDriver } from "./errors.js";
import { runGenerate, type GenerateError, type GenerateResult } from "./generate.js";
import type { ConfirmOverwrite } from "./services/file-writer.js";
import packageJson from "../package.json" with { type: "json" };

// ============================================================================
// Options
// ============================================================================

const configPath = Options.file("config").pipe(
  Options.withAlias("c"),
  Options.withDescription("Path to config file"),
  Options.optional,
);

const driver = Options.text("driver").pipe(
  Options.withAlias("d"),
  Options.withDescription("Database driver: mysql, sqlite3 or postgres"),
  Options.optional,
);

const dataSourceName = Options.text("dbc").pipe(
  Options.withDescription("Data source name: connection string, or SQLite file path"),
  Options.optional,
);

const outputDir = Options.directory("output").pipe(
  Options.withAlias("o"),
  Options.withDescription("Output directory for generated modules"),
  Options.optional,
);

const tables = Options.text("tables").pipe(
  Options.withAlias("t"),
  Options.withDescription("Comma-separated tables to generate (default: all)"),
  Options.optional,
);

const forceCases = Options.text("forcecases").pipe(
  Options.withDescription("Comma-separated words whose casing is kept in identifiers, e.g. ID,HTML"),
  Options.optional,
);

const runtimeModule = Options.text("runtime").pipe(
  Options.withDescription("Module the generated code imports its runtime from"),
  Options.optional,
);

const interactive = Options.boolean("interactive").pipe(
  Options.withAlias("i"),
  Options.withDescription("Ask before overwriting existing files"),
);

const dryRun = Options.boolean("dry-run").pipe(
  Options.withAlias("n"),
  Options.withDescription("Show what would be generated without writing files"),
);

// ============================================================================
// Generate Command Logic
// ============================================================================

interface GenerateArgs {
  readonly configPath: Option.Option<string>;
  readonly driver: Option.Option<string>;
  readonly dataSourceName: Option.Option<string>;
  readonly outputDir: Option.Option<string>;
  readonly tables: Option.Option<string>;
  readonly forceCases: Option.Option<string>;
  readonly runtimeModule: Option.Option<string>;
  readonly interactive: boolean;
  readonly dryRun: boolean;
}

/** Flags given on the command line; absent flags leave the config file's values alone */
const toOverrides = (args: GenerateArgs): ConfigInput => ({
  driver: Option.getOrUndefined(args.driver),
  dataSourceName: Option.getOrUndefined(args.dataSourceName),
  outputDir: Option.getOrUndefined(args.outputDir),
  tableNames: Option.getOrUndefined(Option.map(args.tables, splitList)),
  forceCases: Option.getOrUndefined(Option.map(args.forceCases, splitList)),
  runtimeModule: Option.getOrUndefined(args.runtimeModule),
  interactive: args.interactive || undefined,
  dryRun: args.dryRun || undefined,
});

/**
 * Overwrite confirmation on the terminal. Quitting the prompt counts as "no".
 */
const terminalConfirm = (terminal: Terminal.Terminal): ConfirmOverwrite => path =>
  Prompt.confirm({ message: `Overwrite ${path}?`, initial: false }).pipe(
    Effect.catchTag("QuitException", () => Effect.succeed(false)),
    Effect.provideService(Terminal.Terminal, terminal),
  );

const logSuccess = (result: GenerateResult) => {
  const written = result.writeResults.filter(r => r.written).length;
  const total = result.writeResults.length;
  const suffix = result.config.dryRun ? " (dry run)" : "";
  return Console.log(`\n✓ Generated ${result.config.dryRun ? total : written} files${suffix}`);
};

const runGenerateCommand = (args: GenerateArgs) =>
  Effect.gen(function* () {
    const terminal = yield* Terminal.Terminal;
    const loadOptions = {
      overrides: toOverrides(args),
      ...Option.match(args.configPath, { onNone: () => ({}), onSome: path => ({ configPath: path }) }),
    };
    return yield* runGenerate(loadOptions, { confirmOverwrite: terminalConfirm(terminal) });
  }).pipe(
    Effect.tap(logSuccess),
    Effect.catchAll(error =>
      Console.error(`\n✗ Error: ${error._tag}`).pipe(
        Effect.andThen(Console.error(`  ${error.message}`)),
        Effect.andThen(Effect.forEach(errorDetails(error), e => Console.error(`    - ${e}`))),
        Effect.andThen(Effect.fail(error)),
      ),
    ),
    Effect.tapDefect(defect =>
      Option.match(unsupportedDriver(defect), {
        onNone: () => Effect.void,
        onSome: error =>
          Console.error(`\n✗ Error: ${error._tag}`).pipe(
            Effect.andThen(Console.error(`  ${error.message} (supported: ${error.supported.join(", ")})`)),
          ),
      }),
    ),
  );

/** Extra lines printed under an error */
const errorDetails = (error: GenerateError): readonly string[] => {
  switch (error._tag) {
    case "ConfigInvalid":
      return error.errors;
    case "ConnectionFailed":
      return [`data source: ${error.dataSourceName}`];
    case "IntrospectionFailed":
      return [`query: ${error.query}`];
    default:
      return [];
  }
};

const unsupportedDriver = (cause: Cause.Cause<unknown>): Option.Option<UnsupportedDriver> =>
  Option.flatMap(Cause.dieOption(cause), defect =>
    defect instanceof UnsupportedDriver ? Option.some(defect) : Option.none(),
  );

// ============================================================================
// Commands
// ============================================================================

const rootCommand = Command.make(
  "tablecast",
  { configPath, driver, dataSourceName, outputDir, tables, forceCases, runtimeModule, interactive, dryRun },
  runGenerateCommand,
);

// ============================================================================
// CLI App
// ============================================================================

const cli = Command.run(rootCommand, {
  name: "tablecast",
  version: packageJson.version,
});

/** An unsupported driver is a usage error: exit with 2 */
const teardown: Runtime.Teardown = (exit, onExit) =>
  Exit.isFailure(exit) && Option.isSome(unsupportedDriver(exit.cause))
    ? onExit(2)
    : Runtime.defaultTeardown(exit, onExit);

cli(process.argv).pipe(Effect.provide(NodeContext.layer), effect => NodeRuntime.runMain(effect, { teardown }));
