/**
 * Base Emitter
 *
 * The shared module written before any table: the version guard, marker
 * aliases for the runtime's capability types, and table lookup by name.
 */
import { tableNames } from "./table.js";
import {
  GENERATOR_VERSION,
  quote,
  RUNTIME_ALIAS,
  unitHeader,
  type EmittedUnit,
  type UnitOptions,
} from "./unit.js";

export const BASE_MODULE_PATH = "base.dsl.ts";

const MARKER_TYPES = ["Table", "TableAccessor", "Field", "NumberField", "StringField", "BooleanField", "WellKnownBinaryField"];

/**
 * Two assignments in opposite directions between the generator's version
 * literal and the runtime's RUNTIME_VERSION: a mismatch either way fails the
 * consumer's type-check.
 */
export function versionGuard(): string[] {
  const rt = RUNTIME_ALIAS;
  return [
    `type RuntimeAndGeneratorVersionsShouldBeTheSame = typeof ${rt}.RUNTIME_VERSION;`,
    "",
    `export const generatorVersionMatchesRuntime: RuntimeAndGeneratorVersionsShouldBeTheSame = ${GENERATOR_VERSION};`,
    `export const runtimeVersionMatchesGenerator: ${GENERATOR_VERSION} = ${rt}.RUNTIME_VERSION;`,
  ];
}

/**
 * Emit the base module for the given tables, in order.
 */
export function emitBase(databaseName: string, tables: readonly string[], options: UnitOptions): EmittedUnit {
  const rt = RUNTIME_ALIAS;
  const names = tables.map(table => tableNames(table, options.forceCases));

  const imports = names.map(({ tableName, className }) => `import { ${className} } from ${quote(`./${tableName}.js`)};`);

  const tableCases = names.flatMap(({ tableName, className }) => [
    `    case ${quote(tableName)}:`,
    `      return ${className};`,
  ]);

  const content = [
    ...unitHeader(databaseName, options.runtimeModule, imports),
    ...versionGuard(),
    "",
    ...MARKER_TYPES.map(name => `export type ${name} = ${rt}.${name};`),
    "",
    `export function getTable(name: string): ${rt}.TableAccessor | undefined {`,
    "  switch (name) {",
    ...tableCases,
    "    default:",
    "      return undefined;",
    "  }",
    "}",
    "",
    `export function getTables(): ${rt}.TableAccessor[] {`,
    `  return [${names.map(({ className }) => className).join(", ")}];`,
    "}",
    "",
  ].join("\n");

  return { path: BASE_MODULE_PATH, content };
}
