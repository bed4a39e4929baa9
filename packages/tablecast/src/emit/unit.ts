/**
 * Shared pieces of every generated module
 */
import { toModuleIdentifier } from "../services/identifiers.js";

/**
 * Bumped whenever generated code needs a different runtime.
 * The base unit checks it against the runtime's RUNTIME_VERSION.
 */
export const GENERATOR_VERSION = 2;

/** Alias the runtime module is imported under */
export const RUNTIME_ALIAS = "tablecast";

/**
 * One generated module: its path relative to the output directory and its source
 */
export interface EmittedUnit {
  readonly path: string;
  readonly content: string;
}

export interface UnitOptions {
  readonly forceCases: readonly string[];
  readonly runtimeModule: string;
}

export const PROVENANCE_HEADER = ["// This file is generated by tablecast.", "// DO NOT EDIT."] as const;

/** TypeScript string literal */
export const quote = (value: string): string => JSON.stringify(value);

/** Module-scope identifier naming the database in every unit */
export const databaseIdentifier = (databaseName: string): string => `${toModuleIdentifier(databaseName)}_dsl`;

/**
 * Header shared by all units: provenance notice, runtime import, extra
 * imports, then the database identifier.
 */
export function unitHeader(databaseName: string, runtimeModule: string, imports: readonly string[] = []): string[] {
  return [
    ...PROVENANCE_HEADER,
    "",
    `import * as ${RUNTIME_ALIAS} from ${quote(runtimeModule)};`,
    ...imports,
    "",
    `export const ${databaseIdentifier(databaseName)} = ${quote(databaseName)};`,
    "",
  ];
}

/**
 * Doc comment for a column comment, or nothing when there is none.
 * Comments are flattened to one line.
 */
export function docComment(comment: string, indent: string): string[] {
  const text = comment.replace(/\r?\n/g, " ").replace(/\*\//g, "*\\/").trim();
  return text === "" ? [] : [`${indent}/** ${text} */`];
}
