/**
 * Core error types for tablecast
 * Using Effect's Data.TaggedError for typed error handling
 */
import { Data } from "effect"

// Base error type with common fields
interface ErrorBase {
  readonly message: string
}

// Configuration errors
export class ConfigNotFound extends Data.TaggedError("ConfigNotFound")<
  ErrorBase & { readonly searchPaths: readonly string[] }
> {}

export class ConfigInvalid extends Data.TaggedError("ConfigInvalid")<
  ErrorBase & { readonly path: string; readonly errors: readonly string[] }
> {}

/**
 * No schema fetcher exists for the driver name.
 * Raised as a defect: there is nothing sensible to generate.
 */
export class UnsupportedDriver extends Data.TaggedError("UnsupportedDriver")<
  ErrorBase & { readonly driver: string; readonly supported: readonly string[] }
> {}

// Database errors
export class ConnectionFailed extends Data.TaggedError("ConnectionFailed")<
  ErrorBase & { readonly driver: string; readonly dataSourceName: string; readonly cause: unknown }
> {}

export class IntrospectionFailed extends Data.TaggedError("IntrospectionFailed")<
  ErrorBase & { readonly query: string; readonly cause: unknown }
> {}

export class NoDatabaseSelected extends Data.TaggedError("NoDatabaseSelected")<
  ErrorBase & { readonly driver: string }
> {}

// Type mapping errors
export class UnknownFieldType extends Data.TaggedError("UnknownFieldType")<
  ErrorBase & {
    readonly rawType: string
    readonly table?: string
    readonly column?: string
  }
> {}

// Emission errors
export class WriteError extends Data.TaggedError("WriteError")<
  ErrorBase & { readonly path: string; readonly cause: unknown }
> {}

/** Driver open or catalog query failure */
export type ConnectionError = ConnectionFailed | IntrospectionFailed

// Union of all errors for convenience
export type TablecastError =
  | ConfigNotFound
  | ConfigInvalid
  | ConnectionFailed
  | IntrospectionFailed
  | NoDatabaseSelected
  | UnknownFieldType
  | WriteError

/**
 * Hide the password part of a data-source name before it ends up in an error.
 * Covers URL style (`user:pass@host`) and key/value style (`password=...`).
 */
export const maskDataSourceName = (dataSourceName: string): string =>
  dataSourceName
    .replace(/:[^:@/]+@/, ":***@")
    .replace(/(password=)[^\s;]*/i, "$1***")
