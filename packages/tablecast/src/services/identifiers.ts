/**
 * Identifier normalization
 *
 * Turns arbitrary schema names (snake_case, kebab-case, names with spaces)
 * into exported TypeScript identifiers, and free-form names into plain
 * module-scope identifiers. Both functions are pure: table and column names
 * are used as generated symbol names and as dispatch keys, so the same input
 * must always produce the same output.
 */

// ============================================================================
// Character Classes
// ============================================================================

const WORD_CHAR = /^[\p{L}\p{Nd}]$/u
const UPPER_CASE = /^\p{Lu}/u
const NON_WORD_ASCII = /\W/g
const NON_IDENTIFIER_CHAR = /[^\p{L}\p{Nd}_$]/gu

/** Prefix for identifiers that would otherwise not start with an upper-case letter */
export const EXPORTED_IDENTIFIER_PREFIX = "E"

// ============================================================================
// Exported Identifiers
// ============================================================================

/**
 * Split a raw name into capitalized words.
 * Any character that is neither a letter nor a decimal digit separates words,
 * so number forms such as `²` or `½` never reach an identifier.
 *
 * @example
 * ```typescript
 * splitWords("user_id")     // ["User", "Id"]
 * splitWords("html-body 2") // ["Html", "Body", "2"]
 * ```
 */
export function splitWords(raw: string): string[] {
  const words: string[] = []
  let current: string | undefined
  for (const ch of raw) {
    if (!WORD_CHAR.test(ch)) {
      if (current !== undefined) words.push(current)
      current = undefined
      continue
    }
    current = current === undefined ? ch.toUpperCase() : current + ch
  }
  if (current !== undefined) words.push(current)
  return words
}

/**
 * Replace a word by the first force-case entry that equals it ignoring case.
 */
const applyForceCase = (word: string, forceCases: readonly string[]): string => {
  const lower = word.toLowerCase()
  return forceCases.find(caseWord => caseWord.toLowerCase() === lower) ?? word
}

/**
 * Convert a schema name into an exported identifier.
 *
 * Words are capitalized and joined; words matching an entry of `forceCases`
 * (case-insensitively) take that entry's exact casing, which keeps acronyms
 * such as `ID` or `HTML` intact. The result is prefixed with
 * {@link EXPORTED_IDENTIFIER_PREFIX} when it is empty or doesn't start with an
 * upper-case letter.
 *
 * @example
 * ```typescript
 * toExportedIdentifier("user_id", [])     // "UserId"
 * toExportedIdentifier("user_id", ["ID"]) // "UserID"
 * toExportedIdentifier("2fa", [])         // "E2fa"
 * toExportedIdentifier("", [])            // "E"
 * ```
 */
export function toExportedIdentifier(raw: string, forceCases: readonly string[] = []): string {
  const result = splitWords(raw)
    .map(word => applyForceCase(word, forceCases))
    .join("")
  return UPPER_CASE.test(result) ? result : EXPORTED_IDENTIFIER_PREFIX + result
}

// ============================================================================
// Module Identifiers
// ============================================================================

/**
 * Sanitize a free-form name (e.g. a database name) into an identifier:
 * every non-word character becomes `_`, and a leading `_` is added when the
 * result is empty or starts with a digit.
 */
export function toModuleIdentifier(name: string): string {
  const result = name.replace(NON_WORD_ASCII, "_")
  return result === "" || /^[0-9]/.test(result) ? "_" + result : result
}

/**
 * Name of the private wrapper type standing for one field of one table.
 * The raw type is part of the name so a type change shows up in diffs.
 */
export function toWrapperTypeName(rawType: string, className: string, fieldName: string): string {
  return `${rawType.toLowerCase()}_${className}_${fieldName}`.replace(NON_IDENTIFIER_CHAR, "_")
}
