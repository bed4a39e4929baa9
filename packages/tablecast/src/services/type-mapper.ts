/**
 * Column Type Mapping
 *
 * Maps a raw column type (as reported by a schema fetcher) to a scalar type
 * for the generated model and a field category selecting the runtime field
 * wrapper. Unrecognized types are an error, never a silent fallback.
 */
import { Effect, Either } from "effect";
import { UnknownFieldType } from "../errors.js";
import type { ColumnDescriptor } from "../fetchers/types.js";

/**
 * Runtime field wrapper a column is bound to
 */
export type FieldCategory = "NumberField" | "StringField" | "BooleanField" | "WellKnownBinaryField";

export type SignedIntegerBase = "int8" | "int16" | "int32" | "int64";
export type UnsignedIntegerBase = "uint8" | "uint16" | "uint32" | "uint64";

/**
 * Logical scalar types, independent of how they are rendered
 */
export type ScalarBase =
  | SignedIntegerBase
  | UnsignedIntegerBase
  | "float64"
  | "string"
  | "boolean"
  | "WellKnownBinary";

export interface ScalarType {
  readonly base: ScalarBase;
  readonly nullable: boolean;
}

export interface MappedType {
  readonly scalarType: ScalarType;
  readonly category: FieldCategory;
}

interface TypeFamily {
  readonly base: ScalarBase;
  readonly category: FieldCategory;
}

const number = (base: ScalarBase): TypeFamily => ({ base, category: "NumberField" });
const text: TypeFamily = { base: "string", category: "StringField" };
const geometry: TypeFamily = { base: "WellKnownBinary", category: "WellKnownBinaryField" };
const bool: TypeFamily = { base: "boolean", category: "BooleanField" };

/**
 * Recognized raw type names (lower-cased) and the family they belong to.
 * `bit` is resolved separately since it depends on the column size.
 */
const TYPE_FAMILIES: ReadonlyMap<string, TypeFamily> = new Map<string, TypeFamily>([
  ["tinyint", number("int8")],
  ["smallint", number("int16")],
  ["int", number("int32")],
  ["mediumint", number("int32")],
  ["bigint", number("int64")],
  ["integer", number("int64")],
  ["float", number("float64")],
  ["double", number("float64")],
  ["double precision", number("float64")],
  ["decimal", number("float64")],
  ["real", number("float64")],

  ...[
    "char",
    "varchar",
    "character",
    "character varying",
    "text",
    "tinytext",
    "mediumtext",
    "longtext",
    "enum",
    "set",
    "datetime",
    "date",
    "time",
    "time with time zone",
    "time without time zone",
    "timestamp",
    "timestamp with time zone",
    "timestamp without time zone",
    "interval",
    "year",
    "json",
    "jsonb",
    "uuid",
    "numeric",
  ].map(name => [name, text] as const),

  // raw bytes are carried as strings
  ...["binary", "varbinary", "blob", "tinyblob", "mediumblob", "longblob", "bytea"].map(
    name => [name, text] as const,
  ),

  ...[
    "geometry",
    "point",
    "linestring",
    "polygon",
    "multipoint",
    "multilinestring",
    "multipolygon",
    "geometrycollection",
  ].map(name => [name, geometry] as const),

  ["boolean", bool],
  ["bool", bool],
]);

const UNSIGNED: Record<SignedIntegerBase, UnsignedIntegerBase> = {
  int8: "uint8",
  int16: "uint16",
  int32: "uint32",
  int64: "uint64",
};

const isSignedInteger = (base: ScalarBase): base is SignedIntegerBase => base in UNSIGNED;

const lookupFamily = (rawType: string, size: number): TypeFamily | undefined => {
  if (rawType === "bit") {
    return size === 1 ? bool : text;
  }
  return TYPE_FAMILIES.get(rawType);
};

/**
 * Resolve a column's scalar type and field category.
 *
 * `unsigned` switches signed integers to the unsigned variant of the same
 * width; `nullable` marks any type nullable. Both apply after the family
 * lookup.
 */
export function resolveType(
  descriptor: ColumnDescriptor,
  table?: string,
): Either.Either<MappedType, UnknownFieldType> {
  const family = lookupFamily(descriptor.rawType.trim().toLowerCase(), descriptor.size);
  if (!family) {
    return Either.left(
      new UnknownFieldType({
        message: `unknown field type ${descriptor.rawType}`,
        rawType: descriptor.rawType,
        table,
        column: descriptor.name,
      }),
    );
  }

  const base = descriptor.unsigned && isSignedInteger(family.base) ? UNSIGNED[family.base] : family.base;
  return Either.right({
    scalarType: { base, nullable: descriptor.nullable },
    category: family.category,
  });
}

/**
 * Effect version of {@link resolveType}
 */
export const mapType = (descriptor: ColumnDescriptor, table?: string): Effect.Effect<MappedType, UnknownFieldType> =>
  Either.match(resolveType(descriptor, table), {
    onLeft: error => Effect.fail(error),
    onRight: mapped => Effect.succeed(mapped),
  });

/**
 * Render a scalar type as a TypeScript type.
 * 64-bit integers become `bigint`; the well-known-binary type comes from the
 * runtime module, referenced through `runtimeAlias`.
 */
export function renderScalarType(scalarType: ScalarType, runtimeAlias: string): string {
  const rendered = renderBase(scalarType.base, runtimeAlias);
  return scalarType.nullable ? `${rendered} | null` : rendered;
}

function renderBase(base: ScalarBase, runtimeAlias: string): string {
  switch (base) {
    case "int8":
    case "int16":
    case "int32":
    case "uint8":
    case "uint16":
    case "uint32":
    case "float64":
      return "number";
    case "int64":
    case "uint64":
      return "bigint";
    case "string":
      return "string";
    case "boolean":
      return "boolean";
    case "WellKnownBinary":
      return `${runtimeAlias}.WellKnownBinary`;
  }
}
