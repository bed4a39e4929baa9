/**
 * Table Emitter
 *
 * Builds the accessor module for one table: branded field wrapper types, the
 * table object, an accessor class with a singleton instance, the model
 * interface and its conversion helpers. Every per-column structure is derived
 * from the same ordered column list, so the model's field order and the value
 * sequence used for inserts always agree.
 */
import { Effect } from "effect";
import type { ConnectionError, UnknownFieldType } from "../errors.js";
import type { ColumnDescriptor, SchemaFetcher } from "../fetchers/types.js";
import { toExportedIdentifier, toWrapperTypeName } from "../services/identifiers.js";
import { mapType, renderScalarType, type MappedType } from "../services/type-mapper.js";
import { docComment, quote, RUNTIME_ALIAS, unitHeader, type EmittedUnit, type UnitOptions } from "./unit.js";

/**
 * Everything the emitter needs to know about one column
 */
export interface FieldPlan {
  readonly column: ColumnDescriptor;
  /** Exported property name on the accessor and the model */
  readonly fieldName: string;
  /** Private type standing for this field of this table */
  readonly wrapperType: string;
  readonly mapped: MappedType;
}

/**
 * Names derived from a table name
 */
export interface TableNames {
  readonly tableName: string;
  /** Singleton accessor, e.g. `Orders` */
  readonly className: string;
  /** Accessor class, e.g. `tOrders` */
  readonly accessorClass: string;
  /** Table object the fields are bound to, e.g. `oOrders` */
  readonly tableObject: string;
  /** Model interface, e.g. `OrdersModel` */
  readonly modelName: string;
}

export const tableNames = (tableName: string, forceCases: readonly string[]): TableNames => {
  const className = toExportedIdentifier(tableName, forceCases);
  return {
    tableName,
    className,
    accessorClass: `t${className}`,
    tableObject: `o${className}`,
    modelName: `${className}Model`,
  };
};

/** Output path of a table's module, relative to the output directory */
export const tableModulePath = (tableName: string): string => `${tableName}.ts`;

/**
 * Plan one field per column, in column order.
 */
export const planFields = (
  names: TableNames,
  columns: readonly ColumnDescriptor[],
  forceCases: readonly string[],
): Effect.Effect<readonly FieldPlan[], UnknownFieldType> =>
  Effect.forEach(columns, column =>
    mapType(column, names.tableName).pipe(
      Effect.map((mapped): FieldPlan => {
        const fieldName = toExportedIdentifier(column.name, forceCases);
        return {
          column,
          fieldName,
          wrapperType: toWrapperTypeName(column.rawType, names.className, fieldName),
          mapped,
        };
      }),
    ),
  );

/**
 * Quoted column lists, computed once per table:
 * bare (`"id", "total"`) and qualified (`"orders"."id", "orders"."total"`).
 */
export const fieldsSQL = (
  tableName: string,
  columns: readonly ColumnDescriptor[],
  quoteIdentifier: (identifier: string) => string,
): { readonly bare: string; readonly qualified: string } => {
  const table = quoteIdentifier(tableName);
  return {
    bare: columns.map(column => quoteIdentifier(column.name)).join(", "),
    qualified: columns.map(column => `${table}.${quoteIdentifier(column.name)}`).join(", "),
  };
};

/**
 * Render a table module from its field plans.
 */
export function renderTable(
  databaseName: string,
  names: TableNames,
  fields: readonly FieldPlan[],
  sql: { readonly bare: string; readonly qualified: string },
  runtimeModule: string,
): string {
  const rt = RUNTIME_ALIAS;
  const { tableName, className, accessorClass, tableObject, modelName } = names;

  const wrapperTypes = fields.map(
    field => `type ${field.wrapperType} = ${rt}.Branded<${rt}.${field.mapped.category}, ${quote(field.wrapperType)}>;`,
  );

  const accessorFields = fields.flatMap(field => [
    ...docComment(field.column.comment, "  "),
    `  readonly ${field.fieldName}: ${field.wrapperType} = ${rt}.new${field.mapped.category}<${quote(field.wrapperType)}>(${tableObject}, ${quote(field.column.name)});`,
  ]);

  const modelFields = fields.flatMap(field => [
    ...docComment(field.column.comment, "  "),
    `  ${field.fieldName}: ${renderScalarType(field.mapped.scalarType, rt)};`,
  ]);

  const fieldCases = fields.flatMap(field => [
    `      case ${quote(field.column.name)}:`,
    `        return this.${field.fieldName};`,
  ]);

  const fieldList = fields.map(field => `this.${field.fieldName}`).join(", ");
  const valueList = fields.map(field => `model.${field.fieldName}`).join(", ");

  return [
    ...unitHeader(databaseName, runtimeModule),
    ...wrapperTypes,
    ...(wrapperTypes.length > 0 ? [""] : []),
    `const ${tableObject} = ${rt}.newTable(${quote(tableName)});`,
    "",
    `export class ${accessorClass} implements ${rt}.TableAccessor {`,
    `  readonly table: ${rt}.Table = ${tableObject};`,
    ...(accessorFields.length > 0 ? ["", ...accessorFields] : []),
    "",
    `  getTable(): ${rt}.Table {`,
    "    return this.table;",
    "  }",
    "",
    `  getFields(): ${rt}.Field[] {`,
    `    return [${fieldList}];`,
    "  }",
    "",
    `  getFieldByName(name: string): ${rt}.Field | undefined {`,
    "    switch (name) {",
    ...fieldCases,
    "      default:",
    "        return undefined;",
    "    }",
    "  }",
    "",
    "  getFieldsSQL(): string {",
    `    return ${quote(sql.bare)};`,
    "  }",
    "",
    "  getFullFieldsSQL(): string {",
    `    return ${quote(sql.qualified)};`,
    "  }",
    "}",
    "",
    `export const ${className} = new ${accessorClass}();`,
    "",
    `export interface ${modelName} {`,
    ...modelFields,
    "}",
    "",
    `export const ${modelName} = {`,
    `  toTableReference(): ${accessorClass} {`,
    `    return ${className};`,
    "  },",
    "",
    `  toValueSequence(model: ${modelName}): unknown[] {`,
    `    return [${valueList}];`,
    "  },",
    "};",
    "",
  ].join("\n");
}

/**
 * Emit the accessor module for one table.
 *
 * Fails with the fetcher's error when the columns can't be read, or with
 * UnknownFieldType when a column's type is not recognized.
 */
export const emitTable = (
  fetcher: SchemaFetcher,
  databaseName: string,
  tableName: string,
  options: UnitOptions,
): Effect.Effect<EmittedUnit, ConnectionError | UnknownFieldType> =>
  Effect.gen(function* () {
    const columns = yield* fetcher.getFieldDescriptors(tableName);
    const names = tableNames(tableName, options.forceCases);
    const fields = yield* planFields(names, columns, options.forceCases);
    const sql = fieldsSQL(tableName, columns, fetcher.quoteIdentifier);

    return {
      path: tableModulePath(tableName),
      content: renderTable(databaseName, names, fields, sql, options.runtimeModule),
    };
  });
