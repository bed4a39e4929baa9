/**
 * Parse a declared column type such as `int(10) unsigned`, `varchar(255)` or
 * `decimal(10,2)` into the base name, size and signedness.
 */
export interface ParsedColumnType {
  readonly rawType: string;
  readonly size: number;
  readonly unsigned: boolean;
}

const COLUMN_TYPE = /^([^(]*?)\s*(?:\((.*)\))?((?:\s+(?:unsigned|signed|zerofill))*)\s*$/;
const LEADING_NUMBER = /^\s*(\d+)/;

export function parseColumnType(declared: string): ParsedColumnType {
  const normalized = declared.trim().toLowerCase();
  const match = COLUMN_TYPE.exec(normalized);
  if (!match) {
    return { rawType: normalized, size: 0, unsigned: false };
  }
  const [, name = "", args = "", modifiers = ""] = match;
  const size = LEADING_NUMBER.exec(args)?.[1];
  return {
    rawType: name.replace(/\s+/g, " "),
    size: size === undefined ? 0 : Number(size),
    unsigned: /\bunsigned\b/.test(modifiers),
  };
}
