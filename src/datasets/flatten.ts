import type { Row, Table } from "./table";

const PREFIX_RENAMES: ReadonlyArray<readonly [string, string]> = [
  ["Driver_", "driver_"],
  ["Constructor_", "constructor_"],
  ["Circuit_", "circuit_"],
  ["Time_", "time_"],
  ["AverageSpeed_", "avgSpeed_"],
];

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Expands nested objects into dot-separated keys (`Driver.familyName`).
 * Arrays are leaf values and stay as they are.
 */
export function normalizeRecord(item: Record<string, unknown>, prefix = ""): Row {
  const row: Row = {};
  for (const [key, value] of Object.entries(item)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (isPlainObject(value)) {
      Object.assign(row, normalizeRecord(value, path));
    } else {
      row[path] = value;
    }
  }
  return row;
}

export function flattenColumnName(name: string) {
  return PREFIX_RENAMES.reduce(
    (column, [from, to]) => column.replaceAll(from, to),
    name.replaceAll(".", "_")
  );
}

/** When two keys flatten to the same column, the later key's value wins. */
export function flattenRow(row: Row): Row {
  const flat: Row = {};
  for (const [key, value] of Object.entries(row)) {
    const column = flattenColumnName(key);
    if (Object.hasOwn(flat, column)) {
      console.warn(
        `[Export] Column ${column} appears more than once; keeping the value of ${key}`
      );
    }
    flat[column] = value;
  }
  return flat;
}

export function flattenTable(table: Table): Table {
  const columns: string[] = [];
  for (const column of table.columns.map(flattenColumnName)) {
    if (!columns.includes(column)) {
      columns.push(column);
    }
  }
  return { columns, rows: table.rows.map(flattenRow) };
}

export function flattenItem(item: Record<string, unknown>): Row {
  return flattenRow(normalizeRecord(item));
}
