export type Row = Record<string, unknown>;

export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
}

export const EMPTY_TABLE: Table = Object.freeze({ columns: [], rows: [] });

export function isEmptyTable(table: Table) {
  return table.rows.length === 0;
}

export function tableFromRows(rows: readonly Row[]): Table {
  if (!rows.length) {
    return EMPTY_TABLE;
  }
  return { columns: collectColumns([], rows), rows: [...rows] };
}

/**
 * Lays a table out against a declared column list: declared columns come
 * first, in order, followed by whatever else the rows carry in first-seen
 * order. Cells missing from a row are filled with null.
 */
export function conformTable(table: Table, declared: readonly string[]): Table {
  if (isEmptyTable(table)) {
    return EMPTY_TABLE;
  }
  const columns = collectColumns(declared, table.rows);
  const rows = table.rows.map((row) => {
    const shaped: Row = {};
    for (const column of columns) {
      shaped[column] = row[column] ?? null;
    }
    return shaped;
  });
  return { columns, rows };
}

export function concatTables(tables: readonly Table[]): Table {
  const nonEmpty = tables.filter((table) => !isEmptyTable(table));
  if (!nonEmpty.length) {
    return EMPTY_TABLE;
  }

  const seen = new Set<string>();
  const columns: string[] = [];
  const rows: Row[] = [];
  for (const table of nonEmpty) {
    for (const column of table.columns) {
      if (!seen.has(column)) {
        seen.add(column);
        columns.push(column);
      }
    }
    rows.push(...table.rows);
  }
  return { columns, rows };
}

function collectColumns(initial: readonly string[], rows: readonly Row[]) {
  const seen = new Set<string>(initial);
  const columns = [...initial];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }
  return columns;
}
