import fs from "fs";
import path from "path";
import { isEmptyTable, type Table } from "./table";

const BOM = "\uFEFF";

export function csvEscape(value: string) {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCell(value: unknown): string {
  if (value == null) {
    return "";
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

export function formatCsvLine(values: readonly unknown[]) {
  return values.map((value) => csvEscape(formatCell(value))).join(",");
}

/**
 * Writes `<outputDir>/<name>.csv` (UTF-8 with BOM, header row, no index
 * column). Empty tables are skipped and produce no file.
 */
export async function saveTable(
  table: Table,
  name: string,
  outputDir: string
): Promise<string | null> {
  if (isEmptyTable(table)) {
    console.warn(`[CSV] No data for ${name}`);
    return null;
  }

  const outputFile = path.join(outputDir, `${name}.csv`);
  const stream = fs.createWriteStream(outputFile, { encoding: "utf-8" });
  const closed = new Promise<void>((resolve, reject) => {
    stream.once("close", resolve);
    stream.once("error", reject);
  });

  stream.write(BOM + formatCsvLine(table.columns) + "\n");
  for (const row of table.rows) {
    stream.write(
      formatCsvLine(table.columns.map((column) => row[column])) + "\n"
    );
  }
  stream.end();
  await closed;

  console.log(`[CSV] Saved ${table.rows.length} rows -> ${outputFile}`);
  return outputFile;
}
