import type { PipelineConfig } from "./config";
import { saveTable } from "./datasets/csv";
import { isStandingsKind, type DatasetKind } from "./datasets/kinds";
import { concatTables, isEmptyTable, type Table } from "./datasets/table";
import type { JolpicaSource } from "./datasources/jolpica";

export const EXPORT_DATASETS = [
  "Seasons",
  "Drivers",
  "Constructors",
  "Circuits",
  "Results",
  "Qualifying",
  "Sprint",
  "DriverStandings",
  "ConstructorStandings",
  "PitStops",
  "Laps",
] as const;

export type ExportName = (typeof EXPORT_DATASETS)[number];

export interface ExportSummary {
  written: string[];
  empty: ExportName[];
  failed: ExportName[];
}

export async function fetchAllYears(
  source: JolpicaSource,
  kind: DatasetKind,
  startYear: number,
  endYear: number
): Promise<Table> {
  const tables: Table[] = [];
  const total = endYear - startYear + 1;

  for (let year = startYear; year <= endYear; year += 1) {
    console.log(
      `[Export] Fetching ${kind} for ${year} (${year - startYear + 1}/${total})`
    );
    const table = isStandingsKind(kind)
      ? await source.fetchStandings(year, kind)
      : await source.fetchRaceDataset(year, kind);
    if (!isEmptyTable(table)) {
      tables.push(table);
    }
  }

  return concatTables(tables);
}

export function buildExportPlan(
  source: JolpicaSource,
  yearRange: PipelineConfig["yearRange"]
): Record<ExportName, () => Promise<Table>> {
  const [startYear, endYear] = yearRange;
  const perYear = (kind: DatasetKind) => () =>
    fetchAllYears(source, kind, startYear, endYear);

  return {
    Seasons: () => source.fetchAllSeasons(),
    Drivers: () => source.fetchAllDrivers(),
    Constructors: () => source.fetchAllConstructors(),
    Circuits: () => source.fetchAllCircuits(),
    Results: perYear("results"),
    Qualifying: perYear("qualifying"),
    Sprint: perYear("sprint"),
    DriverStandings: perYear("driverStandings"),
    ConstructorStandings: perYear("constructorStandings"),
    PitStops: perYear("pitstops"),
    Laps: perYear("laps"),
  };
}

/**
 * Fetches and saves each dataset in turn. Rows that decoded are saved even
 * when some pages or rounds of the dataset had to be skipped for an
 * unexpected response shape; such datasets are also reported as failed.
 */
export async function runExport(
  config: PipelineConfig,
  source: JolpicaSource,
  datasets: readonly ExportName[] = EXPORT_DATASETS
): Promise<ExportSummary> {
  const plan = buildExportPlan(source, config.yearRange);
  const summary: ExportSummary = { written: [], empty: [], failed: [] };
  source.takeSchemaErrors();

  for (const name of datasets) {
    console.log(`\n[Export] ${name}`);
    const table = await plan[name]();
    const file = await saveTable(table, name, config.outputDir);
    if (file) {
      summary.written.push(file);
    } else {
      summary.empty.push(name);
    }

    const schemaErrors = source.takeSchemaErrors();
    if (schemaErrors.length) {
      console.error(
        `[Export] ${name} skipped ${schemaErrors.length} unexpected response(s)`
      );
      summary.failed.push(name);
    }
  }

  return summary;
}
