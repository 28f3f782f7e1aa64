import type { PipelineConfig } from "../config";
import { UnexpectedSchemaError } from "../errors";
import { flattenItem, flattenTable, normalizeRecord } from "../datasets/flatten";
import {
  CIRCUIT_LIST_COLUMNS,
  CONSTRUCTOR_LIST_COLUMNS,
  DATASET_COLUMNS,
  DRIVER_LIST_COLUMNS,
  RACE_DATASET_KEYS,
  SEASON_COLUMNS,
  STANDINGS_KEYS,
  type RaceDatasetKind,
  type StandingsKind,
} from "../datasets/kinds";
import {
  conformTable,
  tableFromRows,
  type Row,
  type Table,
} from "../datasets/table";
import { sleep, type JsonFetcher, type Sleep } from "./http";
import {
  decode,
  extractList,
  raceTableSchema,
  standingsTableSchema,
  type ApiRace,
  type ApiRecord,
} from "./schemas";

export interface Race {
  season: string;
  round: string;
  raceName: string;
  date: string | null;
  circuitId: string;
  circuitName: string | null;
  locality: string | null;
  country: string | null;
}

export interface JolpicaSource {
  fetchPaginated(url: string, keyPath: readonly string[]): Promise<Table>;
  fetchAllSeasons(): Promise<Table>;
  fetchAllDrivers(): Promise<Table>;
  fetchAllConstructors(): Promise<Table>;
  fetchAllCircuits(): Promise<Table>;
  racesForSeason(year: number): Promise<Race[]>;
  fetchRaceDataset(year: number, kind: RaceDatasetKind): Promise<Table>;
  fetchStandings(year: number, kind: StandingsKind): Promise<Table>;
  /** Returns and clears the schema errors skipped since the last call. */
  takeSchemaErrors(): UnexpectedSchemaError[];
}

export interface JolpicaSourceDependencies {
  fetchJson: JsonFetcher;
  sleep?: Sleep;
}

export function createJolpicaSource(
  config: PipelineConfig,
  dependencies: JolpicaSourceDependencies
): JolpicaSource {
  const { fetchJson } = dependencies;
  const wait = dependencies.sleep ?? sleep;
  const baseUrl = config.baseUrl;
  const requestDelayMs = config.requestDelaySeconds * 1000;

  const schemaErrors: UnexpectedSchemaError[] = [];

  function recordSchemaError(error: unknown, context: string) {
    if (!(error instanceof UnexpectedSchemaError)) {
      throw error;
    }
    console.error(`[Export] Skipping ${context}: ${error.message}`);
    schemaErrors.push(error);
  }

  async function fetchPaginated(url: string, keyPath: readonly string[]) {
    const items: ApiRecord[] = [];
    const separator = url.includes("?") ? "&" : "?";
    let offset = 0;

    while (true) {
      const pageUrl = `${url}${separator}limit=${config.batchSize}&offset=${offset}`;
      const outcome = await fetchJson(pageUrl);
      if (!outcome.ok) {
        break;
      }
      let page: ApiRecord[];
      try {
        page = extractList(outcome.body, keyPath, pageUrl);
      } catch (error) {
        recordSchemaError(error, `page at offset ${offset}`);
        break;
      }
      if (!page.length) {
        break;
      }
      items.push(...page);
      offset += config.batchSize;
      if (page.length < config.batchSize) {
        break;
      }
    }

    return flattenTable(tableFromRows(items.map((item) => normalizeRecord(item))));
  }

  async function fetchList(
    resource: string,
    keyPath: readonly string[],
    columns: readonly string[]
  ) {
    const table = await fetchPaginated(`${baseUrl}/${resource}.json`, keyPath);
    return conformTable(table, columns);
  }

  async function racesForSeason(year: number): Promise<Race[]> {
    const url = `${baseUrl}/${year}.json`;
    const outcome = await fetchJson(url);
    if (!outcome.ok) {
      return [];
    }
    return decode(raceTableSchema, outcome.body, url).MRData.RaceTable.Races.map(
      toRace
    );
  }

  /**
   * Walks every round of a season and hands each round payload to
   * `collect`. Rounds whose request fails or whose payload does not decode
   * are skipped; a calendar that does not decode skips the season.
   */
  async function forEachRound(
    year: number,
    kind: RaceDatasetKind | StandingsKind,
    collect: (race: Race, payload: unknown, url: string) => void
  ) {
    let races: Race[];
    try {
      races = await racesForSeason(year);
    } catch (error) {
      recordSchemaError(error, `${kind} for ${year}`);
      return;
    }

    for (const race of races) {
      const url = `${baseUrl}/${year}/${race.round}/${kind}.json`;
      const outcome = await fetchJson(url);
      if (!outcome.ok) {
        console.warn(`[Export] Skipping ${kind} for ${year} round ${race.round}`);
      } else {
        try {
          collect(race, outcome.body, url);
        } catch (error) {
          recordSchemaError(error, `${kind} for ${year} round ${race.round}`);
        }
      }
      await wait(requestDelayMs);
    }
  }

  async function fetchRaceDataset(year: number, kind: RaceDatasetKind) {
    const nestedKey = RACE_DATASET_KEYS[kind];
    const rows: Row[] = [];

    await forEachRound(year, kind, (race, payload, url) => {
      const roundRaces = decode(raceTableSchema, payload, url).MRData.RaceTable
        .Races;
      for (const roundRace of roundRaces) {
        const meta = raceMetadata(year, race, roundRace);
        for (const item of roundRace[nestedKey] ?? []) {
          rows.push({ ...flattenItem(item), ...meta });
        }
      }
    });

    return conformTable(tableFromRows(rows), DATASET_COLUMNS[kind]);
  }

  async function fetchStandings(year: number, kind: StandingsKind) {
    const nestedKey = STANDINGS_KEYS[kind];
    const rows: Row[] = [];

    await forEachRound(year, kind, (race, payload, url) => {
      const lists = decode(standingsTableSchema, payload, url).MRData
        .StandingsTable.StandingsLists;
      for (const list of lists) {
        for (const item of list[nestedKey] ?? []) {
          rows.push({ ...flattenItem(item), season: year, round: race.round });
        }
      }
    });

    return conformTable(tableFromRows(rows), DATASET_COLUMNS[kind]);
  }

  return {
    fetchPaginated,
    fetchAllSeasons: () =>
      fetchList("seasons", ["SeasonTable", "Seasons"], SEASON_COLUMNS),
    fetchAllDrivers: () =>
      fetchList("drivers", ["DriverTable", "Drivers"], DRIVER_LIST_COLUMNS),
    fetchAllConstructors: () =>
      fetchList(
        "constructors",
        ["ConstructorTable", "Constructors"],
        CONSTRUCTOR_LIST_COLUMNS
      ),
    fetchAllCircuits: () =>
      fetchList("circuits", ["CircuitTable", "Circuits"], CIRCUIT_LIST_COLUMNS),
    racesForSeason,
    fetchRaceDataset,
    fetchStandings,
    takeSchemaErrors: () => schemaErrors.splice(0),
  };
}

function toRace(race: ApiRace): Race {
  return {
    season: race.season,
    round: race.round,
    raceName: race.raceName,
    date: race.date ?? null,
    circuitId: race.Circuit.circuitId,
    circuitName: race.Circuit.circuitName ?? null,
    locality: race.Circuit.Location?.locality ?? null,
    country: race.Circuit.Location?.country ?? null,
  };
}

function raceMetadata(year: number, race: Race, roundRace: ApiRace): Row {
  const circuit = toRace(roundRace);
  return {
    season: year,
    round: race.round,
    raceName: race.raceName,
    date: race.date,
    circuit_id: circuit.circuitId,
    circuit_name: circuit.circuitName,
    circuit_location: circuit.locality,
    circuit_country: circuit.country,
  };
}
