export type RaceDatasetKind =
  | "results"
  | "qualifying"
  | "sprint"
  | "pitstops"
  | "laps";

export type StandingsKind = "driverStandings" | "constructorStandings";

export type DatasetKind = RaceDatasetKind | StandingsKind;

export const RACE_DATASET_KEYS = {
  results: "Results",
  qualifying: "QualifyingResults",
  sprint: "SprintResults",
  pitstops: "PitStops",
  laps: "Laps",
} as const satisfies Record<RaceDatasetKind, string>;

export const STANDINGS_KEYS = {
  driverStandings: "DriverStandings",
  constructorStandings: "ConstructorStandings",
} as const satisfies Record<StandingsKind, string>;

export function isStandingsKind(kind: DatasetKind): kind is StandingsKind {
  return kind === "driverStandings" || kind === "constructorStandings";
}

const DRIVER_COLUMNS = [
  "driver_driverId",
  "driver_permanentNumber",
  "driver_code",
  "driver_url",
  "driver_givenName",
  "driver_familyName",
  "driver_dateOfBirth",
  "driver_nationality",
];

const CONSTRUCTOR_COLUMNS = [
  "constructor_constructorId",
  "constructor_url",
  "constructor_name",
  "constructor_nationality",
];

export const RACE_META_COLUMNS = [
  "season",
  "round",
  "raceName",
  "date",
  "circuit_id",
  "circuit_name",
  "circuit_location",
  "circuit_country",
];

export const STANDINGS_META_COLUMNS = ["season", "round"];

export const SEASON_COLUMNS = ["season", "url"];

export const DRIVER_LIST_COLUMNS = [
  "driverId",
  "permanentNumber",
  "code",
  "url",
  "givenName",
  "familyName",
  "dateOfBirth",
  "nationality",
];

export const CONSTRUCTOR_LIST_COLUMNS = [
  "constructorId",
  "url",
  "name",
  "nationality",
];

export const CIRCUIT_LIST_COLUMNS = [
  "circuitId",
  "url",
  "circuitName",
  "Location_lat",
  "Location_long",
  "Location_locality",
  "Location_country",
];

const RESULT_COLUMNS = [
  "number",
  "position",
  "positionText",
  "points",
  ...DRIVER_COLUMNS,
  ...CONSTRUCTOR_COLUMNS,
  "grid",
  "laps",
  "status",
  "time_millis",
  "time_time",
  "FastestLap_rank",
  "FastestLap_lap",
  "FastestLap_time_time",
  "FastestLap_avgSpeed_units",
  "FastestLap_avgSpeed_speed",
];

const QUALIFYING_COLUMNS = [
  "number",
  "position",
  ...DRIVER_COLUMNS,
  ...CONSTRUCTOR_COLUMNS,
  "Q1",
  "Q2",
  "Q3",
];

const SPRINT_COLUMNS = [
  "number",
  "position",
  "positionText",
  "points",
  ...DRIVER_COLUMNS,
  ...CONSTRUCTOR_COLUMNS,
  "grid",
  "laps",
  "status",
  "time_millis",
  "time_time",
  "FastestLap_lap",
  "FastestLap_time_time",
];

const PIT_STOP_COLUMNS = ["driverId", "lap", "stop", "time", "duration"];

const LAP_COLUMNS = ["number", "Timings"];

const DRIVER_STANDING_COLUMNS = [
  "position",
  "positionText",
  "points",
  "wins",
  ...DRIVER_COLUMNS,
  "Constructors",
];

const CONSTRUCTOR_STANDING_COLUMNS = [
  "position",
  "positionText",
  "points",
  "wins",
  ...CONSTRUCTOR_COLUMNS,
];

/** Declared column order per round-scoped dataset, metadata last. */
export const DATASET_COLUMNS: Record<DatasetKind, readonly string[]> = {
  results: [...RESULT_COLUMNS, ...RACE_META_COLUMNS],
  qualifying: [...QUALIFYING_COLUMNS, ...RACE_META_COLUMNS],
  sprint: [...SPRINT_COLUMNS, ...RACE_META_COLUMNS],
  pitstops: [...PIT_STOP_COLUMNS, ...RACE_META_COLUMNS],
  laps: [...LAP_COLUMNS, ...RACE_META_COLUMNS],
  driverStandings: [...DRIVER_STANDING_COLUMNS, ...STANDINGS_META_COLUMNS],
  constructorStandings: [
    ...CONSTRUCTOR_STANDING_COLUMNS,
    ...STANDINGS_META_COLUMNS,
  ],
};
