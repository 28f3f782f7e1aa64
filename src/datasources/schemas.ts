import { z } from "zod";
import { UnexpectedSchemaError } from "../errors";
import { isPlainObject } from "../datasets/flatten";

export type ApiRecord = Record<string, unknown>;

const apiRecordList = z.array(z.record(z.unknown()));

const locationSchema = z.object({
  locality: z.string().optional(),
  country: z.string().optional(),
});

const circuitSchema = z.object({
  circuitId: z.string(),
  circuitName: z.string().optional(),
  Location: locationSchema.optional(),
});

const raceSchema = z.object({
  season: z.string(),
  round: z.string(),
  raceName: z.string(),
  date: z.string().optional(),
  Circuit: circuitSchema,
  Results: apiRecordList.optional(),
  QualifyingResults: apiRecordList.optional(),
  SprintResults: apiRecordList.optional(),
  PitStops: apiRecordList.optional(),
  Laps: apiRecordList.optional(),
});

export const raceTableSchema = z.object({
  MRData: z.object({
    RaceTable: z.object({
      Races: z.array(raceSchema),
    }),
  }),
});

const standingsListSchema = z.object({
  season: z.string(),
  round: z.string(),
  DriverStandings: apiRecordList.optional(),
  ConstructorStandings: apiRecordList.optional(),
});

export const standingsTableSchema = z.object({
  MRData: z.object({
    StandingsTable: z.object({
      StandingsLists: z.array(standingsListSchema),
    }),
  }),
});

export type ApiRace = z.infer<typeof raceSchema>;
export type ApiStandingsList = z.infer<typeof standingsListSchema>;

export function decode<Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
  payload: unknown,
  url: string,
  at: readonly string[] = []
): Output {
  const result = schema.safeParse(payload);
  if (result.success) {
    return result.data;
  }
  const issue = result.error.issues[0];
  const issuePath = [...at, ...(issue?.path ?? []).map(String)];
  throw new UnexpectedSchemaError(
    url,
    issuePath.join(".") || "(root)",
    issue?.message
  );
}

/** Walks `MRData.<keyPath>` and returns the list of records found there. */
export function extractList(
  payload: unknown,
  keyPath: readonly string[],
  url: string
): ApiRecord[] {
  const walked: string[] = [];
  let current = payload;

  for (const key of ["MRData", ...keyPath]) {
    walked.push(key);
    if (!isPlainObject(current) || !(key in current)) {
      throw new UnexpectedSchemaError(url, walked.join("."), "missing key");
    }
    current = current[key];
  }

  return decode(apiRecordList, current, url, walked);
}
