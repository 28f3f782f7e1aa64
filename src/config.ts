import process from "process";
import { z } from "zod";
import { ConfigError } from "./errors";

export const DEFAULT_BASE_URL = "https://api.jolpi.ca/ergast/f1";
export const EARLIEST_SEASON = 1950;

export interface PipelineConfig {
  readonly baseUrl: string;
  readonly outputDir: string;
  /** Page size requested from paginated list endpoints. */
  readonly batchSize: number;
  readonly timeoutSeconds: number;
  /** Attempts per request, including the first one. */
  readonly retries: number;
  /** First 429 backoff, and the fixed delay after any other failure. */
  readonly baseDelaySeconds: number;
  /** Pause after each round-scoped request. */
  readonly requestDelaySeconds: number;
  readonly yearRange: readonly [startYear: number, endYear: number];
}

export const DEFAULT_CONFIG: PipelineConfig = Object.freeze({
  baseUrl: DEFAULT_BASE_URL,
  outputDir: "f1_data",
  batchSize: 1000,
  timeoutSeconds: 60,
  retries: 5,
  baseDelaySeconds: 2,
  requestDelaySeconds: 2,
  yearRange: [2024, 2024] as const,
});

const season = z.number().int().min(EARLIEST_SEASON);

const configSchema = z.object({
  baseUrl: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, "")),
  outputDir: z.string().min(1),
  batchSize: z.number().int().positive(),
  timeoutSeconds: z.number().positive(),
  retries: z.number().int().positive(),
  baseDelaySeconds: z.number().nonnegative(),
  requestDelaySeconds: z.number().nonnegative(),
  yearRange: z
    .tuple([season, season])
    .refine(([start, end]) => start <= end, {
      message: "start year must not be after end year",
    }),
});

export function createConfig(
  overrides: Partial<PipelineConfig> = {}
): PipelineConfig {
  const result = configSchema.safeParse({ ...DEFAULT_CONFIG, ...overrides });
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return Object.freeze(result.data);
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<PipelineConfig> = {}
): PipelineConfig {
  const baseUrl = nonEmpty(env.JOLPICA_BASE_URL);
  const outputDir = nonEmpty(env.F1_DATA_DIR);

  return createConfig({
    ...(baseUrl ? { baseUrl } : {}),
    ...(outputDir ? { outputDir } : {}),
    ...overrides,
  });
}

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}
