import { loadConfig, type PipelineConfig } from "../config";
import { ConfigError, UsageError } from "../errors";
import { EXPORT_DATASETS, type ExportName } from "../pipeline";

export const USAGE =
  "Usage: npm run export -- [--year <YYYY> | --from-year <YYYY> --to-year <YYYY>] [--dataset <Name> ...] [--out <dir>] [--batch-size <n>]";

export interface CliOptions {
  help: boolean;
  datasets: ExportName[];
  overrides: Partial<PipelineConfig>;
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const datasets = new Set<ExportName>();
  let year: number | null = null;
  let rangeStart: number | null = null;
  let rangeEnd: number | null = null;
  let outputDir: string | null = null;
  let batchSize: number | null = null;
  let help = false;

  const readNext = (index: number, flag: string) => {
    const value = argv[index + 1];
    if (!value || value.startsWith("-")) {
      throw new UsageError(`${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case "--year":
      case "-y": {
        year = parseInteger(readNext(i, arg), arg);
        i += 1;
        break;
      }
      case "--from-year": {
        rangeStart = parseInteger(readNext(i, arg), arg);
        i += 1;
        break;
      }
      case "--to-year": {
        rangeEnd = parseInteger(readNext(i, arg), arg);
        i += 1;
        break;
      }
      case "--dataset":
      case "-d": {
        datasets.add(resolveDataset(readNext(i, arg)));
        i += 1;
        break;
      }
      case "--out":
      case "-o": {
        outputDir = readNext(i, arg);
        i += 1;
        break;
      }
      case "--batch-size": {
        batchSize = parseInteger(readNext(i, arg), arg);
        i += 1;
        break;
      }
      case "--help":
      case "-h":
        help = true;
        break;
      default:
        throw new UsageError(`Unknown argument: ${arg}`);
    }
  }

  if (year != null && (rangeStart != null || rangeEnd != null)) {
    throw new UsageError("--year cannot be combined with --from-year/--to-year");
  }
  if ((rangeStart == null) !== (rangeEnd == null)) {
    throw new UsageError("--from-year and --to-year must be given together");
  }

  const yearRange: PipelineConfig["yearRange"] | null =
    year != null
      ? [year, year]
      : rangeStart != null && rangeEnd != null
        ? [rangeStart, rangeEnd]
        : null;

  return {
    help,
    datasets: datasets.size
      ? EXPORT_DATASETS.filter((name) => datasets.has(name))
      : [...EXPORT_DATASETS],
    overrides: {
      ...(yearRange ? { yearRange } : {}),
      ...(outputDir ? { outputDir } : {}),
      ...(batchSize != null ? { batchSize } : {}),
    },
  };
}

function parseInteger(value: string, flag: string) {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new UsageError(`${flag} expects an integer, got "${value}"`);
  }
  return parsed;
}

function resolveDataset(value: string): ExportName {
  const match = EXPORT_DATASETS.find(
    (name) => name.toLowerCase() === value.toLowerCase()
  );
  if (!match) {
    throw new UsageError(
      `Unknown dataset "${value}" (expected one of ${EXPORT_DATASETS.join(", ")})`
    );
  }
  return match;
}

/**
 * Resolves the run's configuration from the environment and CLI overrides,
 * reporting validation problems under the `[Config]` tag before rethrowing.
 */
export function loadCliConfig(
  env: NodeJS.ProcessEnv,
  overrides: Partial<PipelineConfig>
): PipelineConfig {
  try {
    return loadConfig(env, overrides);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`[Config] ${error.message}`);
    }
    throw error;
  }
}
