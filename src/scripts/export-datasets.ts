import fs from "fs";
import path from "path";
import process from "process";
import { createHttpClient, createJsonFetcher } from "../datasources/http";
import { createJolpicaSource } from "../datasources/jolpica";
import { ConfigError, UsageError } from "../errors";
import { runExport } from "../pipeline";
import { USAGE, loadCliConfig, parseArgs, type CliOptions } from "./options";

async function main() {
  const options = readOptions(process.argv.slice(2));
  if (options.help) {
    console.log(USAGE);
    return;
  }

  const config = loadCliConfig(process.env, options.overrides);
  const outputDir = path.resolve(config.outputDir);
  await fs.promises.mkdir(outputDir, { recursive: true });

  const [startYear, endYear] = config.yearRange;
  console.log(
    `[Export] Fetching F1 data from ${config.baseUrl} for ${startYear}-${endYear}`
  );

  const fetchJson = createJsonFetcher(config, {
    client: createHttpClient(config),
  });
  const source = createJolpicaSource(config, { fetchJson });
  const summary = await runExport(config, source, options.datasets);

  console.log(
    `\n[Export] Wrote ${summary.written.length} files to ${outputDir}` +
      (summary.empty.length ? `, no data for ${summary.empty.join(", ")}` : "")
  );
  if (summary.failed.length) {
    console.error(`[Export] Failed datasets: ${summary.failed.join(", ")}`);
    process.exitCode = 1;
  }
}

function readOptions(argv: string[]): CliOptions {
  try {
    return parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      printUsage(error.message);
    }
    throw error;
  }
}

function printUsage(message: string): never {
  console.error(message);
  console.error(USAGE);
  process.exit(1);
}

main().catch((error) => {
  if (!(error instanceof ConfigError)) {
    console.error("[Export] Failed", error);
  }
  process.exit(1);
});
