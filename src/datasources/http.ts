import axios, { type AxiosInstance } from "axios";
import type { PipelineConfig } from "../config";

export type Sleep = (ms: number) => Promise<void>;

export type FetchOutcome = { ok: true; body: unknown } | { ok: false };

export type JsonFetcher = (url: string) => Promise<FetchOutcome>;

export interface FetcherDependencies {
  client?: AxiosInstance;
  sleep?: Sleep;
}

export async function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

export function createHttpClient(config: PipelineConfig): AxiosInstance {
  return axios.create({
    timeout: config.timeoutSeconds * 1000,
    headers: { Accept: "application/json" },
  });
}

export function createJsonFetcher(
  config: PipelineConfig,
  dependencies: FetcherDependencies = {}
): JsonFetcher {
  const client = dependencies.client ?? createHttpClient(config);
  const wait = dependencies.sleep ?? sleep;
  const baseDelayMs = config.baseDelaySeconds * 1000;
  const maxAttempts = config.retries;

  return async function fetchJson(url: string): Promise<FetchOutcome> {
    // Grows only across back-to-back 429s.
    let backoff = baseDelayMs;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      let delay = baseDelayMs;

      try {
        const response = await client.get<unknown>(url);
        if (response.status === 200) {
          console.log(`[Jolpica] GET ${url} -> 200`);
          return { ok: true, body: response.data };
        }
        backoff = baseDelayMs;
        console.warn(
          `[Jolpica] GET ${url} -> ${response.status} (attempt ${attempt}/${maxAttempts})`
        );
      } catch (error) {
        const status = axios.isAxiosError(error)
          ? error.response?.status ?? "ERR"
          : "ERR";
        const message =
          error instanceof Error
            ? error.message
            : "Unknown error while contacting the API";

        if (status === 429) {
          delay = backoff;
          backoff *= 2;
          console.warn(
            `[Jolpica] 429 for ${url} (attempt ${attempt}/${maxAttempts}), backing off ${delay}ms`
          );
        } else {
          backoff = baseDelayMs;
          console.warn(
            `[Jolpica] ${status} for ${url} (attempt ${attempt}/${maxAttempts}): ${message}`
          );
        }
      }

      if (attempt < maxAttempts) {
        await wait(delay);
      }
    }

    console.error(`[Jolpica] GET ${url} FAILED after ${maxAttempts} attempts`);
    return { ok: false };
  };
}
