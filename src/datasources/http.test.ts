import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createConfig } from "../config";
import { TEST_BASE_URL } from "../testing/fixtures";
import { createMockApi, ok, recordingSleep } from "../testing/mock-api";
import { createJsonFetcher } from "./http";

const CALENDAR_URL = `${TEST_BASE_URL}/2024.json`;
const config = createConfig({ baseUrl: TEST_BASE_URL });

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createJsonFetcher", () => {
  it("returns the parsed body on 200", async () => {
    const api = createMockApi({ [CALENDAR_URL]: ok({ MRData: {} }) });
    const { delays, sleep } = recordingSleep();
    const fetchJson = createJsonFetcher(config, { client: api.client, sleep });

    await expect(fetchJson(CALENDAR_URL)).resolves.toEqual({
      ok: true,
      body: { MRData: {} },
    });
    expect(api.requests).toEqual([CALENDAR_URL]);
    expect(delays).toEqual([]);
  });

  it("backs off exponentially on consecutive 429s", async () => {
    const api = createMockApi({
      [CALENDAR_URL]: [{ status: 429 }, { status: 429 }, ok({ MRData: {} })],
    });
    const { delays, sleep } = recordingSleep();
    const fetchJson = createJsonFetcher(config, { client: api.client, sleep });

    await expect(fetchJson(CALENDAR_URL)).resolves.toEqual({
      ok: true,
      body: { MRData: {} },
    });
    expect(api.requests).toHaveLength(3);
    expect(delays).toEqual([2000, 4000]);
  });

  it("waits the base delay after other failures and resets the backoff", async () => {
    const api = createMockApi({
      [CALENDAR_URL]: [
        { status: 429 },
        { status: 500 },
        { networkError: "socket hang up" },
        { status: 429 },
        ok([]),
      ],
    });
    const { delays, sleep } = recordingSleep();
    const fetchJson = createJsonFetcher(config, { client: api.client, sleep });

    await expect(fetchJson(CALENDAR_URL)).resolves.toEqual({
      ok: true,
      body: [],
    });
    expect(delays).toEqual([2000, 2000, 2000, 2000]);
  });

  it("reports failure once the retry budget is spent", async () => {
    const api = createMockApi({ [CALENDAR_URL]: { status: 503 } });
    const { delays, sleep } = recordingSleep();
    const fetchJson = createJsonFetcher(config, { client: api.client, sleep });

    await expect(fetchJson(CALENDAR_URL)).resolves.toEqual({ ok: false });
    expect(api.requests).toHaveLength(5);
    expect(delays).toEqual([2000, 2000, 2000, 2000]);
    expect(console.error).toHaveBeenCalledWith(
      `[Jolpica] GET ${CALENDAR_URL} FAILED after 5 attempts`
    );
  });

  it("honours a smaller retry budget and delay", async () => {
    const small = createConfig({
      baseUrl: TEST_BASE_URL,
      retries: 2,
      baseDelaySeconds: 0.5,
    });
    const api = createMockApi({ [CALENDAR_URL]: { status: 429 } });
    const { delays, sleep } = recordingSleep();
    const fetchJson = createJsonFetcher(small, { client: api.client, sleep });

    await expect(fetchJson(CALENDAR_URL)).resolves.toEqual({ ok: false });
    expect(api.requests).toHaveLength(2);
    expect(delays).toEqual([500]);
  });
});
