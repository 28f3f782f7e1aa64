import { afterEach, describe, expect, it, vi } from "vitest";
import {
  flattenColumnName,
  flattenItem,
  flattenRow,
  flattenTable,
  normalizeRecord,
} from "./flatten";
import { tableFromRows, type Table } from "./table";

describe("flattenColumnName", () => {
  it("maps nested driver and time paths to prefixed columns", () => {
    expect(flattenColumnName("Driver.familyName")).toBe("driver_familyName");
    expect(flattenColumnName("Time.millis")).toBe("time_millis");
  });

  it("renames every known prefix, wherever it occurs", () => {
    expect(flattenColumnName("Constructor.name")).toBe("constructor_name");
    expect(flattenColumnName("Circuit.Location.country")).toBe(
      "circuit_Location_country"
    );
    expect(flattenColumnName("FastestLap.Time.time")).toBe(
      "FastestLap_time_time"
    );
    expect(flattenColumnName("FastestLap.AverageSpeed.speed")).toBe(
      "FastestLap_avgSpeed_speed"
    );
  });

  it("leaves plain columns alone", () => {
    expect(flattenColumnName("positionText")).toBe("positionText");
    expect(flattenColumnName("Constructors")).toBe("Constructors");
  });
});

describe("normalizeRecord", () => {
  it("expands nested objects into dot paths and keeps arrays as values", () => {
    const timings = [{ driverId: "a", position: "1", time: "1:30.000" }];
    expect(
      normalizeRecord({
        number: "1",
        Driver: { driverId: "a", Extra: { code: "AAA" } },
        Timings: timings,
        note: null,
      })
    ).toEqual({
      number: "1",
      "Driver.driverId": "a",
      "Driver.Extra.code": "AAA",
      Timings: timings,
      note: null,
    });
  });
});

describe("flattenItem", () => {
  it("normalizes and renames in one step", () => {
    expect(
      flattenItem({ lap: "3", Time: { time: "1:31.2" }, Driver: { code: "X" } })
    ).toEqual({ lap: "3", time_time: "1:31.2", driver_code: "X" });
  });
});

describe("flattenTable", () => {
  const table: Table = tableFromRows([
    { "Driver.familyName": "Alpha", "Time.millis": "100", status: "Finished" },
    { "Driver.familyName": "Beta", "AverageSpeed.speed": "200" },
  ]);

  it("renames columns in order without touching values", () => {
    const flat = flattenTable(table);
    expect(flat.columns).toEqual([
      "driver_familyName",
      "time_millis",
      "status",
      "avgSpeed_speed",
    ]);
    expect(flat.rows).toEqual([
      { driver_familyName: "Alpha", time_millis: "100", status: "Finished" },
      { driver_familyName: "Beta", avgSpeed_speed: "200" },
    ]);
  });

  it("is idempotent", () => {
    const tables: Table[] = [
      table,
      tableFromRows([{ "Constructor.Circuit.Time.x": 1, "a.b.c": 2 }]),
      tableFromRows([{ driver_code: "lower", Driver_code: "upper" }]),
      tableFromRows([]),
    ];
    for (const candidate of tables) {
      const once = flattenTable(candidate);
      expect(flattenTable(once)).toEqual(once);
    }
  });
});

describe("flattenRow", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("warns when two keys land on the same column and keeps the later value", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const row = flattenRow({ driver_code: "lower", Driver_code: "upper" });

    expect(row).toEqual({ driver_code: "upper" });
    expect(warn).toHaveBeenCalledWith(
      "[Export] Column driver_code appears more than once; keeping the value of Driver_code"
    );
  });

  it("stays quiet for distinct columns", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    expect(flattenRow({ "Driver.code": "VER", position: "1" })).toEqual({
      driver_code: "VER",
      position: "1",
    });
    expect(warn).not.toHaveBeenCalled();
  });
});
