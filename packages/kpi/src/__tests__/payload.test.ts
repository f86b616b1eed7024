import { MalformedInputError } from "@berthwatch/shared/errors";
import { describe, expect, it } from "vitest";
import {
  parseBerthVessels,
  parseOutgateMetrics,
  parseTerminalContainers,
  parseWeeklyVolumes,
} from "../payload.js";

function captureError(fn: () => unknown): MalformedInputError {
  try {
    fn();
  } catch (err) {
    if (err instanceof MalformedInputError) return err;
    throw err;
  }
  throw new Error("expected a MalformedInputError");
}

describe("parseWeeklyVolumes", () => {
  it("reads the named envelope and field aliases", () => {
    const records = parseWeeklyVolumes({
      weeklyVolumesComparison: [
        { week: "2024-01-01", inboundFullContainers: "100" },
        { weekStartDate: "2024-01-08T00:00:00Z", inbound_full_teu: 110 },
      ],
    });
    expect(records).toEqual([
      { weekStartDate: "2024-01-01", inboundFullTeu: 100 },
      { weekStartDate: "2024-01-08", inboundFullTeu: 110 },
    ]);
  });

  it("accepts a bare list", () => {
    expect(parseWeeklyVolumes([{ date: 1704067200, inboundFullTEU: 5 }])).toEqual([
      { weekStartDate: "2024-01-01", inboundFullTeu: 5 },
    ]);
  });

  it("skips null aliases in favour of the next one", () => {
    const payload = { data: [{ week: null, date: "2024-01-15", inboundFullTeu: 1 }] };
    expect(parseWeeklyVolumes(payload)).toEqual([
      { weekStartDate: "2024-01-15", inboundFullTeu: 1 },
    ]);
  });

  it("rejects a payload without a list", () => {
    const err = captureError(() => parseWeeklyVolumes({ weekly: [] }));
    expect(err.message).toBe(
      "Expected a list payload under one of: weeklyVolumesComparison, data, items",
    );
    expect(err.domain).toBe("weekly_volumes");
  });

  it("rejects an empty list", () => {
    const err = captureError(() => parseWeeklyVolumes({ items: [] }));
    expect(err.message).toBe("weekly_volumes payload returned no rows");
  });

  it("rejects items that are not objects", () => {
    const err = captureError(() => parseWeeklyVolumes([42]));
    expect(err.message).toBe("weekly_volumes item 0 is not an object");
  });

  it("names the failing item and field", () => {
    const err = captureError(() =>
      parseWeeklyVolumes([
        { week: "2024-01-01", inboundFullTeu: 1 },
        { week: "2024-01-08" },
      ]),
    );
    expect(err.message).toMatch(/^weekly_volumes item 1 failed validation: inboundFullTeu: /);
    expect(err.metadata?.index).toBe(1);
  });

  it("rejects negative volumes", () => {
    const err = captureError(() =>
      parseWeeklyVolumes([{ week: "2024-01-01", inboundFullTeu: -3 }]),
    );
    expect(err.metadata?.index).toBe(0);
  });

  it("rejects a week date that does not exist", () => {
    const err = captureError(() => parseWeeklyVolumes([{ week: "2024-02-30", inboundFullTeu: 1 }]));
    expect(err.message).toBe(
      "weekly_volumes item 0 failed validation: weekStartDate: Unable to parse date: 2024-02-30",
    );
  });

  it("rejects duplicate weeks", () => {
    const err = captureError(() =>
      parseWeeklyVolumes([
        { week: "2024-01-01", inboundFullTeu: 1 },
        { week: "2024-01-01T12:00:00Z", inboundFullTeu: 2 },
      ]),
    );
    expect(err.message).toBe("Duplicate week 2024-01-01");
  });
});

describe("parseTerminalContainers", () => {
  it("reads aliases and normalizes the load type", () => {
    expect(
      parseTerminalContainers({
        ContainersAtTerminalData: [
          { status: "loaded", agingBucket: "0-4 Days", value: 5 },
          { load_type: "EMPTY", aging_bucket: "13+ Days", containerCount: "2" },
        ],
      }),
    ).toEqual([
      { loadType: "Loaded", bucket: "0-4 Days", containers: 5 },
      { loadType: "Empty", bucket: "13+ Days", containers: 2 },
    ]);
  });

  it("rejects a non-numeric count", () => {
    const err = captureError(() =>
      parseTerminalContainers([{ loadType: "Loaded", bucket: "0-4 Days", containers: "many" }]),
    );
    expect(err.metadata).toMatchObject({ domain: "terminal_congestion", index: 0 });
    expect(err.message).toMatch(/^terminal_congestion item 0 failed validation: containers: /);
  });

  it("rejects an unknown load type", () => {
    const err = captureError(() =>
      parseTerminalContainers([{ loadType: "Reefer", bucket: "0-4 Days", containers: 1 }]),
    );
    expect(err.domain).toBe("terminal_congestion");
    expect(err.message).toBe(
      'terminal_congestion item 0 failed validation: loadType: Unknown load type "Reefer" (expected Loaded or Empty)',
    );
  });
});

describe("parseOutgateMetrics", () => {
  it("reads aliases", () => {
    expect(
      parseOutgateMetrics({
        data: [{ containerStatus: " Import ", ageBucket: "5-8 Days", count: "7" }],
      }),
    ).toEqual([{ status: "Import", bucket: "5-8 Days", containers: 7 }]);
  });

  it("rejects a blank bucket", () => {
    const err = captureError(() =>
      parseOutgateMetrics([{ status: "Import", bucket: " ", containers: 1 }]),
    );
    expect(err.message).toMatch(/^outgate_stress item 0 failed validation: bucket: /);
  });
});

describe("parseBerthVessels", () => {
  it("reads aliases and blanks a missing terminal", () => {
    expect(
      parseBerthVessels({
        FetchQuickviewDashboardBerthData: [
          { vesselName: "MV Alpha", hoursAtBerth: 12.5, terminalName: " " },
          { name: "MV Bravo", hours: "3", terminal: "T2" },
        ],
      }),
    ).toEqual([
      { vessel: "MV Alpha", terminal: null, timeAtBerthHours: 12.5 },
      { vessel: "MV Bravo", terminal: "T2", timeAtBerthHours: 3 },
    ]);
  });

  it("reads the vessels envelope", () => {
    const payload = { vessels: [{ vessel: "MV Charlie", timeAtBerthHours: 1 }] };
    expect(parseBerthVessels(payload)).toEqual([
      { vessel: "MV Charlie", terminal: null, timeAtBerthHours: 1 },
    ]);
  });
});
