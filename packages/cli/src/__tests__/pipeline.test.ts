import type { KpiSink } from "@berthwatch/db/writer";
import type { KpiTables } from "@berthwatch/kpi";
import { MalformedInputError } from "@berthwatch/shared/errors";
import { pino } from "pino";
import { describe, expect, it, vi } from "vitest";
import { type JsonSource, runPipeline } from "../pipeline.js";
import { loadConfig } from "../util/config.js";

const logger = pino({ level: "silent" });
const now = new Date("2024-02-01T06:00:00.000Z");

const config = loadConfig({
  SOURCE_BASE_URL: "https://vendor.test",
  SOURCE_WEEKLY_VOLUMES_URL: "/weekly",
  SOURCE_CONTAINERS_AT_TERMINAL_URL: "/terminal",
  SOURCE_OUTGATED_METRICS_URL: "/outgate",
  SOURCE_BERTH_URL: "/berth",
  SOURCE_BERTH_PAYLOAD: '{"terminal":"T1"}',
  FROM_DATE: "2024-01-01",
});

const weekly = {
  weeklyVolumesComparison: [
    { weekStartDate: "2024-01-01", inboundFullContainers: 100 },
    { weekStartDate: "2024-01-08", inboundFullContainers: 110 },
    { weekStartDate: "2024-01-15", inboundFullContainers: 90 },
    { weekStartDate: "2024-01-22", inboundFullContainers: 120 },
    { weekStartDate: "2024-01-29", inboundFullContainers: 130 },
  ],
};

const terminal = {
  ContainersAtTerminalData: [
    { loadType: "Loaded", bucket: "0-4 Days", containers: 70 },
    { loadType: "Loaded", bucket: "9-12 Days", containers: 20 },
    { loadType: "Loaded", bucket: "13+ Days", containers: 10 },
    { loadType: "Empty", bucket: "0-4 Days", containers: 40 },
    { loadType: "Empty", bucket: "13+ Days", containers: 10 },
  ],
};

const outgate = {
  FetchOutgatedContainerMetricsData: [
    { status: "Import", bucket: "0-4 Days", containers: 60 },
    { status: "Import", bucket: "5-8 Days", containers: 40 },
    { status: "Export", bucket: "0-4 Days", containers: 90 },
    { status: "Export", bucket: "13+ Days", containers: 10 },
  ],
};

const berth = {
  FetchQuickviewDashboardBerthData: [
    { vessel: "MV Alpha", terminal: "T1", timeAtBerthHours: 30 },
    { vessel: "MV Bravo", terminal: "T1", timeAtBerthHours: 10 },
  ],
};

class StubSource implements JsonSource {
  readonly calls: Array<[string, Record<string, unknown> | null]> = [];

  constructor(private readonly payloads: Record<string, unknown>) {}

  async fetchJson(endpoint: string, payload: Record<string, unknown> | null = null) {
    this.calls.push([endpoint, payload]);
    return this.payloads[endpoint];
  }
}

function createSink() {
  const writes: Partial<KpiTables>[] = [];
  const sink: KpiSink = {
    writeTables: vi.fn(async (tables: Partial<KpiTables>) => {
      writes.push(tables);
    }),
  };
  return { sink, writes };
}

const payloads = { "/weekly": weekly, "/terminal": terminal, "/outgate": outgate, "/berth": berth };

describe("runPipeline", () => {
  it("fetches each endpoint in order with its payload", async () => {
    const source = new StubSource(payloads);
    await runPipeline({ config, source, sink: null, logger, now: () => now });

    expect(source.calls).toEqual([
      ["/weekly", null],
      ["/terminal", null],
      ["/outgate", null],
      ["/berth", { terminal: "T1" }],
    ]);
  });

  it("builds and writes every KPI table", async () => {
    const { sink, writes } = createSink();
    const result = await runPipeline({
      config,
      source: new StubSource(payloads),
      sink,
      logger,
      now: () => now,
    });

    expect(result.written).toBe(true);
    expect(result.failures).toEqual([]);
    expect(result.skippedWeeks).toEqual(["2024-01-01", "2024-01-08", "2024-01-15"]);
    expect(result.stamp).toEqual({ extractionTsUtc: now, fromDate: "2024-01-01", toDate: null });

    expect(writes).toHaveLength(1);
    expect(Object.keys(writes[0]).sort()).toEqual([
      "berth",
      "healthSummary",
      "outgateStress",
      "terminalCongestion",
      "volumePressure",
    ]);
    expect(result.tables.healthSummary).toEqual([
      {
        volume_pressure_flag: "HIGH",
        terminal_congestion_loaded_flag: "HIGH",
        terminal_congestion_empty_flag: "NORMAL",
        outgate_stress_high_statuses: "Import",
        berth_flag: "NORMAL",
        extraction_ts_utc: now,
      },
    ]);
    expect(result.tables.berth?.map((r) => r.vessel)).toEqual([null, "MV Alpha", "MV Bravo"]);
  });

  it("skips the write on a dry run", async () => {
    const result = await runPipeline({
      config,
      source: new StubSource(payloads),
      sink: null,
      logger,
    });

    expect(result.written).toBe(false);
    expect(result.tables.volumePressure).toHaveLength(2);
  });

  it("writes the remaining tables when one has an empty bucket set", async () => {
    const { sink, writes } = createSink();
    const result = await runPipeline({
      config,
      source: new StubSource({
        ...payloads,
        "/terminal": [{ loadType: "Loaded", bucket: "0-4 Days", containers: 0 }],
      }),
      sink,
      logger,
    });

    expect(result.failures.map((f) => f.table)).toEqual(["kpi_terminal_congestion"]);
    expect(result.failures[0].error.category).toBe("Loaded");
    expect(writes[0].terminalCongestion).toBeUndefined();
    expect(writes[0].volumePressure).toHaveLength(2);
    expect(result.tables.healthSummary?.[0].terminal_congestion_loaded_flag).toBe("UNKNOWN");
  });

  it("reports UNKNOWN volume pressure when the newest week has no full window", async () => {
    const gapped = {
      weeklyVolumesComparison: [
        ...weekly.weeklyVolumesComparison,
        { weekStartDate: "2024-02-12", inboundFullContainers: 140 },
      ],
    };
    const result = await runPipeline({
      config,
      source: new StubSource({ ...payloads, "/weekly": gapped }),
      sink: null,
      logger,
    });

    expect(result.skippedWeeks).toEqual(["2024-01-01", "2024-01-08", "2024-01-15", "2024-02-12"]);
    expect(result.tables.volumePressure?.at(-1)?.week_start_date).toBe("2024-01-29");
    expect(result.tables.healthSummary?.[0].volume_pressure_flag).toBe("UNKNOWN");
  });

  it("aborts before writing when a payload is malformed", async () => {
    const { sink } = createSink();
    const run = runPipeline({
      config,
      source: new StubSource({ ...payloads, "/berth": { unexpected: true } }),
      sink,
      logger,
    });

    await expect(run).rejects.toBeInstanceOf(MalformedInputError);
    expect(sink.writeTables).not.toHaveBeenCalled();
  });
});
