import type { BerthRow, HealthSummaryRow, VolumePressureRow } from "@berthwatch/kpi";
import { BerthwatchError } from "@berthwatch/shared/errors";
import { getTableName } from "drizzle-orm";
import type { PgTable } from "drizzle-orm/pg-core";
import { describe, expect, it, vi } from "vitest";
import type { Database } from "../client.js";
import { PostgresKpiSink, toBerthInsert, toVolumePressureInsert } from "../writer.js";

const extractionTsUtc = new Date("2024-02-01T06:00:00.000Z");

const volumeRow: VolumePressureRow = {
  week_start_date: "2024-01-29",
  inbound_full_teu: 130,
  rolling_4w_avg_teu: 112.5,
  volume_pressure_index: 130 / 112.5,
  window_weeks: 4,
  flag: "HIGH",
  extraction_ts_utc: extractionTsUtc,
  from_date: null,
  to_date: null,
};

const summaryRow: HealthSummaryRow = {
  volume_pressure_flag: "HIGH",
  terminal_congestion_loaded_flag: "NORMAL",
  terminal_congestion_empty_flag: "UNKNOWN",
  outgate_stress_high_statuses: "NONE",
  berth_flag: "NORMAL",
  extraction_ts_utc: extractionTsUtc,
};

function createFakeDb(options: { failInsert?: boolean } = {}) {
  const statements: string[] = [];
  const inserted = new Map<string, unknown[]>();

  const tx = {
    delete: vi.fn(async (table: PgTable) => {
      statements.push(`delete ${getTableName(table)}`);
    }),
    insert: vi.fn((table: PgTable) => ({
      values: vi.fn(async (values: unknown[]) => {
        if (options.failInsert) throw new Error("relation does not exist");
        statements.push(`insert ${getTableName(table)}`);
        inserted.set(getTableName(table), values);
      }),
    })),
  };
  const db = {
    transaction: vi.fn(async (fn: (t: typeof tx) => Promise<void>) => fn(tx)),
  };

  return { db: db as unknown as Database, tx, statements, inserted };
}

describe("row mappers", () => {
  it("maps volume rows to insert values", () => {
    expect(toVolumePressureInsert(volumeRow)).toEqual({
      weekStartDate: "2024-01-29",
      inboundFullTeu: 130,
      rolling4wAvgTeu: 112.5,
      volumePressureIndex: 130 / 112.5,
      windowWeeks: 4,
      flag: "HIGH",
      extractionTsUtc,
      fromDate: null,
      toDate: null,
    });
  });

  it("keeps null vessel fields on berth summary rows", () => {
    const row: BerthRow = {
      record_type: "summary",
      rank: null,
      vessel: null,
      terminal: null,
      time_at_berth_hours: null,
      avg_time_at_berth_hours: 22.5,
      flag: "NORMAL",
      extraction_ts_utc: extractionTsUtc,
      from_date: "2024-01-01",
      to_date: null,
    };
    expect(toBerthInsert(row)).toMatchObject({
      recordType: "summary",
      rank: null,
      vessel: null,
      timeAtBerthHours: null,
      avgTimeAtBerthHours: 22.5,
      fromDate: "2024-01-01",
    });
  });
});

describe("PostgresKpiSink", () => {
  it("replaces each provided table inside one transaction", async () => {
    const fake = createFakeDb();
    const logger = { info: vi.fn() };

    await new PostgresKpiSink(fake.db, logger).writeTables({
      volumePressure: [volumeRow],
      healthSummary: [summaryRow],
    });

    expect(fake.db.transaction).toHaveBeenCalledOnce();
    expect(fake.statements).toEqual([
      "delete kpi_weekly_volume_pressure",
      "insert kpi_weekly_volume_pressure",
      "delete kpi_health_summary",
      "insert kpi_health_summary",
    ]);
    expect(fake.inserted.get("kpi_health_summary")).toEqual([
      {
        volumePressureFlag: "HIGH",
        terminalCongestionLoadedFlag: "NORMAL",
        terminalCongestionEmptyFlag: "UNKNOWN",
        outgateStressHighStatuses: "NONE",
        berthFlag: "NORMAL",
        extractionTsUtc,
      },
    ]);
    expect(logger.info).toHaveBeenCalledWith(
      { table: "kpi_weekly_volume_pressure", rows: 1 },
      "Replaced KPI table",
    );
  });

  it("clears a table without inserting when it has no rows", async () => {
    const fake = createFakeDb();
    await new PostgresKpiSink(fake.db).writeTables({ volumePressure: [] });

    expect(fake.statements).toEqual(["delete kpi_weekly_volume_pressure"]);
    expect(fake.tx.insert).not.toHaveBeenCalled();
  });

  it("leaves tables absent from the input untouched", async () => {
    const fake = createFakeDb();
    await new PostgresKpiSink(fake.db).writeTables({ healthSummary: [summaryRow] });

    expect(fake.tx.delete).toHaveBeenCalledOnce();
    expect(fake.statements).not.toContain("delete kpi_berth_snapshot");
  });

  it("wraps database errors", async () => {
    const fake = createFakeDb({ failInsert: true });
    const write = new PostgresKpiSink(fake.db).writeTables({ healthSummary: [summaryRow] });

    await expect(write).rejects.toThrow(BerthwatchError);
    await expect(write).rejects.toMatchObject({
      code: "BW-4001",
      message: "relation does not exist",
      metadata: { tables: ["healthSummary"] },
    });
  });
});
