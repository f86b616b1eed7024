import type { RunStamp } from "../../tables.js";

export const stamp: RunStamp = {
  extractionTsUtc: new Date("2024-02-01T06:00:00.000Z"),
  fromDate: "2024-01-01",
  toDate: "2024-01-31",
};

/** Consecutive weeks starting on Monday 2024-01-01. */
export function weeklySeries(teu: number[], start = "2024-01-01") {
  const base = Date.parse(`${start}T00:00:00Z`);
  return teu.map((value, i) => ({
    weekStartDate: new Date(base + i * 7 * 86_400_000).toISOString().slice(0, 10),
    inboundFullTeu: value,
  }));
}
