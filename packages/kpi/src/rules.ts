import type {
  BerthThresholds,
  LoadType,
  OutgateStressThresholds,
  TerminalCongestionThresholds,
  VolumePressureThresholds,
} from "@berthwatch/shared/validation";
import type { StressFlag, VolumePressureFlag } from "./tables.js";

// Bounds are closed on the HIGH/LOW side so a value read twice never flips between runs.

export function volumePressureFlag(
  index: number,
  thresholds: Pick<VolumePressureThresholds, "high" | "low">,
): VolumePressureFlag {
  if (index >= thresholds.high) return "HIGH";
  if (index <= thresholds.low) return "LOW";
  return "NORMAL";
}

export function terminalCongestionFlag(
  loadType: LoadType,
  congestedPct: number,
  thresholds: Pick<TerminalCongestionThresholds, "loadedHigh" | "emptyHigh">,
): StressFlag {
  const high = loadType === "Loaded" ? thresholds.loadedHigh : thresholds.emptyHigh;
  return congestedPct >= high ? "HIGH" : "NORMAL";
}

export function outgateStressFlag(
  slowPct: number,
  thresholds: Pick<OutgateStressThresholds, "slowHigh">,
): StressFlag {
  return slowPct >= thresholds.slowHigh ? "HIGH" : "NORMAL";
}

export function berthFlag(
  avgTimeAtBerthHours: number,
  thresholds: Pick<BerthThresholds, "highHours">,
): StressFlag {
  return avgTimeAtBerthHours >= thresholds.highHours ? "HIGH" : "NORMAL";
}
