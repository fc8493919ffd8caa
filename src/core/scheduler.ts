/**
 * Adaptive Scheduler
 *
 * Maps the latest progress metric to the delay before the next snapshot.
 * Band tables are plain data so the schedule mode is a configuration choice.
 * Stateless: every tick re-evaluates from scratch, so a dip in progress
 * relaxes the cadence immediately.
 */

import { ScheduleDecision, ScheduleMode } from "../types";
import { DAY_MS, HOUR_MS, MINUTE_MS } from "./constants";

export interface ScheduleBand {
  label: string;
  bound: number;
  /** null = no periodic snapshot inside this band */
  intervalMs: number | null;
}

export interface BandTable {
  mode: ScheduleMode;
  /** rising: metric grows toward the target; falling: metric shrinks toward it */
  direction: "rising" | "falling";
  /** Ordered closest-to-target first */
  bands: readonly ScheduleBand[];
  fallback: { label: string; intervalMs: number | null };
  /** Progress re-check delay when the matched band takes no snapshot */
  idleRecheckMs: number;
  /** Metric value at which the target counts as reached */
  stopAt: number;
}

export function percentageBandTable(targetPercent: number = 100): BandTable {
  return {
    mode: "percentage",
    direction: "rising",
    bands: [
      { label: ">=99%", bound: 99, intervalMs: 5 * MINUTE_MS },
      { label: "97-99%", bound: 97, intervalMs: 30 * MINUTE_MS },
      { label: "95-97%", bound: 95, intervalMs: HOUR_MS },
      { label: "90-95%", bound: 90, intervalMs: 4 * HOUR_MS },
      { label: "85-90%", bound: 85, intervalMs: DAY_MS },
    ],
    fallback: { label: "<85%", intervalMs: null },
    idleRecheckMs: HOUR_MS,
    stopAt: targetPercent,
  };
}

export function proximityBandTable(): BandTable {
  return {
    mode: "proximity",
    direction: "falling",
    bands: [
      { label: "<=10 SOL", bound: 10, intervalMs: MINUTE_MS },
      { label: "<=50 SOL", bound: 50, intervalMs: 5 * MINUTE_MS },
      { label: "<=100 SOL", bound: 100, intervalMs: 15 * MINUTE_MS },
    ],
    fallback: { label: ">100 SOL", intervalMs: HOUR_MS },
    idleRecheckMs: HOUR_MS,
    stopAt: 0,
  };
}

export function bandTableFor(mode: ScheduleMode, targetPercent?: number): BandTable {
  return mode === "percentage" ? percentageBandTable(targetPercent) : proximityBandTable();
}

function reaches(table: BandTable, metric: number, bound: number): boolean {
  return table.direction === "rising" ? metric >= bound : metric <= bound;
}

export function decide(metric: number, table: BandTable): ScheduleDecision {
  if (!Number.isFinite(metric)) {
    throw new RangeError(`Progress metric must be finite, got ${metric}`);
  }

  if (reaches(table, metric, table.stopAt)) {
    return Object.freeze({
      nextAttemptAfterMs: 0,
      captureSnapshot: true,
      shouldStop: true,
      band: "target reached",
    });
  }

  const band = table.bands.find((candidate) => reaches(table, metric, candidate.bound)) ?? table.fallback;

  return Object.freeze({
    nextAttemptAfterMs: band.intervalMs ?? table.idleRecheckMs,
    captureSnapshot: band.intervalMs !== null,
    shouldStop: false,
    band: band.label,
  });
}
