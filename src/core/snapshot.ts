import { ProgressReading, Snapshot } from "../types";
import { AggregateResult } from "./aggregator";

export interface BuildSnapshotInput {
  mint: string;
  aggregation: AggregateResult;
  progress: ProgressReading | null;
  targetReached: boolean;
  capturedAt: Date;
}

/**
 * Assemble an immutable snapshot from an aggregation result
 */
export function buildSnapshot(input: BuildSnapshotInput): Snapshot {
  return Object.freeze({
    mint: input.mint,
    holders: Object.freeze([...input.aggregation.holders]),
    totalSupplyObserved: input.aggregation.totalSupplyObserved,
    holderCount: input.aggregation.holderCount,
    progress: input.progress,
    targetReached: input.targetReached,
    capturedAt: new Date(input.capturedAt.getTime()),
  });
}

/**
 * snapshot_YYYYMMDD_HHMMSS in UTC
 */
export function snapshotBaseName(capturedAt: Date): string {
  const pad = (value: number): string => String(value).padStart(2, "0");
  const date = `${capturedAt.getUTCFullYear()}${pad(capturedAt.getUTCMonth() + 1)}${pad(capturedAt.getUTCDate())}`;
  const time = `${pad(capturedAt.getUTCHours())}${pad(capturedAt.getUTCMinutes())}${pad(capturedAt.getUTCSeconds())}`;
  return `snapshot_${date}_${time}`;
}
