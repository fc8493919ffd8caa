/**
 * Shared type definitions for the holder snapshot monitor
 */

/**
 * How progress toward the target is measured.
 * - percentage: bonding-curve completion, grows toward the target
 * - proximity: SOL of market cap still missing, shrinks toward zero
 */
export type ScheduleMode = "percentage" | "proximity";

export interface ProgressReading {
  readonly mode: ScheduleMode;
  readonly percentageOrProximity: number;
  readonly solVolume: number;
  readonly timestampObserved: Date;
  /** Market cap in SOL, known in proximity mode */
  readonly marketCapSol?: number;
}

export interface ProgressSource {
  readonly mode: ScheduleMode;
  read(): Promise<ProgressReading>;
}

/**
 * A validated holder entry. Balance is in raw token units.
 */
export interface HolderRecord {
  readonly address: string;
  readonly balance: bigint;
}

/**
 * Account record as handed over by a provider, before validation
 */
export interface RawHolderRecord {
  address: unknown;
  balance: unknown;
}

export interface Snapshot {
  readonly mint: string;
  readonly holders: readonly HolderRecord[];
  readonly totalSupplyObserved: bigint;
  readonly holderCount: number;
  /** null when the baseline was taken while the progress source was down */
  readonly progress: ProgressReading | null;
  readonly targetReached: boolean;
  readonly capturedAt: Date;
}

export interface RetryState {
  endpointIndex: number;
  consecutiveFailures: number;
  currentDelayMs: number;
  /** Epoch ms until which the endpoint is skipped */
  circuitOpenUntil: number | null;
}

export interface ScheduleDecision {
  readonly nextAttemptAfterMs: number;
  readonly captureSnapshot: boolean;
  readonly shouldStop: boolean;
  readonly band: string;
}

export interface SnapshotArtifacts {
  csvPath: string;
  infoPath: string;
}

export interface SnapshotSink {
  write(snapshot: Snapshot): Promise<SnapshotArtifacts>;
}

export type HolderSourceKind = "das" | "program-accounts" | "largest-accounts";
