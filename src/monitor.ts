/**
 * Snapshot Monitor
 *
 * Orchestration loop that composes the progress source, scheduler,
 * holder client, aggregator and sink.
 * - Unconditional baseline snapshot on start
 * - Adaptive cadence from the band table
 * - Final snapshot when the target is reached, then stop
 * - Cooperative cancellation through AbortSignal or stop()
 */

import { Connection } from "@solana/web3.js";
import { ProgressReading, ProgressSource, RawHolderRecord, ScheduleDecision, SnapshotSink } from "./types";
import { BandTable, bandTableFor, decide } from "./core/scheduler";
import { aggregate } from "./core/aggregator";
import { buildSnapshot } from "./core/snapshot";
import { HOUR_MS, MINUTE_MS } from "./core/constants";
import { Clock, systemClock, toError } from "./network/rpc-utils";
import { createLogger } from "./utils/logger";
import { MonitorConfig } from "./utils/env-validator";
import { FileSnapshotSink } from "./utils/snapshot-writer";
import { ResilientHolderClient } from "./managers/holder-client";
import { createAccountDataProvider } from "./network";
import { createProgressSource } from "./progress";

const log = createLogger("monitor");

export type MonitorState = "idle" | "polling" | "fetching" | "persisting" | "sleeping" | "stopped";

/**
 * What the loop needs from the holder client
 */
export interface HolderFetcher {
  fetchAllHolders(mint: string, signal?: AbortSignal): Promise<RawHolderRecord[]>;
}

export interface MonitorOptions {
  mint: string;
  progressSource: ProgressSource;
  holders: HolderFetcher;
  sink: SnapshotSink;
  table: BandTable;
  minTokenAmount?: bigint;
  supplyAdjustment?: bigint;
  /** Wait after a failed progress read */
  progressRetryMs?: number;
  /** Wait after a failed baseline or final snapshot */
  captureRetryMs?: number;
  clock?: Clock;
  /** Take the baseline snapshot and stop */
  once?: boolean;
}

export interface RunSummary {
  ticks: number;
  snapshotsTaken: number;
  skippedCycles: number;
  targetReached: boolean;
  finalState: MonitorState;
}

export class SnapshotMonitor {
  private options: MonitorOptions;
  private clock: Clock;
  private progressRetryMs: number;
  private captureRetryMs: number;

  private state: MonitorState = "idle";
  private controller: AbortController | null = null;

  // Run metrics
  private ticks = 0;
  private snapshotsTaken = 0;
  private skippedCycles = 0;
  private targetReached = false;

  constructor(options: MonitorOptions) {
    if (options.progressSource.mode !== options.table.mode) {
      throw new Error(
        `Progress source mode "${options.progressSource.mode}" does not match band table mode "${options.table.mode}"`
      );
    }

    this.options = options;
    this.clock = options.clock ?? systemClock;
    this.progressRetryMs = options.progressRetryMs ?? HOUR_MS;
    this.captureRetryMs = options.captureRetryMs ?? 5 * MINUTE_MS;
  }

  getState(): MonitorState {
    return this.state;
  }

  /**
   * Abort the running loop. Sleeps wake immediately.
   */
  stop(): void {
    this.controller?.abort();
  }

  async run(signal?: AbortSignal): Promise<RunSummary> {
    if (this.controller) {
      throw new Error("Monitor is already running");
    }

    const controller = new AbortController();
    this.controller = controller;
    const onAbort = (): void => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    }
    signal?.addEventListener("abort", onAbort, { once: true });

    log.info("Monitor started", {
      mint: this.options.mint,
      mode: this.options.table.mode,
      once: this.options.once ?? false,
    });

    try {
      await this.loop(controller.signal);
    } finally {
      signal?.removeEventListener("abort", onAbort);
      this.controller = null;
      this.transition("stopped");
    }

    const summary = this.summary();
    log.info("Monitor stopped", { ...summary });
    return summary;
  }

  private async loop(signal: AbortSignal): Promise<void> {
    let baselineTaken = false;

    while (!signal.aborted) {
      this.ticks++;

      this.transition("polling");
      const polled = await this.poll();
      if (signal.aborted) return;

      const decision = polled?.decision ?? null;
      const reading = polled?.reading ?? null;

      if (!baselineTaken) {
        // Baseline ignores the band: it is taken whatever the progress
        const targetReached = decision?.shouldStop ?? false;
        baselineTaken = await this.capture(reading, targetReached, signal);
        if (signal.aborted) return;

        if (!baselineTaken) {
          if (this.options.once) return;
          await this.sleep(this.captureRetryMs, "baseline retry", signal);
          continue;
        }
        if (targetReached) {
          this.targetReached = true;
          log.info("Target already reached at baseline", { band: "target reached" });
          return;
        }
        if (this.options.once) return;

        await this.sleep(decision?.nextAttemptAfterMs ?? this.progressRetryMs, decision?.band ?? "progress retry", signal);
        continue;
      }

      if (!decision) {
        await this.sleep(this.progressRetryMs, "progress retry", signal);
        continue;
      }

      if (decision.shouldStop) {
        const captured = await this.capture(reading, true, signal);
        if (captured) {
          this.targetReached = true;
          log.info("Target reached, final snapshot taken");
          return;
        }
        if (signal.aborted) return;
        await this.sleep(this.captureRetryMs, "final snapshot retry", signal);
        continue;
      }

      if (decision.captureSnapshot) {
        await this.capture(reading, false, signal);
        if (signal.aborted) return;
      }

      await this.sleep(decision.nextAttemptAfterMs, decision.band, signal);
    }
  }

  /**
   * Read progress and map it to a decision; null when the source failed
   */
  private async poll(): Promise<{ reading: ProgressReading; decision: ScheduleDecision } | null> {
    try {
      const reading = await this.options.progressSource.read();
      const decision = decide(reading.percentageOrProximity, this.options.table);

      log.info("Progress checked", {
        mode: reading.mode,
        metric: reading.percentageOrProximity,
        solVolume: reading.solVolume,
        band: decision.band,
        capture: decision.captureSnapshot,
        nextCheckMs: decision.nextAttemptAfterMs,
      });
      return { reading, decision };
    } catch (error) {
      log.warn("Progress check failed", {
        error: toError(error).message,
        retryInMs: this.progressRetryMs,
      });
      return null;
    }
  }

  /**
   * Fetch, aggregate and persist one snapshot. Returns false when the cycle was skipped.
   */
  private async capture(reading: ProgressReading | null, targetReached: boolean, signal: AbortSignal): Promise<boolean> {
    this.transition("fetching");

    let raw: RawHolderRecord[];
    try {
      raw = await this.options.holders.fetchAllHolders(this.options.mint, signal);
    } catch (error) {
      if (signal.aborted) return false;
      this.skippedCycles++;
      log.error("Holder fetch failed, skipping cycle", { error: toError(error).message });
      return false;
    }
    if (signal.aborted) return false;

    const aggregation = aggregate(raw, {
      minTokenAmount: this.options.minTokenAmount,
      supplyAdjustment: this.options.supplyAdjustment,
    });

    if (aggregation.dropped > 0) {
      log.warn("Malformed holder records dropped", { dropped: aggregation.dropped });
    }
    if (aggregation.holderCount === 0) {
      this.skippedCycles++;
      log.warn("No holders after aggregation, skipping cycle", {
        records: raw.length,
        belowMinimum: aggregation.belowMinimum,
      });
      return false;
    }

    const snapshot = buildSnapshot({
      mint: this.options.mint,
      aggregation,
      progress: reading,
      targetReached,
      capturedAt: new Date(this.clock.now()),
    });

    this.transition("persisting");
    try {
      const artifacts = await this.options.sink.write(snapshot);
      this.snapshotsTaken++;
      log.info("Snapshot captured", {
        holders: snapshot.holderCount,
        totalSupply: snapshot.totalSupplyObserved,
        targetReached,
        csv: artifacts.csvPath,
      });
      return true;
    } catch (error) {
      this.skippedCycles++;
      log.error("Snapshot write failed, skipping cycle", { error: toError(error).message });
      return false;
    }
  }

  private async sleep(ms: number, reason: string, signal: AbortSignal): Promise<void> {
    if (signal.aborted) return;
    this.transition("sleeping");
    log.info("Next check scheduled", { reason, inMs: ms, inMinutes: Math.round(ms / MINUTE_MS) });
    await this.clock.sleep(ms, signal);
  }

  private transition(next: MonitorState): void {
    if (this.state === next) return;
    log.debug("State transition", { from: this.state, to: next });
    this.state = next;
  }

  private summary(): RunSummary {
    return {
      ticks: this.ticks,
      snapshotsTaken: this.snapshotsTaken,
      skippedCycles: this.skippedCycles,
      targetReached: this.targetReached,
      finalState: this.state,
    };
  }
}

/**
 * Wire a monitor from validated configuration
 */
export function createMonitor(config: MonitorConfig, options: { once?: boolean } = {}): {
  monitor: SnapshotMonitor;
  client: ResilientHolderClient;
} {
  const client = new ResilientHolderClient({
    endpoints: config.endpoints,
    provider: createAccountDataProvider(config.holderSource, { tokenProgram: config.tokenProgram }),
    policy: config.retryPolicy,
  });

  const progressSource = createProgressSource({
    mode: config.mode,
    mint: config.mint,
    connection: new Connection(config.endpoints[0], "confirmed"),
    targetMcapSol: config.targetMcapSol,
    timeoutMs: config.retryPolicy.requestTimeoutMs,
  });

  const monitor = new SnapshotMonitor({
    mint: config.mint.toBase58(),
    progressSource,
    holders: client,
    sink: new FileSnapshotSink(config.snapshotDir),
    table: bandTableFor(config.mode, config.targetProgressPct),
    minTokenAmount: config.minTokenAmount,
    supplyAdjustment: config.supplyAdjustment,
    progressRetryMs: config.progressRetryMs,
    captureRetryMs: config.captureRetryMs,
    once: options.once,
  });

  return { monitor, client };
}
