/**
 * Snapshot Persistence
 *
 * Writes each snapshot as a CSV holder list plus an info JSON next to it.
 * - Writes to temp file first, then atomic rename
 * - Creates the output directory on first write
 * - Never overwrites an earlier snapshot taken in the same second
 */

import * as fs from "fs";
import * as path from "path";
import { Snapshot, SnapshotArtifacts, SnapshotSink } from "../types";
import { snapshotBaseName } from "../core/snapshot";
import { createLogger } from "./logger";

const log = createLogger("snapshots");

export interface SnapshotInfo {
  timestamp: string;
  mint: string;
  holderCount: number;
  totalSupplyObserved: string;
  progress: {
    mode: string;
    metric: number;
    solVolume: number;
    marketCapSol: number | null;
    observedAt: string;
  } | null;
  targetReached: boolean;
}

export function formatCsv(snapshot: Snapshot): string {
  const timestamp = snapshot.capturedAt.toISOString();
  const rows = snapshot.holders.map((holder) => `${holder.address},${holder.balance.toString()},${timestamp}`);
  return ["address,balance,timestamp", ...rows].join("\n") + "\n";
}

export function buildInfo(snapshot: Snapshot): SnapshotInfo {
  const progress = snapshot.progress;
  return {
    timestamp: snapshot.capturedAt.toISOString(),
    mint: snapshot.mint,
    holderCount: snapshot.holderCount,
    totalSupplyObserved: snapshot.totalSupplyObserved.toString(),
    progress: progress
      ? {
          mode: progress.mode,
          metric: progress.percentageOrProximity,
          solVolume: progress.solVolume,
          marketCapSol: progress.marketCapSol ?? null,
          observedAt: progress.timestampObserved.toISOString(),
        }
      : null,
    targetReached: snapshot.targetReached,
  };
}

/**
 * Write content to filePath through a temp file and rename
 */
export function writeFileAtomic(filePath: string, content: string): void {
  const tempFile = `${filePath}.tmp.${process.pid}`;

  try {
    fs.writeFileSync(tempFile, content, "utf-8");
    fs.renameSync(tempFile, filePath);
  } catch (error) {
    // Cleanup temp file on error
    if (fs.existsSync(tempFile)) {
      fs.unlinkSync(tempFile);
    }
    throw error;
  }
}

export class FileSnapshotSink implements SnapshotSink {
  constructor(private readonly directory: string) {}

  async write(snapshot: Snapshot): Promise<SnapshotArtifacts> {
    if (!fs.existsSync(this.directory)) {
      fs.mkdirSync(this.directory, { recursive: true });
    }

    const baseName = this.uniqueBaseName(snapshotBaseName(snapshot.capturedAt));
    const csvPath = path.join(this.directory, `${baseName}.csv`);
    const infoPath = path.join(this.directory, `${baseName}_info.json`);

    writeFileAtomic(csvPath, formatCsv(snapshot));
    writeFileAtomic(infoPath, JSON.stringify(buildInfo(snapshot), null, 2));

    log.info("Snapshot saved", { csv: csvPath, holders: snapshot.holderCount });
    return { csvPath, infoPath };
  }

  private uniqueBaseName(baseName: string): string {
    let candidate = baseName;
    let suffix = 2;
    while (fs.existsSync(path.join(this.directory, `${candidate}.csv`))) {
      candidate = `${baseName}_${suffix}`;
      suffix++;
    }
    return candidate;
  }
}
