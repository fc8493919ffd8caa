export * from "./types";
export * from "./bonding-curve";
export * from "./market-cap";

import { Connection, PublicKey } from "@solana/web3.js";
import { ProgressSource, ScheduleMode } from "../types";
import { BondingCurveProgressSource } from "./bonding-curve";
import { MarketCapProgressSource } from "./market-cap";

export function createProgressSource(options: {
  mode: ScheduleMode;
  mint: PublicKey;
  connection: Connection;
  targetMcapSol: number;
  timeoutMs?: number;
}): ProgressSource {
  if (options.mode === "percentage") {
    return new BondingCurveProgressSource({
      mint: options.mint,
      reader: options.connection,
      timeoutMs: options.timeoutMs,
    });
  }
  return new MarketCapProgressSource({
    mint: options.mint,
    targetMcapSol: options.targetMcapSol,
    supplyReader: options.connection,
    timeoutMs: options.timeoutMs,
  });
}
