/**
 * Bonding Curve Progress Source
 *
 * Reads the pump.fun bonding-curve account of the mint and reports how much
 * of the curve's real token reserves have been sold, as a percentage.
 */

import { LAMPORTS_PER_SOL, PublicKey } from "@solana/web3.js";
import { ProgressReading, ProgressSource } from "../types";
import { BONDING_CURVE_LAYOUT, INITIAL_REAL_TOKEN_RESERVES } from "../core/constants";
import { deriveBondingCurve } from "../core/pda-utils";
import { DEFAULT_TIMEOUT_MS, toError, withTimeout } from "../network/rpc-utils";
import { createLogger } from "../utils/logger";
import { ProgressSourceError } from "./types";

const log = createLogger("bonding-curve");

export interface BondingCurveState {
  virtualTokenReserves: bigint;
  virtualSolReserves: bigint;
  realTokenReserves: bigint;
  realSolReserves: bigint;
  tokenTotalSupply: bigint;
  complete: boolean;
}

/**
 * The subset of Connection this source reads through
 */
export interface AccountInfoReader {
  getAccountInfo(address: PublicKey): Promise<{ data: Buffer } | null>;
}

export function decodeBondingCurve(data: Buffer): BondingCurveState {
  if (data.length < BONDING_CURVE_LAYOUT.MIN_SIZE) {
    throw new Error(`Bonding curve account too small: ${data.length} bytes`);
  }

  return {
    virtualTokenReserves: data.readBigUInt64LE(BONDING_CURVE_LAYOUT.VIRTUAL_TOKEN_RESERVES),
    virtualSolReserves: data.readBigUInt64LE(BONDING_CURVE_LAYOUT.VIRTUAL_SOL_RESERVES),
    realTokenReserves: data.readBigUInt64LE(BONDING_CURVE_LAYOUT.REAL_TOKEN_RESERVES),
    realSolReserves: data.readBigUInt64LE(BONDING_CURVE_LAYOUT.REAL_SOL_RESERVES),
    tokenTotalSupply: data.readBigUInt64LE(BONDING_CURVE_LAYOUT.TOKEN_TOTAL_SUPPLY),
    complete: data.readUInt8(BONDING_CURVE_LAYOUT.COMPLETE) === 1,
  };
}

/**
 * Share of the initial real token reserves already sold, in [0, 100]
 */
export function bondingProgressPercent(state: BondingCurveState): number {
  if (state.complete) return 100;
  if (state.realTokenReserves >= INITIAL_REAL_TOKEN_RESERVES) return 0;

  const sold = INITIAL_REAL_TOKEN_RESERVES - state.realTokenReserves;
  // Four decimal places of precision without leaving bigint
  const scaled = (sold * 1_000_000n) / INITIAL_REAL_TOKEN_RESERVES;
  return Math.min(100, Number(scaled) / 10_000);
}

export interface BondingCurveSourceOptions {
  mint: PublicKey;
  reader: AccountInfoReader;
  timeoutMs?: number;
  now?: () => Date;
}

export class BondingCurveProgressSource implements ProgressSource {
  readonly mode = "percentage" as const;
  private bondingCurve: PublicKey;
  private reader: AccountInfoReader;
  private timeoutMs: number;
  private now: () => Date;

  constructor(options: BondingCurveSourceOptions) {
    this.bondingCurve = deriveBondingCurve(options.mint)[0];
    this.reader = options.reader;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.now = options.now ?? (() => new Date());
  }

  getBondingCurveAddress(): PublicKey {
    return this.bondingCurve;
  }

  async read(): Promise<ProgressReading> {
    let info: { data: Buffer } | null;
    try {
      info = await withTimeout(() => this.reader.getAccountInfo(this.bondingCurve), this.timeoutMs);
    } catch (error) {
      const cause = toError(error);
      throw new ProgressSourceError(`Bonding curve read failed: ${cause.message}`, "bonding-curve", cause);
    }

    if (!info) {
      throw new ProgressSourceError(
        `Bonding curve account not found: ${this.bondingCurve.toBase58()}`,
        "bonding-curve"
      );
    }

    let state: BondingCurveState;
    try {
      state = decodeBondingCurve(info.data);
    } catch (error) {
      const cause = toError(error);
      throw new ProgressSourceError(cause.message, "bonding-curve", cause);
    }

    const percent = bondingProgressPercent(state);
    const solVolume = Number(state.realSolReserves) / LAMPORTS_PER_SOL;

    log.debug("Bonding curve read", { percent, solVolume, complete: state.complete });

    return Object.freeze({
      mode: this.mode,
      percentageOrProximity: percent,
      solVolume,
      timestampObserved: this.now(),
    });
  }
}
