/**
 * Snapshot Aggregator
 *
 * Turns raw provider records into a validated, deduplicated holder list.
 * Malformed records are dropped and counted; they never fail the snapshot.
 */

import { PublicKey } from "@solana/web3.js";
import { HolderRecord, RawHolderRecord } from "../types";

// Solana base58 address (32-44 characters)
const SOLANA_ADDRESS_REGEX = /^[1-9A-HJ-NP-Za-km-z]{32,44}$/;

export interface AggregateOptions {
  /** Raw units; 0 disables minimum filtering */
  minTokenAmount?: bigint;
  /** Burned or locked raw units added to the observed total */
  supplyAdjustment?: bigint;
}

export interface AggregateResult {
  holders: HolderRecord[];
  holderCount: number;
  totalSupplyObserved: bigint;
  /** Records rejected as malformed */
  dropped: number;
  /** Valid holders excluded by the zero or minimum filter */
  belowMinimum: number;
}

export function isValidAddress(value: unknown): value is string {
  if (typeof value !== "string" || !SOLANA_ADDRESS_REGEX.test(value)) {
    return false;
  }
  try {
    // Round trip rejects short inputs that PublicKey would zero-pad
    return new PublicKey(value).toBase58() === value;
  } catch {
    return false;
  }
}

/**
 * Parse a raw balance into a non-negative integer, or null when malformed
 */
export function parseBalance(value: unknown): bigint | null {
  if (typeof value === "bigint") {
    return value >= 0n ? value : null;
  }
  if (typeof value === "number") {
    return Number.isSafeInteger(value) && value >= 0 ? BigInt(value) : null;
  }
  if (typeof value === "string" && /^\d+$/.test(value)) {
    return BigInt(value);
  }
  return null;
}

export function compareHolders(a: HolderRecord, b: HolderRecord): number {
  if (a.balance !== b.balance) {
    return a.balance > b.balance ? -1 : 1;
  }
  if (a.address === b.address) return 0;
  return a.address < b.address ? -1 : 1;
}

export function aggregate(raw: readonly RawHolderRecord[], options: AggregateOptions = {}): AggregateResult {
  const minTokenAmount = options.minTokenAmount ?? 0n;
  const supplyAdjustment = options.supplyAdjustment ?? 0n;

  const balances = new Map<string, bigint>();
  let dropped = 0;

  for (const record of raw) {
    const balance = parseBalance(record.balance);
    if (!isValidAddress(record.address) || balance === null) {
      dropped++;
      continue;
    }
    balances.set(record.address, (balances.get(record.address) ?? 0n) + balance);
  }

  const holders: HolderRecord[] = [];
  let belowMinimum = 0;
  let total = 0n;

  for (const [address, balance] of balances) {
    if (balance === 0n || (minTokenAmount > 0n && balance < minTokenAmount)) {
      belowMinimum++;
      continue;
    }
    holders.push(Object.freeze({ address, balance }));
    total += balance;
  }

  holders.sort(compareHolders);

  return {
    holders,
    holderCount: holders.length,
    totalSupplyObserved: total + supplyAdjustment,
    dropped,
    belowMinimum,
  };
}
