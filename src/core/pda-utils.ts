/**
 * PDA Derivation Utilities
 */

import { PublicKey } from '@solana/web3.js';
import { BONDING_CURVE_SEED, PUMP_PROGRAM } from './constants';

// ============================================================================
// Pump.fun Pool PDAs
// ============================================================================

/**
 * Derive Bonding Curve PDA
 * Seeds: ["bonding-curve", mint]
 */
export function deriveBondingCurve(mint: PublicKey): [PublicKey, number] {
  return PublicKey.findProgramAddressSync(
    [BONDING_CURVE_SEED, mint.toBuffer()],
    PUMP_PROGRAM
  );
}
