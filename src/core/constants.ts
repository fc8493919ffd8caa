/**
 * Snapshot Monitor Constants
 *
 * Single source of truth for on-chain addresses, account layouts and
 * remote API locations. Import from here instead of declaring locally.
 */

import { PublicKey } from '@solana/web3.js';

// ============================================================================
// Program IDs
// ============================================================================

/** Pump.fun Bonding Curve Program */
export const PUMP_PROGRAM = new PublicKey('6EF8rrecthR5Dkzon8Nwu78hRvfCKubJ14M5uBEwF6P');

// ============================================================================
// PDA Seeds
// ============================================================================

export const BONDING_CURVE_SEED = Buffer.from('bonding-curve');

// ============================================================================
// Bonding Curve Account Layout (after 8-byte discriminator)
// ============================================================================

export const BONDING_CURVE_LAYOUT = {
  VIRTUAL_TOKEN_RESERVES: 8,
  VIRTUAL_SOL_RESERVES: 16,
  REAL_TOKEN_RESERVES: 24,
  REAL_SOL_RESERVES: 32,
  TOKEN_TOTAL_SUPPLY: 40,
  COMPLETE: 48,
  MIN_SIZE: 49,
} as const;

/** Real token reserves a fresh pump.fun curve starts with (793.1M, 6 decimals) */
export const INITIAL_REAL_TOKEN_RESERVES = 793_100_000_000_000n;

// ============================================================================
// SPL Token Account Layout
// ============================================================================

/** Size of a classic SPL token account; Token-2022 accounts may be larger */
export const SPL_TOKEN_ACCOUNT_SIZE = 165;

/** Offset of the mint inside a token account */
export const TOKEN_ACCOUNT_MINT_OFFSET = 0;

// ============================================================================
// Remote APIs
// ============================================================================

export const DEXSCREENER_BASE_URL = 'https://api.dexscreener.com';

export const HELIUS_MAINNET_RPC = 'https://mainnet.helius-rpc.com';

export const PUBLIC_MAINNET_RPC = 'https://api.mainnet-beta.solana.com';

// ============================================================================
// Timing
// ============================================================================

export const MINUTE_MS = 60_000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;
