/**
 * Environment Variable Validation
 *
 * Validates the monitor's environment once at startup with Zod and turns it
 * into a typed MonitorConfig. Any issue is fatal: configuration errors are
 * reported and never retried.
 */

import { z } from 'zod';
import { PublicKey } from '@solana/web3.js';
import { HolderSourceKind, ScheduleMode } from '../types';
import { RetryPolicy } from '../managers/holder-client';
import { TokenProgramKind } from '../network/token-accounts';
import { isValidAddress } from '../core/aggregator';
import { HELIUS_MAINNET_RPC, PUBLIC_MAINNET_RPC } from '../core/constants';
import { LogLevel, maskEndpoint } from './logger';

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

const rawAmountSchema = z
  .string()
  .regex(/^\d+$/, 'must be a non-negative integer in raw token units')
  .transform((value) => BigInt(value));

const urlListSchema = z
  .string()
  .default('')
  .transform((value) => value.split(',').map((entry) => entry.trim()).filter((entry) => entry.length > 0))
  .pipe(z.array(z.string().url()));

/**
 * Monitor environment schema
 */
export const MonitorEnvSchema = z
  .object({
    // RPC configuration
    SOLANA_RPC_URL: z.string().url().optional(),
    SOLANA_RPC_FALLBACK_URLS: urlListSchema,
    HELIUS_API_KEY: z.string().min(1).optional(),

    // Target
    TOKEN_MINT_ADDRESS: z
      .string({ required_error: 'TOKEN_MINT_ADDRESS is required' })
      .refine(isValidAddress, { message: 'Invalid Solana address format (must be base58, 32 bytes)' }),
    SCHEDULE_MODE: z.enum(['proximity', 'percentage']).default('proximity'),
    TARGET_MCAP_SOL: z.coerce.number().positive().default(500),
    TARGET_PROGRESS_PCT: z.coerce.number().gt(0).max(100).default(100),

    // Output
    SNAPSHOT_DIR: z.string().min(1).default('snapshots'),
    MIN_TOKEN_AMOUNT: rawAmountSchema.default('0'),
    SUPPLY_ADJUSTMENT: rawAmountSchema.default('0'),

    // Holder source
    HOLDER_SOURCE: z.enum(['das', 'program-accounts', 'largest-accounts']).default('program-accounts'),
    TOKEN_PROGRAM: z.enum(['SPL', 'Token2022']).default('SPL'),

    // Retry policy
    RPC_FAILURE_THRESHOLD: z.coerce.number().int().min(1).max(10).default(3),
    RPC_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
    RPC_MAX_DELAY_MS: z.coerce.number().int().min(0).default(60000),
    RPC_COOLDOWN_MS: z.coerce.number().int().min(0).default(60000),
    RPC_TIMEOUT_MS: z.coerce.number().int().min(1000).max(300000).default(30000),
    PAGE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
    PAGE_LIMIT: z.coerce.number().int().min(1).max(1000).default(1000),

    // Loop cadence
    PROGRESS_RETRY_MS: z.coerce.number().int().min(1000).default(3600000),
    CAPTURE_RETRY_MS: z.coerce.number().int().min(1000).default(300000),

    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  })
  .refine((env) => env.RPC_MAX_DELAY_MS >= env.RPC_BASE_DELAY_MS, {
    message: 'RPC_MAX_DELAY_MS must be >= RPC_BASE_DELAY_MS',
    path: ['RPC_MAX_DELAY_MS'],
  })
  .refine((env) => env.SOLANA_RPC_URL !== undefined || env.HELIUS_API_KEY !== undefined, {
    message: 'SOLANA_RPC_URL or HELIUS_API_KEY is required',
    path: ['SOLANA_RPC_URL'],
  });

export type MonitorEnv = z.infer<typeof MonitorEnvSchema>;

export interface MonitorConfig {
  endpoints: string[];
  mint: PublicKey;
  mode: ScheduleMode;
  targetMcapSol: number;
  targetProgressPct: number;
  snapshotDir: string;
  minTokenAmount: bigint;
  supplyAdjustment: bigint;
  holderSource: HolderSourceKind;
  tokenProgram: TokenProgramKind;
  retryPolicy: RetryPolicy;
  progressRetryMs: number;
  captureRetryMs: number;
  logLevel: LogLevel;
}

/**
 * Blank values in a .env file mean "not set"
 */
function withoutBlanks(env: Record<string, string | undefined>): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
}

/**
 * Ordered endpoint list: explicit RPC first, then Helius, then fallbacks
 */
export function resolveEndpoints(env: MonitorEnv): string[] {
  const endpoints: string[] = [];
  if (env.SOLANA_RPC_URL) {
    endpoints.push(env.SOLANA_RPC_URL);
  }
  if (env.HELIUS_API_KEY) {
    endpoints.push(`${HELIUS_MAINNET_RPC}/?api-key=${env.HELIUS_API_KEY}`);
  }
  endpoints.push(...env.SOLANA_RPC_FALLBACK_URLS);
  return Array.from(new Set(endpoints));
}

/**
 * Validate monitor environment variables.
 * Throws ConfigError listing every issue.
 */
export function loadMonitorConfig(env: Record<string, string | undefined> = process.env): MonitorConfig {
  const result = MonitorEnvSchema.safeParse(withoutBlanks(env));

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(
      `Invalid monitor configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}\n\n` +
        `Set these environment variables or use a .env file.`,
      issues
    );
  }

  const data = result.data;

  return {
    endpoints: resolveEndpoints(data),
    mint: new PublicKey(data.TOKEN_MINT_ADDRESS),
    mode: data.SCHEDULE_MODE,
    targetMcapSol: data.TARGET_MCAP_SOL,
    targetProgressPct: data.TARGET_PROGRESS_PCT,
    snapshotDir: data.SNAPSHOT_DIR,
    minTokenAmount: data.MIN_TOKEN_AMOUNT,
    supplyAdjustment: data.SUPPLY_ADJUSTMENT,
    holderSource: data.HOLDER_SOURCE,
    tokenProgram: data.TOKEN_PROGRAM,
    retryPolicy: {
      failureThreshold: data.RPC_FAILURE_THRESHOLD,
      baseDelayMs: data.RPC_BASE_DELAY_MS,
      maxDelayMs: data.RPC_MAX_DELAY_MS,
      cooldownMs: data.RPC_COOLDOWN_MS,
      requestTimeoutMs: data.RPC_TIMEOUT_MS,
      pageDelayMs: data.PAGE_DELAY_MS,
      pageLimit: data.PAGE_LIMIT,
    },
    progressRetryMs: data.PROGRESS_RETRY_MS,
    captureRetryMs: data.CAPTURE_RETRY_MS,
    logLevel: data.LOG_LEVEL,
  };
}

/**
 * Configuration summary safe for logs (API keys masked)
 */
export function describeConfig(config: MonitorConfig): Record<string, unknown> {
  return {
    endpoints: config.endpoints.map(maskEndpoint),
    mint: config.mint.toBase58(),
    mode: config.mode,
    target: config.mode === 'proximity' ? `${config.targetMcapSol} SOL` : `${config.targetProgressPct}%`,
    snapshotDir: config.snapshotDir,
    minTokenAmount: config.minTokenAmount.toString(),
    holderSource: config.holderSource,
  };
}

/**
 * Template written on first run when no .env exists
 */
export const ENV_TEMPLATE = `# Solana Configuration
SOLANA_RPC_URL=${PUBLIC_MAINNET_RPC}
SOLANA_RPC_FALLBACK_URLS=
HELIUS_API_KEY=
TOKEN_MINT_ADDRESS=your_token_mint_address

# Schedule: proximity (SOL market cap) or percentage (bonding curve)
SCHEDULE_MODE=proximity
TARGET_MCAP_SOL=500
TARGET_PROGRESS_PCT=100

# Output
SNAPSHOT_DIR=snapshots
MIN_TOKEN_AMOUNT=0

# Holder source: das (Helius), program-accounts, largest-accounts
HOLDER_SOURCE=program-accounts
`;
