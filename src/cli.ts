#!/usr/bin/env node
/**
 * Holder Snapshot CLI
 *
 * Single entry point for the monitor.
 * Usage: bonding-snapshot --mint <PUBKEY> --mode proximity
 */

// Load .env file first
import * as dotenv from "dotenv";
dotenv.config();

import * as fs from "fs";
import * as path from "path";
import { createMonitor } from "./monitor";
import { ConfigError, ENV_TEMPLATE, MonitorConfig, describeConfig, loadMonitorConfig } from "./utils/env-validator";
import { createLogger, setGlobalLogLevel } from "./utils/logger";

const log = createLogger("cli");

interface CliArgs {
  mint?: string;
  mode?: string;
  target?: string;
  out?: string;
  minAmount?: string;
  rpc?: string;
  source?: string;
  once: boolean;
  verbose: boolean;
  help: boolean;
}

// Parse command line arguments
export function parseArgs(argv: string[]): CliArgs {
  const result: CliArgs = { once: false, verbose: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];

    switch (arg) {
      case "--mint":
      case "-m":
        result.mint = next;
        i++;
        break;
      case "--mode":
        result.mode = next;
        i++;
        break;
      case "--target":
      case "-t":
        result.target = next;
        i++;
        break;
      case "--out":
      case "-o":
        result.out = next;
        i++;
        break;
      case "--min-amount":
        result.minAmount = next;
        i++;
        break;
      case "--rpc":
        result.rpc = next;
        i++;
        break;
      case "--source":
        result.source = next;
        i++;
        break;
      case "--once":
        result.once = true;
        break;
      case "--verbose":
      case "-v":
        result.verbose = true;
        break;
      case "--help":
      case "-h":
        result.help = true;
        break;
    }
  }

  return result;
}

/**
 * Environment with command line flags applied on top
 */
export function applyArgs(env: Record<string, string | undefined>, args: CliArgs): Record<string, string | undefined> {
  const merged = { ...env };
  const mode = args.mode ?? env.SCHEDULE_MODE ?? "proximity";

  if (args.mint !== undefined) merged.TOKEN_MINT_ADDRESS = args.mint;
  if (args.mode !== undefined) merged.SCHEDULE_MODE = args.mode;
  if (args.target !== undefined) {
    if (mode === "percentage") {
      merged.TARGET_PROGRESS_PCT = args.target;
    } else {
      merged.TARGET_MCAP_SOL = args.target;
    }
  }
  if (args.out !== undefined) merged.SNAPSHOT_DIR = args.out;
  if (args.minAmount !== undefined) merged.MIN_TOKEN_AMOUNT = args.minAmount;
  if (args.rpc !== undefined) merged.SOLANA_RPC_URL = args.rpc;
  if (args.source !== undefined) merged.HOLDER_SOURCE = args.source;
  if (args.verbose) merged.LOG_LEVEL = "debug";

  return merged;
}

function printHelp(): void {
  console.log(`
Holder Snapshot Monitor - adaptive token holder snapshots

Usage: bonding-snapshot --mint <PUBKEY> [options]

Options:
  --mint, -m        Token mint (or set TOKEN_MINT_ADDRESS)
  --mode            proximity | percentage (default: proximity)
  --target, -t      SOL market cap target, or bonding progress % in percentage mode
  --out, -o         Snapshot directory (default: snapshots)
  --min-amount      Minimum raw balance to include (default: 0)
  --rpc             RPC endpoint (or set SOLANA_RPC_URL)
  --source          das | program-accounts | largest-accounts
  --once            Take one snapshot and exit
  --verbose, -v     Enable verbose logging
  --help, -h        Show this help message

Examples:
  # Snapshot every holder until the market cap reaches 500 SOL
  bonding-snapshot -m <MINT> --target 500

  # Follow bonding-curve progress through Helius DAS
  HELIUS_API_KEY=test-key bonding-snapshot -m <MINT> --mode percentage --source das

Environment Variables:
  See .env.example for the full list.
`);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  const envPath = path.resolve(process.cwd(), ".env");
  if (!fs.existsSync(envPath) && !args.mint && !process.env.TOKEN_MINT_ADDRESS) {
    fs.writeFileSync(envPath, ENV_TEMPLATE, "utf-8");
    console.log(`Created ${envPath}. Set TOKEN_MINT_ADDRESS and run again.`);
    process.exit(0);
  }

  let config: MonitorConfig;
  try {
    config = loadMonitorConfig(applyArgs(process.env, args));
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }

  setGlobalLogLevel(config.logLevel);
  log.info("Configuration loaded", describeConfig(config));

  const { monitor, client } = createMonitor(config, { once: args.once });

  // Handle shutdown signals
  const controller = new AbortController();
  const shutdown = (signal: string): void => {
    log.info(`Received ${signal}, shutting down...`);
    controller.abort();
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  const summary = await monitor.run(controller.signal);
  log.info("Run summary", { ...summary, rpc: client.getHealth() });
  process.exit(0);
}

// Run only when executed directly
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
}
