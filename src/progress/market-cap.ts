/**
 * Market Cap Progress Source
 *
 * Prices the token through DexScreener and multiplies by the on-chain supply
 * to get a market cap in SOL. The reported metric is how many SOL of market
 * cap are still missing to reach the target.
 */

import axios from "axios";
import { PublicKey } from "@solana/web3.js";
import { NATIVE_MINT } from "@solana/spl-token";
import { z } from "zod";
import { ProgressReading, ProgressSource } from "../types";
import { DEXSCREENER_BASE_URL } from "../core/constants";
import { DEFAULT_TIMEOUT_MS, toError, withTimeout } from "../network/rpc-utils";
import { createLogger } from "../utils/logger";
import { ProgressSourceError } from "./types";

const log = createLogger("market-cap");

const numeric = z.coerce.number();

const DexScreenerTokenSchema = z.object({ address: z.string().optional() });

const DexScreenerPairSchema = z
  .object({
    chainId: z.string().optional(),
    pairAddress: z.string().optional(),
    quoteToken: DexScreenerTokenSchema.optional(),
    priceNative: numeric.optional(),
    priceUsd: numeric.optional(),
    liquidity: z.object({ usd: numeric.optional() }).partial().optional(),
    volume: z.object({ h24: numeric.optional() }).partial().optional(),
  })
  .passthrough();

const DexScreenerTokenResponseSchema = z.object({
  pairs: z.array(DexScreenerPairSchema).nullish(),
});

export type DexScreenerPair = z.infer<typeof DexScreenerPairSchema>;

export type HttpGet = (url: string, options: { timeoutMs: number }) => Promise<unknown>;

export const axiosHttpGet: HttpGet = async (url, options) => {
  const response = await axios.get<unknown>(url, { timeout: options.timeoutMs });
  return response.data;
};

/**
 * The subset of Connection this source reads through
 */
export interface TokenSupplyReader {
  getTokenSupply(mint: PublicKey): Promise<{ value: { uiAmount: number | null } }>;
}

/**
 * Highest liquidity/volume score among wrapped-SOL quoted pairs on the chain;
 * ties go to the lower pair address. `priceNative` is only a SOL price on those pairs.
 */
export function pickBestPair(
  pairs: DexScreenerPair[],
  chainId: string = "solana",
  quoteMint: string = NATIVE_MINT.toBase58()
): DexScreenerPair | null {
  let best: DexScreenerPair | null = null;
  let bestScore = -1;

  for (const pair of pairs) {
    if ((pair.chainId ?? "").toLowerCase() !== chainId) continue;
    if (pair.quoteToken?.address !== quoteMint) continue;
    const price = pair.priceNative ?? 0;
    if (!Number.isFinite(price) || price <= 0) continue;

    const score = (pair.liquidity?.usd ?? 0) * 0.7 + (pair.volume?.h24 ?? 0) * 0.3;
    if (!Number.isFinite(score)) continue;

    if (score > bestScore) {
      best = pair;
      bestScore = score;
    } else if (score === bestScore && best) {
      const bestAddress = best.pairAddress ?? "";
      const nextAddress = pair.pairAddress ?? "";
      if (nextAddress && (!bestAddress || nextAddress < bestAddress)) {
        best = pair;
      }
    }
  }

  return best;
}

export interface MarketCapSourceOptions {
  mint: PublicKey;
  targetMcapSol: number;
  supplyReader: TokenSupplyReader;
  httpGet?: HttpGet;
  timeoutMs?: number;
  now?: () => Date;
}

export class MarketCapProgressSource implements ProgressSource {
  readonly mode = "proximity" as const;
  private mint: PublicKey;
  private targetMcapSol: number;
  private supplyReader: TokenSupplyReader;
  private httpGet: HttpGet;
  private timeoutMs: number;
  private now: () => Date;

  constructor(options: MarketCapSourceOptions) {
    this.mint = options.mint;
    this.targetMcapSol = options.targetMcapSol;
    this.supplyReader = options.supplyReader;
    this.httpGet = options.httpGet ?? axiosHttpGet;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.now = options.now ?? (() => new Date());
  }

  async read(): Promise<ProgressReading> {
    try {
      const pair = await this.fetchBestPair();
      const supply = await this.fetchSupply();

      const priceSol = pair.priceNative ?? 0;
      const marketCapSol = priceSol * supply;

      // 24h volume is quoted in USD; convert through the pair's SOL/USD ratio
      const priceUsd = pair.priceUsd ?? 0;
      const volumeUsd = pair.volume?.h24 ?? 0;
      const solVolume = priceUsd > 0 ? (volumeUsd * priceSol) / priceUsd : 0;

      log.debug("Market cap read", { marketCapSol, target: this.targetMcapSol, pair: pair.pairAddress });

      return Object.freeze({
        mode: this.mode,
        percentageOrProximity: this.targetMcapSol - marketCapSol,
        solVolume,
        timestampObserved: this.now(),
        marketCapSol,
      });
    } catch (error) {
      if (error instanceof ProgressSourceError) throw error;
      const cause = toError(error);
      throw new ProgressSourceError(`Market cap read failed: ${cause.message}`, "market-cap", cause);
    }
  }

  private async fetchBestPair(): Promise<DexScreenerPair> {
    const url = `${DEXSCREENER_BASE_URL}/latest/dex/tokens/${encodeURIComponent(this.mint.toBase58())}`;
    const body = await this.httpGet(url, { timeoutMs: this.timeoutMs });

    const parsed = DexScreenerTokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProgressSourceError("Malformed DexScreener response", "market-cap");
    }

    const pair = pickBestPair(parsed.data.pairs ?? []);
    if (!pair) {
      throw new ProgressSourceError("No priced SOL pair on DexScreener", "market-cap");
    }
    return pair;
  }

  private async fetchSupply(): Promise<number> {
    const supply = await withTimeout(() => this.supplyReader.getTokenSupply(this.mint), this.timeoutMs);
    const uiAmount = supply.value.uiAmount;
    if (uiAmount === null || !Number.isFinite(uiAmount)) {
      throw new ProgressSourceError("Token supply unavailable", "market-cap");
    }
    return uiAmount;
  }
}
