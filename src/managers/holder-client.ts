/**
 * Resilient Holder Client
 *
 * Fetches every token account of a mint from an unreliable, rate-limited
 * remote with:
 * - Per-endpoint circuit breaker
 * - Rotation to fallback endpoints
 * - Super-exponential backoff (base × n^n) up to a ceiling
 * - Transparent pagination under the same policy
 */

import { RawHolderRecord, RetryState } from "../types";
import { AccountDataProvider, TokenAccountPage } from "../network/provider";
import {
  Clock,
  TransientExhaustionError,
  computeBackoffDelay,
  isRetryableError,
  systemClock,
  toError,
  withTimeout,
} from "../network/rpc-utils";
import { createLogger, maskEndpoint } from "../utils/logger";

const log = createLogger("holders");

export interface RetryPolicy {
  failureThreshold: number;    // Consecutive failures before the circuit opens
  baseDelayMs: number;
  maxDelayMs: number;
  cooldownMs: number;          // How long an open circuit is skipped
  requestTimeoutMs: number;    // Bound on each physical attempt
  pageDelayMs: number;         // Pause between pages
  pageLimit: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  failureThreshold: 3,
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  cooldownMs: 60000,
  requestTimeoutMs: 30000,
  pageDelayMs: 1000,
  pageLimit: 1000,
};

export interface HolderClientConfig {
  endpoints: string[];
  provider: AccountDataProvider;
  policy?: Partial<RetryPolicy>;
  clock?: Clock;
}

export interface RequestStats {
  endpointIndex: number;
  attempts: number;
  retries: number;
}

export interface EndpointHealth extends RetryState {
  endpoint: string;
  circuitOpen: boolean;
}

export interface HolderClientHealth {
  currentEndpoint: string;
  totalRequests: number;
  totalRetries: number;
  rotations: number;
  lastRequest: RequestStats | null;
  endpoints: EndpointHealth[];
}

export class ResilientHolderClient {
  private endpoints: string[];
  private provider: AccountDataProvider;
  private policy: RetryPolicy;
  private clock: Clock;
  private states: RetryState[];
  private currentEndpointIndex = 0;

  // Health metrics
  private totalRequests = 0;
  private totalRetries = 0;
  private rotations = 0;
  private lastRequest: RequestStats | null = null;

  constructor(config: HolderClientConfig) {
    if (config.endpoints.length === 0) {
      throw new Error("At least one RPC endpoint is required");
    }

    this.endpoints = [...config.endpoints];
    this.provider = config.provider;
    this.policy = { ...DEFAULT_RETRY_POLICY, ...config.policy };
    this.clock = config.clock ?? systemClock;
    this.states = this.endpoints.map((_, index) => this.freshState(index));

    log.info("Holder client initialized", {
      provider: this.provider.name,
      endpoints: this.endpoints.length,
      primary: maskEndpoint(this.endpoints[0]),
    });
  }

  private freshState(endpointIndex: number): RetryState {
    return {
      endpointIndex,
      consecutiveFailures: 0,
      currentDelayMs: computeBackoffDelay(1, this.policy.baseDelayMs, this.policy.maxDelayMs),
      circuitOpenUntil: null,
    };
  }

  /**
   * Fetch every account page for the mint and concatenate the records.
   * Throws TransientExhaustionError when a page cannot be fetched from any endpoint.
   */
  async fetchAllHolders(mint: string, signal?: AbortSignal): Promise<RawHolderRecord[]> {
    const records: RawHolderRecord[] = [];
    let cursor: string | null = null;
    let page = 0;

    do {
      if (page > 0 && this.policy.pageDelayMs > 0) {
        await this.clock.sleep(this.policy.pageDelayMs, signal);
      }
      if (signal?.aborted) {
        throw new Error("Holder fetch aborted");
      }

      const requestCursor: string | null = cursor;
      const done = log.time(`Page ${page + 1} fetched`);
      const result: TokenAccountPage = await this.execute(
        (endpoint, attemptSignal) =>
          this.provider.fetchPage({
            endpoint,
            mint,
            cursor: requestCursor,
            limit: this.policy.pageLimit,
            timeoutMs: this.policy.requestTimeoutMs,
            signal: attemptSignal,
          }),
        signal
      );
      done();

      records.push(...result.accounts);
      cursor = result.cursor;
      page++;

      log.debug("Page contents", { page, accounts: result.accounts.length, hasMore: cursor !== null });
    } while (cursor !== null);

    log.info("Holder accounts fetched", { pages: page, accounts: records.length });
    return records;
  }

  /**
   * Execute one logical request, retrying and rotating as needed.
   * Each attempt gets its own signal, aborted on timeout or when `signal` aborts.
   */
  async execute<T>(
    operation: (endpoint: string, attemptSignal: AbortSignal) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    const maxAttempts = this.policy.failureThreshold * this.endpoints.length;
    let attempts = 0;
    let retries = 0;
    let lastError: Error | undefined;

    this.totalRequests++;

    while (attempts < maxAttempts) {
      const index = this.selectEndpoint();
      if (index === null) {
        break;
      }

      const state = this.states[index];
      const endpoint = this.endpoints[index];
      attempts++;

      try {
        const result = await withTimeout(
          (attemptSignal) => operation(endpoint, attemptSignal),
          this.policy.requestTimeoutMs,
          signal
        );
        this.onSuccess(state);
        this.lastRequest = { endpointIndex: index, attempts, retries };
        return result;
      } catch (error) {
        if (signal?.aborted) {
          throw new Error("Holder fetch aborted");
        }
        lastError = toError(error);

        if (!isRetryableError(lastError)) {
          log.error("Non-retryable RPC error", {
            endpoint: maskEndpoint(endpoint),
            error: lastError.message,
          });
          throw lastError;
        }

        state.consecutiveFailures++;
        retries++;
        this.totalRetries++;

        if (state.consecutiveFailures >= this.policy.failureThreshold) {
          this.openCircuit(state);
          continue;
        }

        const delayMs = state.currentDelayMs;
        log.warn("RPC attempt failed, backing off", {
          endpoint: maskEndpoint(endpoint),
          attempt: state.consecutiveFailures,
          delayMs,
          error: lastError.message,
        });

        await this.clock.sleep(delayMs, signal);
        if (signal?.aborted) {
          throw new Error("Holder fetch aborted");
        }
        state.currentDelayMs = computeBackoffDelay(
          state.consecutiveFailures + 1,
          this.policy.baseDelayMs,
          this.policy.maxDelayMs
        );
      }
    }

    this.lastRequest = { endpointIndex: this.currentEndpointIndex, attempts, retries };
    throw new TransientExhaustionError(
      `All ${this.endpoints.length} endpoint(s) exhausted after ${attempts} attempt(s)` +
        (lastError ? `: ${lastError.message}` : ""),
      attempts,
      this.endpoints.length,
      lastError
    );
  }

  /**
   * Current endpoint if its circuit is closed, otherwise the next usable one.
   * An endpoint whose cooldown elapsed comes back half-open: one failure re-opens it.
   */
  private selectEndpoint(): number | null {
    const now = this.clock.now();

    for (let offset = 0; offset < this.endpoints.length; offset++) {
      const index = (this.currentEndpointIndex + offset) % this.endpoints.length;
      const state = this.states[index];

      if (state.circuitOpenUntil !== null) {
        if (now < state.circuitOpenUntil) continue;
        state.circuitOpenUntil = null;
        state.consecutiveFailures = this.policy.failureThreshold - 1;
        log.info("Circuit half-open, probing endpoint", {
          endpoint: maskEndpoint(this.endpoints[index]),
        });
      }

      if (index !== this.currentEndpointIndex) {
        this.rotateTo(index);
      }
      return index;
    }

    return null;
  }

  private onSuccess(state: RetryState): void {
    const reset = this.freshState(state.endpointIndex);
    state.consecutiveFailures = reset.consecutiveFailures;
    state.currentDelayMs = reset.currentDelayMs;
    state.circuitOpenUntil = reset.circuitOpenUntil;
  }

  private openCircuit(state: RetryState): void {
    state.circuitOpenUntil = this.clock.now() + this.policy.cooldownMs;
    log.warn("Circuit opened for endpoint", {
      endpoint: maskEndpoint(this.endpoints[state.endpointIndex]),
      failures: state.consecutiveFailures,
      cooldownMs: this.policy.cooldownMs,
    });
  }

  private rotateTo(index: number): void {
    const previous = this.currentEndpointIndex;
    this.currentEndpointIndex = index;
    this.rotations++;

    log.info("Rotated to next RPC endpoint", {
      from: maskEndpoint(this.endpoints[previous]),
      to: maskEndpoint(this.endpoints[index]),
    });
  }

  getRetryState(index: number): Readonly<RetryState> {
    const state = this.states[index];
    if (!state) {
      throw new Error(`Invalid endpoint index: ${index}`);
    }
    return { ...state };
  }

  getCurrentEndpointIndex(): number {
    return this.currentEndpointIndex;
  }

  getHealth(): HolderClientHealth {
    const now = this.clock.now();
    return {
      currentEndpoint: maskEndpoint(this.endpoints[this.currentEndpointIndex]),
      totalRequests: this.totalRequests,
      totalRetries: this.totalRetries,
      rotations: this.rotations,
      lastRequest: this.lastRequest,
      endpoints: this.states.map((state) => ({
        ...state,
        endpoint: maskEndpoint(this.endpoints[state.endpointIndex]),
        circuitOpen: state.circuitOpenUntil !== null && now < state.circuitOpenUntil,
      })),
    };
  }

  /**
   * Close every circuit and restore base delays (manual recovery)
   */
  resetCircuits(): void {
    this.states = this.endpoints.map((_, index) => this.freshState(index));
    log.info("All circuits manually reset");
  }
}
