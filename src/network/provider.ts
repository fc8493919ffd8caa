import { RawHolderRecord } from "../types";

export interface PageRequest {
  endpoint: string;
  mint: string;
  /** null for the first page */
  cursor: string | null;
  limit: number;
  timeoutMs: number;
  /** Aborts when the attempt times out or the fetch is cancelled */
  signal?: AbortSignal;
}

export interface TokenAccountPage {
  accounts: RawHolderRecord[];
  /** null when there are no further pages */
  cursor: string | null;
}

/**
 * Remote source of token-account balances for a mint
 */
export interface AccountDataProvider {
  readonly name: string;
  fetchPage(request: PageRequest): Promise<TokenAccountPage>;
}
