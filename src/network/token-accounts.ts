/**
 * Token account providers backed by standard Solana RPC methods
 *
 * - ProgramAccountsProvider: every token account of the mint in one
 *   getProgramAccounts call, decoded with the SPL AccountLayout
 * - LargestAccountsProvider: getTokenLargestAccounts + parsed account info,
 *   limited by the RPC to the 20 largest accounts
 */

import {
  Commitment,
  Connection,
  GetProgramAccountsFilter,
  ParsedAccountData,
  PublicKey,
} from "@solana/web3.js";
import { AccountLayout, TOKEN_2022_PROGRAM_ID, TOKEN_PROGRAM_ID } from "@solana/spl-token";
import { z } from "zod";
import { RawHolderRecord } from "../types";
import { SPL_TOKEN_ACCOUNT_SIZE, TOKEN_ACCOUNT_MINT_OFFSET } from "../core/constants";
import { AccountDataProvider, PageRequest, TokenAccountPage } from "./provider";
import { createLogger } from "../utils/logger";

const log = createLogger("token-accounts");

export type TokenProgramKind = "SPL" | "Token2022";

/**
 * The subset of Connection the providers use
 */
export interface TokenAccountReader {
  getProgramAccounts(
    programId: PublicKey,
    config: { commitment?: Commitment; filters: GetProgramAccountsFilter[] }
  ): Promise<ReadonlyArray<{ pubkey: PublicKey; account: { data: Buffer } }>>;
  getTokenLargestAccounts(
    mint: PublicKey,
    commitment?: Commitment
  ): Promise<{ value: Array<{ address: PublicKey; amount: string }> }>;
  getMultipleParsedAccounts(
    publicKeys: PublicKey[],
    config?: { commitment?: Commitment }
  ): Promise<{ value: Array<{ data: Buffer | ParsedAccountData } | null> }>;
}

export type ReaderFactory = (endpoint: string) => TokenAccountReader;

/**
 * One Connection per endpoint, created lazily
 */
export function createConnectionFactory(commitment: Commitment = "confirmed"): ReaderFactory {
  const connections = new Map<string, Connection>();
  return (endpoint: string) => {
    let connection = connections.get(endpoint);
    if (!connection) {
      connection = new Connection(endpoint, { commitment });
      connections.set(endpoint, connection);
    }
    return connection;
  };
}

function tokenProgramId(kind: TokenProgramKind): PublicKey {
  return kind === "Token2022" ? TOKEN_2022_PROGRAM_ID : TOKEN_PROGRAM_ID;
}

/**
 * Decode an SPL token account. Malformed data yields a record the aggregator drops.
 */
export function decodeTokenAccount(data: Buffer): RawHolderRecord {
  if (data.length < AccountLayout.span) {
    return { address: null, balance: null };
  }
  const account = AccountLayout.decode(data);
  return { address: account.owner.toBase58(), balance: account.amount };
}

export class ProgramAccountsProvider implements AccountDataProvider {
  readonly name = "program-accounts";
  private readerFor: ReaderFactory;
  private program: TokenProgramKind;

  constructor(options: { readerFor?: ReaderFactory; tokenProgram?: TokenProgramKind } = {}) {
    this.readerFor = options.readerFor ?? createConnectionFactory();
    this.program = options.tokenProgram ?? "SPL";
  }

  async fetchPage(request: PageRequest): Promise<TokenAccountPage> {
    const filters: GetProgramAccountsFilter[] = [
      { memcmp: { offset: TOKEN_ACCOUNT_MINT_OFFSET, bytes: request.mint } },
    ];
    // Token-2022 accounts carry extensions, so their size varies
    if (this.program === "SPL") {
      filters.unshift({ dataSize: SPL_TOKEN_ACCOUNT_SIZE });
    }

    const accounts = await this.readerFor(request.endpoint).getProgramAccounts(
      tokenProgramId(this.program),
      { commitment: "confirmed", filters }
    );

    log.debug("Program accounts fetched", { count: accounts.length });

    return {
      accounts: accounts.map(({ account }) => decodeTokenAccount(account.data)),
      cursor: null,
    };
  }
}

const ParsedTokenAccountSchema = z.object({
  parsed: z.object({
    info: z.object({
      owner: z.string(),
      tokenAmount: z.object({ amount: z.string() }),
    }),
  }),
});

export class LargestAccountsProvider implements AccountDataProvider {
  readonly name = "largest-accounts";
  private readerFor: ReaderFactory;

  constructor(options: { readerFor?: ReaderFactory } = {}) {
    this.readerFor = options.readerFor ?? createConnectionFactory();
  }

  async fetchPage(request: PageRequest): Promise<TokenAccountPage> {
    const reader = this.readerFor(request.endpoint);
    const largest = await reader.getTokenLargestAccounts(new PublicKey(request.mint), "confirmed");
    const addresses = largest.value.map((entry) => entry.address);

    if (addresses.length === 0) {
      return { accounts: [], cursor: null };
    }

    const infos = await reader.getMultipleParsedAccounts(addresses, { commitment: "confirmed" });

    const accounts = infos.value.map((info): RawHolderRecord => {
      const parsed = ParsedTokenAccountSchema.safeParse(info?.data);
      if (!parsed.success) {
        return { address: null, balance: null };
      }
      const { owner, tokenAmount } = parsed.data.parsed.info;
      return { address: owner, balance: tokenAmount.amount };
    });

    return { accounts, cursor: null };
  }
}
