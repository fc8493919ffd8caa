/**
 * Token Account Provider Unit Tests
 */

import { expect } from 'chai';
import { GetProgramAccountsFilter, PublicKey } from '@solana/web3.js';
import { AccountLayout, AccountState, TOKEN_2022_PROGRAM_ID, TOKEN_PROGRAM_ID } from '@solana/spl-token';
import {
  LargestAccountsProvider,
  ProgramAccountsProvider,
  TokenAccountReader,
  decodeTokenAccount,
} from '../token-accounts';
import { PageRequest } from '../provider';

const MINT = new PublicKey('So11111111111111111111111111111111111111112');
const OWNER = new PublicKey('TokenkegQfeZyiNwAJbNbGKPFXCWuBvf9Ss623VQ5DA');

function encodeAccount(owner: PublicKey, amount: bigint): Buffer {
  const data = Buffer.alloc(AccountLayout.span);
  AccountLayout.encode(
    {
      mint: MINT,
      owner,
      amount,
      delegateOption: 0,
      delegate: PublicKey.default,
      state: AccountState.Initialized,
      isNativeOption: 0,
      isNative: 0n,
      delegatedAmount: 0n,
      closeAuthorityOption: 0,
      closeAuthority: PublicKey.default,
    },
    data
  );
  return data;
}

const request: PageRequest = {
  endpoint: 'https://rpc.test',
  mint: MINT.toBase58(),
  cursor: null,
  limit: 1000,
  timeoutMs: 1000,
};

class StubReader implements TokenAccountReader {
  programCalls: Array<{ programId: PublicKey; filters: GetProgramAccountsFilter[] }> = [];

  constructor(
    private programAccounts: Array<{ pubkey: PublicKey; account: { data: Buffer } }> = [],
    private largest: Array<{ address: PublicKey; amount: string }> = [],
    private parsed: Array<{ data: Buffer | { program: string; parsed: unknown; space: number } } | null> = []
  ) {}

  async getProgramAccounts(programId: PublicKey, config: { filters: GetProgramAccountsFilter[] }) {
    this.programCalls.push({ programId, filters: config.filters });
    return this.programAccounts;
  }

  async getTokenLargestAccounts() {
    return { value: this.largest };
  }

  async getMultipleParsedAccounts() {
    return { value: this.parsed };
  }
}

describe('Token account providers', () => {
  describe('decodeTokenAccount', () => {
    it('should read owner and amount', () => {
      expect(decodeTokenAccount(encodeAccount(OWNER, 42n))).to.deep.equal({
        address: OWNER.toBase58(),
        balance: 42n,
      });
    });

    it('should yield a droppable record for short data', () => {
      expect(decodeTokenAccount(Buffer.alloc(10))).to.deep.equal({ address: null, balance: null });
    });
  });

  describe('ProgramAccountsProvider', () => {
    it('should filter SPL accounts by size and mint', async () => {
      const reader = new StubReader([
        { pubkey: PublicKey.default, account: { data: encodeAccount(OWNER, 7n) } },
      ]);
      const provider = new ProgramAccountsProvider({ readerFor: () => reader });

      const page = await provider.fetchPage(request);

      expect(page).to.deep.equal({ accounts: [{ address: OWNER.toBase58(), balance: 7n }], cursor: null });
      expect(reader.programCalls[0].programId.equals(TOKEN_PROGRAM_ID)).to.equal(true);
      expect(reader.programCalls[0].filters).to.deep.equal([
        { dataSize: 165 },
        { memcmp: { offset: 0, bytes: MINT.toBase58() } },
      ]);
    });

    it('should skip the size filter for Token-2022', async () => {
      const reader = new StubReader();
      const provider = new ProgramAccountsProvider({ readerFor: () => reader, tokenProgram: 'Token2022' });

      await provider.fetchPage(request);

      expect(reader.programCalls[0].programId.equals(TOKEN_2022_PROGRAM_ID)).to.equal(true);
      expect(reader.programCalls[0].filters).to.have.lengthOf(1);
    });
  });

  describe('LargestAccountsProvider', () => {
    it('should resolve owners through parsed account data', async () => {
      const reader = new StubReader(
        [],
        [
          { address: PublicKey.default, amount: '900' },
          { address: MINT, amount: '5' },
        ],
        [
          {
            data: {
              program: 'spl-token',
              parsed: { info: { owner: OWNER.toBase58(), tokenAmount: { amount: '900' } } },
              space: 165,
            },
          },
          null,
        ]
      );
      const provider = new LargestAccountsProvider({ readerFor: () => reader });

      const page = await provider.fetchPage(request);

      expect(page.accounts).to.deep.equal([
        { address: OWNER.toBase58(), balance: '900' },
        { address: null, balance: null },
      ]);
      expect(page.cursor).to.equal(null);
    });

    it('should return an empty page when the mint has no accounts', async () => {
      const provider = new LargestAccountsProvider({ readerFor: () => new StubReader() });

      const page = await provider.fetchPage(request);

      expect(page.accounts).to.deep.equal([]);
    });
  });
});
