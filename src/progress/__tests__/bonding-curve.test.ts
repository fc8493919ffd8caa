/**
 * Bonding Curve Progress Source Unit Tests
 */

import { expect } from 'chai';
import { PublicKey } from '@solana/web3.js';
import {
  AccountInfoReader,
  BondingCurveProgressSource,
  BondingCurveState,
  bondingProgressPercent,
  decodeBondingCurve,
} from '../bonding-curve';
import { ProgressSourceError } from '../types';
import { deriveBondingCurve } from '../../core/pda-utils';
import { INITIAL_REAL_TOKEN_RESERVES } from '../../core/constants';

const MINT = new PublicKey('So11111111111111111111111111111111111111112');
const OBSERVED_AT = new Date(Date.UTC(2024, 2, 1));

function encodeCurve(state: BondingCurveState): Buffer {
  const data = Buffer.alloc(49);
  data.writeBigUInt64LE(state.virtualTokenReserves, 8);
  data.writeBigUInt64LE(state.virtualSolReserves, 16);
  data.writeBigUInt64LE(state.realTokenReserves, 24);
  data.writeBigUInt64LE(state.realSolReserves, 32);
  data.writeBigUInt64LE(state.tokenTotalSupply, 40);
  data.writeUInt8(state.complete ? 1 : 0, 48);
  return data;
}

const curve: BondingCurveState = {
  virtualTokenReserves: 100_000_000_000_000n,
  virtualSolReserves: 109_000_000_000n,
  realTokenReserves: 63_448_000_000_000n,
  realSolReserves: 79_000_000_000n,
  tokenTotalSupply: 1_000_000_000_000_000n,
  complete: false,
};

class StubReader implements AccountInfoReader {
  requested: PublicKey[] = [];

  constructor(private result: { data: Buffer } | null | Error) {}

  async getAccountInfo(address: PublicKey): Promise<{ data: Buffer } | null> {
    this.requested.push(address);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

async function readError(source: BondingCurveProgressSource): Promise<ProgressSourceError> {
  try {
    await source.read();
  } catch (error) {
    if (error instanceof ProgressSourceError) return error;
    throw error;
  }
  throw new Error('expected read to fail');
}

describe('BondingCurveProgressSource', () => {
  it('should decode the curve account', () => {
    expect(decodeBondingCurve(encodeCurve(curve))).to.deep.equal(curve);
  });

  it('should reject truncated account data', () => {
    expect(() => decodeBondingCurve(Buffer.alloc(40))).to.throw('Bonding curve account too small: 40 bytes');
  });

  describe('bondingProgressPercent', () => {
    it('should measure sold real reserves', () => {
      expect(bondingProgressPercent(curve)).to.equal(92);
    });

    it('should clamp to the [0, 100] range', () => {
      expect(bondingProgressPercent({ ...curve, realTokenReserves: INITIAL_REAL_TOKEN_RESERVES })).to.equal(0);
      expect(bondingProgressPercent({ ...curve, realTokenReserves: 0n })).to.equal(100);
      expect(bondingProgressPercent({ ...curve, complete: true })).to.equal(100);
    });
  });

  it('should read progress from the derived curve address', async () => {
    const reader = new StubReader({ data: encodeCurve(curve) });
    const source = new BondingCurveProgressSource({ mint: MINT, reader, now: () => OBSERVED_AT });

    const reading = await source.read();

    expect(reading).to.deep.equal({
      mode: 'percentage',
      percentageOrProximity: 92,
      solVolume: 79,
      timestampObserved: OBSERVED_AT,
    });
    expect(reader.requested[0].equals(deriveBondingCurve(MINT)[0])).to.equal(true);
    expect(source.getBondingCurveAddress().equals(reader.requested[0])).to.equal(true);
  });

  it('should fail when the curve account is missing', async () => {
    const source = new BondingCurveProgressSource({ mint: MINT, reader: new StubReader(null) });

    const error = await readError(source);

    expect(error.source).to.equal('bonding-curve');
    expect(error.message).to.match(/^Bonding curve account not found/);
  });

  it('should wrap reader failures', async () => {
    const source = new BondingCurveProgressSource({
      mint: MINT,
      reader: new StubReader(new Error('fetch failed')),
    });

    const error = await readError(source);

    expect(error.message).to.equal('Bonding curve read failed: fetch failed');
    expect(error.originalError?.message).to.equal('fetch failed');
  });

  it('should wrap malformed account data', async () => {
    const source = new BondingCurveProgressSource({
      mint: MINT,
      reader: new StubReader({ data: Buffer.alloc(8) }),
    });

    const error = await readError(source);

    expect(error.message).to.equal('Bonding curve account too small: 8 bytes');
  });
});
