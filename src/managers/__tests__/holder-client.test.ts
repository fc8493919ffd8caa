/**
 * ResilientHolderClient Unit Tests
 *
 * Retry, backoff, circuit breaker and rotation behaviour against a
 * scripted provider and a fake clock.
 */

import { expect } from 'chai';
import { ResilientHolderClient, RetryPolicy } from '../holder-client';
import { AccountDataProvider, PageRequest, TokenAccountPage } from '../../network/provider';
import { Clock, RpcError, TransientExhaustionError } from '../../network/rpc-utils';

const ENDPOINT_A = 'https://a.rpc.test';
const ENDPOINT_B = 'https://b.rpc.test/?api-key=test-secret';
const HOLDER = 'TokenkegQfeZyiNwAJbNbGKPFXCWuBvf9Ss623VQ5DA';
const MINT = 'So11111111111111111111111111111111111111112';

const POLICY: Partial<RetryPolicy> = {
  failureThreshold: 3,
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  cooldownMs: 60000,
  pageDelayMs: 0,
};

class FakeClock implements Clock {
  time = 0;
  sleeps: number[] = [];

  now(): number {
    return this.time;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.time += ms;
  }
}

type Handler = (request: PageRequest) => TokenAccountPage | Error;

class ScriptedProvider implements AccountDataProvider {
  readonly name = 'scripted';
  requests: PageRequest[] = [];

  constructor(private handler: Handler) {}

  async fetchPage(request: PageRequest): Promise<TokenAccountPage> {
    this.requests.push(request);
    const outcome = this.handler(request);
    if (outcome instanceof Error) throw outcome;
    return outcome;
  }
}

const onePage: TokenAccountPage = { accounts: [{ address: HOLDER, balance: 10n }], cursor: null };

function unavailable(): RpcError {
  return new RpcError('HTTP 503 from getTokenAccounts', 503);
}

async function expectExhaustion(promise: Promise<unknown>): Promise<TransientExhaustionError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof TransientExhaustionError) return error;
    throw error;
  }
  throw new Error('expected TransientExhaustionError');
}

describe('ResilientHolderClient', () => {
  let clock: FakeClock;

  beforeEach(() => {
    clock = new FakeClock();
  });

  it('should require at least one endpoint', () => {
    const provider = new ScriptedProvider(() => onePage);

    expect(() => new ResilientHolderClient({ endpoints: [], provider })).to.throw('At least one RPC endpoint');
  });

  it('should recover on the same endpoint after fewer failures than the threshold', async () => {
    let calls = 0;
    const provider = new ScriptedProvider(() => (++calls <= 2 ? unavailable() : onePage));
    const client = new ResilientHolderClient({ endpoints: [ENDPOINT_A], provider, policy: POLICY, clock });

    const records = await client.fetchAllHolders(MINT);

    expect(records).to.deep.equal(onePage.accounts);
    expect(clock.sleeps).to.deep.equal([1000, 4000]);
    expect(client.getHealth().lastRequest).to.deep.equal({ endpointIndex: 0, attempts: 3, retries: 2 });
    expect(client.getRetryState(0)).to.deep.equal({
      endpointIndex: 0,
      consecutiveFailures: 0,
      currentDelayMs: 1000,
      circuitOpenUntil: null,
    });
  });

  it('should open the circuit after three failures and rotate to the next endpoint', async () => {
    const provider = new ScriptedProvider((request) =>
      request.endpoint === ENDPOINT_A ? unavailable() : onePage
    );
    const client = new ResilientHolderClient({
      endpoints: [ENDPOINT_A, ENDPOINT_B],
      provider,
      policy: POLICY,
      clock,
    });

    const records = await client.fetchAllHolders(MINT);

    expect(records).to.deep.equal(onePage.accounts);
    expect(clock.sleeps).to.deep.equal([1000, 4000]);
    expect(provider.requests.map((request) => request.endpoint)).to.deep.equal([
      ENDPOINT_A,
      ENDPOINT_A,
      ENDPOINT_A,
      ENDPOINT_B,
    ]);

    const health = client.getHealth();
    expect(health.lastRequest).to.deep.equal({ endpointIndex: 1, attempts: 4, retries: 3 });
    expect(health.rotations).to.equal(1);
    expect(health.currentEndpoint).to.equal('https://b.rpc.test/?api-key=***');
    expect(health.endpoints[0].circuitOpen).to.equal(true);
    expect(client.getRetryState(0).circuitOpenUntil).to.equal(5000 + 60000);
    expect(client.getCurrentEndpointIndex()).to.equal(1);
  });

  it('should raise TransientExhaustionError when every endpoint keeps failing', async () => {
    const provider = new ScriptedProvider(() => unavailable());
    const client = new ResilientHolderClient({
      endpoints: [ENDPOINT_A, ENDPOINT_B],
      provider,
      policy: POLICY,
      clock,
    });

    const error = await expectExhaustion(client.fetchAllHolders(MINT));

    expect(error.attempts).to.equal(6);
    expect(error.endpoints).to.equal(2);
    expect(error.lastError).to.be.instanceOf(RpcError);
    expect(clock.sleeps).to.deep.equal([1000, 4000, 1000, 4000]);
  });

  it('should not call the provider while every circuit is open', async () => {
    const provider = new ScriptedProvider(() => unavailable());
    const client = new ResilientHolderClient({ endpoints: [ENDPOINT_A], provider, policy: POLICY, clock });

    await expectExhaustion(client.fetchAllHolders(MINT));
    const callsBefore = provider.requests.length;

    const error = await expectExhaustion(client.fetchAllHolders(MINT));

    expect(error.attempts).to.equal(0);
    expect(provider.requests.length).to.equal(callsBefore);
  });

  it('should re-open a half-open circuit on the first failure', async () => {
    let healthy = false;
    const provider = new ScriptedProvider(() => (healthy ? onePage : unavailable()));
    const client = new ResilientHolderClient({ endpoints: [ENDPOINT_A], provider, policy: POLICY, clock });

    await expectExhaustion(client.fetchAllHolders(MINT));
    clock.time += 60000;
    clock.sleeps = [];

    const error = await expectExhaustion(client.fetchAllHolders(MINT));
    expect(error.attempts).to.equal(1);
    expect(clock.sleeps).to.deep.equal([]);

    clock.time += 60000;
    healthy = true;
    const records = await client.fetchAllHolders(MINT);
    expect(records).to.have.lengthOf(1);
    expect(client.getRetryState(0).consecutiveFailures).to.equal(0);
  });

  it('should propagate non-retryable errors immediately', async () => {
    const invalid = new RpcError('Invalid params', -32602);
    const provider = new ScriptedProvider(() => invalid);
    const client = new ResilientHolderClient({ endpoints: [ENDPOINT_A], provider, policy: POLICY, clock });

    let caught: unknown;
    try {
      await client.fetchAllHolders(MINT);
    } catch (error) {
      caught = error;
    }

    expect(caught).to.equal(invalid);
    expect(provider.requests).to.have.lengthOf(1);
    expect(clock.sleeps).to.deep.equal([]);
  });

  it('should follow cursors and pause between pages', async () => {
    const other = 'So11111111111111111111111111111111111111112';
    const provider = new ScriptedProvider((request) =>
      request.cursor === null
        ? { accounts: [{ address: HOLDER, balance: 5n }], cursor: 'page-2' }
        : { accounts: [{ address: other, balance: 3n }], cursor: null }
    );
    const client = new ResilientHolderClient({
      endpoints: [ENDPOINT_A],
      provider,
      policy: { ...POLICY, pageDelayMs: 1000, pageLimit: 2 },
      clock,
    });

    const records = await client.fetchAllHolders(MINT);

    expect(records).to.deep.equal([
      { address: HOLDER, balance: 5n },
      { address: other, balance: 3n },
    ]);
    expect(provider.requests.map((request) => request.cursor)).to.deep.equal([null, 'page-2']);
    expect(provider.requests[0].limit).to.equal(2);
    expect(clock.sleeps).to.deep.equal([1000]);
  });

  it('should abort a timed-out attempt before retrying', async () => {
    const signals: AbortSignal[] = [];
    const provider: AccountDataProvider = {
      name: 'slow-then-fast',
      fetchPage(request) {
        if (request.signal) signals.push(request.signal);
        if (signals.length === 1) {
          return new Promise<TokenAccountPage>((resolve) => setTimeout(() => resolve(onePage), 200));
        }
        return Promise.resolve(onePage);
      },
    };
    const client = new ResilientHolderClient({
      endpoints: [ENDPOINT_A],
      provider,
      policy: { ...POLICY, requestTimeoutMs: 20 },
      clock,
    });

    const records = await client.fetchAllHolders(MINT);

    expect(records).to.deep.equal(onePage.accounts);
    expect(signals).to.have.lengthOf(2);
    expect(signals[0].aborted).to.equal(true);
    expect(signals[1].aborted).to.equal(false);
    expect(clock.sleeps).to.deep.equal([1000]);
  });

  it('should close every circuit on manual reset', async () => {
    const provider = new ScriptedProvider(() => unavailable());
    const client = new ResilientHolderClient({ endpoints: [ENDPOINT_A], provider, policy: POLICY, clock });

    await expectExhaustion(client.fetchAllHolders(MINT));
    client.resetCircuits();

    expect(client.getRetryState(0).circuitOpenUntil).to.equal(null);
    expect(client.getHealth().endpoints[0].circuitOpen).to.equal(false);
  });
});
