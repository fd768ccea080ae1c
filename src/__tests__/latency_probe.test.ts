import { CancelledError, SigningError } from '../errors';
import {
  FailedIteration,
  IterationResult,
  LatencyProbe,
  ProbeDeps,
  ProbeSettings,
  ReceivedIteration,
  isReceived,
} from '../latency_probe';
import { Sleep } from '../retry';
import { TransactionBuilder, TransactionRecord, createSigner } from '../transaction_builder';
import { FakeChain, FakeChainOptions, FakeClock, TEST_PRIVATE_KEY } from './fake_chain';

function settings(overrides: Partial<ProbeSettings> = {}): ProbeSettings {
  return {
    rpcUrl: 'http://localhost:8545',
    iterations: 10,
    pollIntervalMs: 100,
    receiptTimeoutMs: 1000,
    iterationDelayMs: 0,
    readRetries: 2,
    retryDelayMs: 10,
    continueOnFailure: true,
    submitMethod: 'standard',
    ...overrides,
  };
}

function setup(
  chainOpts: FakeChainOptions = {},
  overrides: Partial<ProbeSettings> = {},
  deps: Partial<ProbeDeps> = {},
) {
  const clock = new FakeClock();
  const chain = new FakeChain({ clock, ...chainOpts });
  const builder = new TransactionBuilder(createSigner(TEST_PRIVATE_KEY), chain.chainId, 21000n);
  const seen: IterationResult[] = [];
  const probe = new LatencyProbe(settings(overrides), {
    endpoint: chain,
    builder,
    chainId: chain.chainId,
    gasPrice: chain.gasPrice,
    now: clock.now,
    sleep: clock.sleep,
    onResult: (r) => seen.push(r),
    ...deps,
  });
  return { clock, chain, builder, probe, seen };
}

function received(results: IterationResult[]): ReceivedIteration[] {
  return results.filter(isReceived);
}

function failed(result: IterationResult): FailedIteration {
  if (result.state !== 'Failed') {
    throw new Error(`iteration ${result.index} did not fail`);
  }
  return result;
}

describe('LatencyProbe', () => {
  test('completes every iteration when receipts arrive on the first poll', async () => {
    const { chain, probe, seen } = setup();

    const run = await probe.run();

    expect(run.results).toHaveLength(10);
    expect(run.cancelled).toBe(false);
    expect(seen).toEqual(run.results);
    const ok = received(run.results);
    expect(ok).toHaveLength(10);
    expect(ok.map((r) => r.index)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(ok.map((r) => r.nonce)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(chain.acceptedNonces).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    // nonce is read once, then tracked locally
    expect(chain.calls.getNonce).toBe(1);
    for (const r of ok) {
      expect([0, 1]).toContain(r.blockDelta);
      expect(r.receiptTimestamp).toBeGreaterThanOrEqual(r.submissionTimestamp);
      expect(r.blockAtReceipt).toBeGreaterThanOrEqual(r.blockAtSubmission);
      expect(r.elapsedMs).toBe(r.receiptTimestamp - r.submissionTimestamp);
      expect(r.pollCount).toBe(1);
      expect(r.warnings).toEqual([]);
    }
  });

  test('measures elapsed time across several polls', async () => {
    const { clock, probe } = setup({ receiptAfterPolls: 2, callLatencyMs: 5 }, { iterations: 1 });

    const run = await probe.run();

    const [r] = received(run.results);
    expect(r.submitMs).toBe(5);
    expect(r.elapsedMs).toBe(220);
    expect(r.confirmMs).toBe(215);
    expect(r.pollCount).toBe(3);
    expect(r.blockAtSubmission).toBe(100);
    expect(r.receiptBlockNumber).toBe(101);
    expect(r.blockAtReceipt).toBe(101);
    expect(r.blockDelta).toBe(1);
    expect(r.inclusionDelta).toBe(1);
    expect(clock.sleeps).toEqual([100, 100]);
  });

  test('fails each iteration with a timeout when no receipt ever appears', async () => {
    const { chain, probe } = setup({ neverMine: true });

    const run = await probe.run();

    expect(run.results).toHaveLength(10);
    expect(received(run.results)).toHaveLength(0);
    for (const result of run.results) {
      const f = failed(result);
      expect(f.errorKind).toBe('TimeoutError');
      expect(f.stage).toBe('Polling');
      expect(f.message).toBe(`no receipt for ${f.hash} within 1000ms`);
    }
    // polls at 0, 100, ..., 1000 ms after submission
    expect(chain.calls.getReceipt).toBe(110);
    expect(chain.calls.getNonce).toBe(10);
    expect(run.cancelled).toBe(false);
  });

  test('re-reads the nonce after a rejected submission', async () => {
    const { chain, probe } = setup({ rejectSubmissions: [3] });

    const run = await probe.run();

    const rejected = failed(run.results[3]);
    expect(rejected.errorKind).toBe('SubmissionError');
    expect(rejected.stage).toBe('Submitted');
    expect(rejected.nonce).toBe(3);

    const next = run.results[4];
    expect(isReceived(next) && next.nonce).toBe(3);
    expect(chain.calls.getNonce).toBe(2);
    expect(received(run.results).map((r) => r.nonce)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8]);
  });

  test('recovers when the pending nonce moves underneath the probe', async () => {
    const { chain, probe } = setup({}, { iterations: 4 });
    chain.afterSubmit = (c) => {
      if (c.acceptedNonces.length === 2) {
        c.pendingNonce++;
      }
    };

    const run = await probe.run();

    expect(run.results.map((r) => r.state)).toEqual(['Received', 'Received', 'Failed', 'Received']);
    expect(failed(run.results[2]).nonce).toBe(2);
    const last = run.results[3];
    expect(isReceived(last) && last.nonce).toBe(3);
  });

  test('retries transient read failures', async () => {
    const { chain, clock, probe } = setup({}, { iterations: 1 });
    chain.failures.getBlockNumber = 2;

    const run = await probe.run();

    expect(received(run.results)).toHaveLength(1);
    expect(clock.sleeps).toEqual([10, 20]);
    expect(chain.calls.getBlockNumber).toBe(4);
  });

  test('fails the iteration once read retries run out', async () => {
    const { chain, probe } = setup({}, { iterations: 2 });
    chain.failures.getNonce = 5;

    const run = await probe.run();

    const first = failed(run.results[0]);
    expect(first.errorKind).toBe('ConnectionError');
    expect(first.stage).toBe('Building');
    expect(first.nonce).toBeUndefined();
    expect(first.hash).toBeUndefined();
    const second = run.results[1];
    expect(isReceived(second) && second.nonce).toBe(0);
    expect(chain.calls.getNonce).toBe(6);
  });

  test('stops after the first failure when continueOnFailure is off', async () => {
    const { probe } = setup({ rejectSubmissions: [1] }, { continueOnFailure: false });

    const run = await probe.run();

    expect(run.results).toHaveLength(2);
    expect(run.stoppedEarly).toBe(true);
    expect(run.cancelled).toBe(false);
  });

  test('flags a receipt that lands below the submission block', async () => {
    const { chain, probe } = setup({}, { iterations: 1 });
    chain.afterSubmit = (c) => {
      c.blockNumber -= 3;
    };

    const run = await probe.run();

    const [r] = received(run.results);
    expect(r.blockAtSubmission).toBe(100);
    expect(r.receiptBlockNumber).toBe(98);
    expect(r.blockAtReceipt).toBe(98);
    expect(r.blockDelta).toBe(-2);
    expect(r.warnings).toEqual(['receipt-before-submission-block', 'chain-height-regressed']);
  });

  test('marks reverted receipts', async () => {
    const { probe } = setup({ revert: true }, { iterations: 1 });

    const run = await probe.run();

    expect(received(run.results)[0].warnings).toEqual(['reverted']);
  });

  test('takes the receipt from a synchronous submission without polling', async () => {
    const { chain, probe } = setup({ callLatencyMs: 7 }, { iterations: 3, submitMethod: 'sync' });

    const run = await probe.run();

    const ok = received(run.results);
    expect(ok).toHaveLength(3);
    expect(ok.map((r) => r.pollCount)).toEqual([0, 0, 0]);
    expect(ok.map((r) => r.elapsedMs)).toEqual([7, 7, 7]);
    expect(chain.calls.getReceipt).toBeUndefined();
    expect(chain.calls.submitTransactionSync).toBe(3);
  });

  test('waits between iterations but not after the last one', async () => {
    const { clock, probe } = setup({}, { iterations: 3, iterationDelayMs: 500 });

    await probe.run();

    expect(clock.sleeps).toEqual([500, 500]);
  });

  test('aborts the whole run on a signing failure', async () => {
    class BrokenBuilder extends TransactionBuilder {
      async build(): Promise<TransactionRecord> {
        throw new SigningError('signer unavailable');
      }
    }
    const builder = new BrokenBuilder(createSigner(TEST_PRIVATE_KEY), 31337n, 21000n);
    const { chain, probe } = setup({}, {}, { builder });

    await expect(probe.run()).rejects.toThrow(SigningError);
    expect(chain.submissionAttempts).toBe(0);
  });

  test('stops between iterations once cancelled', async () => {
    const controller = new AbortController();
    const { chain, probe } = setup({}, {}, {
      onResult: (r) => {
        if (r.index === 1) controller.abort();
      },
    });

    const run = await probe.run(controller.signal);

    expect(run.cancelled).toBe(true);
    expect(run.results.map((r) => r.state)).toEqual(['Received', 'Received']);
    expect(chain.submissionAttempts).toBe(2);
  });

  test('records the in-flight iteration as cancelled when aborted mid-poll', async () => {
    const controller = new AbortController();
    const sleep: Sleep = async () => {
      controller.abort();
      throw new CancelledError();
    };
    const { chain, probe } = setup({ neverMine: true }, {}, { sleep });

    const run = await probe.run(controller.signal);

    expect(run.cancelled).toBe(true);
    expect(run.results).toHaveLength(1);
    const f = failed(run.results[0]);
    expect(f.errorKind).toBe('Cancelled');
    expect(f.stage).toBe('Polling');
    // the submitted transaction is left alone
    expect(chain.acceptedNonces).toEqual([0]);
  });
});
