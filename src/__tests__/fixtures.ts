import { FailedIteration, ProbeRun, ReceivedIteration } from '../latency_probe';

export function receivedIteration(
  index: number,
  elapsedMs: number,
  blockAtSubmission: number,
  blockAtReceipt: number,
  overrides: Partial<ReceivedIteration> = {},
): ReceivedIteration {
  const submissionTimestamp = 1_000_000 + index * 10_000;
  return {
    state: 'Received',
    index,
    nonce: index,
    hash: '0x' + index.toString(16).padStart(64, '0'),
    submissionTimestamp,
    submittedTimestamp: submissionTimestamp + 10,
    receiptTimestamp: submissionTimestamp + elapsedMs,
    elapsedMs,
    submitMs: 10,
    confirmMs: elapsedMs - 10,
    blockAtSubmission,
    receiptBlockNumber: blockAtReceipt,
    blockAtReceipt,
    blockDelta: blockAtReceipt - blockAtSubmission,
    inclusionDelta: blockAtReceipt - blockAtSubmission,
    pollCount: 1,
    warnings: [],
    ...overrides,
  };
}

export function failedIteration(index: number, overrides: Partial<FailedIteration> = {}): FailedIteration {
  return {
    state: 'Failed',
    index,
    stage: 'Polling',
    errorKind: 'TimeoutError',
    message: 'no receipt',
    ...overrides,
  };
}

export function probeRun(results: ProbeRun['results'], overrides: Partial<ProbeRun> = {}): ProbeRun {
  return {
    rpcUrl: 'http://localhost:8545',
    address: '0x' + '12'.repeat(20),
    chainId: 31337n,
    gasPrice: 1_000_000_000n,
    submitMethod: 'standard',
    plannedIterations: 10,
    startedAt: 1_000_000,
    finishedAt: 1_012_500,
    results,
    cancelled: false,
    stoppedEarly: false,
    ...overrides,
  };
}
