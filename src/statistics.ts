import { ErrorKind } from "./errors"
import { ProbeRun, ReceivedIteration, isReceived } from "./latency_probe"

export type Statistics = {
  count: number;
  min: number;
  max: number;
  mean: number;
};

export type BlockSpanSummary = {
  total: number;
  average: number;
  counted: number;
  // iterations left out because the chain height went backwards
  excluded: number;
};

export type RunSummary = {
  total: number;
  successCount: number;
  failureCount: number;
  elapsed?: Statistics;
  submit?: Statistics;
  confirm?: Statistics;
  blockSpan: BlockSpanSummary;
  lastErrorKind?: ErrorKind | "UnknownError";
  warningCount: number;
};

export function calculateStatistics(values: number[]): Statistics {
  if (values.length === 0) {
    return { count: 0, min: 0, max: 0, mean: 0 }
  }
  const sum = values.reduce((acc, val) => acc + val, 0)
  const min = Math.min(...values)
  const max = Math.max(...values)
  // float summation can push the mean a hair past the extremes
  const mean = Math.min(Math.max(sum / values.length, min), max)
  return { count: values.length, min, max, mean }
}

export function summarizeBlockSpan(received: ReceivedIteration[]): BlockSpanSummary {
  const counted = received.filter((r) => !r.warnings.includes("chain-height-regressed"))
  const total = counted.reduce((acc, r) => acc + r.blockDelta, 0)
  return {
    total,
    average: counted.length > 0 ? total / counted.length : 0,
    counted: counted.length,
    excluded: received.length - counted.length,
  }
}

export function summarizeRun(run: ProbeRun): RunSummary {
  const results = run.results
  const received = results.filter(isReceived)
  let lastErrorKind: RunSummary["lastErrorKind"]
  for (const r of results) {
    if (r.state === "Failed") {
      lastErrorKind = r.errorKind
    }
  }

  return {
    total: results.length,
    successCount: received.length,
    failureCount: results.length - received.length,
    elapsed: received.length > 0 ? calculateStatistics(received.map((r) => r.elapsedMs)) : undefined,
    submit: received.length > 0 ? calculateStatistics(received.map((r) => r.submitMs)) : undefined,
    confirm: received.length > 0 ? calculateStatistics(received.map((r) => r.confirmMs)) : undefined,
    blockSpan: summarizeBlockSpan(received),
    lastErrorKind,
    warningCount: received.filter((r) => r.warnings.length > 0).length,
  }
}
