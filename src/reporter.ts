import { formatUnits } from "ethers"
import { IterationResult, ProbeRun } from "./latency_probe"
import { CallStats } from "./rpc_endpoint"
import { Statistics, summarizeRun } from "./statistics"

export type RunInfo = {
  rpcUrl: string;
  chainId: bigint;
  address: string;
  gasPrice: bigint;
  submitMethod: string;
  iterations: number;
};

function formatStats(label: string, stats: Statistics): string[] {
  return [
    `${label}:`,
    `  Min:  ${stats.min.toFixed(2)}`,
    `  Max:  ${stats.max.toFixed(2)}`,
    `  Mean: ${stats.mean.toFixed(2)}`,
  ]
}

export function formatIteration(result: IterationResult): string {
  if (result.state === "Failed") {
    return `[TX ${result.index}] FAILED [${result.errorKind}] during ${result.stage}: ${result.message}`
  }
  let line =
    `[TX ${result.index}] e2e time: ${result.elapsedMs}ms, send: ${result.submitMs}ms, ` +
    `blocks: ${result.blockAtSubmission} -> ${result.blockAtReceipt} (span ${result.blockDelta}), ` +
    `included in: ${result.receiptBlockNumber}, polls: ${result.pollCount}, hash: ${result.hash}`
  if (result.warnings.length > 0) {
    line += ` WARNING: ${result.warnings.join(", ")}`
  }
  return line
}

export function formatHeader(info: RunInfo): string[] {
  return [
    `RPC URL: ${info.rpcUrl}`,
    `Chain ID: ${info.chainId}`,
    `Wallet address: ${info.address}`,
    `Gas price: ${formatUnits(info.gasPrice, "gwei")} gwei`,
    `Submit method: ${info.submitMethod}`,
    `Iterations: ${info.iterations}`,
  ]
}

export function formatSummary(run: ProbeRun, calls?: CallStats): string[] {
  const summary = summarizeRun(run)
  const lines: string[] = [
    "=".repeat(80),
    "RPC LATENCY TEST RESULTS",
    "=".repeat(80),
    `Iterations: ${summary.total}/${run.plannedIterations} (successful: ${summary.successCount}, failed: ${summary.failureCount})`,
  ]

  if (summary.elapsed) {
    lines.push(...formatStats("E2E time (ms)", summary.elapsed))
  }
  if (summary.submit) {
    lines.push(...formatStats("Send time (ms)", summary.submit))
  }
  if (summary.confirm) {
    lines.push(...formatStats("Confirm time (ms)", summary.confirm))
  }
  if (summary.successCount > 0) {
    lines.push("Block span:")
    lines.push(`  Total:   ${summary.blockSpan.total}`)
    lines.push(`  Average: ${summary.blockSpan.average.toFixed(2)}`)
    if (summary.blockSpan.excluded > 0) {
      lines.push(`  Excluded (chain height regressed): ${summary.blockSpan.excluded}`)
    }
  }
  if (summary.warningCount > 0) {
    lines.push(`Iterations with warnings: ${summary.warningCount}`)
  }
  if (summary.failureCount > 0) {
    lines.push(`Failures: ${summary.failureCount} (last: ${summary.lastErrorKind})`)
  }
  if (calls && calls.responses > 0) {
    const avgCallMs = calls.totalCallMs / calls.responses
    lines.push(`RPC calls: ${calls.requests} sent, ${calls.responses} answered, avg call time: ${avgCallMs.toFixed(2)} ms`)
  }
  lines.push(`Run time: ${((run.finishedAt - run.startedAt) / 1000).toFixed(2)} secs`)
  if (run.cancelled) {
    lines.push("Run cancelled before all iterations finished")
  } else if (run.stoppedEarly) {
    lines.push("Run stopped after the first failed iteration")
  }
  lines.push("=".repeat(80))
  return lines
}

export class ResultReporter {
  constructor(private readonly write: (line: string) => void = console.log) {}

  printHeader(info: RunInfo): void {
    formatHeader(info).forEach((line) => this.write(line))
    this.write("")
  }

  printIteration(result: IterationResult): void {
    this.write(formatIteration(result))
  }

  printSummary(run: ProbeRun, calls?: CallStats): void {
    this.write("")
    formatSummary(run, calls).forEach((line) => this.write(line))
  }
}
