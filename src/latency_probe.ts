import { SubmitMethod } from "./config"
import {
  CancelledError,
  ErrorKind,
  ProbeError,
  TimeoutError,
  errorMessage,
  isFatal,
} from "./errors"
import { Sleep, sleep as defaultSleep, withRetry } from "./retry"
import { Receipt, RpcEndpoint } from "./rpc_endpoint"
import { TransactionBuilder } from "./transaction_builder"

export type IterationState = "Building" | "Submitted" | "Polling" | "Received" | "Failed"

export type DataWarning =
  // inclusion block lower than the head seen before submission
  | "receipt-before-submission-block"
  // head at receipt time lower than the head before submission
  | "chain-height-regressed"
  | "reverted"

export type ReceivedIteration = {
  state: "Received";
  index: number;
  nonce: number;
  hash: string;
  submissionTimestamp: number;
  submittedTimestamp: number;
  receiptTimestamp: number;
  elapsedMs: number;
  submitMs: number;
  // from the submission call returning to the receipt being seen
  confirmMs: number;
  blockAtSubmission: number;
  receiptBlockNumber: number;
  blockAtReceipt: number;
  blockDelta: number;
  inclusionDelta: number;
  pollCount: number;
  warnings: DataWarning[];
};

export type FailedIteration = {
  state: "Failed";
  index: number;
  // state the iteration was in when it failed
  stage: Exclude<IterationState, "Received" | "Failed">;
  errorKind: ErrorKind | "UnknownError";
  message: string;
  nonce?: number;
  hash?: string;
};

export type IterationResult = ReceivedIteration | FailedIteration

export type ProbeRun = {
  rpcUrl: string;
  address: string;
  chainId: bigint;
  gasPrice: bigint;
  submitMethod: SubmitMethod;
  plannedIterations: number;
  startedAt: number;
  finishedAt: number;
  results: IterationResult[];
  cancelled: boolean;
  stoppedEarly: boolean;
};

export type ProbeSettings = {
  rpcUrl: string;
  iterations: number;
  pollIntervalMs: number;
  receiptTimeoutMs: number;
  iterationDelayMs: number;
  readRetries: number;
  retryDelayMs: number;
  continueOnFailure: boolean;
  submitMethod: SubmitMethod;
};

export type ProbeDeps = {
  endpoint: RpcEndpoint;
  builder: TransactionBuilder;
  chainId: bigint;
  gasPrice: bigint;
  now?: () => number;
  sleep?: Sleep;
  log?: (line: string) => void;
  onResult?: (result: IterationResult) => void;
};

export function isReceived(result: IterationResult): result is ReceivedIteration {
  return result.state === "Received"
}

export function dataWarnings(
  blockAtSubmission: number,
  receipt: Receipt,
  blockAtReceipt: number,
): DataWarning[] {
  const warnings: DataWarning[] = []
  if (receipt.blockNumber < blockAtSubmission) {
    warnings.push("receipt-before-submission-block")
  }
  if (blockAtReceipt < blockAtSubmission) {
    warnings.push("chain-height-regressed")
  }
  if (receipt.status === 0) {
    warnings.push("reverted")
  }
  return warnings
}

/**
 * Runs the probe iterations strictly one after another. Each iteration walks
 * Building -> Submitted -> Polling -> Received, or ends in Failed.
 *
 * The nonce is tracked locally while iterations succeed. After any failure
 * the local value is dropped and the next iteration reads the pending nonce
 * from the endpoint again.
 */
export class LatencyProbe {
  private readonly now: () => number
  private readonly sleep: Sleep
  private readonly log: (line: string) => void
  private nextNonce?: number

  constructor(
    private readonly settings: ProbeSettings,
    private readonly deps: ProbeDeps,
  ) {
    this.now = deps.now ?? Date.now
    this.sleep = deps.sleep ?? defaultSleep
    this.log = deps.log ?? (() => {})
  }

  async run(signal?: AbortSignal): Promise<ProbeRun> {
    const run: ProbeRun = {
      rpcUrl: this.settings.rpcUrl,
      address: this.deps.builder.address,
      chainId: this.deps.chainId,
      gasPrice: this.deps.gasPrice,
      submitMethod: this.settings.submitMethod,
      plannedIterations: this.settings.iterations,
      startedAt: this.now(),
      finishedAt: 0,
      results: [],
      cancelled: false,
      stoppedEarly: false,
    }

    for (let i = 0; i < this.settings.iterations; i++) {
      if (signal?.aborted) {
        run.cancelled = true
        break
      }

      const result = await this.runIteration(i, signal)
      run.results.push(result)
      this.deps.onResult?.(result)

      if (signal?.aborted) {
        run.cancelled = true
        break
      }
      if (result.state === "Failed" && !this.settings.continueOnFailure) {
        run.stoppedEarly = true
        break
      }

      if (i < this.settings.iterations - 1 && this.settings.iterationDelayMs > 0) {
        try {
          await this.sleep(this.settings.iterationDelayMs, signal)
        } catch (err) {
          if (!(err instanceof CancelledError)) {
            throw err
          }
          run.cancelled = true
          break
        }
      }
    }

    run.finishedAt = this.now()
    return run
  }

  private read<T>(operation: () => Promise<T>, operationName: string, signal?: AbortSignal): Promise<T> {
    return withRetry(operation, {
      retries: this.settings.readRetries,
      delayMs: this.settings.retryDelayMs,
      operationName,
      sleep: this.sleep,
      signal,
      onRetry: (attempt, err) => {
        this.log(`${operationName} failed (retry ${attempt}/${this.settings.readRetries}): ${err.message}`)
      },
    })
  }

  private async pollReceipt(
    hash: string,
    deadline: number,
    signal?: AbortSignal,
  ): Promise<{ receipt: Receipt; pollCount: number }> {
    const { endpoint } = this.deps
    for (let polls = 1; ; polls++) {
      const receipt = await this.read(() => endpoint.getReceipt(hash), "getReceipt", signal)
      if (receipt != null) {
        return { receipt, pollCount: polls }
      }
      if (this.now() >= deadline) {
        throw new TimeoutError(`no receipt for ${hash} within ${this.settings.receiptTimeoutMs}ms`)
      }
      await this.sleep(this.settings.pollIntervalMs, signal)
    }
  }

  private async runIteration(index: number, signal?: AbortSignal): Promise<IterationResult> {
    const { endpoint, builder } = this.deps
    let stage: FailedIteration["stage"] = "Building"
    let nonce: number | undefined
    let hash: string | undefined

    try {
      nonce = this.nextNonce ?? (await this.read(() => endpoint.getNonce(builder.address), "getNonce", signal))
      const blockAtSubmission = await this.read(() => endpoint.getBlockNumber(), "getBlockNumber", signal)
      const tx = await builder.build(nonce, this.deps.gasPrice)
      hash = tx.hash
      this.log(`[${index}] nonce: ${nonce}, block before: ${blockAtSubmission}, sending ${tx.hash}`)

      stage = "Submitted"
      let syncReceipt: Receipt | undefined
      const submissionTimestamp = this.now()
      if (this.settings.submitMethod === "standard") {
        hash = await endpoint.submitTransaction(tx.serialized)
      } else {
        syncReceipt = await endpoint.submitTransactionSync(tx.serialized, this.settings.submitMethod)
        hash = syncReceipt.transactionHash
      }
      const submittedTimestamp = this.now()

      stage = "Polling"
      const txHash = hash
      const deadline = submissionTimestamp + this.settings.receiptTimeoutMs
      const { receipt, pollCount } = syncReceipt
        ? { receipt: syncReceipt, pollCount: 0 }
        : await this.pollReceipt(txHash, deadline, signal)
      // wall clock may step backwards between the two readings
      const receiptTimestamp = Math.max(this.now(), submissionTimestamp)

      const blockAtReceipt = await this.read(() => endpoint.getBlockNumber(), "getBlockNumber", signal)
      this.nextNonce = nonce + 1

      return {
        state: "Received",
        index,
        nonce,
        hash: txHash,
        submissionTimestamp,
        submittedTimestamp,
        receiptTimestamp,
        elapsedMs: receiptTimestamp - submissionTimestamp,
        submitMs: submittedTimestamp - submissionTimestamp,
        confirmMs: Math.max(receiptTimestamp - submittedTimestamp, 0),
        blockAtSubmission,
        receiptBlockNumber: receipt.blockNumber,
        blockAtReceipt,
        blockDelta: blockAtReceipt - blockAtSubmission,
        inclusionDelta: receipt.blockNumber - blockAtSubmission,
        pollCount,
        warnings: dataWarnings(blockAtSubmission, receipt, blockAtReceipt),
      }
    } catch (err) {
      if (isFatal(err)) {
        throw err
      }
      this.nextNonce = undefined
      return {
        state: "Failed",
        index,
        stage,
        errorKind: err instanceof ProbeError ? err.kind : "UnknownError",
        message: errorMessage(err),
        nonce,
        hash,
      }
    }
  }
}
