import { ethers as e, isError } from "ethers"
import {
  ConnectionError,
  ProbeError,
  ProviderError,
  SubmissionError,
  errorMessage,
} from "./errors"

export type Receipt = {
  transactionHash: string;
  blockNumber: number;
  // 1 = success, 0 = reverted, null = pre-byzantium / not reported
  status: number | null;
};

export type SyncSubmitMethod = "sync" | "realtime"

export type CallStats = {
  requests: number;
  responses: number;
  totalCallMs: number;
};

export interface RpcEndpoint {
  getChainId(): Promise<bigint>;
  getNonce(address: string): Promise<number>;
  getBlockNumber(): Promise<number>;
  getGasPrice(): Promise<bigint>;
  submitTransaction(signedTx: string): Promise<string>;
  /** Submits through a method that answers with the receipt instead of the hash. */
  submitTransactionSync(signedTx: string, method: SyncSubmitMethod): Promise<Receipt>;
  /** Resolves null while the transaction is not yet mined. */
  getReceipt(hash: string): Promise<Receipt | null>;
  stats(): CallStats;
  destroy(): void;
}

export const SYNC_RPC_METHODS: Record<SyncSubmitMethod, string> = {
  sync: "eth_sendRawTransactionSync",
  realtime: "realtime_sendRawTransaction",
}

const START_HEADER = "x-probe-start-ms"
const HEX_QUANTITY = /^0x[0-9a-fA-F]+$/

const TRANSPORT_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ETIMEDOUT",
  "EPIPE",
  "EHOSTUNREACH",
  "UND_ERR_SOCKET",
])

// Errors raised by Node's own sockets may come from another realm, so no instanceof checks.
function shortMessage(err: unknown): string {
  if (typeof err === "object" && err != null && "shortMessage" in err && typeof err.shortMessage === "string") {
    return err.shortMessage
  }
  return errorMessage(err)
}

export function isTransportError(err: unknown): boolean {
  if (isError(err, "TIMEOUT") || isError(err, "NETWORK_ERROR") || isError(err, "SERVER_ERROR")) {
    return true
  }
  if (typeof err === "object" && err != null && "code" in err && typeof err.code === "string") {
    return TRANSPORT_ERROR_CODES.has(err.code)
  }
  return false
}

// Read calls: transport trouble is a ConnectionError, anything else a ProviderError.
export function toReadError(err: unknown, operation: string): ProbeError {
  if (err instanceof ProbeError) {
    return err
  }
  if (isTransportError(err)) {
    return new ConnectionError(`${operation}: ${shortMessage(err)}`, err)
  }
  return new ProviderError(`${operation}: ${shortMessage(err)}`, err)
}

// Submission: a reachable provider refusing the transaction is a SubmissionError.
export function toSubmitError(err: unknown, operation: string): ProbeError {
  if (err instanceof ProbeError) {
    return err
  }
  if (isTransportError(err)) {
    return new ConnectionError(`${operation}: ${shortMessage(err)}`, err)
  }
  return new SubmissionError(`${operation}: ${shortMessage(err)}`, err)
}

function readField(value: object, key: string): unknown {
  return key in value ? Reflect.get(value, key) : undefined
}

function toQuantity(value: unknown, field: string): number {
  if (typeof value === "number" && Number.isSafeInteger(value)) {
    return value
  }
  if (typeof value === "string" && HEX_QUANTITY.test(value)) {
    return Number(BigInt(value))
  }
  throw new ProviderError(`receipt field ${field} is not a quantity: ${JSON.stringify(value)}`)
}

// Raw JSON-RPC receipt, as returned by the synchronous submission methods.
export function parseRawReceipt(value: unknown): Receipt {
  if (typeof value !== "object" || value == null) {
    throw new ProviderError(`expected a receipt object, got ${JSON.stringify(value)}`)
  }
  const hash = readField(value, "transactionHash")
  if (typeof hash !== "string" || !e.isHexString(hash, 32)) {
    throw new ProviderError(`receipt has no valid transactionHash`)
  }
  const status = readField(value, "status")
  return {
    transactionHash: hash,
    blockNumber: toQuantity(readField(value, "blockNumber"), "blockNumber"),
    status: status == undefined ? null : toQuantity(status, "status"),
  }
}

export class EthersRpcEndpoint implements RpcEndpoint {
  private readonly fetch: e.FetchRequest
  private provider?: e.JsonRpcProvider
  private readonly callStats: CallStats = { requests: 0, responses: 0, totalCallMs: 0 }

  constructor(rpcUrl: string, timeoutMs: number) {
    const fetch = new e.FetchRequest(rpcUrl)
    fetch.timeout = timeoutMs

    fetch.preflightFunc = async (req) => {
      req.setHeader(START_HEADER, Date.now())
      this.callStats.requests++
      return req
    }

    fetch.processFunc = async (req, resp) => {
      const startTimeMs = Number(req.getHeader(START_HEADER))
      this.callStats.responses++
      this.callStats.totalCallMs += Date.now() - startTimeMs
      return resp
    }

    // never retry inside ethers; the probe owns the retry policy
    fetch.retryFunc = async () => false

    this.fetch = fetch
  }

  /**
   * The chain id is fetched with a plain request so that an unreachable
   * endpoint fails here instead of leaving ethers retrying network detection.
   * The provider is then pinned to that network.
   */
  async getChainId(): Promise<bigint> {
    const req = this.fetch.clone()
    req.body = { jsonrpc: "2.0", id: 1, method: "eth_chainId", params: [] }
    let result: unknown
    try {
      const resp = await req.send()
      resp.assertOk()
      const body: unknown = resp.bodyJson
      result = typeof body === "object" && body != null ? readField(body, "result") : undefined
    } catch (err) {
      throw toReadError(err, "eth_chainId")
    }
    if (typeof result !== "string" || !HEX_QUANTITY.test(result)) {
      throw new ProviderError(`eth_chainId returned ${JSON.stringify(result)}`)
    }
    const chainId = BigInt(result)
    if (this.provider == undefined) {
      const network = e.Network.from(chainId)
      // cacheTimeout < 0 disables ethers' request cache; every poll must hit the provider
      this.provider = new e.JsonRpcProvider(this.fetch, network, {
        staticNetwork: network,
        batchMaxCount: 1,
        cacheTimeout: -1,
      })
    }
    return chainId
  }

  private connected(): e.JsonRpcProvider {
    if (this.provider == undefined) {
      throw new ConnectionError("endpoint not connected; call getChainId() first")
    }
    return this.provider
  }

  async getNonce(address: string): Promise<number> {
    try {
      return await this.connected().getTransactionCount(address, "pending")
    } catch (err) {
      throw toReadError(err, "eth_getTransactionCount")
    }
  }

  async getBlockNumber(): Promise<number> {
    try {
      return await this.connected().getBlockNumber()
    } catch (err) {
      throw toReadError(err, "eth_blockNumber")
    }
  }

  async getGasPrice(): Promise<bigint> {
    let result: unknown
    try {
      result = await this.connected().send("eth_gasPrice", [])
    } catch (err) {
      throw toReadError(err, "eth_gasPrice")
    }
    if (typeof result !== "string" || !HEX_QUANTITY.test(result)) {
      throw new ProviderError(`eth_gasPrice returned ${JSON.stringify(result)}`)
    }
    return BigInt(result)
  }

  // Plain send: broadcastTransaction would also fetch the block number inside the timed window.
  async submitTransaction(signedTx: string): Promise<string> {
    let result: unknown
    try {
      result = await this.connected().send("eth_sendRawTransaction", [signedTx])
    } catch (err) {
      throw toSubmitError(err, "eth_sendRawTransaction")
    }
    if (typeof result !== "string" || !e.isHexString(result, 32)) {
      throw new ProviderError(`eth_sendRawTransaction returned ${JSON.stringify(result)}`)
    }
    return result
  }

  async submitTransactionSync(signedTx: string, method: SyncSubmitMethod): Promise<Receipt> {
    const rpcMethod = SYNC_RPC_METHODS[method]
    let result: unknown
    try {
      result = await this.connected().send(rpcMethod, [signedTx])
    } catch (err) {
      throw toSubmitError(err, rpcMethod)
    }
    return parseRawReceipt(result)
  }

  async getReceipt(hash: string): Promise<Receipt | null> {
    let receipt: e.TransactionReceipt | null
    try {
      receipt = await this.connected().getTransactionReceipt(hash)
    } catch (err) {
      throw toReadError(err, "eth_getTransactionReceipt")
    }
    if (receipt == null) {
      return null
    }
    return { transactionHash: receipt.hash, blockNumber: receipt.blockNumber, status: receipt.status }
  }

  stats(): CallStats {
    return { ...this.callStats }
  }

  destroy(): void {
    this.provider?.destroy()
  }
}
