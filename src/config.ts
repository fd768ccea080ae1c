import * as dotenv from "dotenv"
import { ConfigError } from "./errors"

export type SubmitMethod = "standard" | "sync" | "realtime"

export type ProbeConfig = {
  rpcUrl: string;
  privateKey: string;
  iterations: number;
  pollIntervalMs: number;
  receiptTimeoutMs: number;
  iterationDelayMs: number;
  rpcTimeoutMs: number;
  readRetries: number;
  retryDelayMs: number;
  continueOnFailure: boolean;
  gasLimit: bigint;
  gasPriceWei?: bigint;
  gasPriceMultiplier: number;
  submitMethod: SubmitMethod;
};

type Env = Record<string, string | undefined>

export const DEFAULT_CONFIG = {
  iterations: 10,
  pollIntervalMs: 100,
  receiptTimeoutMs: 60_000,
  iterationDelayMs: 1000,
  rpcTimeoutMs: 10_000,
  readRetries: 3,
  retryDelayMs: 500,
  continueOnFailure: true,
  gasLimit: 21000n,
  gasPriceMultiplier: 1,
  submitMethod: "standard",
} satisfies Omit<ProbeConfig, "rpcUrl" | "privateKey">

const SUBMIT_METHODS: readonly SubmitMethod[] = ["standard", "sync", "realtime"]

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim()
  return value ? value : undefined
}

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = readString(env, name)
  if (raw == undefined) {
    return fallback
  }
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`)
  }
  const value = Number(raw)
  if (!Number.isSafeInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`)
  }
  return value
}

function readBigInt(env: Env, name: string): bigint | undefined {
  const raw = readString(env, name)
  if (raw == undefined) {
    return undefined
  }
  if (!/^\d+$/.test(raw) || BigInt(raw) === 0n) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`)
  }
  return BigInt(raw)
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = readString(env, name)?.toLowerCase()
  if (raw == undefined) {
    return fallback
  }
  if (["true", "1", "yes"].includes(raw)) return true
  if (["false", "0", "no"].includes(raw)) return false
  throw new ConfigError(`${name} must be true or false, got "${raw}"`)
}

function readRpcUrl(env: Env): string {
  const raw = readString(env, "RPC_PROVIDER")
  if (raw == undefined) {
    throw new ConfigError("RPC_PROVIDER must be set")
  }
  let url: URL
  try {
    url = new URL(raw)
  } catch {
    throw new ConfigError(`RPC_PROVIDER is not a valid URL: "${raw}"`)
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigError(`RPC_PROVIDER must be an http(s) URL, got "${url.protocol}"`)
  }
  return raw
}

function readPrivateKey(env: Env): string {
  const raw = readString(env, "PRIVATE_KEY_1")
  if (raw == undefined) {
    throw new ConfigError("PRIVATE_KEY_1 must be set")
  }
  const key = raw.startsWith("0x") ? raw : `0x${raw}`
  if (!/^0x[0-9a-fA-F]{64}$/.test(key)) {
    throw new ConfigError("PRIVATE_KEY_1 must be 32 bytes of hex")
  }
  return key
}

const MIN_MULTIPLIER = 0.0001

function readMultiplier(env: Env): number {
  const raw = readString(env, "GAS_PRICE_MULTIPLIER")
  if (raw == undefined) {
    return DEFAULT_CONFIG.gasPriceMultiplier
  }
  const value = Number(raw)
  if (!/^\d+(\.\d+)?$/.test(raw) || !Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`GAS_PRICE_MULTIPLIER must be a positive number, got "${raw}"`)
  }
  // applied in basis points, anything smaller rounds to zero
  if (value < MIN_MULTIPLIER) {
    throw new ConfigError(`GAS_PRICE_MULTIPLIER must be at least ${MIN_MULTIPLIER}, got "${raw}"`)
  }
  return value
}

function readSubmitMethod(env: Env): SubmitMethod {
  const raw = readString(env, "SUBMIT_METHOD")?.toLowerCase()
  if (raw == undefined) {
    return DEFAULT_CONFIG.submitMethod
  }
  const method = SUBMIT_METHODS.find((m) => m === raw)
  if (method == undefined) {
    throw new ConfigError(`SUBMIT_METHOD must be one of ${SUBMIT_METHODS.join(", ")}, got "${raw}"`)
  }
  return method
}

export function parseConfig(env: Env): ProbeConfig {
  return {
    rpcUrl: readRpcUrl(env),
    privateKey: readPrivateKey(env),
    iterations: readInt(env, "ITERATIONS", DEFAULT_CONFIG.iterations, 1),
    pollIntervalMs: readInt(env, "POLL_INTERVAL_MS", DEFAULT_CONFIG.pollIntervalMs, 1),
    receiptTimeoutMs: readInt(env, "RECEIPT_TIMEOUT_MS", DEFAULT_CONFIG.receiptTimeoutMs, 1),
    iterationDelayMs: readInt(env, "ITERATION_DELAY_MS", DEFAULT_CONFIG.iterationDelayMs, 0),
    rpcTimeoutMs: readInt(env, "RPC_TIMEOUT_MS", DEFAULT_CONFIG.rpcTimeoutMs, 1),
    readRetries: readInt(env, "READ_RETRIES", DEFAULT_CONFIG.readRetries, 0),
    retryDelayMs: readInt(env, "RETRY_DELAY_MS", DEFAULT_CONFIG.retryDelayMs, 0),
    continueOnFailure: readBool(env, "CONTINUE_ON_FAILURE", DEFAULT_CONFIG.continueOnFailure),
    gasLimit: readBigInt(env, "GAS_LIMIT") ?? DEFAULT_CONFIG.gasLimit,
    gasPriceWei: readBigInt(env, "GAS_PRICE_WEI"),
    gasPriceMultiplier: readMultiplier(env),
    submitMethod: readSubmitMethod(env),
  }
}

// Reads .env into process.env (existing variables win) and validates the result.
export function loadConfig(): ProbeConfig {
  dotenv.config()
  return parseConfig(process.env)
}
