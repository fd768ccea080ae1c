#!/usr/bin/env node
import { Wallet } from "ethers"
import safeJsonStringify from "safe-json-stringify"
import { ProbeConfig, loadConfig } from "./config"
import { errorMessage } from "./errors"
import { LatencyProbe } from "./latency_probe"
import { ResultReporter } from "./reporter"
import { EthersRpcEndpoint, RpcEndpoint } from "./rpc_endpoint"
import { TransactionBuilder, createSigner, resolveGasPrice } from "./transaction_builder"

export type CliOptions = {
  loadConfig?: () => ProbeConfig;
  connect?: (config: ProbeConfig) => RpcEndpoint;
  write?: (line: string) => void;
  signal?: AbortSignal;
};

function errorDetails(err: unknown): string {
  const details = err instanceof Error ? safeJsonStringify(err) : String(err)
  return `${errorMessage(err)} (err: ${details})`
}

/**
 * Runs one probe. Resolves the process exit code: 0 once the run completes,
 * even with failed iterations; 1 for invalid configuration or key material,
 * or when the endpoint cannot be reached before the first iteration.
 */
export async function runCli(options: CliOptions = {}): Promise<number> {
  const write = options.write ?? console.log
  const connect = options.connect ?? ((cfg: ProbeConfig) => new EthersRpcEndpoint(cfg.rpcUrl, cfg.rpcTimeoutMs))

  let config: ProbeConfig
  let signer: Wallet
  try {
    config = (options.loadConfig ?? loadConfig)()
    signer = createSigner(config.privateKey)
  } catch (err) {
    console.error(`${err instanceof Error ? err.name : "Error"}: ${errorMessage(err)}`)
    return 1
  }

  const endpoint = connect(config)
  try {
    let chainId: bigint
    let gasPrice: bigint
    try {
      chainId = await endpoint.getChainId()
      const block = await endpoint.getBlockNumber()
      gasPrice = await resolveGasPrice(endpoint, config, write)
      write(`Current block: ${block}`)
    } catch (err) {
      console.error(`Endpoint ${config.rpcUrl} is not usable: ${errorDetails(err)}`)
      return 1
    }

    const builder = new TransactionBuilder(signer, chainId, config.gasLimit)
    const reporter = new ResultReporter(write)
    reporter.printHeader({
      rpcUrl: config.rpcUrl,
      chainId,
      address: builder.address,
      gasPrice,
      submitMethod: config.submitMethod,
      iterations: config.iterations,
    })

    const probe = new LatencyProbe(config, {
      endpoint,
      builder,
      chainId,
      gasPrice,
      log: write,
      onResult: (result) => reporter.printIteration(result),
    })

    try {
      const run = await probe.run(options.signal)
      reporter.printSummary(run, endpoint.stats())
    } catch (err) {
      console.error(`Probe aborted: ${errorDetails(err)}`)
      return 1
    }
    return 0
  } finally {
    endpoint.destroy()
  }
}

if (require.main === module) {
  const controller = new AbortController()
  process.once("SIGINT", () => {
    console.log("\nInterrupted, stopping probe (submitted transactions stay on chain)")
    controller.abort()
  })

  runCli({ signal: controller.signal })
    .then((code) => {
      process.exit(code)
    })
    .catch((error) => {
      console.error("Fatal error:", error)
      process.exit(1)
    })
}
