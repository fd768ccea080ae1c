import { ethers as e } from "ethers"
import { SigningError, errorMessage } from "./errors"
import { RpcEndpoint } from "./rpc_endpoint"

export type TransactionRecord = {
  nonce: number;
  from: string;
  to: string;
  value: bigint;
  gasLimit: bigint;
  gasPrice: bigint;
  chainId: bigint;
  serialized: string;
  hash: string;
};

export function createSigner(privateKey: string): e.Wallet {
  try {
    return new e.Wallet(privateKey)
  } catch (err) {
    throw new SigningError(`invalid private key: ${errorMessage(err)}`, err)
  }
}

// Multiplier is applied in basis points so the price stays an exact integer.
export function applyMultiplier(gasPrice: bigint, multiplier: number): bigint {
  const bps = BigInt(Math.round(multiplier * 10_000))
  return (gasPrice * bps) / 10_000n
}

// used when the endpoint reports a zero gas price
export const FALLBACK_GAS_PRICE = e.parseUnits("1", "gwei")

export async function resolveGasPrice(
  endpoint: RpcEndpoint,
  opts: { gasPriceWei?: bigint; gasPriceMultiplier: number },
  log: (line: string) => void = console.log,
): Promise<bigint> {
  if (opts.gasPriceWei != undefined) {
    return opts.gasPriceWei
  }
  const gasPrice = applyMultiplier(await endpoint.getGasPrice(), opts.gasPriceMultiplier)
  if (gasPrice === 0n) {
    log(`Warning: RPC returned zero gas price, using ${e.formatUnits(FALLBACK_GAS_PRICE, "gwei")} gwei`)
    return FALLBACK_GAS_PRICE
  }
  return gasPrice
}

/**
 * Builds the probe transaction: a legacy, zero-value transfer from the
 * signer to itself. Signing is deterministic, so identical nonce and gas
 * inputs give an identical serialized transaction and hash.
 */
export class TransactionBuilder {
  constructor(
    private readonly signer: e.Wallet,
    private readonly chainId: bigint,
    private readonly gasLimit: bigint,
  ) {}

  get address(): string {
    return this.signer.address
  }

  async build(nonce: number, gasPrice: bigint): Promise<TransactionRecord> {
    const address = this.signer.address
    const request: e.TransactionRequest = {
      type: 0,
      from: address,
      to: address,
      value: 0n,
      nonce,
      gasLimit: this.gasLimit,
      gasPrice,
      chainId: this.chainId,
    }

    let serialized: string
    try {
      serialized = await this.signer.signTransaction(request)
    } catch (err) {
      throw new SigningError(`failed to sign transaction (nonce ${nonce}): ${errorMessage(err)}`, err)
    }

    return {
      nonce,
      from: address,
      to: address,
      value: 0n,
      gasLimit: this.gasLimit,
      gasPrice,
      chainId: this.chainId,
      serialized,
      hash: e.Transaction.from(serialized).hash ?? e.keccak256(serialized),
    }
  }
}
