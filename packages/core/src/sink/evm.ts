/**
 * EVM Sink
 *
 * Sink backed by an ERC-20 holder address. Sponsors approve the ledger
 * operator, which pulls with `transferFrom` into the sink address.
 *
 * The delivered amount is read from the `Transfer(from -> sink)` logs of the
 * pull's own receipt, so unrelated inflows to the sink are never counted.
 */

import {
  createWalletClient,
  erc20Abi,
  http,
  isAddressEqual,
  parseEventLogs,
  publicActions,
  type Address,
  type Chain,
  type Hex,
  type Log,
} from "viem";
import { privateKeyToAccount } from "viem/accounts";
import {
  arbitrum,
  arbitrumSepolia,
  base,
  baseSepolia,
  mainnet,
  optimism,
  polygon,
  sepolia,
} from "viem/chains";

import { errorSummary } from "../errors.js";
import type { AssetId } from "../types.js";
import type { AssetSink, ReceiptCheck } from "./interface.js";

// ============================================================================
// Network to Chain Mapping
// ============================================================================

const NETWORK_TO_CHAIN: Record<string, Chain> = {
  arbitrum,
  "arbitrum-sepolia": arbitrumSepolia,
  base,
  "base-sepolia": baseSepolia,
  ethereum: mainnet,
  optimism,
  polygon,
  sepolia,
};

export const SUPPORTED_EVM_NETWORKS = Object.keys(NETWORK_TO_CHAIN);

export function getChain(network: string): Chain | undefined {
  return NETWORK_TO_CHAIN[network];
}

// ============================================================================
// ERC-20 Gateway
// ============================================================================

export interface TransferReceipt {
  status: "success" | "reverted";
  logs: Log[];
}

/**
 * The ERC-20 calls the sink needs. Kept narrow so tests can stub it.
 */
export interface Erc20Gateway {
  /** Operator account that submits `transferFrom`. */
  operator: Address;
  transferFrom(
    token: AssetId,
    from: Address,
    to: Address,
    amount: bigint
  ): Promise<Hex>;
  waitForReceipt(hash: Hex): Promise<TransferReceipt>;
}

export interface PrivateKeyGatewayConfig {
  /** Network name (e.g., "base", "base-sepolia") */
  network: string;
  rpcUrl: string;
  privateKey: Hex;
}

/**
 * Creates an ERC-20 gateway from a private key for a specific network.
 *
 * @example
 * ```typescript
 * const gateway = createPrivateKeyErc20Gateway({
 *   network: "base-sepolia",
 *   rpcUrl: "https://sepolia.base.org",
 *   privateKey: process.env.LEDGER_OPERATOR_PRIVATE_KEY,
 * });
 * ```
 */
export function createPrivateKeyErc20Gateway(
  config: PrivateKeyGatewayConfig
): Erc20Gateway {
  const chain = getChain(config.network);
  if (!chain) {
    throw new Error(`Unsupported EVM network: ${config.network}`);
  }

  const account = privateKeyToAccount(config.privateKey);
  const client = createWalletClient({
    account,
    chain,
    transport: http(config.rpcUrl),
  }).extend(publicActions);

  return {
    operator: account.address,
    transferFrom: (token, from, to, amount) =>
      client.writeContract({
        address: token,
        abi: erc20Abi,
        functionName: "transferFrom",
        args: [from, to, amount],
      }),
    waitForReceipt: async (hash) => {
      const { status, logs } = await client.waitForTransactionReceipt({ hash });
      return { status, logs };
    },
  };
}

/**
 * Sum of `token` moved from `from` to `to` according to a receipt's logs.
 */
export function deliveredAmount(
  logs: Log[],
  token: AssetId,
  from: Address,
  to: Address
): bigint {
  return parseEventLogs({ abi: erc20Abi, eventName: "Transfer", logs })
    .filter(
      (log) =>
        isAddressEqual(log.address, token) &&
        isAddressEqual(log.args.from, from) &&
        isAddressEqual(log.args.to, to)
    )
    .reduce((sum, log) => sum + log.args.value, 0n);
}

// ============================================================================
// Sink
// ============================================================================

export class EvmAssetSink implements AssetSink {
  constructor(
    readonly address: Address,
    private gateway: Erc20Gateway
  ) {}

  /**
   * A mined transfer is final, so `check` cannot stop it; a rejected
   * receipt is logged and the delivered amount is still returned.
   */
  async pull(
    asset: AssetId,
    from: Address,
    amount: bigint,
    check?: ReceiptCheck
  ): Promise<bigint> {
    let hash: Hex;
    try {
      hash = await this.gateway.transferFrom(asset, from, this.address, amount);
    } catch (error) {
      console.error("[Sink] transferFrom failed:", {
        error: errorSummary(error),
        asset,
        from,
        amount: amount.toString(),
        operator: this.gateway.operator,
      });
      throw error;
    }

    const receipt = await this.gateway.waitForReceipt(hash);
    if (receipt.status !== "success") {
      throw new Error(`Transfer ${hash} reverted`);
    }

    const delivered = deliveredAmount(receipt.logs, asset, from, this.address);
    if (check && !check(delivered)) {
      console.warn("[Sink] Settled transfer failed the receipt check:", {
        hash,
        asset,
        from,
        delivered: delivered.toString(),
      });
    }
    return delivered;
  }
}
