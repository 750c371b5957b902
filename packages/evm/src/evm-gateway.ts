/**
 * EVM Transfer Gateway — pays stream withdrawals on an EVM chain.
 *
 * Uses viem for all chain interactions. The gateway signs with a single
 * local account whose balances are the ledger's holdings.
 *
 * Capabilities:
 * - Native transfers (sendTransaction)
 * - ERC-20 transfers (simulate, then write `transfer`)
 * - Native and ERC-20 balance reads for the vault account
 *
 * A transfer counts as delivered only once its receipt reports success.
 * Once a transaction is broadcast, failing to read its receipt throws
 * TransferPendingError with the hash instead of reporting a failure.
 */

import {
  createPublicClient,
  createWalletClient,
  http,
  parseAbiItem,
  type Chain,
  type Hash,
  type HttpTransport,
  type PublicClient,
  type WalletClient,
} from "viem";
import { privateKeyToAccount, type PrivateKeyAccount } from "viem/accounts";
import { NATIVE_ASSET } from "@capstream/types";
import type { Address, AssetId } from "@capstream/types";
import type { TransferGateway } from "@capstream/streams";
import { TransferPendingError } from "@capstream/streams";
import { resolveChain } from "./chains.js";

// ERC-20 ABI fragments
const ERC20_TRANSFER = parseAbiItem(
  "function transfer(address to, uint256 value) returns (bool)",
);
const ERC20_BALANCE_OF = parseAbiItem(
  "function balanceOf(address owner) view returns (uint256)",
);

export interface EvmGatewayConfig {
  /** CAIP-2 chain id, e.g. "eip155:1". */
  readonly chainId: string;
  readonly rpcUrl: string;
  /** Key of the account holding the ledger's funds. */
  readonly privateKey: `0x${string}`;
  readonly timeoutMs?: number;
  /** Blocks to wait for before a transfer counts as delivered. Default 1. */
  readonly confirmations?: number;
}

// =============================================================================
// EVM Transfer Gateway
// =============================================================================

export class EvmTransferGateway implements TransferGateway {
  readonly chainId: string;
  /** The vault account's address. */
  readonly address: Address;

  private readonly chain: Chain;
  private readonly account: PrivateKeyAccount;
  private readonly confirmations: number;
  private readonly publicClient: PublicClient<HttpTransport, Chain>;
  private readonly walletClient: WalletClient<HttpTransport, Chain, PrivateKeyAccount>;

  constructor(config: EvmGatewayConfig) {
    this.chain = resolveChain(config.chainId);
    this.chainId = config.chainId;
    this.account = privateKeyToAccount(config.privateKey);
    this.address = this.account.address;
    this.confirmations = config.confirmations ?? 1;

    const transport = http(config.rpcUrl, { timeout: config.timeoutMs ?? 30_000 });
    this.publicClient = createPublicClient({ chain: this.chain, transport });
    this.walletClient = createWalletClient({
      account: this.account,
      chain: this.chain,
      transport,
    });
  }

  async transferNative(to: Address, amount: bigint): Promise<boolean> {
    const hash = await this.walletClient.sendTransaction({
      account: this.account,
      chain: this.chain,
      to,
      value: amount,
    });
    return this.confirmed(hash);
  }

  async transferToken(token: AssetId, to: Address, amount: bigint): Promise<boolean> {
    const { result, request } = await this.publicClient.simulateContract({
      account: this.account,
      address: token,
      abi: [ERC20_TRANSFER],
      functionName: "transfer",
      args: [to, amount],
    });
    // Tokens that signal failure by returning false instead of reverting
    if (!result) {
      return false;
    }
    const hash = await this.walletClient.writeContract(request);
    return this.confirmed(hash);
  }

  async balanceOf(asset: AssetId): Promise<bigint> {
    if (asset === NATIVE_ASSET) {
      return this.publicClient.getBalance({ address: this.address });
    }
    return this.publicClient.readContract({
      address: asset,
      abi: [ERC20_BALANCE_OF],
      functionName: "balanceOf",
      args: [this.address],
    });
  }

  // ===========================================================================
  // Private helpers
  // ===========================================================================

  private async confirmed(hash: Hash): Promise<boolean> {
    let status: "success" | "reverted";
    try {
      ({ status } = await this.publicClient.waitForTransactionReceipt({
        hash,
        confirmations: this.confirmations,
      }));
    } catch (err) {
      throw new TransferPendingError(hash, { cause: err });
    }
    return status === "success";
  }
}
