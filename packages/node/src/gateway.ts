/**
 * Transfer gateway selection from configuration.
 */

import { InMemoryVault } from "@capstream/streams";
import type { TransferGateway } from "@capstream/streams";
import { EvmTransferGateway } from "@capstream/evm";
import type { AppConfig } from "./config.js";
import { parseVaultSeed } from "./config.js";

export interface GatewayChoice {
  readonly gateway: TransferGateway;
  /** Human-readable description for the startup log. */
  readonly description: string;
}

export function createGateway(config: AppConfig): GatewayChoice {
  if (config.GATEWAY === "evm") {
    if (config.RPC_URL === undefined || config.VAULT_PRIVATE_KEY === undefined) {
      throw new Error("GATEWAY=evm requires RPC_URL and VAULT_PRIVATE_KEY");
    }
    const gateway = new EvmTransferGateway({
      chainId: config.CHAIN_ID,
      rpcUrl: config.RPC_URL,
      privateKey: config.VAULT_PRIVATE_KEY,
    });
    return {
      gateway,
      description: `evm ${gateway.chainId} vault ${gateway.address}`,
    };
  }

  const vault = new InMemoryVault();
  const seed = parseVaultSeed(config.VAULT_SEED);
  for (const entry of seed) {
    vault.deposit(entry.asset, entry.amount);
  }
  return {
    gateway: vault,
    description: `in-memory vault (${seed.length} seeded assets)`,
  };
}
