/**
 * EVM chain table
 *
 * Supported chains keyed by CAIP-2 id, mapped to their viem definitions.
 */

import type { Chain } from "viem";
import {
  mainnet,
  sepolia,
  base,
  arbitrum,
  optimism,
  polygon,
} from "viem/chains";

export const EVM_CHAINS = {
  ETHEREUM_MAINNET: "eip155:1",
  ETHEREUM_SEPOLIA: "eip155:11155111",
  BASE_MAINNET: "eip155:8453",
  ARBITRUM_ONE: "eip155:42161",
  OPTIMISM: "eip155:10",
  POLYGON: "eip155:137",
} as const;

export type EvmChainId = (typeof EVM_CHAINS)[keyof typeof EVM_CHAINS];

const VIEM_CHAINS: Readonly<Record<EvmChainId, Chain>> = {
  "eip155:1": mainnet,
  "eip155:11155111": sepolia,
  "eip155:8453": base,
  "eip155:42161": arbitrum,
  "eip155:10": optimism,
  "eip155:137": polygon,
};

export function isSupportedChain(chainId: string): chainId is EvmChainId {
  return Object.prototype.hasOwnProperty.call(VIEM_CHAINS, chainId);
}

/**
 * Resolve a CAIP-2 id to its viem chain.
 * @throws Error for non-EVM or unsupported ids
 */
export function resolveChain(chainId: string): Chain {
  if (!chainId.startsWith("eip155:")) {
    throw new Error(`expected EVM chain ID (eip155:*), got '${chainId}'`);
  }
  if (!isSupportedChain(chainId)) {
    throw new Error(
      `unsupported chain '${chainId}'. Supported: ${Object.keys(VIEM_CHAINS).join(", ")}`,
    );
  }
  return VIEM_CHAINS[chainId];
}
