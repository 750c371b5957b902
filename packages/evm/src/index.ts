/**
 * @capstream/evm — EVM transfer gateway for the stream ledger.
 */

export { EvmTransferGateway } from "./evm-gateway.js";
export type { EvmGatewayConfig } from "./evm-gateway.js";

export { EVM_CHAINS, isSupportedChain, resolveChain } from "./chains.js";
export type { EvmChainId } from "./chains.js";
