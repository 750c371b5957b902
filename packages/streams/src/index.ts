/**
 * @capstream/streams — capped linear payment streams: registry,
 * accrual, withdrawals, batch creation and single-owner access control.
 */

// Coordinator
export { StreamLedger } from "./stream-ledger.js";

// Components
export { AccessControl } from "./access-control.js";
export { StreamRegistry } from "./registry.js";
export { BatchOps } from "./batch.js";
export { WithdrawalProcessor } from "./withdrawal.js";
export { InMemoryStreamStore } from "./store.js";
export { InMemoryVault } from "./vault.js";
export type { BlockMode } from "./vault.js";
export { SerialExecutor } from "./serial.js";
export { ManualClock, systemClock, toIsoTimestamp } from "./clock.js";

// Accrual & arithmetic
export {
  STREAM_PERIOD,
  advanceCheckpoint,
  effectiveCheckpoint,
  unlockedAmount,
} from "./accrual.js";
export {
  MAX_UINT256,
  checkedAdd,
  checkedMul,
  checkedSub,
  minUint,
  mulDiv,
  mulDivUp,
  parseTimestamp,
  parseUint,
  toUint256,
} from "./uint-math.js";
export { normalizeAddress } from "./address.js";

// Errors
export { StreamError, TransferPendingError, isStreamError } from "./errors.js";
export type { StreamErrorCode } from "./errors.js";

// Types
export type {
  Clock,
  StreamStore,
  TransferGateway,
  StreamGrant,
  WithdrawalReceipt,
  StreamLedgerConfig,
  StreamLedgerSnapshot,
} from "./types.js";
