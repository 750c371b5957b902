/**
 * @capstream/types — Shared domain types for the capstream stack.
 *
 * Used across all capstream packages:
 * - Stream records and asset identifiers
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Stream types
export type {
  Address,
  AssetId,
  StreamRecord,
  SerializedStreamRecord,
  StreamView,
} from "./stream.js";
export { NATIVE_ASSET, ZERO_ADDRESS, EMPTY_STREAM } from "./stream.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  isAddressLike,
  isUintString,
  isIntString,
  isSerializedStreamRecord,
} from "./guards.js";
