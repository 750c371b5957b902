/**
 * Type barrel — re-exports all public types from @capstream/node.
 */

// DTOs
export {
  UintStringSchema,
  AddressStringSchema,
  CreateStreamSchema,
  CreateStreamQuerySchema,
  UpdateCapSchema,
  BatchCreateSchema,
  QueryStreamsSchema,
  WithdrawSchema,
  TransferOwnershipSchema,
  ListEventsQuerySchema,
  toStreamViewDto,
  toWithdrawalReceiptDto,
} from "./dto.js";
export type {
  CreateStreamDto,
  UpdateCapDto,
  BatchCreateDto,
  QueryStreamsDto,
  WithdrawDto,
  TransferOwnershipDto,
  ListEventsQuery,
  StreamViewDto,
  WithdrawalReceiptDto,
} from "./dto.js";

// Error
export { ApiError, createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
