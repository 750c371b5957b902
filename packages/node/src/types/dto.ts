/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Amounts travel as decimal strings in both directions; addresses are
 * passed through as given and normalised by the ledger.
 */

import { z } from "zod";
import type { StreamView } from "@capstream/types";
import type { WithdrawalReceipt } from "@capstream/streams";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Non-negative integer in smallest units, e.g. "1000000000000000000". */
export const UintStringSchema = z
  .string()
  .regex(/^\d+$/, "must be a non-negative integer string")
  .transform((value) => BigInt(value));

export const AddressStringSchema = z.string().min(1);

// =============================================================================
// Stream DTOs
// =============================================================================

export const CreateStreamSchema = z.object({
  recipient: AddressStringSchema,
  cap: UintStringSchema,
  asset: AddressStringSchema.optional(),
});

export type CreateStreamDto = z.infer<typeof CreateStreamSchema>;

export const CreateStreamQuerySchema = z.object({
  mode: z.enum(["replace", "absent"]).default("replace"),
});

export const UpdateCapSchema = z.object({
  cap: UintStringSchema,
});

export type UpdateCapDto = z.infer<typeof UpdateCapSchema>;

/** Lengths are checked by the ledger (INVALID_ARRAY_INPUT), not here. */
export const BatchCreateSchema = z.object({
  recipients: z.array(AddressStringSchema),
  caps: z.array(UintStringSchema),
  assets: z.array(AddressStringSchema),
});

export type BatchCreateDto = z.infer<typeof BatchCreateSchema>;

export const QueryStreamsSchema = z.object({
  recipients: z.array(AddressStringSchema).max(500),
});

export type QueryStreamsDto = z.infer<typeof QueryStreamsSchema>;

// =============================================================================
// Withdrawal DTOs
// =============================================================================

export const WithdrawSchema = z.object({
  amount: UintStringSchema,
  memo: z.string().max(1024).default(""),
});

export type WithdrawDto = z.infer<typeof WithdrawSchema>;

// =============================================================================
// Ownership DTOs
// =============================================================================

export const TransferOwnershipSchema = z.object({
  newOwner: AddressStringSchema,
});

export type TransferOwnershipDto = z.infer<typeof TransferOwnershipSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = z.object({
  afterPosition: z.coerce.number().int().min(0).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

// =============================================================================
// Response shapes
// =============================================================================

export interface StreamViewDto {
  readonly recipient: string;
  readonly cap: string;
  readonly last: string;
  readonly asset: string;
  readonly unlocked: string;
}

export interface WithdrawalReceiptDto {
  readonly recipient: string;
  readonly asset: string;
  readonly amount: string;
  readonly memo: string;
  readonly previousLast: string;
  readonly last: string;
  readonly remainingUnlocked: string;
  readonly withdrawnAt: string;
  readonly status: "confirmed" | "pending";
  readonly txHash?: string;
}

export function toStreamViewDto(view: StreamView): StreamViewDto {
  return {
    recipient: view.recipient,
    cap: view.cap.toString(),
    last: view.last.toString(),
    asset: view.asset,
    unlocked: view.unlocked.toString(),
  };
}

export function toWithdrawalReceiptDto(receipt: WithdrawalReceipt): WithdrawalReceiptDto {
  return {
    recipient: receipt.recipient,
    asset: receipt.asset,
    amount: receipt.amount.toString(),
    memo: receipt.memo,
    previousLast: receipt.previousLast.toString(),
    last: receipt.last.toString(),
    remainingUnlocked: receipt.remainingUnlocked.toString(),
    withdrawnAt: receipt.withdrawnAt.toString(),
    status: receipt.status,
    ...(receipt.txHash !== undefined ? { txHash: receipt.txHash } : {}),
  };
}
