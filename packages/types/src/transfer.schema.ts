/**
 * Transfer schemas for submission requests and their results
 * Used for request validation and type generation
 */

import { z } from "zod";

export const TRANSACTION_STATUSES = ["PENDING", "COMMITTED", "REJECTED", "FAILED"] as const;

export const TransactionStatusSchema = z.enum(TRANSACTION_STATUSES);

/**
 * Statuses a transaction may end in. PENDING is the only non-terminal one.
 */
export const TerminalStatusSchema = TransactionStatusSchema.exclude(["PENDING"]);

/**
 * Request schema for submitting a transfer
 * - idempotencyKey: client-supplied, unique per logical transfer
 * - sourceAssetId / destinationAssetId: asset identifiers (destination optional)
 * - amount: whole units; sign is checked by the orchestrator so that a
 *   non-positive amount is recorded as a FAILED transaction
 * - metadata: opaque key-value mapping, stored with the transaction
 */
export const TransferRequestSchema = z.object({
  idempotencyKey: z.string().trim().min(1, "Idempotency key is required").max(255),
  sourceAssetId: z.string().trim().min(1, "Source asset is required"),
  destinationAssetId: z.string().trim().min(1, "Destination asset cannot be empty").optional(),
  amount: z
    .number()
    .int("Amount must be a whole number")
    .refine((value) => Number.isSafeInteger(value), "Amount is out of range"),
  metadata: z.record(z.unknown()).optional().default({}),
});

/**
 * Result returned to callers of submit
 * timestamp is the ISO 8601 completion time of a terminal transaction
 */
export const TransferResultSchema = z.object({
  transactionId: z.string(),
  status: TransactionStatusSchema,
  balanceAfter: z.number().int().nonnegative().optional(),
  timestamp: z.string().optional(),
  failureReason: z.string().optional(),
});

export type TransactionStatus = z.infer<typeof TransactionStatusSchema>;
export type TerminalStatus = z.infer<typeof TerminalStatusSchema>;
export type TransferRequestInput = z.input<typeof TransferRequestSchema>;
export type TransferRequest = z.infer<typeof TransferRequestSchema>;
export type TransferResult = z.infer<typeof TransferResultSchema>;
