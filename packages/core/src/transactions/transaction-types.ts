/**
 * Transaction Domain Types
 */

import type { TerminalStatus, TransactionStatus } from '@ledgerline/types';

export type { TerminalStatus, TransactionStatus };

export interface Transaction {
  id: string;
  idempotencyKey: string;
  status: TransactionStatus;
  amount: number;
  sourceAssetId: string;
  destinationAssetId: string | null;
  metadata: Record<string, unknown>;
  createdAt: string; // ISO 8601
  completedAt: string | null; // ISO 8601, set on the terminal transition
  failureReason: string | null;
  balanceAfter: number | null; // source balance after the debit, COMMITTED only
}

export interface TerminalOutcome {
  failureReason?: string;
  balanceAfter?: number;
  completedAt?: string;
}

/**
 * Append-only record of submitted transactions, keyed by idempotency key.
 *
 * Once append or markTerminal resolves, every later lookup observes the write.
 */
export interface TransactionLog {
  lookup(idempotencyKey: string): Promise<Transaction | null>;
  get(transactionId: string): Promise<Transaction | null>;
  append(transaction: Transaction): Promise<void>;
  markTerminal(
    transactionId: string,
    status: TerminalStatus,
    outcome?: TerminalOutcome
  ): Promise<Transaction>;
  list(): Promise<Transaction[]>;
  listPending(): Promise<Transaction[]>;
}
