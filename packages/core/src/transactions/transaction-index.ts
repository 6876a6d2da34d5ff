/**
 * Transaction Index
 *
 * Synchronous bookkeeping shared by every TransactionLog implementation.
 * Validation is split from storage so that durable logs can persist a record
 * between the two steps.
 */

import { TerminalStatusSchema } from '@ledgerline/types';
import { DuplicateKeyError, InvalidTransitionError } from './transaction-errors.js';
import type { TerminalOutcome, TerminalStatus, Transaction } from './transaction-types.js';

export class TransactionIndex {
  private readonly byKey = new Map<string, Transaction>();
  private readonly keyById = new Map<string, string>();

  lookup(idempotencyKey: string): Transaction | null {
    return this.byKey.get(idempotencyKey) ?? null;
  }

  get(transactionId: string): Transaction | null {
    const key = this.keyById.get(transactionId);
    return key === undefined ? null : this.lookup(key);
  }

  /**
   * Validate a new record and return the copy that will be stored
   */
  prepareAppend(transaction: Transaction): Transaction {
    if (transaction.status !== 'PENDING') {
      throw new InvalidTransitionError(
        `New transactions must be PENDING, got ${transaction.status} for ${transaction.id}`
      );
    }
    if (this.byKey.has(transaction.idempotencyKey)) {
      throw new DuplicateKeyError(transaction.idempotencyKey);
    }
    if (this.keyById.has(transaction.id)) {
      throw new InvalidTransitionError(`Transaction id already recorded: ${transaction.id}`);
    }
    return freeze(transaction);
  }

  /**
   * Validate a PENDING -> terminal transition and return the updated copy
   */
  prepareTerminal(
    transactionId: string,
    status: TerminalStatus,
    outcome: TerminalOutcome,
    now: () => Date
  ): Transaction {
    if (!TerminalStatusSchema.safeParse(status).success) {
      throw new InvalidTransitionError(`Cannot transition ${transactionId} to ${String(status)}`);
    }
    const current = this.get(transactionId);
    if (!current) {
      throw new InvalidTransitionError(`Transaction not found: ${transactionId}`);
    }
    if (current.status !== 'PENDING') {
      throw new InvalidTransitionError(
        `Transaction ${transactionId} is already ${current.status}`
      );
    }
    return freeze({
      ...current,
      status,
      completedAt: outcome.completedAt ?? now().toISOString(),
      failureReason: outcome.failureReason ?? null,
      balanceAfter: outcome.balanceAfter ?? null,
    });
  }

  store(transaction: Transaction): void {
    this.byKey.set(transaction.idempotencyKey, transaction);
    this.keyById.set(transaction.id, transaction.idempotencyKey);
  }

  list(): Transaction[] {
    return [...this.byKey.values()];
  }

  listPending(): Transaction[] {
    return this.list().filter((transaction) => transaction.status === 'PENDING');
  }

  clear(): void {
    this.byKey.clear();
    this.keyById.clear();
  }
}

function freeze(transaction: Transaction): Transaction {
  return Object.freeze({ ...transaction, metadata: Object.freeze({ ...transaction.metadata }) });
}
