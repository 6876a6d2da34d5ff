/**
 * In-memory TransactionLog
 *
 * For tests and deterministic replay. Records do not survive a restart;
 * use FileTransactionLog where history must.
 */

import { TransactionIndex } from './transaction-index.js';
import type {
  TerminalOutcome,
  TerminalStatus,
  Transaction,
  TransactionLog,
} from './transaction-types.js';

export class InMemoryTransactionLog implements TransactionLog {
  private readonly index = new TransactionIndex();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async lookup(idempotencyKey: string): Promise<Transaction | null> {
    return this.index.lookup(idempotencyKey);
  }

  async get(transactionId: string): Promise<Transaction | null> {
    return this.index.get(transactionId);
  }

  async append(transaction: Transaction): Promise<void> {
    this.index.store(this.index.prepareAppend(transaction));
  }

  async markTerminal(
    transactionId: string,
    status: TerminalStatus,
    outcome: TerminalOutcome = {}
  ): Promise<Transaction> {
    const updated = this.index.prepareTerminal(transactionId, status, outcome, this.now);
    this.index.store(updated);
    return updated;
  }

  async list(): Promise<Transaction[]> {
    return this.index.list();
  }

  async listPending(): Promise<Transaction[]> {
    return this.index.listPending();
  }

  /** Reset for tests. Not on TransactionLog interface. */
  clear(): void {
    this.index.clear();
  }
}
