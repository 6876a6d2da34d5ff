/**
 * Fault-injecting wrappers around the in-memory stores
 * Each scheduled fault fires once, optionally after letting the call apply
 */

import type { DebitResult, LedgerStore } from '../../ledger/ledger-types.js';
import type { InMemoryLedgerStore } from '../../ledger/ledger-store.js';
import type { InMemoryTransactionLog } from '../../transactions/transaction-log.js';
import type {
  TerminalOutcome,
  TerminalStatus,
  Transaction,
  TransactionLog,
} from '../../transactions/transaction-types.js';
import { StoreTimeoutError } from '../../store-errors.js';

export interface Fault {
  /** Error to throw; defaults to a StoreTimeoutError for the method */
  error?: () => Error;
  /** Let the underlying call apply before throwing */
  applyFirst?: boolean;
  /** Only fire for this asset id */
  assetId?: string;
  /** Number of consecutive calls to fail */
  times?: number;
}

class FaultQueue<M extends string> {
  private readonly faults: Array<Fault & { method: M }> = [];

  add(method: M, fault: Fault): void {
    const times = fault.times ?? 1;
    for (let i = 0; i < times; i++) {
      this.faults.push({ ...fault, method });
    }
  }

  async run<T>(method: M, assetId: string | undefined, call: () => Promise<T>): Promise<T> {
    const index = this.faults.findIndex(
      (fault) =>
        fault.method === method && (fault.assetId === undefined || fault.assetId === assetId)
    );
    const fault = this.faults[index];
    if (index === -1 || !fault) {
      return call();
    }
    this.faults.splice(index, 1);
    if (fault.applyFirst) {
      await call();
    }
    throw fault.error ? fault.error() : new StoreTimeoutError(method);
  }
}

type LedgerMethod = 'getBalance' | 'tryDebit' | 'credit' | 'hasApplied';

export class FaultyLedgerStore implements LedgerStore {
  private readonly faults = new FaultQueue<LedgerMethod>();

  constructor(readonly inner: InMemoryLedgerStore) {}

  failNext(method: LedgerMethod, fault: Fault = {}): this {
    this.faults.add(method, fault);
    return this;
  }

  getBalance(assetId: string): Promise<number> {
    return this.faults.run('getBalance', assetId, () => this.inner.getBalance(assetId));
  }

  tryDebit(assetId: string, amount: number, operationId?: string): Promise<DebitResult> {
    return this.faults.run('tryDebit', assetId, () =>
      this.inner.tryDebit(assetId, amount, operationId)
    );
  }

  credit(assetId: string, amount: number, operationId?: string): Promise<number> {
    return this.faults.run('credit', assetId, () => this.inner.credit(assetId, amount, operationId));
  }

  hasApplied(assetId: string, operationId: string): Promise<boolean> {
    return this.faults.run('hasApplied', assetId, () => this.inner.hasApplied(assetId, operationId));
  }
}

type LogMethod = 'lookup' | 'append' | 'markTerminal';

export class FaultyTransactionLog implements TransactionLog {
  private readonly faults = new FaultQueue<LogMethod>();

  constructor(readonly inner: InMemoryTransactionLog) {}

  failNext(method: LogMethod, fault: Fault = {}): this {
    this.faults.add(method, fault);
    return this;
  }

  lookup(idempotencyKey: string): Promise<Transaction | null> {
    return this.faults.run('lookup', undefined, () => this.inner.lookup(idempotencyKey));
  }

  get(transactionId: string): Promise<Transaction | null> {
    return this.inner.get(transactionId);
  }

  append(transaction: Transaction): Promise<void> {
    return this.faults.run('append', undefined, () => this.inner.append(transaction));
  }

  markTerminal(
    transactionId: string,
    status: TerminalStatus,
    outcome?: TerminalOutcome
  ): Promise<Transaction> {
    return this.faults.run('markTerminal', undefined, () =>
      this.inner.markTerminal(transactionId, status, outcome)
    );
  }

  list(): Promise<Transaction[]> {
    return this.inner.list();
  }

  listPending(): Promise<Transaction[]> {
    return this.inner.listPending();
  }
}
