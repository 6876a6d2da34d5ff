/**
 * In-memory LedgerStore
 *
 * Mutex-guarded balance map. Used by tests and single-process deployments;
 * durable stores implement the same LedgerStore contract.
 *
 * Applied operation ids are kept for the life of the store so that hasApplied
 * can answer for any past mutation. They are never pruned: memory grows with
 * the number of transfers, and a long-lived deployment needs a retention
 * policy that outlasts its longest retry window.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { KeyedMutex } from './keyed-mutex.js';
import { AssetExistsError, AssetNotFoundError, InvalidAmountError } from './ledger-errors.js';
import type { DebitResult, InMemoryLedgerStoreOptions, LedgerStore } from './ledger-types.js';

export class InMemoryLedgerStore implements LedgerStore {
  private readonly balances = new Map<string, number>();
  private readonly appliedOperations = new Map<string, Set<string>>();
  private readonly mutex = new KeyedMutex();
  private readonly latencyMs: number;

  constructor(initialBalances: Record<string, number> = {}, options: InMemoryLedgerStoreOptions = {}) {
    this.latencyMs = options.latencyMs ?? 0;
    for (const [assetId, balance] of Object.entries(initialBalances)) {
      this.register(assetId, balance);
    }
  }

  /**
   * Register a new asset with an opening balance
   */
  async openAsset(assetId: string, balance = 0): Promise<void> {
    await this.mutex.runExclusive(assetId, () => this.register(assetId, balance));
  }

  async getBalance(assetId: string): Promise<number> {
    return this.mutex.runExclusive(assetId, async () => {
      const balance = this.requireBalance(assetId);
      await this.pause();
      return balance;
    });
  }

  /**
   * Debit iff the balance covers the amount. The read and the write happen
   * under the asset's lock, so concurrent debits can never overdraw.
   */
  async tryDebit(assetId: string, amount: number, operationId?: string): Promise<DebitResult> {
    assertPositiveAmount(amount);
    return this.mutex.runExclusive(assetId, async () => {
      const balance = this.requireBalance(assetId);
      await this.pause();

      if (operationId !== undefined && this.wasApplied(assetId, operationId)) {
        return { ok: true, balance };
      }
      if (balance < amount) {
        return { ok: false, reason: 'insufficient_funds', balance };
      }

      const next = balance - amount;
      this.balances.set(assetId, next);
      this.recordOperation(assetId, operationId);
      return { ok: true, balance: next };
    });
  }

  async credit(assetId: string, amount: number, operationId?: string): Promise<number> {
    assertPositiveAmount(amount);
    return this.mutex.runExclusive(assetId, async () => {
      const balance = this.requireBalance(assetId);
      await this.pause();

      if (operationId !== undefined && this.wasApplied(assetId, operationId)) {
        return balance;
      }

      const next = balance + amount;
      if (!Number.isSafeInteger(next)) {
        throw new InvalidAmountError(amount, `credit would overflow ${assetId}`);
      }
      this.balances.set(assetId, next);
      this.recordOperation(assetId, operationId);
      return next;
    });
  }

  async hasApplied(assetId: string, operationId: string): Promise<boolean> {
    return this.mutex.runExclusive(assetId, () => {
      this.requireBalance(assetId);
      return this.wasApplied(assetId, operationId);
    });
  }

  /**
   * Copy of every balance, keyed by asset id
   */
  snapshot(): Record<string, number> {
    return Object.fromEntries(this.balances);
  }

  private register(assetId: string, balance: number): void {
    if (this.balances.has(assetId)) {
      throw new AssetExistsError(assetId);
    }
    if (!Number.isSafeInteger(balance) || balance < 0) {
      throw new InvalidAmountError(balance, 'opening balance must be a non-negative integer');
    }
    this.balances.set(assetId, balance);
  }

  private requireBalance(assetId: string): number {
    const balance = this.balances.get(assetId);
    if (balance === undefined) {
      throw new AssetNotFoundError(assetId);
    }
    return balance;
  }

  private wasApplied(assetId: string, operationId: string): boolean {
    return this.appliedOperations.get(assetId)?.has(operationId) ?? false;
  }

  private recordOperation(assetId: string, operationId: string | undefined): void {
    if (operationId === undefined) return;
    const operations = this.appliedOperations.get(assetId) ?? new Set<string>();
    operations.add(operationId);
    this.appliedOperations.set(assetId, operations);
  }

  private async pause(): Promise<void> {
    if (this.latencyMs > 0) {
      await sleep(this.latencyMs);
    }
  }
}

function assertPositiveAmount(amount: number): void {
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw new InvalidAmountError(amount, 'must be a positive integer');
  }
}
