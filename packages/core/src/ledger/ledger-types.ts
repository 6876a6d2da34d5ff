/**
 * Ledger Domain Types
 */

export type DebitResult =
  | { ok: true; balance: number }
  | { ok: false; reason: 'insufficient_funds'; balance: number };

/**
 * Authoritative per-asset balances.
 *
 * Operations on one asset id are linearizable; operations on different ids
 * may run concurrently. A mutation tagged with an operationId is applied at
 * most once per asset, so callers can retry it after a timeout.
 */
export interface LedgerStore {
  getBalance(assetId: string): Promise<number>;
  tryDebit(assetId: string, amount: number, operationId?: string): Promise<DebitResult>;
  credit(assetId: string, amount: number, operationId?: string): Promise<number>;
  hasApplied(assetId: string, operationId: string): Promise<boolean>;
}

export interface InMemoryLedgerStoreOptions {
  /** Simulated backing-store latency, spent while holding the asset lock. */
  latencyMs?: number;
}
