/**
 * Ledger Domain
 *
 * Per-asset balances with atomic debit and credit
 */

export { InMemoryLedgerStore } from './ledger-store.js';
export { KeyedMutex } from './keyed-mutex.js';

export type { DebitResult, LedgerStore, InMemoryLedgerStoreOptions } from './ledger-types.js';

export {
  LedgerError,
  AssetNotFoundError,
  AssetExistsError,
  InvalidAmountError,
} from './ledger-errors.js';
