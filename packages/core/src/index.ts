/**
 * @ledgerline/core - Balance-transfer ledger
 *
 * LedgerStore owns balances, TransactionLog owns transaction records and
 * TransferOrchestrator coordinates both.
 */

export * from './ledger/index.js';
export * from './transactions/index.js';
export * from './transfers/index.js';
export { StoreError, StoreTimeoutError, StoreUnavailableError } from './store-errors.js';
