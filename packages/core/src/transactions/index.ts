/**
 * Transactions Domain
 *
 * Append-only transaction history keyed by idempotency key
 */

export { InMemoryTransactionLog } from './transaction-log.js';
export { FileTransactionLog } from './file-transaction-log.js';
export { TransactionIndex } from './transaction-index.js';

export type {
  Transaction,
  TransactionLog,
  TransactionStatus,
  TerminalStatus,
  TerminalOutcome,
} from './transaction-types.js';

export {
  TransactionLogError,
  DuplicateKeyError,
  InvalidTransitionError,
  CorruptLogError,
} from './transaction-errors.js';
