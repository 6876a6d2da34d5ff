/**
 * Transfer Domain Types
 */

import type { Logger } from '@ledgerline/observability';
import type { LedgerStore } from '../ledger/ledger-types.js';
import type { TransactionLog } from '../transactions/transaction-types.js';
import type { TransferConfig } from './transfer-config.js';
import type { TransferEventSink } from './transfer-events.js';

export type {
  TransferRequest,
  TransferRequestInput,
  TransferResult,
} from '@ledgerline/types';

export interface TransferOrchestratorDeps {
  ledger: LedgerStore;
  transactions: TransactionLog;
  events?: TransferEventSink;
  logger?: Logger;
  config?: Partial<TransferConfig>;
  now?: () => Date;
  generateId?: () => string;
}
