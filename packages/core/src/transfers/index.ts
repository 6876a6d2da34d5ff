/**
 * Transfers Domain
 *
 * Idempotent submission, debit/credit orchestration and compensation
 */

export { TransferOrchestrator, toTransferResult, FAILURE_REASONS } from './transfer-orchestrator.js';
export type {
  TransferOrchestratorDeps,
  TransferRequest,
  TransferRequestInput,
  TransferResult,
} from './transfer-types.js';

export { TransferEventEmitter, transferEvents } from './transfer-events.js';
export type {
  TransferEvent,
  TransferEventType,
  TransferAlertType,
  TransferEventHandler,
  TransferEventSink,
} from './transfer-events.js';

export { loadTransferConfig, DEFAULT_TRANSFER_CONFIG } from './transfer-config.js';
export type { TransferConfig } from './transfer-config.js';

export { withRetry, backoffDelay } from './retry.js';
export type { RetryOptions } from './retry.js';

export {
  TransferError,
  TransferValidationError,
  TransferConflictError,
  IdempotencyMismatchError,
  TransferUnresolvedError,
  CompensationFailedError,
} from './transfer-errors.js';
