/**
 * Transfer Orchestrator
 *
 * Drives a transfer request from PENDING to exactly one terminal state.
 * Owns neither balances nor records: LedgerStore and TransactionLog do.
 */

import { randomUUID } from 'node:crypto';
import { logger as rootLogger, type Logger } from '@ledgerline/observability';
import {
  TransferRequestSchema,
  type TerminalStatus,
  type TransferRequest,
  type TransferRequestInput,
  type TransferResult,
} from '@ledgerline/types';
import { AssetNotFoundError } from '../ledger/ledger-errors.js';
import type { LedgerStore } from '../ledger/ledger-types.js';
import { StoreError, StoreTimeoutError } from '../store-errors.js';
import { DuplicateKeyError, InvalidTransitionError } from '../transactions/transaction-errors.js';
import type {
  TerminalOutcome,
  Transaction,
  TransactionLog,
} from '../transactions/transaction-types.js';
import { withRetry, type RetryOptions } from './retry.js';
import { DEFAULT_TRANSFER_CONFIG, type TransferConfig } from './transfer-config.js';
import {
  CompensationFailedError,
  IdempotencyMismatchError,
  TransferConflictError,
  TransferUnresolvedError,
  TransferValidationError,
} from './transfer-errors.js';
import {
  transferEvents,
  type TransferAlertType,
  type TransferEventSink,
  type TransferEventType,
} from './transfer-events.js';
import type { TransferOrchestratorDeps } from './transfer-types.js';

export const FAILURE_REASONS = {
  invalidAmount: 'amount must be positive',
  unknownAsset: 'unknown asset',
  insufficientFunds: 'insufficient funds',
  destinationCompensated: 'destination invalid, compensated',
  storeTimeout: 'store timeout',
  storeUnavailable: 'store unavailable',
} as const;

const EVENT_FOR_STATUS: Record<TerminalStatus, TransferEventType> = {
  COMMITTED: 'transfer.committed',
  REJECTED: 'transfer.rejected',
  FAILED: 'transfer.failed',
};

type DebitOutcome =
  | { kind: 'debited'; balance: number | undefined }
  | { kind: 'rejected' }
  | { kind: 'failed'; reason: string };

/**
 * Build the caller-facing result from a stored transaction.
 * Derived only from the record, so a replay returns an identical result.
 */
export function toTransferResult(transaction: Transaction): TransferResult {
  const result: TransferResult = {
    transactionId: transaction.id,
    status: transaction.status,
  };
  if (transaction.balanceAfter !== null) result.balanceAfter = transaction.balanceAfter;
  if (transaction.completedAt !== null) result.timestamp = transaction.completedAt;
  if (transaction.failureReason !== null) result.failureReason = transaction.failureReason;
  return result;
}

function storeFailureReason(err: StoreError): string {
  return err instanceof StoreTimeoutError
    ? FAILURE_REASONS.storeTimeout
    : FAILURE_REASONS.storeUnavailable;
}

function isStoreError(err: unknown): boolean {
  return err instanceof StoreError;
}

export class TransferOrchestrator {
  private readonly ledger: LedgerStore;
  private readonly transactions: TransactionLog;
  private readonly events: TransferEventSink;
  private readonly logger: Logger;
  private readonly config: TransferConfig;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(deps: TransferOrchestratorDeps) {
    this.ledger = deps.ledger;
    this.transactions = deps.transactions;
    this.events = deps.events ?? transferEvents;
    this.logger = deps.logger ?? rootLogger.child({ module: 'transfers' });
    this.config = { ...DEFAULT_TRANSFER_CONFIG, ...deps.config };
    this.now = deps.now ?? (() => new Date());
    this.generateId = deps.generateId ?? randomUUID;
  }

  /**
   * Submit a transfer
   *
   * - A terminal record for the key is returned unchanged (no re-execution)
   * - A PENDING record for the key means a duplicate is in flight: conflict
   * - A record for the key with a different amount, source or destination
   *   throws IdempotencyMismatchError instead of replaying
   * - Otherwise a PENDING record is appended and driven to a terminal state
   *
   * Insufficient funds and unknown assets are results, not errors. Every
   * result is persisted before it is returned.
   */
  async submit(input: TransferRequestInput): Promise<TransferResult> {
    const request = this.parseRequest(input);

    const existing = await this.lookup(request.idempotencyKey);
    if (existing) {
      return this.replay(existing, request);
    }

    const pending = this.createPending(request);
    const recorded = await this.record(pending);
    if (recorded.id !== pending.id) {
      return this.replay(recorded, request);
    }

    return this.execute(recorded);
  }

  private parseRequest(input: TransferRequestInput): TransferRequest {
    const parsed = TransferRequestSchema.safeParse(input);
    if (!parsed.success) {
      throw new TransferValidationError(
        parsed.error.issues.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`)
      );
    }
    return parsed.data;
  }

  private replay(transaction: Transaction, request: TransferRequest): TransferResult {
    const sameTransfer =
      transaction.amount === request.amount &&
      transaction.sourceAssetId === request.sourceAssetId &&
      transaction.destinationAssetId === (request.destinationAssetId ?? null);

    if (!sameTransfer) {
      this.logger.error(
        { idempotencyKey: request.idempotencyKey, transactionId: transaction.id },
        'Idempotency key reused for a different transfer'
      );
      throw new IdempotencyMismatchError(request.idempotencyKey);
    }
    if (transaction.status === 'PENDING') {
      this.logger.warn(
        { idempotencyKey: request.idempotencyKey, transactionId: transaction.id },
        'Duplicate submission while transfer is in flight'
      );
      throw new TransferConflictError(request.idempotencyKey, transaction.id);
    }
    return toTransferResult(transaction);
  }

  private createPending(request: TransferRequest): Transaction {
    return {
      id: this.generateId(),
      idempotencyKey: request.idempotencyKey,
      status: 'PENDING',
      amount: request.amount,
      sourceAssetId: request.sourceAssetId,
      destinationAssetId: request.destinationAssetId ?? null,
      metadata: request.metadata,
      createdAt: this.now().toISOString(),
      completedAt: null,
      failureReason: null,
      balanceAfter: null,
    };
  }

  /**
   * Append the PENDING record. Returns whatever record owns the key
   * afterwards, which is another submission's when a duplicate won the race.
   */
  private async record(pending: Transaction): Promise<Transaction> {
    return withRetry(
      async () => {
        try {
          await this.transactions.append(pending);
          return pending;
        } catch (err: unknown) {
          if (!(err instanceof DuplicateKeyError) && !isStoreError(err)) {
            throw err;
          }
          // A failed append may still have landed; re-read before trying again
          const current = await this.lookup(pending.idempotencyKey);
          if (current) {
            return current;
          }
          throw err;
        }
      },
      this.retryOptions('append', this.logger)
    );
  }

  private async execute(transaction: Transaction): Promise<TransferResult> {
    const log = this.logger.child({
      txId: transaction.id,
      idempotencyKey: transaction.idempotencyKey,
    });
    log.debug(
      { sourceAssetId: transaction.sourceAssetId, amount: transaction.amount },
      'Transfer started'
    );

    if (transaction.amount <= 0) {
      return this.finish(transaction, 'FAILED', { failureReason: FAILURE_REASONS.invalidAmount }, log);
    }

    const sourceProblem = await this.checkSource(transaction.sourceAssetId, log);
    if (sourceProblem) {
      return this.finish(transaction, 'FAILED', { failureReason: sourceProblem }, log);
    }

    const debit = await this.debit(transaction, log);
    if (debit.kind === 'rejected') {
      return this.finish(
        transaction,
        'REJECTED',
        { failureReason: FAILURE_REASONS.insufficientFunds },
        log
      );
    }
    if (debit.kind === 'failed') {
      return this.finish(transaction, 'FAILED', { failureReason: debit.reason }, log);
    }

    // The source is debited: from here the transfer runs to a terminal state.
    if (transaction.destinationAssetId !== null) {
      const credited = await this.creditDestination(transaction, transaction.destinationAssetId, log);
      if (!credited) {
        await this.compensate(transaction, log);
        return this.finish(
          transaction,
          'FAILED',
          { failureReason: FAILURE_REASONS.destinationCompensated },
          log
        );
      }
    }

    return this.finish(transaction, 'COMMITTED', { balanceAfter: debit.balance }, log);
  }

  /**
   * Returns a failure reason, or null when the source asset exists
   */
  private async checkSource(assetId: string, log: Logger): Promise<string | null> {
    try {
      await this.read('getBalance', () => this.ledger.getBalance(assetId), log);
      return null;
    } catch (err: unknown) {
      if (err instanceof AssetNotFoundError) return FAILURE_REASONS.unknownAsset;
      if (err instanceof StoreError) return storeFailureReason(err);
      throw err;
    }
  }

  /**
   * Debit the source. Never retried blindly: after a store fault the tagged
   * operation is checked with hasApplied first.
   */
  private async debit(transaction: Transaction, log: Logger): Promise<DebitOutcome> {
    const { sourceAssetId, amount } = transaction;
    const operationId = `${transaction.id}:debit`;

    try {
      const result = await this.ledger.tryDebit(sourceAssetId, amount, operationId);
      return result.ok ? { kind: 'debited', balance: result.balance } : { kind: 'rejected' };
    } catch (err: unknown) {
      if (err instanceof AssetNotFoundError) {
        return { kind: 'failed', reason: FAILURE_REASONS.unknownAsset };
      }
      if (!(err instanceof StoreError)) {
        throw err;
      }

      log.warn({ err, operationId }, 'Debit outcome unknown, checking whether it applied');
      const applied = await this.checkApplied(sourceAssetId, operationId, log);
      if (applied === true) {
        return { kind: 'debited', balance: await this.balanceAfterRecovery(sourceAssetId, log) };
      }
      if (applied === null) {
        this.alert('transfer.debit_unresolved', transaction, log, 'debit may have applied', err);
      }
      return { kind: 'failed', reason: storeFailureReason(err) };
    }
  }

  /**
   * Credit the destination. The credit is tagged, so the store applies it at
   * most once and retrying after a store fault is safe.
   * Returns false when the credit did not apply and the source must be restored.
   */
  private async creditDestination(
    transaction: Transaction,
    destinationAssetId: string,
    log: Logger
  ): Promise<boolean> {
    const operationId = `${transaction.id}:credit`;

    try {
      await withRetry(
        () => this.ledger.credit(destinationAssetId, transaction.amount, operationId),
        this.retryOptions('credit', log)
      );
      return true;
    } catch (err: unknown) {
      if (err instanceof StoreError) {
        const applied = await this.checkApplied(destinationAssetId, operationId, log);
        if (applied === true) return true;
        if (applied === null) {
          this.alert('transfer.credit_unresolved', transaction, log, 'destination credit may have applied', err);
          throw new TransferUnresolvedError(transaction.id, 'destination credit outcome unknown', {
            cause: err,
          });
        }
      }
      log.warn({ err, destinationAssetId }, 'Destination credit failed, compensating');
      return false;
    }
  }

  /**
   * Restore the debited source. Retried up to compensationAttempts; a source
   * left debited is escalated, never swallowed.
   */
  private async compensate(transaction: Transaction, log: Logger): Promise<void> {
    const operationId = `${transaction.id}:compensate`;

    try {
      await withRetry(
        () => this.ledger.credit(transaction.sourceAssetId, transaction.amount, operationId),
        {
          ...this.retryOptions('compensate', log),
          attempts: this.config.compensationAttempts,
          shouldRetry: () => true,
        }
      );
    } catch (err: unknown) {
      this.alert('transfer.compensation_failed', transaction, log, 'source remains debited', err);
      throw new CompensationFailedError(transaction.id, { cause: err });
    }

    log.info({ sourceAssetId: transaction.sourceAssetId }, 'Source restored after failed credit');
    this.emit('transfer.compensated', transaction, FAILURE_REASONS.destinationCompensated);
  }

  private async checkApplied(
    assetId: string,
    operationId: string,
    log: Logger
  ): Promise<boolean | null> {
    try {
      return await this.read('hasApplied', () => this.ledger.hasApplied(assetId, operationId), log);
    } catch (err: unknown) {
      if (err instanceof AssetNotFoundError) return false;
      if (err instanceof StoreError) {
        log.error({ err, operationId }, 'Could not determine whether operation applied');
        return null;
      }
      throw err;
    }
  }

  private async balanceAfterRecovery(assetId: string, log: Logger): Promise<number | undefined> {
    try {
      return await this.read('getBalance', () => this.ledger.getBalance(assetId), log);
    } catch (err: unknown) {
      if (!(err instanceof StoreError)) throw err;
      log.warn({ err, assetId }, 'Balance unavailable after recovered debit');
      return undefined;
    }
  }

  /**
   * Persist the terminal state, then report it. A store fault is retried; an
   * attempt that landed before the fault is recognised by re-reading. Any
   * other failure leaves the record PENDING and is escalated the same way.
   */
  private async finish(
    transaction: Transaction,
    status: TerminalStatus,
    outcome: TerminalOutcome,
    log: Logger
  ): Promise<TransferResult> {
    const completedAt = this.now().toISOString();

    let record: Transaction;
    try {
      record = await withRetry(async () => {
        try {
          return await this.transactions.markTerminal(transaction.id, status, {
            ...outcome,
            completedAt,
          });
        } catch (err: unknown) {
          if (!(err instanceof InvalidTransitionError)) throw err;
          const current = await this.transactions.get(transaction.id);
          if (current && current.status === status && current.completedAt === completedAt) {
            return current;
          }
          throw err;
        }
      }, this.retryOptions('markTerminal', log));
    } catch (err: unknown) {
      this.alert('transfer.terminal_unrecorded', transaction, log, `${status} not recorded`, err);
      throw new TransferUnresolvedError(transaction.id, `${status} could not be recorded`, {
        cause: err,
      });
    }

    const context = { status, failureReason: record.failureReason, balanceAfter: record.balanceAfter };
    if (status === 'FAILED') {
      log.warn(context, 'Transfer failed');
    } else {
      log.info(context, status === 'COMMITTED' ? 'Transfer committed' : 'Transfer rejected');
    }
    this.emit(EVENT_FOR_STATUS[status], record, record.failureReason ?? undefined);

    return toTransferResult(record);
  }

  private lookup(idempotencyKey: string): Promise<Transaction | null> {
    return this.read('lookup', () => this.transactions.lookup(idempotencyKey), this.logger);
  }

  private read<T>(operation: string, fn: () => Promise<T>, log: Logger): Promise<T> {
    return withRetry(fn, this.retryOptions(operation, log));
  }

  private retryOptions(operation: string, log: Logger): RetryOptions {
    return {
      attempts: this.config.readRetryAttempts,
      baseDelayMs: this.config.retryBaseDelayMs,
      maxDelayMs: this.config.retryMaxDelayMs,
      shouldRetry: isStoreError,
      onRetry: (err, attempt) => {
        log.warn({ err, attempt, operation }, 'Retrying store call');
      },
    };
  }

  private alert(
    type: TransferAlertType,
    transaction: Transaction,
    log: Logger,
    reason: string,
    err: unknown
  ): void {
    log.fatal({ err, alert: type, amount: transaction.amount }, `Operator action required: ${reason}`);
    this.emit(type, transaction, reason);
  }

  private emit(type: TransferEventType, transaction: Transaction, reason?: string): void {
    this.events.emit({
      type,
      transactionId: transaction.id,
      idempotencyKey: transaction.idempotencyKey,
      sourceAssetId: transaction.sourceAssetId,
      destinationAssetId: transaction.destinationAssetId,
      amount: transaction.amount,
      reason,
    });
  }
}
