/**
 * Transfer event emitter for audit trails and operator alerts
 * Events are fire-and-forget so that handlers never block a transfer
 */

import { logger as rootLogger, type Logger } from '@ledgerline/observability';

export type TransferEventType =
  | 'transfer.committed'
  | 'transfer.rejected'
  | 'transfer.failed'
  | 'transfer.compensated'
  | 'transfer.compensation_failed'
  | 'transfer.debit_unresolved'
  | 'transfer.credit_unresolved'
  | 'transfer.terminal_unrecorded';

/**
 * Event types that require an operator: a transfer was left PENDING, or a
 * store fault hid whether a balance change applied.
 */
export type TransferAlertType = Extract<
  TransferEventType,
  | 'transfer.compensation_failed'
  | 'transfer.debit_unresolved'
  | 'transfer.credit_unresolved'
  | 'transfer.terminal_unrecorded'
>;

export interface TransferEvent {
  type: TransferEventType;
  transactionId: string;
  idempotencyKey: string;
  sourceAssetId: string;
  destinationAssetId: string | null;
  amount: number;
  reason?: string;
  timestamp: Date;
}

export type TransferEventHandler = (event: TransferEvent) => void | Promise<void>;

/**
 * What the orchestrator needs from an emitter
 */
export interface TransferEventSink {
  emit(event: Omit<TransferEvent, 'timestamp'>): void;
}

export class TransferEventEmitter implements TransferEventSink {
  private handlers: TransferEventHandler[] = [];

  constructor(private readonly logger: Logger = rootLogger.child({ module: 'transfer-events' })) {}

  on(handler: TransferEventHandler): void {
    this.handlers.push(handler);
  }

  emit(event: Omit<TransferEvent, 'timestamp'>): void {
    const fullEvent: TransferEvent = {
      ...event,
      timestamp: new Date(),
    };

    void Promise.allSettled(
      this.handlers.map((handler) => Promise.resolve().then(() => handler(fullEvent)))
    ).then((outcomes) => {
      for (const outcome of outcomes) {
        if (outcome.status === 'rejected') {
          this.logger.error(
            { err: outcome.reason, eventType: fullEvent.type },
            'Transfer event handler error'
          );
        }
      }
    });
  }

  /**
   * Clear all event handlers
   * Useful for testing to prevent handler accumulation
   */
  clearHandlers(): void {
    this.handlers = [];
  }
}

export const transferEvents = new TransferEventEmitter();
