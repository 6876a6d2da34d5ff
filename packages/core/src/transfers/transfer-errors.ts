/**
 * Transfer Domain Errors
 *
 * Thrown by the orchestrator for requests it cannot turn into a terminal
 * transaction. Business outcomes (REJECTED, FAILED) are results, not errors.
 */

export class TransferError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TransferError';
  }
}

export class TransferValidationError extends TransferError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid transfer request: ${issues.join('; ')}`);
    this.name = 'TransferValidationError';
    this.issues = issues;
  }
}

/**
 * Another submission with the same idempotency key is still in flight.
 * Transient; the caller retries with backoff.
 */
export class TransferConflictError extends TransferError {
  readonly idempotencyKey: string;
  readonly transactionId: string;

  constructor(idempotencyKey: string, transactionId: string) {
    super(`Transfer already in progress for idempotency key: ${idempotencyKey}`);
    this.name = 'TransferConflictError';
    this.idempotencyKey = idempotencyKey;
    this.transactionId = transactionId;
  }
}

/**
 * The idempotency key was reused for a different transfer.
 */
export class IdempotencyMismatchError extends TransferError {
  constructor(idempotencyKey: string) {
    super(`Idempotency key ${idempotencyKey} was already used for a different transfer`);
    this.name = 'IdempotencyMismatchError';
  }
}

/**
 * The transaction could not be driven to a terminal state and is left
 * PENDING for an operator. Always accompanied by a fatal log and an alert event.
 */
export class TransferUnresolvedError extends TransferError {
  readonly transactionId: string;

  constructor(transactionId: string, reason: string, options?: ErrorOptions) {
    super(`Transfer ${transactionId} is unresolved: ${reason}`, options);
    this.name = 'TransferUnresolvedError';
    this.transactionId = transactionId;
  }
}

/**
 * The source was debited, the destination credit failed, and restoring the
 * source failed on every attempt.
 */
export class CompensationFailedError extends TransferUnresolvedError {
  constructor(transactionId: string, options?: ErrorOptions) {
    super(transactionId, 'compensation failed, source remains debited', options);
    this.name = 'CompensationFailedError';
  }
}
