/**
 * Transaction Log Errors
 */

export class TransactionLogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TransactionLogError';
  }
}

export class DuplicateKeyError extends TransactionLogError {
  readonly idempotencyKey: string;

  constructor(idempotencyKey: string) {
    super(`Idempotency key already recorded: ${idempotencyKey}`);
    this.name = 'DuplicateKeyError';
    this.idempotencyKey = idempotencyKey;
  }
}

export class InvalidTransitionError extends TransactionLogError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidTransitionError';
  }
}

export class CorruptLogError extends TransactionLogError {
  constructor(filePath: string, lineNumber: number, reason: string) {
    super(`Corrupt transaction log ${filePath} at line ${lineNumber}: ${reason}`);
    this.name = 'CorruptLogError';
  }
}
