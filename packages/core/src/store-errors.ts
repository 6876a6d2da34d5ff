/**
 * Backing Store Errors
 *
 * Raised by LedgerStore and TransactionLog implementations when the store
 * itself cannot answer. Timeouts are the collaborator's responsibility; the
 * orchestrator only sees these errors.
 */

export class StoreError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The call did not finish in time. The operation may or may not have applied.
 */
export class StoreTimeoutError extends StoreError {
  constructor(operation: string, options?: ErrorOptions) {
    super(`Store timed out during ${operation}`, options);
  }
}

export class StoreUnavailableError extends StoreError {
  constructor(operation: string, options?: ErrorOptions) {
    super(`Store unavailable during ${operation}`, options);
  }
}
