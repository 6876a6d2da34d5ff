/**
 * Ledger Domain Errors
 *
 * Custom error classes for balance-store rule violations.
 * Insufficient funds is not an error: tryDebit reports it as a result.
 */

export class LedgerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LedgerError';
  }
}

export class AssetNotFoundError extends LedgerError {
  readonly assetId: string;

  constructor(assetId: string) {
    super(`Asset not found: ${assetId}`);
    this.name = 'AssetNotFoundError';
    this.assetId = assetId;
  }
}

export class AssetExistsError extends LedgerError {
  constructor(assetId: string) {
    super(`Asset already exists: ${assetId}`);
    this.name = 'AssetExistsError';
  }
}

export class InvalidAmountError extends LedgerError {
  constructor(amount: number, reason: string) {
    super(`Invalid amount ${amount}: ${reason}`);
    this.name = 'InvalidAmountError';
  }
}
