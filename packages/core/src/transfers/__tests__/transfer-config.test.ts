import { describe, it, expect } from 'vitest';
import { DEFAULT_TRANSFER_CONFIG, loadTransferConfig } from '../transfer-config.js';

describe('loadTransferConfig', () => {
  it('should fall back to defaults when nothing is set', () => {
    expect(loadTransferConfig({})).toEqual({
      readRetryAttempts: 3,
      retryBaseDelayMs: 25,
      retryMaxDelayMs: 1000,
      compensationAttempts: 5,
    });
    expect(loadTransferConfig({})).toEqual(DEFAULT_TRANSFER_CONFIG);
  });

  it('should read every variable', () => {
    const config = loadTransferConfig({
      LEDGER_READ_RETRY_ATTEMPTS: '4',
      LEDGER_RETRY_BASE_DELAY_MS: '10',
      LEDGER_RETRY_MAX_DELAY_MS: ' 200 ',
      LEDGER_COMPENSATION_ATTEMPTS: '8',
    });

    expect(config).toEqual({
      readRetryAttempts: 4,
      retryBaseDelayMs: 10,
      retryMaxDelayMs: 200,
      compensationAttempts: 8,
    });
  });

  it('should treat blank values as unset', () => {
    expect(loadTransferConfig({ LEDGER_COMPENSATION_ATTEMPTS: '   ' }).compensationAttempts).toBe(5);
  });

  it('should reject values that are not whole numbers', () => {
    expect(() => loadTransferConfig({ LEDGER_READ_RETRY_ATTEMPTS: '2.5' })).toThrow(
      'LEDGER_READ_RETRY_ATTEMPTS must be a whole number, got "2.5"'
    );
    expect(() => loadTransferConfig({ LEDGER_RETRY_BASE_DELAY_MS: '-1' })).toThrow(
      'LEDGER_RETRY_BASE_DELAY_MS must be a whole number, got "-1"'
    );
  });

  it('should require at least one attempt', () => {
    expect(() => loadTransferConfig({ LEDGER_COMPENSATION_ATTEMPTS: '0' })).toThrow(
      'LEDGER_COMPENSATION_ATTEMPTS must be at least 1'
    );
  });

  it('should reject a max delay below the base delay', () => {
    expect(() =>
      loadTransferConfig({ LEDGER_RETRY_BASE_DELAY_MS: '500', LEDGER_RETRY_MAX_DELAY_MS: '100' })
    ).toThrow('LEDGER_RETRY_MAX_DELAY_MS must not be lower than LEDGER_RETRY_BASE_DELAY_MS');
  });
});
