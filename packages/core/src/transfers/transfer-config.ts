const DEFAULT_READ_RETRY_ATTEMPTS = 3;
const DEFAULT_RETRY_BASE_DELAY_MS = 25;
const DEFAULT_RETRY_MAX_DELAY_MS = 1000;
const DEFAULT_COMPENSATION_ATTEMPTS = 5;

export type TransferConfig = {
  /** Attempts for read-only store calls (lookup, getBalance, hasApplied) and tagged credits. */
  readRetryAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  /** Attempts to restore a debited source before escalating. */
  compensationAttempts: number;
};

export const DEFAULT_TRANSFER_CONFIG: TransferConfig = {
  readRetryAttempts: DEFAULT_READ_RETRY_ATTEMPTS,
  retryBaseDelayMs: DEFAULT_RETRY_BASE_DELAY_MS,
  retryMaxDelayMs: DEFAULT_RETRY_MAX_DELAY_MS,
  compensationAttempts: DEFAULT_COMPENSATION_ATTEMPTS,
};

function readInteger(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  minimum: number
): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  if (!/^\d+$/.test(raw)) {
    throw new Error(`${name} must be a whole number, got "${raw}"`);
  }

  const value = Number.parseInt(raw, 10);
  if (value < minimum) {
    throw new Error(`${name} must be at least ${minimum}`);
  }
  return value;
}

export function loadTransferConfig(env: NodeJS.ProcessEnv = process.env): TransferConfig {
  const retryBaseDelayMs = readInteger(
    env,
    'LEDGER_RETRY_BASE_DELAY_MS',
    DEFAULT_RETRY_BASE_DELAY_MS,
    0
  );
  const retryMaxDelayMs = readInteger(
    env,
    'LEDGER_RETRY_MAX_DELAY_MS',
    DEFAULT_RETRY_MAX_DELAY_MS,
    0
  );

  if (retryMaxDelayMs < retryBaseDelayMs) {
    throw new Error('LEDGER_RETRY_MAX_DELAY_MS must not be lower than LEDGER_RETRY_BASE_DELAY_MS');
  }

  return {
    readRetryAttempts: readInteger(
      env,
      'LEDGER_READ_RETRY_ATTEMPTS',
      DEFAULT_READ_RETRY_ATTEMPTS,
      1
    ),
    retryBaseDelayMs,
    retryMaxDelayMs,
    compensationAttempts: readInteger(
      env,
      'LEDGER_COMPENSATION_ATTEMPTS',
      DEFAULT_COMPENSATION_ATTEMPTS,
      1
    ),
  };
}
