/**
 * @ledgerline/observability
 *
 * Structured logging for the ledger packages.
 */

export { createLogger, logger, scrubBearerTokens } from './logger.js';
export type { Logger } from 'pino';
