/**
 * Tests for logger redaction
 * Verifies that secrets in transfer metadata and Bearer tokens never reach the output
 */

import { describe, it, expect } from 'vitest';
import { createLogger, scrubBearerTokens } from '../logger.js';

function captureLogs() {
  const logs: string[] = [];
  const stream = {
    write: (log: string) => {
      logs.push(log);
    },
  };
  const logger = createLogger({ level: 'info' }, stream);
  return { logs, logger };
}

describe('createLogger', () => {
  it('should redact top-level secret fields', () => {
    const { logs, logger } = captureLogs();

    logger.info({ secret: 'test-secret', assetId: 'gold' }, 'hello');

    expect(logs[0]).toBeDefined();
    const entry = JSON.parse(logs[0] ?? '');
    expect(entry.secret).toBe('[REDACTED]');
    expect(entry.assetId).toBe('gold');
    expect(entry.msg).toBe('hello');
  });

  it('should redact secrets nested in transfer metadata', () => {
    const { logs, logger } = captureLogs();

    logger.info({ metadata: { apiKey: 'test-key', note: 'rent' } });

    const entry = JSON.parse(logs[0] ?? '');
    expect(entry.metadata).toEqual({ apiKey: '[REDACTED]', note: 'rent' });
  });

  it('should scrub Bearer tokens from messages', () => {
    const { logs, logger } = captureLogs();

    logger.info({ header: 'Bearer abc.def' }, 'forwarding Bearer abc.def upstream');

    const entry = JSON.parse(logs[0] ?? '');
    expect(entry.header).toBe('Bearer [REDACTED]');
    expect(entry.msg).toBe('forwarding Bearer [REDACTED] upstream');
  });

  it('should write ISO 8601 timestamps', () => {
    const { logs, logger } = captureLogs();

    logger.info('tick');

    const entry = JSON.parse(logs[0] ?? '');
    expect(entry.time).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it('should honour the requested level', () => {
    const logs: string[] = [];
    const logger = createLogger({ level: 'warn' }, { write: (log: string) => { logs.push(log); } });

    logger.info('ignored');
    logger.warn('kept');

    expect(logs).toHaveLength(1);
    expect(JSON.parse(logs[0] ?? '').msg).toBe('kept');
  });
});

describe('scrubBearerTokens', () => {
  it('should leave errors untouched', () => {
    const error = new Error('Bearer abc');
    expect(scrubBearerTokens(error)).toBe(error);
  });

  it('should scrub inside arrays', () => {
    expect(scrubBearerTokens(['Bearer x1', 'plain'])).toEqual(['Bearer [REDACTED]', 'plain']);
  });
});
