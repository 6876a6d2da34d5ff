import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryTransactionLog } from '../transaction-log.js';
import { DuplicateKeyError, InvalidTransitionError } from '../transaction-errors.js';
import type { Transaction } from '../transaction-types.js';

const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');

function pendingTransaction(overrides: Partial<Transaction> = {}): Transaction {
  return {
    id: 'tx-1',
    idempotencyKey: 'k1',
    status: 'PENDING',
    amount: 30,
    sourceAssetId: 'gold',
    destinationAssetId: null,
    metadata: {},
    createdAt: '2026-03-01T11:59:59.000Z',
    completedAt: null,
    failureReason: null,
    balanceAfter: null,
    ...overrides,
  };
}

describe('InMemoryTransactionLog', () => {
  let log: InMemoryTransactionLog;

  beforeEach(() => {
    log = new InMemoryTransactionLog(() => FIXED_NOW);
  });

  describe('append', () => {
    it('should make the record visible to lookup and get', async () => {
      await log.append(pendingTransaction());

      await expect(log.lookup('k1')).resolves.toMatchObject({ id: 'tx-1', status: 'PENDING' });
      await expect(log.get('tx-1')).resolves.toMatchObject({ idempotencyKey: 'k1' });
    });

    it('should return null for unknown keys', async () => {
      await expect(log.lookup('missing')).resolves.toBeNull();
      await expect(log.get('missing')).resolves.toBeNull();
    });

    it('should throw DuplicateKeyError when the key exists', async () => {
      await log.append(pendingTransaction());

      await expect(log.append(pendingTransaction({ id: 'tx-2' }))).rejects.toThrow(DuplicateKeyError);
    });

    it('should refuse records that are not PENDING', async () => {
      await expect(log.append(pendingTransaction({ status: 'COMMITTED' }))).rejects.toThrow(
        InvalidTransitionError
      );
    });

    it('should store a copy the caller cannot mutate', async () => {
      const original = pendingTransaction({ metadata: { note: 'rent' } });
      await log.append(original);
      original.metadata.note = 'changed';

      const stored = await log.lookup('k1');
      expect(stored?.metadata).toEqual({ note: 'rent' });
      expect(Object.isFrozen(stored)).toBe(true);
    });
  });

  describe('markTerminal', () => {
    beforeEach(async () => {
      await log.append(pendingTransaction());
    });

    it('should transition PENDING to a terminal state with outcome fields', async () => {
      const updated = await log.markTerminal('tx-1', 'COMMITTED', { balanceAfter: 70 });

      expect(updated).toMatchObject({
        status: 'COMMITTED',
        balanceAfter: 70,
        failureReason: null,
        completedAt: '2026-03-01T12:00:00.000Z',
      });
      await expect(log.lookup('k1')).resolves.toEqual(updated);
    });

    it('should transition exactly once', async () => {
      await log.markTerminal('tx-1', 'REJECTED', { failureReason: 'insufficient funds' });

      await expect(log.markTerminal('tx-1', 'COMMITTED')).rejects.toThrow(
        'Transaction tx-1 is already REJECTED'
      );
    });

    it('should throw InvalidTransitionError for an absent record', async () => {
      await expect(log.markTerminal('tx-404', 'FAILED')).rejects.toThrow(InvalidTransitionError);
    });
  });

  it('should list everything and only pending records', async () => {
    await log.append(pendingTransaction());
    await log.append(pendingTransaction({ id: 'tx-2', idempotencyKey: 'k2' }));
    await log.markTerminal('tx-1', 'FAILED', { failureReason: 'unknown asset' });

    expect((await log.list()).map((t) => t.id)).toEqual(['tx-1', 'tx-2']);
    expect((await log.listPending()).map((t) => t.id)).toEqual(['tx-2']);
  });
});
