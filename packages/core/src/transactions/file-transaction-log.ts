/**
 * File-backed TransactionLog. Append-only NDJSON, one line per write.
 *
 * Every append and terminal transition is fsynced before it resolves, and the
 * whole file is replayed on open, so history survives a process restart.
 * File system failures surface as StoreError so callers can retry or escalate.
 */

import { promises as fs } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { logger as rootLogger, type Logger } from '@ledgerline/observability';
import { TransactionStatusSchema } from '@ledgerline/types';
import { KeyedMutex } from '../ledger/keyed-mutex.js';
import { StoreTimeoutError, StoreUnavailableError } from '../store-errors.js';
import { CorruptLogError, TransactionLogError } from './transaction-errors.js';
import { TransactionIndex } from './transaction-index.js';
import type {
  TerminalOutcome,
  TerminalStatus,
  Transaction,
  TransactionLog,
} from './transaction-types.js';

const TransactionRecordSchema = z.object({
  id: z.string(),
  idempotencyKey: z.string(),
  status: TransactionStatusSchema,
  amount: z.number().int(),
  sourceAssetId: z.string(),
  destinationAssetId: z.string().nullable(),
  metadata: z.record(z.unknown()),
  createdAt: z.string(),
  completedAt: z.string().nullable(),
  failureReason: z.string().nullable(),
  balanceAfter: z.number().int().nullable(),
});

const LogEntrySchema = z.object({
  op: z.enum(['append', 'terminal']),
  transaction: TransactionRecordSchema,
});

type LogEntry = z.infer<typeof LogEntrySchema>;

const WRITE_LOCK = 'log';
const NEWLINE = 0x0a;

export class FileTransactionLog implements TransactionLog {
  private readonly index = new TransactionIndex();
  private readonly writes = new KeyedMutex();
  // Set when a failed write could not be rolled back; the file tail is unknown
  private writeFailure: Error | null = null;

  private constructor(
    private readonly filePath: string,
    private readonly now: () => Date,
    private readonly logger: Logger
  ) {}

  /**
   * Open (or create) a log file and rebuild the index from it.
   * A torn final line left by a crash mid-write is truncated away.
   */
  static async open(
    filePath: string,
    now: () => Date = () => new Date(),
    logger: Logger = rootLogger.child({ module: 'transaction-log' })
  ): Promise<FileTransactionLog> {
    const log = new FileTransactionLog(filePath, now, logger);
    await log.replay();
    return log;
  }

  async lookup(idempotencyKey: string): Promise<Transaction | null> {
    return this.index.lookup(idempotencyKey);
  }

  async get(transactionId: string): Promise<Transaction | null> {
    return this.index.get(transactionId);
  }

  async append(transaction: Transaction): Promise<void> {
    await this.writes.runExclusive(WRITE_LOCK, async () => {
      const record = this.index.prepareAppend(transaction);
      await this.write('append', { op: 'append', transaction: record });
      this.index.store(record);
    });
  }

  async markTerminal(
    transactionId: string,
    status: TerminalStatus,
    outcome: TerminalOutcome = {}
  ): Promise<Transaction> {
    return this.writes.runExclusive(WRITE_LOCK, async () => {
      const updated = this.index.prepareTerminal(transactionId, status, outcome, this.now);
      await this.write('markTerminal', { op: 'terminal', transaction: updated });
      this.index.store(updated);
      return updated;
    });
  }

  async list(): Promise<Transaction[]> {
    return this.index.list();
  }

  async listPending(): Promise<Transaction[]> {
    return this.index.listPending();
  }

  /**
   * Append one line and fsync it. The index is only updated by the caller
   * after this resolves, so a failed write is truncated back out of the file
   * before the error is raised. If that rollback fails too, the write may
   * have landed: the error is a timeout and the log refuses further writes
   * until it is reopened and replayed.
   */
  private async write(operation: string, entry: LogEntry): Promise<void> {
    if (this.writeFailure) {
      throw new StoreUnavailableError(operation, { cause: this.writeFailure });
    }

    let handle: FileHandle;
    try {
      handle = await fs.open(this.filePath, 'a');
    } catch (err: unknown) {
      throw new StoreUnavailableError(operation, { cause: err });
    }

    try {
      const sizeBefore = await this.sizeOf(handle, operation);
      try {
        await handle.write(JSON.stringify(entry) + '\n');
        await handle.sync();
      } catch (err: unknown) {
        await this.rollback(handle, sizeBefore, operation, err);
      }
    } finally {
      await this.close(handle);
    }
  }

  private async sizeOf(handle: FileHandle, operation: string): Promise<number> {
    try {
      return (await handle.stat()).size;
    } catch (err: unknown) {
      throw new StoreUnavailableError(operation, { cause: err });
    }
  }

  private async rollback(
    handle: FileHandle,
    size: number,
    operation: string,
    cause: unknown
  ): Promise<never> {
    try {
      await handle.truncate(size);
      await handle.sync();
    } catch (err: unknown) {
      this.writeFailure = err instanceof Error ? err : new Error(String(err));
      this.logger.error(
        { err, cause, filePath: this.filePath, operation },
        'Failed write could not be rolled back, log must be reopened'
      );
      throw new StoreTimeoutError(operation, { cause });
    }
    this.logger.warn({ err: cause, filePath: this.filePath, operation }, 'Write failed and was rolled back');
    throw new StoreUnavailableError(operation, { cause });
  }

  private async close(handle: FileHandle): Promise<void> {
    try {
      await handle.close();
    } catch (err: unknown) {
      // The line is synced or rolled back by now; only the descriptor leaks
      this.logger.warn({ err, filePath: this.filePath }, 'Failed to close transaction log handle');
    }
  }

  private async replay(): Promise<void> {
    let contents: Buffer;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      contents = await fs.readFile(this.filePath);
    } catch (err: unknown) {
      if (isErrnoException(err) && err.code === 'ENOENT') return;
      throw new StoreUnavailableError('open', { cause: err });
    }

    const complete = contents.lastIndexOf(NEWLINE) + 1;
    if (complete < contents.length) {
      try {
        await fs.truncate(this.filePath, complete);
      } catch (err: unknown) {
        throw new StoreUnavailableError('open', { cause: err });
      }
    }

    const lines = contents.subarray(0, complete).toString('utf8').split('\n');
    lines.forEach((raw, i) => {
      const line = raw.trim();
      if (!line) return;
      this.apply(this.parse(line, i + 1), i + 1);
    });
  }

  private parse(line: string, lineNumber: number): LogEntry {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      throw new CorruptLogError(this.filePath, lineNumber, 'invalid JSON');
    }
    const result = LogEntrySchema.safeParse(parsed);
    if (!result.success) {
      throw new CorruptLogError(this.filePath, lineNumber, 'invalid entry shape');
    }
    return result.data;
  }

  private apply(entry: LogEntry, lineNumber: number): void {
    const { transaction } = entry;
    try {
      if (entry.op === 'append') {
        this.index.store(this.index.prepareAppend(transaction));
        return;
      }
      if (transaction.status === 'PENDING' || transaction.completedAt === null) {
        throw new CorruptLogError(this.filePath, lineNumber, 'terminal entry without terminal state');
      }
      const updated = this.index.prepareTerminal(
        transaction.id,
        transaction.status,
        {
          completedAt: transaction.completedAt,
          failureReason: transaction.failureReason ?? undefined,
          balanceAfter: transaction.balanceAfter ?? undefined,
        },
        this.now
      );
      this.index.store(updated);
    } catch (err: unknown) {
      if (err instanceof TransactionLogError && !(err instanceof CorruptLogError)) {
        throw new CorruptLogError(this.filePath, lineNumber, err.message);
      }
      throw err;
    }
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
