/**
 * Dedup Ledger
 *
 * Durable `messageId → LedgerEntry` store on SQLite, one database file per
 * profile. Separate files are what keep two scopes from seeing each other's
 * entries; there is no profile column to filter on.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * TABLES
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * ledger_entries  one row per message id (upsert, never append)
 * digests         one row per produced digest, with its merged content
 *
 * WAL mode plus a busy timeout lets a `--stats` reader run while a digest
 * run writes. Every store failure surfaces as LedgerError.
 *
 * @module lib/ledger/ledger-store
 */

import { mkdirSync } from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { subDays } from 'date-fns';
import { LedgerError, errorMessage } from '@/lib/errors';
import { createLogger } from '@/lib/utils/logger';
import { storedDigestSchema, storedRecordSchema } from './record-schema';
import type { DigestRecord, ExtractionRecord, LedgerEntry, LedgerStats } from '@/types/digest';

const logger = createLogger('LedgerStore');

const BUSY_TIMEOUT_MS = 5000;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS ledger_entries (
    message_id TEXT PRIMARY KEY,
    processed_at INTEGER NOT NULL,
    extraction_kind TEXT NOT NULL,
    record TEXT NOT NULL,
    digest_id TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_ledger_processed_at ON ledger_entries(processed_at);

  CREATE TABLE IF NOT EXISTS digests (
    digest_id TEXT PRIMARY KEY,
    created_at TEXT NOT NULL,
    date_range TEXT NOT NULL,
    message_count INTEGER NOT NULL,
    artifact_path TEXT,
    record TEXT NOT NULL
  );
`;

interface EntryRow {
  message_id: string;
  processed_at: number;
  extraction_kind: string;
  record: string;
  digest_id: string | null;
}

interface DigestRow {
  digest_id: string;
  created_at: string;
  date_range: string;
  message_count: number;
  artifact_path: string | null;
  record: string;
}

export interface StoredDigest {
  record: DigestRecord;
  artifactPath?: string;
}

/**
 * Operations the pipeline needs from a ledger.
 */
export interface Ledger {
  has(messageId: string): boolean;
  get(messageId: string): LedgerEntry | undefined;
  put(entry: LedgerEntry): void;
  prune(olderThanDays: number, now?: Date): number;
  undigested(): LedgerEntry[];
  saveDigest(record: DigestRecord, artifactPath?: string): void;
  attachDigest(digestId: string, messageIds: readonly string[]): void;
  getRecentDigests(limit: number): StoredDigest[];
  getStats(now?: Date): LedgerStats;
  close(): void;
}

/**
 * SQLite-backed ledger.
 *
 * @example
 * ```typescript
 * const ledger = LedgerStore.open(profile.ledger.path);
 * if (!ledger.has(message.id)) {
 *   ledger.put({ messageId: message.id, processedAt: new Date(), record });
 * }
 * ledger.close();
 * ```
 */
export class LedgerStore implements Ledger {
  private readonly db: Database.Database;
  public readonly path: string;

  private constructor(db: Database.Database, filePath: string) {
    this.db = db;
    this.path = filePath;
  }

  /**
   * Opens (creating if needed) the ledger database at `filePath`.
   * `:memory:` gives a throwaway store.
   */
  public static open(filePath: string): LedgerStore {
    try {
      if (filePath !== ':memory:') {
        mkdirSync(path.dirname(filePath), { recursive: true });
      }
      const db = new Database(filePath);
      db.pragma('journal_mode = WAL');
      db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
      db.exec(SCHEMA);

      logger.debug('Ledger opened', { path: filePath });
      return new LedgerStore(db, filePath);
    } catch (error) {
      throw new LedgerError(`Cannot open ledger at ${filePath}: ${errorMessage(error)}`, {
        path: filePath,
      });
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // ENTRIES
  // ═══════════════════════════════════════════════════════════════════════════

  public has(messageId: string): boolean {
    return this.guard('has', () => {
      const row = this.db
        .prepare<[string], { found: number }>('SELECT 1 AS found FROM ledger_entries WHERE message_id = ?')
        .get(messageId);
      return row !== undefined;
    });
  }

  public get(messageId: string): LedgerEntry | undefined {
    const row = this.guard('get', () =>
      this.db
        .prepare<[string], EntryRow>('SELECT * FROM ledger_entries WHERE message_id = ?')
        .get(messageId)
    );
    return row ? this.toEntry(row) : undefined;
  }

  /**
   * Upsert: a second put for the same id replaces the first.
   */
  public put(entry: LedgerEntry): void {
    this.guard('put', () => {
      this.db
        .prepare(
          `INSERT INTO ledger_entries (message_id, processed_at, extraction_kind, record, digest_id)
           VALUES (@messageId, @processedAt, @kind, @record, @digestId)
           ON CONFLICT(message_id) DO UPDATE SET
             processed_at = excluded.processed_at,
             extraction_kind = excluded.extraction_kind,
             record = excluded.record,
             digest_id = excluded.digest_id`
        )
        .run({
          messageId: entry.messageId,
          processedAt: entry.processedAt.getTime(),
          kind: entry.record.kind,
          record: JSON.stringify(entry.record),
          digestId: entry.digestId ?? null,
        });
    });
  }

  /**
   * Deletes entries processed before `now - olderThanDays`. Digest rows
   * keep their own merged copy, so they are left alone.
   *
   * @returns Number of entries deleted
   */
  public prune(olderThanDays: number, now: Date = new Date()): number {
    const cutoff = subDays(now, olderThanDays).getTime();
    const result = this.guard('prune', () =>
      this.db.prepare('DELETE FROM ledger_entries WHERE processed_at < ?').run(cutoff)
    );

    if (result.changes > 0) {
      logger.info('Pruned ledger entries', { deleted: result.changes, olderThanDays });
    }
    return result.changes;
  }

  /**
   * Entries no digest has attached yet (an aborted run, or a forced
   * reprocess before its digest), oldest first.
   */
  public undigested(): LedgerEntry[] {
    const rows = this.guard('undigested', () =>
      this.db
        .prepare<[], EntryRow>(
          'SELECT * FROM ledger_entries WHERE digest_id IS NULL ORDER BY processed_at, message_id'
        )
        .all()
    );
    return rows.map((row) => this.toEntry(row));
  }

  /** Every entry, oldest first */
  public entries(): LedgerEntry[] {
    const rows = this.guard('entries', () =>
      this.db
        .prepare<[], EntryRow>('SELECT * FROM ledger_entries ORDER BY processed_at, message_id')
        .all()
    );
    return rows.map((row) => this.toEntry(row));
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // DIGESTS
  // ═══════════════════════════════════════════════════════════════════════════

  public saveDigest(record: DigestRecord, artifactPath?: string): void {
    this.guard('saveDigest', () => {
      this.db
        .prepare(
          `INSERT INTO digests (digest_id, created_at, date_range, message_count, artifact_path, record)
           VALUES (?, ?, ?, ?, ?, ?)`
        )
        .run(
          record.digestId,
          record.createdAt,
          record.dateRangeCovered.label,
          record.sourceMessageIds.length,
          artifactPath ?? null,
          JSON.stringify(record)
        );
    });
  }

  /**
   * Sets the digest back-reference on each source entry in one transaction.
   */
  public attachDigest(digestId: string, messageIds: readonly string[]): void {
    this.guard('attachDigest', () => {
      const update = this.db.prepare('UPDATE ledger_entries SET digest_id = ? WHERE message_id = ?');
      const attachAll = this.db.transaction((ids: readonly string[]) => {
        for (const id of ids) {
          update.run(digestId, id);
        }
      });
      attachAll(messageIds);
    });
  }

  /** Newest first */
  public getRecentDigests(limit: number): StoredDigest[] {
    const rows = this.guard('getRecentDigests', () =>
      this.db
        .prepare<[number], DigestRow>('SELECT * FROM digests ORDER BY created_at DESC, rowid DESC LIMIT ?')
        .all(limit)
    );

    return rows.map((row) => {
      const context = { digestId: row.digest_id };
      const parsed = storedDigestSchema.safeParse(this.readJson(row.record, context));
      if (!parsed.success) {
        throw this.schemaMismatch(context);
      }
      const record: DigestRecord = parsed.data;
      return { record, artifactPath: row.artifact_path ?? undefined };
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // STATISTICS
  // ═══════════════════════════════════════════════════════════════════════════

  public getStats(now: Date = new Date()): LedgerStats {
    return this.guard('getStats', () => {
      const weekAgo = subDays(now, 7).getTime();

      const counts = this.db
        .prepare<
          [number],
          { total: number; recent: number | null; full: number | null; fallback: number | null }
        >(
          `SELECT
             COUNT(*) AS total,
             SUM(CASE WHEN processed_at >= ? THEN 1 ELSE 0 END) AS recent,
             SUM(CASE WHEN extraction_kind = 'full' THEN 1 ELSE 0 END) AS full,
             SUM(CASE WHEN extraction_kind = 'fallback' THEN 1 ELSE 0 END) AS fallback
           FROM ledger_entries`
        )
        .get(weekAgo);

      const digestCount = this.db
        .prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM digests')
        .get();

      const last = this.db
        .prepare<[], DigestRow>('SELECT * FROM digests ORDER BY created_at DESC, rowid DESC LIMIT 1')
        .get();

      return {
        totalEntries: counts?.total ?? 0,
        entriesLast7Days: counts?.recent ?? 0,
        fullCount: counts?.full ?? 0,
        fallbackCount: counts?.fallback ?? 0,
        digestCount: digestCount?.total ?? 0,
        lastDigest: last
          ? {
              digestId: last.digest_id,
              createdAt: last.created_at,
              messageCount: last.message_count,
              artifactPath: last.artifact_path ?? undefined,
            }
          : undefined,
      };
    });
  }

  public close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════════

  private toEntry(row: EntryRow): LedgerEntry {
    const context = { messageId: row.message_id };
    const parsed = storedRecordSchema.safeParse(this.readJson(row.record, context));
    if (!parsed.success) {
      throw this.schemaMismatch(context);
    }

    const record: ExtractionRecord = parsed.data;
    return {
      messageId: row.message_id,
      processedAt: new Date(row.processed_at),
      record,
      digestId: row.digest_id ?? undefined,
    };
  }

  private readJson(json: string, context: Record<string, unknown>): unknown {
    try {
      return JSON.parse(json);
    } catch (error) {
      throw new LedgerError(`Corrupt ledger row: ${errorMessage(error)}`, { path: this.path, ...context });
    }
  }

  private schemaMismatch(context: Record<string, unknown>): LedgerError {
    return new LedgerError('Ledger row does not match the record schema', { path: this.path, ...context });
  }

  /**
   * Runs a store operation, converting driver errors into LedgerError.
   */
  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof LedgerError) {
        throw error;
      }
      throw new LedgerError(`Ledger ${operation} failed: ${errorMessage(error)}`, {
        path: this.path,
        operation,
      });
    }
  }
}
