import { createHash } from 'node:crypto';
import Decimal from 'decimal.js';
import type { StateDb } from './db';
import { TerminalRecordError } from './errors';
import { noopMirror } from './pg';
import type { StateMirror } from './pg';
import { isTerminal } from './types';
import type {
  BracketOrder,
  ExecutionRecord,
  ExecutionStatus,
  ProtectiveKind,
  VenueAction,
  VenueKind,
  Verdict,
} from './types';

interface RecordRow {
  post_id: string;
  requested_ts: number;
  asset: string;
  verdict: Verdict;
  author: string | null;
  confidence: number | null;
  venue_kind: VenueKind;
  action: VenueAction | null;
  size: string | null;
  idempotency_token: string;
  status: ExecutionStatus;
  venue_order_id: string | null;
  attempts: number;
  last_error: string | null;
  updated_ts: number;
}

interface BracketRow {
  post_id: string;
  kind: ProtectiveKind;
  trigger_price: string;
  size: string;
  idempotency_token: string;
  venue_order_id: string | null;
  error: string | null;
  ts: number;
}

export interface RecordDraft {
  postId: string;
  asset: string;
  verdict: Verdict;
  venueKind: VenueKind;
  author?: string | null;
  confidence?: number | null;
}

export interface RecordPatch {
  status?: ExecutionStatus;
  action?: VenueAction;
  size?: Decimal;
  venueOrderId?: string;
  attempts?: number;
  lastError?: string | null;
}

const ALLOWED: Record<ExecutionStatus, readonly ExecutionStatus[]> = {
  PENDING: ['PENDING', 'SUBMITTED', 'FAILED', 'EXPIRED'],
  SUBMITTED: ['SUBMITTED', 'CONFIRMED', 'FAILED', 'EXPIRED'],
  CONFIRMED: [],
  FAILED: [],
  EXPIRED: [],
};

/** Same post, same token: venues see every retry of a lineage as one request. */
export function idempotencyTokenFor(postId: string): string {
  return `pst-${createHash('sha256').update(postId).digest('hex').slice(0, 32)}`;
}

function fromRow(row: RecordRow): ExecutionRecord {
  return {
    postId: row.post_id,
    requestedAt: new Date(row.requested_ts),
    asset: row.asset,
    verdict: row.verdict,
    author: row.author,
    confidence: row.confidence,
    venueKind: row.venue_kind,
    action: row.action,
    size: row.size === null ? null : new Decimal(row.size),
    idempotencyToken: row.idempotency_token,
    status: row.status,
    venueOrderId: row.venue_order_id,
    attempts: row.attempts,
    lastError: row.last_error,
    updatedAt: new Date(row.updated_ts),
  };
}

function bracketFromRow(row: BracketRow): BracketOrder {
  return {
    postId: row.post_id,
    kind: row.kind,
    triggerPrice: new Decimal(row.trigger_price),
    size: new Decimal(row.size),
    idempotencyToken: row.idempotency_token,
    venueOrderId: row.venue_order_id,
    error: row.error,
    createdAt: new Date(row.ts),
  };
}

export interface DedupStoreOptions {
  mirror?: StateMirror;
  now?: () => Date;
}

export class DedupStore {
  private readonly db: StateDb;
  private readonly mirror: StateMirror;
  private readonly now: () => Date;

  constructor(db: StateDb, opts: DedupStoreOptions = {}) {
    this.db = db;
    this.mirror = opts.mirror ?? noopMirror;
    this.now = opts.now ?? (() => new Date());
  }

  get(postId: string): ExecutionRecord | null {
    const row = this.db.sqlite
      .prepare(`SELECT * FROM execution_records WHERE post_id = ?`)
      .get(postId) as RecordRow | undefined;
    return row ? fromRow(row) : null;
  }

  /** Exactly one caller per postId sees `created: true`. */
  createIfAbsent(draft: RecordDraft): { record: ExecutionRecord; created: boolean } {
    return this.db.transaction(() => {
      const ts = this.now().getTime();
      const res = this.db.sqlite
        .prepare(
          `INSERT INTO execution_records
             (post_id, requested_ts, asset, verdict, author, confidence, venue_kind, action, size,
              idempotency_token, status, venue_order_id, attempts, last_error, updated_ts)
           VALUES (?, ?, ?, ?, ?, ?, ?, NULL, NULL, ?, 'PENDING', NULL, 0, NULL, ?)
           ON CONFLICT(post_id) DO NOTHING`,
        )
        .run(
          draft.postId,
          ts,
          draft.asset,
          draft.verdict,
          draft.author ?? null,
          draft.confidence ?? null,
          draft.venueKind,
          idempotencyTokenFor(draft.postId),
          ts,
        );
      const record = this.get(draft.postId);
      if (!record) throw new Error(`execution record ${draft.postId} vanished after insert`);
      const created = res.changes === 1;
      if (created) this.appendEvent(record);
      return { record, created };
    });
  }

  update(postId: string, patch: RecordPatch): ExecutionRecord {
    return this.db.transaction(() => {
      const current = this.get(postId);
      if (!current) throw new Error(`execution record ${postId} not found`);
      const nextStatus = patch.status ?? current.status;
      if (isTerminal(current.status) || !ALLOWED[current.status].includes(nextStatus)) {
        throw new TerminalRecordError(postId, current.status, nextStatus);
      }
      const next: ExecutionRecord = {
        ...current,
        status: nextStatus,
        action: patch.action ?? current.action,
        size: patch.size ?? current.size,
        venueOrderId: patch.venueOrderId ?? current.venueOrderId,
        attempts: patch.attempts ?? current.attempts,
        lastError: patch.lastError === undefined ? current.lastError : patch.lastError,
        updatedAt: this.now(),
      };
      const res = this.db.sqlite
        .prepare(
          `UPDATE execution_records
           SET status = @status, action = @action, size = @size, venue_order_id = @venueOrderId,
               attempts = @attempts, last_error = @lastError, updated_ts = @ts
           WHERE post_id = @postId AND status = @prevStatus`,
        )
        .run({
          postId,
          prevStatus: current.status,
          status: next.status,
          action: next.action,
          size: next.size?.toString() ?? null,
          venueOrderId: next.venueOrderId,
          attempts: next.attempts,
          lastError: next.lastError,
          ts: next.updatedAt.getTime(),
        });
      if (res.changes === 0) throw new TerminalRecordError(postId, current.status, nextStatus);
      this.appendEvent(next);
      return next;
    });
  }

  listRecent(limit = 50): ExecutionRecord[] {
    const rows = this.db.sqlite
      .prepare(`SELECT * FROM execution_records ORDER BY requested_ts DESC, rowid DESC LIMIT ?`)
      .all(limit) as RecordRow[];
    return rows.map(fromRow);
  }

  listNonTerminal(): ExecutionRecord[] {
    const rows = this.db.sqlite
      .prepare(
        `SELECT * FROM execution_records WHERE status IN ('PENDING', 'SUBMITTED') ORDER BY requested_ts ASC, rowid ASC`,
      )
      .all() as RecordRow[];
    return rows.map(fromRow);
  }

  /** Stores the result of one protective order; a retried leg overwrites its row. */
  recordBracket(order: BracketOrder): void {
    this.db.sqlite
      .prepare(
        `INSERT OR REPLACE INTO bracket_orders
           (post_id, kind, trigger_price, size, idempotency_token, venue_order_id, error, ts)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        order.postId,
        order.kind,
        order.triggerPrice.toString(),
        order.size.toString(),
        order.idempotencyToken,
        order.venueOrderId,
        order.error,
        order.createdAt.getTime(),
      );
  }

  listBrackets(postId: string): BracketOrder[] {
    const rows = this.db.sqlite
      .prepare(`SELECT * FROM bracket_orders WHERE post_id = ? ORDER BY rowid ASC`)
      .all(postId) as BracketRow[];
    return rows.map(bracketFromRow);
  }

  /**
   * Drops CONFIRMED and FAILED records (with their events and brackets) older than the horizon.
   * PENDING, SUBMITTED and EXPIRED records stay until someone reconciles them.
   */
  prune(retentionMs: number, now: Date = this.now()): number {
    const cutoff = now.getTime() - retentionMs;
    return this.db.transaction(() => {
      const d = this.db.sqlite;
      d.prepare(
        `DELETE FROM execution_events WHERE post_id IN (
           SELECT post_id FROM execution_records
           WHERE status IN ('CONFIRMED', 'FAILED') AND updated_ts < ?
         )`,
      ).run(cutoff);
      d.prepare(
        `DELETE FROM bracket_orders WHERE post_id IN (
           SELECT post_id FROM execution_records
           WHERE status IN ('CONFIRMED', 'FAILED') AND updated_ts < ?
         )`,
      ).run(cutoff);
      const res = d
        .prepare(`DELETE FROM execution_records WHERE status IN ('CONFIRMED', 'FAILED') AND updated_ts < ?`)
        .run(cutoff);
      return res.changes;
    });
  }

  private appendEvent(record: ExecutionRecord): void {
    this.db.sqlite
      .prepare(
        `INSERT INTO execution_events (post_id, status, attempts, venue_order_id, last_error, ts)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(record.postId, record.status, record.attempts, record.venueOrderId, record.lastError, record.updatedAt.getTime());
    this.db.afterCommit(() => this.mirror.recordExecution(record));
  }
}
