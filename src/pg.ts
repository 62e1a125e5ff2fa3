import { Pool } from 'pg';
import type { Logger } from './logger';
import type { ExecutionRecord, Position } from './types';

/** Append-only audit copy of state transitions. Writes are fire-and-forget. */
export interface StateMirror {
  recordExecution(record: ExecutionRecord): void;
  recordPosition(position: Position, source: string): void;
}

export const noopMirror: StateMirror = {
  recordExecution: () => undefined,
  recordPosition: () => undefined,
};

export async function ensureSchema(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS execution_events (
      ts BIGINT NOT NULL,
      post_id TEXT NOT NULL,
      asset TEXT NOT NULL,
      venue_kind TEXT NOT NULL,
      action TEXT,
      status TEXT NOT NULL,
      venue_order_id TEXT,
      attempts INTEGER NOT NULL,
      last_error TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_execution_events_post ON execution_events(post_id, ts);

    CREATE TABLE IF NOT EXISTS position_history (
      ts BIGINT NOT NULL,
      asset TEXT NOT NULL,
      venue_kind TEXT NOT NULL,
      side TEXT NOT NULL,
      size NUMERIC NOT NULL,
      avg_entry_price NUMERIC,
      version INTEGER NOT NULL,
      source TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_position_history_asset ON position_history(asset, venue_kind, ts);
  `);
}

export function createPgMirror(connectionString: string, logger: Logger): { mirror: StateMirror; close: () => Promise<void> } {
  const pool = new Pool({ connectionString, ssl: { rejectUnauthorized: false } });
  const ready = ensureSchema(pool).then(
    () => true,
    (err: unknown) => {
      logger.warn({ err }, 'pg mirror disabled: schema setup failed');
      return false;
    },
  );

  const run = (sql: string, params: unknown[], what: string): void => {
    void ready
      .then(async (ok) => {
        if (ok) await pool.query(sql, params);
      })
      .catch((err: unknown) => {
        logger.warn({ err, what }, 'pg mirror write failed');
      });
  };

  return {
    mirror: {
      recordExecution(record) {
        run(
          `INSERT INTO execution_events (ts, post_id, asset, venue_kind, action, status, venue_order_id, attempts, last_error)
           VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9)`,
          [
            record.updatedAt.getTime(),
            record.postId,
            record.asset,
            record.venueKind,
            record.action,
            record.status,
            record.venueOrderId,
            record.attempts,
            record.lastError,
          ],
          'execution',
        );
      },
      recordPosition(position, source) {
        run(
          `INSERT INTO position_history (ts, asset, venue_kind, side, size, avg_entry_price, version, source)
           VALUES ($1,$2,$3,$4,$5,$6,$7,$8)`,
          [
            position.updatedAt.getTime(),
            position.asset,
            position.venueKind,
            position.side,
            position.size.toString(),
            position.avgEntryPrice?.toString() ?? null,
            position.version,
            source,
          ],
          'position',
        );
      },
    },
    close: async () => {
      await ready;
      await pool.end();
    },
  };
}
