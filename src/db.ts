import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

export const MEMORY_DB = ':memory:';
export const DEFAULT_DB_PATH = 'data/signal-trader.sqlite';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS positions (
    asset TEXT NOT NULL,
    venue_kind TEXT NOT NULL,
    side TEXT NOT NULL,
    size TEXT NOT NULL,
    avg_entry_price TEXT,
    version INTEGER NOT NULL,
    updated_ts INTEGER NOT NULL,
    PRIMARY KEY (asset, venue_kind)
  );

  CREATE TABLE IF NOT EXISTS position_history (
    asset TEXT NOT NULL,
    venue_kind TEXT NOT NULL,
    side TEXT NOT NULL,
    size TEXT NOT NULL,
    avg_entry_price TEXT,
    version INTEGER NOT NULL,
    source TEXT NOT NULL,
    ts INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_position_history_asset ON position_history(asset, venue_kind, version);

  CREATE TABLE IF NOT EXISTS execution_records (
    post_id TEXT PRIMARY KEY,
    requested_ts INTEGER NOT NULL,
    asset TEXT NOT NULL,
    verdict TEXT NOT NULL,
    author TEXT,
    confidence REAL,
    venue_kind TEXT NOT NULL,
    action TEXT,
    size TEXT,
    idempotency_token TEXT NOT NULL,
    status TEXT NOT NULL,
    venue_order_id TEXT,
    attempts INTEGER NOT NULL,
    last_error TEXT,
    updated_ts INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_execution_records_status ON execution_records(status, updated_ts);

  CREATE TABLE IF NOT EXISTS execution_events (
    post_id TEXT NOT NULL,
    status TEXT NOT NULL,
    attempts INTEGER NOT NULL,
    venue_order_id TEXT,
    last_error TEXT,
    ts INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_execution_events_post ON execution_events(post_id, ts);

  CREATE TABLE IF NOT EXISTS bracket_orders (
    post_id TEXT NOT NULL,
    kind TEXT NOT NULL,
    trigger_price TEXT NOT NULL,
    size TEXT NOT NULL,
    idempotency_token TEXT NOT NULL,
    venue_order_id TEXT,
    error TEXT,
    ts INTEGER NOT NULL,
    PRIMARY KEY (post_id, kind)
  );
`;

/**
 * SQLite handle shared by the ledger and the dedup store. `transaction` lets both
 * write in one unit; `afterCommit` hooks run only once the outermost unit commits.
 */
export class StateDb {
  readonly sqlite: Database.Database;
  private pending: Array<() => void> | null = null;

  constructor(sqlite: Database.Database) {
    this.sqlite = sqlite;
  }

  transaction<T>(fn: () => T): T {
    if (this.pending) return fn();
    this.pending = [];
    try {
      const result = this.sqlite.transaction(fn)();
      const hooks = this.pending;
      this.pending = null;
      for (const hook of hooks) hook();
      return result;
    } finally {
      this.pending = null;
    }
  }

  afterCommit(hook: () => void): void {
    if (this.pending) this.pending.push(hook);
    else hook();
  }

  close(): void {
    this.sqlite.close();
  }
}

export function openDatabase(dbPath: string = MEMORY_DB): StateDb {
  if (dbPath !== MEMORY_DB) {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }
  const sqlite = new Database(dbPath);
  if (dbPath !== MEMORY_DB) sqlite.pragma('journal_mode = WAL');
  sqlite.exec(SCHEMA);
  return new StateDb(sqlite);
}
