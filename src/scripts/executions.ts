import 'dotenv/config';
import { DEFAULT_DB_PATH, openDatabase } from '../db';
import { DedupStore } from '../dedupStore';
import { Ledger } from '../ledger';

function main(): void {
  const db = openDatabase(process.env.DB_PATH ?? DEFAULT_DB_PATH);
  try {
    const limit = Number(process.argv[2] ?? 20) || 20;
    const records = new DedupStore(db).listRecent(limit);
    if (!records.length) {
      console.log('No executions recorded yet.');
    } else {
      console.table(
        records.map((r) => ({
          Post: r.postId,
          Asset: r.asset,
          Venue: r.venueKind,
          Verdict: r.verdict,
          Author: r.author ?? '-',
          Action: r.action ?? '-',
          Size: r.size?.toString() ?? '-',
          Status: r.status,
          Attempts: r.attempts,
          Error: r.lastError ?? '',
          Updated: r.updatedAt.toISOString(),
        })),
      );
    }

    const positions = new Ledger(db).list();
    if (positions.length) {
      console.table(
        positions.map((p) => ({
          Asset: p.asset,
          Venue: p.venueKind,
          Side: p.side,
          Size: p.size.toString(),
          AvgEntry: p.avgEntryPrice?.toString() ?? '-',
          Version: p.version,
        })),
      );
    }
  } finally {
    db.close();
  }
}

main();
