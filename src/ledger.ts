import Decimal from 'decimal.js';
import type { StateDb } from './db';
import { LedgerConflictError, PositionInvariantError } from './errors';
import { noopMirror } from './pg';
import type { StateMirror } from './pg';
import type { Position, PositionDelta, PositionSide, VenueKind } from './types';

interface PositionRow {
  asset: string;
  venue_kind: VenueKind;
  side: PositionSide;
  size: string;
  avg_entry_price: string | null;
  version: number;
  updated_ts: number;
}

export interface PositionCorrection {
  side: PositionSide;
  size: Decimal;
  avgEntryPrice: Decimal | null;
}

function flat(asset: string, venueKind: VenueKind, version: number, updatedAt: Date): Position {
  return { asset, venueKind, side: 'FLAT', size: new Decimal(0), avgEntryPrice: null, updatedAt, version };
}

function fromRow(row: PositionRow): Position {
  return {
    asset: row.asset,
    venueKind: row.venue_kind,
    side: row.side,
    size: new Decimal(row.size),
    avgEntryPrice: row.avg_entry_price === null ? null : new Decimal(row.avg_entry_price),
    updatedAt: new Date(row.updated_ts),
    version: row.version,
  };
}

export function assertPositionInvariant(p: Pick<Position, 'asset' | 'side' | 'size' | 'avgEntryPrice'>): void {
  if (!p.size.isFinite()) {
    throw new PositionInvariantError(`${p.asset}: size ${p.size.toString()} is not a finite number`);
  }
  if (p.size.isNegative()) {
    throw new PositionInvariantError(`${p.asset}: size ${p.size.toString()} is negative`);
  }
  if ((p.side === 'FLAT') !== p.size.isZero()) {
    throw new PositionInvariantError(`${p.asset}: side ${p.side} does not match size ${p.size.toString()}`);
  }
  if (p.side === 'FLAT' && p.avgEntryPrice !== null) {
    throw new PositionInvariantError(`${p.asset}: flat position carries an entry price`);
  }
  if (p.avgEntryPrice !== null && !(p.avgEntryPrice.isFinite() && p.avgEntryPrice.isPositive())) {
    throw new PositionInvariantError(
      `${p.asset}: avgEntryPrice ${p.avgEntryPrice.toString()} must be finite and positive`,
    );
  }
}

/**
 * Pure transition from a current position and a venue-derived delta. Spot positions only
 * ever go LONG, so increase/decrease act on the long side.
 */
export function nextPosition(current: Position, delta: PositionDelta, now: Date): Position {
  let side: PositionSide;
  let size: Decimal;
  let avgEntryPrice: Decimal | null;

  switch (delta.kind) {
    case 'increase': {
      if (!delta.size.isPositive()) {
        throw new PositionInvariantError(`${current.asset}: increase by ${delta.size.toString()}`);
      }
      if (current.side === 'SHORT') {
        throw new PositionInvariantError(`${current.asset}: cannot increase a short position`);
      }
      size = current.size.plus(delta.size);
      const prevCost = current.avgEntryPrice ? current.avgEntryPrice.times(current.size) : new Decimal(0);
      avgEntryPrice = prevCost.plus(delta.price.times(delta.size)).dividedBy(size);
      side = 'LONG';
      break;
    }
    case 'decrease': {
      if (!delta.size.isPositive()) {
        throw new PositionInvariantError(`${current.asset}: decrease by ${delta.size.toString()}`);
      }
      if (delta.size.greaterThan(current.size)) {
        throw new PositionInvariantError(
          `${current.asset}: decrease by ${delta.size.toString()} exceeds holdings ${current.size.toString()}`,
        );
      }
      size = current.size.minus(delta.size);
      side = size.isZero() ? 'FLAT' : current.side;
      avgEntryPrice = size.isZero() ? null : current.avgEntryPrice;
      break;
    }
    case 'set':
      side = delta.side;
      size = delta.size;
      avgEntryPrice = delta.side === 'FLAT' ? null : delta.avgEntryPrice;
      break;
  }

  const next: Position = {
    asset: current.asset,
    venueKind: current.venueKind,
    side,
    size,
    avgEntryPrice,
    updatedAt: now,
    version: current.version + 1,
  };
  assertPositionInvariant(next);
  return next;
}

export interface LedgerOptions {
  mirror?: StateMirror;
  now?: () => Date;
}

/** Authoritative position set. Every write is a compare-and-swap on `version`. */
export class Ledger {
  private readonly db: StateDb;
  private readonly mirror: StateMirror;
  private readonly now: () => Date;

  constructor(db: StateDb, opts: LedgerOptions = {}) {
    this.db = db;
    this.mirror = opts.mirror ?? noopMirror;
    this.now = opts.now ?? (() => new Date());
  }

  get(asset: string, venueKind: VenueKind): Position {
    const row = this.db.sqlite
      .prepare(`SELECT * FROM positions WHERE asset = ? AND venue_kind = ?`)
      .get(asset, venueKind) as PositionRow | undefined;
    return row ? fromRow(row) : flat(asset, venueKind, 0, new Date(0));
  }

  list(): Position[] {
    const rows = this.db.sqlite
      .prepare(`SELECT * FROM positions ORDER BY asset ASC, venue_kind ASC`)
      .all() as PositionRow[];
    return rows.map(fromRow);
  }

  applyDelta(asset: string, venueKind: VenueKind, expectedVersion: number, delta: PositionDelta, source = 'execution'): Position {
    return this.db.transaction(() => {
      const current = this.get(asset, venueKind);
      if (current.version !== expectedVersion) {
        throw new LedgerConflictError(asset, venueKind, expectedVersion, current.version);
      }
      const next = nextPosition(current, delta, this.now());
      this.write(next, expectedVersion, source);
      return next;
    });
  }

  correct(asset: string, venueKind: VenueKind, expectedVersion: number, correction: PositionCorrection): Position {
    return this.applyDelta(
      asset,
      venueKind,
      expectedVersion,
      { kind: 'set', side: correction.side, size: correction.size, avgEntryPrice: correction.avgEntryPrice },
      'manual',
    );
  }

  private write(next: Position, expectedVersion: number, source: string): void {
    const d = this.db.sqlite;
    const params = {
      asset: next.asset,
      venueKind: next.venueKind,
      side: next.side,
      size: next.size.toString(),
      avg: next.avgEntryPrice?.toString() ?? null,
      version: next.version,
      ts: next.updatedAt.getTime(),
    };
    if (expectedVersion === 0) {
      const res = d
        .prepare(
          `INSERT INTO positions (asset, venue_kind, side, size, avg_entry_price, version, updated_ts)
           VALUES (@asset, @venueKind, @side, @size, @avg, @version, @ts)
           ON CONFLICT(asset, venue_kind) DO NOTHING`,
        )
        .run(params);
      if (res.changes === 0) {
        throw new LedgerConflictError(next.asset, next.venueKind, expectedVersion, this.get(next.asset, next.venueKind).version);
      }
    } else {
      const res = d
        .prepare(
          `UPDATE positions
           SET side = @side, size = @size, avg_entry_price = @avg, version = @version, updated_ts = @ts
           WHERE asset = @asset AND venue_kind = @venueKind AND version = @expected`,
        )
        .run({ ...params, expected: expectedVersion });
      if (res.changes === 0) {
        throw new LedgerConflictError(next.asset, next.venueKind, expectedVersion, this.get(next.asset, next.venueKind).version);
      }
    }
    d.prepare(
      `INSERT INTO position_history (asset, venue_kind, side, size, avg_entry_price, version, source, ts)
       VALUES (@asset, @venueKind, @side, @size, @avg, @version, @source, @ts)`,
    ).run({ ...params, source });
    this.db.afterCommit(() => this.mirror.recordPosition(next, source));
  }
}
