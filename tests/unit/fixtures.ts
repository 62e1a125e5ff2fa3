import Decimal from 'decimal.js';
import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type { BackoffPolicy } from '../../src/backoff';
import type { BracketPolicy, SizingPolicy } from '../../src/config';
import { ExecutionCoordinator } from '../../src/coordinator';
import { openDatabase } from '../../src/db';
import type { StateDb } from '../../src/db';
import { DedupStore } from '../../src/dedupStore';
import { Ledger } from '../../src/ledger';
import { silentLogger } from '../../src/logger';
import type { Logger } from '../../src/logger';
import type { ExecutionEvent, Notifier } from '../../src/notify/types';
import type { Position, PositionSide, Post, Signal, VenueKind, Verdict } from '../../src/types';
import type { PerpStatus, PerpVenue, SpotStatus, SpotVenue } from '../../src/venues/types';

export const d = (v: Decimal.Value): Decimal => new Decimal(v);

export function makePost(id: string, text = '', overrides: Partial<Post> = {}): Post {
  return { id, author: 'trader', text, observedAt: new Date(), ...overrides };
}

export function makeSignal(postId: string, verdict: Verdict, asset: string | null): Signal {
  return { postId, verdict, asset };
}

export function makePosition(side: PositionSide, size: Decimal.Value, avg: Decimal.Value | null = null, venueKind: VenueKind = 'SPOT'): Position {
  return {
    asset: 'POPCAT',
    venueKind,
    side,
    size: d(size),
    avgEntryPrice: avg === null ? null : d(avg),
    updatedAt: new Date(0),
    version: side === 'FLAT' ? 0 : 1,
  };
}

export const spotFilled = (size: Decimal.Value, price: Decimal.Value): SpotStatus => ({
  status: 'FILLED',
  filledSize: d(size),
  avgPrice: d(price),
});

export const spotPending = (): SpotStatus => ({ status: 'PENDING', filledSize: d(0), avgPrice: null });

export const perpConfirmed = (side: PositionSide, size: Decimal.Value, price: Decimal.Value | null): PerpStatus => ({
  status: 'CONFIRMED',
  resultingSide: side,
  resultingSize: d(size),
  avgPrice: price === null ? null : d(price),
});

export const perpPending = (): PerpStatus => ({
  status: 'PENDING',
  resultingSide: 'FLAT',
  resultingSize: d(0),
  avgPrice: null,
});

export interface FakeSpot extends SpotVenue {
  submitSwap: Mock<SpotVenue['submitSwap']>;
  pollStatus: Mock<SpotVenue['pollStatus']>;
}

export interface FakePerp extends PerpVenue {
  submitPositionChange: Mock<PerpVenue['submitPositionChange']>;
  pollStatus: Mock<PerpVenue['pollStatus']>;
  submitProtectiveOrder: Mock<PerpVenue['submitProtectiveOrder']>;
}

export function fakeSpot(status: SpotStatus = spotFilled(100, '0.5')): FakeSpot {
  return {
    name: 'fake-spot',
    submitSwap: vi.fn<SpotVenue['submitSwap']>(async () => ({ venueOrderId: 'spot-1' })),
    pollStatus: vi.fn<SpotVenue['pollStatus']>(async () => status),
  };
}

export function fakePerp(status: PerpStatus = perpConfirmed('LONG', 1, 3000)): FakePerp {
  return {
    name: 'fake-perp',
    submitPositionChange: vi.fn<PerpVenue['submitPositionChange']>(async () => ({ venueOrderId: 'perp-1' })),
    pollStatus: vi.fn<PerpVenue['pollStatus']>(async () => status),
    submitProtectiveOrder: vi.fn<PerpVenue['submitProtectiveOrder']>(async (order) => ({
      venueOrderId: order.kind === 'TAKE_PROFIT' ? 'perp-tp' : 'perp-sl',
    })),
  };
}

/** A promise whose settlement the test controls. */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function recordingNotifier(): Notifier & { events: ExecutionEvent[] } {
  const events: ExecutionEvent[] = [];
  return {
    name: 'recording',
    events,
    async notify(event) {
      events.push(event);
    },
  };
}

export const testSizing: SizingPolicy = {
  spotBuyQuoteAmount: d(50),
  spotSellFraction: d(1),
  perpOrderSize: d(1),
};

export interface HarnessOptions {
  spot?: FakeSpot;
  perp?: FakePerp;
  notifier?: Notifier;
  backoff?: Partial<BackoffPolicy>;
  sizing?: SizingPolicy;
  clock?: () => number;
  db?: StateDb;
  brackets?: BracketPolicy;
  workerConcurrency?: number;
  venueConcurrency?: Record<VenueKind, number>;
  assetVenues?: Array<[string, VenueKind]>;
  logger?: Logger;
}

export function createHarness(opts: HarnessOptions = {}) {
  const db = opts.db ?? openDatabase();
  const ledger = new Ledger(db);
  const dedup = new DedupStore(db);
  const spot = opts.spot ?? fakeSpot();
  const perp = opts.perp ?? fakePerp();
  const notifier = recordingNotifier();
  const coordinator = new ExecutionCoordinator({
    db,
    ledger,
    dedup,
    spot,
    perp,
    notifier: opts.notifier ?? notifier,
    logger: opts.logger ?? silentLogger(),
    assetVenues: new Map<string, VenueKind>(
      opts.assetVenues ?? [
        ['POPCAT', 'SPOT'],
        ['ETH', 'PERP'],
      ],
    ),
    sizing: opts.sizing ?? testSizing,
    brackets: opts.brackets,
    backoff: { initialMs: 1, maxMs: 4, maxAttempts: 10, budgetMs: 5000, ...opts.backoff },
    workerConcurrency: opts.workerConcurrency ?? 4,
    venueConcurrency: opts.venueConcurrency ?? { SPOT: 2, PERP: 2 },
    random: () => 0,
    clock: opts.clock,
  });
  return { db, ledger, dedup, spot, perp, events: notifier.events, coordinator };
}

export function historyCount(db: StateDb): number {
  const row = db.sqlite.prepare('SELECT COUNT(*) AS n FROM position_history').get() as { n: number };
  return row.n;
}
