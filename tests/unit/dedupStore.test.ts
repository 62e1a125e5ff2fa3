import { describe, it, expect } from 'vitest';
import { openDatabase } from '../../src/db';
import { DedupStore, idempotencyTokenFor } from '../../src/dedupStore';
import { TerminalRecordError } from '../../src/errors';
import { d } from './fixtures';

function setup(start = 1000) {
  const db = openDatabase();
  const clock = { ms: start };
  const store = new DedupStore(db, { now: () => new Date(clock.ms) });
  return { db, store, clock };
}

const draft = (postId: string) => ({ postId, asset: 'POPCAT', verdict: 'BUY' as const, venueKind: 'SPOT' as const });

describe('idempotencyTokenFor', () => {
  it('is stable per post and distinct across posts', () => {
    expect(idempotencyTokenFor('p1')).toMatch(/^pst-[0-9a-f]{32}$/);
    expect(idempotencyTokenFor('p1')).toBe(idempotencyTokenFor('p1'));
    expect(idempotencyTokenFor('p1')).not.toBe(idempotencyTokenFor('p2'));
  });
});

describe('DedupStore', () => {
  it('creates a record exactly once per post', () => {
    const { store } = setup();
    const first = store.createIfAbsent(draft('p1'));
    const second = store.createIfAbsent({ ...draft('p1'), verdict: 'SELL' });
    expect(first.created).toBe(true);
    expect(second.created).toBe(false);
    expect(second.record.verdict).toBe('BUY');
    expect(first.record).toMatchObject({ status: 'PENDING', attempts: 0, action: null, size: null, venueOrderId: null });
    expect(first.record.idempotencyToken).toBe(idempotencyTokenFor('p1'));
    expect(first.record).toMatchObject({ author: null, confidence: null });
  });

  it('keeps the post author and signal confidence', () => {
    const { store } = setup();
    store.createIfAbsent({ ...draft('p1'), author: 'trader', confidence: 0.75 });
    expect(store.get('p1')).toMatchObject({ author: 'trader', confidence: 0.75 });
  });

  it('records protective orders per post and leg', () => {
    const { store } = setup();
    store.createIfAbsent(draft('p1'));
    const base = { postId: 'p1', size: d(1), createdAt: new Date(1000) };
    store.recordBracket({ ...base, kind: 'TAKE_PROFIT', triggerPrice: d(3030), idempotencyToken: 'tok-tp', venueOrderId: 'tp-1', error: null });
    store.recordBracket({
      ...base,
      kind: 'STOP_LOSS',
      triggerPrice: d(2970),
      idempotencyToken: 'tok-sl',
      venueOrderId: null,
      error: 'Error: venue HTTP 503',
    });

    const legs = store.listBrackets('p1');
    expect(legs.map((b) => [b.kind, b.triggerPrice.toString(), b.venueOrderId, b.error])).toEqual([
      ['TAKE_PROFIT', '3030', 'tp-1', null],
      ['STOP_LOSS', '2970', null, 'Error: venue HTTP 503'],
    ]);
    expect(legs[0].createdAt).toEqual(new Date(1000));
    expect(store.listBrackets('p2')).toEqual([]);
  });

  it('moves forward through the allowed transitions', () => {
    const { store } = setup();
    store.createIfAbsent(draft('p1'));
    store.update('p1', { action: 'SWAP_QUOTE_TO_ASSET', size: d(50) });
    const submitted = store.update('p1', { status: 'SUBMITTED', venueOrderId: 'ord-1', attempts: 1, lastError: 'Error: flaky' });
    expect(submitted.size?.toString()).toBe('50');
    expect(submitted.lastError).toBe('Error: flaky');

    const confirmed = store.update('p1', { status: 'CONFIRMED', attempts: 2, lastError: null });
    expect(confirmed).toMatchObject({ status: 'CONFIRMED', venueOrderId: 'ord-1', attempts: 2, lastError: null });
    expect(store.get('p1')?.status).toBe('CONFIRMED');
  });

  it('rejects changes to terminal records and skipped states', () => {
    const { store } = setup();
    store.createIfAbsent(draft('p1'));
    expect(() => store.update('p1', { status: 'CONFIRMED' })).toThrow(TerminalRecordError);

    store.update('p1', { status: 'FAILED', lastError: 'NoPositionToAct: nothing held' });
    expect(() => store.update('p1', { attempts: 3 })).toThrow('record p1 cannot move from FAILED to FAILED');
    expect(store.get('p1')?.attempts).toBe(0);
  });

  it('lists open records oldest first and recent records newest first', () => {
    const { store, clock } = setup();
    store.createIfAbsent(draft('a'));
    clock.ms = 2000;
    store.createIfAbsent(draft('b'));
    store.update('b', { status: 'SUBMITTED', venueOrderId: 'ord-b' });
    clock.ms = 3000;
    store.createIfAbsent(draft('c'));
    store.update('c', { status: 'EXPIRED' });

    expect(store.listNonTerminal().map((r) => r.postId)).toEqual(['a', 'b']);
    expect(store.listRecent().map((r) => r.postId)).toEqual(['c', 'b', 'a']);
    expect(store.listRecent(1).map((r) => r.postId)).toEqual(['c']);
  });

  it('prunes old CONFIRMED and FAILED records but keeps the rest', () => {
    const { db, store, clock } = setup(1000);
    for (const id of ['a', 'b', 'c', 'd']) store.createIfAbsent(draft(id));
    store.update('a', { status: 'SUBMITTED', venueOrderId: 'ord-a' });
    store.update('a', { status: 'CONFIRMED' });
    store.recordBracket({
      postId: 'a',
      kind: 'TAKE_PROFIT',
      triggerPrice: d(2),
      size: d(1),
      idempotencyToken: 'tok-a-tp',
      venueOrderId: 'tp-a',
      error: null,
      createdAt: new Date(1000),
    });
    store.update('b', { status: 'FAILED' });
    store.update('c', { status: 'EXPIRED' });
    clock.ms = 9000;
    store.createIfAbsent(draft('e'));
    store.update('e', { status: 'FAILED' });

    expect(store.prune(5000, new Date(10_000))).toBe(2);
    expect(store.get('a')).toBeNull();
    expect(store.get('b')).toBeNull();
    expect(['c', 'd', 'e'].map((id) => store.get(id)?.postId)).toEqual(['c', 'd', 'e']);
    const events = db.sqlite.prepare("SELECT COUNT(*) AS n FROM execution_events WHERE post_id IN ('a', 'b')").get();
    expect(events).toEqual({ n: 0 });
    expect(store.listBrackets('a')).toEqual([]);
  });
});
