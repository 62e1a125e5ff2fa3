import { describe, it, expect, vi } from 'vitest';
import { createKeywordClassifier } from '../../src/classifier/keyword';
import { normalizeFeedPayload, PayloadError, SignalPipeline } from '../../src/ingest';
import type { Coordinating } from '../../src/ingest';
import { silentLogger } from '../../src/logger';
import type { ExecutionOutcome, Post, Signal } from '../../src/types';
import { makePost } from './fixtures';

const NOW = new Date('2026-03-01T10:00:00.000Z');

describe('normalizeFeedPayload', () => {
  it('accepts a direct post and normalizes the author', () => {
    const post = normalizeFeedPayload({ id: 123, author: '@Trader', text: 'hi', observedAt: '2026-03-01T09:59:00.000Z' }, NOW);
    expect(post).toEqual({ id: '123', author: 'trader', text: 'hi', observedAt: new Date('2026-03-01T09:59:00.000Z') });
  });

  it('falls back to now for a missing or unreadable timestamp', () => {
    expect(normalizeFeedPayload({ id: 'a', author: 'x', text: 't' }, NOW)?.observedAt).toEqual(NOW);
    expect(normalizeFeedPayload({ id: 'a', author: 'x', text: 't', observedAt: 'yesterday' }, NOW)?.observedAt).toEqual(NOW);
  });

  it('unwraps a feed update frame', () => {
    const post = normalizeFeedPayload(
      {
        type: 'user-update',
        data: {
          twitterUser: { screenName: 'Trader', name: 'A Trader' },
          status: { id: '9', text: 'buy $ETH', updatedAt: 1_772_359_200_000 },
        },
      },
      NOW,
    );
    expect(post).toEqual({ id: '9', author: 'trader', text: 'buy $ETH', observedAt: new Date(1_772_359_200_000) });
  });

  it('ignores frames without post text', () => {
    expect(normalizeFeedPayload({ data: { twitterUser: { screenName: 'trader' } } }, NOW)).toBeNull();
    expect(normalizeFeedPayload({ data: { twitterUser: { screenName: 'trader' }, status: { id: '1', text: '  ' } } }, NOW)).toBeNull();
  });

  it('throws PayloadError for anything else', () => {
    expect(() => normalizeFeedPayload({ foo: 1 }, NOW)).toThrow(PayloadError);
    expect(() => normalizeFeedPayload('not an object', NOW)).toThrow(PayloadError);
  });

  it('rejects numeric ids beyond the safe integer range', () => {
    const big = JSON.parse('{"id":1850000000000000001,"author":"trader","text":"buy $ETH"}');
    expect(() => normalizeFeedPayload(big, NOW)).toThrow(PayloadError);
    expect(() => normalizeFeedPayload(big, NOW)).toThrow(
      'unrecognized payload: id: numeric ids must be safe integers; send the id as a string',
    );
    const asString = JSON.parse('{"id":"1850000000000000001","author":"trader","text":"buy $ETH"}');
    expect(normalizeFeedPayload(asString, NOW)?.id).toBe('1850000000000000001');
  });
});

function stubCoordinator() {
  const handle = vi.fn<Coordinating['handle']>(
    async (post: Post, signal: Signal): Promise<ExecutionOutcome> => ({
      postId: post.id,
      asset: signal.asset,
      verdict: signal.verdict,
      venueKind: null,
      status: signal.verdict === 'NONE' ? 'SKIPPED' : 'CONFIRMED',
      position: null,
      error: null,
      record: null,
    }),
  );
  return { handle };
}

function pipeline(coordinator: Coordinating, minConfidence = 0) {
  return new SignalPipeline({
    classifier: createKeywordClassifier({ assets: ['ETH'] }),
    coordinator,
    watchedAccounts: ['@Trader'],
    maxPostAgeMs: 300_000,
    minConfidence,
    logger: silentLogger(),
    now: () => NOW,
  });
}

describe('SignalPipeline', () => {
  it('classifies posts from watched accounts and hands them on', async () => {
    const coordinator = stubCoordinator();
    const result = await pipeline(coordinator).ingest(makePost('p1', 'Buying $ETH', { author: 'TRADER', observedAt: NOW }));
    expect(result.reason).toBeUndefined();
    expect(result.outcome.status).toBe('CONFIRMED');
    expect(coordinator.handle).toHaveBeenCalledTimes(1);
    expect(coordinator.handle.mock.calls[0][1]).toEqual({ postId: 'p1', verdict: 'BUY', asset: 'ETH', confidence: 0.5 });
  });

  it('skips unwatched authors', async () => {
    const coordinator = stubCoordinator();
    const result = await pipeline(coordinator).ingest(makePost('p1', 'Buying $ETH', { author: 'someone', observedAt: NOW }));
    expect(result).toMatchObject({ signal: null, reason: 'unwatched-author', outcome: { status: 'SKIPPED' } });
    expect(coordinator.handle).not.toHaveBeenCalled();
  });

  it('skips posts older than the age limit', async () => {
    const coordinator = stubCoordinator();
    const old = new Date(NOW.getTime() - 300_001);
    const result = await pipeline(coordinator).ingest(makePost('p1', 'Buying $ETH', { observedAt: old }));
    expect(result.reason).toBe('stale-post');
    expect(coordinator.handle).not.toHaveBeenCalled();
  });

  it('downgrades signals below the confidence floor to NONE', async () => {
    const coordinator = stubCoordinator();
    const result = await pipeline(coordinator, 0.6).ingest(makePost('p1', 'Buying $ETH', { observedAt: NOW }));
    expect(result.reason).toBe('low-confidence');
    expect(result.signal).toEqual({ postId: 'p1', verdict: 'NONE', asset: null, confidence: 0.5 });
    expect(result.outcome.status).toBe('SKIPPED');
  });
});
