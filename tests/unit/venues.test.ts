import { AxiosError, AxiosHeaders } from 'axios';
import Decimal from 'decimal.js';
import { describe, it, expect } from 'vitest';
import { VenueRejectedError, VenueTimeoutError } from '../../src/errors';
import { silentLogger } from '../../src/logger';
import { classifyVenueError } from '../../src/venues/http';
import { mapPerpStatus } from '../../src/venues/perp';
import { createSimulatedPerpVenue, createSimulatedSpotVenue } from '../../src/venues/simulator';
import { mapSpotStatus } from '../../src/venues/spot';

function httpError(status: number, data: unknown = {}): AxiosError {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, undefined, {
    data,
    status,
    statusText: '',
    headers: {},
    config,
  });
}

describe('classifyVenueError', () => {
  it('treats client errors as permanent rejections', () => {
    const rejected = classifyVenueError(httpError(400, { reason: 'min notional not met' }));
    expect(rejected).toBeInstanceOf(VenueRejectedError);
    expect(rejected.message).toBe('min notional not met');
    expect(classifyVenueError(httpError(422)).message).toBe('HTTP 422');
  });

  it('keeps throttling and server errors retryable', () => {
    for (const status of [408, 429, 503]) {
      const err = classifyVenueError(httpError(status));
      expect(err).not.toBeInstanceOf(VenueRejectedError);
      expect(err.message).toBe(`venue HTTP ${status}`);
    }
  });

  it('maps client timeouts to VenueTimeout', () => {
    const err = classifyVenueError(new AxiosError('timeout of 8000ms exceeded', 'ECONNABORTED'));
    expect(err).toBeInstanceOf(VenueTimeoutError);
    expect(err.message).toBe('venue request timed out: timeout of 8000ms exceeded');
  });

  it('passes other errors through', () => {
    const original = new Error('boom');
    expect(classifyVenueError(original)).toBe(original);
  });
});

describe('status mapping', () => {
  it('maps swap aggregator states', () => {
    const filled = mapSpotStatus({ status: 'FILLED', filledAmount: '100', avgPrice: '0.5' });
    expect([filled.status, filled.filledSize.toString(), filled.avgPrice?.toString()]).toEqual(['FILLED', '100', '0.5']);
    expect(mapSpotStatus({ status: 'failed' })).toMatchObject({ status: 'REJECTED', reason: 'failed' });
    expect(mapSpotStatus({ status: 'processing' }).status).toBe('PENDING');
  });

  it('maps perp order states', () => {
    const confirmed = mapPerpStatus({ status: 'confirmed', position: { side: 'short', size: 2, entryPrice: '3000' } });
    expect([confirmed.status, confirmed.resultingSide, confirmed.resultingSize.toString(), confirmed.avgPrice?.toString()]).toEqual([
      'CONFIRMED',
      'SHORT',
      '2',
      '3000',
    ]);
    expect(mapPerpStatus({ status: 'cancelled', reason: 'margin' })).toMatchObject({ status: 'REJECTED', reason: 'margin' });
    expect(() => mapPerpStatus({ status: 'filled' })).toThrow('confirmed perp order has no resulting position');
  });
});

describe('simulated venues', () => {
  const logger = silentLogger();

  it('fills spot swaps at the simulated price and dedups by token', async () => {
    const spot = createSimulatedSpotVenue({ logger, priceOf: () => new Decimal('0.5') });
    const a = await spot.submitSwap('POPCAT', 'QUOTE_TO_ASSET', new Decimal(50), 'tok-1');
    const b = await spot.submitSwap('POPCAT', 'QUOTE_TO_ASSET', new Decimal(50), 'tok-1');
    expect(a).toEqual(b);
    const status = await spot.pollStatus(a.venueOrderId);
    expect([status.status, status.filledSize.toString()]).toEqual(['FILLED', '100']);
    expect((await spot.pollStatus('missing')).status).toBe('REJECTED');
  });

  it('opens and closes simulated perp positions', async () => {
    const perp = createSimulatedPerpVenue({ logger });
    const open = await perp.submitPositionChange('ETH', 'OPEN_SHORT', new Decimal(2), 'tok-1');
    expect(await perp.pollStatus(open.venueOrderId)).toMatchObject({ status: 'CONFIRMED', resultingSide: 'SHORT' });
    const close = await perp.submitPositionChange('ETH', 'CLOSE', new Decimal(2), 'tok-2');
    const closed = await perp.pollStatus(close.venueOrderId);
    expect([closed.resultingSide, closed.resultingSize.toString(), closed.avgPrice]).toEqual(['FLAT', '0', null]);
  });

  it('accepts protective orders under a token-derived id', async () => {
    const perp = createSimulatedPerpVenue({ logger });
    const receipt = await perp.submitProtectiveOrder({
      asset: 'ETH',
      kind: 'STOP_LOSS',
      positionSide: 'LONG',
      size: new Decimal(1),
      triggerPrice: new Decimal(2970),
      idempotencyToken: 'tok-1-sl',
    });
    expect(receipt).toEqual({ venueOrderId: 'sim-tok-1-sl' });
  });
});
