import { describe, it, expect } from 'vitest';
import { bracketFromConfig, loadConfig, normalizeAccount, parseAssetVenues, sizingFromConfig } from '../../src/config';

const base = { WATCHED_ACCOUNTS: '@Alice, bob,alice', ASSET_VENUES: 'popcat:spot, ETH:PERP' };

describe('loadConfig', () => {
  it('parses the required lists and applies defaults', () => {
    const cfg = loadConfig(base);
    expect(cfg.watchedAccounts).toEqual(['alice', 'bob']);
    expect([...cfg.assetVenues]).toEqual([
      ['POPCAT', 'SPOT'],
      ['ETH', 'PERP'],
    ]);
    expect(cfg.QUOTE_ASSET).toBe('USDC');
    expect(cfg.MAX_ATTEMPTS).toBe(40);
    expect(cfg.BACKOFF_INITIAL_MS).toBe(2000);
    expect(cfg.dryRun).toBe(false);
  });

  it('coerces numbers and flags from strings', () => {
    const cfg = loadConfig({ ...base, DRY_RUN: 'TRUE', WORKER_CONCURRENCY: '3', SPOT_SELL_FRACTION: '0.25' });
    expect(cfg.dryRun).toBe(true);
    expect(cfg.WORKER_CONCURRENCY).toBe(3);
    expect(sizingFromConfig(cfg).spotSellFraction.toString()).toBe('0.25');
  });

  it('defaults protective orders to one percent each way', () => {
    const defaults = bracketFromConfig(loadConfig(base));
    expect([defaults.takeProfitPct.toString(), defaults.stopLossPct.toString()]).toEqual(['0.01', '0.01']);
    const off = bracketFromConfig(loadConfig({ ...base, PERP_TAKE_PROFIT_PCT: '0', PERP_STOP_LOSS_PCT: '0.03' }));
    expect([off.takeProfitPct.toString(), off.stopLossPct.toString()]).toEqual(['0', '0.03']);
    expect(() => loadConfig({ ...base, PERP_STOP_LOSS_PCT: '1' })).toThrow(/^Invalid configuration/);
  });

  it('rejects missing or out-of-range values', () => {
    expect(() => loadConfig({ ASSET_VENUES: 'ETH:PERP' })).toThrow(/^Invalid configuration/);
    expect(() => loadConfig({ ...base, SPOT_SELL_FRACTION: '1.5' })).toThrow(/^Invalid configuration/);
    expect(() => loadConfig({ ...base, BACKOFF_INITIAL_MS: '5000', BACKOFF_MAX_MS: '1000' })).toThrow(
      'Invalid configuration: BACKOFF_MAX_MS must be >= BACKOFF_INITIAL_MS',
    );
  });
});

describe('parseAssetVenues', () => {
  it('rejects malformed, duplicate and empty mappings', () => {
    expect(() => parseAssetVenues('ETH:FUTURES')).toThrow('Invalid ASSET_VENUES entry "ETH:FUTURES"');
    expect(() => parseAssetVenues('ETH')).toThrow('Invalid ASSET_VENUES entry "ETH"');
    expect(() => parseAssetVenues('ETH:SPOT,eth:perp')).toThrow('Asset ETH is mapped to more than one venue');
    expect(() => parseAssetVenues(' , ')).toThrow('ASSET_VENUES has no entries');
  });
});

describe('normalizeAccount', () => {
  it('strips the at-sign and case', () => {
    expect(normalizeAccount('  @SomeOne ')).toBe('someone');
  });
});
