import Decimal from 'decimal.js';
import { z } from 'zod';
import { DEFAULT_DB_PATH } from './db';
import type { VenueKind } from './types';

const configSchema = z.object({
  WATCHED_ACCOUNTS: z.string().min(1),
  ASSET_VENUES: z.string().min(1),
  QUOTE_ASSET: z.string().min(1).default('USDC'),
  SPOT_BUY_QUOTE_AMOUNT: z.coerce.number().positive().default(50),
  SPOT_SELL_FRACTION: z.coerce.number().positive().max(1).default(1),
  PERP_ORDER_SIZE: z.coerce.number().positive().default(1),
  PERP_LEVERAGE: z.coerce.number().int().min(1).max(50).default(5),
  // 0 disables the leg.
  PERP_TAKE_PROFIT_PCT: z.coerce.number().min(0).lt(1).default(0.01),
  PERP_STOP_LOSS_PCT: z.coerce.number().min(0).lt(1).default(0.01),
  MIN_CONFIDENCE: z.coerce.number().min(0).max(1).default(0),
  MAX_POST_AGE_MS: z.coerce.number().int().positive().default(300000),
  BACKOFF_INITIAL_MS: z.coerce.number().int().positive().default(2000),
  BACKOFF_MAX_MS: z.coerce.number().int().positive().default(60000),
  MAX_ATTEMPTS: z.coerce.number().int().positive().default(40),
  EXECUTION_BUDGET_MS: z.coerce.number().int().positive().default(600000),
  WORKER_CONCURRENCY: z.coerce.number().int().positive().default(8),
  SPOT_VENUE_CONCURRENCY: z.coerce.number().int().positive().default(2),
  PERP_VENUE_CONCURRENCY: z.coerce.number().int().positive().default(2),
  RETENTION_MS: z.coerce.number().int().positive().default(86400000),
  PRUNE_INTERVAL_MS: z.coerce.number().int().positive().default(3600000),
  DB_PATH: z.string().min(1).default(DEFAULT_DB_PATH),
  DATABASE_URL: z.string().optional(),
  PORT: z.coerce.number().int().positive().default(5000),
  LOG_LEVEL: z.string().default('info'),
  DRY_RUN: z.string().optional(),
  SPOT_VENUE_BASE_URL: z.string().url().optional(),
  SPOT_VENUE_API_KEY: z.string().optional(),
  PERP_VENUE_BASE_URL: z.string().url().optional(),
  PERP_VENUE_API_KEY: z.string().optional(),
  TELEGRAM_BOT_TOKEN: z.string().optional(),
  TELEGRAM_CHAT_ID: z.string().optional(),
});

export type AppConfig = z.infer<typeof configSchema> & {
  watchedAccounts: string[];
  assetVenues: Map<string, VenueKind>;
  dryRun: boolean;
};

export function normalizeAccount(handle: string): string {
  return handle.trim().replace(/^@/, '').toLowerCase();
}

export function parseAssetVenues(raw: string): Map<string, VenueKind> {
  const out = new Map<string, VenueKind>();
  for (const entry of raw.split(',').map((s) => s.trim()).filter(Boolean)) {
    const [asset, kind] = entry.split(':').map((s) => s.trim().toUpperCase());
    if (!asset || (kind !== 'SPOT' && kind !== 'PERP')) {
      throw new Error(`Invalid ASSET_VENUES entry "${entry}" (expected ASSET:SPOT or ASSET:PERP)`);
    }
    if (out.has(asset)) {
      throw new Error(`Asset ${asset} is mapped to more than one venue`);
    }
    out.set(asset, kind);
  }
  if (out.size === 0) throw new Error('ASSET_VENUES has no entries');
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${parsed.error.toString()}`);
  }
  const cfg = parsed.data;
  if (cfg.BACKOFF_MAX_MS < cfg.BACKOFF_INITIAL_MS) {
    throw new Error('Invalid configuration: BACKOFF_MAX_MS must be >= BACKOFF_INITIAL_MS');
  }
  return {
    ...cfg,
    watchedAccounts: Array.from(
      new Set(cfg.WATCHED_ACCOUNTS.split(',').map(normalizeAccount).filter(Boolean)),
    ),
    assetVenues: parseAssetVenues(cfg.ASSET_VENUES),
    dryRun: (cfg.DRY_RUN ?? 'false').toLowerCase() === 'true',
  };
}

export interface SizingPolicy {
  spotBuyQuoteAmount: Decimal;
  spotSellFraction: Decimal;
  perpOrderSize: Decimal;
}

export function sizingFromConfig(cfg: AppConfig): SizingPolicy {
  return {
    spotBuyQuoteAmount: new Decimal(cfg.SPOT_BUY_QUOTE_AMOUNT),
    spotSellFraction: new Decimal(cfg.SPOT_SELL_FRACTION),
    perpOrderSize: new Decimal(cfg.PERP_ORDER_SIZE),
  };
}

/** Trigger distances for the protective orders placed after a perp open. */
export interface BracketPolicy {
  takeProfitPct: Decimal;
  stopLossPct: Decimal;
}

export function bracketFromConfig(cfg: AppConfig): BracketPolicy {
  return {
    takeProfitPct: new Decimal(cfg.PERP_TAKE_PROFIT_PCT),
    stopLossPct: new Decimal(cfg.PERP_STOP_LOSS_PCT),
  };
}
