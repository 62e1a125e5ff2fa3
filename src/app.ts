import { createKeywordClassifier } from './classifier/keyword';
import type { SignalClassifier } from './classifier/types';
import { bracketFromConfig, sizingFromConfig } from './config';
import type { AppConfig } from './config';
import { ExecutionCoordinator } from './coordinator';
import { openDatabase } from './db';
import type { StateDb } from './db';
import { DedupStore } from './dedupStore';
import { SignalPipeline } from './ingest';
import { Ledger } from './ledger';
import type { Logger } from './logger';
import { createLogNotifier, createTelegramNotifier } from './notify/telegram';
import type { Notifier } from './notify/types';
import { createPgMirror, noopMirror } from './pg';
import type { StateMirror } from './pg';
import type { VenueKind } from './types';
import { createHttpPerpVenue } from './venues/perp';
import { createSimulatedPerpVenue, createSimulatedSpotVenue } from './venues/simulator';
import { createHttpSpotVenue } from './venues/spot';
import type { PerpVenue, SpotVenue } from './venues/types';

export interface App {
  db: StateDb;
  ledger: Ledger;
  dedup: DedupStore;
  coordinator: ExecutionCoordinator;
  pipeline: SignalPipeline;
  assetVenues: ReadonlyMap<string, VenueKind>;
  close(): Promise<void>;
}

export interface AppOverrides {
  spot?: SpotVenue;
  perp?: PerpVenue;
  notifier?: Notifier;
  classifier?: SignalClassifier;
}

function buildVenues(cfg: AppConfig, logger: Logger): { spot: SpotVenue; perp: PerpVenue } {
  if (cfg.dryRun) {
    logger.warn('DRY_RUN enabled: venue calls are simulated');
    return { spot: createSimulatedSpotVenue({ logger }), perp: createSimulatedPerpVenue({ logger }) };
  }
  if (!cfg.SPOT_VENUE_BASE_URL || !cfg.PERP_VENUE_BASE_URL) {
    throw new Error('SPOT_VENUE_BASE_URL and PERP_VENUE_BASE_URL are required unless DRY_RUN=true');
  }
  return {
    spot: createHttpSpotVenue({
      baseURL: cfg.SPOT_VENUE_BASE_URL,
      apiKey: cfg.SPOT_VENUE_API_KEY,
      quoteAsset: cfg.QUOTE_ASSET,
    }),
    perp: createHttpPerpVenue({
      baseURL: cfg.PERP_VENUE_BASE_URL,
      apiKey: cfg.PERP_VENUE_API_KEY,
      leverage: cfg.PERP_LEVERAGE,
    }),
  };
}

function buildNotifier(cfg: AppConfig, logger: Logger): Notifier {
  if (cfg.TELEGRAM_BOT_TOKEN && cfg.TELEGRAM_CHAT_ID) {
    return createTelegramNotifier({ token: cfg.TELEGRAM_BOT_TOKEN, chatId: cfg.TELEGRAM_CHAT_ID });
  }
  return createLogNotifier(logger);
}

export function createApp(cfg: AppConfig, logger: Logger, overrides: AppOverrides = {}): App {
  let mirror: StateMirror = noopMirror;
  let closeMirror: () => Promise<void> = async () => undefined;
  if (cfg.DATABASE_URL) {
    const pg = createPgMirror(cfg.DATABASE_URL, logger);
    mirror = pg.mirror;
    closeMirror = pg.close;
  }

  const db = openDatabase(cfg.DB_PATH);
  const ledger = new Ledger(db, { mirror });
  const dedup = new DedupStore(db, { mirror });
  const venues = overrides.spot && overrides.perp ? { spot: overrides.spot, perp: overrides.perp } : buildVenues(cfg, logger);
  const assets = [...cfg.assetVenues.keys()];

  const coordinator = new ExecutionCoordinator({
    db,
    ledger,
    dedup,
    spot: venues.spot,
    perp: venues.perp,
    notifier: overrides.notifier ?? buildNotifier(cfg, logger),
    logger,
    assetVenues: cfg.assetVenues,
    sizing: sizingFromConfig(cfg),
    brackets: bracketFromConfig(cfg),
    backoff: {
      initialMs: cfg.BACKOFF_INITIAL_MS,
      maxMs: cfg.BACKOFF_MAX_MS,
      maxAttempts: cfg.MAX_ATTEMPTS,
      budgetMs: cfg.EXECUTION_BUDGET_MS,
    },
    workerConcurrency: cfg.WORKER_CONCURRENCY,
    venueConcurrency: { SPOT: cfg.SPOT_VENUE_CONCURRENCY, PERP: cfg.PERP_VENUE_CONCURRENCY },
  });

  const pipeline = new SignalPipeline({
    classifier: overrides.classifier ?? createKeywordClassifier({ assets }),
    coordinator,
    watchedAccounts: cfg.watchedAccounts,
    maxPostAgeMs: cfg.MAX_POST_AGE_MS,
    minConfidence: cfg.MIN_CONFIDENCE,
    logger,
  });

  return {
    db,
    ledger,
    dedup,
    coordinator,
    pipeline,
    assetVenues: cfg.assetVenues,
    async close() {
      await coordinator.stop();
      db.close();
      await closeMirror();
    },
  };
}
