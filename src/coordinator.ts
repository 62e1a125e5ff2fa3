import { bracketLegs, perpActionOf, perpResultDelta, resolveAction, spotFillDelta, swapDirectionOf } from './actions';
import type { PlannedAction } from './actions';
import { AbortedError, computeBackoffDelay, sleep } from './backoff';
import type { BackoffPolicy } from './backoff';
import { KeyedMutex, Semaphore } from './concurrency';
import type { BracketPolicy, SizingPolicy } from './config';
import type { StateDb } from './db';
import type { DedupStore } from './dedupStore';
import {
  describeError,
  formatStoredError,
  InvalidSignalError,
  LedgerConflictError,
  NoPositionToActError,
  parseStoredError,
  PositionInvariantError,
  VenueRejectedError,
  VenueTimeoutError,
} from './errors';
import type { Ledger } from './ledger';
import type { Logger } from './logger';
import type { Notifier } from './notify/types';
import { isTerminal } from './types';
import type { ExecutionOutcome, ExecutionRecord, Position, PositionDelta, Post, Signal, VenueKind } from './types';
import type { PerpVenue, SpotVenue } from './venues/types';

export interface CoordinatorOptions {
  db: StateDb;
  ledger: Ledger;
  dedup: DedupStore;
  spot: SpotVenue;
  perp: PerpVenue;
  notifier?: Notifier;
  logger: Logger;
  assetVenues: Map<string, VenueKind>;
  sizing: SizingPolicy;
  /** Protective orders after a perp open; omitted means none are placed. */
  brackets?: BracketPolicy;
  backoff: BackoffPolicy;
  workerConcurrency: number;
  venueConcurrency: Record<VenueKind, number>;
  random?: () => number;
  clock?: () => number;
}

interface Admission {
  done: Promise<ExecutionOutcome>;
}

type PollResult = { kind: 'pending' } | { kind: 'filled'; delta: () => PositionDelta };

/**
 * Turns one classified post into at most one venue lineage and drives it to a
 * terminal state. Work on one (asset, venueKind) is serialized end to end, so a
 * contradictory signal waits until the in-flight record is terminal.
 */
export class ExecutionCoordinator {
  private readonly opts: CoordinatorOptions;
  private readonly logger: Logger;
  private readonly workers: Semaphore;
  private readonly venueSlots: Record<VenueKind, Semaphore>;
  private readonly locks = new KeyedMutex();
  private readonly lineages = new Map<string, Promise<ExecutionOutcome>>();
  private readonly abort = new AbortController();
  private readonly random: () => number;
  private readonly clock: () => number;

  constructor(opts: CoordinatorOptions) {
    this.opts = opts;
    this.logger = opts.logger;
    this.workers = new Semaphore(opts.workerConcurrency);
    this.venueSlots = {
      SPOT: new Semaphore(opts.venueConcurrency.SPOT),
      PERP: new Semaphore(opts.venueConcurrency.PERP),
    };
    this.random = opts.random ?? Math.random;
    this.clock = opts.clock ?? Date.now;
  }

  get activeLineages(): number {
    return this.lineages.size;
  }

  /** Lineages holding a worker slot; never above `workerConcurrency`. */
  get drivingLineages(): number {
    return this.workers.inUse;
  }

  async handle(post: Post, signal: Signal): Promise<ExecutionOutcome> {
    if (this.abort.signal.aborted) throw new Error('coordinator is stopped');
    if (signal.verdict === 'NONE') {
      return this.detached(post.id, signal, 'SKIPPED', null);
    }

    let target: { asset: string; venueKind: VenueKind };
    try {
      target = this.validate(post, signal);
    } catch (err) {
      if (!(err instanceof InvalidSignalError)) throw err;
      this.logger.warn({ postId: post.id, asset: signal.asset, err: err.message }, 'invalid signal');
      return this.detached(post.id, signal, 'INVALID', err);
    }

    const joined = this.lineages.get(post.id);
    if (joined) return joined;

    return this.admit(post, signal, target.asset, target.venueKind).done;
  }

  /** Resumes every PENDING/SUBMITTED record left by a previous run. */
  async recover(): Promise<ExecutionOutcome[]> {
    const open = this.opts.dedup.listNonTerminal();
    if (open.length > 0) this.logger.info({ count: open.length }, 'recovering open executions');
    return Promise.all(open.map((record) => this.lineages.get(record.postId) ?? this.startLineage(record)));
  }

  /** Aborts every sleeping lineage. Their records stay non-terminal for `recover`. */
  async stop(): Promise<void> {
    this.abort.abort();
    await Promise.allSettled([...this.lineages.values()]);
  }

  private validate(post: Post, signal: Signal): { asset: string; venueKind: VenueKind } {
    if (!post.id.trim()) throw new InvalidSignalError('post id is empty');
    if (signal.postId !== post.id) {
      throw new InvalidSignalError(`signal belongs to post ${signal.postId}, not ${post.id}`);
    }
    if (!signal.asset) throw new InvalidSignalError(`${signal.verdict} signal carries no asset`);
    const asset = signal.asset.toUpperCase();
    const venueKind = this.opts.assetVenues.get(asset);
    if (!venueKind) throw new InvalidSignalError(`asset ${asset} is not tracked`);
    return { asset, venueKind };
  }

  // Synchronous up to the lineage registration: a duplicate admitted right after
  // always finds either the created record or the registered lineage.
  private admit(post: Post, signal: Signal, asset: string, venueKind: VenueKind): Admission {
    const postId = post.id;
    const { record, created } = this.opts.dedup.createIfAbsent({
      postId,
      asset,
      verdict: signal.verdict,
      venueKind,
      author: post.author,
      confidence: signal.confidence ?? null,
    });
    if (created) {
      this.logger.info({ postId, asset, venueKind, verdict: signal.verdict }, 'execution created');
      return { done: this.startLineage(record) };
    }
    if (isTerminal(record.status)) {
      this.logger.info({ postId, status: record.status }, 'duplicate post: returning recorded outcome');
      return { done: Promise.resolve(this.outcomeOf(record)) };
    }
    const live = this.lineages.get(postId);
    if (live) {
      this.logger.info({ postId }, 'duplicate post: joining in-flight execution');
      return { done: live };
    }
    this.logger.info({ postId, status: record.status }, 'duplicate post: execution owned elsewhere, waiting');
    return { done: this.awaitForeign(record) };
  }

  private startLineage(record: ExecutionRecord): Promise<ExecutionOutcome> {
    const done = this.runLineage(record).finally(() => {
      this.lineages.delete(record.postId);
    });
    this.lineages.set(record.postId, done);
    return done;
  }

  // The keyed lock is taken before the worker slot, so a slot is never held by a
  // lineage that is only queued behind another one on the same key.
  private async runLineage(record: ExecutionRecord): Promise<ExecutionOutcome> {
    const key = `${record.asset}:${record.venueKind}`;
    if (this.locks.isLocked(key)) {
      this.logger.info({ postId: record.postId, key }, 'queued behind in-flight execution');
    }
    let outcome: ExecutionOutcome;
    try {
      outcome = await this.locks.runExclusive(key, () => this.workers.run(() => this.drive(record)));
    } catch (err) {
      if (!(err instanceof AbortedError)) throw err;
      this.logger.warn({ postId: record.postId }, 'execution interrupted by shutdown');
      return this.outcomeOf(this.opts.dedup.get(record.postId) ?? record);
    }
    await this.emit(outcome);
    return outcome;
  }

  private async drive(initial: ExecutionRecord): Promise<ExecutionOutcome> {
    if (this.abort.signal.aborted) throw new AbortedError();
    const { dedup, ledger } = this.opts;
    let record = initial;
    const position = ledger.get(record.asset, record.venueKind);

    if (!record.action || !record.size) {
      let plan: PlannedAction;
      try {
        plan = resolveAction(record.verdict, record.venueKind, position, this.opts.sizing);
      } catch (err) {
        if (!(err instanceof NoPositionToActError)) throw err;
        record = dedup.update(record.postId, { status: 'FAILED', lastError: formatStoredError(err) });
        this.logger.info({ postId: record.postId, reason: err.message }, 'no position to act on');
        return this.outcomeOf(record, position);
      }
      record = dedup.update(record.postId, { action: plan.action, size: plan.size });
      this.logger.info(
        { postId: record.postId, asset: record.asset, action: plan.action, size: plan.size.toString() },
        'trade decision',
      );
    }

    return this.execute(record, position.version);
  }

  private async execute(initial: ExecutionRecord, expectedVersion: number): Promise<ExecutionOutcome> {
    const { dedup, backoff } = this.opts;
    const started = this.clock();
    let record = initial;
    let attempts = record.attempts;
    let calls = 0;
    let retry = 0;

    const exhausted = (): boolean => calls >= backoff.maxAttempts || this.clock() - started >= backoff.budgetMs;
    const wait = async (): Promise<void> => {
      retry++;
      const remaining = backoff.budgetMs - (this.clock() - started);
      const delay = Math.min(computeBackoffDelay(backoff, retry, this.random), Math.max(remaining, 0));
      await sleep(delay, this.abort.signal);
    };

    while (!exhausted()) {
      calls++;
      attempts++;
      try {
        if (!record.venueOrderId) {
          const receipt = await this.submit(record);
          record = dedup.update(record.postId, {
            status: 'SUBMITTED',
            venueOrderId: receipt.venueOrderId,
            attempts,
            lastError: null,
          });
          retry = 0;
          this.logger.info({ postId: record.postId, venueOrderId: receipt.venueOrderId }, 'order submitted');
          continue;
        }
        const result = await this.poll(record);
        if (result.kind === 'filled') {
          const outcome = this.commit(record, result.delta, expectedVersion, attempts);
          await this.protect(outcome);
          return outcome;
        }
        record = dedup.update(record.postId, { attempts });
      } catch (err) {
        if (err instanceof VenueRejectedError) {
          record = dedup.update(record.postId, { status: 'FAILED', attempts, lastError: formatStoredError(err) });
          this.logger.warn({ postId: record.postId, reason: err.reason }, 'venue rejected order');
          return this.outcomeOf(record);
        }
        record = dedup.update(record.postId, { attempts, lastError: formatStoredError(err) });
        this.logger.warn({ postId: record.postId, attempts, error: describeError(err) }, 'venue call failed, will retry');
      }
      if (exhausted()) break;
      await wait();
    }

    const timeout = new VenueTimeoutError(
      `no terminal venue answer after ${calls} calls in ${this.clock() - started}ms`,
    );
    record = dedup.update(record.postId, { status: 'EXPIRED', attempts, lastError: formatStoredError(timeout) });
    this.logger.error({ postId: record.postId, venueOrderId: record.venueOrderId }, 'execution expired: reconcile manually');
    return this.outcomeOf(record);
  }

  private async submit(record: ExecutionRecord): Promise<{ venueOrderId: string }> {
    const { action, size } = record;
    if (!action || !size) throw new Error(`record ${record.postId} has no planned action`);
    if (record.venueKind === 'SPOT') {
      return this.venueSlots.SPOT.run(() =>
        this.opts.spot.submitSwap(record.asset, swapDirectionOf(action), size, record.idempotencyToken),
      );
    }
    return this.venueSlots.PERP.run(() =>
      this.opts.perp.submitPositionChange(record.asset, perpActionOf(action), size, record.idempotencyToken),
    );
  }

  private async poll(record: ExecutionRecord): Promise<PollResult> {
    const { action, venueOrderId } = record;
    if (!action || !venueOrderId) throw new Error(`record ${record.postId} has nothing to poll`);
    if (record.venueKind === 'SPOT') {
      const status = await this.venueSlots.SPOT.run(() => this.opts.spot.pollStatus(venueOrderId));
      if (status.status === 'REJECTED') throw new VenueRejectedError(status.reason ?? 'rejected');
      if (status.status === 'PENDING') return { kind: 'pending' };
      return { kind: 'filled', delta: () => spotFillDelta(action, status) };
    }
    const status = await this.venueSlots.PERP.run(() => this.opts.perp.pollStatus(venueOrderId));
    if (status.status === 'REJECTED') throw new VenueRejectedError(status.reason ?? 'rejected');
    if (status.status === 'PENDING') return { kind: 'pending' };
    return { kind: 'filled', delta: () => perpResultDelta(status) };
  }

  /**
   * CONFIRMED and the position delta land in one transaction. A stale ledger
   * version is re-read and retried once; after that, or on a result that would
   * break the position invariant, the record expires for manual reconciliation.
   */
  private commit(
    record: ExecutionRecord,
    buildDelta: () => PositionDelta,
    expectedVersion: number,
    attempts: number,
  ): ExecutionOutcome {
    const { db, ledger, dedup } = this.opts;
    let version = expectedVersion;
    for (let pass = 1; ; pass++) {
      try {
        const committed = db.transaction(() => {
          const position = ledger.applyDelta(record.asset, record.venueKind, version, buildDelta());
          const confirmed = dedup.update(record.postId, { status: 'CONFIRMED', attempts, lastError: null });
          return { position, confirmed };
        });
        this.logger.info(
          {
            postId: record.postId,
            asset: record.asset,
            side: committed.position.side,
            size: committed.position.size.toString(),
          },
          'execution confirmed',
        );
        return this.outcomeOf(committed.confirmed, committed.position);
      } catch (err) {
        if (err instanceof LedgerConflictError && pass === 1) {
          this.logger.warn({ postId: record.postId, err: err.message }, 'ledger conflict, retrying once');
          version = ledger.get(record.asset, record.venueKind).version;
          continue;
        }
        if (err instanceof LedgerConflictError || err instanceof PositionInvariantError) {
          const expired = dedup.update(record.postId, { status: 'EXPIRED', attempts, lastError: formatStoredError(err) });
          this.logger.error({ postId: record.postId, err: err.message }, 'confirmed fill could not be applied: reconcile manually');
          return this.outcomeOf(expired);
        }
        if (err instanceof VenueRejectedError) {
          const failed = dedup.update(record.postId, { status: 'FAILED', attempts, lastError: formatStoredError(err) });
          return this.outcomeOf(failed);
        }
        throw err;
      }
    }
  }

  /**
   * Places the take-profit and stop-loss legs around a confirmed perp open. Each
   * leg gets one attempt and its result is recorded; a failed leg is logged and
   * leaves the ledger and the CONFIRMED record as they are.
   */
  private async protect(outcome: ExecutionOutcome): Promise<void> {
    const { brackets, dedup, perp } = this.opts;
    const { record, position } = outcome;
    if (!brackets || !record || !position || outcome.status !== 'CONFIRMED') return;
    if (record.action !== 'OPEN_LONG' && record.action !== 'OPEN_SHORT') return;
    if (position.side === 'FLAT' || !position.avgEntryPrice) {
      this.logger.warn({ postId: record.postId }, 'perp open confirmed without an entry price: no protective orders');
      return;
    }
    const positionSide = position.side;
    for (const leg of bracketLegs(positionSide, position.avgEntryPrice, brackets)) {
      const idempotencyToken = `${record.idempotencyToken}-${leg.kind === 'TAKE_PROFIT' ? 'tp' : 'sl'}`;
      const order = {
        asset: record.asset,
        kind: leg.kind,
        positionSide,
        size: position.size,
        triggerPrice: leg.triggerPrice,
        idempotencyToken,
      };
      let venueOrderId: string | null = null;
      let error: string | null = null;
      try {
        const receipt = await this.venueSlots.PERP.run(() => perp.submitProtectiveOrder(order));
        venueOrderId = receipt.venueOrderId;
        this.logger.info(
          { postId: record.postId, kind: leg.kind, triggerPrice: leg.triggerPrice.toString(), venueOrderId },
          'protective order placed',
        );
      } catch (err) {
        error = formatStoredError(err);
        this.logger.warn({ postId: record.postId, kind: leg.kind, error: describeError(err) }, 'protective order failed');
      }
      dedup.recordBracket({
        postId: record.postId,
        kind: leg.kind,
        triggerPrice: leg.triggerPrice,
        size: position.size,
        idempotencyToken,
        venueOrderId,
        error,
        createdAt: new Date(this.clock()),
      });
    }
  }

  private async awaitForeign(initial: ExecutionRecord): Promise<ExecutionOutcome> {
    const { backoff, dedup } = this.opts;
    const started = this.clock();
    let record = initial;
    let retry = 0;
    try {
      while (!isTerminal(record.status)) {
        const remaining = backoff.budgetMs - (this.clock() - started);
        if (remaining <= 0) break;
        retry++;
        await sleep(Math.min(computeBackoffDelay(backoff, retry, this.random), remaining), this.abort.signal);
        record = dedup.get(record.postId) ?? record;
      }
    } catch (err) {
      if (!(err instanceof AbortedError)) throw err;
    }
    return this.outcomeOf(record);
  }

  private async emit(outcome: ExecutionOutcome): Promise<void> {
    const notifier = this.opts.notifier;
    if (!notifier) return;
    try {
      await notifier.notify({
        postId: outcome.postId,
        author: outcome.record?.author ?? null,
        confidence: outcome.record?.confidence ?? null,
        asset: outcome.asset,
        verdict: outcome.verdict,
        venueKind: outcome.venueKind,
        finalStatus: outcome.status,
        position: outcome.position,
        error: outcome.error,
      });
    } catch (err) {
      // Only the message: transport errors carry request config such as bot URLs.
      this.logger.warn(
        { postId: outcome.postId, notifier: notifier.name, error: describeError(err) },
        'notification delivery failed',
      );
    }
  }

  private outcomeOf(record: ExecutionRecord, position?: Position): ExecutionOutcome {
    return {
      postId: record.postId,
      asset: record.asset,
      verdict: record.verdict,
      venueKind: record.venueKind,
      status: record.status,
      position: position ?? this.opts.ledger.get(record.asset, record.venueKind),
      error: record.status === 'CONFIRMED' ? null : parseStoredError(record.lastError),
      record,
    };
  }

  private detached(
    postId: string,
    signal: Signal,
    status: 'SKIPPED' | 'INVALID',
    err: InvalidSignalError | null,
  ): ExecutionOutcome {
    return {
      postId,
      asset: signal.asset,
      verdict: signal.verdict,
      venueKind: null,
      status,
      position: null,
      error: err ? err.toOutcomeError() : null,
      record: null,
    };
  }
}
