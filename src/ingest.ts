import { z } from 'zod';
import type { SignalClassifier } from './classifier/types';
import { normalizeAccount } from './config';
import type { Logger } from './logger';
import type { ExecutionOutcome, Post, Signal } from './types';

// JSON numbers past 2^53 are already rounded, so distinct posts would share an id.
const idSchema = z
  .union([z.string().trim().min(1), z.number().int().nonnegative()])
  .refine((v) => typeof v === 'string' || Number.isSafeInteger(v), 'numeric ids must be safe integers; send the id as a string')
  .transform(String);
const dateSchema = z.union([z.string(), z.number()]).optional();

const directPostSchema = z.object({
  id: idSchema,
  author: z.string().trim().min(1),
  text: z.string(),
  observedAt: dateSchema,
});

// Update frame pushed by the feed websocket for a watched account.
const feedFrameSchema = z.object({
  type: z.string().optional(),
  data: z.object({
    twitterUser: z.object({
      screenName: z.string().min(1),
      name: z.string().optional(),
    }),
    status: z
      .object({
        id: idSchema,
        text: z.string().nullable().optional(),
        updatedAt: dateSchema,
      })
      .nullable()
      .optional(),
  }),
});

export class PayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PayloadError';
  }
}

function toDate(value: string | number | undefined, fallback: Date): Date {
  if (value === undefined) return fallback;
  const d = new Date(value);
  return Number.isNaN(d.getTime()) ? fallback : d;
}

/**
 * Accepts a direct post or a feed update frame. Returns null for frames that carry
 * no post text (profile updates, follows); throws PayloadError for anything else.
 */
export function normalizeFeedPayload(raw: unknown, now: Date = new Date()): Post | null {
  const direct = directPostSchema.safeParse(raw);
  if (direct.success) {
    const p = direct.data;
    return { id: p.id, author: normalizeAccount(p.author), text: p.text, observedAt: toDate(p.observedAt, now) };
  }
  const frame = feedFrameSchema.safeParse(raw);
  if (frame.success) {
    const { twitterUser, status } = frame.data.data;
    if (!status?.text || !status.text.trim()) return null;
    return {
      id: status.id,
      author: normalizeAccount(twitterUser.screenName),
      text: status.text,
      observedAt: toDate(status.updatedAt, now),
    };
  }
  throw new PayloadError(`unrecognized payload: ${direct.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
}

export interface Coordinating {
  handle(post: Post, signal: Signal): Promise<ExecutionOutcome>;
}

export interface PipelineOptions {
  classifier: SignalClassifier;
  coordinator: Coordinating;
  watchedAccounts: string[];
  maxPostAgeMs: number;
  minConfidence: number;
  logger: Logger;
  now?: () => Date;
}

export interface PipelineResult {
  signal: Signal | null;
  outcome: ExecutionOutcome;
  reason?: 'unwatched-author' | 'stale-post' | 'low-confidence';
}

export class SignalPipeline {
  private readonly opts: PipelineOptions;
  private readonly watched: Set<string>;
  private readonly now: () => Date;

  constructor(opts: PipelineOptions) {
    this.opts = opts;
    this.watched = new Set(opts.watchedAccounts.map(normalizeAccount));
    this.now = opts.now ?? (() => new Date());
  }

  async ingest(post: Post): Promise<PipelineResult> {
    const log = this.opts.logger;
    if (!this.watched.has(normalizeAccount(post.author))) {
      log.debug({ postId: post.id, author: post.author }, 'skip: author not watched');
      return { signal: null, outcome: skipped(post.id), reason: 'unwatched-author' };
    }
    const ageMs = this.now().getTime() - post.observedAt.getTime();
    if (ageMs > this.opts.maxPostAgeMs) {
      log.info({ postId: post.id, ageMs }, 'skip: post older than max age');
      return { signal: null, outcome: skipped(post.id), reason: 'stale-post' };
    }

    let signal = this.opts.classifier.classify(post);
    let reason: PipelineResult['reason'];
    if (signal.verdict !== 'NONE' && (signal.confidence ?? 1) < this.opts.minConfidence) {
      log.info({ postId: post.id, confidence: signal.confidence }, 'signal below confidence floor');
      signal = { postId: post.id, verdict: 'NONE', asset: null, confidence: signal.confidence };
      reason = 'low-confidence';
    }
    log.info(
      { postId: post.id, author: post.author, verdict: signal.verdict, asset: signal.asset, classifier: this.opts.classifier.id },
      'post classified',
    );
    const outcome = await this.opts.coordinator.handle(post, signal);
    return reason ? { signal, outcome, reason } : { signal, outcome };
  }
}

function skipped(postId: string): ExecutionOutcome {
  return {
    postId,
    asset: null,
    verdict: 'NONE',
    venueKind: null,
    status: 'SKIPPED',
    position: null,
    error: null,
    record: null,
  };
}
