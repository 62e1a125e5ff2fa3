import http from 'http';
import Decimal from 'decimal.js';
import { z } from 'zod';
import type { App } from './app';
import { ExecutionError } from './errors';
import { normalizeFeedPayload, PayloadError } from './ingest';
import type { Logger } from './logger';
import type { ExecutionOutcome, ExecutionRecord, Position, Post } from './types';

export interface ApiRequest {
  method: string;
  url: string;
  body?: unknown;
}

export interface ApiResponse {
  status: number;
  body: Record<string, unknown>;
}

export function positionJson(p: Position): Record<string, unknown> {
  return {
    asset: p.asset,
    venueKind: p.venueKind,
    side: p.side,
    size: p.size.toString(),
    avgEntryPrice: p.avgEntryPrice?.toString() ?? null,
    version: p.version,
    updatedAt: p.updatedAt.toISOString(),
  };
}

export function recordJson(r: ExecutionRecord): Record<string, unknown> {
  return {
    postId: r.postId,
    requestedAt: r.requestedAt.toISOString(),
    asset: r.asset,
    verdict: r.verdict,
    author: r.author,
    confidence: r.confidence,
    venueKind: r.venueKind,
    action: r.action,
    size: r.size?.toString() ?? null,
    status: r.status,
    venueOrderId: r.venueOrderId,
    attempts: r.attempts,
    lastError: r.lastError,
    updatedAt: r.updatedAt.toISOString(),
  };
}

export function outcomeJson(o: ExecutionOutcome): Record<string, unknown> {
  return {
    postId: o.postId,
    asset: o.asset,
    verdict: o.verdict,
    venueKind: o.venueKind,
    status: o.status,
    position: o.position ? positionJson(o.position) : null,
    error: o.error,
  };
}

const decimalString = z
  .union([z.string(), z.number()])
  .transform((v, ctx) => {
    let parsed: Decimal;
    try {
      parsed = new Decimal(v);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'not a decimal' });
      return z.NEVER;
    }
    if (!parsed.isFinite()) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a finite decimal' });
      return z.NEVER;
    }
    return parsed;
  });

const correctionSchema = z.object({
  expectedVersion: z.number().int().nonnegative(),
  side: z.enum(['LONG', 'SHORT', 'FLAT']),
  size: decimalString,
  avgEntryPrice: decimalString.nullable().optional(),
});

const venueKindSchema = z.enum(['SPOT', 'PERP']);

function pathSegments(pathname: string): string[] | null {
  try {
    return pathname.split('/').filter(Boolean).map(decodeURIComponent);
  } catch (err) {
    if (err instanceof URIError) return null;
    throw err;
  }
}

export async function handleApiRequest(app: App, req: ApiRequest): Promise<ApiResponse> {
  const url = new URL(req.url, 'http://localhost');
  const parts = pathSegments(url.pathname);
  if (!parts) return { status: 400, body: { ok: false, error: 'malformed path encoding' } };

  if (req.method === 'GET' && url.pathname === '/health') {
    return { status: 200, body: { ok: true, activeExecutions: app.coordinator.activeLineages } };
  }

  if (req.method === 'POST' && url.pathname === '/ingest') {
    let post: Post | null;
    try {
      post = normalizeFeedPayload(req.body);
    } catch (err) {
      if (err instanceof PayloadError) return { status: 400, body: { ok: false, error: err.message } };
      throw err;
    }
    if (!post) return { status: 200, body: { ok: true, ignored: 'no post text' } };
    const result = await app.pipeline.ingest(post);
    return {
      status: 200,
      body: { ok: true, signal: result.signal, reason: result.reason ?? null, outcome: outcomeJson(result.outcome) },
    };
  }

  if (req.method === 'GET' && parts[0] === 'executions') {
    if (parts.length === 1) {
      const limit = Math.min(Math.max(Number(url.searchParams.get('limit') ?? 50) || 50, 1), 500);
      return { status: 200, body: { rows: app.dedup.listRecent(limit).map(recordJson) } };
    }
    const record = parts.length === 2 ? app.dedup.get(parts[1]) : null;
    if (!record) return { status: 404, body: { error: 'not found' } };
    return { status: 200, body: { record: recordJson(record) } };
  }

  if (req.method === 'GET' && url.pathname === '/positions') {
    return { status: 200, body: { rows: app.ledger.list().map(positionJson) } };
  }

  if (req.method === 'PUT' && parts[0] === 'positions' && parts.length === 3) {
    const kind = venueKindSchema.safeParse(parts[2].toUpperCase());
    const body = correctionSchema.safeParse(req.body);
    if (!kind.success || !body.success) {
      return { status: 400, body: { ok: false, error: body.success ? 'venueKind must be SPOT or PERP' : body.error.toString() } };
    }
    const asset = parts[1].toUpperCase();
    const tracked = app.assetVenues.get(asset);
    if (tracked !== kind.data) {
      const error = tracked ? `${asset} trades on ${tracked}, not ${kind.data}` : `${asset} is not a tracked asset`;
      return { status: 400, body: { ok: false, error } };
    }
    try {
      const position = app.ledger.correct(asset, kind.data, body.data.expectedVersion, {
        side: body.data.side,
        size: body.data.size,
        avgEntryPrice: body.data.avgEntryPrice ?? null,
      });
      return { status: 200, body: { ok: true, position: positionJson(position) } };
    } catch (err) {
      if (err instanceof ExecutionError && err.code === 'LedgerConflict') {
        return { status: 409, body: { ok: false, error: err.toOutcomeError() } };
      }
      if (err instanceof ExecutionError && err.code === 'PositionInvariant') {
        return { status: 400, body: { ok: false, error: err.toOutcomeError() } };
      }
      throw err;
    }
  }

  return { status: 404, body: { error: 'not found' } };
}

function readBody(req: http.IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (c: Buffer) => chunks.push(c));
    req.on('error', reject);
    req.on('end', () => {
      const text = Buffer.concat(chunks).toString('utf8');
      if (!text.trim()) {
        resolve(undefined);
        return;
      }
      try {
        resolve(JSON.parse(text));
      } catch {
        reject(new PayloadError('request body is not valid JSON'));
      }
    });
  });
}

export function createApiServer(app: App, logger: Logger): http.Server {
  return http.createServer((req, res) => {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, PUT, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const send = (r: ApiResponse): void => {
      res.writeHead(r.status, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify(r.body));
    };
    const run = async (): Promise<ApiResponse> => {
      const method = req.method ?? 'GET';
      const body = method === 'POST' || method === 'PUT' ? await readBody(req) : undefined;
      return handleApiRequest(app, { method, url: req.url ?? '/', body });
    };
    run()
      .then(send)
      .catch((err: unknown) => {
        if (err instanceof PayloadError) {
          send({ status: 400, body: { ok: false, error: err.message } });
          return;
        }
        logger.error({ err, url: req.url }, 'request failed');
        send({ status: 500, body: { ok: false, error: 'internal error' } });
      });
  });
}
