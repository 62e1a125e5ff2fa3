import axios from 'axios';
import type { AxiosInstance } from 'axios';
import Decimal from 'decimal.js';
import { z } from 'zod';
import { VenueRejectedError, VenueTimeoutError } from '../errors';

export interface VenueHttpOptions {
  baseURL: string;
  apiKey?: string;
  timeoutMs?: number;
}

export function createVenueClient(opts: VenueHttpOptions): AxiosInstance {
  return axios.create({
    baseURL: opts.baseURL,
    headers: opts.apiKey ? { 'X-API-KEY': opts.apiKey } : {},
    timeout: opts.timeoutMs ?? 8000,
  });
}

const TRANSIENT_STATUSES = new Set([408, 425, 429]);

const errorBodySchema = z.object({ reason: z.unknown(), error: z.unknown(), message: z.unknown() }).partial();

function rejectionReason(data: unknown, fallback: string): string {
  const body = errorBodySchema.safeParse(data);
  if (body.success) {
    for (const v of [body.data.reason, body.data.error, body.data.message]) {
      if (typeof v === 'string' && v.trim()) return v;
    }
  }
  return fallback;
}

/**
 * Maps a failed venue request onto the retry taxonomy: 4xx other than
 * 408/425/429 is a permanent rejection, everything else is retried.
 */
export function classifyVenueError(err: unknown): Error {
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    if (status !== undefined && status >= 400 && status < 500 && !TRANSIENT_STATUSES.has(status)) {
      return new VenueRejectedError(rejectionReason(err.response?.data, `HTTP ${status}`));
    }
    if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
      return new VenueTimeoutError(`venue request timed out: ${err.message}`);
    }
    return new Error(status !== undefined ? `venue HTTP ${status}` : `venue request failed: ${err.message}`);
  }
  return err instanceof Error ? err : new Error(String(err));
}

export function toDecimal(value: unknown, field: string): Decimal {
  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new Error(`venue response field ${field} is missing`);
  }
  const d = new Decimal(value);
  if (!d.isFinite()) throw new Error(`venue response field ${field} is not a number`);
  return d;
}

export function toOptionalDecimal(value: unknown, field: string): Decimal | null {
  if (value === null || value === undefined || value === '') return null;
  return toDecimal(value, field);
}
