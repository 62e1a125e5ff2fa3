import type Decimal from 'decimal.js';
import { z } from 'zod';
import { VenueRejectedError } from '../errors';
import type { SwapDirection } from '../types';
import { classifyVenueError, createVenueClient, toDecimal, toOptionalDecimal } from './http';
import type { VenueHttpOptions } from './http';
import type { SpotStatus, SpotVenue, SubmitReceipt } from './types';

const receiptSchema = z.object({ orderId: z.union([z.string().min(1), z.number()]) });

const statusSchema = z.object({
  status: z.string(),
  filledAmount: z.union([z.string(), z.number()]).optional(),
  avgPrice: z.union([z.string(), z.number()]).nullable().optional(),
  reason: z.string().optional(),
});

export interface SpotVenueOptions extends VenueHttpOptions {
  quoteAsset: string;
}

export function mapSpotStatus(raw: unknown): SpotStatus {
  const parsed = statusSchema.parse(raw);
  const status = parsed.status.toLowerCase();
  if (status === 'filled' || status === 'success' || status === 'settled') {
    return {
      status: 'FILLED',
      filledSize: toDecimal(parsed.filledAmount, 'filledAmount'),
      avgPrice: toOptionalDecimal(parsed.avgPrice, 'avgPrice'),
    };
  }
  if (status === 'rejected' || status === 'failed' || status === 'cancelled') {
    return { status: 'REJECTED', filledSize: toDecimal(0, 'filledAmount'), avgPrice: null, reason: parsed.reason ?? status };
  }
  return { status: 'PENDING', filledSize: toDecimal(0, 'filledAmount'), avgPrice: null };
}

/** HTTP swap aggregator adapter. The idempotency token travels as `clientOrderId`. */
export function createHttpSpotVenue(opts: SpotVenueOptions): SpotVenue {
  const client = createVenueClient(opts);
  return {
    name: 'spot-http',
    async submitSwap(asset: string, direction: SwapDirection, size: Decimal, idempotencyToken: string): Promise<SubmitReceipt> {
      const body = {
        sellToken: direction === 'QUOTE_TO_ASSET' ? opts.quoteAsset : asset,
        buyToken: direction === 'QUOTE_TO_ASSET' ? asset : opts.quoteAsset,
        sellAmount: size.toString(),
        clientOrderId: idempotencyToken,
      };
      try {
        const res = await client.post('/v1/swaps', body, { headers: { 'Idempotency-Key': idempotencyToken } });
        const parsed = receiptSchema.safeParse(res.data);
        if (!parsed.success) throw new VenueRejectedError('swap response carried no order id');
        return { venueOrderId: String(parsed.data.orderId) };
      } catch (err) {
        if (err instanceof VenueRejectedError) throw err;
        throw classifyVenueError(err);
      }
    },
    async pollStatus(venueOrderId: string): Promise<SpotStatus> {
      try {
        const res = await client.get(`/v1/swaps/${encodeURIComponent(venueOrderId)}`);
        return mapSpotStatus(res.data);
      } catch (err) {
        throw classifyVenueError(err);
      }
    },
  };
}
