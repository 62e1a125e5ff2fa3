import type Decimal from 'decimal.js';
import { z } from 'zod';
import { VenueRejectedError } from '../errors';
import type { PerpAction, PositionSide } from '../types';
import { classifyVenueError, createVenueClient, toDecimal, toOptionalDecimal } from './http';
import type { VenueHttpOptions } from './http';
import type { PerpStatus, PerpVenue, ProtectiveOrder, SubmitReceipt } from './types';

const receiptSchema = z.object({ orderId: z.union([z.string().min(1), z.number()]) });

const statusSchema = z.object({
  status: z.string(),
  position: z
    .object({
      side: z.string(),
      size: z.union([z.string(), z.number()]),
      entryPrice: z.union([z.string(), z.number()]).nullable().optional(),
    })
    .optional(),
  reason: z.string().optional(),
});

export interface PerpVenueOptions extends VenueHttpOptions {
  leverage: number;
}

function toSide(raw: string): PositionSide {
  const s = raw.toUpperCase();
  if (s === 'LONG' || s === 'BUY') return 'LONG';
  if (s === 'SHORT' || s === 'SELL') return 'SHORT';
  return 'FLAT';
}

export function mapPerpStatus(raw: unknown): PerpStatus {
  const parsed = statusSchema.parse(raw);
  const status = parsed.status.toLowerCase();
  if (status === 'filled' || status === 'confirmed') {
    if (!parsed.position) throw new Error('confirmed perp order has no resulting position');
    return {
      status: 'CONFIRMED',
      resultingSide: toSide(parsed.position.side),
      resultingSize: toDecimal(parsed.position.size, 'position.size'),
      avgPrice: toOptionalDecimal(parsed.position.entryPrice, 'position.entryPrice'),
    };
  }
  const idle = { resultingSide: 'FLAT' as const, resultingSize: toDecimal(0, 'position.size'), avgPrice: null };
  if (status === 'rejected' || status === 'canceled' || status === 'cancelled') {
    return { status: 'REJECTED', ...idle, reason: parsed.reason ?? status };
  }
  return { status: 'PENDING', ...idle };
}

/** HTTP perpetual exchange adapter; leverage is account-level and sent with every change. */
export function createHttpPerpVenue(opts: PerpVenueOptions): PerpVenue {
  const client = createVenueClient(opts);

  const placeOrder = async (body: Record<string, unknown>, idempotencyToken: string): Promise<SubmitReceipt> => {
    try {
      const res = await client.post('/v1/orders', body, { headers: { 'Idempotency-Key': idempotencyToken } });
      const parsed = receiptSchema.safeParse(res.data);
      if (!parsed.success) throw new VenueRejectedError('order response carried no order id');
      return { venueOrderId: String(parsed.data.orderId) };
    } catch (err) {
      if (err instanceof VenueRejectedError) throw err;
      throw classifyVenueError(err);
    }
  };

  return {
    name: 'perp-http',
    async submitPositionChange(asset: string, action: PerpAction, size: Decimal, idempotencyToken: string): Promise<SubmitReceipt> {
      const body = {
        market: `${asset}-PERP`,
        action: action.toLowerCase(),
        size: size.toString(),
        leverage: opts.leverage,
        reduceOnly: action === 'CLOSE',
        clientOrderId: idempotencyToken,
      };
      return placeOrder(body, idempotencyToken);
    },
    async submitProtectiveOrder(order: ProtectiveOrder): Promise<SubmitReceipt> {
      const body = {
        market: `${order.asset}-PERP`,
        type: order.kind === 'TAKE_PROFIT' ? 'take_profit_market' : 'stop_market',
        side: order.positionSide === 'LONG' ? 'sell' : 'buy',
        size: order.size.toString(),
        triggerPrice: order.triggerPrice.toString(),
        reduceOnly: true,
        clientOrderId: order.idempotencyToken,
      };
      return placeOrder(body, order.idempotencyToken);
    },
    async pollStatus(venueOrderId: string): Promise<PerpStatus> {
      try {
        const res = await client.get(`/v1/orders/${encodeURIComponent(venueOrderId)}`);
        return mapPerpStatus(res.data);
      } catch (err) {
        throw classifyVenueError(err);
      }
    },
  };
}
