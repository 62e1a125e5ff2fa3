import Decimal from 'decimal.js';
import type { Logger } from '../logger';
import type { PerpAction, PositionSide, SwapDirection } from '../types';
import type { PerpStatus, PerpVenue, ProtectiveOrder, SpotStatus, SpotVenue, SubmitReceipt } from './types';

export interface SimulatorOptions {
  logger: Logger;
  priceOf?: (asset: string) => Decimal;
}

const unitPrice = (): Decimal => new Decimal(1);

/** DRY_RUN spot venue: fills every swap at once, no external side effects. */
export function createSimulatedSpotVenue(opts: SimulatorOptions): SpotVenue {
  const priceOf = opts.priceOf ?? unitPrice;
  const orders = new Map<string, SpotStatus>();
  return {
    name: 'spot-simulator',
    async submitSwap(asset: string, direction: SwapDirection, size: Decimal, idempotencyToken: string): Promise<SubmitReceipt> {
      const venueOrderId = `sim-${idempotencyToken}`;
      if (!orders.has(venueOrderId)) {
        const price = priceOf(asset);
        const filledSize = direction === 'QUOTE_TO_ASSET' ? size.dividedBy(price) : size;
        orders.set(venueOrderId, { status: 'FILLED', filledSize, avgPrice: price });
        opts.logger.info({ asset, direction, size: size.toString(), venueOrderId }, '[SIMULATOR] swap');
      }
      return { venueOrderId };
    },
    async pollStatus(venueOrderId: string): Promise<SpotStatus> {
      return orders.get(venueOrderId) ?? { status: 'REJECTED', filledSize: new Decimal(0), avgPrice: null, reason: 'unknown order' };
    },
  };
}

/** DRY_RUN perp venue: opens land at the requested size, closes go flat. */
export function createSimulatedPerpVenue(opts: SimulatorOptions): PerpVenue {
  const priceOf = opts.priceOf ?? unitPrice;
  const orders = new Map<string, PerpStatus>();
  return {
    name: 'perp-simulator',
    async submitPositionChange(asset: string, action: PerpAction, size: Decimal, idempotencyToken: string): Promise<SubmitReceipt> {
      const venueOrderId = `sim-${idempotencyToken}`;
      if (!orders.has(venueOrderId)) {
        const result: { side: PositionSide; size: Decimal } =
          action === 'CLOSE'
            ? { side: 'FLAT', size: new Decimal(0) }
            : { side: action === 'OPEN_LONG' ? 'LONG' : 'SHORT', size };
        orders.set(venueOrderId, {
          status: 'CONFIRMED',
          resultingSide: result.side,
          resultingSize: result.size,
          avgPrice: result.side === 'FLAT' ? null : priceOf(asset),
        });
        opts.logger.info({ asset, action, size: size.toString(), venueOrderId }, '[SIMULATOR] position change');
      }
      return { venueOrderId };
    },
    async pollStatus(venueOrderId: string): Promise<PerpStatus> {
      return (
        orders.get(venueOrderId) ?? {
          status: 'REJECTED',
          resultingSide: 'FLAT',
          resultingSize: new Decimal(0),
          avgPrice: null,
          reason: 'unknown order',
        }
      );
    },
    async submitProtectiveOrder(order: ProtectiveOrder): Promise<SubmitReceipt> {
      const venueOrderId = `sim-${order.idempotencyToken}`;
      opts.logger.info(
        {
          asset: order.asset,
          kind: order.kind,
          size: order.size.toString(),
          triggerPrice: order.triggerPrice.toString(),
          venueOrderId,
        },
        '[SIMULATOR] protective order',
      );
      return { venueOrderId };
    },
  };
}
