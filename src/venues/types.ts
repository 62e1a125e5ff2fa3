import type Decimal from 'decimal.js';
import type { PerpAction, PositionSide, ProtectiveKind, SwapDirection } from '../types';

export interface SubmitReceipt {
  venueOrderId: string;
}

export interface SpotStatus {
  status: 'PENDING' | 'FILLED' | 'REJECTED';
  filledSize: Decimal;
  avgPrice: Decimal | null;
  reason?: string;
}

export interface PerpStatus {
  status: 'PENDING' | 'CONFIRMED' | 'REJECTED';
  resultingSide: PositionSide;
  resultingSize: Decimal;
  avgPrice: Decimal | null;
  reason?: string;
}

/**
 * Swap aggregator. `size` is the amount of the source asset: quote for
 * QUOTE_TO_ASSET, target asset for ASSET_TO_QUOTE. `filledSize` is always in the
 * target asset and `avgPrice` in quote per target.
 *
 * Implementations throw `VenueRejectedError` for permanent rejections; any other
 * error is treated as transient.
 */
export interface SpotVenue {
  readonly name: string;
  submitSwap(asset: string, direction: SwapDirection, size: Decimal, idempotencyToken: string): Promise<SubmitReceipt>;
  pollStatus(venueOrderId: string): Promise<SpotStatus>;
}

/** Reduce-only trigger order that closes `size` of a `positionSide` position at `triggerPrice`. */
export interface ProtectiveOrder {
  asset: string;
  kind: ProtectiveKind;
  positionSide: 'LONG' | 'SHORT';
  size: Decimal;
  triggerPrice: Decimal;
  idempotencyToken: string;
}

export interface PerpVenue {
  readonly name: string;
  submitPositionChange(asset: string, action: PerpAction, size: Decimal, idempotencyToken: string): Promise<SubmitReceipt>;
  pollStatus(venueOrderId: string): Promise<PerpStatus>;
  submitProtectiveOrder(order: ProtectiveOrder): Promise<SubmitReceipt>;
}
