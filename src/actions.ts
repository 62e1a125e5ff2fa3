import type Decimal from 'decimal.js';
import type { BracketPolicy, SizingPolicy } from './config';
import { NoPositionToActError, PositionInvariantError, VenueRejectedError } from './errors';
import type { PerpStatus, SpotStatus } from './venues/types';
import type {
  PerpAction,
  Position,
  PositionDelta,
  ProtectiveKind,
  SwapDirection,
  VenueAction,
  VenueKind,
  Verdict,
} from './types';

export interface PlannedAction {
  action: VenueAction;
  size: Decimal;
}

/**
 * Maps (verdict, venue, current position) onto one venue call. Throws
 * NoPositionToActError when the position admits no transition for the verdict.
 */
export function resolveAction(verdict: Verdict, venueKind: VenueKind, position: Position, sizing: SizingPolicy): PlannedAction {
  const label = `${verdict} ${position.asset} on ${venueKind} with ${position.side} position`;
  if (venueKind === 'SPOT') {
    if (verdict === 'BUY' && position.side === 'FLAT') {
      return { action: 'SWAP_QUOTE_TO_ASSET', size: sizing.spotBuyQuoteAmount };
    }
    if ((verdict === 'SELL' || verdict === 'CLOSE') && position.side === 'LONG') {
      const size = position.size.times(sizing.spotSellFraction);
      if (size.isPositive()) return { action: 'SWAP_ASSET_TO_QUOTE', size };
    }
    throw new NoPositionToActError(`no valid transition for ${label}`);
  }

  if (verdict === 'BUY' && position.side !== 'LONG') {
    return { action: 'OPEN_LONG', size: sizing.perpOrderSize };
  }
  if (verdict === 'SELL' && position.side !== 'SHORT') {
    return { action: 'OPEN_SHORT', size: sizing.perpOrderSize };
  }
  if (verdict === 'CLOSE' && position.side !== 'FLAT') {
    return { action: 'CLOSE', size: position.size };
  }
  throw new NoPositionToActError(`no valid transition for ${label}`);
}

export function swapDirectionOf(action: VenueAction): SwapDirection {
  if (action === 'SWAP_QUOTE_TO_ASSET') return 'QUOTE_TO_ASSET';
  if (action === 'SWAP_ASSET_TO_QUOTE') return 'ASSET_TO_QUOTE';
  throw new Error(`${action} is not a swap`);
}

export function perpActionOf(action: VenueAction): PerpAction {
  if (action === 'OPEN_LONG' || action === 'OPEN_SHORT' || action === 'CLOSE') return action;
  throw new Error(`${action} is not a perp position change`);
}

export function spotFillDelta(action: VenueAction, status: SpotStatus): PositionDelta {
  if (!status.filledSize.isPositive()) {
    throw new VenueRejectedError('venue reported an empty fill');
  }
  if (swapDirectionOf(action) === 'QUOTE_TO_ASSET') {
    if (!status.avgPrice || !status.avgPrice.isPositive()) {
      throw new PositionInvariantError('buy fill reported without a price');
    }
    return { kind: 'increase', size: status.filledSize, price: status.avgPrice };
  }
  return { kind: 'decrease', size: status.filledSize };
}

export function perpResultDelta(status: PerpStatus): PositionDelta {
  return {
    kind: 'set',
    side: status.resultingSide,
    size: status.resultingSize,
    avgEntryPrice: status.resultingSide === 'FLAT' ? null : status.avgPrice,
  };
}

export interface BracketLeg {
  kind: ProtectiveKind;
  triggerPrice: Decimal;
}

/**
 * Trigger prices for the protective orders around a fresh perp position. A long
 * takes profit above entry and stops out below; a short mirrors that.
 */
export function bracketLegs(side: 'LONG' | 'SHORT', entry: Decimal, policy: BracketPolicy): BracketLeg[] {
  const up = (pct: Decimal): Decimal => entry.times(pct.plus(1));
  const down = (pct: Decimal): Decimal => entry.times(pct.negated().plus(1));
  const legs: BracketLeg[] = [];
  if (policy.takeProfitPct.isPositive()) {
    legs.push({ kind: 'TAKE_PROFIT', triggerPrice: side === 'LONG' ? up(policy.takeProfitPct) : down(policy.takeProfitPct) });
  }
  if (policy.stopLossPct.isPositive()) {
    legs.push({ kind: 'STOP_LOSS', triggerPrice: side === 'LONG' ? down(policy.stopLossPct) : up(policy.stopLossPct) });
  }
  return legs;
}
