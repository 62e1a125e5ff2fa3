import type Decimal from 'decimal.js';

export type Verdict = 'BUY' | 'SELL' | 'CLOSE' | 'NONE';
export type VenueKind = 'SPOT' | 'PERP';
export type PositionSide = 'LONG' | 'SHORT' | 'FLAT';

export interface Post {
  id: string;
  author: string;
  text: string;
  observedAt: Date;
}

export interface Signal {
  postId: string;
  verdict: Verdict;
  asset: string | null;
  confidence?: number;
}

export interface Position {
  asset: string;
  venueKind: VenueKind;
  side: PositionSide;
  size: Decimal;
  avgEntryPrice: Decimal | null;
  updatedAt: Date;
  version: number; // 0 = never written
}

export type PositionDelta =
  | { kind: 'increase'; size: Decimal; price: Decimal }
  | { kind: 'decrease'; size: Decimal }
  | { kind: 'set'; side: PositionSide; size: Decimal; avgEntryPrice: Decimal | null };

export type SwapDirection = 'QUOTE_TO_ASSET' | 'ASSET_TO_QUOTE';
export type PerpAction = 'OPEN_LONG' | 'OPEN_SHORT' | 'CLOSE';
export type VenueAction = 'SWAP_QUOTE_TO_ASSET' | 'SWAP_ASSET_TO_QUOTE' | PerpAction;

export type ExecutionStatus = 'PENDING' | 'SUBMITTED' | 'CONFIRMED' | 'FAILED' | 'EXPIRED';

export const TERMINAL_STATUSES: readonly ExecutionStatus[] = ['CONFIRMED', 'FAILED', 'EXPIRED'];

export function isTerminal(status: ExecutionStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export interface ExecutionRecord {
  postId: string;
  requestedAt: Date;
  asset: string;
  verdict: Verdict;
  author: string | null;
  confidence: number | null;
  venueKind: VenueKind;
  action: VenueAction | null;
  size: Decimal | null;
  idempotencyToken: string;
  status: ExecutionStatus;
  venueOrderId: string | null;
  attempts: number;
  lastError: string | null;
  updatedAt: Date;
}

export type ProtectiveKind = 'TAKE_PROFIT' | 'STOP_LOSS';

/** Reduce-only take-profit or stop-loss order placed after a perp open. */
export interface BracketOrder {
  postId: string;
  kind: ProtectiveKind;
  triggerPrice: Decimal;
  size: Decimal;
  idempotencyToken: string;
  venueOrderId: string | null;
  error: string | null;
  createdAt: Date;
}

export interface OutcomeError {
  code: string;
  message: string;
}

export type OutcomeStatus = 'SKIPPED' | 'INVALID' | ExecutionStatus;

export interface ExecutionOutcome {
  postId: string;
  asset: string | null;
  verdict: Verdict;
  venueKind: VenueKind | null;
  status: OutcomeStatus;
  position: Position | null;
  error: OutcomeError | null;
  record: ExecutionRecord | null;
}
