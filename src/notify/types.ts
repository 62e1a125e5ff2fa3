import type { OutcomeError, OutcomeStatus, Position, VenueKind, Verdict } from '../types';

export interface ExecutionEvent {
  postId: string;
  author: string | null;
  confidence: number | null;
  asset: string | null;
  verdict: Verdict;
  venueKind: VenueKind | null;
  finalStatus: OutcomeStatus;
  position: Position | null;
  error: OutcomeError | null;
}

export interface Notifier {
  readonly name: string;
  notify(event: ExecutionEvent): Promise<void>;
}
