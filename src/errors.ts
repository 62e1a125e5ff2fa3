import type { OutcomeError } from './types';

export type ExecutionErrorCode =
  | 'InvalidSignal'
  | 'NoPositionToAct'
  | 'VenueRejected'
  | 'VenueTimeout'
  | 'LedgerConflict'
  | 'TerminalRecord'
  | 'PositionInvariant';

export class ExecutionError extends Error {
  readonly code: ExecutionErrorCode;

  constructor(code: ExecutionErrorCode, message: string) {
    super(message);
    this.name = code;
    this.code = code;
  }

  toOutcomeError(): OutcomeError {
    return { code: this.code, message: this.message };
  }
}

export class InvalidSignalError extends ExecutionError {
  constructor(message: string) {
    super('InvalidSignal', message);
  }
}

export class NoPositionToActError extends ExecutionError {
  constructor(message: string) {
    super('NoPositionToAct', message);
  }
}

export class VenueRejectedError extends ExecutionError {
  readonly reason: string;

  constructor(reason: string) {
    super('VenueRejected', reason);
    this.reason = reason;
  }
}

export class VenueTimeoutError extends ExecutionError {
  constructor(message: string) {
    super('VenueTimeout', message);
  }
}

export class LedgerConflictError extends ExecutionError {
  constructor(asset: string, venueKind: string, expected: number, actual: number) {
    super('LedgerConflict', `position ${asset}/${venueKind} is at version ${actual}, expected ${expected}`);
  }
}

export class TerminalRecordError extends ExecutionError {
  constructor(postId: string, status: string, next: string) {
    super('TerminalRecord', `record ${postId} cannot move from ${status} to ${next}`);
  }
}

export class PositionInvariantError extends ExecutionError {
  constructor(message: string) {
    super('PositionInvariant', message);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Parses a stored `lastError` ("Code: message") back into an outcome error. */
export function parseStoredError(lastError: string | null): OutcomeError | null {
  if (!lastError) return null;
  const idx = lastError.indexOf(': ');
  if (idx <= 0) return { code: 'Error', message: lastError };
  return { code: lastError.slice(0, idx), message: lastError.slice(idx + 2) };
}

export function formatStoredError(err: unknown): string {
  if (err instanceof ExecutionError) return `${err.code}: ${err.message}`;
  return `Error: ${describeError(err)}`;
}
