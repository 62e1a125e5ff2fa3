import type { Position } from '../types';
import type { ExecutionEvent } from './types';

export function describePosition(p: Position | null): string {
  if (!p) return '-';
  if (p.side === 'FLAT') return 'FLAT';
  const entry = p.avgEntryPrice ? ` @ ${p.avgEntryPrice.toString()}` : '';
  return `${p.side} ${p.size.toString()}${entry}`;
}

export function formatOutcomeMessage(event: ExecutionEvent): string {
  const lines = [`Signal: ${event.verdict} ${event.asset ?? 'UNKNOWN'}${event.venueKind ? ` (${event.venueKind})` : ''}`];
  if (event.confidence !== null) lines.push(`Confidence: ${Math.round(event.confidence * 100)}%`);
  lines.push(
    `Status: ${event.finalStatus}`,
    `Position: ${describePosition(event.position)}`,
    `Post: ${event.postId}${event.author ? ` by @${event.author}` : ''}`,
  );
  if (event.error) lines.push(`Error: ${event.error.code}: ${event.error.message}`);
  if (event.finalStatus === 'EXPIRED') lines.push('Action needed: reconcile with the venue manually');
  return lines.join('\n');
}
