import defaultKeywords from './keywords.json';
import defaultTickers from './tickers.json';
import type { Signal, Verdict } from '../types';
import type { KeywordLists, SignalClassifier } from './types';

export interface KeywordClassifierOptions {
  /** Tracked assets; preferred over other known tickers in the same post. */
  assets: string[];
  tickers?: string[];
  keywords?: KeywordLists;
}

const TOKEN_RE = /(?:^|[^A-Za-z0-9])([$#]?)([A-Za-z0-9]+)\b/g;

interface Token {
  tagged: boolean;
  raw: string;
}

export function tokenize(text: string): Token[] {
  const out: Token[] = [];
  for (const m of text.matchAll(TOKEN_RE)) {
    out.push({ tagged: m[1] !== '', raw: m[2] });
  }
  return out;
}

/**
 * Cashtags and hashtags match any known ticker; bare words only when written
 * in capitals and at least two characters long ("ETH", not "eth" or "S").
 */
export function extractTickers(text: string, universe: ReadonlySet<string>): string[] {
  const found: string[] = [];
  for (const t of tokenize(text)) {
    const upper = t.raw.toUpperCase();
    if (!universe.has(upper) || found.includes(upper)) continue;
    if (t.tagged || (t.raw === upper && upper.length >= 2)) found.push(upper);
  }
  return found;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function countHits(text: string, phrases: string[]): number {
  let hits = 0;
  for (const phrase of phrases) {
    const re = new RegExp(`(?:^|[^a-z0-9])${escapeRegExp(phrase.toLowerCase())}(?=$|[^a-z0-9])`, 'g');
    hits += Array.from(text.matchAll(re)).length;
  }
  return hits;
}

export function scoreVerdict(text: string, keywords: KeywordLists): { verdict: Verdict; hits: number } {
  const lower = text.toLowerCase();
  const close = countHits(lower, keywords.close);
  if (close > 0) return { verdict: 'CLOSE', hits: close };
  const buy = countHits(lower, keywords.buy);
  const sell = countHits(lower, keywords.sell);
  if (buy > sell) return { verdict: 'BUY', hits: buy };
  if (sell > buy) return { verdict: 'SELL', hits: sell };
  return { verdict: 'NONE', hits: 0 };
}

export function createKeywordClassifier(opts: KeywordClassifierOptions): SignalClassifier {
  const tracked = new Set(opts.assets.map((a) => a.toUpperCase()));
  const universe = new Set([...(opts.tickers ?? defaultTickers).map((t) => t.toUpperCase()), ...tracked]);
  const keywords = opts.keywords ?? defaultKeywords;

  return {
    id: 'keyword',
    classify(post): Signal {
      const tickers = extractTickers(post.text, universe);
      const asset = tickers.find((t) => tracked.has(t)) ?? tickers[0] ?? null;
      const { verdict, hits } = scoreVerdict(post.text, keywords);
      if (!asset || verdict === 'NONE') {
        return { postId: post.id, verdict: 'NONE', asset: null, confidence: 0 };
      }
      return { postId: post.id, verdict, asset, confidence: hits / (hits + 1) };
    },
  };
}
