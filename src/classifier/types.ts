import type { Post, Signal } from '../types';

/** Pure and synchronous: same post in, same signal out, no I/O. */
export interface SignalClassifier {
  readonly id: string;
  classify(post: Post): Signal;
}

export interface KeywordLists {
  buy: string[];
  sell: string[];
  close: string[];
}
