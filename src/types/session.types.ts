export type SessionState = 'uninitialized' | 'ready' | 'querying' | 'destroyed';

/** Events delivered to the consumer, in lifecycle order. */
export type SessionEvent =
  | { type: 'begin' }
  | { type: 'flush' }
  | { type: 'append'; candidates: string[] }
  | { type: 'refresh'; terms: string[] }
  | { type: 'destroyed' };

export type SessionEventListener = (event: SessionEvent) => void;

/** Maps raw input text to independent search terms. */
export type PatternTransform = (text: string) => string[];

/** A run of candidate text, flagged when it matched one of the terms. */
export interface HighlightSegment {
  text: string;
  match: boolean;
}

export type HighlightFunction = (candidate: string, terms: string[]) => HighlightSegment[];
