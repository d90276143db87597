import type { TransformName } from '../types/config.types.js';
import type { PatternTransform } from '../types/session.types.js';

export function splitTerms(text: string): string[] {
  return text.split(/\s+/).filter((term) => term !== '');
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function isValidPattern(term: string): boolean {
  try {
    new RegExp(term);
    return true;
  } catch {
    return false;
  }
}

/** Whitespace-separated regular expressions; terms that do not compile are dropped. */
export const regexTransform: PatternTransform = (text) => splitTerms(text).filter(isValidPattern);

/** Whitespace-separated literal substrings. */
export const substringTransform: PatternTransform = (text) => splitTerms(text).map(escapeRegExp);

/** Each term matches its characters in order with anything in between: `abc` -> `a.*?b.*?c`. */
export const fuzzyTransform: PatternTransform = (text) =>
  splitTerms(text).map((term) => Array.from(term, escapeRegExp).join('.*?'));

export const PATTERN_TRANSFORMS: Record<TransformName, PatternTransform> = {
  regex: regexTransform,
  substring: substringTransform,
  fuzzy: fuzzyTransform,
};
