import type { HighlightSegment } from '../types/session.types.js';
import { compileTerms } from '../worker/candidateFilter.js';

type Range = [start: number, end: number];

function matchRanges(candidate: string, terms: readonly string[]): Range[] {
  const ranges: Range[] = [];
  for (const matcher of compileTerms(terms)) {
    const global = new RegExp(matcher.source, `${matcher.flags}g`);
    let match: RegExpExecArray | null;
    while ((match = global.exec(candidate)) !== null) {
      if (match[0] === '') {
        global.lastIndex += 1;
        continue;
      }
      ranges.push([match.index, match.index + match[0].length]);
    }
  }
  ranges.sort((a, b) => a[0] - b[0]);

  const merged: Range[] = [];
  for (const range of ranges) {
    const last = merged[merged.length - 1];
    if (last && range[0] <= last[1]) {
      last[1] = Math.max(last[1], range[1]);
    } else {
      merged.push([range[0], range[1]]);
    }
  }
  return merged;
}

/** Split a candidate into matched and unmatched segments for display. */
export function highlightMatches(candidate: string, terms: string[]): HighlightSegment[] {
  const segments: HighlightSegment[] = [];
  let cursor = 0;
  for (const [start, end] of matchRanges(candidate, terms)) {
    if (start > cursor) segments.push({ text: candidate.slice(cursor, start), match: false });
    segments.push({ text: candidate.slice(start, end), match: true });
    cursor = end;
  }
  if (cursor < candidate.length || segments.length === 0) {
    segments.push({ text: candidate.slice(cursor), match: false });
  }
  return segments;
}
