/**
 * Compile search terms into matchers. Terms use smart case: a term with an
 * upper-case letter matches case-sensitively, otherwise case-insensitively.
 * Terms that do not compile are dropped.
 */
export function compileTerms(terms: readonly string[]): RegExp[] {
  const matchers: RegExp[] = [];
  for (const term of terms) {
    if (term === '') continue;
    try {
      matchers.push(new RegExp(term, /[A-Z]/.test(term) ? '' : 'i'));
    } catch {
      continue;
    }
  }
  return matchers;
}

/** Candidates matched by every term, in source order, at most `limit` of them. */
export function filterCandidates(
  candidates: readonly string[],
  terms: readonly string[],
  limit: number,
): string[] {
  const matchers = compileTerms(terms);
  const results: string[] = [];
  for (const candidate of candidates) {
    if (results.length >= limit) break;
    if (matchers.every((matcher) => matcher.test(candidate))) {
      results.push(candidate);
    }
  }
  return results;
}
