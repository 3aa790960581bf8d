/**
 * Query classification and partial-match construction.
 *
 * Classification depends on the query text alone, never on the entity.
 */

export type QueryKind = 'structured' | 'free-text';

/** Backend partial-match (substring) operator. */
export const PARTIAL_MATCH_OPERATOR = '~=';

const STRUCTURED_PATTERNS: readonly RegExp[] = [
  // field op value: status=Active, amount>1000, name~='x', a!=b
  /\b\w+\s*(?:~=|!=|<=|>=|=|<|>)/,
  // boolean / set keywords in any case: "smith and jones" is structured
  /\b(?:AND|OR|NOT|LIKE|IN|BETWEEN)\b/i,
  /\bIS\s+(?:NOT\s+)?NULL\b/i,
];

export function classifyQuery(query: string): QueryKind {
  return STRUCTURED_PATTERNS.some((re) => re.test(query)) ? 'structured' : 'free-text';
}

/** Escape a literal for use inside a quoted query value. */
export function sanitizeQueryValue(value: string): string {
  return value.replace(/'/g, "''").replace(/--/g, '').replace(/;/g, '');
}

/** `field~='text'` for a single field. */
export function partialMatchQuery(field: string, text: string): string {
  return `${field}${PARTIAL_MATCH_OPERATOR}'${sanitizeQueryValue(text)}'`;
}
