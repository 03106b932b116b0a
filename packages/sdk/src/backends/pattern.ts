/**
 * Index pattern and query helpers shared by the bundled document store backends
 */

import type { IdsQuery, SortClause, TermQuery } from "../types.js";

const REGEX_SPECIAL = /[.+?^${}()|[\]\\]/g;

/**
 * Compile an index pattern to an anchored RegExp. `*` matches any run of characters;
 * a comma separates alternative patterns.
 */
export function patternToRegExp(pattern: string): RegExp {
  const alternatives = pattern
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => part.replace(REGEX_SPECIAL, "\\$&").replace(/\*/g, ".*"));
  return new RegExp(`^(?:${alternatives.join("|")})$`);
}

/**
 * Index names matching a pattern, in code point order
 */
export function matchIndices(pattern: string, indices: Iterable<string>): string[] {
  const re = patternToRegExp(pattern);
  return [...indices].filter((name) => re.test(name)).sort();
}

export function matchesIds(query: IdsQuery, id: string): boolean {
  return query.ids.includes(id);
}

/**
 * Exact match of a top-level string field in a JSON payload. Payloads that are not JSON
 * objects never match.
 */
export function matchesTerm(query: TermQuery, payload: Uint8Array): boolean {
  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder().decode(payload));
  } catch {
    return false;
  }
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    return false;
  }
  return Object.getOwnPropertyDescriptor(parsed, query.term.field)?.value === query.term.value;
}

/**
 * Order hits by the given sort clauses. Only `_index` is sortable; ties keep their order.
 */
export function sortByIndex<T extends { index: string }>(hits: T[], sort: SortClause[]): T[] {
  const sorted = hits.slice();
  for (const clause of [...sort].reverse()) {
    const dir = clause.order === "desc" ? -1 : 1;
    sorted.sort((a, b) => (a.index === b.index ? 0 : a.index < b.index ? -dir : dir));
  }
  return sorted;
}
