import type { Entry, QueryResult, RankingOptions } from '../types.js';
import type { DocumentStore } from '../corpus/store.js';
import { normalizeKey } from '../corpus/store.js';
import { splitTerms } from '../corpus/tokenize.js';
import { DocsError, DocsErrorCode } from '../shared/errors.js';

export const DEFAULT_RANKING: RankingOptions = {
  keyMatchWeight: 100,
  bodyMatchWeight: 10,
  termMatchWeight: 5,
  maxResults: 20,
};

/** Read-only queries over a DocumentStore. */
export class QueryEngine {
  private readonly ranking: RankingOptions;
  private readonly lowerBodies = new Map<string, string>();

  constructor(private readonly store: DocumentStore, ranking: Partial<RankingOptions> = {}) {
    this.ranking = { ...DEFAULT_RANKING, ...ranking };
    for (const entry of store.entries.values()) {
      this.lowerBodies.set(entry.key, entry.body.toLowerCase());
    }
  }

  listComponents(): string[] {
    return Array.from(this.store.entries.keys()).sort(compareKeys);
  }

  /**
   * Exact, case-insensitive lookup. Returns undefined when nothing matches;
   * throws INVALID_PARAMS for a blank name.
   */
  getDoc(name: string): Entry | undefined {
    const key = normalizeKey(name);
    if (!key) {
      throw new DocsError(DocsErrorCode.INVALID_PARAMS, 'Missing required argument: component name');
    }
    return this.store.entries.get(key);
  }

  search(query: string): QueryResult[] {
    if (!query.trim()) return [];

    const needle = query.toLowerCase();
    const terms = Array.from(new Set(splitTerms(needle)));
    const { keyMatchWeight, bodyMatchWeight, termMatchWeight, maxResults } = this.ranking;
    const results: QueryResult[] = [];

    for (const entry of this.store.entries.values()) {
      let score = 0;
      if (entry.key.includes(needle)) score += keyMatchWeight;
      if (this.lowerBodies.get(entry.key)?.includes(needle)) score += bodyMatchWeight;
      for (const term of terms) {
        if (this.store.index.get(term)?.includes(entry.key)) score += termMatchWeight;
      }
      if (score > 0) results.push({ key: entry.key, body: entry.body, score });
    }

    results.sort((a, b) => b.score - a.score || compareKeys(a.key, b.key));
    return results.slice(0, maxResults);
  }
}

// Code-unit order, so results do not depend on the host locale.
function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
