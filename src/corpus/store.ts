import type { Entry } from '../types.js';
import { indexTokens } from './tokenize.js';

/**
 * Immutable result of parsing a corpus: entries by normalised name plus a
 * token → entry-keys index. Index lists may repeat a key once per occurrence
 * of the token; callers only test membership.
 */
export interface DocumentStore {
  readonly entries: ReadonlyMap<string, Entry>;
  readonly index: ReadonlyMap<string, readonly string[]>;
  /** Keys that appeared under more than one heading. */
  readonly duplicates: readonly string[];
}

export function normalizeKey(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Builds the store from final entries. The index is derived here from the
 * surviving bodies so it can never point at text that was overwritten.
 */
export function buildDocumentStore(
  entries: Iterable<Entry>,
  minTokenLength: number,
  duplicates: readonly string[] = []
): DocumentStore {
  const entryMap = new Map<string, Entry>();
  const index = new Map<string, string[]>();

  for (const entry of entries) {
    entryMap.set(entry.key, Object.freeze({ key: entry.key, body: entry.body }));
    for (const token of indexTokens(entry.body, minTokenLength)) {
      let keys = index.get(token);
      if (!keys) {
        keys = [];
        index.set(token, keys);
      }
      keys.push(entry.key);
    }
  }

  for (const keys of index.values()) Object.freeze(keys);

  return Object.freeze({
    entries: entryMap,
    index,
    duplicates: Object.freeze([...duplicates]),
  });
}
