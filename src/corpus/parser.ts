import type { CorpusOptions, Entry } from '../types.js';
import { logger } from '../logger.js';
import { buildDocumentStore, normalizeKey, type DocumentStore } from './store.js';

export const DEFAULT_CORPUS_OPTIONS: CorpusOptions = {
  headingMarker: '### ',
  duplicatePolicy: 'last-wins',
  minTokenLength: 5,
};

interface OpenEntry {
  key: string;
  lines: string[];
}

/**
 * Splits a corpus into entries on heading lines.
 *
 * A heading opens an entry keyed by its trimmed, lowercased remainder; the
 * heading itself is the first body line. Text before the first heading, or
 * under a heading with a blank name, belongs to no entry and is dropped.
 * Repeated keys are resolved by `duplicatePolicy` and reported in
 * `store.duplicates`.
 */
export function parseCorpus(text: string, options: Partial<CorpusOptions> = {}): DocumentStore {
  const opts: CorpusOptions = { ...DEFAULT_CORPUS_OPTIONS, ...options };
  const entries = new Map<string, Entry>();
  const duplicates: string[] = [];
  let current: OpenEntry | null = null;

  const finalize = (open: OpenEntry): void => {
    const body = open.lines.join('\n').trim();
    if (entries.has(open.key)) {
      if (!duplicates.includes(open.key)) duplicates.push(open.key);
      logger.warn({ key: open.key, policy: opts.duplicatePolicy }, 'Duplicate corpus heading');
      if (opts.duplicatePolicy === 'first-wins') return;
    }
    entries.set(open.key, { key: open.key, body });
  };

  for (const rawLine of text.split('\n')) {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;

    if (line.startsWith(opts.headingMarker)) {
      if (current) finalize(current);
      const key = normalizeKey(line.slice(opts.headingMarker.length));
      current = key ? { key, lines: [line] } : null;
    } else if (current) {
      current.lines.push(line);
    }
  }
  if (current) finalize(current);

  return buildDocumentStore(entries.values(), opts.minTokenLength, duplicates);
}
