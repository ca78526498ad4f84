import { readFileSync } from 'fs';
import path from 'path';
import type { ServerConfig } from '../types.js';
import { DocsError, DocsErrorCode, errorMessage } from '../shared/errors.js';
import { logger } from '../logger.js';
import { parseCorpus } from './parser.js';
import type { DocumentStore } from './store.js';

export const BUNDLED_CORPUS_PATH = path.join(__dirname, '..', '..', 'data', 'daisyui-docs.md');

export function readCorpus(filePath: string = BUNDLED_CORPUS_PATH): string {
  try {
    return readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new DocsError(DocsErrorCode.CORPUS_UNAVAILABLE, `Cannot read corpus at ${filePath}`, {
      cause: errorMessage(err),
    });
  }
}

/** Reads and parses the corpus once; the returned store is shared read-only for the process lifetime. */
export function loadDocumentStore(config: ServerConfig['corpus']): DocumentStore {
  const filePath = config.path ?? BUNDLED_CORPUS_PATH;
  const store = parseCorpus(readCorpus(filePath), {
    headingMarker: config.headingMarker,
    duplicatePolicy: config.duplicatePolicy,
    minTokenLength: config.minTokenLength,
  });
  logger.info(
    { path: filePath, entries: store.entries.size, tokens: store.index.size, duplicates: store.duplicates.length },
    'Corpus loaded'
  );
  return store;
}
