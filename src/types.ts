/**
 * Shared types for the DaisyUI docs MCP server
 */

export type DuplicatePolicy = 'last-wins' | 'first-wins';

export interface CorpusOptions {
  /** Line prefix that opens a new entry. */
  headingMarker: string;
  duplicatePolicy: DuplicatePolicy;
  /** Shortest token kept in the term index, in characters. */
  minTokenLength: number;
}

export interface RankingOptions {
  keyMatchWeight: number;
  bodyMatchWeight: number;
  termMatchWeight: number;
  maxResults: number;
}

export interface ServerConfig {
  corpus: CorpusOptions & {
    /** Overrides the bundled corpus file. */
    path?: string;
  };
  ranking: RankingOptions;
}

export interface Entry {
  readonly key: string;
  readonly body: string;
}

export interface QueryResult {
  key: string;
  body: string;
  score: number;
}
