/**
 * Configuration loading for the DaisyUI docs MCP server
 *
 * Priority:
 * 1. Environment variables
 * 2. Config file (~/.config/daisyui-docs-mcp/config.json, or DAISYUI_DOCS_MCP_CONFIG)
 * 3. Default values
 */

import { readFile } from 'fs/promises';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import type { ServerConfig } from './types.js';
import { DEFAULT_CORPUS_OPTIONS } from './corpus/parser.js';
import { DEFAULT_RANKING } from './query/engine.js';
import { DocsError, DocsErrorCode, errorMessage, isNotFoundError } from './shared/errors.js';

export const CONFIG_FILE_PATH = join(homedir(), '.config', 'daisyui-docs-mcp', 'config.json');

export const DEFAULT_CONFIG: ServerConfig = {
  corpus: { ...DEFAULT_CORPUS_OPTIONS },
  ranking: { ...DEFAULT_RANKING },
};

const weight = z.number().int().nonnegative();

const ConfigFileSchema = z
  .object({
    corpus: z
      .object({
        path: z.string().min(1),
        headingMarker: z.string().min(1),
        duplicatePolicy: z.enum(['last-wins', 'first-wins']),
        minTokenLength: z.number().int().positive(),
      })
      .partial(),
    ranking: z
      .object({
        keyMatchWeight: weight,
        bodyMatchWeight: weight,
        termMatchWeight: weight,
        maxResults: z.number().int().positive(),
      })
      .partial(),
  })
  .partial()
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration from file. A missing file means defaults; a file that
 * exists but is not valid JSON or does not match the schema is an error.
 */
async function loadConfigFile(configPath: string): Promise<ConfigFile> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (isNotFoundError(err)) return {};
    throw new DocsError(DocsErrorCode.CONFIG_INVALID, `Cannot read config file ${configPath}`, {
      cause: errorMessage(err),
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new DocsError(DocsErrorCode.CONFIG_INVALID, `Config file ${configPath} is not valid JSON`, {
      cause: errorMessage(err),
    });
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DocsError(DocsErrorCode.CONFIG_INVALID, `Config file ${configPath} is invalid`, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

/**
 * Load configuration from environment variables
 */
function loadEnvConfig(env: NodeJS.ProcessEnv): ConfigFile {
  const corpus: NonNullable<ConfigFile['corpus']> = {};
  const ranking: NonNullable<ConfigFile['ranking']> = {};

  if (env['DAISYUI_DOCS_MCP_CORPUS']) {
    corpus.path = env['DAISYUI_DOCS_MCP_CORPUS'];
  }

  const policy = env['DAISYUI_DOCS_MCP_DUPLICATE_POLICY'];
  if (policy) {
    if (policy !== 'last-wins' && policy !== 'first-wins') {
      throw new DocsError(
        DocsErrorCode.CONFIG_INVALID,
        `DAISYUI_DOCS_MCP_DUPLICATE_POLICY must be last-wins or first-wins, got "${policy}"`
      );
    }
    corpus.duplicatePolicy = policy;
  }

  const maxResults = env['DAISYUI_DOCS_MCP_MAX_RESULTS'];
  if (maxResults) {
    const n = Number(maxResults);
    if (!Number.isInteger(n) || n <= 0) {
      throw new DocsError(
        DocsErrorCode.CONFIG_INVALID,
        `DAISYUI_DOCS_MCP_MAX_RESULTS must be a positive integer, got "${maxResults}"`
      );
    }
    ranking.maxResults = n;
  }

  return { corpus, ranking };
}

/**
 * Load full configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ServerConfig> {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env['DAISYUI_DOCS_MCP_CONFIG'] ?? CONFIG_FILE_PATH;

  const fileConfig = await loadConfigFile(configPath);
  const envConfig = loadEnvConfig(env);

  return {
    corpus: { ...DEFAULT_CONFIG.corpus, ...fileConfig.corpus, ...envConfig.corpus },
    ranking: { ...DEFAULT_CONFIG.ranking, ...fileConfig.ranking, ...envConfig.ranking },
  };
}
