import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { DEFAULT_CONFIG, loadConfig } from '../../src/config.js';
import { DocsErrorCode } from '../../src/shared/errors.js';

describe('loadConfig', () => {
  let tmpDir: string;
  let configPath: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'docs-config-test-'));
    configPath = path.join(tmpDir, 'config.json');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true });
  });

  it('returns defaults when the config file does not exist', async () => {
    const config = await loadConfig({ configPath, env: {} });
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.ranking).toEqual({ keyMatchWeight: 100, bodyMatchWeight: 10, termMatchWeight: 5, maxResults: 20 });
    expect(config.corpus).toEqual({ headingMarker: '### ', duplicatePolicy: 'last-wins', minTokenLength: 5 });
  });

  it('merges file values over defaults', async () => {
    await fs.writeFile(
      configPath,
      JSON.stringify({ corpus: { path: '/srv/docs.md', minTokenLength: 4 }, ranking: { maxResults: 5 } })
    );
    const config = await loadConfig({ configPath, env: {} });
    expect(config.corpus).toEqual({
      path: '/srv/docs.md',
      headingMarker: '### ',
      duplicatePolicy: 'last-wins',
      minTokenLength: 4,
    });
    expect(config.ranking.maxResults).toBe(5);
    expect(config.ranking.keyMatchWeight).toBe(100);
  });

  it('lets environment variables override the file', async () => {
    await fs.writeFile(configPath, JSON.stringify({ corpus: { path: '/from/file.md' }, ranking: { maxResults: 5 } }));
    const config = await loadConfig({
      configPath,
      env: {
        DAISYUI_DOCS_MCP_CORPUS: '/from/env.md',
        DAISYUI_DOCS_MCP_DUPLICATE_POLICY: 'first-wins',
        DAISYUI_DOCS_MCP_MAX_RESULTS: '7',
      },
    });
    expect(config.corpus.path).toBe('/from/env.md');
    expect(config.corpus.duplicatePolicy).toBe('first-wins');
    expect(config.ranking.maxResults).toBe(7);
  });

  it('finds the config file through DAISYUI_DOCS_MCP_CONFIG', async () => {
    await fs.writeFile(configPath, JSON.stringify({ ranking: { termMatchWeight: 1 } }));
    const config = await loadConfig({ env: { DAISYUI_DOCS_MCP_CONFIG: configPath } });
    expect(config.ranking.termMatchWeight).toBe(1);
  });

  it('rejects a file that is not JSON', async () => {
    await fs.writeFile(configPath, '{ ranking: ');
    await expect(loadConfig({ configPath, env: {} })).rejects.toMatchObject({
      code: DocsErrorCode.CONFIG_INVALID,
      message: `Config file ${configPath} is not valid JSON`,
    });
  });

  it('rejects unknown keys and out-of-range values', async () => {
    await fs.writeFile(configPath, JSON.stringify({ port: 8080 }));
    await expect(loadConfig({ configPath, env: {} })).rejects.toMatchObject({ code: DocsErrorCode.CONFIG_INVALID });

    await fs.writeFile(configPath, JSON.stringify({ ranking: { maxResults: 0 } }));
    await expect(loadConfig({ configPath, env: {} })).rejects.toMatchObject({
      code: DocsErrorCode.CONFIG_INVALID,
      message: `Config file ${configPath} is invalid`,
    });
  });

  it('rejects an unreadable config path', async () => {
    await expect(loadConfig({ configPath: tmpDir, env: {} })).rejects.toMatchObject({
      code: DocsErrorCode.CONFIG_INVALID,
      message: `Cannot read config file ${tmpDir}`,
    });
  });

  it('rejects invalid environment values', async () => {
    await expect(
      loadConfig({ configPath, env: { DAISYUI_DOCS_MCP_DUPLICATE_POLICY: 'newest' } })
    ).rejects.toMatchObject({ code: DocsErrorCode.CONFIG_INVALID });
    await expect(loadConfig({ configPath, env: { DAISYUI_DOCS_MCP_MAX_RESULTS: '2.5' } })).rejects.toMatchObject({
      code: DocsErrorCode.CONFIG_INVALID,
      message: 'DAISYUI_DOCS_MCP_MAX_RESULTS must be a positive integer, got "2.5"',
    });
  });
});
