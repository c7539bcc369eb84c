import { writeFile } from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError } from '../errors';
import { CONFIG_DIR, loadConfig, loadProviderProfiles } from './index';
import { makeTempDir } from '../test-utils/fixtures';

function problemsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error.problems;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    const config = loadConfig({ DATA_DIR: '/tmp/pipeline-data' });

    expect(config.port).toBe(8080);
    expect(config.defaultProfile).toBe('groq-default');
    expect(config.projectStore).toEqual({ kind: 'file', dir: path.join('/tmp/pipeline-data', 'projects') });
    expect(config.artifactRoot).toBe(path.join('/tmp/pipeline-data', 'artifacts'));
    expect(config.toolCatalogPath).toBe(path.join(CONFIG_DIR, 'tools.json'));
    expect(config.sandbox.args).toEqual(['-m', 'pipeline_tools.runner']);
    expect(config.sandbox.denyNetworkWrapper).toEqual([]);
    expect(config.loop).toEqual({
      contextWindowTurns: 24,
      maxCorrectiveRetries: 2,
      maxModelRounds: 8,
      errorExcerptChars: 1200,
      followUpSummary: true,
    });
    expect(config.logModelCalls).toBe(true);
    expect(Object.keys(config.providers).sort()).toEqual(['azure-research', 'groq-default', 'openai-default']);
  });

  it('reads overrides', () => {
    const config = loadConfig({
      DATA_DIR: '/tmp/pipeline-data',
      PORT: '9000',
      PROJECT_STORE: 'redis',
      REDIS_URL: 'redis://cache:6379',
      SANDBOX_DENY_NETWORK: 'unshare  -n',
      FOLLOW_UP_SUMMARY: '0',
      LOG_MODEL_CALLS: 'false',
      DEFAULT_PROFILE: 'openai-default',
    });

    expect(config.port).toBe(9000);
    expect(config.projectStore).toEqual({ kind: 'redis', url: 'redis://cache:6379' });
    expect(config.sandbox.denyNetworkWrapper).toEqual(['unshare', '-n']);
    expect(config.loop.followUpSummary).toBe(false);
    expect(config.logModelCalls).toBe(false);
    expect(config.providers[config.defaultProfile].backend).toBe('openai');
  });

  it('collects every invalid variable', () => {
    const problems = problemsOf(() => loadConfig({ PORT: 'abc', LOG_LEVEL: 'loud' }));

    expect(problems).toHaveLength(2);
    expect(problems.some((p) => p.startsWith('PORT:'))).toBe(true);
    expect(problems.some((p) => p.startsWith('LOG_LEVEL:'))).toBe(true);
  });

  it('rejects a default profile that is not configured', () => {
    expect(problemsOf(() => loadConfig({ DEFAULT_PROFILE: 'missing' }))).toEqual([
      "DEFAULT_PROFILE 'missing' is not one of: groq-default, openai-default, azure-research",
    ]);
  });
});

describe('loadProviderProfiles', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir('providers-'));
  });

  afterEach(async () => {
    await cleanup();
  });

  it('fills profile defaults', async () => {
    const file = path.join(dir, 'providers.json');
    await writeFile(
      file,
      JSON.stringify({ profiles: { local: { backend: 'openai', model: 'm', apiKeyEnv: 'OPENAI_API_KEY' } } }),
    );

    expect(loadProviderProfiles(file)).toEqual({
      local: { backend: 'openai', model: 'm', apiKeyEnv: 'OPENAI_API_KEY', maxTokens: 2048, temperature: 0.2 },
    });
  });

  it('names the file and field of a bad profile', async () => {
    const file = path.join(dir, 'providers.json');
    await writeFile(file, JSON.stringify({ profiles: { broken: { backend: 'groq', apiKeyEnv: 'GROQ_API_KEY' } } }));

    const problems = problemsOf(() => loadProviderProfiles(file));
    expect(problems).toHaveLength(1);
    expect(problems[0].startsWith(`${file}: profiles.broken.model `)).toBe(true);
  });

  it('reports an unreadable file', () => {
    const problems = problemsOf(() => loadProviderProfiles(path.join(dir, 'absent.json')));
    expect(problems[0].startsWith(`cannot read provider profiles from ${path.join(dir, 'absent.json')}:`)).toBe(true);
  });
});
