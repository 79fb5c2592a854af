import { describe, expect, it, vi } from 'vitest';
import { ConfigError, isJobName, loadConfig, type SecretReader } from '@enrich/jobs';

const baseEnv = {
  SUPABASE_URL: 'https://directory.test',
  SUPABASE_KEY: 'test-key',
  OPENAI_API_KEY: 'test-openai-key',
  FIRECRAWL_API_KEY: 'test-scrape-key'
};

const noSecrets: SecretReader = {
  getSecret: async secretId => {
    throw new Error(`unexpected secret lookup ${secretId}`);
  }
};

describe('loadConfig', () => {
  it('applies per-job defaults for a search job', async () => {
    const config = await loadConfig('licenses', { env: { ...baseEnv }, secrets: noSecrets });

    expect(config).toEqual({
      appName: 'directory-enrichment',
      job: 'licenses',
      batch: { batchNumber: 1, batchSize: 50 },
      directory: { baseUrl: 'https://directory.test', apiKey: 'test-key' },
      openAi: { apiKey: 'test-openai-key', model: 'gpt-4o' }
    });
  });

  it('builds scrape settings with a file spend store by default', async () => {
    const config = await loadConfig('ratings-scrape', {
      env: { ...baseEnv, BATCH_NUMBER: '4' },
      secrets: noSecrets
    });

    expect(config.batch).toEqual({ batchNumber: 4, batchSize: 100 });
    expect(config.openAi).toBeUndefined();
    expect(config.scrape).toEqual({
      apiKey: 'test-scrape-key',
      baseUrl: 'https://api.firecrawl.dev/v2',
      creditCeiling: 2900,
      creditsPerScrape: 1,
      creditsPerProvider: 3,
      bbbProvince: 'ON',
      spendStore: { kind: 'file', path: '/tmp/scrape-credits-used.txt' }
    });
  });

  it('selects the DynamoDB spend store', async () => {
    const config = await loadConfig('homestars', {
      env: { ...baseEnv, SPEND_STORE: 'dynamo', SPEND_TABLE_NAME: 'Spend', SCRAPE_CREDIT_CEILING: '500' },
      secrets: noSecrets
    });

    expect(config.batch.batchSize).toBe(200);
    expect(config.scrape?.creditCeiling).toBe(500);
    expect(config.scrape?.spendStore).toEqual({ kind: 'dynamo', tableName: 'Spend', counterKey: 'scrape-credits' });
  });

  it('reads missing keys from the secrets prefix', async () => {
    const secrets: SecretReader = { getSecret: vi.fn().mockResolvedValue('test-secret') };

    const config = await loadConfig('ratings-search', {
      env: { SUPABASE_URL: 'https://directory.test', SECRETS_PREFIX: 'enrich/prod' },
      secrets
    });

    expect(config.directory.apiKey).toBe('test-secret');
    expect(config.openAi?.apiKey).toBe('test-secret');
    expect(secrets.getSecret).toHaveBeenNthCalledWith(1, 'enrich/prod/SUPABASE_KEY');
    expect(secrets.getSecret).toHaveBeenNthCalledWith(2, 'enrich/prod/OPENAI_API_KEY');
  });

  it('rejects missing and invalid settings', async () => {
    await expect(loadConfig('licenses', { env: { SUPABASE_KEY: 'test-key' }, secrets: noSecrets })).rejects.toThrow(
      'SUPABASE_URL environment variable is required'
    );
    await expect(
      loadConfig('licenses', { env: { ...baseEnv, BATCH_SIZE: '0' }, secrets: noSecrets })
    ).rejects.toBeInstanceOf(ConfigError);
    await expect(
      loadConfig('homestars', { env: { ...baseEnv, SPEND_STORE: 'redis' }, secrets: noSecrets })
    ).rejects.toThrow('SPEND_STORE must be "file" or "dynamo", got "redis"');
    await expect(
      loadConfig('homestars', { env: { ...baseEnv, SPEND_STORE: 'dynamo' }, secrets: noSecrets })
    ).rejects.toThrow('SPEND_TABLE_NAME environment variable is required');
  });

  it('rejects numeric settings that are not whole numbers', async () => {
    await expect(
      loadConfig('ratings-scrape', { env: { ...baseEnv, SCRAPE_CREDIT_CEILING: '3k' }, secrets: noSecrets })
    ).rejects.toThrow('SCRAPE_CREDIT_CEILING must be a whole number, got "3k"');
    await expect(
      loadConfig('licenses', { env: { ...baseEnv, BATCH_NUMBER: '-2' }, secrets: noSecrets })
    ).rejects.toMatchObject({ name: 'ConfigError', variable: 'BATCH_NUMBER' });
  });
});

describe('isJobName', () => {
  it('accepts only known jobs', () => {
    expect(isJobName('ratings-scrape')).toBe(true);
    expect(isJobName('everything')).toBe(false);
    expect(isJobName(undefined)).toBe(false);
  });
});
