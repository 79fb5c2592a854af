import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';

export const JOB_NAMES = ['licenses', 'ratings-search', 'ratings-scrape', 'homestars'] as const;
export type JobName = (typeof JOB_NAMES)[number];

const DEFAULT_BATCH_SIZES: Record<JobName, number> = {
  licenses: 50,
  'ratings-search': 50,
  'ratings-scrape': 100,
  homestars: 200
};

const OPENAI_JOBS: ReadonlySet<JobName> = new Set(['licenses', 'ratings-search']);
const SCRAPE_JOBS: ReadonlySet<JobName> = new Set(['ratings-scrape', 'homestars']);

export type SpendStoreConfig =
  | { kind: 'file'; path: string }
  | { kind: 'dynamo'; tableName: string; counterKey: string };

export interface ScrapeConfig {
  apiKey: string;
  baseUrl: string;
  creditCeiling: number;
  creditsPerScrape: number;
  creditsPerProvider: number;
  bbbProvince: string;
  spendStore: SpendStoreConfig;
}

export interface AppConfig {
  appName: string;
  job: JobName;
  batch: {
    batchNumber: number;
    batchSize: number;
  };
  directory: {
    baseUrl: string;
    apiKey: string;
  };
  openAi?: {
    apiKey: string;
    model: string;
  };
  scrape?: ScrapeConfig;
}

export class ConfigError extends Error {
  public readonly variable: string;

  constructor(variable: string, message: string) {
    super(message);
    this.name = 'ConfigError';
    this.variable = variable;
  }
}

export interface SecretReader {
  getSecret(secretId: string): Promise<string>;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  secrets?: SecretReader;
}

export function isJobName(value: string | undefined): value is JobName {
  return JOB_NAMES.some(name => name === value);
}

export async function loadConfig(job: JobName, options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const secrets = options.secrets ?? secretsManagerReader;
  const secretsPrefix = env.SECRETS_PREFIX;

  const resolveKey = async (name: string): Promise<string> => {
    const value = env[name];
    if (value) {
      return value;
    }
    if (secretsPrefix) {
      return secrets.getSecret(`${secretsPrefix}/${name}`);
    }
    throw new ConfigError(name, `${name} environment variable is required`);
  };

  const batchNumber = parseOptionalInt('BATCH_NUMBER', env.BATCH_NUMBER) ?? 1;
  const batchSize = parseOptionalInt('BATCH_SIZE', env.BATCH_SIZE) ?? DEFAULT_BATCH_SIZES[job];
  if (batchNumber < 1) {
    throw new ConfigError('BATCH_NUMBER', 'BATCH_NUMBER must be 1 or greater');
  }
  if (batchSize < 1) {
    throw new ConfigError('BATCH_SIZE', 'BATCH_SIZE must be 1 or greater');
  }

  const config: AppConfig = {
    appName: env.APP_NAME ?? 'directory-enrichment',
    job,
    batch: { batchNumber, batchSize },
    directory: {
      baseUrl: requiredEnv(env, 'SUPABASE_URL'),
      apiKey: await resolveKey('SUPABASE_KEY')
    }
  };

  if (OPENAI_JOBS.has(job)) {
    config.openAi = {
      apiKey: await resolveKey('OPENAI_API_KEY'),
      model: env.OPENAI_MODEL ?? 'gpt-4o'
    };
  }

  if (SCRAPE_JOBS.has(job)) {
    config.scrape = {
      apiKey: await resolveKey('FIRECRAWL_API_KEY'),
      baseUrl: env.FIRECRAWL_BASE_URL ?? 'https://api.firecrawl.dev/v2',
      creditCeiling: parseNonNegative(env, 'SCRAPE_CREDIT_CEILING', 2900),
      creditsPerScrape: parseNonNegative(env, 'SCRAPE_CREDITS_PER_PAGE', 1),
      creditsPerProvider: parseNonNegative(env, 'SCRAPE_CREDITS_PER_PROVIDER', 3),
      bbbProvince: env.BBB_PROVINCE ?? 'ON',
      spendStore: loadSpendStoreConfig(env)
    };
  }

  return config;
}

function loadSpendStoreConfig(env: NodeJS.ProcessEnv): SpendStoreConfig {
  const kind = (env.SPEND_STORE ?? 'file').toLowerCase();
  if (kind === 'dynamo') {
    return {
      kind: 'dynamo',
      tableName: requiredEnv(env, 'SPEND_TABLE_NAME'),
      counterKey: env.SPEND_COUNTER_KEY ?? 'scrape-credits'
    };
  }
  if (kind === 'file') {
    return { kind: 'file', path: env.SPEND_COUNTER_PATH ?? '/tmp/scrape-credits-used.txt' };
  }
  throw new ConfigError('SPEND_STORE', `SPEND_STORE must be "file" or "dynamo", got "${kind}"`);
}

const secretsClient = new SecretsManagerClient({});

const secretsManagerReader: SecretReader = {
  async getSecret(secretId: string): Promise<string> {
    const command = new GetSecretValueCommand({ SecretId: secretId });
    const response = await secretsClient.send(command);
    const secret =
      response.SecretString ??
      (response.SecretBinary ? Buffer.from(response.SecretBinary).toString('utf8') : '');
    if (!secret) {
      throw new ConfigError(secretId, `Secret ${secretId} has no value`);
    }
    return secret;
  }
};

function requiredEnv(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name];
  if (!value) {
    throw new ConfigError(name, `${name} environment variable is required`);
  }
  return value;
}

function parseNonNegative(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  return parseOptionalInt(name, env[name]) ?? fallback;
}

function parseOptionalInt(name: string, value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }

  const text = value.trim();
  if (!/^\d+$/.test(text)) {
    throw new ConfigError(name, `${name} must be a whole number, got "${value}"`);
  }
  return Number.parseInt(text, 10);
}
