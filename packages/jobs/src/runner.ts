import { Logger } from '@aws-lambda-powertools/logger';
import { Metrics, MetricUnit } from '@aws-lambda-powertools/metrics';
import {
  HomeStarsJob,
  LicenseJob,
  RatingsSearchJob,
  ScrapedRatingsJob,
  SpendGate,
  systemEnvironment,
  type HomeStarsReport,
  type JobEnvironment,
  type JobLogger,
  type LicenseInfo,
  type LicenseJobReport,
  type LicenseLookup,
  type LookupSubject,
  type PageScraper,
  type PlatformRatings,
  type ProviderBatchQuery,
  type ProviderPatch,
  type ProviderRepo,
  type RatingsLookup,
  type RatingsSearchReport,
  type ScrapedRatingsReport,
  type ScrapeRequest,
  type SpendLoadResult,
  type SpendStore
} from '@enrich/core';
import { OpenAiLicenseClient, OpenAiRatingsClient, OpenAiWebSearchClient } from '@enrich/ai-openai';
import { PostgrestProviderRepo } from '@enrich/directory-http';
import { DynamoSpendStore, FileSpendStore } from '@enrich/persistence';
import { HttpScrapeClient } from '@enrich/scrape-http';
import { ConfigError } from './env';
import type { AppConfig, ScrapeConfig, SpendStoreConfig } from './env';

export const logger = new Logger({ serviceName: process.env.APP_NAME ?? 'directory-enrichment' });
const metrics = new Metrics({
  namespace: process.env.APP_NAME ?? 'directory-enrichment',
  serviceName: process.env.APP_NAME ?? 'directory-enrichment'
});

const jobLogger: JobLogger = {
  debug: (message, context) => (context ? logger.debug(message, context) : logger.debug(message)),
  info: (message, context) => (context ? logger.info(message, context) : logger.info(message)),
  warn: (message, context) => (context ? logger.warn(message, context) : logger.warn(message)),
  error: (message, context) => (context ? logger.error(message, context) : logger.error(message))
};

export interface JobDependencies {
  repo: ProviderRepo;
  licenseLookup: LicenseLookup;
  ratingsLookup: RatingsLookup;
  scraper: PageScraper;
  spendStore: SpendStore;
  environment: JobEnvironment;
}

export type JobReport = LicenseJobReport | RatingsSearchReport | ScrapedRatingsReport | HomeStarsReport;

export interface SpendSummary {
  loadedFrom: SpendLoadResult['source'];
  used: number;
  ceiling: number;
  remaining: number;
}

export interface JobOutcome {
  report: JobReport;
  spend?: SpendSummary;
}

class InstrumentedProviderRepo implements ProviderRepo {
  constructor(private readonly inner: ProviderRepo) {}

  async listBatch(query: ProviderBatchQuery) {
    const rows = await this.inner.listBatch(query);
    logger.info('Fetched provider batch', {
      batchNumber: query.batchNumber,
      batchSize: query.batchSize,
      rows: rows.length
    });
    return rows;
  }

  async update(providerId: string, patch: ProviderPatch) {
    try {
      await this.inner.update(providerId, patch);
      metrics.addMetric('provider_updated', MetricUnit.Count, 1);
    } catch (error) {
      metrics.addMetric('provider_update_error', MetricUnit.Count, 1);
      throw error;
    }
  }
}

class InstrumentedPageScraper implements PageScraper {
  constructor(private readonly inner: PageScraper) {}

  async scrape(request: ScrapeRequest) {
    try {
      const result = await this.inner.scrape(request);
      metrics.addMetric('scrape_success', MetricUnit.Count, 1);
      if (result.creditsUsed !== undefined) {
        metrics.addMetric('scrape_credits_reported', MetricUnit.Count, result.creditsUsed);
      }
      return result;
    } catch (error) {
      metrics.addMetric('scrape_error', MetricUnit.Count, 1);
      throw error;
    }
  }
}

class InstrumentedLicenseLookup implements LicenseLookup {
  constructor(private readonly inner: LicenseLookup) {}

  findLicense(subject: LookupSubject): Promise<LicenseInfo> {
    return trackLookup(this.inner, () => this.inner.findLicense(subject));
  }
}

class InstrumentedRatingsLookup implements RatingsLookup {
  constructor(private readonly inner: RatingsLookup) {}

  findRatings(subject: LookupSubject): Promise<PlatformRatings> {
    return trackLookup(this.inner, () => this.inner.findRatings(subject));
  }
}

async function trackLookup<T>(inner: object, call: () => Promise<T>): Promise<T> {
  try {
    const result = await call();
    metrics.addMetric('lookup_success', MetricUnit.Count, 1);
    if (inner instanceof OpenAiWebSearchClient) {
      const responseId = inner.getLastResponseId();
      if (responseId) {
        logger.debug('OpenAI lookup answered', { openaiResponseId: responseId });
      }
    }
    return result;
  } catch (error) {
    metrics.addMetric('lookup_error', MetricUnit.Count, 1);
    throw error;
  }
}

export async function runJob(
  config: AppConfig,
  overrides: Partial<JobDependencies> = {}
): Promise<JobOutcome> {
  logger.appendKeys({ job: config.job, batchNumber: config.batch.batchNumber });
  metrics.setDefaultDimensions({ app: config.appName, job: config.job });
  logger.info('Starting batch', { ...config.batch });

  try {
    const outcome = await dispatch(config, overrides);
    logger.info('Batch complete', { report: outcome.report, spend: outcome.spend });
    return outcome;
  } finally {
    metrics.publishStoredMetrics();
    logger.resetKeys();
  }
}

async function dispatch(config: AppConfig, overrides: Partial<JobDependencies>): Promise<JobOutcome> {
  const repo = new InstrumentedProviderRepo(
    overrides.repo ??
      new PostgrestProviderRepo({ baseUrl: config.directory.baseUrl, apiKey: config.directory.apiKey })
  );
  const environment = overrides.environment ?? systemEnvironment;

  switch (config.job) {
    case 'licenses': {
      const lookup = new InstrumentedLicenseLookup(overrides.licenseLookup ?? buildLicenseClient(config));
      const job = new LicenseJob(repo, lookup, jobLogger, environment);
      return { report: await job.run(config.batch) };
    }
    case 'ratings-search': {
      const lookup = new InstrumentedRatingsLookup(overrides.ratingsLookup ?? buildRatingsClient(config));
      const job = new RatingsSearchJob(repo, lookup, jobLogger, environment);
      return { report: await job.run(config.batch) };
    }
    case 'ratings-scrape': {
      const scrape = requireScrapeConfig(config);
      const scraper = new InstrumentedPageScraper(overrides.scraper ?? buildScraper(scrape));
      const gate = await openSpendGate(scrape, overrides.spendStore);
      const job = new ScrapedRatingsJob(repo, scraper, gate.gate, scrape, jobLogger, environment);
      const report = await job.run(config.batch);
      return finishScrapeRun(report, gate);
    }
    case 'homestars': {
      const scrape = requireScrapeConfig(config);
      const scraper = new InstrumentedPageScraper(overrides.scraper ?? buildScraper(scrape));
      const gate = await openSpendGate(scrape, overrides.spendStore);
      const job = new HomeStarsJob(repo, scraper, gate.gate, scrape.creditsPerScrape, jobLogger, environment);
      const report = await job.run(config.batch);
      return finishScrapeRun(report, gate);
    }
  }
}

interface OpenedGate {
  gate: SpendGate;
  loaded: SpendLoadResult;
}

async function openSpendGate(scrape: ScrapeConfig, store?: SpendStore): Promise<OpenedGate> {
  const gate = new SpendGate(store ?? buildSpendStore(scrape.spendStore), scrape.creditCeiling, jobLogger);
  const loaded = await gate.load();
  logger.info('Scrape credits loaded', {
    loadedFrom: loaded.source,
    used: gate.used,
    ceiling: gate.ceiling,
    remaining: gate.remaining()
  });
  return { gate, loaded };
}

function finishScrapeRun(
  report: ScrapedRatingsReport | HomeStarsReport,
  { gate, loaded }: OpenedGate
): JobOutcome {
  metrics.addMetric('scrape_credits_spent', MetricUnit.Count, report.creditsSpent);
  if (report.budgetExhausted) {
    logger.warn('Stopped to avoid exceeding the scrape credit ceiling; approve more credits before continuing', {
      used: gate.used,
      ceiling: gate.ceiling
    });
  }
  return {
    report,
    spend: {
      loadedFrom: loaded.source,
      used: gate.used,
      ceiling: gate.ceiling,
      remaining: gate.remaining()
    }
  };
}

function requireScrapeConfig(config: AppConfig): ScrapeConfig {
  if (!config.scrape) {
    throw new ConfigError('FIRECRAWL_API_KEY', `Job ${config.job} needs scrape configuration`);
  }
  return config.scrape;
}

function buildLicenseClient(config: AppConfig): LicenseLookup {
  if (!config.openAi) {
    throw new ConfigError('OPENAI_API_KEY', `Job ${config.job} needs OpenAI configuration`);
  }
  return new OpenAiLicenseClient({ apiKey: config.openAi.apiKey, defaultModel: config.openAi.model });
}

function buildRatingsClient(config: AppConfig): RatingsLookup {
  if (!config.openAi) {
    throw new ConfigError('OPENAI_API_KEY', `Job ${config.job} needs OpenAI configuration`);
  }
  return new OpenAiRatingsClient({ apiKey: config.openAi.apiKey, defaultModel: config.openAi.model });
}

function buildScraper(scrape: ScrapeConfig): PageScraper {
  return new HttpScrapeClient({ apiKey: scrape.apiKey, baseUrl: scrape.baseUrl });
}

function buildSpendStore(config: SpendStoreConfig): SpendStore {
  if (config.kind === 'dynamo') {
    return new DynamoSpendStore({ tableName: config.tableName, counterKey: config.counterKey });
  }
  return new FileSpendStore({ path: config.path });
}
