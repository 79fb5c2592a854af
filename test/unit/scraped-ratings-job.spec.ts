import { describe, expect, it, vi } from 'vitest';
import { ScrapedRatingsJob, SpendGate, type PageScraper, type ScrapeRequest, type ScrapeResult } from '@enrich/core';
import { HttpScrapeClient } from '@enrich/scrape-http';
import { buildProvider, FakeProviderRepo, instantEnvironment, MemorySpendStore } from '../fixtures/providers';

const options = { creditsPerScrape: 1, creditsPerProvider: 3, bbbProvince: 'ON' };

const scraperFrom = (pages: Record<string, ScrapeResult | Error>) => {
  const requests: ScrapeRequest[] = [];
  const scraper: PageScraper = {
    scrape: async request => {
      requests.push(request);
      const page = pages[request.url];
      if (page instanceof Error) {
        throw page;
      }
      return page ?? { json: null, markdown: null };
    }
  };
  return { scraper, requests };
};

const openGate = async (ceiling: number, used: number | null = null) => {
  const store = new MemorySpendStore(used);
  const gate = new SpendGate(store, ceiling);
  await gate.load();
  return { gate, store };
};

describe('ScrapedRatingsJob', () => {
  it('tries each platform URL in turn and charges only completed scrapes', async () => {
    const repo = new FakeProviderRepo([buildProvider({ id: 'p1' })]);
    const { scraper, requests } = scraperFrom({
      'https://www.yelp.com/biz/bright-spark-electric-ottawa': {
        json: { rating: 4.5, review_count: '1,204' },
        markdown: null
      },
      'https://homestars.com/companies/bright-spark-electric': new Error('timeout'),
      'https://www.bbb.org/ca/on/central-western-ontario/ottawa/bright-spark-electric': {
        json: { rating: 'A+' },
        markdown: null,
        creditsUsed: 2
      }
    });
    const { gate, store } = await openGate(100);
    const env = instantEnvironment();

    const report = await new ScrapedRatingsJob(repo, scraper, gate, options, undefined, env).run({
      batchNumber: 1,
      batchSize: 100
    });

    expect(report).toEqual({
      total: 1,
      processed: 1,
      updated: 1,
      errors: 0,
      creditsSpent: 4,
      budgetExhausted: false
    });
    expect(requests.map(request => request.url)).toEqual([
      'https://www.yelp.ca/biz/bright-spark-electric-ottawa',
      'https://www.yelp.com/biz/bright-spark-electric-ottawa',
      'https://homestars.com/companies/bright-spark-electric',
      'https://www.bbb.org/ca/on/central-western-ontario/ottawa/bright-spark-electric'
    ]);
    expect(requests[0]?.prompt).toBe(
      'Extract the overall rating (out of 5 stars) and total number of reviews for Bright Spark Electric. Return JSON: {rating: number, review_count: number}'
    );
    expect(repo.queries[0]).toEqual({
      batchNumber: 1,
      batchSize: 100,
      columns: ['id', 'business_name', 'name', 'city']
    });
    expect(repo.updates).toEqual([
      { providerId: 'p1', patch: { yelp_rating: 4.5, yelp_review_count: 1204, bbb_rating: 'A+' } }
    ]);
    expect(gate.used).toBe(4);
    expect(store.value).toBe(4);
    expect(env.delays).toEqual([1000, 1000, 1000]);
  });

  it('skips the city region for BBB when the provider has no city', async () => {
    const repo = new FakeProviderRepo([buildProvider({ id: 'p1', name: 'Amp Works', city: null })]);
    const { scraper, requests } = scraperFrom({});
    const { gate } = await openGate(100);

    await new ScrapedRatingsJob(repo, scraper, gate, options, undefined, instantEnvironment()).run({
      batchNumber: 1,
      batchSize: 100
    });

    expect(requests.map(request => request.url)).toEqual([
      'https://www.yelp.ca/biz/amp-works',
      'https://www.yelp.com/biz/amp-works',
      'https://homestars.com/companies/amp-works',
      'https://www.bbb.org/ca/on/eastern-ontario/amp-works',
      'https://www.bbb.org/ca/on/ottawa/amp-works'
    ]);
    expect(repo.updates).toEqual([]);
  });

  it('stops scraping at the credit ceiling and does not start the next provider', async () => {
    const repo = new FakeProviderRepo([
      buildProvider({ id: 'p1' }),
      buildProvider({ id: 'p2', name: 'Amp Works' }),
      buildProvider({ id: 'p3', name: 'Watt Now' })
    ]);
    const { scraper, requests } = scraperFrom({});
    const { gate, store } = await openGate(5);
    const warn = vi.fn();
    const logger = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() };

    const report = await new ScrapedRatingsJob(repo, scraper, gate, options, logger, instantEnvironment()).run({
      batchNumber: 1,
      batchSize: 100
    });

    expect(report).toEqual({
      total: 3,
      processed: 1,
      updated: 0,
      errors: 0,
      creditsSpent: 5,
      budgetExhausted: true
    });
    expect(requests).toHaveLength(5);
    expect(gate.used).toBe(5);
    expect(store.value).toBe(5);
    expect(warn).toHaveBeenCalledWith('Scrape credit ceiling reached; stopping batch before next provider', {
      used: 5,
      ceiling: 5,
      remaining: 0
    });
  });

  it('does nothing when the persisted total leaves too little headroom', async () => {
    const repo = new FakeProviderRepo([buildProvider({ id: 'p1' })]);
    const { scraper, requests } = scraperFrom({});
    const { gate } = await openGate(2900, 2898);

    const report = await new ScrapedRatingsJob(repo, scraper, gate, options, undefined, instantEnvironment()).run({
      batchNumber: 1,
      batchSize: 100
    });

    expect(report.processed).toBe(0);
    expect(report.budgetExhausted).toBe(true);
    expect(requests).toEqual([]);
    expect(gate.used).toBe(2898);
  });

  it('counts a failed row update as an error', async () => {
    const repo = new FakeProviderRepo([buildProvider({ id: 'p1' })]);
    repo.failUpdatesFor.add('p1');
    const { scraper } = scraperFrom({
      'https://www.yelp.ca/biz/bright-spark-electric-ottawa': { json: { rating: 3 }, markdown: null }
    });
    const { gate } = await openGate(100);

    const report = await new ScrapedRatingsJob(repo, scraper, gate, options, undefined, instantEnvironment()).run({
      batchNumber: 1,
      batchSize: 100
    });

    expect(report.errors).toBe(1);
    expect(report.processed).toBe(0);
    expect(report.updated).toBe(0);
  });

  it('gates later scrapes on the largest reported cost', async () => {
    const repo = new FakeProviderRepo([buildProvider({ id: 'p1' }), buildProvider({ id: 'p2', name: 'Amp Works' })]);
    const { scraper, requests } = scraperFrom({});
    const costly: PageScraper = {
      scrape: async request => ({ ...(await scraper.scrape(request)), creditsUsed: 4 })
    };
    const { gate, store } = await openGate(20, 10);

    const report = await new ScrapedRatingsJob(repo, costly, gate, options, undefined, instantEnvironment()).run({
      batchNumber: 1,
      batchSize: 100
    });

    expect(requests).toHaveLength(2);
    expect(gate.used).toBe(18);
    expect(gate.used).toBeLessThanOrEqual(gate.ceiling);
    expect(store.value).toBe(18);
    expect(report).toMatchObject({ processed: 1, creditsSpent: 8, budgetExhausted: true });
  });

  it('charges every successful scrape even when the response body is unexpected', async () => {
    const repo = new FakeProviderRepo([buildProvider({ id: 'p1', name: 'Amp Works', city: null })]);
    const fetchImpl: typeof fetch = async () =>
      new Response(JSON.stringify({ success: true, data: { json: [] }, metadata: 'n/a', creditsUsed: 'x' }), {
        status: 200
      });
    const fractional: typeof fetch = async () =>
      new Response(JSON.stringify({ success: true, data: { json: {}, metadata: { creditsUsed: 1.5 } } }), {
        status: 200
      });
    const { gate } = await openGate(100);

    const odd = await new ScrapedRatingsJob(
      repo,
      new HttpScrapeClient({ apiKey: 'test-key', fetchImpl }),
      gate,
      options,
      undefined,
      instantEnvironment()
    ).run({ batchNumber: 1, batchSize: 100 });

    expect(odd).toMatchObject({ processed: 1, errors: 0, creditsSpent: 5 });
    expect(gate.used).toBe(5);

    const billed = await new ScrapedRatingsJob(
      repo,
      new HttpScrapeClient({ apiKey: 'test-key', fetchImpl: fractional }),
      gate,
      options,
      undefined,
      instantEnvironment()
    ).run({ batchNumber: 1, batchSize: 100 });

    expect(billed.creditsSpent).toBe(10);
    expect(gate.used).toBe(15);
  });
});
