import type { ProviderPatch } from '../domain/models';
import { describeError } from '../domain/errors';
import { extractHomeStarsRating, makeSlug } from '../domain/extract';
import type { PageScraper } from '../ports/PageScraper';
import type { BatchWindow, ProviderRepo } from '../ports/ProviderRepo';
import { systemEnvironment, uniformDelayMs } from '../ports/JobEnvironment';
import type { JobEnvironment, JobLogger } from '../ports/JobEnvironment';
import type { SpendGate } from './SpendGate';

const COOLDOWN_EVERY = 20;

export interface HomeStarsReport {
  total: number;
  found: number;
  notFound: number;
  errors: number;
  creditsSpent: number;
  budgetExhausted: boolean;
}

export class HomeStarsJob {
  constructor(
    private readonly repo: ProviderRepo,
    private readonly scraper: PageScraper,
    private readonly gate: SpendGate,
    private readonly creditsPerScrape: number,
    private readonly logger?: JobLogger,
    private readonly env: JobEnvironment = systemEnvironment
  ) {}

  async run(window: BatchWindow): Promise<HomeStarsReport> {
    const providers = await this.repo.listBatch({
      ...window,
      columns: ['id', 'business_name', 'city'],
      missingColumn: 'homestars_rating'
    });

    // largest per-page cost seen this run; later pages are gated on it
    let expectedCost = this.creditsPerScrape;
    const report: HomeStarsReport = {
      total: providers.length,
      found: 0,
      notFound: 0,
      errors: 0,
      creditsSpent: 0,
      budgetExhausted: false
    };

    if (providers.length === 0) {
      this.logger?.info('No providers left to scrape in this batch', { ...window });
      return report;
    }

    for (const [index, provider] of providers.entries()) {
      if (!this.gate.canSpend(expectedCost)) {
        report.budgetExhausted = true;
        this.logger?.warn('Scrape credit ceiling reached; stopping batch', {
          used: this.gate.used,
          ceiling: this.gate.ceiling,
          remaining: this.gate.remaining()
        });
        break;
      }

      const position = `${index + 1}/${providers.length}`;
      const url = `https://homestars.com/companies/${makeSlug(provider.name)}`;
      try {
        const page = await this.scraper.scrape({ url });
        const cost = page.creditsUsed ?? this.creditsPerScrape;
        await this.gate.add(cost);
        report.creditsSpent += cost;
        expectedCost = Math.max(expectedCost, cost);

        const extracted = page.markdown ? extractHomeStarsRating(page.markdown) : null;
        const patch: ProviderPatch = {
          homestars_rating: extracted?.rating ?? null,
          homestars_review_count: extracted?.reviewCount ?? null,
          homestars_url: page.markdown ? url : null
        };
        await this.repo.update(provider.id, patch);

        if (extracted?.rating) {
          report.found += 1;
          this.logger?.info('HomeStars rating recorded', {
            position,
            providerId: provider.id,
            name: provider.name,
            rating: extracted.rating,
            reviewCount: extracted.reviewCount
          });
        } else {
          report.notFound += 1;
          this.logger?.info('No HomeStars rating found', { position, providerId: provider.id, name: provider.name });
        }
      } catch (error) {
        report.errors += 1;
        this.logger?.error('HomeStars scrape failed', {
          position,
          providerId: provider.id,
          error: describeError(error)
        });
      }

      if ((index + 1) % COOLDOWN_EVERY === 0) {
        const pause = uniformDelayMs(this.env, 30, 60);
        this.logger?.info('Cooling down', { seconds: Math.round(pause / 1000) });
        await this.env.delay(pause);
      }
    }

    return report;
  }
}
