import { z } from 'zod';
import type { ProviderPatch, ProviderRow } from '../domain/models';
import { describeError } from '../domain/errors';
import { makeSlug, toNumberOrNull } from '../domain/extract';
import type { PageScraper } from '../ports/PageScraper';
import type { BatchWindow, ProviderRepo } from '../ports/ProviderRepo';
import { systemEnvironment } from '../ports/JobEnvironment';
import type { JobEnvironment, JobLogger } from '../ports/JobEnvironment';
import type { SpendGate } from './SpendGate';

const PLATFORM_PAUSE_MS = 1000;

const ExtractedRatingSchema = z
  .object({
    rating: z.union([z.number(), z.string()]).nullish(),
    review_count: z.union([z.number(), z.string()]).nullish()
  })
  .passthrough();

type ExtractedRating = z.infer<typeof ExtractedRatingSchema>;

export type ScrapedPlatform = 'yelp' | 'homestars' | 'bbb';

export interface ScrapeCosts {
  /** Estimate recorded for a scrape when the service does not report its own cost. */
  creditsPerScrape: number;
  /** Headroom required before a provider is started at all. */
  creditsPerProvider: number;
}

export interface ScrapedRatingsOptions extends ScrapeCosts {
  bbbProvince: string;
}

export interface ScrapedRatingsReport {
  total: number;
  processed: number;
  updated: number;
  errors: number;
  creditsSpent: number;
  budgetExhausted: boolean;
}

interface PlatformTarget {
  platform: ScrapedPlatform;
  urls(provider: ProviderRow): string[];
  prompt(name: string): string;
  toPatch(extracted: ExtractedRating): ProviderPatch;
}

export class ScrapedRatingsJob {
  private readonly targets: PlatformTarget[];
  /** Largest per-scrape cost seen this run; every later call is gated on it. */
  private expectedCost: number;

  constructor(
    private readonly repo: ProviderRepo,
    private readonly scraper: PageScraper,
    private readonly gate: SpendGate,
    private readonly options: ScrapedRatingsOptions,
    private readonly logger?: JobLogger,
    private readonly env: JobEnvironment = systemEnvironment
  ) {
    this.targets = buildTargets(options.bbbProvince);
    this.expectedCost = options.creditsPerScrape;
  }

  async run(window: BatchWindow): Promise<ScrapedRatingsReport> {
    this.expectedCost = this.options.creditsPerScrape;
    const providers = await this.repo.listBatch({
      ...window,
      columns: ['id', 'business_name', 'name', 'city']
    });

    const report: ScrapedRatingsReport = {
      total: providers.length,
      processed: 0,
      updated: 0,
      errors: 0,
      creditsSpent: 0,
      budgetExhausted: false
    };

    if (providers.length === 0) {
      this.logger?.info('No providers found in this batch', { ...window });
      return report;
    }

    for (const [index, provider] of providers.entries()) {
      if (!this.gate.canSpend(this.options.creditsPerProvider)) {
        report.budgetExhausted = true;
        this.logger?.warn('Scrape credit ceiling reached; stopping batch before next provider', {
          used: this.gate.used,
          ceiling: this.gate.ceiling,
          remaining: this.gate.remaining()
        });
        break;
      }

      const position = `${index + 1}/${providers.length}`;
      try {
        const patch: ProviderPatch = {};
        for (const target of this.targets) {
          if (!this.gate.canSpend(this.expectedCost)) {
            break;
          }
          const found = await this.scrapePlatform(provider, target, report);
          if (found) {
            Object.assign(patch, target.toPatch(found));
          }
          this.logger?.debug('Platform scraped', {
            position,
            providerId: provider.id,
            platform: target.platform,
            found: Boolean(found)
          });
          await this.env.delay(PLATFORM_PAUSE_MS);
        }

        if (Object.keys(patch).length > 0) {
          await this.repo.update(provider.id, patch);
          report.updated += 1;
          this.logger?.info('Ratings recorded', { position, providerId: provider.id, name: provider.name, patch });
        } else {
          this.logger?.info('No ratings found', { position, providerId: provider.id, name: provider.name });
        }
        report.processed += 1;
      } catch (error) {
        report.errors += 1;
        this.logger?.error('Scraped ratings update failed', {
          position,
          providerId: provider.id,
          error: describeError(error)
        });
      }
    }

    return report;
  }

  private async scrapePlatform(
    provider: ProviderRow,
    target: PlatformTarget,
    report: ScrapedRatingsReport
  ): Promise<ExtractedRating | null> {
    const prompt = target.prompt(provider.name);

    for (const url of target.urls(provider)) {
      if (!this.gate.canSpend(this.expectedCost)) {
        return null;
      }

      let json: Record<string, unknown> | null;
      try {
        const result = await this.scraper.scrape({ url, prompt });
        const cost = result.creditsUsed ?? this.options.creditsPerScrape;
        await this.gate.add(cost);
        report.creditsSpent += cost;
        this.expectedCost = Math.max(this.expectedCost, cost);
        json = result.json;
      } catch (error) {
        this.logger?.warn('Scrape request failed', { url, error: describeError(error) });
        continue;
      }

      const parsed = ExtractedRatingSchema.safeParse(json);
      if (parsed.success && parsed.data.rating) {
        return parsed.data;
      }
    }

    return null;
  }
}

function buildTargets(province: string): PlatformTarget[] {
  return [
    {
      platform: 'yelp',
      urls: provider => {
        const slug = makeSlug(provider.name, provider.city);
        return [`https://www.yelp.ca/biz/${slug}`, `https://www.yelp.com/biz/${slug}`];
      },
      prompt: name =>
        `Extract the overall rating (out of 5 stars) and total number of reviews for ${name}. Return JSON: {rating: number, review_count: number}`,
      toPatch: extracted => ({
        yelp_rating: toNumberOrNull(extracted.rating),
        yelp_review_count: toNumberOrNull(extracted.review_count)
      })
    },
    {
      platform: 'homestars',
      urls: provider => [`https://homestars.com/companies/${makeSlug(provider.name)}`],
      prompt: name =>
        `Extract the overall rating (out of 10) and total number of reviews for ${name}. Return JSON: {rating: number, review_count: number}`,
      toPatch: extracted => ({
        homestars_rating: toNumberOrNull(extracted.rating),
        homestars_review_count: toNumberOrNull(extracted.review_count)
      })
    },
    {
      platform: 'bbb',
      urls: provider => {
        const slug = makeSlug(provider.name);
        const regions = ['eastern-ontario', 'ottawa'];
        if (provider.city) {
          regions.unshift(`central-western-ontario/${makeSlug(provider.city)}`);
        }
        const provinceSegment = province.toLowerCase();
        return regions.map(region => `https://www.bbb.org/ca/${provinceSegment}/${region}/${slug}`);
      },
      prompt: name => `Extract the BBB rating (A+, A, B, etc.) for ${name}. Return JSON: {rating: string}`,
      toPatch: extracted => ({
        bbb_rating: extracted.rating === null || extracted.rating === undefined ? null : String(extracted.rating)
      })
    }
  ];
}
