import { REVIEW_PLATFORMS } from '../domain/models';
import type { PlatformRatings, ProviderPatch, ReviewPlatform } from '../domain/models';
import { describeError } from '../domain/errors';
import type { BatchWindow, ProviderRepo } from '../ports/ProviderRepo';
import type { RatingsLookup } from '../ports/RatingsLookup';
import { systemEnvironment, uniformDelayMs } from '../ports/JobEnvironment';
import type { JobEnvironment, JobLogger } from '../ports/JobEnvironment';

export type CoveragePlatform = ReviewPlatform | 'bbb';

export interface RatingsSearchReport {
  total: number;
  updated: number;
  errors: number;
  coverage: Record<CoveragePlatform, number>;
}

export class RatingsSearchJob {
  constructor(
    private readonly repo: ProviderRepo,
    private readonly lookup: RatingsLookup,
    private readonly logger?: JobLogger,
    private readonly env: JobEnvironment = systemEnvironment
  ) {}

  async run(window: BatchWindow): Promise<RatingsSearchReport> {
    const providers = await this.repo.listBatch({
      ...window,
      columns: ['id', 'business_name', 'city'],
      missingColumn: 'yelp_rating'
    });

    const report: RatingsSearchReport = {
      total: providers.length,
      updated: 0,
      errors: 0,
      coverage: { yelp: 0, homestars: 0, google: 0, bbb: 0, facebook: 0, trustedpros: 0 }
    };

    if (providers.length === 0) {
      this.logger?.info('No providers left to rate in this batch', { ...window });
      return report;
    }

    for (const [index, provider] of providers.entries()) {
      const position = `${index + 1}/${providers.length}`;
      try {
        const ratings = await this.lookup.findRatings({
          businessName: provider.name,
          city: provider.city
        });
        const found = foundPlatforms(ratings);
        for (const platform of found) {
          report.coverage[platform] += 1;
        }

        await this.repo.update(provider.id, buildRatingsPatch(ratings));
        report.updated += 1;

        if (found.length > 0) {
          this.logger?.info('Ratings recorded', {
            position,
            providerId: provider.id,
            name: provider.name,
            platforms: found
          });
        } else {
          this.logger?.info('No ratings found', { position, providerId: provider.id, name: provider.name });
        }
      } catch (error) {
        report.errors += 1;
        this.logger?.error('Ratings search failed', {
          position,
          providerId: provider.id,
          error: describeError(error)
        });
      }

      if (index < providers.length - 1) {
        await this.env.delay(uniformDelayMs(this.env, 3, 6));
      }
    }

    return report;
  }
}

export function buildRatingsPatch(ratings: PlatformRatings): ProviderPatch {
  const patch: ProviderPatch = {
    yelp_rating: ratings.yelp.rating,
    yelp_review_count: ratings.yelp.reviewCount,
    homestars_rating: ratings.homestars.rating,
    homestars_review_count: ratings.homestars.reviewCount,
    google_rating: ratings.google.rating,
    google_review_count: ratings.google.reviewCount,
    bbb_rating: ratings.bbb.rating,
    facebook_rating: ratings.facebook.rating,
    facebook_review_count: ratings.facebook.reviewCount
  };

  if (ratings.trustedpros.rating) {
    patch.trustedpros_rating = ratings.trustedpros.rating;
    patch.trustedpros_review_count = ratings.trustedpros.reviewCount;
  }

  return patch;
}

function foundPlatforms(ratings: PlatformRatings): CoveragePlatform[] {
  const found: CoveragePlatform[] = REVIEW_PLATFORMS.filter(platform => Boolean(ratings[platform].rating));
  if (ratings.bbb.rating) {
    found.push('bbb');
  }
  return found;
}
