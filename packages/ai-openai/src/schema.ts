import { z } from 'zod';
import { toNumberOrNull } from '@enrich/core';

const nullableNumber = z.unknown().transform(toNumberOrNull);

const nullableText = z
  .unknown()
  .transform(value => (typeof value === 'string' && value.trim() ? value.trim() : null));

export const LicenseAnswerSchema = z.object({
  esa_license_number: nullableText,
  license_status: nullableText,
  master_electrician: z.unknown().transform(value => (typeof value === 'boolean' ? value : null))
});

export type LicenseAnswer = z.infer<typeof LicenseAnswerSchema>;

export const RatingsAnswerSchema = z.object({
  yelp_rating: nullableNumber,
  yelp_reviews: nullableNumber,
  homestars_rating: nullableNumber,
  homestars_reviews: nullableNumber,
  google_rating: nullableNumber,
  google_reviews: nullableNumber,
  bbb_rating: nullableText,
  facebook_rating: nullableNumber,
  facebook_reviews: nullableNumber,
  trustedpros_rating: nullableNumber,
  trustedpros_reviews: nullableNumber
});

export type RatingsAnswer = z.infer<typeof RatingsAnswerSchema>;
