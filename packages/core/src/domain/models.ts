import { z } from 'zod';

export const LicenseStatusSchema = z.enum(['active', 'inactive', 'unknown']);
export type LicenseStatus = z.infer<typeof LicenseStatusSchema>;

export const ProviderRowSchema = z
  .object({
    id: z.union([z.string(), z.number()]).transform(String),
    business_name: z.string().nullish(),
    name: z.string().nullish(),
    city: z.string().nullish(),
    category: z.string().nullish()
  })
  .passthrough()
  .transform(row => ({
    id: row.id,
    name: row.business_name || row.name || 'Unknown',
    city: row.city ?? null,
    category: row.category ?? null
  }));

export type ProviderRow = z.output<typeof ProviderRowSchema>;

export interface LicenseInfo {
  esaLicenseNumber: string | null;
  licenseStatus: LicenseStatus | null;
  masterElectrician: boolean | null;
}

export const EMPTY_LICENSE: LicenseInfo = {
  esaLicenseNumber: null,
  licenseStatus: null,
  masterElectrician: null
};

export interface PlatformRating {
  rating: number | null;
  reviewCount: number | null;
}

export const REVIEW_PLATFORMS = ['yelp', 'homestars', 'google', 'facebook', 'trustedpros'] as const;
export type ReviewPlatform = (typeof REVIEW_PLATFORMS)[number];

export type PlatformRatings = Record<ReviewPlatform, PlatformRating> & {
  bbb: { rating: string | null };
};

export const emptyRatings = (): PlatformRatings => ({
  yelp: { rating: null, reviewCount: null },
  homestars: { rating: null, reviewCount: null },
  google: { rating: null, reviewCount: null },
  facebook: { rating: null, reviewCount: null },
  trustedpros: { rating: null, reviewCount: null },
  bbb: { rating: null }
});

/** Column values written back to a provider row, keyed by column name. */
export type ProviderPatch = Record<string, string | number | boolean | null>;

export interface LookupSubject {
  businessName: string;
  city: string | null;
}
