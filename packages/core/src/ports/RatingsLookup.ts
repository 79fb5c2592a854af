import type { LookupSubject, PlatformRatings } from '../domain/models';

export interface RatingsLookup {
  findRatings(subject: LookupSubject): Promise<PlatformRatings>;
}
