import { parseLooseJson } from '@enrich/core';
import type { LookupSubject, PlatformRatings, RatingsLookup } from '@enrich/core';
import { RatingsAnswerSchema } from './schema';
import { OpenAiWebSearchClient } from './OpenAiWebSearchClient';

export class OpenAiRatingsClient extends OpenAiWebSearchClient implements RatingsLookup {
  async findRatings(subject: LookupSubject): Promise<PlatformRatings> {
    const location = subject.city ? ` in ${subject.city}` : '';
    const prompt = [
      `Find ratings and review counts for ${subject.businessName}${location} from these platforms:`,
      'Yelp, HomeStars, Google Reviews, BBB, Facebook, TrustedPros.',
      'Return ONLY a JSON object with this exact structure:',
      '{"yelp_rating": float or null, "yelp_reviews": int or null,',
      '"homestars_rating": float or null, "homestars_reviews": int or null,',
      '"google_rating": float or null, "google_reviews": int or null,',
      '"bbb_rating": string or null,',
      '"facebook_rating": float or null, "facebook_reviews": int or null,',
      '"trustedpros_rating": float or null, "trustedpros_reviews": int or null}.',
      'Use null for any platform where you cannot find data.'
    ].join(' ');

    const text = await this.search(prompt, 2000);
    return interpretRatingsAnswer(text);
  }
}

export function interpretRatingsAnswer(text: string): PlatformRatings {
  const parsed = RatingsAnswerSchema.safeParse(parseLooseJson(text));
  if (!parsed.success) {
    throw new Error(`Could not parse ratings JSON from response: ${text.slice(0, 200)}`);
  }

  const answer = parsed.data;
  return {
    yelp: { rating: answer.yelp_rating, reviewCount: answer.yelp_reviews },
    homestars: { rating: answer.homestars_rating, reviewCount: answer.homestars_reviews },
    google: { rating: answer.google_rating, reviewCount: answer.google_reviews },
    facebook: { rating: answer.facebook_rating, reviewCount: answer.facebook_reviews },
    trustedpros: { rating: answer.trustedpros_rating, reviewCount: answer.trustedpros_reviews },
    bbb: { rating: answer.bbb_rating }
  };
}
