const LICENSE_PATTERN = /ECRA\/ESA\s*(\d{7})/;

const HOMESTARS_RATING_PATTERNS = [
  /(\d\.\d)\s*out of\s*10/i,
  /rating["\s:]+(\d\.\d)/i,
  /(\d\.\d)\s*\/\s*10/i
];

const HOMESTARS_REVIEW_PATTERNS = [/(\d+)\s+reviews?/i, /(\d+)\s+ratings?/i, /based on\s+(\d+)/i];

export function makeSlug(name: string, city?: string | null): string {
  const text = city ? `${name} ${city}` : name;
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .replace(/[-\s]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Parses JSON that a language model may have wrapped in a Markdown fence or
 * prefixed with a `json` tag. Returns null when nothing parseable remains.
 */
export function parseLooseJson(text: string): unknown {
  let candidate = text.trim();
  if (candidate.startsWith('```')) {
    candidate = candidate.split('\n').slice(1, -1).join('\n');
  }
  if (candidate.startsWith('json')) {
    candidate = candidate.slice(4).trim();
  }

  try {
    return JSON.parse(candidate) as unknown;
  } catch {
    return null;
  }
}

export function findLicenseNumber(text: string): string | null {
  const match = LICENSE_PATTERN.exec(text);
  return match ? `ECRA/ESA ${match[1]}` : null;
}

export interface ExtractedRating {
  rating: number | null;
  reviewCount: number | null;
}

export function extractHomeStarsRating(text: string): ExtractedRating {
  const rating = firstCapture(HOMESTARS_RATING_PATTERNS, text);
  const reviews = firstCapture(HOMESTARS_REVIEW_PATTERNS, text);

  return {
    rating: rating === null ? null : Number.parseFloat(rating),
    reviewCount: reviews === null ? null : Number.parseInt(reviews, 10)
  };
}

function firstCapture(patterns: RegExp[], text: string): string | null {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match?.[1]) {
      return match[1];
    }
  }
  return null;
}

/** Accepts numbers and numeric strings such as "4.5" or "1,204"; anything else is null. */
export function toNumberOrNull(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const parsed = Number.parseFloat(value.replace(/,/g, ''));
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}
