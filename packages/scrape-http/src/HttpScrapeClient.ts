import { z } from 'zod';
import type { PageScraper, ScrapeRequest, ScrapeResult } from '@enrich/core';
import { fetch as undiciFetch } from 'undici';

const ScrapeDataSchema = z
  .object({
    markdown: z.string().nullish(),
    json: z.record(z.string(), z.unknown()).nullish(),
    extract: z.record(z.string(), z.unknown()).nullish()
  })
  .passthrough();

const ScrapeResponseSchema = z
  .object({
    success: z.boolean().optional(),
    data: z.unknown()
  })
  .passthrough();

const CreditsSchema = z.object({
  data: z.object({
    metadata: z.object({
      creditsUsed: z.number().finite().nonnegative()
    })
  })
});

export class ScrapeRequestError extends Error {
  public readonly url: string;
  public readonly status: number;
  public readonly body: string;

  constructor(url: string, status: number, body: string) {
    super(`Scrape of ${url} failed with ${status}`);
    this.name = 'ScrapeRequestError';
    this.url = url;
    this.status = status;
    this.body = body;
  }
}

export interface HttpScrapeClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

/** Client for a Firecrawl-compatible `/scrape` endpoint. */
export class HttpScrapeClient implements PageScraper {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly headers: Record<string, string>;

  constructor(options: HttpScrapeClientOptions) {
    if (!options.apiKey) {
      throw new Error('FIRECRAWL_API_KEY must be configured');
    }

    this.baseUrl = (options.baseUrl ?? 'https://api.firecrawl.dev/v2').replace(/\/$/, '');
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.fetchImpl =
      options.fetchImpl ??
      (typeof fetch === 'function' ? fetch : ((undiciFetch as unknown) as typeof fetch));
    this.headers = {
      'content-type': 'application/json',
      Accept: 'application/json',
      Authorization: `Bearer ${options.apiKey}`
    };
  }

  async scrape(request: ScrapeRequest): Promise<ScrapeResult> {
    const formats = request.prompt ? [{ type: 'json', prompt: request.prompt }] : ['markdown'];
    const response = await this.fetchImpl(`${this.baseUrl}/scrape`, {
      method: 'POST',
      headers: { ...this.headers },
      body: JSON.stringify({ url: request.url, formats }),
      signal: AbortSignal.timeout(this.timeoutMs)
    });

    if (response.status < 200 || response.status >= 300) {
      const payload = await response.text();
      throw new ScrapeRequestError(request.url, response.status, payload.slice(0, 500));
    }

    // billed call: always resolves, whatever the body holds
    const body: unknown = await response.json().catch(() => null);
    const parsed = ScrapeResponseSchema.safeParse(body);
    const data =
      parsed.success && parsed.data.success !== false ? ScrapeDataSchema.safeParse(parsed.data.data) : null;
    const page = data?.success ? data.data : null;
    const json = page?.json ?? page?.extract ?? null;

    return {
      json: json && Object.keys(json).length > 0 ? json : null,
      markdown: page?.markdown || null,
      creditsUsed: reportedCredits(body)
    };
  }
}

function reportedCredits(body: unknown): number | undefined {
  const parsed = CreditsSchema.safeParse(body);
  return parsed.success ? Math.ceil(parsed.data.data.metadata.creditsUsed) : undefined;
}
