export interface ScrapeRequest {
  url: string;
  /** When set, the page is scraped into JSON guided by this prompt; otherwise into Markdown. */
  prompt?: string;
}

export interface ScrapeResult {
  json: Record<string, unknown> | null;
  markdown: string | null;
  /** Credits the scraping service reports for the call, when it reports any. */
  creditsUsed?: number;
}

export interface PageScraper {
  scrape(request: ScrapeRequest): Promise<ScrapeResult>;
}
