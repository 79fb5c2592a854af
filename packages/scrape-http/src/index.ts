export * from './HttpScrapeClient';
