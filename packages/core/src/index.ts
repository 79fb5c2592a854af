export * from './domain/models';
export * from './domain/extract';
export * from './domain/errors';
export * from './app/SpendGate';
export * from './app/LicenseJob';
export * from './app/RatingsSearchJob';
export * from './app/ScrapedRatingsJob';
export * from './app/HomeStarsJob';
export * from './ports/JobEnvironment';
export * from './ports/LicenseLookup';
export * from './ports/PageScraper';
export * from './ports/ProviderRepo';
export * from './ports/RatingsLookup';
export * from './ports/SpendStore';
