export * from './OpenAiWebSearchClient';
export * from './OpenAiLicenseClient';
export * from './OpenAiRatingsClient';
export * from './schema';
