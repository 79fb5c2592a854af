export * from './PostgrestProviderRepo';
