export * from './fetcher';
export * from './providers';
