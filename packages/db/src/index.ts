export * from './client';
export * from './json';
export * from './migrate';
export * from './schema';
