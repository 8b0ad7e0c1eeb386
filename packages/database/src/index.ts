export * from './client.js';
export * from './migrate.js';
export * from './queries/dimensions.js';
export * from './queries/items.js';
export * from './queries/pricing.js';
export * from './queries/reports.js';
