export * from './dimension.js';
export * from './inventory.js';
export * from './pricing.js';
export * from './report.js';
