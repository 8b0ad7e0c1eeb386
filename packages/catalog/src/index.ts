export * from './catalog.js';
export * from './import.js';
export * from './normalize.js';
export { saleDetailsSchema, newItemSchema, historicalItemSchema } from './validators.js';
