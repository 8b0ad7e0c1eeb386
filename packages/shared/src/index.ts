export * from './types/index.js';
export * from './constants.js';
export * from './utils/dates.js';
export * from './utils/env.js';
export * from './utils/errors.js';
export * from './utils/logger.js';
export * from './utils/money.js';
