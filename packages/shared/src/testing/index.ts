/**
 * Shared test utilities and mock factories for the inventory packages.
 */

export * from './factories.js';
export * from './mocks.js';
