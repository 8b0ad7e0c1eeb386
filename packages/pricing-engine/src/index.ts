export * from './engine.js';
export * from './percent.js';
