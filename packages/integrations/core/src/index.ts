export * from './contracts.js';
export * from './dates.js';
export * from './base-mock-adapter.js';
