export * from './types.js';
export * from './schema.js';
export * from './plan-index.js';
export * from './plan-order.js';
