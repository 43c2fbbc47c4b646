export * from './simulation-loader.js';
export * from './task-loader.js';
