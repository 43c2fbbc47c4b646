export * from './measured.js';
export * from './edit-distance.js';
export * from './tool-match.js';
export * from './per-tool-prf.js';
export * from './tool-criticality.js';
export * from './sequence-compliance.js';
export * from './stats.js';
export * from './pass-at-1.js';
export * from './calculator.js';
