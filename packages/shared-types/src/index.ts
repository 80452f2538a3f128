export * from './match.types.js';
export * from './stats.types.js';
export * from './report.types.js';
