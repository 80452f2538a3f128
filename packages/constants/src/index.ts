export * from './dismissal.constants.js';
export * from './phase.constants.js';
export * from './report.constants.js';
