export * from './jobs.js';
export * from './errors.js';
