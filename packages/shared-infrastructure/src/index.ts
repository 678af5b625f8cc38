/**
 * @factiva-analytics/shared-infrastructure
 *
 * Environment parsing helpers used across the Factiva Analytics packages.
 */

export * from './env/index.js';
