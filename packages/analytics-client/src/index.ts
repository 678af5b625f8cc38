export * from '@factiva-analytics/contracts';

export {
  Account,
  type AccountOptions,
  type AccountStats,
  type CompanyIdentifier,
  type ExtractionListing,
  type StreamListing,
} from './account/account.js';
export { BearerToken, UserKey, maskSecret, type CredentialProvider } from './auth/credentials.js';
export { loadClientConfig, type ClientConfig } from './config.js';
export * from './constants.js';
export {
  HttpJobTransport,
  createHttpTransport,
  type HttpJobTransportOptions,
  type JobTransport,
  type TransportResponse,
} from './http/transport.js';
export { RETRYABLE_STATUS, isRetryableError, withRetry, type RetryOptions } from './http/retry.js';
export { downloadFiles, fileNameFromUri, type DownloadFilesOptions } from './jobs/download.js';
export {
  pollJob,
  processJob,
  submitJob,
  waitForJob,
  type JobQuery,
  type ProcessJobOptions,
  type SleepFn,
} from './jobs/engine.js';
export {
  explainJob,
  extractionJob,
  streamingInstanceJob,
  timeSeriesJob,
  withFailurePolicy,
  type JobKind,
  type JobKindName,
} from './jobs/kinds.js';
export * from './jobs/materializers.js';
export { JobSession, type JobSessionOptions } from './jobs/session.js';
export {
  createJobLogger,
  createLogger,
  logger,
  wrapPino,
  type LogFields,
  type Logger,
  type LoggerOptions,
} from './logger.js';
export { SnapshotExplain, type SnapshotExplainOptions } from './snapshots/explain.js';
export { SnapshotExtraction, resolveExtractionId, type SnapshotExtractionOptions } from './snapshots/extraction.js';
export * from './snapshots/query.js';
export { SnapshotTimeSeries, type SnapshotTimeSeriesOptions } from './snapshots/time-series.js';
export * from './streams/query.js';
export { StreamingInstance, resolveStreamId, type StreamingInstanceOptions } from './streams/streaming-instance.js';
