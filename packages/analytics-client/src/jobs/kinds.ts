import {
  JOB_STATE_DONE,
  JOB_STATE_RUNNING,
  type FailurePolicy,
  type SuccessState,
} from '@factiva-analytics/contracts';

import {
  ANALYTICS_BASEPATH,
  EXPLAIN_SUFFIX,
  SNAPSHOTS_BASEPATH,
  STREAMS_BASEPATH,
} from '../constants.js';
import {
  type ExplainResult,
  type ExtractionResult,
  type StreamingInstanceResult,
  type TimeSeriesResult,
  materializeExplain,
  materializeExtraction,
  materializeStreamingInstance,
  materializeTimeSeries,
} from './materializers.js';
import type { JobEnvelope } from './response-schema.js';

export type JobKindName = 'explain' | 'extraction' | 'time-series' | 'streaming-instance';

/**
 * Everything that differs between job types. The engine is generic over this.
 */
export interface JobKind<TResult> {
  readonly name: JobKindName;
  readonly submitPath: string;
  readonly submitHeaders?: Record<string, string>;
  /** Attribute holding the wire state. */
  readonly stateAttribute: 'current_state' | 'job_status';
  readonly successState: SuccessState;
  /** What the engine does when the job ends FAILED or CANCELLED. */
  readonly failurePolicy: FailurePolicy;
  /** Poll URL used when the server sends no self link, or when resuming by id. */
  pollPath(jobId: string): string;
  materialize(envelope: JobEnvelope): TResult;
}

export const explainJob: JobKind<ExplainResult> = {
  name: 'explain',
  submitPath: `${SNAPSHOTS_BASEPATH}${EXPLAIN_SUFFIX}`,
  stateAttribute: 'current_state',
  successState: JOB_STATE_DONE,
  failurePolicy: 'return',
  pollPath: (jobId) => `${SNAPSHOTS_BASEPATH}/${jobId}${EXPLAIN_SUFFIX}`,
  materialize: materializeExplain,
};

export const extractionJob: JobKind<ExtractionResult> = {
  name: 'extraction',
  submitPath: SNAPSHOTS_BASEPATH,
  stateAttribute: 'current_state',
  successState: JOB_STATE_DONE,
  failurePolicy: 'raise',
  pollPath: (jobId) => `${SNAPSHOTS_BASEPATH}/${jobId}`,
  materialize: materializeExtraction,
};

export const timeSeriesJob: JobKind<TimeSeriesResult> = {
  name: 'time-series',
  submitPath: ANALYTICS_BASEPATH,
  submitHeaders: { 'X-API-VERSION': '2.0' },
  stateAttribute: 'current_state',
  successState: JOB_STATE_DONE,
  failurePolicy: 'return',
  pollPath: (jobId) => `${ANALYTICS_BASEPATH}/${jobId}`,
  materialize: materializeTimeSeries,
};

// A streaming instance is ready once it is RUNNING; it never reaches DONE.
export const streamingInstanceJob: JobKind<StreamingInstanceResult> = {
  name: 'streaming-instance',
  submitPath: STREAMS_BASEPATH,
  stateAttribute: 'job_status',
  successState: JOB_STATE_RUNNING,
  failurePolicy: 'raise',
  pollPath: (jobId) => `${STREAMS_BASEPATH}/${jobId}`,
  materialize: materializeStreamingInstance,
};

export function withFailurePolicy<TResult>(kind: JobKind<TResult>, failurePolicy: FailurePolicy): JobKind<TResult> {
  return { ...kind, failurePolicy };
}
