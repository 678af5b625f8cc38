// Job lifecycle vocabulary shared by snapshot and streaming jobs.
// State strings are the wire values reported by the API.

export const JOB_CREATED = 'JOB_CREATED';
export const JOB_QUEUED = 'JOB_QUEUED';
export const JOB_STATE_PENDING = 'JOB_STATE_PENDING';
export const JOB_VALIDATING = 'JOB_VALIDATING';
export const JOB_STATE_VALIDATING = 'JOB_STATE_VALIDATING';
export const JOB_STATE_RUNNING = 'JOB_STATE_RUNNING';
export const JOB_STATE_DONE = 'JOB_STATE_DONE';
export const JOB_STATE_FAILED = 'JOB_STATE_FAILED';
export const JOB_STATE_CANCELLED = 'JOB_STATE_CANCELLED';

export const JOB_STATES = [
  JOB_CREATED,
  JOB_QUEUED,
  JOB_STATE_PENDING,
  JOB_VALIDATING,
  JOB_STATE_VALIDATING,
  JOB_STATE_RUNNING,
  JOB_STATE_DONE,
  JOB_STATE_FAILED,
  JOB_STATE_CANCELLED,
] as const;

export type JobState = (typeof JOB_STATES)[number];

export type JobStateClass = 'success' | 'failure' | 'in-flight';

/** The states a job can reach successfully: DONE for snapshots, RUNNING for streams. */
export type SuccessState = typeof JOB_STATE_DONE | typeof JOB_STATE_RUNNING;

export const FAILURE_STATES: readonly JobState[] = [JOB_STATE_FAILED, JOB_STATE_CANCELLED];

export function isJobState(value: string): value is JobState {
  return JOB_STATES.some((state) => state === value);
}

// classifyJobState.declaration()
export function classifyJobState(
  state: JobState,
  successState: SuccessState = JOB_STATE_DONE,
): JobStateClass {
  if (state === successState) return 'success';
  if (FAILURE_STATES.includes(state)) return 'failure';
  return 'in-flight';
}

export function isTerminalState(state: JobState, successState: SuccessState = JOB_STATE_DONE): boolean {
  return classifyJobState(state, successState) !== 'in-flight';
}

export interface JobHandle {
  readonly id: string;
  readonly link: string;
}

export interface JobErrorDetail {
  title: string;
  detail: string;
}

export interface JobStatus<TResult> {
  state: JobState;
  errors?: JobErrorDetail[];
  /** Set only when `state` is the job kind's success state. */
  result?: TResult;
}

export type JobOutcome<TResult> =
  | { ok: true; handle: JobHandle; status: JobStatus<TResult>; result: TResult }
  | { ok: false; handle: JobHandle; status: JobStatus<TResult> };

export type FailurePolicy = 'raise' | 'return';

export type ExtractionFileFormat = 'avro' | 'json' | 'csv';

export interface SubscriptionRef {
  id: string;
  shortId: string;
}

export function createJobHandle(id: string, link: string): JobHandle {
  return Object.freeze({ id, link });
}
