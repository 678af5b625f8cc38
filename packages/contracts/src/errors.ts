import type { JobErrorDetail } from './jobs.js';

export class FactivaError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export class ConfigurationError extends FactivaError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * A required argument is missing, malformed, or conflicts with another one
 * (for example a query and a job id passed together).
 */
export class InvalidArgumentError extends FactivaError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

// HTTP-level failures. `detail` is the server-provided text when there is one.
export class ApiError extends FactivaError {
  readonly status: number;
  readonly detail: string | undefined;

  constructor(message: string, status: number, detail?: string, options?: ErrorOptions) {
    super(message, options);
    this.status = status;
    this.detail = detail;
  }
}

export class InvalidQueryError extends ApiError {
  constructor(detail: string, options?: ErrorOptions) {
    super(`Invalid query: ${detail}`, 400, detail, options);
  }
}

export class BadRequestError extends ApiError {
  constructor(detail: string, options?: ErrorOptions) {
    super(`Bad request: ${detail}`, 400, detail, options);
  }
}

export class AccessDeniedError extends ApiError {
  constructor(detail?: string, options?: ErrorOptions) {
    super('Factiva user key does not exist or is inactive', 403, detail, options);
  }
}

export class JobNotFoundError extends ApiError {
  readonly jobId: string;

  constructor(jobId: string, options?: ErrorOptions) {
    super(`Job ${jobId} does not exist for the provided credentials`, 404, undefined, options);
    this.jobId = jobId;
  }
}

export class UnexpectedResponseError extends ApiError {
  constructor(status: number, detail?: string, options?: ErrorOptions) {
    super(
      detail
        ? `API request returned an unexpected HTTP status ${status}: ${detail}`
        : `API request returned an unexpected HTTP status ${status}`,
      status,
      detail,
      options,
    );
  }
}

// Lifecycle failures tied to one job.
export class JobError extends FactivaError {
  readonly jobId: string | undefined;

  constructor(message: string, jobId?: string, options?: ErrorOptions) {
    super(message, options);
    this.jobId = jobId;
  }
}

export class JobFailedError extends JobError {
  readonly state: string;
  readonly errors: JobErrorDetail[];

  constructor(jobId: string, state: string, errors: JobErrorDetail[] = [], options?: ErrorOptions) {
    const reasons = errors.map((err) => `${err.title}: ${err.detail}`).join('; ');
    super(
      reasons ? `Job ${jobId} ended in ${state} (${reasons})` : `Job ${jobId} ended in ${state}`,
      jobId,
      options,
    );
    this.state = state;
    this.errors = errors;
  }
}

export class UnexpectedJobStateError extends JobError {
  readonly state: string;

  constructor(state: string, jobId?: string, options?: ErrorOptions) {
    super(`Unexpected job state: ${state}`, jobId, options);
    this.state = state;
  }
}

export class NotSubmittedError extends JobError {
  constructor(message = 'Job has not yet been submitted or the job id was not set', options?: ErrorOptions) {
    super(message, undefined, options);
  }
}

export class NoFilesAvailableError extends JobError {
  constructor(jobId?: string, options?: ErrorOptions) {
    super('No files available for download', jobId, options);
  }
}

export class PollingTimeoutError extends JobError {
  readonly polls: number;

  constructor(jobId: string, polls: number, reason: string, options?: ErrorOptions) {
    super(`Job ${jobId} did not reach a terminal state: ${reason}`, jobId, options);
    this.polls = polls;
  }
}

export class PollingAbortedError extends JobError {
  constructor(jobId: string, options?: ErrorOptions) {
    super(`Polling for job ${jobId} was aborted`, jobId, options);
  }
}
