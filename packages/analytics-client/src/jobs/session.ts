import {
  InvalidArgumentError,
  createJobHandle,
  type JobHandle,
  type JobOutcome,
  type JobStatus,
} from '@factiva-analytics/contracts';

import { type CredentialProvider, UserKey } from '../auth/credentials.js';
import { type ClientConfig, loadClientConfig } from '../config.js';
import { type JobTransport, createHttpTransport } from '../http/transport.js';
import { type Logger, createJobLogger } from '../logger.js';
import {
  type JobQuery,
  type ProcessJobOptions,
  pollJob,
  submitJob,
  waitForJob,
} from './engine.js';
import type { JobKind } from './kinds.js';

export interface JobSessionOptions<TQuery> {
  /** Defaults to a `UserKey` read from the environment. */
  credential?: CredentialProvider;
  transport?: JobTransport;
  config?: ClientConfig;
  logger?: Logger;
  query?: TQuery;
  /** Resume an existing job instead of submitting a new one. */
  jobId?: string;
}

/**
 * Stateful wrapper around the job engine for one job kind. Holds the query,
 * the handle once submitted (or resumed) and the last polled status.
 */
export abstract class JobSession<TResult, TQuery extends JobQuery> {
  readonly credential: CredentialProvider;
  readonly transport: JobTransport;
  readonly config: ClientConfig;
  query?: TQuery;
  handle?: JobHandle;
  status?: JobStatus<TResult>;

  protected readonly kind: JobKind<TResult>;
  protected readonly log: Logger;
  private readonly parentLogger?: Logger;

  /**
   * `defaultQuery` builds the query from `config.defaultWhere` (FACTIVA_WHERE)
   * when neither a query nor a job id is given.
   */
  protected constructor(
    kind: JobKind<TResult>,
    options: JobSessionOptions<TQuery>,
    defaultQuery?: (where: string) => TQuery,
  ) {
    if (options.query && options.jobId) {
      throw new InvalidArgumentError('query and jobId cannot be used at the same time');
    }
    this.kind = kind;
    this.config = options.config ?? loadClientConfig();
    this.credential = options.credential ?? new UserKey(this.config.userKey);
    this.transport = options.transport ?? createHttpTransport(this.credential, this.config, options.logger);
    this.parentLogger = options.logger;
    this.log = createJobLogger(kind.name, undefined, options.logger);
    const defaultWhere = this.config.defaultWhere;
    this.query =
      options.query ??
      (options.jobId === undefined && defaultWhere && defaultQuery ? defaultQuery(defaultWhere) : undefined);
  }

  get result(): TResult | undefined {
    return this.status?.result;
  }

  /** Binds this session to a job that was submitted elsewhere. */
  protected resume(jobId: string): JobHandle {
    this.handle = createJobHandle(jobId, this.kind.pollPath(jobId));
    this.log.info('Job resumed', { jobId });
    return this.handle;
  }

  async submitJob(): Promise<JobHandle> {
    this.status = undefined;
    this.handle = await submitJob(this.transport, this.kind, this.query, this.parentLogger);
    return this.handle;
  }

  /** Polls once and stores the status. */
  async getJobResponse(): Promise<JobStatus<TResult>> {
    this.status = await pollJob(this.transport, this.kind, this.handle);
    return this.status;
  }

  /**
   * Submits the query and waits for a terminal state. A resumed session
   * without a query only waits; a session with neither fails the submission.
   */
  async processJob(options: ProcessJobOptions<TResult> = {}): Promise<JobOutcome<TResult>> {
    const handle = this.query || !this.handle ? await this.submitJob() : this.handle;

    const outcome = await waitForJob(this.transport, this.kind, handle, {
      pollIntervalMs: this.config.polling.intervalMs,
      maxPolls: this.config.polling.maxPolls,
      timeoutMs: this.config.polling.timeoutMs,
      logger: this.parentLogger,
      ...options,
      onStatus: (status, current) => {
        this.status = status;
        options.onStatus?.(status, current);
      },
    });
    this.status = outcome.status;
    return outcome;
  }
}
