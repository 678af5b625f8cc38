// Generic job lifecycle: submit, poll at a fixed interval until a terminal
// state, then either fail or hand back the materialized result.
//
// One engine serves every job kind; a JobKind supplies the endpoints, the
// success state, the failure policy and the materializer.

import { setTimeout as delay } from 'node:timers/promises';

import {
  BadRequestError,
  InvalidArgumentError,
  InvalidQueryError,
  JobFailedError,
  JobNotFoundError,
  NotSubmittedError,
  PollingAbortedError,
  PollingTimeoutError,
  UnexpectedJobStateError,
  UnexpectedResponseError,
  classifyJobState,
  createJobHandle,
  isJobState,
  type FailurePolicy,
  type JobHandle,
  type JobOutcome,
  type JobStatus,
} from '@factiva-analytics/contracts';

import { DEFAULT_POLL_INTERVAL_MS } from '../constants.js';
import type { JobTransport } from '../http/transport.js';
import { type Logger, createJobLogger } from '../logger.js';
import type { JobKind } from './kinds.js';
import { firstErrorDetail, parseEnvelope, readErrors } from './response-schema.js';

/** Anything that can produce a request payload. The engine never looks inside. */
export interface JobQuery {
  toPayload(): unknown;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface ProcessJobOptions<TResult> {
  pollIntervalMs?: number;
  /** Give up after this many in-flight polls. 0 or undefined: no limit. */
  maxPolls?: number;
  /** Wall-clock budget for the polling phase. 0 or undefined: no deadline. */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Overrides the kind's default failure policy. */
  failurePolicy?: FailurePolicy;
  sleep?: SleepFn;
  now?: () => number;
  logger?: Logger;
  onStatus?: (status: JobStatus<TResult>, handle: JobHandle) => void;
}

const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, signal ? { signal } : undefined);
};

export async function submitJob<TResult>(
  transport: JobTransport,
  kind: JobKind<TResult>,
  query: JobQuery | null | undefined,
  logger?: Logger,
): Promise<JobHandle> {
  if (!query) {
    throw new InvalidArgumentError('a query is needed to submit a job');
  }
  const log = createJobLogger(kind.name, undefined, logger);

  const response = await transport.submit(kind.submitPath, query.toPayload(), kind.submitHeaders);

  if (response.statusCode === 201) {
    const envelope = parseEnvelope(response.body, response.statusCode);
    const id = envelope.data.id;
    const handle = createJobHandle(id, envelope.links?.self ?? kind.pollPath(id));
    log.info('Job submitted', { jobId: handle.id });
    return handle;
  }
  if (response.statusCode === 400) {
    throw new InvalidQueryError(firstErrorDetail(response.body) ?? (response.text || 'HTTP 400'));
  }
  throw new UnexpectedResponseError(response.statusCode, response.text || undefined);
}

export async function pollJob<TResult>(
  transport: JobTransport,
  kind: JobKind<TResult>,
  handle: JobHandle | null | undefined,
): Promise<JobStatus<TResult>> {
  if (!handle || !handle.link) {
    throw new NotSubmittedError();
  }

  const response = await transport.poll(handle.link);

  switch (response.statusCode) {
    case 200:
      break;
    case 404:
      throw new JobNotFoundError(handle.id);
    case 400:
      throw new BadRequestError(firstErrorDetail(response.body) ?? (response.text || 'HTTP 400'));
    default:
      throw new UnexpectedResponseError(
        response.statusCode,
        firstErrorDetail(response.body) ?? (response.text || undefined),
      );
  }

  const envelope = parseEnvelope(response.body, response.statusCode);
  const rawState = envelope.data.attributes[kind.stateAttribute];
  if (typeof rawState !== 'string' || !isJobState(rawState)) {
    throw new UnexpectedJobStateError(String(rawState), handle.id);
  }

  const status: JobStatus<TResult> = { state: rawState };
  const errors = readErrors(response.body);
  if (errors) status.errors = errors;
  if (classifyJobState(rawState, kind.successState) === 'success') {
    status.result = kind.materialize(envelope);
  }
  return status;
}

/**
 * Polls an already-submitted job until it reaches a terminal state.
 * Each in-flight poll is followed by exactly one sleep.
 */
export async function waitForJob<TResult>(
  transport: JobTransport,
  kind: JobKind<TResult>,
  handle: JobHandle,
  options: ProcessJobOptions<TResult> = {},
): Promise<JobOutcome<TResult>> {
  const log = createJobLogger(kind.name, handle.id, options.logger);
  const intervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const maxPolls = options.maxPolls ?? 0;
  const timeoutMs = options.timeoutMs ?? 0;
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? Date.now;
  const failurePolicy = options.failurePolicy ?? kind.failurePolicy;
  const startedAt = now();

  let inFlightPolls = 0;
  let status = await pollJob(transport, kind, handle);
  options.onStatus?.(status, handle);
  log.debug('Job state polled', { state: status.state });

  while (classifyJobState(status.state, kind.successState) === 'in-flight') {
    inFlightPolls += 1;
    if (maxPolls > 0 && inFlightPolls >= maxPolls) {
      throw new PollingTimeoutError(handle.id, inFlightPolls, `still ${status.state} after ${inFlightPolls} polls`);
    }
    if (timeoutMs > 0 && now() - startedAt >= timeoutMs) {
      throw new PollingTimeoutError(handle.id, inFlightPolls, `still ${status.state} after ${timeoutMs}ms`);
    }
    if (options.signal?.aborted) {
      throw new PollingAbortedError(handle.id, { cause: options.signal.reason });
    }

    try {
      await sleep(intervalMs, options.signal);
    } catch (error: unknown) {
      if (options.signal?.aborted) {
        throw new PollingAbortedError(handle.id, { cause: error });
      }
      throw error;
    }

    status = await pollJob(transport, kind, handle);
    options.onStatus?.(status, handle);
    log.debug('Job state polled', { state: status.state });
  }

  if (status.result !== undefined) {
    log.info('Job completed', { state: status.state, polls: inFlightPolls + 1 });
    return { ok: true, handle, status, result: status.result };
  }

  if (classifyJobState(status.state, kind.successState) === 'success') {
    throw new UnexpectedResponseError(200, `job ${handle.id} reached ${status.state} without a result`);
  }

  if (failurePolicy === 'raise') {
    log.error('Job failed', { state: status.state, errors: status.errors });
    throw new JobFailedError(handle.id, status.state, status.errors ?? []);
  }
  log.warn('Job ended without a result', { state: status.state, errors: status.errors });
  return { ok: false, handle, status };
}

export async function processJob<TResult>(
  transport: JobTransport,
  kind: JobKind<TResult>,
  query: JobQuery | null | undefined,
  options: ProcessJobOptions<TResult> = {},
): Promise<JobOutcome<TResult>> {
  const handle = await submitJob(transport, kind, query, options.logger);
  return waitForJob(transport, kind, handle, options);
}
