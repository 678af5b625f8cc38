import { describe, expect, it, vi } from 'vitest';

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
  createJobHandle,
} from '@factiva-analytics/contracts';

import { type SleepFn, pollJob, processJob, submitJob, waitForJob } from '../src/jobs/engine.js';
import {
  explainJob,
  extractionJob,
  streamingInstanceJob,
  timeSeriesJob,
  withFailurePolicy,
} from '../src/jobs/kinds.js';
import {
  ScriptedTransport,
  jsonResponse,
  silentLogger,
  snapshotState,
  streamState,
  submitted,
} from './helpers.js';

const query = { toPayload: () => ({ query: { where: "language_code = 'en'" } }) };

const noSleep = () => vi.fn<SleepFn>().mockResolvedValue(undefined);

describe('jobs/engine - submitJob', () => {
  /**
   * Intent:
   * - A 201 yields a frozen handle whose id and link come from the same response.
   * - Rejections map to typed errors and are never retried.
   */

  it('builds the handle from data.id and links.self', async () => {
    const transport = new ScriptedTransport();
    transport.submit.mockResolvedValueOnce(submitted('abc-123', 'https://api/x/abc-123'));

    const handle = await submitJob(transport, explainJob, query, silentLogger);

    expect(handle).toEqual({ id: 'abc-123', link: 'https://api/x/abc-123' });
    expect(Object.isFrozen(handle)).toBe(true);
    expect(transport.submit).toHaveBeenCalledWith(
      '/alpha/extractions/documents/_explain',
      { query: { where: "language_code = 'en'" } },
      undefined,
    );
  });

  it('falls back to the kind poll path when the server sends no self link', async () => {
    const transport = new ScriptedTransport();
    transport.submit.mockResolvedValueOnce(submitted('abc-123'));

    const handle = await submitJob(transport, explainJob, query, silentLogger);

    expect(handle.link).toBe('/alpha/extractions/documents/abc-123/_explain');
  });

  it('sends the API version header for time-series jobs', async () => {
    const transport = new ScriptedTransport();
    transport.submit.mockResolvedValueOnce(submitted('ts-1', 'https://api/ts-1'));

    await submitJob(transport, timeSeriesJob, query, silentLogger);

    expect(transport.submit).toHaveBeenCalledWith('/alpha/analytics', expect.any(Object), {
      'X-API-VERSION': '2.0',
    });
  });

  it('rejects a missing query before any request', async () => {
    const transport = new ScriptedTransport();

    await expect(submitJob(transport, extractionJob, undefined, silentLogger)).rejects.toThrow(
      new InvalidArgumentError('a query is needed to submit a job'),
    );
    expect(transport.submit).not.toHaveBeenCalled();
  });

  it('maps 400 to InvalidQueryError carrying the first server detail', async () => {
    const transport = new ScriptedTransport();
    transport.submit.mockResolvedValueOnce(
      jsonResponse(400, { errors: [{ title: 'invalidQuery', detail: 'bad field' }] }),
    );

    const promise = submitJob(transport, explainJob, query, silentLogger);

    await expect(promise).rejects.toBeInstanceOf(InvalidQueryError);
    await expect(promise).rejects.toMatchObject({ detail: 'bad field', message: 'Invalid query: bad field' });
  });

  it('uses the raw body text when a 400 carries no error detail', async () => {
    const transport = new ScriptedTransport();
    transport.submit.mockResolvedValueOnce({ statusCode: 400, body: undefined, text: 'nope' });

    await expect(submitJob(transport, explainJob, query, silentLogger)).rejects.toMatchObject({
      name: 'InvalidQueryError',
      detail: 'nope',
    });
  });

  it('maps any other status to UnexpectedResponseError without retrying', async () => {
    const transport = new ScriptedTransport();
    transport.submit.mockResolvedValueOnce({ statusCode: 503, body: undefined, text: 'unavailable' });

    await expect(submitJob(transport, explainJob, query, silentLogger)).rejects.toMatchObject({
      name: 'UnexpectedResponseError',
      status: 503,
      detail: 'unavailable',
    });
    expect(transport.submit).toHaveBeenCalledTimes(1);
  });

  it('rejects a 201 whose body has no job id', async () => {
    const transport = new ScriptedTransport();
    transport.submit.mockResolvedValueOnce(jsonResponse(201, { data: {} }));

    await expect(submitJob(transport, explainJob, query, silentLogger)).rejects.toBeInstanceOf(
      UnexpectedResponseError,
    );
  });
});

describe('jobs/engine - pollJob', () => {
  const handle = createJobHandle('job-1', 'https://api/job-1');

  it('refuses to poll without a handle or link', async () => {
    const transport = new ScriptedTransport();

    await expect(pollJob(transport, explainJob, undefined)).rejects.toBeInstanceOf(NotSubmittedError);
    await expect(pollJob(transport, explainJob, createJobHandle('job-1', ''))).rejects.toBeInstanceOf(
      NotSubmittedError,
    );
    expect(transport.poll).not.toHaveBeenCalled();
  });

  it('materializes the result only on the success state', async () => {
    const transport = new ScriptedTransport().pollReturns(
      snapshotState('job-1', 'JOB_STATE_RUNNING', { counts: 12 }),
      snapshotState('job-1', 'JOB_STATE_DONE', { counts: 12 }),
    );

    const running = await pollJob(transport, explainJob, handle);
    const done = await pollJob(transport, explainJob, handle);

    expect(running).toEqual({ state: 'JOB_STATE_RUNNING' });
    expect(done).toEqual({ state: 'JOB_STATE_DONE', result: { volumeEstimate: 12 } });
    expect(transport.poll).toHaveBeenCalledWith('https://api/job-1');
  });

  it('carries server errors whatever the state', async () => {
    const transport = new ScriptedTransport().pollReturns(
      snapshotState('job-1', 'JOB_STATE_RUNNING', {}, [{ title: 'Warning', detail: 'slow source' }]),
    );

    const status = await pollJob(transport, explainJob, handle);

    expect(status.errors).toEqual([{ title: 'Warning', detail: 'slow source' }]);
  });

  it('maps 404, 400 and other statuses to typed errors', async () => {
    const transport = new ScriptedTransport().pollReturns(
      jsonResponse(404),
      jsonResponse(400, { errors: [{ title: 'badRequest', detail: 'bad id' }] }),
      jsonResponse(500, { errors: [{ title: 'server', detail: 'boom' }] }),
    );

    await expect(pollJob(transport, explainJob, handle)).rejects.toBeInstanceOf(JobNotFoundError);
    await expect(pollJob(transport, explainJob, handle)).rejects.toMatchObject({
      name: 'BadRequestError',
      detail: 'bad id',
    });
    await expect(pollJob(transport, explainJob, handle)).rejects.toMatchObject({
      name: 'UnexpectedResponseError',
      status: 500,
      detail: 'boom',
    });
  });

  it('reads job_status for streaming instances', async () => {
    const transport = new ScriptedTransport().pollReturns(
      streamState('dj-synhub-stream-key-abcdefghij', 'JOB_STATE_RUNNING', [
        'streams/dj-synhub-stream-key-abcdefghij-filtered-0aB1c2',
      ]),
    );

    const status = await pollJob(transport, streamingInstanceJob, handle);

    expect(status).toEqual({
      state: 'JOB_STATE_RUNNING',
      result: {
        subscriptions: [{ id: 'dj-synhub-stream-key-abcdefghij-filtered-0aB1c2', shortId: '0aB1c2' }],
      },
    });
  });
});

describe('jobs/engine - processJob', () => {
  /**
   * Intent:
   * - Exactly one sleep per in-flight poll; terminal states end the loop.
   * - Failure handling follows the kind's policy unless overridden.
   * - Unknown states and bounds stop the loop immediately.
   */

  it('sleeps once between a running and a done poll and returns the estimate', async () => {
    const transport = new ScriptedTransport().pollReturns(
      snapshotState('abc-123', 'JOB_STATE_RUNNING'),
      snapshotState('abc-123', 'JOB_STATE_DONE', { counts: 4500 }),
    );
    transport.submit.mockResolvedValueOnce(submitted('abc-123', 'https://api/x/abc-123'));
    const sleep = noSleep();

    const outcome = await processJob(transport, explainJob, query, { sleep, logger: silentLogger });

    expect(outcome.ok).toBe(true);
    expect(outcome.ok && outcome.result).toEqual({ volumeEstimate: 4500 });
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(10_000, undefined);
  });

  it('performs exactly N sleeps for N in-flight polls', async () => {
    const transport = new ScriptedTransport().pollReturns(
      snapshotState('job-1', 'JOB_CREATED'),
      snapshotState('job-1', 'JOB_QUEUED'),
      snapshotState('job-1', 'JOB_STATE_VALIDATING'),
      snapshotState('job-1', 'JOB_STATE_DONE', { files: [{ uri: 'gs://bucket/part-0.avro' }] }),
    );
    transport.submit.mockResolvedValueOnce(submitted('job-1', 'https://api/job-1'));
    const sleep = noSleep();
    const seen: string[] = [];

    const outcome = await processJob(transport, extractionJob, query, {
      sleep,
      pollIntervalMs: 5,
      logger: silentLogger,
      onStatus: (status) => seen.push(status.state),
    });

    expect(sleep).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledWith(5, undefined);
    expect(transport.poll).toHaveBeenCalledTimes(4);
    expect(seen).toEqual(['JOB_CREATED', 'JOB_QUEUED', 'JOB_STATE_VALIDATING', 'JOB_STATE_DONE']);
    expect(outcome.ok && outcome.result).toEqual({ files: ['gs://bucket/part-0.avro'] });
  });

  it('raises JobFailedError for a cancelled extraction', async () => {
    const transport = new ScriptedTransport().pollReturns(snapshotState('job-1', 'JOB_STATE_CANCELLED'));
    transport.submit.mockResolvedValueOnce(submitted('job-1', 'https://api/job-1'));

    const promise = processJob(transport, extractionJob, query, { sleep: noSleep(), logger: silentLogger });

    await expect(promise).rejects.toBeInstanceOf(JobFailedError);
    await expect(promise).rejects.toMatchObject({ jobId: 'job-1', state: 'JOB_STATE_CANCELLED' });
  });

  it('returns a cancelled explain job for the caller to inspect', async () => {
    const transport = new ScriptedTransport().pollReturns(snapshotState('job-1', 'JOB_STATE_CANCELLED'));
    transport.submit.mockResolvedValueOnce(submitted('job-1', 'https://api/job-1'));
    const sleep = noSleep();

    const outcome = await processJob(transport, explainJob, query, { sleep, logger: silentLogger });

    expect(outcome.ok).toBe(false);
    expect(outcome.status.state).toBe('JOB_STATE_CANCELLED');
    expect(sleep).not.toHaveBeenCalled();
  });

  it('includes server errors in the failure message', async () => {
    const transport = new ScriptedTransport().pollReturns(
      snapshotState('job-1', 'JOB_STATE_FAILED', {}, [{ title: 'Failure', detail: 'quota exceeded' }]),
    );
    transport.submit.mockResolvedValueOnce(submitted('job-1', 'https://api/job-1'));

    await expect(
      processJob(transport, extractionJob, query, { sleep: noSleep(), logger: silentLogger }),
    ).rejects.toThrow('Job job-1 ended in JOB_STATE_FAILED (Failure: quota exceeded)');
  });

  it('lets the caller override the failure policy', async () => {
    const raising = new ScriptedTransport().pollReturns(snapshotState('job-1', 'JOB_STATE_FAILED'));
    raising.submit.mockResolvedValueOnce(submitted('job-1', 'https://api/job-1'));
    const returning = new ScriptedTransport().pollReturns(snapshotState('job-2', 'JOB_STATE_FAILED'));
    returning.submit.mockResolvedValueOnce(submitted('job-2', 'https://api/job-2'));

    await expect(
      processJob(raising, explainJob, query, { failurePolicy: 'raise', sleep: noSleep(), logger: silentLogger }),
    ).rejects.toBeInstanceOf(JobFailedError);

    const outcome = await processJob(returning, withFailurePolicy(extractionJob, 'return'), query, {
      sleep: noSleep(),
      logger: silentLogger,
    });
    expect(outcome).toMatchObject({ ok: false, status: { state: 'JOB_STATE_FAILED' } });
  });

  it('aborts on an unknown state without sleeping', async () => {
    const transport = new ScriptedTransport().pollReturns(snapshotState('job-1', 'JOB_STATE_WEIRD'));
    transport.submit.mockResolvedValueOnce(submitted('job-1', 'https://api/job-1'));
    const sleep = noSleep();

    await expect(
      processJob(transport, explainJob, query, { sleep, logger: silentLogger }),
    ).rejects.toMatchObject({ name: 'UnexpectedJobStateError', state: 'JOB_STATE_WEIRD', jobId: 'job-1' });
    expect(sleep).not.toHaveBeenCalled();
    expect(transport.poll).toHaveBeenCalledTimes(1);
  });

  it('stops polling once an unknown state shows up mid-flight', async () => {
    const transport = new ScriptedTransport().pollReturns(
      snapshotState('job-1', 'JOB_STATE_RUNNING'),
      snapshotState('job-1', 'JOB_STATE_WEIRD'),
      snapshotState('job-1', 'JOB_STATE_DONE', { counts: 1 }),
    );
    const sleep = noSleep();

    await expect(
      waitForJob(transport, explainJob, createJobHandle('job-1', 'https://api/job-1'), {
        sleep,
        logger: silentLogger,
      }),
    ).rejects.toBeInstanceOf(UnexpectedJobStateError);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(transport.poll).toHaveBeenCalledTimes(2);
  });

  it('treats DONE as in flight and RUNNING as ready for streaming instances', async () => {
    const transport = new ScriptedTransport().pollReturns(
      streamState('dj-synhub-stream-key-abcdefghij', 'JOB_STATE_DONE'),
      streamState('dj-synhub-stream-key-abcdefghij', 'JOB_STATE_RUNNING', ['dj-synhub-stream-key-abcdefghij-a1']),
    );
    transport.submit.mockResolvedValueOnce(submitted('dj-synhub-stream-key-abcdefghij'));
    const sleep = noSleep();

    const outcome = await processJob(transport, streamingInstanceJob, query, { sleep, logger: silentLogger });

    expect(sleep).toHaveBeenCalledTimes(1);
    expect(transport.poll).toHaveBeenCalledWith('/alpha/streams/dj-synhub-stream-key-abcdefghij');
    expect(outcome.ok && outcome.result.subscriptions).toEqual([
      { id: 'dj-synhub-stream-key-abcdefghij-a1', shortId: 'a1' },
    ]);
  });
});

describe('jobs/engine - polling bounds', () => {
  const handle = createJobHandle('job-1', 'https://api/job-1');

  it('gives up after maxPolls in-flight polls', async () => {
    const transport = new ScriptedTransport();
    transport.poll.mockResolvedValue(snapshotState('job-1', 'JOB_STATE_RUNNING'));
    const sleep = noSleep();

    await expect(
      waitForJob(transport, explainJob, handle, { maxPolls: 2, sleep, logger: silentLogger }),
    ).rejects.toMatchObject({ name: 'PollingTimeoutError', polls: 2 });
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(transport.poll).toHaveBeenCalledTimes(2);
  });

  it('gives up once the wall-clock deadline has passed', async () => {
    const transport = new ScriptedTransport();
    transport.poll.mockResolvedValue(snapshotState('job-1', 'JOB_STATE_RUNNING'));
    let clock = 0;
    const sleep = vi.fn<SleepFn>(async () => {
      clock += 1000;
    });

    const promise = waitForJob(transport, explainJob, handle, {
      timeoutMs: 2500,
      sleep,
      now: () => clock,
      logger: silentLogger,
    });

    await expect(promise).rejects.toBeInstanceOf(PollingTimeoutError);
    await expect(promise).rejects.toThrow(
      'Job job-1 did not reach a terminal state: still JOB_STATE_RUNNING after 2500ms',
    );
    expect(sleep).toHaveBeenCalledTimes(3);
  });

  it('stops before the next poll when the signal is aborted', async () => {
    const transport = new ScriptedTransport();
    transport.poll.mockResolvedValue(snapshotState('job-1', 'JOB_STATE_RUNNING'));
    const controller = new AbortController();
    const sleep = vi.fn<SleepFn>(async () => {
      controller.abort();
    });

    await expect(
      waitForJob(transport, explainJob, handle, { signal: controller.signal, sleep, logger: silentLogger }),
    ).rejects.toBeInstanceOf(PollingAbortedError);
    expect(transport.poll).toHaveBeenCalledTimes(2);
  });

  it('interrupts the default sleep when the signal is aborted', async () => {
    const transport = new ScriptedTransport();
    transport.poll.mockResolvedValue(snapshotState('job-1', 'JOB_STATE_RUNNING'));
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    await expect(
      waitForJob(transport, explainJob, handle, {
        pollIntervalMs: 60_000,
        signal: controller.signal,
        logger: silentLogger,
      }),
    ).rejects.toBeInstanceOf(PollingAbortedError);
    expect(transport.poll).toHaveBeenCalledTimes(1);
  });

  it('passes through errors from a failing sleep when not aborted', async () => {
    const transport = new ScriptedTransport();
    transport.poll.mockResolvedValue(snapshotState('job-1', 'JOB_STATE_RUNNING'));
    const sleep = vi.fn<SleepFn>().mockRejectedValue(new BadRequestError('unrelated'));

    await expect(waitForJob(transport, explainJob, handle, { sleep, logger: silentLogger })).rejects.toBeInstanceOf(
      BadRequestError,
    );
  });
});
