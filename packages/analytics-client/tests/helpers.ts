import pino from 'pino';
import { vi } from 'vitest';

import type { JobTransport, TransportResponse } from '../src/http/transport.js';
import { wrapPino } from '../src/logger.js';

export const silentLogger = wrapPino(pino({ level: 'silent' }));

export const TEST_USER_KEY = 'test'.padEnd(32, '0');

export class ScriptedTransport implements JobTransport {
  readonly submit = vi.fn<JobTransport['submit']>();
  readonly poll = vi.fn<JobTransport['poll']>();
  readonly downloadArtifact = vi.fn<JobTransport['downloadArtifact']>();

  /** Queues poll responses in order. */
  pollReturns(...responses: TransportResponse[]): this {
    for (const res of responses) this.poll.mockResolvedValueOnce(res);
    return this;
  }
}

export function jsonResponse(statusCode: number, body?: unknown): TransportResponse {
  return { statusCode, body, text: body === undefined ? '' : JSON.stringify(body) };
}

export function submitted(id: string, self?: string): TransportResponse {
  return jsonResponse(201, {
    data: { id, attributes: { current_state: 'JOB_CREATED' } },
    ...(self ? { links: { self } } : {}),
  });
}

export function snapshotState(
  id: string,
  state: string,
  attributes: Record<string, unknown> = {},
  errors?: { title: string; detail: string }[],
): TransportResponse {
  return jsonResponse(200, {
    data: { id, attributes: { current_state: state, ...attributes } },
    ...(errors ? { errors } : {}),
  });
}

export function streamState(id: string, status: string, subscriptionIds: string[] = []): TransportResponse {
  return jsonResponse(200, {
    data: {
      id,
      attributes: { job_status: status },
      relationships: { subscriptions: { data: subscriptionIds.map((subId) => ({ id: subId })) } },
    },
  });
}
