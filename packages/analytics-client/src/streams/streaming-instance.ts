import {
  InvalidArgumentError,
  type JobOutcome,
  type JobStatus,
  type SubscriptionRef,
} from '@factiva-analytics/contracts';

import { type CredentialProvider, UserKey } from '../auth/credentials.js';
import { SHORT_ID_LENGTH, STREAM_ID_LENGTH, STREAM_ID_PREFIX } from '../constants.js';
import type { ProcessJobOptions } from '../jobs/engine.js';
import { streamingInstanceJob } from '../jobs/kinds.js';
import type { StreamingInstanceResult } from '../jobs/materializers.js';
import { JobSession, type JobSessionOptions } from '../jobs/session.js';
import { StreamingQuery, type StreamingQueryInput } from './query.js';

export interface StreamingInstanceOptions extends Omit<JobSessionOptions<StreamingQuery>, 'query'> {
  query?: StreamingQuery | StreamingQueryInput | string;
}

export function resolveStreamId(streamId: string, credential: CredentialProvider): string {
  if (streamId.length === STREAM_ID_LENGTH) {
    return streamId;
  }
  if (streamId.length === SHORT_ID_LENGTH && credential instanceof UserKey) {
    return `${STREAM_ID_PREFIX}-${credential.key.toLowerCase()}-${streamId}`;
  }
  throw new InvalidArgumentError(
    'Unexpected value for the stream id. If a short id is provided, a UserKey credential is needed.',
  );
}

/**
 * A streaming instance is ready once the server reports it RUNNING; its
 * subscriptions are then available.
 */
export class StreamingInstance extends JobSession<StreamingInstanceResult, StreamingQuery> {
  constructor(options: StreamingInstanceOptions = {}) {
    const { query, ...rest } = options;
    super(
      streamingInstanceJob,
      {
        ...rest,
        query: query === undefined || query instanceof StreamingQuery ? query : new StreamingQuery(query),
      },
      (where) => new StreamingQuery({ where }),
    );
    if (options.jobId) {
      this.resume(resolveStreamId(options.jobId, this.credential));
    }
  }

  get id(): string | undefined {
    return this.handle?.id;
  }

  get shortId(): string | undefined {
    return this.handle?.id.split('-').pop();
  }

  get subscriptions(): SubscriptionRef[] {
    return this.result?.subscriptions ?? [];
  }

  /** Creates the instance and waits until it is running. */
  async create(options: ProcessJobOptions<StreamingInstanceResult> = {}): Promise<JobOutcome<StreamingInstanceResult>> {
    if (!this.query) {
      throw new InvalidArgumentError('a query is needed to create a streaming instance');
    }
    return this.processJob(options);
  }

  getStatus(): Promise<JobStatus<StreamingInstanceResult>> {
    return this.getJobResponse();
  }
}
