import {
  BadRequestError,
  InvalidArgumentError,
  JobNotFoundError,
  NotSubmittedError,
  UnexpectedResponseError,
} from '@factiva-analytics/contracts';

import { EXTRACTIONS_BASEPATH, MAX_EXPLAIN_SAMPLES, SAMPLES_SUFFIX } from '../constants.js';
import { explainJob } from '../jobs/kinds.js';
import { type ExplainResult, type ExplainSamples, materializeSamples } from '../jobs/materializers.js';
import { firstErrorDetail } from '../jobs/response-schema.js';
import { JobSession, type JobSessionOptions } from '../jobs/session.js';
import { SnapshotQuery, type SnapshotQueryInput } from './query.js';

export interface SnapshotExplainOptions extends Omit<JobSessionOptions<SnapshotQuery>, 'query'> {
  query?: SnapshotQuery | SnapshotQueryInput | string;
}

/**
 * Estimates how many documents a snapshot query would extract.
 *
 * ```ts
 * const explain = new SnapshotExplain({ query: "publication_datetime >= '2024-01-01'" });
 * const outcome = await explain.processJob();
 * if (outcome.ok) console.log(outcome.result.volumeEstimate);
 * ```
 */
export class SnapshotExplain extends JobSession<ExplainResult, SnapshotQuery> {
  samples?: ExplainSamples;

  constructor(options: SnapshotExplainOptions = {}) {
    const { query, ...rest } = options;
    super(
      explainJob,
      {
        ...rest,
        query: query === undefined || query instanceof SnapshotQuery ? query : new SnapshotQuery(query),
      },
      (where) => new SnapshotQuery({ where }),
    );
    if (options.jobId) {
      this.resume(options.jobId);
    }
  }

  /** Fetches up to `numSamples` sample documents of a finished explain job. */
  async getSamples(numSamples: number = MAX_EXPLAIN_SAMPLES): Promise<ExplainSamples> {
    const handle = this.handle;
    if (!handle) {
      throw new NotSubmittedError();
    }
    if (!Number.isInteger(numSamples) || numSamples < 1 || numSamples > MAX_EXPLAIN_SAMPLES) {
      throw new InvalidArgumentError(
        `The numSamples value must be an integer between 1 and ${MAX_EXPLAIN_SAMPLES}`,
      );
    }

    const url = `${EXTRACTIONS_BASEPATH}${SAMPLES_SUFFIX}/${handle.id}?num_samples=${numSamples}`;
    const response = await this.transport.poll(url);
    switch (response.statusCode) {
      case 200:
        break;
      case 404:
        throw new JobNotFoundError(handle.id);
      case 400:
        throw new BadRequestError(firstErrorDetail(response.body) ?? (response.text || 'HTTP 400'));
      default:
        throw new UnexpectedResponseError(response.statusCode, response.text || undefined);
    }

    this.samples = materializeSamples(response.body);
    this.log.info('Explain samples retrieved', { jobId: handle.id, count: this.samples.numSamples });
    return this.samples;
  }
}
