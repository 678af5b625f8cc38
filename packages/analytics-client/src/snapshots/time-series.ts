import { timeSeriesJob } from '../jobs/kinds.js';
import type { TimeSeriesResult } from '../jobs/materializers.js';
import { JobSession, type JobSessionOptions } from '../jobs/session.js';
import { TimeSeriesQuery, type TimeSeriesQueryInput } from './query.js';

export interface SnapshotTimeSeriesOptions extends Omit<JobSessionOptions<TimeSeriesQuery>, 'query'> {
  query?: TimeSeriesQuery | TimeSeriesQueryInput | string;
}

/** Aggregated document counts over time, grouped by up to four dimensions. */
export class SnapshotTimeSeries extends JobSession<TimeSeriesResult, TimeSeriesQuery> {
  constructor(options: SnapshotTimeSeriesOptions = {}) {
    const { query, ...rest } = options;
    super(
      timeSeriesJob,
      {
        ...rest,
        query: query === undefined || query instanceof TimeSeriesQuery ? query : new TimeSeriesQuery(query),
      },
      (where) => new TimeSeriesQuery({ where }),
    );
    if (options.jobId) {
      this.resume(options.jobId);
    }
  }
}
