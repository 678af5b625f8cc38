import { join } from 'node:path';

import { InvalidArgumentError, NotSubmittedError } from '@factiva-analytics/contracts';

import { type CredentialProvider, UserKey } from '../auth/credentials.js';
import { EXTRACTION_ID_LENGTH, EXTRACTION_ID_PREFIX, SHORT_ID_LENGTH } from '../constants.js';
import { downloadFiles } from '../jobs/download.js';
import { extractionJob } from '../jobs/kinds.js';
import type { ExtractionResult } from '../jobs/materializers.js';
import { JobSession, type JobSessionOptions } from '../jobs/session.js';
import { ExtractionQuery, type ExtractionQueryInput } from './query.js';

export interface SnapshotExtractionOptions extends Omit<JobSessionOptions<ExtractionQuery>, 'query'> {
  query?: ExtractionQuery | ExtractionQueryInput | string;
}

/**
 * Expands a short extraction id to the full id. Full ids pass through.
 */
export function resolveExtractionId(jobId: string, credential: CredentialProvider): string {
  if (jobId.length === EXTRACTION_ID_LENGTH) {
    return jobId;
  }
  if (jobId.length === SHORT_ID_LENGTH && credential instanceof UserKey) {
    return `${EXTRACTION_ID_PREFIX}-${credential.key}-${jobId}`;
  }
  throw new InvalidArgumentError(
    'Unexpected value for jobId. If a short id is provided, a UserKey credential is needed.',
  );
}

export class SnapshotExtraction extends JobSession<ExtractionResult, ExtractionQuery> {
  constructor(options: SnapshotExtractionOptions = {}) {
    const { query, ...rest } = options;
    super(
      extractionJob,
      {
        ...rest,
        query: query === undefined || query instanceof ExtractionQuery ? query : new ExtractionQuery(query),
      },
      (where) => new ExtractionQuery({ where }),
    );
    if (options.jobId) {
      this.resume(resolveExtractionId(options.jobId, this.credential));
    }
  }

  /** Last `-` segment of the job id. */
  get shortId(): string | undefined {
    return this.handle?.id.split('-').pop();
  }

  /**
   * Downloads the files of a finished extraction. Defaults to
   * `{downloadDir}/{shortId}`.
   */
  async downloadFiles(path?: string): Promise<string[]> {
    const handle = this.handle;
    const shortId = this.shortId;
    if (!handle || !shortId) {
      throw new NotSubmittedError();
    }
    const target = path ?? join(this.config.downloadDir, shortId);
    return downloadFiles(this.transport, this.result?.files ?? [], target, {
      jobId: handle.id,
      logger: this.log,
    });
  }
}
