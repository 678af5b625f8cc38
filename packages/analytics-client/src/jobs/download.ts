import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { NoFilesAvailableError } from '@factiva-analytics/contracts';

import type { JobTransport } from '../http/transport.js';
import { type Logger, logger as rootLogger } from '../logger.js';

export interface DownloadFilesOptions {
  jobId?: string;
  logger?: Logger;
}

export function fileNameFromUri(uri: string): string {
  const path = uri.split('?')[0] ?? uri;
  const name = path.split('/').filter(Boolean).pop();
  return name ?? uri;
}

/**
 * Downloads every file URI into `path`, one at a time, and returns the local
 * paths in the same order. Fails before touching the filesystem when the
 * list is empty.
 */
export async function downloadFiles(
  transport: JobTransport,
  files: readonly string[],
  path: string,
  options: DownloadFilesOptions = {},
): Promise<string[]> {
  if (files.length === 0) {
    throw new NoFilesAvailableError(options.jobId);
  }
  const log = options.logger ?? rootLogger;

  await mkdir(path, { recursive: true });

  const written: string[] = [];
  for (const uri of files) {
    const localPath = join(path, fileNameFromUri(uri));
    const content = await transport.downloadArtifact(uri);
    await writeFile(localPath, content);
    log.debug('File downloaded', { jobId: options.jobId, file: localPath, bytes: content.length });
    written.push(localPath);
  }
  log.info('Files downloaded', { jobId: options.jobId, count: written.length, path });
  return written;
}
