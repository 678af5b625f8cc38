// Environment-based configuration for the Factiva Analytics client.
// Nothing here is required at load time: the user key may also be passed
// explicitly, and every numeric setting has a default.
import { join } from 'node:path';

import { ConfigurationError } from '@factiva-analytics/contracts';
import { readInt, readString } from '@factiva-analytics/shared-infrastructure';

import { DEFAULT_API_HOST, DEFAULT_POLL_INTERVAL_MS } from './constants.js';

export interface ClientConfig {
  apiHost: string;
  userKey?: string;
  defaultWhere?: string;
  polling: {
    intervalMs: number;
    /** 0 means no limit on in-flight polls. */
    maxPolls: number;
    /** 0 means no deadline. */
    timeoutMs: number;
  };
  http: {
    timeoutMs: number;
    retries: number;
  };
  downloadDir: string;
}

function nonNegative(name: string, value: number): number {
  if (value < 0) {
    throw new ConfigurationError(`${name} must be zero or a positive integer (got ${value})`);
  }
  return value;
}

// loadClientConfig.declaration()
export function loadClientConfig(): ClientConfig {
  const apiHost = readString('FACTIVA_API_HOST', DEFAULT_API_HOST) ?? DEFAULT_API_HOST;
  try {
    new URL(apiHost);
  } catch (error) {
    throw new ConfigurationError(`FACTIVA_API_HOST is not a valid URL: ${apiHost}`, { cause: error });
  }

  const intervalMs = nonNegative(
    'FACTIVA_POLL_INTERVAL_MS',
    readInt('FACTIVA_POLL_INTERVAL_MS', DEFAULT_POLL_INTERVAL_MS),
  );
  const maxPolls = nonNegative('FACTIVA_POLL_MAX', readInt('FACTIVA_POLL_MAX', 0));
  const pollTimeoutMs = nonNegative('FACTIVA_POLL_TIMEOUT_MS', readInt('FACTIVA_POLL_TIMEOUT_MS', 0));

  const httpTimeoutMs = nonNegative('FACTIVA_HTTP_TIMEOUT_MS', readInt('FACTIVA_HTTP_TIMEOUT_MS', 30_000));
  const retries = readInt('FACTIVA_HTTP_RETRIES', 3);
  if (retries < 1) {
    throw new ConfigurationError(`FACTIVA_HTTP_RETRIES must be at least 1 (got ${retries})`);
  }

  return {
    apiHost,
    userKey: readString('FACTIVA_USERKEY'),
    defaultWhere: readString('FACTIVA_WHERE'),
    polling: { intervalMs, maxPolls, timeoutMs: pollTimeoutMs },
    http: { timeoutMs: httpTimeoutMs, retries },
    downloadDir: readString('DOWNLOAD_FILES_DIR') ?? join(process.cwd(), 'downloads'),
  };
}
