import { z } from 'zod';

import {
  AccessDeniedError,
  InvalidArgumentError,
  JOB_STATE_RUNNING,
  type SubscriptionRef,
  UnexpectedResponseError,
} from '@factiva-analytics/contracts';

import { type CredentialProvider, UserKey } from '../auth/credentials.js';
import { type ClientConfig, loadClientConfig } from '../config.js';
import { ACCOUNTS_BASEPATH, EXTRACTIONS_BASEPATH, STREAMS_BASEPATH, TAXONOMIES_BASEPATH } from '../constants.js';
import { type JobTransport, type TransportResponse, createHttpTransport } from '../http/transport.js';
import { type TimeSeriesRow, flattenRecord, readSubscriptions } from '../jobs/materializers.js';
import { firstErrorDetail, parseWithSchema } from '../jobs/response-schema.js';
import { type Logger, logger as rootLogger } from '../logger.js';

export interface AccountOptions {
  /** Defaults to a `UserKey` read from the environment. */
  credential?: CredentialProvider;
  transport?: JobTransport;
  config?: ClientConfig;
  logger?: Logger;
}

export interface CompanyIdentifier {
  id: number;
  name: string;
}

export interface AccountStats {
  accountName: string;
  accountType: string;
  activeProducts: string;
  maxAllowedConcurrentExtractions: number;
  maxAllowedExtractedDocuments: number;
  maxAllowedExtractions: number;
  currentlyRunningExtractions: number;
  totalDownloadedBytes: number;
  totalExtractedDocuments: number;
  totalExtractions: number;
  totalStreamInstances: number;
  totalStreamSubscriptions: number;
  enabledCompanyIdentifiers: CompanyIdentifier[];
  remainingExtractions: number;
  remainingDocuments: number;
}

export interface ExtractionListing {
  id: string;
  /** Snapshot short id; undefined when the id has an unexpected shape. */
  shortId?: string;
  /** Set for update operations of a snapshot. */
  updateId?: string;
  state?: string;
  format?: string;
  extractionType?: string;
  /** Every attribute, flattened. */
  attributes: TimeSeriesRow;
}

export interface StreamListing {
  id: string;
  shortId?: string;
  streamType?: string;
  state?: string;
  subscriptions: SubscriptionRef[];
  attributes: TimeSeriesRow;
}

const AccountStatsSchema = z.object({
  data: z.object({
    type: z.string(),
    attributes: z.object({
      name: z.string(),
      products: z.string(),
      max_allowed_concurrent_extracts: z.number(),
      max_allowed_document_extracts: z.number(),
      max_allowed_extracts: z.number(),
      cnt_curr_ext: z.number(),
      current_downloaded_amount: z.number(),
      tot_document_extracts: z.number(),
      tot_extracts: z.number(),
      tot_topics: z.number(),
      tot_subscriptions: z.number(),
      enabled_company_identifiers: z.array(z.object({ id: z.number(), name: z.string() })).default([]),
    }),
  }),
});

const ListingSchema = z.object({
  data: z.array(
    z.object({
      id: z.string().min(1),
      attributes: z.record(z.string(), z.unknown()).default({}),
      relationships: z.record(z.string(), z.unknown()).optional(),
    }),
  ),
});

const ExtractionFieldsSchema = z.object({
  current_state: z.string().optional(),
  format: z.string().optional(),
  extraction_type: z.string().optional(),
});

const StreamFieldsSchema = z.object({ job_status: z.string().optional() });

// dj-synhub-{extraction|stream}-{userKey}-{shortId}[-{update}-{updateId}]
const ID_TYPE_SEGMENT = 2;
const ID_SHORT_SEGMENT = 4;
const ID_UPDATE_SEGMENT = 6;

function ensureOk(response: TransportResponse): void {
  if (response.statusCode === 200) return;
  if (response.statusCode === 403) {
    throw new AccessDeniedError(firstErrorDetail(response.body));
  }
  throw new UnexpectedResponseError(response.statusCode, response.text || undefined);
}

/**
 * Account limits and usage, plus the extractions and streams the account has
 * created. The listings supply the ids that the job classes resume from.
 */
export class Account {
  readonly credential: CredentialProvider;
  readonly transport: JobTransport;
  readonly config: ClientConfig;
  stats?: AccountStats;

  private readonly log: Logger;

  constructor(options: AccountOptions = {}) {
    this.config = options.config ?? loadClientConfig();
    this.credential = options.credential ?? new UserKey(this.config.userKey);
    this.transport = options.transport ?? createHttpTransport(this.credential, this.config, options.logger);
    this.log = (options.logger ?? rootLogger).child({ component: 'account' });
  }

  async getStats(): Promise<AccountStats> {
    if (!(this.credential instanceof UserKey)) {
      throw new InvalidArgumentError('account statistics need a UserKey credential');
    }
    const response = await this.transport.poll(`${ACCOUNTS_BASEPATH}/${this.credential.key}`);
    ensureOk(response);

    const { data } = parseWithSchema(AccountStatsSchema, response.body, 'account information');
    const attrs = data.attributes;
    this.stats = {
      accountName: attrs.name,
      accountType: data.type,
      activeProducts: attrs.products,
      maxAllowedConcurrentExtractions: attrs.max_allowed_concurrent_extracts,
      maxAllowedExtractedDocuments: attrs.max_allowed_document_extracts,
      maxAllowedExtractions: attrs.max_allowed_extracts,
      currentlyRunningExtractions: attrs.cnt_curr_ext,
      totalDownloadedBytes: attrs.current_downloaded_amount,
      totalExtractedDocuments: attrs.tot_document_extracts,
      totalExtractions: attrs.tot_extracts,
      totalStreamInstances: attrs.tot_topics,
      totalStreamSubscriptions: attrs.tot_subscriptions,
      enabledCompanyIdentifiers: attrs.enabled_company_identifiers,
      remainingExtractions: attrs.max_allowed_extracts - attrs.tot_extracts,
      remainingDocuments: attrs.max_allowed_document_extracts - attrs.tot_document_extracts,
    };
    this.log.info('Account stats retrieved', { accountName: this.stats.accountName });
    return this.stats;
  }

  /** True when the credential can read the taxonomy endpoint. */
  async isActive(): Promise<boolean> {
    const response = await this.transport.poll(TAXONOMIES_BASEPATH);
    return response.statusCode === 200;
  }

  /** Extractions of the account; update operations only with `includeUpdates`. */
  async listExtractions(options: { includeUpdates?: boolean } = {}): Promise<ExtractionListing[]> {
    const response = await this.transport.poll(EXTRACTIONS_BASEPATH);
    ensureOk(response);

    const { data } = parseWithSchema(ListingSchema, response.body, 'extraction list');
    const listings = data.map((item): ExtractionListing => {
      const parts = item.id.split('-');
      const fields = parseWithSchema(ExtractionFieldsSchema, item.attributes, 'extraction attributes');
      return {
        id: item.id,
        shortId: parts[ID_SHORT_SEGMENT],
        updateId: parts[ID_UPDATE_SEGMENT],
        state: fields.current_state,
        format: fields.format,
        extractionType: fields.extraction_type,
        attributes: flattenRecord(item.attributes),
      };
    });
    return options.includeUpdates ? listings : listings.filter((listing) => listing.updateId === undefined);
  }

  /** Streams of the account; by default only the running ones. */
  async listStreams(options: { runningOnly?: boolean } = {}): Promise<StreamListing[]> {
    const response = await this.transport.poll(STREAMS_BASEPATH);
    ensureOk(response);

    const { data } = parseWithSchema(ListingSchema, response.body, 'stream list');
    const listings = data.map((item): StreamListing => {
      const parts = item.id.split('-');
      const fields = parseWithSchema(StreamFieldsSchema, item.attributes, 'stream attributes');
      return {
        id: item.id,
        shortId: parts[ID_SHORT_SEGMENT],
        streamType: parts[ID_TYPE_SEGMENT],
        state: fields.job_status,
        subscriptions: readSubscriptions(item.relationships),
        attributes: flattenRecord(item.attributes),
      };
    });
    const runningOnly = options.runningOnly ?? true;
    return runningOnly ? listings.filter((listing) => listing.state === JOB_STATE_RUNNING) : listings;
  }
}
