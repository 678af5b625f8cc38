// Endpoint paths and option lists of the Factiva Analytics APIs.

export const SDK_VERSION = '0.1.0';

export const DEFAULT_API_HOST = 'https://api.dowjones.com';

export const SNAPSHOTS_BASEPATH = '/alpha/extractions/documents';
export const EXPLAIN_SUFFIX = '/_explain';
export const ANALYTICS_BASEPATH = '/alpha/analytics';
export const EXTRACTIONS_BASEPATH = '/alpha/extractions';
export const SAMPLES_SUFFIX = '/samples';
export const STREAMS_BASEPATH = '/alpha/streams';
export const ACCOUNTS_BASEPATH = '/alpha/accounts';
export const TAXONOMIES_BASEPATH = '/alpha/taxonomies';

export const DEFAULT_POLL_INTERVAL_MS = 10_000;
export const MAX_EXPLAIN_SAMPLES = 100;

export const EXTRACTION_FILE_FORMATS = ['avro', 'json', 'csv'] as const;

export const DATETIME_PERIODS = ['DAY', 'MONTH', 'YEAR'] as const;
export type DatetimePeriod = (typeof DATETIME_PERIODS)[number];

export const DATETIME_FIELDS = [
  'publication_datetime',
  'modification_datetime',
  'ingestion_datetime',
] as const;
export type DatetimeField = (typeof DATETIME_FIELDS)[number];

export const MAX_GROUP_DIMENSIONS = 4;

export const GROUP_DIMENSION_FIELDS = [
  'source_code',
  'subject_codes',
  'region_codes',
  'industry_codes',
  'company_codes',
  'person_codes',
  'company_codes_about',
  'company_codes_relevance',
  'company_codes_cusip',
  'company_codes_isin',
  'company_codes_sedol',
  'company_codes_ticker',
  'company_codes_about_cusip',
  'company_codes_about_isin',
  'company_codes_about_sedol',
  'company_codes_about_ticker',
  'company_codes_relevance_cusip',
  'company_codes_relevance_isin',
  'company_codes_relevance_sedol',
  'company_codes_relevance_ticker',
] as const;
export type GroupDimensionField = (typeof GROUP_DIMENSION_FIELDS)[number];

// Composite job ids embed the account user key.
export const EXTRACTION_ID_PREFIX = 'dj-synhub-extraction';
export const STREAM_ID_PREFIX = 'dj-synhub-stream';
export const SHORT_ID_LENGTH = 10;
export const EXTRACTION_ID_LENGTH = 64;
export const STREAM_ID_LENGTH = 60;
