import { z } from 'zod';

import { InvalidArgumentError, type ExtractionFileFormat } from '@factiva-analytics/contracts';
import { readString } from '@factiva-analytics/shared-infrastructure';

import {
  DATETIME_FIELDS,
  DATETIME_PERIODS,
  EXTRACTION_FILE_FORMATS,
  GROUP_DIMENSION_FIELDS,
  MAX_GROUP_DIMENSIONS,
  type DatetimeField,
  type DatetimePeriod,
  type GroupDimensionField,
} from '../constants.js';
import type { JobQuery } from '../jobs/engine.js';

/** `{ column: [code, code, ...] }` */
export type CodeMap = Record<string, string[]>;

export const CodeMapSchema = z.record(z.string().min(1), z.array(z.string().min(1)));

const lowerCased = (value: unknown) => (typeof value === 'string' ? value.toLowerCase().trim() : value);
const upperCased = (value: unknown) => (typeof value === 'string' ? value.toUpperCase().trim() : value);

export function parseQueryInput<T>(schema: z.ZodType<T>, input: unknown, what: string): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Invalid ${what}: ${z.prettifyError(parsed.error)}`);
  }
  return parsed.data;
}

/** Falls back to FACTIVA_WHERE when no where clause is given. */
export function resolveWhere(where: string | undefined): string {
  const resolved = where?.trim() || readString('FACTIVA_WHERE')?.trim();
  if (!resolved) {
    throw new InvalidArgumentError('Where value not provided and env variable FACTIVA_WHERE not set');
  }
  return resolved;
}

export interface SnapshotQueryInput {
  where?: string;
  includes?: CodeMap;
  excludes?: CodeMap;
  includeLists?: CodeMap;
  excludeLists?: CodeMap;
}

const SnapshotQuerySchema = z.object({
  where: z.string().min(1),
  includes: CodeMapSchema.optional(),
  excludes: CodeMapSchema.optional(),
  includeLists: CodeMapSchema.optional(),
  excludeLists: CodeMapSchema.optional(),
});

export interface SnapshotQueryPayload {
  query: {
    where: string;
    includes?: CodeMap;
    excludes?: CodeMap;
    includesList?: CodeMap;
    excludesList?: CodeMap;
    [key: string]: unknown;
  };
}

export class SnapshotQuery implements JobQuery {
  readonly where: string;
  readonly includes?: CodeMap;
  readonly excludes?: CodeMap;
  readonly includeLists?: CodeMap;
  readonly excludeLists?: CodeMap;

  constructor(input: SnapshotQueryInput | string = {}) {
    const raw = typeof input === 'string' ? { where: input } : input;
    const parsed = parseQueryInput(
      SnapshotQuerySchema,
      { ...raw, where: resolveWhere(raw.where) },
      'snapshot query',
    );
    this.where = parsed.where;
    this.includes = parsed.includes;
    this.excludes = parsed.excludes;
    this.includeLists = parsed.includeLists;
    this.excludeLists = parsed.excludeLists;
  }

  toPayload(): SnapshotQueryPayload {
    const query: SnapshotQueryPayload['query'] = { where: this.where };
    if (this.includes) query.includes = this.includes;
    if (this.excludes) query.excludes = this.excludes;
    if (this.includeLists) query.includesList = this.includeLists;
    if (this.excludeLists) query.excludesList = this.excludeLists;
    return { query };
  }
}

export interface ExtractionQueryInput extends SnapshotQueryInput {
  fileFormat?: string;
  /** Max documents to extract; 0 means no limit. */
  limit?: number;
}

const ExtractionOptionsSchema = z.object({
  fileFormat: z.preprocess(lowerCased, z.enum(EXTRACTION_FILE_FORMATS)).default('avro'),
  limit: z.number().int().nonnegative().default(0),
});

export class ExtractionQuery extends SnapshotQuery {
  readonly fileFormat: ExtractionFileFormat;
  readonly limit: number;

  constructor(input: ExtractionQueryInput | string = {}) {
    const raw = typeof input === 'string' ? { where: input } : input;
    super(raw);
    const options = parseQueryInput(
      ExtractionOptionsSchema,
      { fileFormat: raw.fileFormat, limit: raw.limit },
      'extraction query',
    );
    this.fileFormat = options.fileFormat;
    this.limit = options.limit;
  }

  override toPayload(): SnapshotQueryPayload {
    const payload = super.toPayload();
    if (this.limit > 0) payload.query.limit = this.limit;
    payload.query.format = this.fileFormat;
    return payload;
  }
}

export interface TimeSeriesQueryInput extends SnapshotQueryInput {
  frequency?: string;
  dateField?: string;
  groupDimensions?: string[];
  top?: number;
}

const TimeSeriesOptionsSchema = z.object({
  frequency: z.preprocess(upperCased, z.enum(DATETIME_PERIODS)).default('MONTH'),
  dateField: z.preprocess(lowerCased, z.enum(DATETIME_FIELDS)).default('publication_datetime'),
  groupDimensions: z
    .array(z.enum(GROUP_DIMENSION_FIELDS))
    .max(MAX_GROUP_DIMENSIONS, `The maximum group_dimensions size is ${MAX_GROUP_DIMENSIONS}`)
    .default([]),
  top: z.number().int().nonnegative().default(10),
});

export class TimeSeriesQuery extends SnapshotQuery {
  readonly frequency: DatetimePeriod;
  readonly dateField: DatetimeField;
  readonly groupDimensions: GroupDimensionField[];
  readonly top: number;

  constructor(input: TimeSeriesQueryInput | string = {}) {
    const raw = typeof input === 'string' ? { where: input } : input;
    super(raw);
    const options = parseQueryInput(
      TimeSeriesOptionsSchema,
      {
        frequency: raw.frequency,
        dateField: raw.dateField,
        groupDimensions: raw.groupDimensions,
        top: raw.top,
      },
      'time-series query',
    );
    this.frequency = options.frequency;
    this.dateField = options.dateField;
    this.groupDimensions = options.groupDimensions;
    this.top = options.top;
  }

  override toPayload(): SnapshotQueryPayload {
    const payload = super.toPayload();
    payload.query.frequency = this.frequency;
    payload.query.date_field = this.dateField;
    payload.query.group_dimensions = this.groupDimensions;
    payload.query.top = this.top;
    return payload;
  }
}
