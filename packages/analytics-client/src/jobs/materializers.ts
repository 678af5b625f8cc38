import { z } from 'zod';

import type { ExtractionFileFormat, SubscriptionRef } from '@factiva-analytics/contracts';

import { EXTRACTION_FILE_FORMATS } from '../constants.js';
import { type JobEnvelope, parseWithSchema } from './response-schema.js';

export interface ExplainResult {
  volumeEstimate: number;
}

export interface ExtractionResult {
  files: string[];
  fileFormat?: ExtractionFileFormat;
}

export type TimeSeriesValue = string | number | boolean | null;
export type TimeSeriesRow = Record<string, TimeSeriesValue>;

export interface TimeSeriesResult {
  rows: TimeSeriesRow[];
}

export interface StreamingInstanceResult {
  subscriptions: SubscriptionRef[];
}

const ExplainAttributesSchema = z.object({ counts: z.number().int().nonnegative() });

const ExtractionAttributesSchema = z.object({
  files: z.array(z.object({ uri: z.string().min(1) })).default([]),
  format: z.string().optional(),
});

const TimeSeriesAttributesSchema = z.object({
  results: z.array(z.record(z.string(), z.unknown())).default([]),
});

const SubscriptionsSchema = z.object({
  subscriptions: z
    .object({ data: z.array(z.object({ id: z.string().min(1) })).default([]) })
    .optional(),
});

export function materializeExplain(envelope: JobEnvelope): ExplainResult {
  const attrs = parseWithSchema(ExplainAttributesSchema, envelope.data.attributes, 'explain result');
  return { volumeEstimate: attrs.counts };
}

function toFileFormat(value: string | undefined): ExtractionFileFormat | undefined {
  const normalized = value?.toLowerCase().trim();
  return EXTRACTION_FILE_FORMATS.find((format) => format === normalized);
}

export function materializeExtraction(envelope: JobEnvelope): ExtractionResult {
  const attrs = parseWithSchema(ExtractionAttributesSchema, envelope.data.attributes, 'extraction result');
  const fileFormat = toFileFormat(attrs.format);
  const files = attrs.files.map((file) => file.uri);
  return fileFormat ? { files, fileFormat } : { files };
}

/**
 * Flattens nested objects into `parent_child` keys. Arrays are joined with
 * commas so every cell stays scalar, and an empty object becomes `null`.
 * When two paths produce the same column the first one wins.
 */
export function flattenRecord(record: object, prefix = ''): TimeSeriesRow {
  const row: TimeSeriesRow = {};
  flattenInto(row, record, prefix);
  return row;
}

function flattenInto(row: TimeSeriesRow, record: object, prefix: string): void {
  const entries: [string, unknown][] = Object.entries(record);
  for (const [key, value] of entries) {
    const column = prefix ? `${prefix}_${key}` : key;
    if (typeof value === 'object' && value !== null && !Array.isArray(value) && Object.keys(value).length > 0) {
      flattenInto(row, value, column);
    } else if (!Object.hasOwn(row, column)) {
      row[column] = toCell(value);
    }
  }
}

function toCell(value: unknown): TimeSeriesValue {
  if (value === null || value === undefined) return null;
  if (Array.isArray(value)) return value.map((item) => String(item)).join(',');
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  return typeof value === 'object' ? null : String(value);
}

export function materializeTimeSeries(envelope: JobEnvelope): TimeSeriesResult {
  const attrs = parseWithSchema(TimeSeriesAttributesSchema, envelope.data.attributes, 'time-series result');
  return { rows: attrs.results.map((record) => flattenRecord(record)) };
}

export function toSubscriptionRef(rawId: string): SubscriptionRef {
  const id = rawId.split('/').pop() ?? rawId;
  const shortId = id.split('-').pop() ?? id;
  return { id, shortId };
}

/** Subscriptions listed under a stream's `relationships`. */
export function readSubscriptions(relationships: unknown): SubscriptionRef[] {
  const parsed = parseWithSchema(SubscriptionsSchema, relationships ?? {}, 'stream subscriptions');
  return (parsed.subscriptions?.data ?? []).map((sub) => toSubscriptionRef(sub.id));
}

export function materializeStreamingInstance(envelope: JobEnvelope): StreamingInstanceResult {
  return { subscriptions: readSubscriptions(envelope.data.relationships) };
}

export interface ExplainSamples {
  numSamples: number;
  rows: TimeSeriesRow[];
}

const SamplesBodySchema = z.object({
  data: z.object({
    attributes: z.object({ sample: z.array(z.record(z.string(), z.unknown())) }),
  }),
});

/** Samples come back outside the job envelope, so this reads the raw body. */
export function materializeSamples(body: unknown): ExplainSamples {
  const parsed = parseWithSchema(SamplesBodySchema, body, 'explain samples');
  const rows = parsed.data.attributes.sample.map((record) => flattenRecord(record));
  return { numSamples: rows.length, rows };
}
