import { afterEach, describe, expect, it, vi } from 'vitest';

import { InvalidArgumentError } from '@factiva-analytics/contracts';

import { ExtractionQuery, SnapshotQuery, TimeSeriesQuery } from '../src/snapshots/query.js';
import { StreamingQuery } from '../src/streams/query.js';

describe('snapshots/query', () => {
  /**
   * Intent:
   * - Payloads use the wire names the API expects.
   * - Bad input fails at construction with InvalidArgumentError, never at submit time.
   */

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('builds a where-only payload from a string', () => {
    expect(new SnapshotQuery("  language_code = 'en'  ").toPayload()).toEqual({
      query: { where: "language_code = 'en'" },
    });
  });

  it('maps code lists to their wire names', () => {
    const query = new SnapshotQuery({
      where: 'x',
      includes: { subject_codes: ['c13'] },
      excludes: { region_codes: ['usa'] },
      includeLists: { company_codes: ['list-1'] },
      excludeLists: { industry_codes: ['list-2'] },
    });

    expect(query.toPayload()).toEqual({
      query: {
        where: 'x',
        includes: { subject_codes: ['c13'] },
        excludes: { region_codes: ['usa'] },
        includesList: { company_codes: ['list-1'] },
        excludesList: { industry_codes: ['list-2'] },
      },
    });
  });

  it('falls back to FACTIVA_WHERE', () => {
    vi.stubEnv('FACTIVA_WHERE', "publication_datetime >= '2024-01-01'");

    expect(new SnapshotQuery().where).toBe("publication_datetime >= '2024-01-01'");
  });

  it('rejects a query without any where clause', () => {
    vi.stubEnv('FACTIVA_WHERE', '');

    expect(() => new SnapshotQuery({})).toThrow(
      new InvalidArgumentError('Where value not provided and env variable FACTIVA_WHERE not set'),
    );
    expect(() => new SnapshotQuery('   ')).toThrow(InvalidArgumentError);
  });

  it('rejects empty code values', () => {
    expect(() => new SnapshotQuery({ where: 'x', includes: { subject_codes: [''] } })).toThrow(InvalidArgumentError);
  });

  it('defaults extractions to avro without a limit', () => {
    expect(new ExtractionQuery('x').toPayload()).toEqual({ query: { where: 'x', format: 'avro' } });
  });

  it('normalizes the file format and emits a positive limit', () => {
    const query = new ExtractionQuery({ where: 'x', fileFormat: ' CSV ', limit: 250 });

    expect(query.fileFormat).toBe('csv');
    expect(query.toPayload()).toEqual({ query: { where: 'x', format: 'csv', limit: 250 } });
  });

  it('rejects unknown formats and bad limits', () => {
    expect(() => new ExtractionQuery({ where: 'x', fileFormat: 'parquet' })).toThrow(InvalidArgumentError);
    expect(() => new ExtractionQuery({ where: 'x', limit: -1 })).toThrow(InvalidArgumentError);
    expect(() => new ExtractionQuery({ where: 'x', limit: 1.5 })).toThrow(InvalidArgumentError);
  });

  it('fills time-series defaults', () => {
    expect(new TimeSeriesQuery('x').toPayload()).toEqual({
      query: {
        where: 'x',
        frequency: 'MONTH',
        date_field: 'publication_datetime',
        group_dimensions: [],
        top: 10,
      },
    });
  });

  it('normalizes time-series options', () => {
    const query = new TimeSeriesQuery({
      where: 'x',
      frequency: 'day',
      dateField: 'INGESTION_DATETIME',
      groupDimensions: ['source_code', 'subject_codes'],
      top: 5,
    });

    expect(query.toPayload()).toEqual({
      query: {
        where: 'x',
        frequency: 'DAY',
        date_field: 'ingestion_datetime',
        group_dimensions: ['source_code', 'subject_codes'],
        top: 5,
      },
    });
  });

  it('limits group dimensions to four known fields', () => {
    expect(
      () =>
        new TimeSeriesQuery({
          where: 'x',
          groupDimensions: ['source_code', 'subject_codes', 'region_codes', 'industry_codes', 'company_codes'],
        }),
    ).toThrow(/The maximum group_dimensions size is 4/);
    expect(() => new TimeSeriesQuery({ where: 'x', groupDimensions: ['author_name'] })).toThrow(
      InvalidArgumentError,
    );
    expect(() => new TimeSeriesQuery({ where: 'x', frequency: 'WEEK' })).toThrow(InvalidArgumentError);
  });
});

describe('streams/query', () => {
  it('wraps the filter in a stream resource', () => {
    const query = new StreamingQuery({ where: 'x', includes: { subject_codes: ['c13'] } });

    expect(query.toPayload()).toEqual({
      data: { type: 'stream', attributes: { where: 'x', includes: { subject_codes: ['c13'] } } },
    });
  });
});
