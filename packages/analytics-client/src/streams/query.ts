import { z } from 'zod';

import type { JobQuery } from '../jobs/engine.js';
import { CodeMapSchema, type CodeMap, parseQueryInput, resolveWhere } from '../snapshots/query.js';

export interface StreamingQueryInput {
  where?: string;
  includes?: CodeMap;
  excludes?: CodeMap;
}

const StreamingQuerySchema = z.object({
  where: z.string().min(1),
  includes: CodeMapSchema.optional(),
  excludes: CodeMapSchema.optional(),
});

export interface StreamingQueryPayload {
  data: {
    type: 'stream';
    attributes: {
      where: string;
      includes?: CodeMap;
      excludes?: CodeMap;
    };
  };
}

export class StreamingQuery implements JobQuery {
  readonly where: string;
  readonly includes?: CodeMap;
  readonly excludes?: CodeMap;

  constructor(input: StreamingQueryInput | string = {}) {
    const raw = typeof input === 'string' ? { where: input } : input;
    const parsed = parseQueryInput(
      StreamingQuerySchema,
      { ...raw, where: resolveWhere(raw.where) },
      'streaming query',
    );
    this.where = parsed.where;
    this.includes = parsed.includes;
    this.excludes = parsed.excludes;
  }

  toPayload(): StreamingQueryPayload {
    const attributes: StreamingQueryPayload['data']['attributes'] = { where: this.where };
    if (this.includes) attributes.includes = this.includes;
    if (this.excludes) attributes.excludes = this.excludes;
    return { data: { type: 'stream', attributes } };
  }
}
