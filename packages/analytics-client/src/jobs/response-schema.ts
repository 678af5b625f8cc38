import { z } from 'zod';

import { UnexpectedResponseError, type JobErrorDetail } from '@factiva-analytics/contracts';

const ErrorItemSchema = z.object({
  title: z.string().optional(),
  detail: z.string().optional(),
});

/** Envelope shared by snapshot, time-series and stream job responses. */
export const JobEnvelopeSchema = z.object({
  data: z.object({
    id: z.string().min(1),
    attributes: z.record(z.string(), z.unknown()).default({}),
    relationships: z.record(z.string(), z.unknown()).optional(),
  }),
  links: z.object({ self: z.string().min(1).optional() }).optional(),
  errors: z.array(ErrorItemSchema).optional(),
});

export type JobEnvelope = z.infer<typeof JobEnvelopeSchema>;

const ErrorsOnlySchema = z.object({ errors: z.array(ErrorItemSchema).optional() });

export function parseEnvelope(body: unknown, statusCode: number): JobEnvelope {
  const parsed = JobEnvelopeSchema.safeParse(body);
  if (!parsed.success) {
    throw new UnexpectedResponseError(
      statusCode,
      `malformed job response (${parsed.error.issues.map((issue) => issue.path.join('.') || 'body').join(', ')})`,
    );
  }
  return parsed.data;
}

export function parseWithSchema<T>(schema: z.ZodType<T>, value: unknown, what: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new UnexpectedResponseError(200, `malformed ${what}: ${z.prettifyError(parsed.error)}`);
  }
  return parsed.data;
}

export function readErrors(body: unknown): JobErrorDetail[] | undefined {
  const parsed = ErrorsOnlySchema.safeParse(body);
  if (!parsed.success || !parsed.data.errors) return undefined;
  return parsed.data.errors.map((err) => ({ title: err.title ?? 'Error', detail: err.detail ?? '' }));
}

/** First server-provided error detail, if any. */
export function firstErrorDetail(body: unknown): string | undefined {
  const detail = readErrors(body)?.find((err) => err.detail)?.detail;
  return detail || undefined;
}
