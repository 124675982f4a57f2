// Payload schemas for the analysis functions
// Payloads come from the language model, so numbers may arrive as strings.

import { z, type ZodError, type ZodTypeAny } from 'zod';
import type { AnalysisErrorResult } from './types.js';

export const PriceRecordSchema = z.object({
  date: z.string().default(''),
  close: z.coerce.number().default(0),
  percent_change: z.coerce.number().default(0),
}).passthrough();

export const StockDataPayloadSchema = z.object({
  symbol: z.string().optional(),
  name: z.string().optional(),
  current_price: z.coerce.number().nullable().optional(),
  daily_changes: z.array(PriceRecordSchema).default([]),
}).passthrough();

export const PricePayloadSchema = z.union([
  z.array(PriceRecordSchema),
  StockDataPayloadSchema,
]);

export const ArticlePayloadSchema = z.object({
  title: z.string().nullable().optional(),
  source: z.string().nullable().optional(),
  published_at: z.string().nullable().optional(),
}).passthrough();

export const NewsPayloadSchema = z.union([
  z.array(ArticlePayloadSchema),
  z.object({ articles: z.array(ArticlePayloadSchema) }).passthrough(),
]);

export const DayPayloadSchema = z.object({
  price_change_percent: z.coerce.number().default(0),
  news_articles: z.array(ArticlePayloadSchema).nullable().default([]),
}).passthrough();

export const CorrelationPayloadSchema = z.record(z.string(), DayPayloadSchema);

export const SignificantDayPayloadSchema = z.object({
  date: z.string().default(''),
  price_change: z.coerce.number().default(0),
  news_count: z.coerce.number().default(0),
  news_titles: z.array(z.string()).default(['No title available']),
}).passthrough();

export const InsightPayloadSchema = z.object({
  has_correlation: z.boolean().default(false),
  correlation_strength: z.coerce.number().default(0),
  avg_price_change_with_news: z.coerce.number().default(0),
  significant_price_days: z.array(SignificantDayPayloadSchema).default([]),
}).passthrough();

export type PriceRecordPayload = z.infer<typeof PriceRecordSchema>;
export type ArticlePayload = z.infer<typeof ArticlePayloadSchema>;
export type SignificantDayPayload = z.infer<typeof SignificantDayPayloadSchema>;

export function formatIssues(error: ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export type Decoded<T> = { ok: true; value: T } | { ok: false; error: AnalysisErrorResult };

/**
 * Decode a JSON string (or an already-decoded value) and validate it.
 * Never throws: malformed input becomes an error-shaped result.
 */
export function decodePayload<S extends ZodTypeAny>(
  schema: S,
  input: unknown,
  label: string,
): Decoded<z.output<S>> {
  let raw: unknown = input;
  if (typeof input === 'string') {
    try {
      raw = JSON.parse(input);
    } catch (err) {
      return {
        ok: false,
        error: {
          status: 'error',
          message: `Invalid JSON for ${label}: ${err instanceof Error ? err.message : String(err)}`,
        },
      };
    }
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      error: { status: 'error', message: `Invalid ${label}: ${formatIssues(parsed.error)}` },
    };
  }
  return { ok: true, value: parsed.data };
}
