// News/price correlation over the merged per-date structure

import { decodePayload, CorrelationPayloadSchema } from './schemas.js';
import type { AnalysisOutcome, CorrelationAnalysis, SignificantDay } from './types.js';

/** Mean difference (percentage points) above which news days count as correlated */
export const CORRELATION_THRESHOLD = 0.5;
/** Absolute daily move (percent) that makes a day significant */
export const SIGNIFICANT_MOVE = 2.0;
const TITLES_PER_DAY = 3;

function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function correlateNewsAndPrice(input: unknown): AnalysisOutcome<CorrelationAnalysis> {
  const decoded = decodePayload(CorrelationPayloadSchema, input, 'correlation data');
  if (!decoded.ok) return decoded.error;

  const withNews: number[] = [];
  const withoutNews: number[] = [];
  const significant: SignificantDay[] = [];

  for (const [date, day] of Object.entries(decoded.value)) {
    const change = day.price_change_percent;
    const articles = day.news_articles ?? [];

    if (articles.length > 0) withNews.push(change);
    else withoutNews.push(change);

    if (Math.abs(change) >= SIGNIFICANT_MOVE) {
      significant.push({
        date,
        price_change: change,
        news_count: articles.length,
        news_titles: articles.map(a => a.title ?? '').slice(0, TITLES_PER_DAY),
      });
    }
  }

  const avgWith = mean(withNews);
  const avgWithout = mean(withoutNews);
  const difference = avgWith - avgWithout;
  const scale = Math.max(Math.abs(avgWith), Math.abs(avgWithout));

  return {
    days_with_news: withNews.length,
    days_without_news: withoutNews.length,
    avg_price_change_with_news: avgWith,
    avg_price_change_without_news: avgWithout,
    difference,
    has_correlation: Math.abs(difference) > CORRELATION_THRESHOLD,
    correlation_strength: scale > 0 ? Math.abs(difference) / scale : 0,
    significant_price_days: significant,
  };
}
