// News aggregation: coverage per date, per source, and the covered date range

import { decodePayload, NewsPayloadSchema } from './schemas.js';
import type { AnalysisOutcome, NewsAnalysis, SourceCount } from './types.js';

const TOP_SOURCES = 5;

export function analyzeNewsSentiment(input: unknown): AnalysisOutcome<NewsAnalysis> {
  const decoded = decodePayload(NewsPayloadSchema, input, 'news data');
  if (!decoded.ok) return decoded.error;

  const articles = Array.isArray(decoded.value) ? decoded.value : decoded.value.articles;

  const byDate = new Map<string, number>();
  const bySource = new Map<string, number>();

  for (const article of articles) {
    const date = article.published_at;
    if (date) byDate.set(date, (byDate.get(date) ?? 0) + 1);

    const source = article.source;
    if (source) bySource.set(source, (bySource.get(source) ?? 0) + 1);
  }

  // Array.prototype.sort is stable: equal counts keep first-seen order
  const topSources: SourceCount[] = [...bySource]
    .map(([source, count]) => ({ source, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, TOP_SOURCES);

  // ISO dates: lexicographic order is chronological order
  const dates = [...byDate.keys()].sort();
  const first = dates[0];
  const last = dates[dates.length - 1];

  return {
    total_articles: articles.length,
    days_with_news: byDate.size,
    articles_by_date: Object.fromEntries(byDate),
    top_sources: topSources,
    date_range: first !== undefined && last !== undefined ? [first, last] : [],
  };
}
