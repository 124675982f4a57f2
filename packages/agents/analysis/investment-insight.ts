// Investment insight derived from a correlation result

import { decodePayload, InsightPayloadSchema } from './schemas.js';
import type {
  AnalysisOutcome, CorrelationLevel, InvestmentInsight, KeyMarketEvent, NewsImpact,
} from './types.js';

export const STRONG_CORRELATION = 0.7;
export const MODERATE_CORRELATION = 0.4;
const KEY_EVENTS = 3;

export const STRATEGIES = {
  buyOnNews: 'Consider buying on significant news days, particularly positive news.',
  hedgeOnNews: 'Consider selling or hedging on significant news days, as news tends to drive prices down.',
  none: 'No clear news-based strategy recommended due to weak correlation.',
} as const;

export function correlationLevel(strength: number): CorrelationLevel {
  if (strength > STRONG_CORRELATION) return 'Strong';
  if (strength > MODERATE_CORRELATION) return 'Moderate';
  return 'Weak';
}

export function generateInvestmentInsight(input: unknown): AnalysisOutcome<InvestmentInsight> {
  const decoded = decodePayload(InsightPayloadSchema, input, 'correlation result');
  if (!decoded.ok) return decoded.error;

  const {
    has_correlation: hasCorrelation,
    correlation_strength: strength,
    avg_price_change_with_news: avgWithNews,
    significant_price_days: significantDays,
  } = decoded.value;

  const newsImpact: NewsImpact = avgWithNews > 0 ? 'positive' : 'negative';

  let strategy: string = STRATEGIES.none;
  if (hasCorrelation && strength > MODERATE_CORRELATION) {
    strategy = newsImpact === 'positive' ? STRATEGIES.buyOnNews : STRATEGIES.hedgeOnNews;
  }

  // Largest moves first; only those with coverage name a likely cause
  const keyEvents: KeyMarketEvent[] = [...significantDays]
    .sort((a, b) => Math.abs(b.price_change) - Math.abs(a.price_change))
    .slice(0, KEY_EVENTS)
    .filter(day => day.news_count > 0)
    .map(day => ({
      date: day.date,
      price_change: day.price_change,
      likely_cause: day.news_titles[0] ?? 'No title available',
    }));

  return {
    correlation_detected: hasCorrelation,
    correlation_level: correlationLevel(strength),
    correlation_strength: strength,
    news_impact: newsImpact,
    recommended_strategy: strategy,
    key_market_moving_events: keyEvents,
  };
}
