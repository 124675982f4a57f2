// Result shapes of the four analysis functions
// Field names are snake_case: these objects are serialised back into the
// model's prompt and mirror the payload keys the model is asked to send.

export interface AnalysisErrorResult {
  status: 'error';
  message: string;
}

export interface PriceExtreme {
  date: string;
  percent: number;
  price: number;
}

export interface PriceAnalysis {
  ticker: string;
  company_name: string;
  current_price: number;
  analysis_period: string;
  average_daily_change: number;
  up_days: number;
  down_days: number;
  max_gain: PriceExtreme;
  max_loss: PriceExtreme;
}

export interface SourceCount {
  source: string;
  count: number;
}

export interface NewsAnalysis {
  total_articles: number;
  days_with_news: number;
  articles_by_date: Record<string, number>;
  top_sources: SourceCount[];
  date_range: [string, string] | [];
}

export interface SignificantDay {
  date: string;
  price_change: number;
  news_count: number;
  news_titles: string[];
}

export interface CorrelationAnalysis {
  days_with_news: number;
  days_without_news: number;
  avg_price_change_with_news: number;
  avg_price_change_without_news: number;
  difference: number;
  has_correlation: boolean;
  correlation_strength: number;
  significant_price_days: SignificantDay[];
}

export type CorrelationLevel = 'Strong' | 'Moderate' | 'Weak';
export type NewsImpact = 'positive' | 'negative';

export interface KeyMarketEvent {
  date: string;
  price_change: number;
  likely_cause: string;
}

export interface InvestmentInsight {
  correlation_detected: boolean;
  correlation_level: CorrelationLevel;
  correlation_strength: number;
  news_impact: NewsImpact;
  recommended_strategy: string;
  key_market_moving_events: KeyMarketEvent[];
}

export type AnalysisOutcome<T> = T | AnalysisErrorResult;

/** Directly computed statistics attached to a research response */
export interface ResearchStatistics {
  price: AnalysisOutcome<PriceAnalysis>;
  news: AnalysisOutcome<NewsAnalysis>;
  correlation: AnalysisOutcome<CorrelationAnalysis>;
  insight: AnalysisOutcome<InvestmentInsight>;
}

export function isAnalysisError(value: unknown): value is AnalysisErrorResult {
  return typeof value === 'object'
    && value !== null
    && 'status' in value
    && value.status === 'error';
}
