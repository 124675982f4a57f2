// Research domain — price series, news articles and the research request/response

import type { ResearchStatistics } from '../analysis/types.js';

export type ResearchPeriod = '1wk' | '1mo' | (string & {});

/** One trading day, derived from two consecutive closes */
export interface PriceRecord {
  date: string;            // YYYY-MM-DD, unique per series
  close: number;
  prev_close: number;
  change: number;
  percent_change: number;
  volume: number;
}

export interface StockData {
  name: string;
  symbol: string;
  sector: string;
  industry: string;
  current_price: number | null;
  daily_changes: PriceRecord[];
}

export interface NewsArticle {
  title: string;
  description: string | null;
  url: string;
  source: string;
  published_at: string;    // YYYY-MM-DD
  content: string;
}

/** Price change and news for one calendar date */
export interface DailyNewsPrice {
  price_change_percent: number;
  close: number;
  news_articles: NewsArticle[];
}

export type CorrelationInput = Record<string, DailyNewsPrice>;

export interface ResearchRequest {
  ticker: string;
  period?: ResearchPeriod;
}

export type ResearchStatus = 'success' | 'error';

export interface ResearchResponse {
  ticker: string;
  stock_data?: StockData;
  fluctuation_analysis?: string;
  news_summary?: string;
  statistics?: ResearchStatistics;
  statistics_report?: string;
  agent_analysis?: string;
  agent_iterations?: number;
  correlation_analysis?: string;
  comprehensive_report?: string;
  status: ResearchStatus;
  error?: string;
}
