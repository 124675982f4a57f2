// Market Data Fetcher — daily price changes, company profile and news from FMP
// Maps FMP payloads onto StockData / NewsArticle and aligns news with trading days

import { z } from 'zod';
import type {
  CorrelationInput, NewsArticle, PriceRecord, ResearchPeriod, StockData,
} from '../types/research.js';
import type { DatedNews } from '../agents/prompts.js';
import { errorMessage } from '../types/errors.js';
import { silentLogger, type Logger } from './logger.js';

export type FmpToolCaller = (toolName: string, params: Record<string, unknown>) => Promise<unknown>;

export const DEFAULT_NEWS_DAYS = 7;
export const NEWS_PAGE_SIZE = 25;

/** Calendar days of history for a period; anything but `1mo` is one week */
export function periodDays(period: ResearchPeriod): number {
  return period === '1mo' ? 30 : 7;
}
const DAY_MS = 86_400_000;

export function isoDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

/** `YYYY-MM-DD` window ending at `now` */
export function dateWindow(days: number, now: Date): { from: string; to: string } {
  return { from: isoDate(new Date(now.getTime() - days * DAY_MS)), to: isoDate(now) };
}

// ── FMP payload shapes ──────────────────────────────────────────────────────

const HistoricalBarSchema = z.object({
  date: z.string().min(10),
  close: z.coerce.number(),
  volume: z.coerce.number().default(0),
}).passthrough();

// stable API returns a bare array; the v3 endpoint wraps it in { historical }
const HistoricalSchema = z.union([
  z.array(HistoricalBarSchema),
  z.object({ historical: z.array(HistoricalBarSchema) }).transform(v => v.historical),
]);

const ProfileSchema = z.object({
  companyName: z.string().optional(),
  sector: z.string().nullish(),
  industry: z.string().nullish(),
  price: z.coerce.number().optional(),
}).passthrough();

const NewsItemSchema = z.object({
  title: z.string().default(''),
  text: z.string().nullish(),
  url: z.string().default(''),
  site: z.string().nullish(),
  publisher: z.string().nullish(),
  publishedDate: z.string().default(''),
});

export type HistoricalBar = z.infer<typeof HistoricalBarSchema>;

function firstRecord(value: unknown): unknown {
  return Array.isArray(value) ? value[0] : value;
}

// ── Price series ────────────────────────────────────────────────────────────

/** Close-to-close changes; the first trading day has no predecessor and is skipped */
export function computeDailyChanges(bars: HistoricalBar[]): PriceRecord[] {
  const sorted = [...bars]
    .map(b => ({ ...b, date: b.date.slice(0, 10) }))
    .sort((a, b) => a.date.localeCompare(b.date));

  const changes: PriceRecord[] = [];
  for (let i = 1; i < sorted.length; i++) {
    const prev = sorted[i - 1].close;
    const curr = sorted[i].close;
    const change = curr - prev;
    changes.push({
      date: sorted[i].date,
      close: curr,
      prev_close: prev,
      change,
      percent_change: prev !== 0 ? (change * 100) / prev : 0,
      volume: sorted[i].volume,
    });
  }
  return changes;
}

/**
 * Fetch price history and profile for `ticker`.
 * Returns null when there is no usable price history.
 */
export async function fetchStockData(
  ticker: string,
  period: ResearchPeriod,
  callFmp: FmpToolCaller,
  options: { now?: Date; logger?: Logger } = {},
): Promise<StockData | null> {
  const logger = options.logger ?? silentLogger;
  const { from, to } = dateWindow(periodDays(period), options.now ?? new Date());

  const [history, profile] = await Promise.allSettled([
    callFmp('fmp_historical_price', { symbol: ticker, from, to }),
    callFmp('fmp_company_profile', { symbol: ticker }),
  ]);

  if (history.status === 'rejected') {
    logger.error(`Error fetching stock data for ${ticker}`, { error: errorMessage(history.reason) });
    return null;
  }
  const bars = HistoricalSchema.safeParse(history.value);
  if (!bars.success || bars.data.length === 0) {
    logger.warn(`No price history for ${ticker}`, { from, to });
    return null;
  }

  if (profile.status === 'rejected') {
    logger.warn(`Profile unavailable for ${ticker}`, { error: errorMessage(profile.reason) });
  }
  const parsedProfile = profile.status === 'fulfilled'
    ? ProfileSchema.safeParse(firstRecord(profile.value))
    : null;
  const info: z.infer<typeof ProfileSchema> = parsedProfile?.success ? parsedProfile.data : {};

  const dailyChanges = computeDailyChanges(bars.data);
  const lastClose = dailyChanges.length > 0 ? dailyChanges[dailyChanges.length - 1].close : null;

  return {
    name: info.companyName || ticker,
    symbol: ticker,
    sector: info.sector || 'Unknown',
    industry: info.industry || 'Unknown',
    current_price: info.price ?? lastClose,
    daily_changes: dailyChanges,
  };
}

// ── News ────────────────────────────────────────────────────────────────────

/**
 * Most recent news for `ticker` over the last `days` days (one page).
 * Failures are logged and yield an empty list.
 */
export async function fetchNews(
  companyName: string,
  ticker: string,
  callFmp: FmpToolCaller,
  options: { days?: number; now?: Date; logger?: Logger } = {},
): Promise<NewsArticle[]> {
  const logger = options.logger ?? silentLogger;
  const { from, to } = dateWindow(options.days ?? DEFAULT_NEWS_DAYS, options.now ?? new Date());

  let raw: unknown;
  try {
    raw = await callFmp('fmp_search_stock_news', {
      symbols: ticker, from, to, page: 0, limit: NEWS_PAGE_SIZE,
    });
  } catch (err) {
    logger.error(`Error fetching news for ${companyName} (${ticker})`, { error: errorMessage(err) });
    return [];
  }

  const items = z.array(NewsItemSchema).safeParse(raw);
  if (!items.success) {
    logger.warn(`Unexpected news payload for ${ticker}`);
    return [];
  }

  return items.data.map(item => ({
    title: item.title,
    description: item.text ?? null,
    url: item.url,
    source: item.site || item.publisher || 'Unknown',
    published_at: item.publishedDate.slice(0, 10),
    content: item.text ?? '',
  }));
}

// ── Alignment ───────────────────────────────────────────────────────────────

function publishedDay(article: NewsArticle): string {
  return article.published_at.slice(0, 10);
}

/** Articles grouped by publication day, in input order within each day */
export function groupNewsByDate(articles: NewsArticle[]): Map<string, NewsArticle[]> {
  const byDate = new Map<string, NewsArticle[]>();
  for (const article of articles) {
    const day = publishedDay(article);
    if (!day) continue;
    const bucket = byDate.get(day);
    if (bucket) bucket.push(article);
    else byDate.set(day, [article]);
  }
  return byDate;
}

/**
 * One entry per trading day. News published on non-trading days is dropped;
 * trading days without news carry an empty list.
 */
export function buildCorrelationInput(stockData: StockData, articles: NewsArticle[]): CorrelationInput {
  const news = groupNewsByDate(articles);
  const input: CorrelationInput = {};
  for (const record of stockData.daily_changes) {
    input[record.date] = {
      price_change_percent: record.percent_change,
      close: record.close,
      news_articles: news.get(record.date) ?? [],
    };
  }
  return input;
}

/** News days that have a price record, with at most `perDay` articles each */
export function alignNewsWithPrices(
  stockData: StockData,
  articles: NewsArticle[],
  perDay = 3,
): DatedNews[] {
  const prices = new Map(stockData.daily_changes.map(r => [r.date, r]));
  const matches: DatedNews[] = [];
  for (const [date, news] of groupNewsByDate(articles)) {
    const price = prices.get(date);
    if (price) matches.push({ date, price, news: news.slice(0, perDay) });
  }
  return matches;
}
