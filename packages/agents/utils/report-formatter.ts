// Report Formatter — plain-text sections of a research response
// Fluctuation and news summaries feed the model prompts; the statistics and
// full research reports are what the CLI prints.

import type { NewsArticle, ResearchResponse, StockData } from '../types/research.js';
import type { AnalysisOutcome, ResearchStatistics } from '../analysis/types.js';
import { isAnalysisError } from '../analysis/types.js';

const NEWS_PER_DAY = 3;
const DESCRIPTION_EXCERPT = 150;

function fixed(n: number): string {
  return n.toFixed(2);
}

export function analyzeFluctuations(stockData: StockData | null | undefined): string {
  const changes = stockData?.daily_changes ?? [];
  if (!stockData || changes.length === 0) {
    return 'Insufficient data to analyze fluctuations.';
  }

  let maxGain = changes[0];
  let maxLoss = changes[0];
  let total = 0;
  for (const c of changes) {
    if (c.percent_change > maxGain.percent_change) maxGain = c;
    if (c.percent_change < maxLoss.percent_change) maxLoss = c;
    total += c.percent_change;
  }
  const avg = total / changes.length;
  const price = stockData.current_price !== null ? `$${fixed(stockData.current_price)}` : 'N/A';

  const lines = [
    `Stock: ${stockData.name} (${stockData.symbol})`,
    `Sector: ${stockData.sector}, Industry: ${stockData.industry}`,
    `Current Price: ${price}`,
    '',
    `Analysis Period: ${changes[0].date} to ${changes[changes.length - 1].date}`,
    `Average Daily Change: ${fixed(avg)}%`,
    `Biggest Gain: ${fixed(maxGain.percent_change)}% on ${maxGain.date}`,
    `Biggest Loss: ${fixed(maxLoss.percent_change)}% on ${maxLoss.date}`,
    '',
    'Daily Changes:',
  ];
  for (const c of changes) {
    const direction = c.percent_change > 0 ? '↑' : '↓';
    lines.push(`${c.date}: ${fixed(c.percent_change)}% ${direction} ($${fixed(c.close)})`);
  }
  return lines.join('\n') + '\n';
}

export function extractKeyNewsPoints(articles: NewsArticle[]): string {
  if (articles.length === 0) {
    return 'No news articles found for the specified period.';
  }

  const byDate = new Map<string, NewsArticle[]>();
  for (const article of articles) {
    const bucket = byDate.get(article.published_at);
    if (bucket) bucket.push(article);
    else byDate.set(article.published_at, [article]);
  }

  let summary = 'News Summary:\n\n';
  for (const date of [...byDate.keys()].sort()) {
    const dayArticles = byDate.get(date) ?? [];
    summary += `Date: ${date}\n`;
    summary += `Number of articles: ${dayArticles.length}\n`;

    dayArticles.slice(0, NEWS_PER_DAY).forEach((article, i) => {
      summary += `  ${i + 1}. ${article.title} (Source: ${article.source})\n`;
      if (article.description) {
        const more = article.description.length > DESCRIPTION_EXCERPT ? '...' : '';
        summary += `     ${article.description.slice(0, DESCRIPTION_EXCERPT)}${more}\n`;
      }
    });

    if (dayArticles.length > NEWS_PER_DAY) {
      summary += `  ... and ${dayArticles.length - NEWS_PER_DAY} more articles\n`;
    }
    summary += '\n';
  }
  return summary;
}

function section<T>(title: string, outcome: AnalysisOutcome<T>, render: (value: T) => string[]): string[] {
  const body = isAnalysisError(outcome) ? [`- Unavailable: ${outcome.message}`] : render(outcome);
  return [`## ${title}`, '', ...body, ''];
}

/** Markdown summary of the directly computed statistics */
export function formatStatisticsReport(stats: ResearchStatistics): string {
  const lines = [
    ...section('Price Statistics', stats.price, p => [
      `- Period: ${p.analysis_period}`,
      `- Average daily change: ${fixed(p.average_daily_change)}%`,
      `- Up days: ${p.up_days} | Down days: ${p.down_days}`,
      `- Biggest gain: ${fixed(p.max_gain.percent)}% on ${p.max_gain.date}`,
      `- Biggest loss: ${fixed(p.max_loss.percent)}% on ${p.max_loss.date}`,
    ]),
    ...section('News Coverage', stats.news, n => {
      const range = n.date_range.length === 2 ? ` (${n.date_range[0]} to ${n.date_range[1]})` : '';
      const sources = n.top_sources.map(s => `${s.source} (${s.count})`).join(', ') || 'none';
      return [
        `- Articles: ${n.total_articles} across ${n.days_with_news} days${range}`,
        `- Top sources: ${sources}`,
      ];
    }),
    ...section('News / Price Correlation', stats.correlation, c => [
      `- Average move on news days: ${fixed(c.avg_price_change_with_news)}% (${c.days_with_news} days)`,
      `- Average move on quiet days: ${fixed(c.avg_price_change_without_news)}% (${c.days_without_news} days)`,
      `- Correlation detected: ${c.has_correlation ? 'yes' : 'no'} (strength ${fixed(c.correlation_strength)})`,
      `- Significant price days: ${c.significant_price_days.length}`,
    ]),
    ...section('Investment Insight', stats.insight, i => [
      `- Correlation level: ${i.correlation_level}`,
      `- News impact: ${i.news_impact}`,
      `- Strategy: ${i.recommended_strategy}`,
      ...(i.key_market_moving_events.length > 0
        ? ['- Key events:', ...i.key_market_moving_events.map(
            e => `  - ${e.date} (${fixed(e.price_change)}%): ${e.likely_cause}`,
          )]
        : ['- Key events: none']),
    ]),
  ];
  return lines.join('\n');
}

const RULE = '='.repeat(80);
const DIVIDER = '-'.repeat(80);

function block(title: string, body: string | undefined, fallback: string): string[] {
  return ['', DIVIDER, title, DIVIDER, body ?? fallback];
}

/** Full console rendering of a research response */
export function formatResearchReport(response: ResearchResponse): string {
  if (response.status === 'error') {
    return `Error: ${response.error ?? 'Unknown error'}`;
  }

  const lines = ['', RULE, `STOCK RESEARCH RESULTS FOR ${response.ticker}`, RULE];

  const stock = response.stock_data;
  if (stock) {
    lines.push(
      '',
      `Stock: ${stock.name} (${response.ticker})`,
      `Current Price: ${stock.current_price !== null ? `$${fixed(stock.current_price)}` : 'N/A'}`,
      `Sector: ${stock.sector}`,
      `Industry: ${stock.industry}`,
    );
  }

  lines.push(
    ...block('PRICE FLUCTUATION ANALYSIS', response.fluctuation_analysis, 'No analysis available'),
    ...block('NEWS SUMMARY', response.news_summary, 'No news summary available'),
    ...block('STATISTICS', response.statistics_report, 'No statistics available'),
    ...block('AGENT ANALYSIS', response.agent_analysis, 'No agent analysis available'),
    ...block('CORRELATION ANALYSIS', response.correlation_analysis, 'No correlation analysis available'),
    ...block('COMPREHENSIVE REPORT', response.comprehensive_report, 'No comprehensive report available'),
    '',
    RULE,
    '',
  );
  return lines.join('\n');
}
