// Prompt builders for the research agent and the one-shot model queries

import type { FunctionRegistry } from '../config/function-registry.js';
import type { CorrelationInput, NewsArticle, PriceRecord, StockData } from '../types/research.js';
import { DEFAULT_FUNCTION_CALL_MARKER } from './response-parser.js';

export const FINAL_ANALYSIS_MARKER = 'FINAL_ANALYSIS:';
/** Substring the coordinator watches for; matches the marker above */
export const FINAL_ANALYSIS_COMPLETION = 'FINAL_ANALYSIS';

export interface AgentPromptOptions {
  functionCallMarker?: string;
  finalAnswerMarker?: string;
}

export function buildAgentSystemPrompt(
  registry: FunctionRegistry,
  options: AgentPromptOptions = {},
): string {
  const call = options.functionCallMarker ?? DEFAULT_FUNCTION_CALL_MARKER;
  const final = options.finalAnswerMarker ?? FINAL_ANALYSIS_MARKER;

  return `You are a stock research analyst investigating how news events relate to a stock's price movements.
You work in steps. Every response must be EXACTLY ONE line in one of these forms:

${call} <function_name>|<json payload>
${final} <your complete analysis>

Available functions:
${registry.describe()}

Rules:
- Payloads must be valid JSON, copied from the data in the query or from earlier function results.
- Do not repeat a call whose result you already have.
- Pass the result of correlate_news_and_price to generate_investment_insight.
- Once you have the statistics you need, answer with ${final} covering the price trend, the news coverage,
  the strength of the news/price relationship, the key market-moving events and a suggested strategy.`;
}

type SlimArticle = Pick<NewsArticle, 'title' | 'source' | 'published_at'>;

function slimArticle(article: NewsArticle): SlimArticle {
  return { title: article.title, source: article.source, published_at: article.published_at };
}

function slimCorrelationInput(byDate: CorrelationInput): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [date, day] of Object.entries(byDate)) {
    out[date] = {
      price_change_percent: day.price_change_percent,
      news_articles: day.news_articles.map(a => ({ title: a.title })),
    };
  }
  return out;
}

function slimPrice(record: PriceRecord): Pick<PriceRecord, 'date' | 'close' | 'percent_change'> {
  return { date: record.date, close: record.close, percent_change: record.percent_change };
}

export function buildAgentQuery(
  stockData: StockData,
  articles: NewsArticle[],
  byDate: CorrelationInput,
): string {
  return `Research how news relates to price movements for ${stockData.name} (${stockData.symbol}).

PRICE DATA (daily_changes):
${JSON.stringify(stockData.daily_changes.map(slimPrice))}

NEWS ARTICLES:
${JSON.stringify(articles.map(slimArticle))}

NEWS AND PRICE BY DATE:
${JSON.stringify(slimCorrelationInput(byDate))}`;
}

export interface DatedNews {
  date: string;
  price: PriceRecord;
  news: NewsArticle[];
}

function excerpt(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export function buildCorrelationPrompt(stockData: StockData, matches: DatedNews[]): string {
  let prompt = `I need to analyze the correlation between news articles and stock price changes for ${stockData.name} (${stockData.symbol}).

Here is the data:
`;

  for (const { date, price, news } of matches) {
    prompt += `\nDATE: ${date}\n`;
    prompt += `PRICE CHANGE: ${price.percent_change.toFixed(2)}% (Closed at $${price.close.toFixed(2)})\n`;
    prompt += 'NEWS ARTICLES:\n';
    news.forEach((article, i) => {
      prompt += `${i + 1}. ${article.title}\n`;
      if (article.description) {
        prompt += `   ${excerpt(article.description, 200)}\n`;
      }
    });
  }

  prompt += `
Based on this data, please:
1. Analyze whether there appears to be a correlation between news events and stock price movements
2. Identify specific news events that likely influenced significant price changes
3. Provide a brief summary of how news sentiment appears to affect this stock
4. Rate the strength of the correlation on a scale of 1-10

Format your response as a concise analysis that could be presented to an investor.`;

  return prompt;
}

export interface ReportSections {
  fluctuationAnalysis: string;
  newsSummary: string;
  correlationAnalysis: string;
  agentAnalysis: string;
  statisticsReport: string;
}

export function buildComprehensiveReportPrompt(
  ticker: string,
  stockData: StockData,
  sections: ReportSections,
): string {
  return `Please create a comprehensive research report for ${stockData.name} (${ticker}) based on the following data:

STOCK PRICE FLUCTUATION ANALYSIS:
${sections.fluctuationAnalysis}

NEWS SUMMARY:
${sections.newsSummary}

CORRELATION ANALYSIS:
${sections.correlationAnalysis}

COMPUTED STATISTICS:
${sections.statisticsReport}

ANALYST AGENT FINDINGS:
${sections.agentAnalysis}

Based on this information, please:
1. Create an executive summary of the key findings
2. Identify the most important news events that affected the stock price
3. Provide insights on how this stock reacts to news
4. Suggest potential trading strategies based on news-price correlation

Format your response as a professional investment research report with clear sections and actionable insights.`;
}
