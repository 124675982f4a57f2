// Research Coordinator — runs one stock research request end to end
// Market data → computed statistics → agent loop → model correlation → report

import { randomUUID } from 'node:crypto';
import type { ModelGateway } from '../bridge/model-gateway.js';
import { queryModel } from '../bridge/model-gateway.js';
import { createAnalysisRegistry, type FunctionRegistry } from '../config/function-registry.js';
import { ResearchAgent } from '../agents/research-agent.js';
import {
  FINAL_ANALYSIS_COMPLETION,
  buildAgentQuery,
  buildAgentSystemPrompt,
  buildComprehensiveReportPrompt,
  buildCorrelationPrompt,
} from '../agents/prompts.js';
import {
  analyzeNewsSentiment,
  analyzePriceData,
  correlateNewsAndPrice,
  generateInvestmentInsight,
  isAnalysisError,
  type ResearchStatistics,
} from '../analysis/index.js';
import type { DomainEventType, EventBus } from '../types/events.js';
import { SimpleEventBus } from '../types/events.js';
import type {
  NewsArticle, ResearchPeriod, ResearchRequest, ResearchResponse, StockData,
} from '../types/research.js';
import type { AgentOutcome, IterationRecord } from '../types/transcript.js';
import { ResearchError, errorMessage } from '../types/errors.js';
import {
  DEFAULT_NEWS_DAYS,
  alignNewsWithPrices,
  buildCorrelationInput,
  fetchNews,
  fetchStockData,
  type FmpToolCaller,
} from '../utils/market-data-fetcher.js';
import {
  analyzeFluctuations,
  extractKeyNewsPoints,
  formatStatisticsReport,
} from '../utils/report-formatter.js';
import { createLogger, type Logger } from '../utils/logger.js';

export const DEFAULT_PERIOD: ResearchPeriod = '1wk';

export interface ResearchCoordinatorConfig {
  gateway: ModelGateway;
  callFmpTool: FmpToolCaller;
  maxIterations?: number;
  /** Defaults to the closed set of four analysis functions */
  registry?: FunctionRegistry;
  newsDays?: number;
  eventBus?: EventBus;
  onEvent?: (event: { type: string; payload: unknown }) => void;
  logger?: Logger;
  /** Clock for the date windows sent to FMP */
  now?: () => Date;
}

export type AgentAnalysis = AgentOutcome & {
  transcript: readonly IterationRecord[];
};

export interface NewsResult {
  ticker: string;
  company_name: string;
  news_articles: NewsArticle[];
  news_summary: string;
}

export interface CorrelationResult {
  ticker: string;
  company_name: string;
  correlation_analysis: string;
}

const EVENT_TYPES: readonly DomainEventType[] = [
  'ResearchRequested', 'ResearchCompleted', 'ResearchFailed',
  'IterationStarted', 'FunctionCalled', 'FunctionSucceeded', 'FunctionFailed',
  'AgentCompleted', 'AgentExhausted',
];

export function normalizeTicker(ticker: string): string {
  return ticker.trim().toUpperCase();
}

export class ResearchCoordinator {
  readonly eventBus: EventBus;
  private readonly gateway: ModelGateway;
  private readonly callFmpTool: FmpToolCaller;
  private readonly registry: FunctionRegistry;
  private readonly maxIterations?: number;
  private readonly newsDays: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(config: ResearchCoordinatorConfig) {
    this.gateway = config.gateway;
    this.callFmpTool = config.callFmpTool;
    this.registry = config.registry ?? createAnalysisRegistry();
    this.maxIterations = config.maxIterations;
    this.newsDays = config.newsDays ?? DEFAULT_NEWS_DAYS;
    this.eventBus = config.eventBus ?? new SimpleEventBus();
    this.logger = config.logger ?? createLogger('Research');
    this.now = config.now ?? (() => new Date());

    if (config.onEvent) {
      const handler = config.onEvent;
      for (const type of EVENT_TYPES) {
        this.eventBus.on(type, (e) => {
          try {
            handler({ type: e.type, payload: e.payload });
          } catch (err) {
            this.logger.warn(`onEvent listener failed for ${e.type}`, { error: errorMessage(err) });
          }
        });
      }
    }
  }

  /**
   * Full research run. Never throws: failures come back as `status: 'error'`.
   */
  async research(request: ResearchRequest): Promise<ResearchResponse> {
    const ticker = normalizeTicker(request.ticker);
    if (!ticker) {
      return { ticker, status: 'error', error: 'Ticker symbol is required' };
    }
    const period = request.period ?? DEFAULT_PERIOD;
    const requestId = randomUUID();
    const started = Date.now();

    this.logger.info(`Researching ${ticker}`, { requestId, period });

    try {
      this.emit('ResearchRequested', { requestId, ticker, period });
      const stockData = await this.getStockData(ticker, period);
      const articles = await this.fetchArticles(stockData.name, ticker, this.newsDays);

      const fluctuationAnalysis = analyzeFluctuations(stockData);
      const newsSummary = extractKeyNewsPoints(articles);
      const statistics = this.computeStatistics(stockData, articles);
      const statisticsReport = formatStatisticsReport(statistics);

      const agent = await this.runAgentAnalysis(stockData, articles);
      const correlationAnalysis = await this.correlateWithModel(stockData, articles);

      const comprehensiveReport = await queryModel(
        this.gateway,
        buildComprehensiveReportPrompt(ticker, stockData, {
          fluctuationAnalysis,
          newsSummary,
          correlationAnalysis,
          agentAnalysis: agent.result,
          statisticsReport,
        }),
      );

      this.emit('ResearchCompleted', {
        requestId, ticker, agentState: agent.state, duration: Date.now() - started,
      });
      this.logger.info(`Research complete for ${ticker}`, {
        requestId, agentState: agent.state, iterations: agent.iterations,
      });

      return {
        ticker,
        stock_data: stockData,
        fluctuation_analysis: fluctuationAnalysis,
        news_summary: newsSummary,
        statistics,
        statistics_report: statisticsReport,
        agent_analysis: agent.result,
        agent_iterations: agent.iterations,
        correlation_analysis: correlationAnalysis,
        comprehensive_report: comprehensiveReport,
        status: 'success',
      };
    } catch (err) {
      const error = errorMessage(err);
      const stage = err instanceof ResearchError ? err.stage : 'unknown';
      this.logger.error(`Research failed for ${ticker}`, { requestId, stage, error });
      this.emit('ResearchFailed', { requestId, ticker, stage, error });
      return { ticker, status: 'error', error };
    }
  }

  /** @throws ResearchError when no price history is available */
  async getStockData(ticker: string, period: ResearchPeriod = DEFAULT_PERIOD): Promise<StockData> {
    const symbol = normalizeTicker(ticker);
    const stockData = await fetchStockData(symbol, period, this.callFmpTool, {
      now: this.now(), logger: this.logger,
    });
    if (!stockData) {
      throw new ResearchError(`Stock data not found for ticker ${symbol}`, 'stock_data');
    }
    return stockData;
  }

  async getNews(ticker: string, days: number = this.newsDays): Promise<NewsResult> {
    const stockData = await this.getStockData(ticker);
    const articles = await this.fetchArticles(stockData.name, stockData.symbol, days);
    return {
      ticker: stockData.symbol,
      company_name: stockData.name,
      news_articles: articles,
      news_summary: extractKeyNewsPoints(articles),
    };
  }

  async getCorrelation(ticker: string, period: ResearchPeriod = DEFAULT_PERIOD): Promise<CorrelationResult> {
    const stockData = await this.getStockData(ticker, period);
    const articles = await this.fetchArticles(stockData.name, stockData.symbol, this.newsDays);
    return {
      ticker: stockData.symbol,
      company_name: stockData.name,
      correlation_analysis: await this.correlateWithModel(stockData, articles),
    };
  }

  /** The four analysis functions applied directly, without the model */
  computeStatistics(stockData: StockData, articles: NewsArticle[]): ResearchStatistics {
    const byDate = buildCorrelationInput(stockData, articles);
    const correlation = correlateNewsAndPrice(byDate);
    return {
      price: analyzePriceData(stockData),
      news: analyzeNewsSentiment(articles),
      correlation,
      insight: isAnalysisError(correlation) ? correlation : generateInvestmentInsight(correlation),
    };
  }

  async runAgentAnalysis(stockData: StockData, articles: NewsArticle[]): Promise<AgentAnalysis> {
    const agent = new ResearchAgent({
      gateway: this.gateway,
      registry: this.registry,
      maxIterations: this.maxIterations,
      eventBus: this.eventBus,
      logger: this.logger,
    });
    agent.setSystemPrompt(buildAgentSystemPrompt(this.registry));
    agent.setInitialQuery(buildAgentQuery(stockData, articles, buildCorrelationInput(stockData, articles)));

    const outcome = await agent.run(FINAL_ANALYSIS_COMPLETION);
    return { ...outcome, transcript: agent.transcript };
  }

  /** Free-text correlation narrative from the model over matched news days */
  async correlateWithModel(stockData: StockData, articles: NewsArticle[]): Promise<string> {
    if (stockData.daily_changes.length === 0 || articles.length === 0) {
      return 'Insufficient data to perform correlation analysis.';
    }
    const matches = alignNewsWithPrices(stockData, articles);
    if (matches.length === 0) {
      return 'No matching dates found between news articles and price data.';
    }
    return queryModel(this.gateway, buildCorrelationPrompt(stockData, matches));
  }

  private async fetchArticles(companyName: string, ticker: string, days: number): Promise<NewsArticle[]> {
    return fetchNews(companyName, ticker, this.callFmpTool, {
      days, now: this.now(), logger: this.logger,
    });
  }

  private emit(type: DomainEventType, payload: Record<string, unknown>): void {
    this.eventBus.emit({
      eventId: randomUUID(),
      type,
      timestamp: new Date(),
      sourceContext: 'ResearchCoordinator',
      payload,
    });
  }
}
