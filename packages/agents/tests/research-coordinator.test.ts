import { describe, it, expect, expectTypeOf, vi } from 'vitest';
import { ResearchCoordinator, normalizeTicker, type AgentAnalysis } from '../orchestrator/research-coordinator.js';
import type { ModelGateway } from '../bridge/model-gateway.js';
import type { FmpToolCaller } from '../utils/market-data-fetcher.js';
import { EXHAUSTED_MESSAGE } from '../agents/research-agent.js';
import { STRATEGIES } from '../analysis/index.js';
import { ResearchError } from '../types/errors.js';
import { silentLogger } from '../utils/logger.js';

const NOW = new Date('2024-03-08T12:00:00Z');

const HISTORY = [
  { date: '2024-03-04', close: 100, volume: 10 },
  { date: '2024-03-05', close: 104, volume: 30 },
  { date: '2024-03-06', close: 104, volume: 12 },
];

const NEWS = [
  { title: 'Acme beats estimates', text: 'Revenue up.', url: 'https://example.com/1', site: 'wire', publishedDate: '2024-03-05 13:00:00' },
  { title: 'Acme raises guidance', text: null, url: 'https://example.com/2', site: 'daily', publishedDate: '2024-03-05 16:00:00' },
  { title: 'Weekend feature', text: 'Profile.', url: 'https://example.com/3', site: 'blog', publishedDate: '2024-03-09 10:00:00' },
];

function fmpStub(overrides: Partial<Record<string, unknown>> = {}): FmpToolCaller {
  const data: Record<string, unknown> = {
    fmp_historical_price: HISTORY,
    fmp_company_profile: [{ companyName: 'Acme Corp', sector: 'Industrials', industry: 'Machinery', price: 104.5 }],
    fmp_search_stock_news: NEWS,
    ...overrides,
  };
  return vi.fn(async (tool: string) => data[tool]);
}

const AGENT_CALL = 'FUNCTION_CALL: analyze_price_data|[{"date":"2024-03-05","close":104,"percent_change":4}]';

/** Answers by prompt kind: report, correlation narrative, or agent step */
function routingGateway(agentReply: (prompt: string) => string = p =>
  p.includes('What should I do next?') ? 'FINAL_ANALYSIS: news drives the stock' : AGENT_CALL,
) {
  const prompts: string[] = [];
  const gateway: ModelGateway = {
    generate: vi.fn(async (prompt: string) => {
      prompts.push(prompt);
      if (prompt.startsWith('Please create a comprehensive research report')) return 'REPORT';
      if (prompt.startsWith('I need to analyze the correlation')) return 'CORRELATION NARRATIVE';
      return agentReply(prompt);
    }),
  };
  return { gateway, prompts };
}

function makeCoordinator(gateway: ModelGateway, callFmpTool: FmpToolCaller, extra: { maxIterations?: number; onEvent?: (e: { type: string; payload: unknown }) => void } = {}) {
  return new ResearchCoordinator({
    gateway,
    callFmpTool,
    logger: silentLogger,
    now: () => NOW,
    ...extra,
  });
}

// ─── research ───────────────────────────────────────────────────────────────

describe('ResearchCoordinator.research', () => {
  it('runs the full pipeline and returns every section', async () => {
    const { gateway, prompts } = routingGateway();
    const events: string[] = [];
    const coordinator = makeCoordinator(gateway, fmpStub(), { onEvent: e => events.push(e.type) });

    const result = await coordinator.research({ ticker: ' acme ' });

    expect(result.status).toBe('success');
    expect(result.ticker).toBe('ACME');
    expect(result.stock_data?.name).toBe('Acme Corp');
    expect(result.stock_data?.daily_changes.map(d => d.percent_change)).toEqual([4, 0]);
    expect(result.agent_analysis).toBe('FINAL_ANALYSIS: news drives the stock');
    expect(result.agent_iterations).toBe(2);
    expect(result.correlation_analysis).toBe('CORRELATION NARRATIVE');
    expect(result.comprehensive_report).toBe('REPORT');
    expect(result.fluctuation_analysis?.startsWith('Stock: Acme Corp (ACME)\n')).toBe(true);
    expect(result.news_summary?.startsWith('News Summary:\n\nDate: 2024-03-05\nNumber of articles: 2\n')).toBe(true);
    expect(result.statistics_report).toContain('## Investment Insight');

    // two agent steps, one correlation narrative, one report
    expect(prompts).toHaveLength(4);
    expect(events[0]).toBe('ResearchRequested');
    expect(events[events.length - 1]).toBe('ResearchCompleted');
    expect(events).toContain('AgentCompleted');
  });

  it('computes statistics from trading days only', async () => {
    const { gateway } = routingGateway();
    const result = await makeCoordinator(gateway, fmpStub()).research({ ticker: 'ACME' });

    expect(result.statistics?.correlation).toMatchObject({
      days_with_news: 1,
      days_without_news: 1,
      avg_price_change_with_news: 4,
      avg_price_change_without_news: 0,
      has_correlation: true,
      correlation_strength: 1,
    });
    expect(result.statistics?.insight).toMatchObject({
      correlation_level: 'Strong',
      news_impact: 'positive',
      recommended_strategy: STRATEGIES.buyOnNews,
      key_market_moving_events: [{ date: '2024-03-05', price_change: 4, likely_cause: 'Acme beats estimates' }],
    });
    expect(result.statistics?.news).toMatchObject({ total_articles: 3, days_with_news: 2 });
  });

  it('builds the correlation prompt from matched news days', async () => {
    const { gateway, prompts } = routingGateway();
    await makeCoordinator(gateway, fmpStub()).research({ ticker: 'ACME' });

    const correlationPrompt = prompts.find(p => p.startsWith('I need to analyze the correlation'));
    expect(correlationPrompt).toContain(
      'DATE: 2024-03-05\nPRICE CHANGE: 4.00% (Closed at $104.00)\nNEWS ARTICLES:\n1. Acme beats estimates\n   Revenue up.\n2. Acme raises guidance\n',
    );
    expect(correlationPrompt).not.toContain('Weekend feature');
  });

  it('reports the exhaustion sentinel but still succeeds', async () => {
    const { gateway } = routingGateway(() => AGENT_CALL);
    const result = await makeCoordinator(gateway, fmpStub(), { maxIterations: 2 }).research({ ticker: 'ACME' });

    expect(result.status).toBe('success');
    expect(result.agent_analysis).toBe(EXHAUSTED_MESSAGE);
    expect(result.agent_iterations).toBe(2);
  });

  it('returns an error response when there is no price history', async () => {
    const { gateway, prompts } = routingGateway();
    const failures: unknown[] = [];
    const coordinator = makeCoordinator(gateway, fmpStub({ fmp_historical_price: [] }), {
      onEvent: e => { if (e.type === 'ResearchFailed') failures.push(e.payload); },
    });

    const result = await coordinator.research({ ticker: 'ACME' });

    expect(result).toEqual({ ticker: 'ACME', status: 'error', error: 'Stock data not found for ticker ACME' });
    expect(prompts).toHaveLength(0);
    expect(failures).toEqual([expect.objectContaining({ ticker: 'ACME', stage: 'stock_data' })]);
  });

  it('keeps going when an event listener throws', async () => {
    const { gateway } = routingGateway();
    const coordinator = makeCoordinator(gateway, fmpStub(), {
      onEvent: () => { throw new Error('listener broke'); },
    });

    const result = await coordinator.research({ ticker: 'ACME' });

    expect(result.status).toBe('success');
    expect(result.agent_analysis).toBe('FINAL_ANALYSIS: news drives the stock');
    expect(result.agent_iterations).toBe(2);
  });

  it('rejects a blank ticker', async () => {
    const { gateway } = routingGateway();
    const result = await makeCoordinator(gateway, fmpStub()).research({ ticker: '   ' });
    expect(result).toEqual({ ticker: '', status: 'error', error: 'Ticker symbol is required' });
  });

  it('keeps going with no news', async () => {
    const { gateway, prompts } = routingGateway();
    const result = await makeCoordinator(gateway, fmpStub({ fmp_search_stock_news: [] })).research({ ticker: 'ACME' });

    expect(result.status).toBe('success');
    expect(result.news_summary).toBe('No news articles found for the specified period.');
    expect(result.correlation_analysis).toBe('Insufficient data to perform correlation analysis.');
    // agent steps and the report only
    expect(prompts.some(p => p.startsWith('I need to analyze the correlation'))).toBe(false);
  });
});

// ─── single-purpose operations ──────────────────────────────────────────────

describe('ResearchCoordinator operations', () => {
  it('getStockData throws ResearchError when history is missing', async () => {
    const { gateway } = routingGateway();
    const coordinator = makeCoordinator(gateway, fmpStub({ fmp_historical_price: [] }));
    await expect(coordinator.getStockData('acme')).rejects.toBeInstanceOf(ResearchError);
    await expect(coordinator.getStockData('acme')).rejects.toThrow('Stock data not found for ticker ACME');
  });

  it('getNews returns articles with their summary', async () => {
    const { gateway } = routingGateway();
    const news = await makeCoordinator(gateway, fmpStub()).getNews('ACME', 3);

    expect(news.ticker).toBe('ACME');
    expect(news.company_name).toBe('Acme Corp');
    expect(news.news_articles).toHaveLength(3);
    expect(news.news_summary.startsWith('News Summary:')).toBe(true);
  });

  it('getCorrelation asks the model only when dates match', async () => {
    const { gateway, prompts } = routingGateway();
    const onlyWeekend = fmpStub({ fmp_search_stock_news: [NEWS[2]] });
    const result = await makeCoordinator(gateway, onlyWeekend).getCorrelation('ACME');

    expect(result).toEqual({
      ticker: 'ACME',
      company_name: 'Acme Corp',
      correlation_analysis: 'No matching dates found between news articles and price data.',
    });
    expect(prompts).toHaveLength(0);
  });
});

describe('ResearchCoordinator.runAgentAnalysis', () => {
  it('returns the agent outcome with its transcript', async () => {
    const { gateway } = routingGateway();
    const coordinator = makeCoordinator(gateway, fmpStub());
    const stockData = await coordinator.getStockData('ACME');

    const analysis = await coordinator.runAgentAnalysis(stockData, []);

    expectTypeOf(analysis).toEqualTypeOf<AgentAnalysis>();
    expectTypeOf(analysis.iterations).toEqualTypeOf<number>();
    expect(analysis.state).toBe('completed');
    expect(analysis.result).toBe('FINAL_ANALYSIS: news drives the stock');
    expect(analysis.iterations).toBe(2);
    expect(analysis.transcript.map(r => r.kind)).toEqual(['function_call', 'text']);
  });
});

describe('normalizeTicker', () => {
  it('trims and upper-cases', () => {
    expect(normalizeTicker('  brk.b ')).toBe('BRK.B');
  });
});
