// Function registry — the closed set of analysis operations the agent may call
// The model names a function in its FUNCTION_CALL line; the registry maps that
// name to one of the four analysis functions. Nothing else can be registered.

import {
  analyzePriceData,
  analyzeNewsSentiment,
  correlateNewsAndPrice,
  generateInvestmentInsight,
  type AnalysisOutcome,
  type CorrelationAnalysis,
  type InvestmentInsight,
  type NewsAnalysis,
  type PriceAnalysis,
} from '../analysis/index.js';
import { ConfigurationError, FunctionInvocationError, UnknownFunctionError } from '../types/errors.js';

export const ANALYSIS_FUNCTION_NAMES = [
  'analyze_price_data',
  'analyze_news_sentiment',
  'correlate_news_and_price',
  'generate_investment_insight',
] as const;

export type AnalysisFunctionName = typeof ANALYSIS_FUNCTION_NAMES[number];

/** Typed contract of each operation in the closed set */
export interface AnalysisFunctionMap {
  analyze_price_data: (payload: unknown) => AnalysisOutcome<PriceAnalysis>;
  analyze_news_sentiment: (payload: unknown) => AnalysisOutcome<NewsAnalysis>;
  correlate_news_and_price: (payload: unknown) => AnalysisOutcome<CorrelationAnalysis>;
  generate_investment_insight: (payload: unknown) => AnalysisOutcome<InvestmentInsight>;
}

export type RegisteredFunction = (payload: string) => unknown;

/** One-line descriptions rendered into the agent's system prompt */
export const FUNCTION_DESCRIPTIONS: Record<AnalysisFunctionName, string> = {
  analyze_price_data:
    'Summarise a price series. Payload: JSON array of {date, close, percent_change} or a stock object with daily_changes.',
  analyze_news_sentiment:
    'Aggregate news coverage by date and source. Payload: JSON array of {title, source, published_at}.',
  correlate_news_and_price:
    'Compare price moves on days with and without news. Payload: JSON object keyed by date of {price_change_percent, news_articles}.',
  generate_investment_insight:
    'Turn a correlate_news_and_price result into a strategy. Payload: the JSON result of correlate_news_and_price.',
};

export const ANALYSIS_FUNCTIONS: AnalysisFunctionMap = {
  analyze_price_data: analyzePriceData,
  analyze_news_sentiment: analyzeNewsSentiment,
  correlate_news_and_price: correlateNewsAndPrice,
  generate_investment_insight: generateInvestmentInsight,
};

export function isAnalysisFunctionName(name: string): name is AnalysisFunctionName {
  return ANALYSIS_FUNCTION_NAMES.some(n => n === name);
}

export class FunctionRegistry {
  private readonly entries: ReadonlyMap<AnalysisFunctionName, RegisteredFunction>;

  /**
   * @throws ConfigurationError when an entry is outside the closed set
   */
  constructor(entries: Record<string, RegisteredFunction>) {
    const map = new Map<AnalysisFunctionName, RegisteredFunction>();
    for (const [name, fn] of Object.entries(entries)) {
      if (!isAnalysisFunctionName(name)) {
        throw new ConfigurationError(
          `Cannot register "${name}": allowed functions are ${ANALYSIS_FUNCTION_NAMES.join(', ')}`,
        );
      }
      map.set(name, fn);
    }
    this.entries = map;
    Object.freeze(this);
  }

  get names(): AnalysisFunctionName[] {
    return [...this.entries.keys()];
  }

  has(name: string): boolean {
    return isAnalysisFunctionName(name) && this.entries.has(name);
  }

  get(name: string): RegisteredFunction | undefined {
    return isAnalysisFunctionName(name) ? this.entries.get(name) : undefined;
  }

  /**
   * Invoke a registered function with the model's raw payload.
   * @throws UnknownFunctionError | FunctionInvocationError
   */
  invoke(name: string, payload: string): unknown {
    const fn = this.get(name);
    if (!fn) throw new UnknownFunctionError(name);
    try {
      return fn(payload);
    } catch (err) {
      throw new FunctionInvocationError(name, err);
    }
  }

  describe(): string {
    return this.names
      .map(name => `- ${name}: ${FUNCTION_DESCRIPTIONS[name]}`)
      .join('\n');
  }
}

/** Registry holding all four analysis operations */
export function createAnalysisRegistry(): FunctionRegistry {
  return new FunctionRegistry({ ...ANALYSIS_FUNCTIONS });
}
