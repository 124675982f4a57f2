export { analyzePriceData } from './price-analysis.js';
export { analyzeNewsSentiment } from './news-analysis.js';
export { correlateNewsAndPrice, CORRELATION_THRESHOLD, SIGNIFICANT_MOVE } from './correlation.js';
export {
  generateInvestmentInsight, correlationLevel, STRATEGIES,
  STRONG_CORRELATION, MODERATE_CORRELATION,
} from './investment-insight.js';
export * from './types.js';
