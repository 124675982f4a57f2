// Stock Research Agents
// LLM-driven research loop correlating company news with daily price moves

export { ResearchAgent, DEFAULT_MAX_ITERATIONS, DEFAULT_COMPLETION_MARKER, EXHAUSTED_MESSAGE } from './agents/research-agent.js';
export type { ResearchAgentConfig } from './agents/research-agent.js';
export { parseResponse, DEFAULT_FUNCTION_CALL_MARKER } from './agents/response-parser.js';
export type { ParsedResponse } from './agents/response-parser.js';
export { buildPrompt, renderRecord, renderTranscript } from './agents/transcript.js';
export {
  buildAgentSystemPrompt, buildAgentQuery, buildCorrelationPrompt, buildComprehensiveReportPrompt,
  FINAL_ANALYSIS_MARKER, FINAL_ANALYSIS_COMPLETION,
} from './agents/prompts.js';

export { ResearchCoordinator, normalizeTicker, DEFAULT_PERIOD } from './orchestrator/research-coordinator.js';
export type {
  ResearchCoordinatorConfig, AgentAnalysis, NewsResult, CorrelationResult,
} from './orchestrator/research-coordinator.js';

export * from './analysis/index.js';
export * from './config/index.js';
export * from './types/index.js';

// Bridge — model access and the FMP market data server
export { AnthropicGateway, queryModel, DEFAULT_MODEL } from './bridge/model-gateway.js';
export type { ModelGateway, AnthropicGatewayConfig } from './bridge/model-gateway.js';
export { FmpBridge, createFmpToolCaller } from './bridge/fmp-bridge.js';
export type { FmpBridgeConfig } from './bridge/fmp-bridge.js';

export {
  fetchStockData, fetchNews, buildCorrelationInput, alignNewsWithPrices, computeDailyChanges,
} from './utils/market-data-fetcher.js';
export type { FmpToolCaller } from './utils/market-data-fetcher.js';
export {
  analyzeFluctuations, extractKeyNewsPoints, formatStatisticsReport, formatResearchReport,
} from './utils/report-formatter.js';
export { createLogger, silentLogger } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
