export { loadConfig } from './env.js';
export type { ResearchConfig } from './env.js';
export {
  ANALYSIS_FUNCTION_NAMES, ANALYSIS_FUNCTIONS, FUNCTION_DESCRIPTIONS,
  FunctionRegistry, createAnalysisRegistry, isAnalysisFunctionName,
} from './function-registry.js';
export type { AnalysisFunctionMap, AnalysisFunctionName, RegisteredFunction } from './function-registry.js';
