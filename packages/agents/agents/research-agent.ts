// Research agent — bounded iterative loop between the model and the analysis functions
//
// Running(k) → Running(k+1) on every model round-trip; Completed once a text
// response contains the completion marker; Exhausted at the iteration ceiling.
// Unknown or malformed function calls are recorded and the loop carries on.

import { randomUUID } from 'node:crypto';
import type { FunctionRegistry } from '../config/function-registry.js';
import type { ModelGateway } from '../bridge/model-gateway.js';
import { queryModel } from '../bridge/model-gateway.js';
import type { DomainEventType, EventBus } from '../types/events.js';
import type { AgentOutcome, IterationRecord } from '../types/transcript.js';
import {
  ConfigurationError, MalformedFunctionCallError, UnknownFunctionError, errorMessage,
} from '../types/errors.js';
import { DEFAULT_FUNCTION_CALL_MARKER, parseResponse, type ParsedResponse } from './response-parser.js';
import { buildPrompt } from './transcript.js';
import { isAnalysisError } from '../analysis/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export const DEFAULT_MAX_ITERATIONS = 5;
export const DEFAULT_COMPLETION_MARKER = 'FINAL';
export const EXHAUSTED_MESSAGE = 'Maximum iterations reached without completion';

export interface ResearchAgentConfig {
  gateway: ModelGateway;
  registry: FunctionRegistry;
  maxIterations?: number;
  functionCallMarker?: string;
  eventBus?: EventBus;
  logger?: Logger;
}

export class ResearchAgent {
  readonly agentId: string;
  readonly maxIterations: number;

  private readonly gateway: ModelGateway;
  private readonly registry: FunctionRegistry;
  private readonly functionCallMarker: string;
  private readonly eventBus?: EventBus;
  private readonly logger: Logger;

  private systemPrompt = '';
  private initialQuery = '';
  private readonly records: IterationRecord[] = [];
  private iteration = 0;
  private outcome: AgentOutcome | null = null;

  constructor(config: ResearchAgentConfig) {
    const maxIterations = config.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new ConfigurationError(`maxIterations must be a positive integer, got ${maxIterations}`);
    }
    const marker = config.functionCallMarker ?? DEFAULT_FUNCTION_CALL_MARKER;
    if (!marker) {
      throw new ConfigurationError('functionCallMarker must be a non-empty string');
    }

    this.agentId = randomUUID();
    this.maxIterations = maxIterations;
    this.gateway = config.gateway;
    this.registry = config.registry;
    this.functionCallMarker = marker;
    this.eventBus = config.eventBus;
    this.logger = config.logger ?? silentLogger;
  }

  setSystemPrompt(systemPrompt: string): void {
    this.assertNotStarted('system prompt');
    this.systemPrompt = systemPrompt;
  }

  setInitialQuery(query: string): void {
    this.assertNotStarted('initial query');
    this.initialQuery = query;
  }

  /** Snapshot of the records so far, oldest first */
  get transcript(): readonly IterationRecord[] {
    return [...this.records];
  }

  get iterations(): number {
    return this.iteration;
  }

  /**
   * One model round-trip. Returns the appended record, or null once the
   * iteration budget is spent or the run has finished (no model call is made then).
   *
   * @throws ConfigurationError when the system prompt or query is missing
   */
  async executeIteration(): Promise<IterationRecord | null> {
    this.assertConfigured();
    if (this.outcome || this.iteration >= this.maxIterations) return null;

    const iteration = ++this.iteration;
    this.emit('IterationStarted', { iteration });

    const prompt = buildPrompt(this.systemPrompt, this.initialQuery, this.records);
    this.logger.debug(`Iteration ${iteration} start`, { promptLength: prompt.length });

    const response = await queryModel(this.gateway, prompt);
    const record = Object.freeze(this.dispatch(iteration, response));
    this.records.push(record);

    this.logger.debug(`Iteration ${iteration} recorded ${record.kind}`);
    return record;
  }

  /**
   * Iterate until a text response contains `completionMarker` or the budget
   * runs out. The agent is single use: later calls return the first outcome.
   */
  async run(completionMarker: string = DEFAULT_COMPLETION_MARKER): Promise<AgentOutcome> {
    if (this.outcome) return this.outcome;
    if (!completionMarker) {
      throw new ConfigurationError('completionMarker must be a non-empty string');
    }
    this.assertConfigured();

    while (this.iteration < this.maxIterations) {
      const record = await this.executeIteration();
      if (!record) break;

      if (record.kind === 'text' && record.response.includes(completionMarker)) {
        this.outcome = { state: 'completed', result: record.response, iterations: this.iteration };
        this.logger.info('Agent execution complete', { agentId: this.agentId, iterations: this.iteration });
        this.emit('AgentCompleted', { iterations: this.iteration });
        return this.outcome;
      }
    }

    this.outcome = { state: 'exhausted', result: EXHAUSTED_MESSAGE, iterations: this.iteration };
    this.logger.warn('Maximum iterations reached', { agentId: this.agentId, iterations: this.iteration });
    this.emit('AgentExhausted', { iterations: this.iteration });
    return this.outcome;
  }

  /** Final text, or the exhaustion sentinel */
  async runUntilCompletion(completionMarker: string = DEFAULT_COMPLETION_MARKER): Promise<string> {
    const outcome = await this.run(completionMarker);
    return outcome.result;
  }

  private dispatch(iteration: number, response: string): IterationRecord {
    let parsed: ParsedResponse;
    try {
      parsed = parseResponse(response, this.functionCallMarker);
    } catch (err) {
      if (!(err instanceof MalformedFunctionCallError)) throw err;
      this.logger.warn(err.message, { iteration });
      return { kind: 'error', iteration, response, error: err.message };
    }

    if (parsed.kind === 'text') {
      return { kind: 'text', iteration, response };
    }

    const { functionName, params } = parsed;
    if (!this.registry.has(functionName)) {
      const error = new UnknownFunctionError(functionName).message;
      this.logger.warn(error, { iteration });
      this.emit('FunctionFailed', { iteration, functionName, error });
      return { kind: 'error', iteration, response, error };
    }

    this.emit('FunctionCalled', { iteration, functionName, params });
    let result: unknown;
    try {
      const start = Date.now();
      result = this.registry.invoke(functionName, params);
      if (isAnalysisError(result)) {
        this.logger.warn(`Function ${functionName} returned an error`, { iteration, error: result.message });
        this.emit('FunctionFailed', { iteration, functionName, error: result.message });
      } else {
        this.emit('FunctionSucceeded', { iteration, functionName, duration: Date.now() - start });
      }
    } catch (err) {
      result = `Error: ${errorMessage(err)}`;
      this.logger.warn(`Function ${functionName} failed`, { iteration, error: errorMessage(err) });
      this.emit('FunctionFailed', { iteration, functionName, error: errorMessage(err) });
    }

    return { kind: 'function_call', iteration, response, functionName, params, result };
  }

  private assertConfigured(): void {
    if (!this.systemPrompt) {
      throw new ConfigurationError('System prompt must be set before the agent runs');
    }
    if (!this.initialQuery) {
      throw new ConfigurationError('Initial query must be set before the agent runs');
    }
  }

  private assertNotStarted(what: string): void {
    if (this.iteration > 0) {
      throw new ConfigurationError(`Cannot change the ${what} after the agent has started`);
    }
  }

  private emit(type: DomainEventType, payload: Record<string, unknown>): void {
    this.eventBus?.emit({
      eventId: randomUUID(),
      type,
      timestamp: new Date(),
      sourceContext: 'ResearchAgent',
      payload: { agentId: this.agentId, ...payload },
    });
  }
}
