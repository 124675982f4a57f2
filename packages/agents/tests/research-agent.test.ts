import { describe, it, expect, vi } from 'vitest';
import {
  ResearchAgent,
  EXHAUSTED_MESSAGE,
  DEFAULT_MAX_ITERATIONS,
} from '../agents/research-agent.js';
import type { ModelGateway } from '../bridge/model-gateway.js';
import { FunctionRegistry, createAnalysisRegistry } from '../config/function-registry.js';
import { ConfigurationError, GatewayError } from '../types/errors.js';
import { SimpleEventBus, type DomainEvent } from '../types/events.js';
import { analyzePriceData } from '../analysis/index.js';

/** Replays canned replies; the last one repeats once the script runs out */
class ScriptedGateway implements ModelGateway {
  readonly prompts: string[] = [];

  constructor(private readonly replies: Array<string | Error>) {}

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const reply = this.replies[Math.min(this.prompts.length - 1, this.replies.length - 1)];
    if (reply instanceof Error) throw reply;
    return reply;
  }
}

const PRICES = '[{"date":"2024-03-04","close":100,"percent_change":1.5},{"date":"2024-03-05","close":97,"percent_change":-3}]';

function makeAgent(replies: Array<string | Error>, options: { maxIterations?: number; registry?: FunctionRegistry } = {}) {
  const gateway = new ScriptedGateway(replies);
  const agent = new ResearchAgent({
    gateway,
    registry: options.registry ?? createAnalysisRegistry(),
    maxIterations: options.maxIterations,
  });
  agent.setSystemPrompt('SYSTEM');
  agent.setInitialQuery('Research ACME');
  return { agent, gateway };
}

// ─── Completion ─────────────────────────────────────────────────────────────

describe('ResearchAgent completion', () => {
  it('completes on the first text response containing the marker', async () => {
    const { agent, gateway } = makeAgent(['FINAL_ANALYSIS: prices fell on news']);
    const outcome = await agent.run('FINAL_ANALYSIS');

    expect(outcome).toEqual({ state: 'completed', result: 'FINAL_ANALYSIS: prices fell on news', iterations: 1 });
    expect(gateway.prompts).toEqual(['SYSTEM\n\nQuery: Research ACME']);
  });

  it('matches the marker as a substring anywhere in the response', async () => {
    const { agent } = makeAgent(['Here is my FINAL answer.']);
    expect(await agent.runUntilCompletion()).toBe('Here is my FINAL answer.');
  });

  it('feeds function results into the next prompt', async () => {
    const { agent, gateway } = makeAgent([
      `FUNCTION_CALL: analyze_price_data|${PRICES}`,
      'FINAL: done',
    ]);
    const outcome = await agent.run();

    expect(outcome.state).toBe('completed');
    expect(agent.transcript).toHaveLength(2);

    const [first] = agent.transcript;
    expect(first.kind).toBe('function_call');
    if (first.kind === 'function_call') {
      expect(first.functionName).toBe('analyze_price_data');
      expect(first.result).toMatchObject({ up_days: 1, down_days: 1, average_daily_change: -0.75 });
    }

    expect(gateway.prompts[1].startsWith(
      `SYSTEM\n\nQuery: Research ACME\n\nIn iteration 1 you called analyze_price_data with ${PRICES} parameters, and the function returned {`,
    )).toBe(true);
    expect(gateway.prompts[1].endsWith('.\nWhat should I do next?')).toBe(true);
  });

  it('records the same result as calling the function directly', async () => {
    const { agent } = makeAgent([`FUNCTION_CALL: analyze_price_data|${PRICES}`, 'FINAL']);
    await agent.run();

    const [first] = agent.transcript;
    if (first.kind !== 'function_call') throw new Error(`expected a function call, got ${first.kind}`);
    expect(first.result).toEqual(analyzePriceData(PRICES));
  });

  it('does not complete on a function call whose params contain the marker', async () => {
    const { agent } = makeAgent(['FUNCTION_CALL: analyze_price_data|FINAL', 'FINAL report'], { maxIterations: 3 });
    const outcome = await agent.run('FINAL');

    expect(outcome).toEqual({ state: 'completed', result: 'FINAL report', iterations: 2 });
    expect(agent.transcript[0].kind).toBe('function_call');
  });
});

// ─── Exhaustion ─────────────────────────────────────────────────────────────

describe('ResearchAgent exhaustion', () => {
  it('stops at the iteration ceiling with the sentinel', async () => {
    const { agent, gateway } = makeAgent(['still thinking'], { maxIterations: 3 });
    const outcome = await agent.run();

    expect(outcome).toEqual({ state: 'exhausted', result: EXHAUSTED_MESSAGE, iterations: 3 });
    expect(EXHAUSTED_MESSAGE).toBe('Maximum iterations reached without completion');
    expect(gateway.prompts).toHaveLength(3);
  });

  it('defaults to five iterations', async () => {
    const { agent, gateway } = makeAgent(['no']);
    await agent.run();
    expect(DEFAULT_MAX_ITERATIONS).toBe(5);
    expect(gateway.prompts).toHaveLength(5);
  });

  it('returns null from executeIteration once the budget is spent', async () => {
    const { agent, gateway } = makeAgent(['x'], { maxIterations: 1 });
    expect(await agent.executeIteration()).toEqual({ kind: 'text', iteration: 1, response: 'x' });
    expect(await agent.executeIteration()).toBeNull();
    expect(gateway.prompts).toHaveLength(1);
  });

  it('makes no model call from executeIteration after completion', async () => {
    const { agent, gateway } = makeAgent(['FINAL answer', 'extra']);
    await agent.run('FINAL');

    expect(await agent.executeIteration()).toBeNull();
    expect(gateway.prompts).toHaveLength(1);
    expect(agent.transcript).toHaveLength(1);
  });

  it('is single use: a second run returns the first outcome', async () => {
    const { agent, gateway } = makeAgent(['nothing'], { maxIterations: 2 });
    const first = await agent.run();
    const second = await agent.run();
    expect(second).toBe(first);
    expect(gateway.prompts).toHaveLength(2);
  });
});

// ─── Recovery ───────────────────────────────────────────────────────────────

describe('ResearchAgent recovery', () => {
  it('records unknown functions and keeps going', async () => {
    const { agent } = makeAgent(['FUNCTION_CALL: fetch_weather|{}', 'FINAL'], { maxIterations: 2 });
    await agent.run();

    expect(agent.transcript[0]).toEqual({
      kind: 'error',
      iteration: 1,
      response: 'FUNCTION_CALL: fetch_weather|{}',
      error: 'Function fetch_weather not found',
    });
  });

  it('records malformed calls and keeps going', async () => {
    const { agent, gateway } = makeAgent(['FUNCTION_CALL: analyze_price_data', 'FINAL'], { maxIterations: 2 });
    await agent.run();

    const first = agent.transcript[0];
    expect(first.kind).toBe('error');
    expect(gateway.prompts[1]).toContain('Malformed function call:');
  });

  it('turns a throwing function into an error result', async () => {
    const registry = new FunctionRegistry({
      analyze_price_data: () => { throw new Error('boom'); },
    });
    const { agent } = makeAgent(['FUNCTION_CALL: analyze_price_data|[]', 'FINAL'], { registry });
    await agent.run();

    const first = agent.transcript[0];
    expect(first.kind === 'function_call' && first.result).toBe('Error: analyze_price_data failed: boom');
  });

  it('turns gateway failures into text and continues', async () => {
    const { agent, gateway } = makeAgent([new GatewayError('Model request failed: overloaded'), 'FINAL'], { maxIterations: 2 });
    const outcome = await agent.run();

    expect(agent.transcript[0]).toEqual({
      kind: 'text', iteration: 1, response: 'Error: Model request failed: overloaded',
    });
    expect(outcome.state).toBe('completed');
    expect(gateway.prompts[1]).toContain('Error: Model request failed: overloaded\nWhat should I do next?');
  });

  it('freezes transcript records and hands out copies', async () => {
    const { agent } = makeAgent(['x'], { maxIterations: 1 });
    await agent.run();
    const snapshot = agent.transcript;
    expect(Object.isFrozen(snapshot[0])).toBe(true);
    expect(agent.transcript).not.toBe(snapshot);
  });
});

// ─── Configuration ──────────────────────────────────────────────────────────

describe('ResearchAgent configuration', () => {
  const registry = createAnalysisRegistry();
  const gateway = new ScriptedGateway(['FINAL']);

  it('rejects a non-positive or fractional iteration budget', () => {
    expect(() => new ResearchAgent({ gateway, registry, maxIterations: 0 })).toThrow(ConfigurationError);
    expect(() => new ResearchAgent({ gateway, registry, maxIterations: 2.5 })).toThrow(
      'maxIterations must be a positive integer, got 2.5',
    );
  });

  it('rejects an empty function-call marker', () => {
    expect(() => new ResearchAgent({ gateway, registry, functionCallMarker: '' })).toThrow(ConfigurationError);
  });

  it('requires a system prompt and a query before running', async () => {
    const agent = new ResearchAgent({ gateway, registry });
    await expect(agent.run()).rejects.toThrow('System prompt must be set before the agent runs');
    agent.setSystemPrompt('S');
    await expect(agent.executeIteration()).rejects.toThrow('Initial query must be set before the agent runs');
  });

  it('rejects an empty completion marker', async () => {
    const { agent } = makeAgent(['FINAL']);
    await expect(agent.run('')).rejects.toThrow(ConfigurationError);
  });

  it('locks the prompt once the loop has started', async () => {
    const { agent } = makeAgent(['x'], { maxIterations: 2 });
    await agent.executeIteration();
    expect(() => agent.setSystemPrompt('other')).toThrow('Cannot change the system prompt after the agent has started');
    expect(() => agent.setInitialQuery('other')).toThrow(ConfigurationError);
  });

  it('uses a custom function-call marker', async () => {
    const scripted = new ScriptedGateway([`CALL>> analyze_price_data|${PRICES}`, 'FINAL']);
    const agent = new ResearchAgent({ gateway: scripted, registry, functionCallMarker: 'CALL>>' });
    agent.setSystemPrompt('S');
    agent.setInitialQuery('Q');
    await agent.run();
    expect(agent.transcript[0].kind).toBe('function_call');
  });
});

// ─── Events ─────────────────────────────────────────────────────────────────

describe('ResearchAgent events', () => {
  it('emits iteration, function and completion events', async () => {
    const eventBus = new SimpleEventBus();
    const seen: DomainEvent[] = [];
    const record = (e: DomainEvent) => seen.push(e);
    for (const type of ['IterationStarted', 'FunctionCalled', 'FunctionSucceeded', 'FunctionFailed', 'AgentCompleted'] as const) {
      eventBus.on(type, record);
    }

    const gateway = new ScriptedGateway([
      `FUNCTION_CALL: analyze_price_data|${PRICES}`,
      'FUNCTION_CALL: nope|{}',
      'FINAL',
    ]);
    const agent = new ResearchAgent({ gateway, registry: createAnalysisRegistry(), eventBus });
    agent.setSystemPrompt('S');
    agent.setInitialQuery('Q');
    await agent.run();

    expect(seen.map(e => e.type)).toEqual([
      'IterationStarted', 'FunctionCalled', 'FunctionSucceeded',
      'IterationStarted', 'FunctionFailed',
      'IterationStarted', 'AgentCompleted',
    ]);
    expect(seen.every(e => e.sourceContext === 'ResearchAgent')).toBe(true);
    expect(seen[seen.length - 1].payload).toEqual({ agentId: agent.agentId, iterations: 3 });
  });

  it('emits FunctionFailed when the function returns an error result', async () => {
    const eventBus = new SimpleEventBus();
    const succeeded = vi.fn();
    const failed = vi.fn();
    eventBus.on('FunctionSucceeded', succeeded);
    eventBus.on('FunctionFailed', failed);

    const agent = new ResearchAgent({
      gateway: new ScriptedGateway(['FUNCTION_CALL: analyze_price_data|[]', 'FINAL']),
      registry: createAnalysisRegistry(),
      eventBus,
    });
    agent.setSystemPrompt('S');
    agent.setInitialQuery('Q');
    await agent.run();

    expect(succeeded).not.toHaveBeenCalled();
    expect(failed).toHaveBeenCalledTimes(1);
    expect(failed.mock.calls[0][0].payload).toEqual({
      iteration: 1, functionName: 'analyze_price_data', error: 'No daily price changes found in data',
    });
  });

  it('emits AgentExhausted at the ceiling', async () => {
    const eventBus = new SimpleEventBus();
    const handler = vi.fn();
    eventBus.on('AgentExhausted', handler);

    const agent = new ResearchAgent({
      gateway: new ScriptedGateway(['...']), registry: createAnalysisRegistry(), eventBus, maxIterations: 2,
    });
    agent.setSystemPrompt('S');
    agent.setInitialQuery('Q');
    await agent.run();

    expect(handler).toHaveBeenCalledTimes(1);
  });
});
