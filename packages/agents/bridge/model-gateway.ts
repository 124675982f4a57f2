// Model gateway — sends one prompt to the language model and returns its text
// Configuration is injected; there is no process-wide client.

import Anthropic from '@anthropic-ai/sdk';
import { GatewayError, errorMessage } from '../types/errors.js';

export interface ModelGateway {
  /** @throws GatewayError */
  generate(prompt: string): Promise<string>;
}

export interface AnthropicGatewayConfig {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  /** Per-call timeout in ms */
  timeoutMs?: number;
}

export const DEFAULT_MODEL = 'claude-haiku-4-5-20251001';
export const DEFAULT_MAX_TOKENS = 2048;
export const DEFAULT_TIMEOUT_MS = 60_000;

export class AnthropicGateway implements ModelGateway {
  private readonly client: Anthropic;
  readonly model: string;
  private readonly maxTokens: number;

  constructor(config: AnthropicGatewayConfig) {
    if (!config.apiKey) {
      throw new GatewayError('Anthropic API key is required');
    }
    this.model = config.model ?? DEFAULT_MODEL;
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.client = new Anthropic({
      apiKey: config.apiKey,
      timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxRetries: 0,
    });
  }

  async generate(prompt: string): Promise<string> {
    const response = await this.client.messages
      .create({
        model: this.model,
        max_tokens: this.maxTokens,
        messages: [{ role: 'user', content: prompt }],
      })
      .catch((err: unknown) => {
        throw new GatewayError(`Model request failed: ${errorMessage(err)}`, err);
      });

    const parts: string[] = [];
    for (const block of response.content) {
      if (block.type === 'text') parts.push(block.text);
    }
    if (parts.length === 0) {
      throw new GatewayError('Model returned no text content');
    }
    return parts.join('');
  }
}

/**
 * Query the model, folding any failure into `Error: <message>` text.
 * Callers treat the result as the model's answer either way.
 */
export async function queryModel(gateway: ModelGateway, prompt: string): Promise<string> {
  try {
    return await gateway.generate(prompt);
  } catch (err) {
    return `Error: ${errorMessage(err)}`;
  }
}
