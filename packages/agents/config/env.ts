// Environment configuration — validated once at startup
// Callers pass `process.env` (after dotenv has loaded .env); nothing is read lazily.

import { z } from 'zod';
import { DEFAULT_MAX_TOKENS, DEFAULT_MODEL, DEFAULT_TIMEOUT_MS } from '../bridge/model-gateway.js';
import { DEFAULT_MAX_ITERATIONS } from '../agents/research-agent.js';
import { ConfigurationError } from '../types/errors.js';
import { formatIssues } from '../analysis/schemas.js';
import type { LogLevel } from '../utils/logger.js';

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string({ required_error: 'required' }).min(1, 'required'),
  ANTHROPIC_MODEL: z.string().min(1).default(DEFAULT_MODEL),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(DEFAULT_MAX_TOKENS),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  RESEARCH_MAX_ITERATIONS: z.coerce.number().int().positive().default(DEFAULT_MAX_ITERATIONS),
  LOG_LEVEL: z.string().toLowerCase().pipe(z.enum(['debug', 'info', 'warn', 'error'])).default('info'),
  FMP_SERVER_PATH: z.string().min(1).optional(),
});

export interface ResearchConfig {
  llm: {
    apiKey: string;
    model: string;
    maxTokens: number;
    timeoutMs: number;
  };
  maxIterations: number;
  logLevel: LogLevel;
  fmpServerPath?: string;
}

/**
 * @throws ConfigurationError listing every invalid or missing variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ResearchConfig {
  // empty strings count as unset so defaults apply
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }

  const e = parsed.data;
  return {
    llm: {
      apiKey: e.ANTHROPIC_API_KEY,
      model: e.ANTHROPIC_MODEL,
      maxTokens: e.LLM_MAX_TOKENS,
      timeoutMs: e.LLM_TIMEOUT_MS,
    },
    maxIterations: e.RESEARCH_MAX_ITERATIONS,
    logLevel: e.LOG_LEVEL,
    fmpServerPath: e.FMP_SERVER_PATH,
  };
}
