// FMP API client with caching and rate limiting

import { z } from 'zod';

export class FmpError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'FmpError';
  }
}

const FmpEnvSchema = z.object({
  FMP_API_KEY: z.string().default(''),
  FMP_BASE_URL: z.string().url().default('https://financialmodelingprep.com/stable'),
  FMP_RATE_LIMIT: z.coerce.number().int().positive().default(300),   // requests per minute
  FMP_CACHE_TTL: z.coerce.number().int().min(0).default(300),        // seconds
  FMP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
});

export interface FmpClientConfig {
  apiKey: string;
  baseUrl: string;
  rateLimit: number;
  defaultCacheTtl: number;
  timeoutMs: number;
}

export function loadFmpConfig(env: NodeJS.ProcessEnv = process.env): FmpClientConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const parsed = FmpEnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new FmpError(`Invalid FMP configuration: ${issues}`);
  }
  const e = parsed.data;
  return {
    apiKey: e.FMP_API_KEY,
    baseUrl: e.FMP_BASE_URL,
    rateLimit: e.FMP_RATE_LIMIT,
    defaultCacheTtl: e.FMP_CACHE_TTL,
    timeoutMs: e.FMP_TIMEOUT_MS,
  };
}

interface CacheEntry {
  data: unknown;
  expiresAt: number;
}

export interface FmpRequestOptions {
  cacheTtl?: number; // seconds, 0 to skip cache
}

export type FmpParams = Record<string, string | number | boolean | undefined>;

const MAX_CACHE_ENTRIES = 1000;

export class FmpClient {
  private readonly cache = new Map<string, CacheEntry>();
  private requestTimestamps: number[] = [];

  constructor(readonly config: FmpClientConfig) {}

  private isRateLimited(): boolean {
    const now = Date.now();
    this.requestTimestamps = this.requestTimestamps.filter(t => now - t < 60_000);
    return this.requestTimestamps.length >= this.config.rateLimit;
  }

  private getCached(key: string): unknown | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;
    if (Date.now() > entry.expiresAt) {
      this.cache.delete(key);
      return undefined;
    }
    return entry.data;
  }

  private setCache(key: string, data: unknown, ttlSeconds: number): void {
    this.cache.set(key, { data, expiresAt: Date.now() + ttlSeconds * 1000 });
    if (this.cache.size > MAX_CACHE_ENTRIES) {
      const now = Date.now();
      for (const [k, v] of this.cache) {
        if (now > v.expiresAt) this.cache.delete(k);
      }
    }
  }

  /** GET `endpoint` with the API key; JSON body is returned undecoded */
  async fetch(endpoint: string, params: FmpParams = {}, options: FmpRequestOptions = {}): Promise<unknown> {
    const { apiKey, baseUrl, rateLimit, defaultCacheTtl, timeoutMs } = this.config;
    if (!apiKey) {
      throw new FmpError('FMP_API_KEY environment variable is not set');
    }

    const url = new URL(endpoint, baseUrl.endsWith('/') ? baseUrl : baseUrl + '/');
    url.searchParams.set('apikey', apiKey);
    for (const [k, v] of Object.entries(params)) {
      if (v !== undefined) url.searchParams.set(k, String(v));
    }

    const cacheKey = url.toString();
    const ttl = options.cacheTtl ?? defaultCacheTtl;
    if (ttl > 0) {
      const cached = this.getCached(cacheKey);
      if (cached !== undefined) return cached;
    }

    if (this.isRateLimited()) {
      throw new FmpError(`FMP rate limit exceeded (${rateLimit} req/min). Try again shortly.`, 429);
    }
    this.requestTimestamps.push(Date.now());

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const res = await fetch(url.toString(), {
        headers: { 'Accept': 'application/json' },
        signal: controller.signal,
      });

      if (!res.ok) {
        const body = await res.text().catch(() => '');
        if (res.status === 401) throw new FmpError('FMP: Invalid API key', 401);
        if (res.status === 403) throw new FmpError('FMP: Endpoint not available on your plan', 403);
        if (res.status === 429) throw new FmpError('FMP: Rate limited by server', 429);
        throw new FmpError(`FMP: HTTP ${res.status} ${body.slice(0, 200)}`.trimEnd(), res.status);
      }

      const data: unknown = await res.json();
      if (ttl > 0) this.setCache(cacheKey, data, ttl);
      return data;
    } catch (err) {
      if (err instanceof FmpError) throw err;
      if (controller.signal.aborted) {
        throw new FmpError(`FMP: request to ${endpoint} timed out after ${timeoutMs}ms`);
      }
      throw new FmpError(`FMP: request to ${endpoint} failed: ${err instanceof Error ? err.message : String(err)}`);
    } finally {
      clearTimeout(timeout);
    }
  }
}

export function createFmpClient(env: NodeJS.ProcessEnv = process.env): FmpClient {
  return new FmpClient(loadFmpConfig(env));
}

/** Cache TTL presets by data type */
export const CacheTTL = {
  REALTIME: 30,       // quotes
  SHORT: 300,         // 5 min — news, end-of-day prices
  LONG: 86400,        // 24 hours — profiles
} as const;
