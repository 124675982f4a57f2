// Argument parsing and result saving for the stock-research CLI

import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { ResearchPeriod, ResearchResponse } from '../types/research.js';

export const VALID_PERIODS: readonly ResearchPeriod[] = ['1wk', '1mo'];

export interface ResearchArgs {
  ticker?: string;
  period: ResearchPeriod;
  /** Output file; defaults to `<TICKER>_research.json` */
  out?: string;
  save: boolean;
  maxIterations?: number;
  days?: number;
  json: boolean;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function isValidPeriod(value: string): value is ResearchPeriod {
  return VALID_PERIODS.includes(value);
}

function positiveInt(flag: string, raw: string | undefined): number {
  const n = Number(raw);
  if (raw === undefined || !Number.isInteger(n) || n < 1) {
    throw new UsageError(`${flag} expects a positive integer, got "${raw ?? ''}"`);
  }
  return n;
}

function value(flag: string, args: string[], i: number): string {
  const next = args[i + 1];
  if (next === undefined || next.startsWith('--')) {
    throw new UsageError(`${flag} expects a value`);
  }
  return next;
}

/** @throws UsageError on unknown flags or bad values */
export function parseResearchArgs(args: string[]): ResearchArgs {
  const parsed: ResearchArgs = { period: '1wk', save: true, json: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--period': {
        const period = value(arg, args, i++);
        if (!isValidPeriod(period)) {
          throw new UsageError(`Invalid period "${period}". Valid: ${VALID_PERIODS.join(', ')}`);
        }
        parsed.period = period;
        break;
      }
      case '--out':
      case '-o':
        parsed.out = value(arg, args, i++);
        break;
      case '--no-save':
        parsed.save = false;
        break;
      case '--max-iterations':
        parsed.maxIterations = positiveInt(arg, value(arg, args, i++));
        break;
      case '--days':
        parsed.days = positiveInt(arg, value(arg, args, i++));
        break;
      case '--json':
        parsed.json = true;
        break;
      case '--help':
      case '-h':
        parsed.help = true;
        break;
      default:
        if (arg.startsWith('-')) throw new UsageError(`Unknown option: ${arg}`);
        if (parsed.ticker !== undefined) throw new UsageError(`Unexpected argument: ${arg}`);
        parsed.ticker = arg.trim().toUpperCase();
    }
  }
  return parsed;
}

export function defaultOutputFile(ticker: string): string {
  return `${ticker}_research.json`;
}

/**
 * Write the response as pretty JSON, error responses included.
 * Returns the absolute path written, or null when saving is off.
 */
export async function saveResearchResult(
  result: ResearchResponse,
  args: Pick<ResearchArgs, 'out' | 'save'>,
): Promise<string | null> {
  if (!args.save) return null;
  const file = resolve(args.out ?? defaultOutputFile(result.ticker));
  await writeFile(file, JSON.stringify(result, null, 2));
  return file;
}
