import { z } from 'zod';

const IsoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

export const SymbolSchema = z.object({
  symbol: z.string().min(1).describe('Stock ticker symbol (e.g., AAPL, MSFT)'),
});

export const DateRangeSchema = z.object({
  from: IsoDate.optional().describe('Start date (YYYY-MM-DD)'),
  to: IsoDate.optional().describe('End date (YYYY-MM-DD)'),
});
