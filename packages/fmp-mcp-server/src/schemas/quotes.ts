import { SymbolSchema, DateRangeSchema } from './common.js';

export const QuoteSchema = SymbolSchema;

export const HistoricalPriceSchema = SymbolSchema.merge(DateRangeSchema);
