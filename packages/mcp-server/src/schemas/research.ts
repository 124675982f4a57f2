import { z } from "zod";
import { TickerSchema, PeriodSchema } from "./common.js";

export const StockResearchSchema = z.object({
  ticker: TickerSchema,
  period: PeriodSchema,
});

export const StockDataSchema = z.object({
  ticker: TickerSchema,
  period: PeriodSchema,
});

export const StockNewsSchema = z.object({
  ticker: TickerSchema,
  days: z.coerce
    .number()
    .int()
    .positive()
    .max(30)
    .optional()
    .describe("News lookback in days (default 7)"),
});

export const CorrelationSchema = z.object({
  ticker: TickerSchema,
  period: PeriodSchema,
});
