import { z } from "zod";

export const TickerSchema = z
  .string()
  .trim()
  .min(1, "Ticker symbol is required")
  .transform((t) => t.toUpperCase())
  .describe("Stock ticker symbol, e.g. AAPL");

export const PeriodSchema = z
  .enum(["1wk", "1mo"])
  .default("1wk")
  .describe("Price history window: one week or one month");
