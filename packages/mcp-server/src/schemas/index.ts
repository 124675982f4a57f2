export { TickerSchema, PeriodSchema } from "./common.js";

export {
  StockResearchSchema,
  StockDataSchema,
  StockNewsSchema,
  CorrelationSchema,
} from "./research.js";
