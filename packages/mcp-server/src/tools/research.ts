import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ResearchError, type ResearchCoordinator } from "../../../agents/index.js";
import {
  StockResearchSchema,
  StockDataSchema,
  StockNewsSchema,
  CorrelationSchema,
} from "../schemas/research.js";
import { wrapResponse } from "../formatters/response.js";

export type ResearchService = Pick<
  ResearchCoordinator,
  "research" | "getStockData" | "getNews" | "getCorrelation"
>;

/** Expected research failures become tool errors; anything else propagates */
async function guarded(run: () => Promise<unknown>) {
  try {
    return wrapResponse(await run());
  } catch (err) {
    if (err instanceof ResearchError) return wrapResponse(err);
    throw err;
  }
}

export function registerResearchTools(server: McpServer, service: ResearchService) {
  server.tool(
    "stock_research",
    "Full research run: price fluctuations, news summary, agent analysis with the four analysis functions, news/price correlation narrative and a comprehensive report",
    StockResearchSchema.shape,
    async (params) => {
      const validated = StockResearchSchema.parse(params);
      const result = await service.research(validated);
      if (result.status === "error") {
        return wrapResponse(new Error(result.error ?? "research failed"));
      }
      return wrapResponse(result);
    }
  );

  server.tool(
    "stock_data",
    "Daily closing prices and percent changes for a ticker, with company name, sector and current price",
    StockDataSchema.shape,
    async (params) => {
      const { ticker, period } = StockDataSchema.parse(params);
      return guarded(() => service.getStockData(ticker, period));
    }
  );

  server.tool(
    "stock_news",
    "Recent news articles for a ticker with a per-day summary",
    StockNewsSchema.shape,
    async (params) => {
      const { ticker, days } = StockNewsSchema.parse(params);
      return guarded(() => service.getNews(ticker, days));
    }
  );

  server.tool(
    "news_price_correlation",
    "Model-written narrative relating each day's news to that day's price move",
    CorrelationSchema.shape,
    async (params) => {
      const { ticker, period } = CorrelationSchema.parse(params);
      return guarded(() => service.getCorrelation(ticker, period));
    }
  );
}
