import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CacheTTL, type FmpClient } from '../client.js';
import { PageLimitSchema, SymbolNewsSchema } from '../schemas/news.js';
import { wrapResponse } from '../formatters/response.js';

export function registerNewsTools(server: McpServer, client: FmpClient) {
  server.tool(
    'fmp_news_stock',
    'Get latest stock market news. Returns recent news articles related to equities and stock markets.',
    PageLimitSchema.shape,
    async (params) => {
      const { page, limit } = PageLimitSchema.parse(params);
      const data = await client.fetch('news/stock-latest', { page, limit }, { cacheTtl: CacheTTL.SHORT });
      return wrapResponse(data);
    },
  );

  server.tool(
    'fmp_search_stock_news',
    'Search stock news by ticker symbol, optionally within a date range. Returns articles with title, text, source site and publish time.',
    SymbolNewsSchema.shape,
    async (params) => {
      const { symbols, from, to, page, limit } = SymbolNewsSchema.parse(params);
      const data = await client.fetch('news/stock', { symbols, from, to, page, limit }, { cacheTtl: CacheTTL.SHORT });
      return wrapResponse(data);
    },
  );
}
