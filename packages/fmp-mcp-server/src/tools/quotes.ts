import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CacheTTL, type FmpClient } from '../client.js';
import { QuoteSchema, HistoricalPriceSchema } from '../schemas/quotes.js';
import { wrapResponse } from '../formatters/response.js';

export function registerQuoteTools(server: McpServer, client: FmpClient) {
  server.tool(
    'fmp_quote',
    'Get real-time stock quote with price, change, volume, market cap and 52-week range.',
    QuoteSchema.shape,
    async (params) => {
      const { symbol } = QuoteSchema.parse(params);
      const data = await client.fetch('quote', { symbol }, { cacheTtl: CacheTTL.REALTIME });
      return wrapResponse(data);
    },
  );

  server.tool(
    'fmp_historical_price',
    'Get end-of-day historical stock prices (OHLCV, change percent) between two dates. Use for daily price movement analysis.',
    HistoricalPriceSchema.shape,
    async (params) => {
      const { symbol, from, to } = HistoricalPriceSchema.parse(params);
      const data = await client.fetch('historical-price-eod/full', { symbol, from, to }, { cacheTtl: CacheTTL.SHORT });
      return wrapResponse(data);
    },
  );
}
