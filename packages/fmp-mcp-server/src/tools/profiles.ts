import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CacheTTL, type FmpClient } from '../client.js';
import { SymbolSchema } from '../schemas/common.js';
import { wrapResponse } from '../formatters/response.js';

export function registerProfileTools(server: McpServer, client: FmpClient) {
  server.tool(
    'fmp_company_profile',
    'Get company profile: name, description, sector, industry, current price, market cap and exchange listing. Starting point for company research.',
    SymbolSchema.shape,
    async (params) => {
      const { symbol } = SymbolSchema.parse(params);
      const data = await client.fetch('profile', { symbol }, { cacheTtl: CacheTTL.LONG });
      return wrapResponse(data);
    },
  );
}
