import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerResearchTools, type ResearchService } from "./tools/research.js";

export function createResearchServer(service: ResearchService): McpServer {
  const server = new McpServer({
    name: "stock-research-mcp",
    version: "0.1.0",
  });

  registerResearchTools(server, service);

  return server;
}
