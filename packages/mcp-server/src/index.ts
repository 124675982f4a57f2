#!/usr/bin/env node
import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  AnthropicGateway,
  ResearchCoordinator,
  createFmpToolCaller,
  createLogger,
  errorMessage,
  loadConfig,
} from "../../agents/index.js";
import { createResearchServer } from "./server.js";

const config = loadConfig();
const logger = createLogger("ResearchMCP", config.logLevel);

const { callFmpTool, bridge } = await createFmpToolCaller({ serverPath: config.fmpServerPath });

const coordinator = new ResearchCoordinator({
  gateway: new AnthropicGateway(config.llm),
  callFmpTool,
  maxIterations: config.maxIterations,
  logger,
});

const server = createResearchServer(coordinator);

process.on("SIGINT", () => {
  bridge
    .disconnect()
    .catch((err: unknown) => logger.error("FMP bridge shutdown failed", { error: errorMessage(err) }))
    .finally(() => process.exit(0));
});

const transport = new StdioServerTransport();
await server.connect(transport);
logger.info("Stock research MCP server ready");
