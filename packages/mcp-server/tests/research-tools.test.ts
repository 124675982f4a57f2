import { describe, it, expect, vi } from "vitest";
import { z } from "zod";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { ResearchError, type ResearchRequest, type ResearchResponse, type StockData } from "../../agents/index.js";
import { createResearchServer } from "../src/server.js";
import type { ResearchService } from "../src/tools/research.js";
import { wrapResponse } from "../src/formatters/response.js";
import { StockNewsSchema, StockResearchSchema } from "../src/schemas/research.js";

const ToolText = z.object({
  content: z.array(z.object({ type: z.literal("text"), text: z.string() })),
  isError: z.boolean().optional(),
});

const STOCK: StockData = {
  name: "Acme Corp",
  symbol: "ACME",
  sector: "Industrials",
  industry: "Machinery",
  current_price: 104,
  daily_changes: [{ date: "2024-03-05", close: 104, prev_close: 100, change: 4, percent_change: 4, volume: 30 }],
};

function fakeService(overrides: Partial<ResearchService> = {}): ResearchService {
  return {
    research: vi.fn(async (req: ResearchRequest): Promise<ResearchResponse> => ({ ticker: req.ticker, status: "success", stock_data: STOCK })),
    getStockData: vi.fn(async () => STOCK),
    getNews: vi.fn(async (ticker: string) => ({ ticker, company_name: "Acme Corp", news_articles: [], news_summary: "none" })),
    getCorrelation: vi.fn(async (ticker: string) => ({ ticker, company_name: "Acme Corp", correlation_analysis: "related" })),
    ...overrides,
  };
}

async function connect(service: ResearchService) {
  const server = createResearchServer(service);
  const client = new Client({ name: "research-tools-test", version: "1.0.0" });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  return client;
}

async function call(client: Client, name: string, args: Record<string, unknown>) {
  return ToolText.parse(await client.callTool({ name, arguments: args }));
}

describe("research MCP tools", () => {
  it("lists the research tools", async () => {
    const client = await connect(fakeService());
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      "news_price_correlation",
      "stock_data",
      "stock_news",
      "stock_research",
    ]);
    await client.close();
  });

  it("normalises the ticker and defaults the period", async () => {
    const service = fakeService();
    const client = await connect(service);

    const result = await call(client, "stock_research", { ticker: " acme " });

    expect(service.research).toHaveBeenCalledWith({ ticker: "ACME", period: "1wk" });
    expect(JSON.parse(result.content[0].text)).toMatchObject({ ticker: "ACME", status: "success" });
    await client.close();
  });

  it("flags failed research runs as tool errors", async () => {
    const service = fakeService({
      research: vi.fn(async (): Promise<ResearchResponse> => ({
        ticker: "NOPE",
        status: "error",
        error: "Stock data not found for ticker NOPE",
      })),
    });
    const client = await connect(service);

    const result = await call(client, "stock_research", { ticker: "NOPE" });

    expect(result.isError).toBe(true);
    expect(result.content[0].text).toBe('{"error":"Stock data not found for ticker NOPE"}');
    await client.close();
  });

  it("passes the period to stock_data", async () => {
    const service = fakeService();
    const client = await connect(service);

    await call(client, "stock_data", { ticker: "acme", period: "1mo" });

    expect(service.getStockData).toHaveBeenCalledWith("ACME", "1mo");
    await client.close();
  });

  it("turns research errors into tool errors", async () => {
    const service = fakeService({
      getStockData: vi.fn(async () => {
        throw new ResearchError("Stock data not found for ticker ACME", "stock_data");
      }),
    });
    const client = await connect(service);

    const result = await call(client, "stock_data", { ticker: "ACME" });

    expect(result.isError).toBe(true);
    expect(result.content[0].text).toBe('{"error":"Stock data not found for ticker ACME"}');
    await client.close();
  });

  it("returns news and correlation results as JSON", async () => {
    const service = fakeService();
    const client = await connect(service);

    const news = await call(client, "stock_news", { ticker: "ACME", days: 3 });
    const correlation = await call(client, "news_price_correlation", { ticker: "ACME" });

    expect(service.getNews).toHaveBeenCalledWith("ACME", 3);
    expect(JSON.parse(news.content[0].text)).toMatchObject({ news_summary: "none" });
    expect(JSON.parse(correlation.content[0].text)).toEqual({
      ticker: "ACME",
      company_name: "Acme Corp",
      correlation_analysis: "related",
    });
    await client.close();
  });
});

describe("schemas", () => {
  it("rejects a blank ticker", () => {
    expect(() => StockResearchSchema.parse({ ticker: "   " })).toThrow("Ticker symbol is required");
  });

  it("rejects unsupported periods", () => {
    expect(() => StockResearchSchema.parse({ ticker: "A", period: "5y" })).toThrow();
  });

  it("coerces the news lookback", () => {
    expect(StockNewsSchema.parse({ ticker: "a", days: "2" })).toEqual({ ticker: "A", days: 2 });
  });
});

describe("wrapResponse", () => {
  it("passes strings through", () => {
    expect(wrapResponse("plain")).toEqual({ content: [{ type: "text", text: "plain" }] });
  });

  it("pretty-prints objects", () => {
    expect(wrapResponse({ a: 1 })).toEqual({ content: [{ type: "text", text: '{\n  "a": 1\n}' }] });
  });
});
