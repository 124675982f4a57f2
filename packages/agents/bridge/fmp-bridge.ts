// FMP MCP Bridge — connects the research pipeline to the fmp-market-data server
// The server runs as a child process over stdio and owns the FMP API key.

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import type { FmpToolCaller } from '../utils/market-data-fetcher.js';

export interface FmpBridgeConfig {
  /** Path to the FMP MCP server entry point (default: the built fmp-mcp-server beside this package) */
  serverPath?: string;
  /** Command to launch the server (default: 'node') */
  command?: string;
  /** Environment for the child; defaults to the safe base set plus FMP_* variables */
  env?: Record<string, string>;
}

const FMP_ENV_PREFIX = 'FMP_';

export function serverEnvironment(source: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const env = getDefaultEnvironment();
  for (const [key, value] of Object.entries(source)) {
    if (key.startsWith(FMP_ENV_PREFIX) && value !== undefined) env[key] = value;
  }
  if (source.LOG_LEVEL) env.LOG_LEVEL = source.LOG_LEVEL;
  return env;
}

/** Unwrap an MCP tool result: the first text block, parsed as JSON when it is JSON */
export function unwrapToolResult(result: unknown): unknown {
  if (typeof result !== 'object' || result === null || !('content' in result)) return result;
  const { content } = result;
  if (!Array.isArray(content)) return result;

  for (const block of content) {
    if (typeof block === 'object' && block !== null && 'text' in block && typeof block.text === 'string') {
      try {
        return JSON.parse(block.text);
      } catch {
        return block.text;
      }
    }
  }
  return result;
}

export class FmpBridge {
  private client: Client;
  private transport: StdioClientTransport | null = null;
  private connected = false;

  constructor() {
    this.client = new Client(
      { name: 'stock-research-fmp', version: '1.0.0' },
      { capabilities: {} },
    );
  }

  async connect(config: FmpBridgeConfig = {}): Promise<void> {
    if (this.connected) return;

    const serverPath = config.serverPath ?? new URL('../../fmp-mcp-server/src/index.js', import.meta.url).pathname;
    const command = config.command ?? 'node';

    this.transport = new StdioClientTransport({
      command,
      args: [serverPath],
      env: config.env ?? serverEnvironment(),
    });

    await this.client.connect(this.transport);
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    if (!this.connected) return;
    await this.client.close();
    this.connected = false;
  }

  /** Call an FMP tool by name */
  async callTool(toolName: string, params: Record<string, unknown>): Promise<unknown> {
    if (!this.connected) throw new Error('FMP bridge not connected');

    const result = await this.client.callTool({ name: toolName, arguments: params });
    if (result.isError) {
      throw new Error(`${toolName} failed: ${String(unwrapToolResult(result))}`);
    }
    return unwrapToolResult(result);
  }

  get isConnected(): boolean {
    return this.connected;
  }
}

/**
 * Create a callFmpTool function for the research coordinator.
 */
export async function createFmpToolCaller(config?: FmpBridgeConfig): Promise<{
  callFmpTool: FmpToolCaller;
  bridge: FmpBridge;
}> {
  const bridge = new FmpBridge();
  await bridge.connect(config);
  return {
    callFmpTool: (name, params) => bridge.callTool(name, params),
    bridge,
  };
}
