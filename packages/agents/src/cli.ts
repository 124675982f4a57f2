#!/usr/bin/env node
// Stock Research — command line client
//
// Usage:
//   stock-research research AAPL                    # full research run, saves AAPL_research.json
//   stock-research research AAPL --period 1mo       # one month of price history
//   stock-research research                         # prompts for a ticker
//   stock-research data AAPL                        # daily price changes only
//   stock-research news AAPL --days 3               # news summary only
//   stock-research correlation AAPL                 # model correlation narrative only
//   stock-research --help                           # usage

import 'dotenv/config';
import { createInterface } from 'node:readline/promises';
import { AnthropicGateway } from '../bridge/model-gateway.js';
import { createFmpToolCaller } from '../bridge/fmp-bridge.js';
import { loadConfig, type ResearchConfig } from '../config/env.js';
import { ResearchCoordinator } from '../orchestrator/research-coordinator.js';
import { formatResearchReport } from '../utils/report-formatter.js';
import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../types/errors.js';
import { UsageError, parseResearchArgs, saveResearchResult, type ResearchArgs } from './args.js';

// ── ANSI helpers (no chalk dependency) ──────────────────────────────

const isTTY = process.stdout.isTTY ?? false;

const ansi = {
  reset: isTTY ? '\x1b[0m' : '',
  bold: isTTY ? '\x1b[1m' : '',
  dim: isTTY ? '\x1b[2m' : '',
  cyan: isTTY ? '\x1b[36m' : '',
  green: isTTY ? '\x1b[32m' : '',
  yellow: isTTY ? '\x1b[33m' : '',
  red: isTTY ? '\x1b[31m' : '',
  magenta: isTTY ? '\x1b[35m' : '',
};

function c(color: keyof typeof ansi, text: string): string {
  return `${ansi[color]}${text}${ansi.reset}`;
}

function status(stage: string, message: string): void {
  process.stderr.write(`  ${c('magenta', `[${stage}]`)} ${c('dim', message)}\n`);
}

// ── CLI class ───────────────────────────────────────────────────────

class StockResearchCli {
  async start(): Promise<void> {
    const rawArgs = process.argv.slice(2);

    if (rawArgs.length === 0 || rawArgs[0] === '--help' || rawArgs[0] === '-h') {
      this.printHelp();
      return;
    }

    const command = rawArgs[0];
    const args = parseResearchArgs(rawArgs.slice(1));
    if (args.help) {
      this.printHelp();
      return;
    }

    switch (command) {
      case 'research':
        await this.withCoordinator(args, coordinator => this.handleResearch(coordinator, args));
        break;
      case 'data':
        await this.withCoordinator(args, async coordinator => {
          const stockData = await coordinator.getStockData(await this.requireTicker(args), args.period);
          console.log(JSON.stringify(stockData, null, 2));
        });
        break;
      case 'news':
        await this.withCoordinator(args, async coordinator => {
          const news = await coordinator.getNews(await this.requireTicker(args), args.days);
          console.log(args.json ? JSON.stringify(news, null, 2) : news.news_summary);
        });
        break;
      case 'correlation':
        await this.withCoordinator(args, async coordinator => {
          const result = await coordinator.getCorrelation(await this.requireTicker(args), args.period);
          console.log(args.json ? JSON.stringify(result, null, 2) : result.correlation_analysis);
        });
        break;
      case 'help':
        this.printHelp();
        break;
      default:
        console.error(`Unknown command: ${command}\n`);
        this.printHelp();
        process.exitCode = 1;
    }
  }

  // ── Subcommand: research ────────────────────────────────────────

  private async handleResearch(coordinator: ResearchCoordinator, args: ResearchArgs): Promise<void> {
    const ticker = await this.requireTicker(args);
    console.log(`\n  ${c('bold', 'Stock Research')} ${c('dim', `— ${ticker} | period ${args.period}`)}\n`);

    const startTime = Date.now();
    const result = await coordinator.research({ ticker, period: args.period });
    const duration = ((Date.now() - startTime) / 1000).toFixed(1);

    if (args.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      console.log(formatResearchReport(result));
    }

    const file = await saveResearchResult(result, args);
    if (file) {
      console.log(`  ${c('green', '✓')} Research results saved to ${file}`);
    }

    if (result.status === 'error') {
      console.error(`  ${c('red', 'Error:')} ${result.error ?? 'research failed'}\n`);
      process.exitCode = 1;
      return;
    }
    console.log(`  ${c('green', '✓')} ${c('bold', 'Complete')} ${c('dim', `— ${duration}s | agent iterations: ${result.agent_iterations ?? 0}`)}\n`);
  }

  private async requireTicker(args: ResearchArgs): Promise<string> {
    if (args.ticker) return args.ticker;

    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
      const answer = (await rl.question(`${c('cyan', 'Enter stock ticker symbol:')} `)).trim().toUpperCase();
      if (!answer) throw new UsageError('Invalid ticker symbol');
      return answer;
    } finally {
      rl.close();
    }
  }

  // ── Wiring ──────────────────────────────────────────────────────

  private async withCoordinator(
    args: ResearchArgs,
    run: (coordinator: ResearchCoordinator) => Promise<void>,
  ): Promise<void> {
    const config: ResearchConfig = loadConfig();
    const logger = createLogger('Research', config.logLevel);

    process.stderr.write(`  ${c('dim', 'Connecting to FMP MCP server...')}\n`);
    const { callFmpTool, bridge } = await createFmpToolCaller({ serverPath: config.fmpServerPath });

    const coordinator = new ResearchCoordinator({
      gateway: new AnthropicGateway(config.llm),
      callFmpTool,
      maxIterations: args.maxIterations ?? config.maxIterations,
      newsDays: args.days,
      logger,
      onEvent: ({ type, payload }) => {
        if (type === 'IterationStarted' || type === 'FunctionCalled' || type === 'AgentCompleted' || type === 'AgentExhausted') {
          status(type, JSON.stringify(payload));
        }
      },
    });

    try {
      await run(coordinator);
    } finally {
      await bridge.disconnect();
    }
  }

  // ── Help screen ─────────────────────────────────────────────────

  printHelp(): void {
    console.log(`
  ${c('bold', 'Stock Research')} — news and price correlation research

  ${c('bold', 'Usage:')}
    stock-research research [TICKER] [options]   Full research run (prompts when TICKER is omitted)
    stock-research data <TICKER> [--period]      Daily price changes
    stock-research news <TICKER> [--days n]      News summary
    stock-research correlation <TICKER>          Model correlation narrative
    stock-research help                          Show this help

  ${c('bold', 'Options:')}
    --period <1wk|1mo>            Price history window (default: 1wk)
    --days <n>                    News lookback in days (default: 7)
    --max-iterations <n>          Agent loop budget (default: RESEARCH_MAX_ITERATIONS or 5)
    -o, --out <file>              Where to save results (default: <TICKER>_research.json)
    --no-save                     Do not write the results file
    --json                        Print raw JSON instead of the formatted report
    -h, --help                    Show this help

  ${c('bold', 'Environment:')}
    ANTHROPIC_API_KEY             Required. Your Anthropic API key.
    FMP_API_KEY                   Required by the FMP market data server.
    ANTHROPIC_MODEL               Model override.
    LOG_LEVEL                     debug, info, warn or error.
`);
  }
}

// ── Entry point ─────────────────────────────────────────────────────

const cli = new StockResearchCli();
cli.start().catch((err: unknown) => {
  const label = err instanceof UsageError ? 'Error:' : 'Fatal:';
  console.error(`${c('red', label)} ${errorMessage(err)}`);
  process.exit(1);
});
