#!/usr/bin/env node
import 'dotenv/config';
import { z } from 'zod';
import { CacheTTL, createFmpClient, type FmpClient } from './client.js';

// ── ANSI helpers ────────────────────────────────────────────────────
const isTTY = process.stdout.isTTY ?? false;
const ansi = {
  reset: isTTY ? '\x1b[0m' : '', bold: isTTY ? '\x1b[1m' : '', dim: isTTY ? '\x1b[2m' : '',
  cyan: isTTY ? '\x1b[36m' : '', green: isTTY ? '\x1b[32m' : '', red: isTTY ? '\x1b[31m' : '',
};
function c(color: keyof typeof ansi, text: string): string { return `${ansi[color]}${text}${ansi.reset}`; }

// ── Arg parsing ─────────────────────────────────────────────────────
const args = process.argv.slice(2);
const command = args[0]?.toLowerCase();

function getFlag(flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx >= 0 && idx + 1 < args.length ? args[idx + 1] : undefined;
}

function requireSymbol(): string {
  const sym = args[1];
  if (!sym || sym.startsWith('-')) { console.error(`${c('red', 'Error:')} <symbol> is required`); process.exit(1); }
  return sym.toUpperCase();
}

function fmt(n: number | null | undefined, d = 2): string {
  return n != null ? n.toLocaleString(undefined, { minimumFractionDigits: d, maximumFractionDigits: d }) : '-';
}
function fmtB(n: number | null | undefined): string {
  if (n == null) return '-';
  const a = Math.abs(n);
  if (a >= 1e12) return `$${(n / 1e12).toFixed(2)}T`;
  if (a >= 1e9) return `$${(n / 1e9).toFixed(2)}B`;
  if (a >= 1e6) return `$${(n / 1e6).toFixed(1)}M`;
  return `$${n.toLocaleString()}`;
}
function padL(s: string, n: number): string { return s.length >= n ? s : ' '.repeat(n - s.length) + s; }

// ── Response shapes ─────────────────────────────────────────────────
const num = z.number().nullish();
const str = z.string().nullish();

const QuoteRow = z.object({
  symbol: z.string(), name: str, price: num, change: num, changePercentage: num,
  volume: num, marketCap: num, yearLow: num, yearHigh: num,
});
const ProfileRow = z.object({
  symbol: z.string(), companyName: str, sector: str, industry: str, exchange: str,
  country: str, price: num, marketCap: num, beta: num, description: str, website: str,
});
const PriceRow = z.object({ date: z.string(), close: z.number(), volume: num, changePercent: num });
const NewsRow = z.object({ symbol: str, publishedDate: str, title: str, text: str, site: str });

/** FMP answers with a bare array or `{ historical: [...] }` */
function rows<T extends z.ZodTypeAny>(schema: T, data: unknown): z.infer<T>[] {
  const list = Array.isArray(data)
    ? data
    : z.object({ historical: z.array(z.unknown()) }).safeParse(data).data?.historical ?? [];
  const out: z.infer<T>[] = [];
  for (const item of list) {
    const parsed = schema.safeParse(item);
    if (parsed.success) out.push(parsed.data);
  }
  return out;
}

// ── Handlers ────────────────────────────────────────────────────────

async function handleQuote(client: FmpClient) {
  const symbol = requireSymbol();
  const [q] = rows(QuoteRow, await client.fetch('quote', { symbol }, { cacheTtl: CacheTTL.REALTIME }));
  if (!q) { console.log('No data found'); return; }
  const change = q.change ?? 0;
  console.log(`\n  ${c('bold', q.symbol)} ${c('dim', q.name ?? '')}`);
  console.log(`  Price: ${c('bold', fmt(q.price))}  ${c(change >= 0 ? 'green' : 'red', `${change >= 0 ? '+' : ''}${fmt(change)} (${fmt(q.changePercentage)}%)`)}`);
  console.log(`  ${c('dim', `Vol: ${q.volume?.toLocaleString() ?? '-'}  |  Mkt Cap: ${fmtB(q.marketCap)}  |  52W: ${fmt(q.yearLow)} - ${fmt(q.yearHigh)}`)}\n`);
}

async function handleProfile(client: FmpClient) {
  const symbol = requireSymbol();
  const [p] = rows(ProfileRow, await client.fetch('profile', { symbol }, { cacheTtl: CacheTTL.LONG }));
  if (!p) { console.log('No data found'); return; }
  console.log(`\n  ${c('bold', p.symbol)} ${c('cyan', p.companyName ?? '')}`);
  console.log(`  ${c('dim', `${p.sector ?? ''} > ${p.industry ?? ''}  |  ${p.exchange ?? ''} (${p.country ?? ''})`)}`);
  console.log(`  Mkt Cap: ${c('bold', fmtB(p.marketCap))}  |  Price: ${c('bold', fmt(p.price))}  |  Beta: ${fmt(p.beta)}`);
  if (p.description) {
    const desc = p.description.length > 300 ? p.description.slice(0, 297) + '...' : p.description;
    console.log(`\n  ${c('dim', desc)}`);
  }
  if (p.website) console.log(`  ${c('cyan', p.website)}`);
  console.log();
}

async function handlePrices(client: FmpClient) {
  const symbol = requireSymbol();
  const from = getFlag('--from');
  const to = getFlag('--to');
  const data = rows(PriceRow, await client.fetch('historical-price-eod/full', { symbol, from, to }, { cacheTtl: CacheTTL.SHORT }));
  if (!data.length) { console.log('No price history found'); return; }
  console.log(`\n  ${c('bold', symbol)} Daily Closes\n`);
  for (const r of data) {
    const pct = r.changePercent ?? 0;
    console.log(`  ${c('dim', r.date)}  ${padL(fmt(r.close), 10)}  ${c(pct >= 0 ? 'green' : 'red', padL(`${fmt(pct)}%`, 8))}  ${c('dim', r.volume?.toLocaleString() ?? '-')}`);
  }
  console.log();
}

async function handleNews(client: FmpClient) {
  const symbol = getFlag('--stock');
  const limit = Number(getFlag('--limit') ?? 10);
  const data = rows(NewsRow, symbol
    ? await client.fetch('news/stock', { symbols: symbol.toUpperCase(), limit }, { cacheTtl: CacheTTL.SHORT })
    : await client.fetch('news/stock-latest', { limit }, { cacheTtl: CacheTTL.SHORT }));
  if (!data.length) { console.log('No news found'); return; }
  console.log(`\n  ${c('bold', 'Stock News')} ${symbol ? c('dim', `(${symbol.toUpperCase()})`) : ''}\n`);
  for (const n of data) {
    console.log(`  ${c('dim', (n.publishedDate ?? '').slice(0, 16))}  ${c('cyan', n.symbol ?? '')}  ${c('bold', n.title ?? '')}`);
    if (n.text) console.log(`  ${c('dim', n.text.slice(0, 120) + '...')}`);
    console.log();
  }
}

function printHelp() {
  console.log(`
  ${c('bold', 'fmp')} ${c('dim', '-- market data for stock research')}

  ${c('cyan', 'Usage:')}  fmp <command> [args] [options]

  ${c('cyan', 'Commands:')}
    ${c('bold', 'quote')} <symbol>                    Real-time quote
    ${c('bold', 'profile')} <symbol>                  Company profile
    ${c('bold', 'prices')} <symbol>                   End-of-day price history
        ${c('dim', '[--from YYYY-MM-DD] [--to YYYY-MM-DD]')}
    ${c('bold', 'news')} ${c('dim', '[--stock SYM] [--limit N]')}   Latest stock news
    ${c('bold', '--help')}                            Show this help

  ${c('cyan', 'Examples:')}
    ${c('dim', 'fmp quote AAPL')}
    ${c('dim', 'fmp prices MSFT --from 2024-03-01 --to 2024-03-08')}
    ${c('dim', 'fmp news --stock NVDA --limit 5')}

  ${c('dim', 'Requires FMP_API_KEY env var (or .env file).')}
`);
}

// ── Main ────────────────────────────────────────────────────────────
async function main() {
  if (!command || command === '--help' || command === '-h' || command === 'help') { printHelp(); return; }
  try {
    const client = createFmpClient();
    switch (command) {
      case 'quote':   await handleQuote(client); break;
      case 'profile': await handleProfile(client); break;
      case 'prices':  await handlePrices(client); break;
      case 'news':    await handleNews(client); break;
      default:
        console.error(`${c('red', 'Error:')} Unknown command "${command}"\n`);
        printHelp(); process.exit(1);
    }
  } catch (err) {
    console.error(`${c('red', 'Error:')} ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

void main();
