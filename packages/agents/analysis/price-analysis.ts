// Price-series summary: average move, up/down day counts, extremes

import { decodePayload, PricePayloadSchema, type PriceRecordPayload } from './schemas.js';
import type { AnalysisOutcome, PriceAnalysis, PriceExtreme } from './types.js';

function toExtreme(record: PriceRecordPayload): PriceExtreme {
  return {
    date: record.date,
    percent: record.percent_change,
    price: record.close,
  };
}

/**
 * Summarise a price series. Accepts either the bare daily-change array or a
 * stock-data object carrying `daily_changes`, as JSON text or decoded.
 *
 * Ties on the extremes resolve to the first record in input order.
 */
export function analyzePriceData(input: unknown): AnalysisOutcome<PriceAnalysis> {
  const decoded = decodePayload(PricePayloadSchema, input, 'price data');
  if (!decoded.ok) return decoded.error;

  const payload = decoded.value;
  const dailyChanges = Array.isArray(payload) ? payload : payload.daily_changes;
  const meta: { symbol?: string; name?: string; current_price?: number | null } =
    Array.isArray(payload) ? {} : payload;

  const first = dailyChanges[0];
  const last = dailyChanges[dailyChanges.length - 1];
  if (!first || !last) {
    return { status: 'error', message: 'No daily price changes found in data' };
  }

  let total = 0;
  let upDays = 0;
  let downDays = 0;
  let maxGain = first;
  let maxLoss = first;

  for (const change of dailyChanges) {
    const pct = change.percent_change;
    total += pct;
    if (pct > 0) upDays++;
    else if (pct < 0) downDays++;

    if (pct > maxGain.percent_change) maxGain = change;
    if (pct < maxLoss.percent_change) maxLoss = change;
  }

  return {
    ticker: meta.symbol ?? 'Unknown',
    company_name: meta.name ?? 'Unknown',
    current_price: meta.current_price ?? 0,
    analysis_period: `${first.date} to ${last.date}`,
    average_daily_change: total / dailyChanges.length,
    up_days: upDays,
    down_days: downDays,
    max_gain: toExtreme(maxGain),
    max_loss: toExtreme(maxLoss),
  };
}
