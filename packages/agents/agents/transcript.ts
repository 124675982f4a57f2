// Transcript rendering — turns iteration records into the next prompt
// The whole transcript is replayed every iteration, so prompt size grows
// with the iteration count.

import type { IterationRecord } from '../types/transcript.js';

function renderResult(result: unknown): string {
  if (typeof result === 'string') return result;
  try {
    return JSON.stringify(result) ?? String(result);
  } catch {
    return String(result);
  }
}

export function renderRecord(record: IterationRecord): string {
  switch (record.kind) {
    case 'function_call':
      return `In iteration ${record.iteration} you called ${record.functionName} with ${record.params} parameters, `
        + `and the function returned ${renderResult(record.result)}.`;
    case 'error':
      return record.error;
    case 'text':
      return record.response;
  }
}

export function renderTranscript(records: readonly IterationRecord[]): string {
  return records.map(renderRecord).join('\n');
}

export function buildPrompt(
  systemPrompt: string,
  query: string,
  records: readonly IterationRecord[],
): string {
  const context = records.length > 0
    ? `${query}\n\n${renderTranscript(records)}\nWhat should I do next?`
    : query;
  return `${systemPrompt}\n\nQuery: ${context}`;
}
