// Agent transcript — one record per model round-trip, append-only

interface IterationBase {
  readonly iteration: number;      // 1-based
  readonly response: string;       // raw model text for this round-trip
}

export interface FunctionCallRecord extends IterationBase {
  readonly kind: 'function_call';
  readonly functionName: string;
  readonly params: string;
  readonly result: unknown;
}

export interface TextRecord extends IterationBase {
  readonly kind: 'text';
}

/** Unknown function or malformed function call */
export interface ErrorRecord extends IterationBase {
  readonly kind: 'error';
  readonly error: string;
}

export type IterationRecord = FunctionCallRecord | TextRecord | ErrorRecord;

export type AgentOutcome =
  | { state: 'completed'; result: string; iterations: number }
  | { state: 'exhausted'; result: string; iterations: number };
