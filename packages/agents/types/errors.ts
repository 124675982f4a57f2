// Error taxonomy for the research agent
// Only ConfigurationError and ResearchError reach the caller; the rest are
// recovered by the agent loop and turned into transcript entries.

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class MalformedFunctionCallError extends Error {
  constructor(
    message: string,
    public readonly response: string,
  ) {
    super(message);
    this.name = 'MalformedFunctionCallError';
  }
}

export class UnknownFunctionError extends Error {
  constructor(public readonly functionName: string) {
    super(`Function ${functionName} not found`);
    this.name = 'UnknownFunctionError';
  }
}

export class FunctionInvocationError extends Error {
  constructor(
    public readonly functionName: string,
    public readonly cause?: unknown,
  ) {
    super(`${functionName} failed: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'FunctionInvocationError';
  }
}

export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'GatewayError';
  }
}

export class ResearchError extends Error {
  constructor(
    message: string,
    public readonly stage: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'ResearchError';
  }
}

/** Message text of anything thrown */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
