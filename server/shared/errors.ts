// server/shared/errors.ts

/** Price data could not be obtained for a ticker. Surfaced to the user as HTTP 503. */
export class DataUnavailableError extends Error {
  readonly symbol: string;

  constructor(symbol: string, detail: string, options?: { cause?: unknown }) {
    super(`${symbol}: ${detail}`, options);
    this.name = "DataUnavailableError";
    this.symbol = symbol;
  }

  get userMessage(): string {
    return `data temporarily unavailable for ${this.symbol}`;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
