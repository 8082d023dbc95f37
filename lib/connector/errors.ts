/**
 * Run-level failure: the configuration cannot drive a sync.
 * Raised before any sheet is fetched.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** Render any thrown value as a log-friendly message */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
