/**
 * Error types
 */

/**
 * Listing or index page could not be loaded. Discovery returns nothing.
 */
export class FatalDiscoveryError extends Error {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    super(`Discovery failed for ${url}: ${errorMessage(cause)}`, { cause });
    this.name = 'FatalDiscoveryError';
    this.url = url;
  }
}

/**
 * Batch could not start (no browser session)
 */
export class OrchestrationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'OrchestrationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
