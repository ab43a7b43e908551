/**
 * Error taxonomy for the scraper.
 *
 * Everything except ConfigurationError is recoverable: it is caught at the
 * smallest enclosing unit (script tag, card, story), logged and counted.
 */

export class ScraperError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network failure, timeout or non-2xx status. */
export class TransportError extends ScraperError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, options?: { status?: number; cause?: unknown }) {
    super(`${message} (${url})`, { cause: options?.cause });
    this.url = url;
    this.status = options?.status;
  }
}

/** Malformed embedded JSON. */
export class DecodeError extends ScraperError {}

/** A required field was absent or blank during normalization. */
export class MissingFieldError extends ScraperError {
  readonly field: string;

  constructor(field: string) {
    super(`Missing required field: ${field}`);
    this.field = field;
  }
}

/** The page did not contain the node the adapter expects. */
export class StructuralMismatchError extends ScraperError {
  readonly url: string;
  readonly expected: string;

  constructor(url: string, expected: string) {
    super(`Expected ${expected} not found at ${url}`);
    this.url = url;
    this.expected = expected;
  }
}

/** Unknown source name, bad CLI flag or invalid environment value. Fatal. */
export class ConfigurationError extends ScraperError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
