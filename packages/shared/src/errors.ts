/**
 * Error Types
 *
 * Per-document problems are reported as failure outcomes, never thrown.
 * Only malformed configuration raises, and it does so at startup.
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** Failure reason for a document without any text lines */
export const NO_TEXT_CONTENT = 'no text content';

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
