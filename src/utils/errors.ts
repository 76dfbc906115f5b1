/**
 * Raised for problems that make the whole run impossible: bad arguments,
 * an unusable destination, an unsupported language pair. Always thrown
 * before any file is read or written.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
