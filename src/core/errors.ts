/**
 * Raised (or returned) when a user-supplied option cannot be used,
 * e.g. a filter pattern that does not compile.
 */
export class ConfigError extends Error {
  readonly pattern: string;

  constructor(message: string, pattern: string) {
    super(message);
    this.name = 'ConfigError';
    this.pattern = pattern;
  }
}
