/**
 * Invalid or conflicting startup configuration. Fatal: the process exits
 * before the scheduler or the scrape server start.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * A usage, weight or start-date source could not be reached (transport
 * error, timeout, failed authentication, unreadable file). Scoped to a tick.
 */
export class SourceUnavailableError extends Error {
  readonly source: string;

  constructor(source: string, message: string, options?: ErrorOptions) {
    super(`${source}: ${message}`, options);
    this.name = 'SourceUnavailableError';
    this.source = source;
  }
}

/**
 * A single malformed entry inside an otherwise valid simulation file.
 * The entry is skipped, the rest of the file is used.
 */
export class PartialDataError extends Error {
  readonly entry: string;

  constructor(entry: string, message: string) {
    super(`${entry}: ${message}`);
    this.name = 'PartialDataError';
    this.entry = entry;
  }
}

/**
 * Wrap anything thrown by a source into a SourceUnavailableError
 */
export function toSourceUnavailable(source: string, err: unknown): SourceUnavailableError {
  if (err instanceof SourceUnavailableError) {
    return err;
  }
  if (err instanceof Error) {
    const reason = err.name === 'TimeoutError' ? 'request timed out' : err.message;
    return new SourceUnavailableError(source, reason, { cause: err });
  }
  return new SourceUnavailableError(source, String(err));
}
