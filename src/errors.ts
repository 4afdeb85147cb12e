/**
 * Startup errors. Anything raised here stops the run before a single URL is fetched;
 * per-URL failures are modelled as FetchOutcome values instead.
 */

export type StartupErrorKind = 'config' | 'input';

export class StartupError extends Error {
  readonly kind: StartupErrorKind;
  readonly path?: string;

  constructor(
    message: string,
    kind: StartupErrorKind,
    options?: { path?: string; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.kind = kind;
    this.path = options?.path;
  }
}

/** Missing, unreadable or malformed configuration file. */
export class ConfigError extends StartupError {
  constructor(message: string, options?: { path?: string; cause?: unknown }) {
    super(message, 'config', options);
  }
}

/** No usable seeds or keywords after merging file and command-line input. */
export class InputError extends StartupError {
  constructor(message: string) {
    super(message, 'input');
  }
}
