/**
 * Error taxonomy for the vocabulary registry and collision resolver.
 *
 * Every error carries a stable `code` and the HTTP status the API maps it to,
 * so surfaces can tell an unknown vocabulary from a bad source configuration,
 * a network problem, or a missing optional capability.
 */

export type VocabErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_CONFIGURATION'
  | 'RETRIEVAL_FAILURE'
  | 'CAPABILITY_UNAVAILABLE';

export class VocabError extends Error {
  readonly code: VocabErrorCode;
  readonly statusCode: number;

  constructor(code: VocabErrorCode, message: string, statusCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'VocabError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

/**
 * Prefix or alias absent from the registry.
 */
export class VocabNotFoundError extends VocabError {
  constructor(public readonly identifier: string) {
    super('NOT_FOUND', `'${identifier}' not found in registry`, 404);
    this.name = 'VocabNotFoundError';
  }
}

/**
 * A vocabulary entry, context source or rule failed validation.
 */
export class InvalidConfigurationError extends VocabError {
  constructor(message: string, public readonly path?: string) {
    super('INVALID_CONFIGURATION', path ? `Invalid configuration at '${path}': ${message}` : message, 400);
    this.name = 'InvalidConfigurationError';
  }
}

/**
 * A fetch timed out, returned a non-success status, failed in transport,
 * or returned a body that could not be parsed.
 */
export class RetrievalFailureError extends VocabError {
  readonly url: string;
  readonly status: number | undefined;
  readonly timedOut: boolean;

  constructor(
    url: string,
    reason: string,
    options: { status?: number; timedOut?: boolean; cause?: unknown } = {}
  ) {
    super(
      'RETRIEVAL_FAILURE',
      `Failed to retrieve ${url}: ${reason}`,
      options.timedOut ? 504 : 502,
      { cause: options.cause }
    );
    this.name = 'RetrievalFailureError';
    this.url = url;
    this.status = options.status;
    this.timedOut = options.timedOut ?? false;
  }
}

/**
 * An optional capability (e.g. Turtle parsing) was needed but not configured.
 */
export class CapabilityUnavailableError extends VocabError {
  constructor(public readonly capability: string, message: string) {
    super('CAPABILITY_UNAVAILABLE', message, 501);
    this.name = 'CapabilityUnavailableError';
  }
}

export function isVocabError(err: unknown): err is VocabError {
  return err instanceof VocabError;
}
