export type ErrorStatus = 400 | 401 | 404 | 409 | 429 | 500 | 502 | 503;

export type ErrorCode =
  | 'unknown_style'
  | 'authentication'
  | 'rate_limit'
  | 'transient_unavailable'
  | 'invalid_parameter'
  | 'corrupt_image'
  | 'not_found'
  | 'cancelled'
  | 'generation_in_progress'
  | 'configuration';

/**
 * Root of every error the service raises on purpose.
 * `status` is the HTTP status the API answers with.
 */
export abstract class ImagecraftError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly status: ErrorStatus;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnknownStyleError extends ImagecraftError {
  readonly code = 'unknown_style';
  readonly status = 400;

  constructor(readonly style: string) {
    super(`Unknown style: "${style}"`);
  }
}

export class AuthenticationError extends ImagecraftError {
  readonly code = 'authentication';
  readonly status = 401;
}

export class RateLimitError extends ImagecraftError {
  readonly code = 'rate_limit';
  readonly status = 429;
}

export class TransientUnavailableError extends ImagecraftError {
  readonly code = 'transient_unavailable';
  readonly status = 503;

  constructor(message: string, readonly attempts: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class InvalidParameterError extends ImagecraftError {
  readonly code = 'invalid_parameter';
  readonly status = 400;
}

export class CorruptImageError extends ImagecraftError {
  readonly code = 'corrupt_image';
  readonly status = 502;
}

export class NotFoundError extends ImagecraftError {
  readonly code = 'not_found';
  readonly status = 404;

  constructor(readonly id: string) {
    super(`Gallery entry not found: ${id}`);
  }
}

export class CancelledError extends ImagecraftError {
  readonly code = 'cancelled';
  readonly status = 409;

  constructor(message = 'Generation cancelled') {
    super(message);
  }
}

export class GenerationInProgressError extends ImagecraftError {
  readonly code = 'generation_in_progress';
  readonly status = 409;

  constructor() {
    super('A generation is already running for this session');
  }
}

export class ConfigurationError extends ImagecraftError {
  readonly code = 'configuration';
  readonly status = 500;
}

export function isImagecraftError(err: unknown): err is ImagecraftError {
  return err instanceof ImagecraftError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
