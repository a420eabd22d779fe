// ── Error Codes ──
export enum ErrorCode {
  // Validation
  VALIDATION_ERROR = 'VALIDATION_ERROR',

  // Resources
  NOT_FOUND = 'NOT_FOUND',

  // Flight data provider
  PROVIDER_AUTH_FAILED = 'PROVIDER_AUTH_FAILED',
  PROVIDER_NOT_FOUND = 'PROVIDER_NOT_FOUND',
  PROVIDER_RATE_LIMITED = 'PROVIDER_RATE_LIMITED',
  PROVIDER_UNAVAILABLE = 'PROVIDER_UNAVAILABLE',
  PROVIDER_BAD_RESPONSE = 'PROVIDER_BAD_RESPONSE',

  // Rate limiting
  RATE_LIMITED = 'RATE_LIMITED',

  // Server
  CONFIG_ERROR = 'CONFIG_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

const PROVIDER_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.PROVIDER_AUTH_FAILED,
  ErrorCode.PROVIDER_NOT_FOUND,
  ErrorCode.PROVIDER_RATE_LIMITED,
  ErrorCode.PROVIDER_UNAVAILABLE,
  ErrorCode.PROVIDER_BAD_RESPONSE,
]);

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number,
    code: ErrorCode,
    details?: Record<string, unknown>,
    isOperational = true,
  ) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;
    Object.setPrototypeOf(this, AppError.prototype);
    Error.captureStackTrace(this, this.constructor);
  }

  static badRequest(message: string, code = ErrorCode.VALIDATION_ERROR, details?: Record<string, unknown>) {
    return new AppError(message, 400, code, details);
  }

  static notFound(message = 'Resource not found') {
    return new AppError(message, 404, ErrorCode.NOT_FOUND);
  }

  /**
   * Classify an upstream HTTP status from the flight data provider.
   * Undefined status means the request never got a response (network, timeout).
   */
  static provider(message: string, status?: number, details?: Record<string, unknown>) {
    const merged = { ...details, upstreamStatus: status };
    if (status === 401 || status === 403) {
      return new AppError(message, 502, ErrorCode.PROVIDER_AUTH_FAILED, merged);
    }
    if (status === 404) {
      return new AppError(message, 502, ErrorCode.PROVIDER_NOT_FOUND, merged);
    }
    if (status === 429) {
      return new AppError(message, 503, ErrorCode.PROVIDER_RATE_LIMITED, merged);
    }
    return new AppError(message, 503, ErrorCode.PROVIDER_UNAVAILABLE, merged);
  }
}

export function isProviderError(error: unknown): error is AppError {
  return error instanceof AppError && PROVIDER_CODES.has(error.code);
}

export function isNotFoundError(error: unknown): boolean {
  return error instanceof AppError && error.code === ErrorCode.PROVIDER_NOT_FOUND;
}

export function describeError(error: unknown): string {
  if (error instanceof AppError) return `${error.code}: ${error.message}`;
  if (error instanceof Error) return error.message;
  return String(error);
}
