/**
 * Error types for the PushBullet client.
 */

import { z } from 'zod';

/**
 * Error codes for PushBullet errors.
 */
export enum PushbulletErrorCode {
  /** Configuration error. */
  Configuration = 'configuration_error',
  /** Token missing, empty or not sendable as a header value. */
  InvalidToken = 'invalid_token',
  /** Token rejected by the server. */
  Authentication = 'authentication_error',
  /** Structured error reported by the server. */
  Api = 'api_error',
  /** Non-success status without an error body. */
  Status = 'status_error',
  /** Response body could not be decoded. */
  InvalidResponse = 'invalid_response',
  /** Request input rejected before sending. */
  Validation = 'validation_error',
  /** Network error. */
  Network = 'network_error',
  /** Timeout error. */
  Timeout = 'timeout_error',
}

/**
 * Additional error details.
 */
export interface PushbulletErrorDetails {
  /** HTTP status code. */
  statusCode?: number;
  /** Error code reported by the API (e.g. `invalid_access_token`). */
  apiCode?: string;
  /** Raw response body. */
  body?: string;
  /** Parameter that caused the error. */
  param?: string;
  /** Token hint (last 4 chars). */
  tokenHint?: string;
  /** Original error. */
  cause?: Error;
}

/**
 * PushBullet API error.
 */
export class PushbulletError extends Error {
  /** Error code. */
  readonly code: PushbulletErrorCode;

  /** Additional error details. */
  readonly details: PushbulletErrorDetails;

  constructor(code: PushbulletErrorCode, message: string, details: PushbulletErrorDetails = {}) {
    super(message);
    this.name = 'PushbulletError';
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PushbulletError);
    }
  }

  /**
   * Returns true if the token was missing, malformed or rejected.
   */
  isAuthenticationError(): boolean {
    return (
      this.code === PushbulletErrorCode.Authentication ||
      this.code === PushbulletErrorCode.InvalidToken
    );
  }

  /**
   * Creates a configuration error.
   */
  static configuration(message: string): PushbulletError {
    return new PushbulletError(PushbulletErrorCode.Configuration, message);
  }

  /**
   * Creates an invalid token error.
   */
  static invalidToken(message: string, tokenHint?: string): PushbulletError {
    return new PushbulletError(PushbulletErrorCode.InvalidToken, message, { tokenHint });
  }

  /**
   * Creates an authentication error.
   */
  static authentication(message: string, statusCode?: number, apiCode?: string): PushbulletError {
    return new PushbulletError(PushbulletErrorCode.Authentication, message, {
      statusCode,
      apiCode,
    });
  }

  /**
   * Creates an error for a structured server error.
   */
  static api(message: string, apiCode: string | undefined, statusCode: number): PushbulletError {
    return new PushbulletError(PushbulletErrorCode.Api, message, { apiCode, statusCode });
  }

  /**
   * Creates an error for an unsuccessful status without an error body.
   */
  static status(statusCode: number, body: string): PushbulletError {
    return new PushbulletError(
      PushbulletErrorCode.Status,
      `Server returned HTTP ${statusCode}`,
      { statusCode, body }
    );
  }

  /**
   * Creates an error for an undecodable response.
   */
  static invalidResponse(message: string, body?: string, cause?: Error): PushbulletError {
    return new PushbulletError(PushbulletErrorCode.InvalidResponse, message, { body, cause });
  }

  /**
   * Creates a validation error.
   */
  static validation(message: string, param?: string): PushbulletError {
    return new PushbulletError(PushbulletErrorCode.Validation, message, { param });
  }

  /**
   * Creates a network error.
   */
  static network(message: string, cause?: Error): PushbulletError {
    return new PushbulletError(PushbulletErrorCode.Network, message, { cause });
  }

  /**
   * Creates a timeout error.
   */
  static timeout(message: string, cause?: Error): PushbulletError {
    return new PushbulletError(PushbulletErrorCode.Timeout, message, { cause });
  }

  /**
   * Converts to JSON.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: {
        ...this.details,
        cause: this.details.cause?.message,
      },
    };
  }
}

/**
 * Error body returned by the PushBullet API.
 *
 * The code is reported in `error.code` by older deployments and in the
 * top-level `error_code` by newer ones.
 */
export interface ApiErrorResponse {
  error: {
    code?: string;
    type?: string;
    message: string;
    cat?: string;
  };
  error_code?: string;
}

export const ApiErrorResponseSchema = z.object({
  error: z.object({
    code: z.string().optional(),
    type: z.string().optional(),
    message: z.string(),
    cat: z.string().optional(),
  }),
  error_code: z.string().optional(),
});

/** API code sent back when the access token is missing or revoked. */
export const INVALID_ACCESS_TOKEN = 'invalid_access_token';

/**
 * Type guard for PushbulletError.
 */
export function isPushbulletError(error: unknown): error is PushbulletError {
  return error instanceof PushbulletError;
}

/**
 * Checks if an error is an authentication failure.
 */
export function isAuthenticationError(error: unknown): boolean {
  return isPushbulletError(error) && error.isAuthenticationError();
}

/**
 * Parses a structured error body, if the value is one.
 */
export function parseApiError(data: unknown): ApiErrorResponse | undefined {
  const result = ApiErrorResponseSchema.safeParse(data);
  return result.success ? result.data : undefined;
}

/**
 * Creates a PushbulletError from an API error response.
 */
export function fromApiError(status: number, body: ApiErrorResponse): PushbulletError {
  const { error } = body;
  const apiCode = error.code ?? body.error_code ?? error.type;

  if (status === 401 || apiCode === INVALID_ACCESS_TOKEN) {
    return PushbulletError.authentication(error.message, status, apiCode);
  }

  return PushbulletError.api(error.message, apiCode, status);
}
