/**
 * Maps service errors onto HTTP responses
 */

import {
  ConfigurationError,
  ImageDecodeError,
  InvalidInputError,
  ModelNotFoundError,
  ModelNotReadyError,
  NotImplementedError,
  UpstreamHTTPError,
  UpstreamTimeoutError,
  UpstreamUnavailableError
} from '../types/index.js';

export interface ErrorResponse {
  status: number;
  body: { error: string };
}

export class ErrorHandler {
  /**
   * Status code and `{ error }` body for an error raised while serving a request
   */
  static toHttpResponse(error: unknown): ErrorResponse {
    if (error instanceof ImageDecodeError || error instanceof InvalidInputError) {
      return { status: 400, body: { error: error.message } };
    }
    if (error instanceof ModelNotFoundError) {
      return { status: 404, body: { error: error.message } };
    }
    if (error instanceof ModelNotReadyError) {
      return { status: 503, body: { error: error.message } };
    }
    if (error instanceof NotImplementedError) {
      return { status: 501, body: { error: error.message } };
    }
    if (error instanceof UpstreamHTTPError) {
      // non-200 success codes surface as 502
      const status = error.statusCode >= 400 ? error.statusCode : 502;
      return { status, body: { error: error.body } };
    }
    if (error instanceof UpstreamTimeoutError) {
      return { status: 504, body: { error: error.message } };
    }
    if (error instanceof UpstreamUnavailableError) {
      return { status: 502, body: { error: error.message } };
    }
    if (isBodyParserError(error)) {
      return { status: error.status, body: { error: error.message } };
    }
    return { status: 500, body: { error: 'Internal server error' } };
  }

  /**
   * Get appropriate log message for error type
   */
  static getLogMessage(error: unknown, context: string): string {
    if (error instanceof ImageDecodeError || error instanceof InvalidInputError) {
      return `[BAD INPUT] ${context}: ${error.message}`;
    } else if (error instanceof UpstreamHTTPError) {
      return `[UPSTREAM ${error.statusCode}] ${context}: ${error.body}`;
    } else if (error instanceof UpstreamTimeoutError) {
      return `[UPSTREAM TIMEOUT] ${context}: ${error.message}`;
    } else if (error instanceof UpstreamUnavailableError) {
      return `[UPSTREAM UNAVAILABLE] ${context}: ${error.message}`;
    } else if (error instanceof ConfigurationError) {
      return `[CONFIG ERROR] ${context}: ${error.message}`;
    } else if (error instanceof Error) {
      return `[ERROR] ${context} failed: ${error.message}`;
    } else {
      return `[ERROR] ${context} failed with unknown error`;
    }
  }

  /**
   * Client errors and missing backends are expected; everything else is logged as an error
   */
  static isServerFault(error: unknown): boolean {
    return this.toHttpResponse(error).status >= 500
      && !(error instanceof NotImplementedError)
      && !(error instanceof ModelNotReadyError);
  }
}

// express.json() raises errors carrying an HTTP status (malformed JSON, body too large)
function isBodyParserError(error: unknown): error is Error & { status: number } {
  if (!(error instanceof Error) || !('status' in error)) {
    return false;
  }
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500;
}
