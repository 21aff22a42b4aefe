/**
 * Shared types for the image transformer
 * Request schemas, tensor shapes and the error hierarchy used across services and routes
 */

import { z } from 'zod';

// ============================================================================
// REQUEST / RESPONSE BODIES
// ============================================================================

export type JsonRecord = Record<string, unknown>;

/**
 * Inbound request headers as handed over by the HTTP layer
 */
export type RequestHeaders = Record<string, string | string[] | undefined>;

export const ImageInstanceSchema = z
  .object({
    data: z.string({
      required_error: 'Expected "data" to be present on every instance',
      invalid_type_error: 'Expected "data" to be a base64 encoded string'
    })
  })
  .passthrough();

export const ImageRequestSchema = z
  .object({
    instances: z.array(ImageInstanceSchema, {
      required_error: 'Expected "instances" to be present',
      invalid_type_error: 'Expected "instances" to be a list'
    })
  })
  .passthrough();

export type ImageInstance = z.infer<typeof ImageInstanceSchema>;
export type ImageRequest = z.infer<typeof ImageRequestSchema>;

/**
 * Channel-major tensor: [channel][row][column]
 */
export type Tensor = number[][][];

export type TensorInstance = {
  data: Tensor;
  [key: string]: unknown;
};

export type TransformedRequest = {
  instances: TensorInstance[];
};

export const UpstreamBodySchema = z.record(z.unknown());

// ============================================================================
// ERRORS
// ============================================================================

export class ImageDecodeError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'ImageDecodeError';
    this.code = code;
  }
}

export class InvalidInputError extends Error {
  public readonly code: string;

  constructor(message: string, code: string = 'INVALID_INPUT') {
    super(message);
    this.name = 'InvalidInputError';
    this.code = code;
  }
}

export class NotImplementedError extends Error {
  public readonly code: string;

  constructor(message: string, code: string = 'NOT_IMPLEMENTED') {
    super(message);
    this.name = 'NotImplementedError';
    this.code = code;
  }
}

export class ModelNotFoundError extends Error {
  public readonly code: string;

  constructor(modelName: string) {
    super(`Model with name ${modelName} does not exist.`);
    this.name = 'ModelNotFoundError';
    this.code = 'MODEL_NOT_FOUND';
  }
}

export class ModelNotReadyError extends Error {
  public readonly code: string;

  constructor(modelName: string) {
    super(`Model with name ${modelName} is not ready.`);
    this.name = 'ModelNotReadyError';
    this.code = 'MODEL_NOT_READY';
  }
}

/**
 * Non-200 answer from the predictor or explainer.
 * `body` holds the raw upstream response text.
 */
export class UpstreamHTTPError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly body: string;

  constructor(statusCode: number, body: string, code: string = 'UPSTREAM_HTTP_ERROR') {
    super(`Upstream responded with status ${statusCode}: ${body}`);
    this.name = 'UpstreamHTTPError';
    this.code = code;
    this.statusCode = statusCode;
    this.body = body;
  }
}

export class UpstreamTimeoutError extends Error {
  public readonly code: string;
  public readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'UpstreamTimeoutError';
    this.code = 'UPSTREAM_TIMEOUT';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The backend could not be reached (connection refused, DNS failure, reset)
 */
export class UpstreamUnavailableError extends Error {
  public readonly code: string;

  constructor(url: string, reason: string) {
    super(`Request to ${url} failed: ${reason}`);
    this.name = 'UpstreamUnavailableError';
    this.code = 'UPSTREAM_UNAVAILABLE';
  }
}

export class ConfigurationError extends Error {
  public readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.code = 'INVALID_CONFIGURATION';
  }
}
