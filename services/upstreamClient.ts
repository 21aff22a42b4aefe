/**
 * Upstream Client
 * JSON POST to the predictor and explainer backends
 */

import axios, { type AxiosResponse } from 'axios';
import {
  UpstreamBodySchema,
  UpstreamHTTPError,
  UpstreamTimeoutError,
  UpstreamUnavailableError,
  type JsonRecord,
  type RequestHeaders
} from '../types/index.js';
import type { Logger } from '../utils/LoggerUtils.js';

export interface UpstreamClientOptions {
  timeoutMs: number;
  logger: Logger;
}

// Inbound headers relayed to the backend
const FORWARDED_HEADERS = ['x-request-id'];

export class UpstreamClient {
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: UpstreamClientOptions) {
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
  }

  /**
   * POST `body` as JSON and return the parsed JSON object.
   * Single attempt, no retry.
   * @throws UpstreamHTTPError when the status is not 200 or the body is not a JSON object
   * @throws UpstreamTimeoutError when the full response has not arrived within the timeout
   * @throws UpstreamUnavailableError when the backend cannot be reached
   */
  async postJson(url: string, body: JsonRecord, headers: RequestHeaders = {}): Promise<JsonRecord> {
    const startTime = Date.now();
    let response: AxiosResponse<string>;
    try {
      response = await axios.post<string>(url, JSON.stringify(body), {
        timeout: this.timeoutMs,
        // `timeout` only covers idle sockets; the signal bounds the whole exchange
        signal: AbortSignal.timeout(this.timeoutMs),
        headers: { 'Content-Type': 'application/json', ...this.forwardedHeaders(headers) },
        responseType: 'text',
        transformResponse: [(data: string) => data],
        validateStatus: () => true
      });
    } catch (error) {
      const timedOut = axios.isCancel(error)
        || (axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT'));
      if (timedOut) {
        this.logger.warn(`Request to ${url} timed out after ${this.timeoutMs}ms`);
        throw new UpstreamTimeoutError(url, this.timeoutMs);
      }
      if (axios.isAxiosError(error) && error.response === undefined) {
        this.logger.warn(`Request to ${url} failed: ${error.code ?? error.message}`);
        throw new UpstreamUnavailableError(url, error.code ?? error.message);
      }
      throw error;
    }

    const responseBody = typeof response.data === 'string' ? response.data : '';
    this.logger.debug(`POST ${url} -> ${response.status} in ${Date.now() - startTime}ms`);

    if (response.status !== 200) {
      throw new UpstreamHTTPError(response.status, responseBody);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(responseBody);
    } catch {
      throw new UpstreamHTTPError(502, responseBody, 'INVALID_UPSTREAM_BODY');
    }

    const result = UpstreamBodySchema.safeParse(parsed);
    if (!result.success) {
      throw new UpstreamHTTPError(502, responseBody, 'INVALID_UPSTREAM_BODY');
    }
    return result.data;
  }

  private forwardedHeaders(headers: RequestHeaders): Record<string, string> {
    const forwarded: Record<string, string> = {};
    for (const name of FORWARDED_HEADERS) {
      const value = headers[name];
      if (typeof value === 'string') {
        forwarded[name] = value;
      }
    }
    return forwarded;
  }
}
