/**
 * Image Transformer
 * Turns base64 image instances into normalized tensors before they reach the
 * predictor, and relays predict/explain calls to the backends.
 */

import {
  EXPLAINER_URL_FORMAT,
  PREDICTOR_URL_FORMAT,
  UPSTREAM_TIMEOUT_MS
} from '../config/transformer.js';
import {
  ImageRequestSchema,
  InvalidInputError,
  NotImplementedError,
  type JsonRecord,
  type RequestHeaders,
  type TransformedRequest
} from '../types/index.js';
import type { InferenceModel } from '../types/model.js';
import { ImageUtils } from '../utils/ImageUtils.js';
import type { Logger } from '../utils/LoggerUtils.js';
import { UpstreamClient } from './upstreamClient.js';

export interface ImageTransformerOptions {
  name: string;
  predictorHost?: string;
  explainerHost?: string;
  logger: Logger;
  timeoutMs?: number;
}

export class ImageTransformer implements InferenceModel {
  readonly name: string;
  readonly predictorHost?: string;
  readonly explainerHost?: string;
  readonly timeoutMs: number;
  private isReady = false;
  private readonly logger: Logger;
  private readonly client: UpstreamClient;

  constructor(options: ImageTransformerOptions) {
    this.name = options.name;
    this.predictorHost = options.predictorHost;
    this.explainerHost = options.explainerHost;
    this.timeoutMs = options.timeoutMs ?? UPSTREAM_TIMEOUT_MS;
    this.logger = options.logger;
    this.client = new UpstreamClient({ timeoutMs: this.timeoutMs, logger: this.logger });
  }

  get ready(): boolean {
    return this.isReady;
  }

  async load(): Promise<boolean> {
    this.logger.info(`MODEL NAME ${this.name}`);
    this.logger.info(`PREDICTOR URL ${this.predictorHost ?? '(not configured)'}`);
    this.logger.info(`EXPLAINER URL ${this.explainerHost ?? '(not configured)'}`);
    this.isReady = true;
    return this.isReady;
  }

  /**
   * Converts every instance's base64 `data` into a tensor, preserving order.
   * One bad instance fails the whole request.
   */
  async preprocess(request: JsonRecord, _headers?: RequestHeaders): Promise<TransformedRequest> {
    const parsed = ImageRequestSchema.safeParse(request);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
      throw new InvalidInputError(details);
    }

    const instances = await Promise.all(
      parsed.data.instances.map(instance => ImageUtils.transformInstance(instance, this.logger))
    );
    return { instances };
  }

  async predict(request: JsonRecord, headers?: RequestHeaders): Promise<JsonRecord> {
    if (this.predictorHost === undefined) {
      throw new NotImplementedError(`No predictor host configured for model ${this.name}`);
    }
    const url = PREDICTOR_URL_FORMAT(this.predictorHost, this.name);
    this.logger.debug(`Forwarding predict request to ${url}`);
    return this.client.postJson(url, request, headers);
  }

  postprocess<T extends JsonRecord>(response: T, _headers?: RequestHeaders): T {
    return response;
  }

  async explain(request: JsonRecord, headers?: RequestHeaders): Promise<JsonRecord> {
    if (this.explainerHost === undefined) {
      throw new NotImplementedError(`No explainer host configured for model ${this.name}`);
    }
    const url = EXPLAINER_URL_FORMAT(this.explainerHost, this.name);
    this.logger.info(`Inside Image Transformer explain ${url}`);
    return this.client.postJson(url, request, headers);
  }
}
