import type { JsonRecord, RequestHeaders } from './index.js';

/**
 * Capabilities the server invokes on a registered model.
 * predict: preprocess → predict → postprocess
 * explain: preprocess → explain
 */
export interface InferenceModel {
  readonly name: string;
  readonly ready: boolean;
  load(): Promise<boolean>;
  preprocess(request: JsonRecord, headers?: RequestHeaders): Promise<JsonRecord>;
  predict(request: JsonRecord, headers?: RequestHeaders): Promise<JsonRecord>;
  postprocess<T extends JsonRecord>(response: T, headers?: RequestHeaders): T;
  explain(request: JsonRecord, headers?: RequestHeaders): Promise<JsonRecord>;
}
