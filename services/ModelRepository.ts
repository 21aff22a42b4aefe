/**
 * Model Repository
 * Registry of the models served by this process
 */

import { ModelNotFoundError } from '../types/index.js';
import type { InferenceModel } from '../types/model.js';

export class ModelRepository {
  private readonly models = new Map<string, InferenceModel>();

  update(model: InferenceModel): void {
    this.models.set(model.name, model);
  }

  getModel(name: string): InferenceModel | undefined {
    return this.models.get(name);
  }

  /**
   * @throws ModelNotFoundError
   */
  requireModel(name: string): InferenceModel {
    const model = this.getModel(name);
    if (!model) {
      throw new ModelNotFoundError(name);
    }
    return model;
  }

  getModels(): InferenceModel[] {
    return Array.from(this.models.values());
  }

  isModelReady(name: string): boolean {
    return this.getModel(name)?.ready ?? false;
  }
}
