/**
 * v1 inference protocol routes
 * Liveness, model readiness and the :predict / :explain verbs
 */

import express from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ModelNotFoundError, ModelNotReadyError, type JsonRecord } from '../types/index.js';
import type { InferenceModel } from '../types/model.js';
import type { ModelRepository } from '../services/ModelRepository.js';
import type { Logger } from '../utils/LoggerUtils.js';

type ModelVerb = 'predict' | 'explain';

const MODEL_VERBS: readonly ModelVerb[] = ['predict', 'explain'];

/**
 * Splits `mnist:predict` into its model name and verb
 */
export const parseModelTarget = (target: string): { modelName: string; verb?: ModelVerb } | undefined => {
  const separator = target.lastIndexOf(':');
  if (separator === -1) {
    return { modelName: target };
  }
  const modelName = target.slice(0, separator);
  const verb = MODEL_VERBS.find(candidate => candidate === target.slice(separator + 1));
  if (modelName === '' || verb === undefined) {
    return undefined;
  }
  return { modelName, verb };
};

const asyncRoute = (handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };

const requireReadyModel = (repository: ModelRepository, modelName: string): InferenceModel => {
  const model = repository.requireModel(modelName);
  if (!repository.isModelReady(modelName)) {
    throw new ModelNotReadyError(modelName);
  }
  return model;
};

const isJsonRecord = (value: unknown): value is JsonRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const createV1Router = (repository: ModelRepository, logger: Logger): express.Router => {
  const router = express.Router();

  // Liveness
  router.get('/', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'alive' });
  });

  router.get('/v1/models', (_req: Request, res: Response) => {
    res.json({ models: repository.getModels().map(model => model.name) });
  });

  router.get('/v1/models/:target', (req: Request, res: Response) => {
    const parsed = parseModelTarget(req.params['target']);
    if (!parsed || parsed.verb) {
      throw new ModelNotFoundError(req.params['target']);
    }
    const model = requireReadyModel(repository, parsed.modelName);
    res.json({ name: model.name, ready: model.ready });
  });

  router.post('/v1/models/:target', asyncRoute(async (req: Request, res: Response) => {
    const parsed = parseModelTarget(req.params['target']);
    if (!parsed || !parsed.verb) {
      res.status(404).json({ error: 'Route not found' });
      return;
    }

    const model = requireReadyModel(repository, parsed.modelName);
    const body: JsonRecord = isJsonRecord(req.body) ? req.body : {};
    const startTime = Date.now();

    const request = await model.preprocess(body, req.headers);
    let response: JsonRecord;
    if (parsed.verb === 'predict') {
      response = model.postprocess(await model.predict(request, req.headers), req.headers);
    } else {
      response = await model.explain(request, req.headers);
    }

    logger.debug(`${parsed.verb} ${model.name} completed in ${Date.now() - startTime}ms`);
    res.json(response);
  }));

  return router;
};
