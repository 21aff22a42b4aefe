#!/usr/bin/env node
import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import helmet from 'helmet';
import * as dotenv from 'dotenv';
import type { Server } from 'http';
import { loadTransformerConfig, MAX_BODY_SIZE, type TransformerConfig } from './config/transformer.js';
import { createV1Router } from './routes/v1.js';
import { ImageTransformer } from './services/ImageTransformer.js';
import { ModelRepository } from './services/ModelRepository.js';
import { ErrorHandler } from './utils/errorHandler.js';
import { createLogger, type Logger } from './utils/LoggerUtils.js';

/**
 * Build the Express app serving every model in the repository
 */
export function createServerApp(repository: ModelRepository, logger: Logger): express.Express {
  const app = express();

  // Security middleware
  app.use(helmet());

  // Body parsing middleware
  app.use(express.json({ limit: MAX_BODY_SIZE }));

  app.use(createV1Router(repository, logger.child('v1')));

  // 404 handler
  app.use('*', (_req: Request, res: Response) => {
    res.status(404).json({ error: 'Route not found' });
  });

  // Error handling middleware
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const context = `${req.method} ${req.originalUrl}`;
    const message = ErrorHandler.getLogMessage(err, context);
    if (ErrorHandler.isServerFault(err)) {
      logger.error(message, err);
    } else {
      logger.warn(message);
    }

    const { status, body } = ErrorHandler.toHttpResponse(err);
    res.status(status).json(body);
  });

  return app;
}

/**
 * Load the transformer, register it and start listening
 */
export async function startServer(config: TransformerConfig, logger: Logger): Promise<Server> {
  const transformer = new ImageTransformer({
    name: config.modelName,
    predictorHost: config.predictorHost,
    explainerHost: config.explainerHost,
    logger: logger.child('transformer')
  });
  await transformer.load();

  const repository = new ModelRepository();
  repository.update(transformer);

  const app = createServerApp(repository, logger);

  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(config.httpPort, () => {
      logger.info(`Listening on port ${config.httpPort}`);
      resolve(server);
    });

    server.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        logger.error(`Port ${config.httpPort} is already in use`);
      }
      reject(err);
    });
  });
}

if (require.main === module) {
  // Load environment variables from .env.local
  dotenv.config({ path: '.env.local' });

  const bootLogger = createLogger('server');
  let config: TransformerConfig;
  try {
    config = loadTransformerConfig();
  } catch (error) {
    bootLogger.error(ErrorHandler.getLogMessage(error, 'startup'));
    process.exit(1);
  }

  startServer(config, createLogger('server', config.logLevel)).catch((error: unknown) => {
    bootLogger.error(ErrorHandler.getLogMessage(error, 'startup'), error);
    process.exit(1);
  });
}
