/**
 * Transformer Configuration
 * Model identity, upstream hosts, normalization constants and server settings
 */

import { parseArgs } from 'util';
import { z } from 'zod';
import { ConfigurationError } from '../types/index.js';
import { LOG_LEVELS, type LogLevel } from '../utils/LoggerUtils.js';

export interface TransformerConfig {
  modelName: string;
  predictorHost?: string;
  explainerHost?: string;
  httpPort: number;
  logLevel: LogLevel;
}

// Single-channel normalization applied after scaling pixels to [0, 1]
export const TENSOR_NORMALIZATION = {
  mean: 0.1307,
  std: 0.3081
} as const;

// 100 seconds
export const UPSTREAM_TIMEOUT_MS = 100_000;

export const DEFAULT_HTTP_PORT = 8080;

export const MAX_BODY_SIZE = '10mb';

export const PREDICTOR_URL_FORMAT = (host: string, modelName: string): string =>
  `http://${host}/v1/models/${modelName}:predict`;

export const EXPLAINER_URL_FORMAT = (host: string, modelName: string): string =>
  `http://${host}/v1/models/${modelName}:explain`;

const optionalHost = z.string().trim().optional();

const ConfigSchema = z.object({
  modelName: z
    .string({ required_error: 'MODEL_NAME (or --model_name) is required' })
    .trim()
    .min(1, 'MODEL_NAME must not be empty')
    .regex(/^[^/:]+$/, 'MODEL_NAME must not contain "/" or ":"'),
  predictorHost: optionalHost,
  explainerHost: optionalHost,
  httpPort: z.coerce.number().int().min(0).max(65535).default(DEFAULT_HTTP_PORT),
  logLevel: z.enum(LOG_LEVELS).default('info')
});

/**
 * Build the configuration from environment variables and command-line flags.
 * Flags take precedence over the environment. The explainer host falls back
 * to the predictor host when it is not given.
 */
export const loadTransformerConfig = (
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = process.argv.slice(2)
): TransformerConfig => {
  let flags: Record<string, string | boolean | undefined>;
  try {
    flags = parseArgs({
      args: argv,
      options: {
        model_name: { type: 'string' },
        predictor_host: { type: 'string' },
        explainer_host: { type: 'string' },
        http_port: { type: 'string' },
        log_level: { type: 'string' }
      },
      strict: true,
      allowPositionals: false
    }).values;
  } catch (error) {
    throw new ConfigurationError(error instanceof Error ? error.message : String(error));
  }

  const setting = (flag: string, variable: string): string | undefined => {
    const value = flags[flag] ?? env[variable];
    return typeof value === 'string' && value.trim() !== '' ? value : undefined;
  };

  const parsed = ConfigSchema.safeParse({
    modelName: setting('model_name', 'MODEL_NAME'),
    predictorHost: setting('predictor_host', 'PREDICTOR_HOST'),
    explainerHost: setting('explainer_host', 'EXPLAINER_HOST'),
    httpPort: setting('http_port', 'HTTP_PORT'),
    logLevel: setting('log_level', 'LOG_LEVEL')
  });

  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => issue.message).join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  const { explainerHost, predictorHost, ...rest } = parsed.data;
  return {
    ...rest,
    predictorHost,
    explainerHost: explainerHost ?? predictorHost
  };
};
