import * as fs from 'fs';
import * as path from 'path';
import Joi from 'joi';
import { HandlerConfig, LogLevel, MarkerLexicon } from '../types/index.js';
import { ConfigurationError } from '../errors.js';
import { defaultConfig } from './defaults.js';

export const DEFAULT_CONFIG_PATH = '~/.query-handler/config.json';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * Shape of the optional JSON config file. Every key may be omitted.
 */
export interface ConfigFile {
  api?: Partial<HandlerConfig['api']>;
  translation?: Partial<HandlerConfig['translation']>;
  reply?: Partial<HandlerConfig['reply']>;
  detection?: {
    cacheSize?: number;
    lexicon?: Partial<MarkerLexicon>;
  };
  metrics?: Partial<HandlerConfig['metrics']>;
  monitoring?: Partial<HandlerConfig['monitoring']>;
  demoQueries?: string[];
}

const nonEmptyStrings = Joi.array().items(Joi.string().min(1));

export const configFileSchema = Joi.object<ConfigFile>({
  api: Joi.object({
    baseUrl: Joi.string().uri({ scheme: ['http', 'https'] }),
    apiKey: Joi.string().min(1),
    preferredModel: Joi.string().min(1),
    fallbackModels: nonEmptyStrings.min(1).messages({
      'array.min': 'api.fallbackModels must list at least one model'
    }),
    requestTimeout: Joi.number().integer().positive(),
    probeTimeout: Joi.number().integer().positive()
  }),
  translation: Joi.object({
    maxTokens: Joi.number().integer().positive(),
    errorSubstrings: nonEmptyStrings
  }),
  reply: Joi.object({
    maxTokens: Joi.number().integer().positive()
  }),
  detection: Joi.object({
    cacheSize: Joi.number().integer().positive(),
    lexicon: Joi.object({
      version: Joi.string().min(1),
      hindi: nonEmptyStrings,
      marathi: nonEmptyStrings
    })
  }),
  metrics: Joi.object({
    truncateLength: Joi.number().integer().positive()
  }),
  monitoring: Joi.object({
    logLevel: Joi.string().valid(...LOG_LEVELS)
  }),
  demoQueries: nonEmptyStrings
});

/**
 * Build the runtime configuration: defaults, then the config file,
 * then environment variables, then command line flags.
 */
export function loadConfig(args: string[] = [], env: NodeJS.ProcessEnv = process.env): HandlerConfig {
  let config = defaultConfig();

  const explicitPath = flagValue(args, '--config') || env.QUERY_HANDLER_CONFIG;
  const configPath = expandPath(explicitPath || DEFAULT_CONFIG_PATH, env);

  if (fs.existsSync(configPath)) {
    config = mergeConfig(config, readConfigFile(configPath));
  } else if (explicitPath) {
    throw new ConfigurationError(`Config file not found: ${configPath}`);
  }

  // Environment overrides
  const apiKey = env.QUERY_HANDLER_API_KEY || env.GROQ_API_KEY;
  if (apiKey) {
    config.api.apiKey = apiKey.trim();
  }
  if (env.QUERY_HANDLER_BASE_URL) {
    config.api.baseUrl = env.QUERY_HANDLER_BASE_URL;
  }
  if (env.QUERY_HANDLER_MODEL) {
    config.api.preferredModel = env.QUERY_HANDLER_MODEL;
  }
  if (env.QUERY_HANDLER_LOG_LEVEL) {
    config.monitoring.logLevel = parseLogLevel(env.QUERY_HANDLER_LOG_LEVEL);
  }

  // Command line overrides
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--model':
        config.api.preferredModel = requireValue(args, ++i, arg);
        break;
      case '--base-url':
        config.api.baseUrl = requireValue(args, ++i, arg);
        break;
      case '--log-level':
        config.monitoring.logLevel = parseLogLevel(requireValue(args, ++i, arg));
        break;
      case '--config':
        i++;
        break;
    }
  }

  return config;
}

export function readConfigFile(configPath: string): ConfigFile {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to read config file ${configPath}: ${reason}`);
  }

  const { value, error } = configFileSchema.validate(raw, { abortEarly: false });
  if (error) {
    throw new ConfigurationError(
      `Invalid config file ${configPath}`,
      error.details.map(detail => detail.message)
    );
  }

  return value;
}

export function mergeConfig(base: HandlerConfig, file: ConfigFile): HandlerConfig {
  return {
    api: { ...base.api, ...file.api },
    translation: { ...base.translation, ...file.translation },
    reply: { ...base.reply, ...file.reply },
    detection: {
      cacheSize: file.detection?.cacheSize ?? base.detection.cacheSize,
      lexicon: { ...base.detection.lexicon, ...file.detection?.lexicon }
    },
    metrics: { ...base.metrics, ...file.metrics },
    monitoring: { ...base.monitoring, ...file.monitoring },
    demoQueries: file.demoQueries ?? base.demoQueries
  };
}

/**
 * The remote service cannot be used without a credential
 */
export function requireApiKey(config: HandlerConfig): string {
  const apiKey = config.api.apiKey?.trim();
  if (!apiKey) {
    throw new ConfigurationError(
      'API key not found. Set QUERY_HANDLER_API_KEY (or GROQ_API_KEY), or api.apiKey in the config file.'
    );
  }
  return apiKey;
}

function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find(candidate => candidate === value.toLowerCase());
  if (!level) {
    throw new ConfigurationError(
      `Invalid log level "${value}". Expected one of: ${LOG_LEVELS.join(', ')}`
    );
  }
  return level;
}

function flagValue(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  return index === -1 ? undefined : requireValue(args, index + 1, flag);
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigurationError(`Missing value for ${flag}`);
  }
  return value;
}

export function expandPath(filePath: string, env: NodeJS.ProcessEnv = process.env): string {
  if (filePath.startsWith('~')) {
    const home = env.HOME || env.USERPROFILE || '';
    return path.join(home, filePath.slice(1));
  }
  return path.resolve(filePath);
}
