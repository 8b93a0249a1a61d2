/**
 * command-line options, corresponding environment variables, default values and types
 * Contains also the typescript declaration of config
 */
import { ConfigError } from '../lib/errors';
import type { ConfigTemplate, ConfigValues } from '../lib/parseConfig';

export const logLevels = ['error', 'warn', 'notice', 'info', 'debug'] as const;
export type LogLevel = (typeof logLevels)[number];

export const loggers = ['console', 'file'] as const;
export type LoggerType = (typeof loggers)[number];

/**
 * Typescript declaration of config
 *
 * See below for config arguments, corresponding environment variables,
 * default value, type and optional plural name
 */
export interface Config {
  log_level: LogLevel;
  logger: LoggerType;
  log_file: string;
  plugin: string[];
  history_limit: number;
  initial_count: number;
  actions: string;
  // unknown command-line arguments, keyed like the others
  extra: ConfigValues;
}

const configArgs: ConfigTemplate = [
  // Logs
  ['--log-level', 'AF_LOG_LEVEL', 'info'],
  ['--logger', 'AF_LOGGER', 'console'],
  ['--log-file', 'AF_LOG_FILE', 'actionflow.log'],

  // Plugins
  ['--plugin', 'AF_PLUGINS', [], 'array', '--plugins'],

  // core/history plugin
  ['--history-limit', 'AF_HISTORY_LIMIT', 50, 'number'],

  // Store
  ['--initial-count', 'AF_INITIAL_COUNT', 0, 'number'],

  // Command line runner
  ['--actions', 'AF_ACTIONS', ''],
];

const readString = (values: ConfigValues, key: string): string => {
  const value = values[key];
  if (typeof value !== 'string') {
    throw new ConfigError(`${key} must be a string`);
  }
  return value;
};

const readNumber = (values: ConfigValues, key: string): number => {
  const value = values[key];
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new ConfigError(`${key} must be a number`);
  }
  return value;
};

const readStringArray = (values: ConfigValues, key: string): string[] => {
  const value = values[key];
  if (!Array.isArray(value)) {
    throw new ConfigError(`${key} must be a list`);
  }
  return value;
};

const readEnum = <T extends string>(
  values: ConfigValues,
  key: string,
  allowed: readonly T[]
): T => {
  const value = readString(values, key);
  const found = allowed.find(candidate => candidate === value);
  if (found === undefined) {
    throw new ConfigError(
      `${key} must be one of ${allowed.join(', ')}, got "${value}"`
    );
  }
  return found;
};

/**
 * Turns parsed values into a typed Config
 */
export const toConfig = (values: ConfigValues): Config => {
  const known = new Set(configArgs.map(entry => keyOf(entry[0])));
  const extra: ConfigValues = {};
  for (const [key, value] of Object.entries(values)) {
    if (!known.has(key)) extra[key] = value;
  }
  const config: Config = {
    log_level: readEnum(values, 'log_level', logLevels),
    logger: readEnum(values, 'logger', loggers),
    log_file: readString(values, 'log_file'),
    plugin: readStringArray(values, 'plugin'),
    history_limit: readNumber(values, 'history_limit'),
    initial_count: readNumber(values, 'initial_count'),
    actions: readString(values, 'actions'),
    extra,
  };
  if (config.history_limit < 0) {
    throw new ConfigError('history_limit must not be negative');
  }
  return config;
};

// --log-level => log_level
export const keyOf = (cliArg: string): string =>
  cliArg.replace(/^-+/, '').replace(/-/g, '_');

export default configArgs;
