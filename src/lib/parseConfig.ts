/**
 * Configuration parser
 * Order: default < env < cli
 */
import { toConfig, keyOf, type Config } from '../config/args';

import { ConfigError } from './errors';

export type ConfigTemplate = ConfigEntry[];

export type ConfigResultValue =
  | string
  | string[]
  | boolean
  | number
  | Record<string, unknown>
  | undefined;

export type ConfigValues = Record<string, ConfigResultValue>;

export type ConfigEntryType =
  | 'string'
  | 'number'
  | 'boolean'
  | 'array'
  | 'json';

export type ConfigEntry = [
  string, // arg
  string, // env value
  string | string[] | boolean | number | Record<string, unknown>, // default value
  (ConfigEntryType | null | undefined)?, // type
  (string | null | undefined)?, // for array type, the plural form of cliArg (e.g. --plugin / --plugins)
];

type CliValue = string | string[] | boolean;

const splitList = (value: string, sep: RegExp): string[] =>
  value
    .split(sep)
    .map(v => v.trim())
    .filter(v => v.length > 0);

export class ConfigParser {
  private config: ConfigTemplate;

  constructor(config: ConfigTemplate) {
    this.config = config;
  }

  parse(argv: string[] = process.argv): Config {
    return toConfig(this.parseValues(argv));
  }

  parseValues(argv: string[] = process.argv): ConfigValues {
    const result: ConfigValues = {};
    const cliArgs = this.parseCliArgs(argv);
    for (const entry of this.config) {
      const [cliArg, envVar, defaultValue, type, plural] = entry;
      let value: ConfigResultValue = defaultValue;

      // Override with env value if exists
      const envValue = process.env[envVar];
      if (envValue !== undefined) {
        if (type === 'boolean') {
          value = envValue.toLowerCase() === 'true';
        } else if (type === 'number') {
          value = this.toNumber(envValue, `environment variable ${envVar}`);
        } else if (type === 'array') {
          const sep = envValue.indexOf(';') > 0 ? ';' : ',';
          value = splitList(envValue, new RegExp(`[${sep}\\s]+`));
        } else if (type === 'json') {
          value = this.toJson(envValue, `environment variable ${envVar}`);
        } else {
          value = envValue;
        }
      }

      // Override with CLI arg if exists
      const cliValue = cliArgs.get(cliArg);
      if (cliValue !== undefined) {
        if (type === 'boolean') {
          value = true;
        } else if (type === 'array') {
          const added = Array.isArray(cliValue)
            ? cliValue
            : [String(cliValue)];
          value = Array.isArray(value) ? value.concat(added) : added;
        } else if (typeof cliValue !== 'string') {
          throw new ConfigError(`Missing value for ${cliArg}`);
        } else if (type === 'number') {
          value = this.toNumber(cliValue, `command line argument ${cliArg}`);
        } else if (type === 'json') {
          value = this.toJson(cliValue, `command line argument ${cliArg}`);
        } else {
          value = cliValue;
        }
        cliArgs.delete(cliArg);
      }
      if (type === 'array' && plural) {
        const pluralValue = cliArgs.get(plural);
        if (typeof pluralValue === 'string') {
          const added = splitList(pluralValue, /[,\s]+/);
          value = Array.isArray(value) ? value.concat(added) : added;
        }
        cliArgs.delete(plural);
      }

      result[keyOf(cliArg)] = value;
    }

    // Store additional arguments
    cliArgs.forEach((v, k) => {
      const key = keyOf(k);
      if (key in result) {
        throw new ConfigError(`Error in command line: ${k} redefined`);
      }
      result[key] = v;
    });

    return result;
  }

  // Command-line parser
  private parseCliArgs(argv: string[]): Map<string, CliValue> {
    const args = new Map<string, CliValue>();

    for (let i = 2; i < argv.length; i++) {
      const arg = argv[i];
      if (!arg.startsWith('-')) continue;

      const configEntry = this.config.find(
        entry => entry[0] === arg || entry[4] === arg
      );
      if (configEntry && configEntry[3] === 'boolean') {
        args.set(arg, true);
        continue;
      }

      const nextArg = argv[i + 1];
      if (nextArg === undefined) {
        // Flag without value at the end of the line
        args.set(arg, true);
        continue;
      }
      i++;
      if (configEntry?.[3] === 'array' && configEntry[0] === arg) {
        const previous = args.get(arg);
        args.set(
          arg,
          Array.isArray(previous) ? [...previous, nextArg] : [nextArg]
        );
      } else {
        args.set(arg, nextArg);
      }
    }

    return args;
  }

  private toNumber(value: string, source: string): number {
    const parsed = Number(value);
    if (value.trim() === '' || Number.isNaN(parsed)) {
      throw new ConfigError(`Invalid number "${value}" in ${source}`);
    }
    return parsed;
  }

  private toJson(value: string, source: string): Record<string, unknown> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(value);
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new ConfigError(`Error parsing JSON from ${source}: ${reason}`);
    }
    if (
      typeof parsed !== 'object' ||
      parsed === null ||
      Array.isArray(parsed)
    ) {
      throw new ConfigError(`JSON from ${source} must be an object`);
    }
    return { ...parsed };
  }
}

export function parseConfig(
  config: ConfigTemplate,
  argv: string[] = process.argv
): Config {
  const parser = new ConfigParser(config);
  return parser.parse(argv);
}
