/**
 * Configuration Management
 *
 * Loads router and logging settings from a JSON file and the environment.
 * Values are validated when they enter a Config, so a typo in a file fails
 * at startup instead of being ignored.
 */

import { readFile } from 'node:fs/promises';
import { ConfigError } from '../http/errors.ts';
import type { RegexPrecedence } from '../router/trie.ts';
import {
  isLogFormat,
  isLogLevel,
  Logger,
  type LogFormat,
  type LoggerOptions,
  type LogLevel,
  type LogSettings,
  setLogger,
} from '../telemetry/logger.ts';

export interface RouterConfig {
  ignoreCase: boolean;
  regexPrecedence: RegexPrecedence;
}

export interface JunctionConfig {
  env: string;
  logLevel: LogLevel;
  logFormat: LogFormat;
  router: RouterConfig;
}

export interface ConfigOptions {
  env?: string;
  logLevel?: LogLevel;
  logFormat?: LogFormat;
  router?: Partial<RouterConfig>;
}

const DEFAULT_CONFIG: JunctionConfig = {
  env: 'development',
  logLevel: 'info',
  logFormat: 'pretty',
  router: {
    ignoreCase: false,
    regexPrecedence: 'regex',
  },
};

const DEFAULT_PATHS = ['./junction.json', './config/junction.json'];

/**
 * Configuration manager
 */
export class Config {
  private config: JunctionConfig;

  constructor(options: ConfigOptions = {}) {
    this.config = merge(DEFAULT_CONFIG, options);
  }

  /**
   * Get a configuration value by dotted path, e.g. `router.ignoreCase`
   */
  get(key: string): unknown {
    return key.split('.').reduce<unknown>(
      (current, part) => (isRecord(current) ? current[part] : undefined),
      this.config,
    );
  }

  /**
   * Set a configuration value by dotted path. The value is validated like
   * one read from a file.
   */
  set(key: string, value: unknown): void {
    const nested = key
      .split('.')
      .reduceRight<unknown>((inner, part) => ({ [part]: inner }), value);
    this.config = merge(this.config, parseConfigOptions(nested, `key "${key}"`));
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  /**
   * Get all configuration
   */
  all(): JunctionConfig {
    return { ...this.config, router: { ...this.config.router } };
  }

  /**
   * Level and format for loggers built from this configuration
   */
  logSettings(): LogSettings {
    return { level: this.config.logLevel, format: this.config.logFormat };
  }

  /**
   * A logger with the configured level and format
   */
  createLogger(
    context: Record<string, unknown> = {},
    options: Pick<LoggerOptions, 'output' | 'color'> = {},
  ): Logger {
    return new Logger({
      ...this.logSettings(),
      ...options,
      context: { service: 'junction', env: this.config.env, ...context },
    });
  }

  /**
   * Make a logger from this configuration the process-wide one
   */
  installLogger(
    context: Record<string, unknown> = {},
    options: Pick<LoggerOptions, 'output' | 'color'> = {},
  ): Logger {
    const logger = this.createLogger(context, options);
    setLogger(logger);
    return logger;
  }
}

function merge(base: JunctionConfig, override: ConfigOptions): JunctionConfig {
  return {
    env: override.env ?? base.env,
    logLevel: override.logLevel ?? base.logLevel,
    logFormat: override.logFormat ?? base.logFormat,
    router: {
      ignoreCase: override.router?.ignoreCase ?? base.router.ignoreCase,
      regexPrecedence: override.router?.regexPrecedence ?? base.router.regexPrecedence,
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRegexPrecedence(value: unknown): value is RegexPrecedence {
  return value === 'regex' || value === 'capture';
}

/**
 * Validate untyped input (parsed JSON) as config options
 */
export function parseConfigOptions(value: unknown, source: string): ConfigOptions {
  if (!isRecord(value)) {
    throw new ConfigError(source, 'expected an object');
  }

  const options: ConfigOptions = {};

  for (const [key, field] of Object.entries(value)) {
    switch (key) {
      case 'env':
        if (typeof field !== 'string') throw new ConfigError(source, '"env" must be a string');
        options.env = field;
        break;
      case 'logLevel':
        if (!isLogLevel(field)) {
          throw new ConfigError(source, '"logLevel" must be one of debug, info, warn, error');
        }
        options.logLevel = field;
        break;
      case 'logFormat':
        if (!isLogFormat(field)) {
          throw new ConfigError(source, '"logFormat" must be "json" or "pretty"');
        }
        options.logFormat = field;
        break;
      case 'router':
        options.router = parseRouterOptions(field, source);
        break;
      default:
        throw new ConfigError(source, `unknown key "${key}"`);
    }
  }

  return options;
}

function parseRouterOptions(value: unknown, source: string): Partial<RouterConfig> {
  if (!isRecord(value)) {
    throw new ConfigError(source, '"router" must be an object');
  }

  const router: Partial<RouterConfig> = {};

  for (const [key, field] of Object.entries(value)) {
    switch (key) {
      case 'ignoreCase':
        if (typeof field !== 'boolean') {
          throw new ConfigError(source, '"router.ignoreCase" must be a boolean');
        }
        router.ignoreCase = field;
        break;
      case 'regexPrecedence':
        if (!isRegexPrecedence(field)) {
          throw new ConfigError(source, '"router.regexPrecedence" must be "regex" or "capture"');
        }
        router.regexPrecedence = field;
        break;
      default:
        throw new ConfigError(source, `unknown key "router.${key}"`);
    }
  }

  return router;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readConfigFile(path: string): Promise<ConfigOptions | undefined> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) return undefined;
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(path, `malformed JSON (${reason})`);
  }

  return parseConfigOptions(parsed, path);
}

function parseBoolean(value: string, name: string): boolean {
  switch (value.toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new ConfigError(name, `expected true or false, got "${value}"`);
  }
}

/**
 * Options taken from environment variables
 */
export function envOptions(env: NodeJS.ProcessEnv): ConfigOptions {
  const options: ConfigOptions = {};
  const router: Partial<RouterConfig> = {};

  if (env.NODE_ENV) options.env = env.NODE_ENV;

  if (env.LOG_LEVEL) {
    const level = env.LOG_LEVEL.toLowerCase();
    if (!isLogLevel(level)) throw new ConfigError('LOG_LEVEL', `unknown level "${env.LOG_LEVEL}"`);
    options.logLevel = level;
  }

  if (env.LOG_FORMAT) {
    const format = env.LOG_FORMAT.toLowerCase();
    if (!isLogFormat(format)) throw new ConfigError('LOG_FORMAT', `unknown format "${env.LOG_FORMAT}"`);
    options.logFormat = format;
  }

  if (env.JUNCTION_IGNORE_CASE) {
    router.ignoreCase = parseBoolean(env.JUNCTION_IGNORE_CASE, 'JUNCTION_IGNORE_CASE');
  }

  if (env.JUNCTION_REGEX_PRECEDENCE) {
    const policy = env.JUNCTION_REGEX_PRECEDENCE.toLowerCase();
    if (!isRegexPrecedence(policy)) {
      throw new ConfigError(
        'JUNCTION_REGEX_PRECEDENCE',
        `unknown policy "${env.JUNCTION_REGEX_PRECEDENCE}"`,
      );
    }
    router.regexPrecedence = policy;
  }

  if (Object.keys(router).length > 0) options.router = router;
  return options;
}

/**
 * Load configuration from a config file and the environment. Without a
 * path the default locations are tried in order; a missing file leaves the
 * defaults in place. Environment variables win over the file.
 */
export async function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<Config> {
  let fileConfig: ConfigOptions = {};

  for (const path of configPath ? [configPath] : DEFAULT_PATHS) {
    const options = await readConfigFile(path);
    if (options) {
      fileConfig = options;
      break;
    }
  }

  return new Config(merge(merge(DEFAULT_CONFIG, fileConfig), envOptions(env)));
}

// Default config instance
let defaultConfig: Config | null = null;

/**
 * Get the default config instance
 */
export function getConfig(): Config {
  if (!defaultConfig) {
    defaultConfig = new Config();
  }
  return defaultConfig;
}

export function setConfig(config: Config): void {
  defaultConfig = config;
}
