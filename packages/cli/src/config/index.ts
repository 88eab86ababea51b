/**
 * Configuration loading
 */

import { QuoteError } from '@vnquote/contracts';
import type { Logger } from '@vnquote/logger';
import type { ProxyConfig, VciQuoteOptions } from '@vnquote/provider-vci';
import { booleanPaths, configSchema, envMapping, listPaths, numberPaths, type Config } from './schema.js';

type RawConfig = Record<string, Record<string, unknown>>;

/**
 * Raised when the environment holds an invalid configuration.
 */
export class ConfigError extends QuoteError {
  constructor(message: string, data: { issues: string[] }) {
    super('INVALID_CONFIG', message, data);
    this.name = 'ConfigError';
  }
}

/**
 * Load configuration from environment variables and defaults.
 *
 * @throws {ConfigError} Listing every invalid path
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, logger?: Logger): Config {
  const rawConfig: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, parseEnvValue(configPath, value));
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, { issues });
  }

  logger?.debug('Configuration loaded', {
    requestMode: result.data.request.mode,
    proxies: result.data.request.proxyList.length,
    logLevel: result.data.logging.level,
  });

  return result.data;
}

function setNestedProperty(obj: RawConfig, path: string, value: unknown): void {
  const [section, key] = path.split('.');
  if (section && key) {
    (obj[section] ??= {})[key] = value;
  }
}

/**
 * Parse environment variable value to the type its config path expects.
 * Values that do not parse are left as strings for the schema to reject.
 */
function parseEnvValue(path: string, value: string): unknown {
  if (listPaths.has(path)) return parseList(value);

  if (booleanPaths.has(path)) {
    if (value === 'true') return true;
    if (value === 'false') return false;
    return value;
  }

  if (numberPaths.has(path)) {
    const num = Number(value);
    return Number.isNaN(num) ? value : num;
  }

  return value;
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

/**
 * Quote options carried by the configuration.
 */
export function toQuoteOptions(config: Config): Pick<VciQuoteOptions, 'proxy' | 'randomAgent' | 'timeoutMs'> {
  const proxy: ProxyConfig = {
    requestMode: config.request.mode,
    proxyMode: config.request.proxyMode,
    proxyList: config.request.proxyList,
    forwardProxyUrl: config.request.forwardProxyUrl,
  };
  return { proxy, randomAgent: config.request.randomAgent, timeoutMs: config.request.timeoutMs };
}

export { configSchema, envMapping } from './schema.js';
export type { Config } from './schema.js';
