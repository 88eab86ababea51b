/**
 * @fileoverview Public API exports for @vnquote/cli
 */

export { createProgram, runCli } from './program.js';
export type { CliDeps } from './program.js';
export { renderTable } from './format.js';
export { loadConfig, toQuoteOptions, ConfigError, configSchema, envMapping } from './config/index.js';
export type { Config } from './config/index.js';
