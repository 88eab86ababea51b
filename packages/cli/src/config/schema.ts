/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

/**
 * CLI configuration schema
 */
export const configSchema = z
  .object({
    logging: z
      .object({
        level: z.enum(['error', 'warn', 'info', 'debug']).default('warn'),
        format: z.enum(['json', 'pretty']).default('pretty'),
        filePath: z.string().min(1).optional(),
      })
      .default({}),

    request: z
      .object({
        mode: z.enum(['direct', 'proxy', 'forward']).default('direct'),
        proxyList: z.array(z.string().url()).default([]),
        proxyMode: z.enum(['try', 'rotate', 'random', 'single']).default('try'),
        forwardProxyUrl: z.string().url().optional(),
        randomAgent: z.boolean().default(false),
        timeoutMs: z.number().int().positive().default(30000),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    if (config.request.mode === 'proxy' && config.request.proxyList.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['request', 'proxyList'],
        message: 'required when request mode is proxy',
      });
    }
    if (config.request.mode === 'forward' && config.request.forwardProxyUrl === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['request', 'forwardProxyUrl'],
        message: 'required when request mode is forward',
      });
    }
  });

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Readonly<Record<string, string>> = {
  VNQUOTE_LOG_LEVEL: 'logging.level',
  VNQUOTE_LOG_FORMAT: 'logging.format',
  VNQUOTE_LOG_FILE: 'logging.filePath',
  VNQUOTE_REQUEST_MODE: 'request.mode',
  VNQUOTE_PROXY_LIST: 'request.proxyList',
  VNQUOTE_PROXY_MODE: 'request.proxyMode',
  VNQUOTE_FORWARD_PROXY_URL: 'request.forwardProxyUrl',
  VNQUOTE_RANDOM_AGENT: 'request.randomAgent',
  VNQUOTE_TIMEOUT_MS: 'request.timeoutMs',
};

/** Paths read as comma-separated lists */
export const listPaths: ReadonlySet<string> = new Set(['request.proxyList']);

/** Paths read as numbers */
export const numberPaths: ReadonlySet<string> = new Set(['request.timeoutMs']);

/** Paths read as `true` / `false` */
export const booleanPaths: ReadonlySet<string> = new Set(['request.randomAgent']);
