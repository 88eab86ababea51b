/**
 * vnquote command line: history, intraday and depth for one symbol.
 */

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import type { ChalkInstance } from 'chalk';
import { z } from 'zod';
import { isQuoteError } from '@vnquote/contracts';
import { createLogger } from '@vnquote/logger';
import type { Logger } from '@vnquote/logger';
import { parseInterval } from '@vnquote/market-data-core';
import { VciQuote } from '@vnquote/provider-vci';
import type { VciQuoteOptions } from '@vnquote/provider-vci';
import { loadConfig, toQuoteOptions } from './config/index.js';
import type { Config } from './config/index.js';
import { renderTable } from './format.js';

export interface CliDeps {
  /** Environment read for configuration. @default process.env */
  env?: NodeJS.ProcessEnv;
  /** Quote factory, replaced in tests */
  createQuote?: (symbol: string, options: VciQuoteOptions) => VciQuote;
  /** Root logger; built from configuration when omitted */
  logger?: Logger;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  chalk?: ChalkInstance;
}

const globalOptionsSchema = z.object({
  json: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

const historyOptionsSchema = z.object({
  start: z.string(),
  end: z.string().optional(),
  interval: z.string().default('1D'),
  countBack: z.number().optional(),
  floating: z.number().optional(),
});

const intradayOptionsSchema = z.object({
  pageSize: z.number().optional(),
  lastTime: z.string().optional(),
});

function toNumber(value: string): number {
  return Number(value);
}

function rootLogger(config: Config, verbose: boolean): Logger {
  return createLogger({
    level: verbose ? 'debug' : config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
  });
}

/**
 * Build the `vnquote` program.
 *
 * Output goes through `deps.stdout`; commander's own help and usage errors
 * through `deps.stdout` and `deps.stderr`.
 */
export function createProgram(deps: CliDeps = {}): Command {
  const out = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const err = deps.stderr ?? ((text: string) => process.stderr.write(text));
  const c = deps.chalk ?? chalk;
  const createQuote = deps.createQuote ?? ((symbol, options) => new VciQuote(symbol, options));

  const program = new Command();

  program
    .name('vnquote')
    .description('Fetch Vietnamese market data from the VCI trading API')
    .version('0.1.0')
    .option('--json', 'Print JSON records instead of a table', false)
    .option('-v, --verbose', 'Log requests at debug level', false)
    .exitOverride()
    .configureOutput({ writeOut: out, writeErr: err });

  function openQuote(symbol: string): { quote: VciQuote; json: boolean } {
    const globals = globalOptionsSchema.parse(program.opts());
    const config = loadConfig(deps.env ?? process.env);
    const logger = deps.logger ?? rootLogger(config, globals.verbose);
    logger.debug('Opening quote', { symbol });
    return { quote: createQuote(symbol, { ...toQuoteOptions(config), logger }), json: globals.json };
  }

  program
    .command('history')
    .description('Price bars over a date range')
    .argument('<symbol>', 'Ticker, index or futures code (e.g. VCB, VNINDEX)')
    .requiredOption('-s, --start <date>', 'First day, YYYY-MM-DD')
    .option('-e, --end <date>', 'Last day, YYYY-MM-DD (defaults to now)')
    .option('-i, --interval <interval>', 'Bar interval: 1m, 5m, 15m, 30m, 1H, 1D, 1W, 1M', '1D')
    .option('-c, --count-back <n>', 'Bars to request, overriding the derived count', toNumber)
    .option('-f, --floating <digits>', 'Decimal digits for prices', toNumber)
    .action(async (symbol: string, rawOptions: unknown) => {
      const options = historyOptionsSchema.parse(rawOptions);
      const { quote, json } = openQuote(symbol);
      const query = {
        start: options.start,
        end: options.end,
        interval: parseInterval(options.interval),
        countBack: options.countBack,
        floating: options.floating,
      };
      out(`${json ? await quote.history({ ...query, toFrame: false }) : renderTable(await quote.history(query), c)}\n`);
    });

  program
    .command('intraday')
    .description('Matched trades of the current session, newest first')
    .argument('<symbol>', 'Ticker, index or futures code')
    .option('-p, --page-size <n>', 'Trades per page', toNumber)
    .option('-l, --last-time <cursor>', 'Page cursor from a previous call')
    .action(async (symbol: string, rawOptions: unknown) => {
      const options = intradayOptionsSchema.parse(rawOptions);
      const { quote, json } = openQuote(symbol);
      const query = { pageSize: options.pageSize, lastTime: options.lastTime };
      out(`${json ? await quote.intraday({ ...query, toFrame: false }) : renderTable(await quote.intraday(query), c)}\n`);
    });

  program
    .command('depth')
    .description('Accumulated volume per price step')
    .argument('<symbol>', 'Ticker, index or futures code')
    .action(async (symbol: string) => {
      const { quote, json } = openQuote(symbol);
      out(`${json ? await quote.priceDepth({ toFrame: false }) : renderTable(await quote.priceDepth(), c)}\n`);
    });

  return program;
}

/**
 * Run the program over user arguments and resolve with the exit code.
 * Failures print as `CODE message`.
 *
 * @example
 * ```typescript
 * process.exitCode = await runCli(['history', 'VCB', '--start', '2024-01-01']);
 * ```
 */
export async function runCli(args: readonly string[], deps: CliDeps = {}): Promise<number> {
  const err = deps.stderr ?? ((text: string) => process.stderr.write(text));
  const c = deps.chalk ?? chalk;

  try {
    await createProgram(deps).parseAsync([...args], { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (isQuoteError(error)) {
      err(`${c.red.bold(error.code)} ${error.message}\n`);
    } else {
      err(`${c.red.bold('ERROR')} ${error instanceof Error ? error.message : String(error)}\n`);
    }
    return 1;
  }
}
