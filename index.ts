#!/usr/bin/env node
/**
 * Black-Scholes Pricer - Entry Point
 *
 * Prices a European call and put on the same contract and prints
 * price and delta for each.
 *
 * Usage: npx ts-node index.ts [<S> <K> <r> <sigma> <T>]
 */

import * as dotenv from 'dotenv';
dotenv.config();

import { loadPricerConfig, validatePricerConfig, logPricerConfig } from './config';
import { createLogger, safeErrorData } from './logger';
import { parseCliArgs, USAGE } from './cli/args';
import { formatQuote } from './cli/format';
import { quoteOption, assertValidParameters } from './core';

export * from './core';

const log = createLogger('Cli');

/**
 * Run one evaluation. Results go to `out`, diagnostics to `err`.
 * Returns the process exit code.
 */
export function main(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  out: (line: string) => void = (line) => console.log(line),
  err: (line: string) => void = (line) => console.error(line),
): number {
  try {
    const config = loadPricerConfig(env);
    validatePricerConfig(config);
    logPricerConfig(config);

    const args = parseCliArgs(argv, config.defaults, config.strict);
    if (args.help) {
      out(USAGE);
      return 0;
    }

    for (const fallback of args.fallbacks) {
      log.debug('arg.fallback', { ...fallback });
    }

    if (config.strict) {
      assertValidParameters(args.params);
    }

    log.debug('pricing.start', { ...args.params });
    const quote = quoteOption(args.params);
    log.debug('pricing.done', { ...quote });

    for (const line of formatQuote(quote)) {
      out(line);
    }
    return 0;
  } catch (e) {
    log.error('pricing.failed', safeErrorData(e));
    err(`Error: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}
