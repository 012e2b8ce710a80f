/**
 * Black-Scholes Pricer - Configuration
 * Default contract parameters and error-handling policy, read from the environment.
 */

import { createLogger } from './logger';
import { OptionParameters } from './core/types';

const log = createLogger('Config');

export interface PricerConfig {
  /** Used when no (or too few) CLI arguments are given, and per-field on parse failure */
  defaults: OptionParameters;

  /**
   * Strict mode:
   *   false - unparseable arguments fall back to defaults, out-of-domain inputs price as NaN/Infinity
   *   true  - unparseable arguments and out-of-domain inputs are reported and exit 1
   */
  strict: boolean;
}

export const BUILTIN_DEFAULTS: Readonly<OptionParameters> = Object.freeze({
  spot: 100,
  strike: 100,
  rate: 0.05,        // 5% annual risk-free rate
  volatility: 0.2,   // 20% annual volatility
  maturity: 1.0,     // 1 year until expiration
});

function readNumber(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  return raw !== undefined && raw.trim() !== '' ? Number(raw) : fallback;
}

export function loadPricerConfig(env: NodeJS.ProcessEnv = process.env): PricerConfig {
  return {
    defaults: {
      spot: readNumber(env, 'PRICER_SPOT', BUILTIN_DEFAULTS.spot),
      strike: readNumber(env, 'PRICER_STRIKE', BUILTIN_DEFAULTS.strike),
      rate: readNumber(env, 'PRICER_RATE', BUILTIN_DEFAULTS.rate),
      volatility: readNumber(env, 'PRICER_VOL', BUILTIN_DEFAULTS.volatility),
      maturity: readNumber(env, 'PRICER_MATURITY', BUILTIN_DEFAULTS.maturity),
    },
    strict: env.PRICER_STRICT === 'true',
  };
}

export function validatePricerConfig(config: PricerConfig): void {
  const names: readonly (keyof OptionParameters)[] = ['spot', 'strike', 'rate', 'volatility', 'maturity'];
  for (const name of names) {
    const value = config.defaults[name];
    if (!Number.isFinite(value)) {
      throw new Error(`Default ${name} must be a finite number (got ${value}); check PRICER_* in .env`);
    }
  }
}

export function logPricerConfig(config: PricerConfig): void {
  log.debug('config.loaded', {
    ...config.defaults,
    strict: config.strict,
  });
}
