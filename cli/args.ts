/**
 * Command-line argument parsing
 *
 *   <S> <K> <r> <sigma> <T>
 *
 * Fewer than five positionals: every parameter takes its default.
 * Five or more: the first five are used, extras are ignored.
 * An argument that is not a finite number either falls back to that
 * parameter's default (lenient) or throws ArgumentParseError (strict).
 */

import { OptionParameters } from '../core/types';

export const POSITIONAL_ORDER: readonly (keyof OptionParameters)[] = [
  'spot',
  'strike',
  'rate',
  'volatility',
  'maturity',
];

export interface ArgumentFallback {
  index: number;
  parameter: keyof OptionParameters;
  value: string;
  substituted: number;
}

export interface ParsedArgs {
  help: boolean;
  params: OptionParameters;
  /** Arguments that could not be parsed and were replaced by defaults */
  fallbacks: ArgumentFallback[];
}

export class ArgumentParseError extends Error {
  constructor(
    readonly index: number,
    readonly parameter: keyof OptionParameters,
    readonly value: string
  ) {
    super(`Argument ${index + 1} (${parameter}) is not a number: "${value}"`);
    this.name = 'ArgumentParseError';
  }
}

/**
 * Parse a decimal or exponent literal. Rejects empty strings, trailing
 * garbage ("12abc"), NaN and infinities.
 */
export function parseNumber(raw: string): number | null {
  const trimmed = raw.trim();
  if (trimmed === '') return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

export function parseCliArgs(
  argv: readonly string[],
  defaults: OptionParameters,
  strict: boolean = false
): ParsedArgs {
  const result: ParsedArgs = {
    help: argv.includes('--help') || argv.includes('-h'),
    params: { ...defaults },
    fallbacks: [],
  };

  if (result.help || argv.length < POSITIONAL_ORDER.length) {
    return result;
  }

  POSITIONAL_ORDER.forEach((parameter, index) => {
    const raw = argv[index];
    const value = parseNumber(raw);

    if (value !== null) {
      result.params[parameter] = value;
      return;
    }

    if (strict) {
      throw new ArgumentParseError(index, parameter, raw);
    }

    result.fallbacks.push({ index, parameter, value: raw, substituted: defaults[parameter] });
  });

  return result;
}

export const USAGE = `
Black-Scholes Pricer - European call/put price and delta

Usage: bs-pricer [<S> <K> <r> <sigma> <T>]

Arguments (all five, or none for the defaults):
  S        Spot price of the underlying          (default: 100)
  K        Strike price                          (default: 100)
  r        Risk-free rate, decimal (0.05 = 5%)   (default: 0.05)
  sigma    Annualized volatility, decimal        (default: 0.2)
  T        Time to maturity in years             (default: 1.0)

Options:
  -h, --help   Show this help

Env:
  PRICER_SPOT, PRICER_STRIKE, PRICER_RATE, PRICER_VOL, PRICER_MATURITY  override defaults
  PRICER_STRICT=true   reject malformed arguments and out-of-domain inputs (exit 1)
  LOG_LEVEL, LOG_FORMAT, LOG_MODE                                        logging (stderr)
`;
