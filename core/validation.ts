/**
 * Parameter Validation
 *
 * The pricing engine lets out-of-domain inputs flow through as NaN/Infinity.
 * Callers that prefer to fail fast check here first. Fields are checked in
 * order; the first failure short-circuits and names the offending field.
 *
 * Rules:
 *   1. Every field must be finite
 *   2. spot, strike, volatility, maturity must be > 0 (rate may be any real)
 */

import { OptionParameters } from './types';

export type ParameterName = keyof OptionParameters;

export type ParameterCheck =
  | { readonly passed: true }
  | {
      readonly passed: false;
      readonly name: ParameterName;
      readonly value: number;
      readonly reason: string;
    };

const CHECK_ORDER: readonly ParameterName[] = ['spot', 'strike', 'rate', 'volatility', 'maturity'];

const POSITIVE_FIELDS: ReadonlySet<ParameterName> = new Set<ParameterName>([
  'spot',
  'strike',
  'volatility',
  'maturity',
]);

export class InvalidParameterError extends Error {
  constructor(
    readonly parameter: ParameterName,
    readonly value: number,
    readonly reason: string
  ) {
    super(`Invalid ${parameter} (${value}): ${reason}`);
    this.name = 'InvalidParameterError';
  }
}

export function checkParameters(params: OptionParameters): ParameterCheck {
  for (const name of CHECK_ORDER) {
    const value = params[name];

    if (!Number.isFinite(value)) {
      return { passed: false, name, value, reason: 'must be a finite number' };
    }

    if (POSITIVE_FIELDS.has(name) && value <= 0) {
      return { passed: false, name, value, reason: 'must be strictly positive' };
    }
  }

  return { passed: true };
}

/**
 * Throw InvalidParameterError on the first field outside the model's domain.
 */
export function assertValidParameters(params: OptionParameters): void {
  const check = checkParameters(params);
  if (!check.passed) {
    throw new InvalidParameterError(check.name, check.value, check.reason);
  }
}
