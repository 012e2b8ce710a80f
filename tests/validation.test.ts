import { describe, it, expect } from 'vitest';

import { checkParameters, assertValidParameters, InvalidParameterError } from '../core/validation';
import { OptionParameters } from '../core/types';

const VALID: OptionParameters = { spot: 100, strike: 100, rate: 0.05, volatility: 0.2, maturity: 1 };

describe('checkParameters', () => {
  it('passes valid inputs, including a negative rate', () => {
    expect(checkParameters(VALID)).toEqual({ passed: true });
    expect(checkParameters({ ...VALID, rate: -0.01 })).toEqual({ passed: true });
  });

  it.each([
    ['spot', 0],
    ['strike', -5],
    ['volatility', 0],
    ['maturity', -1],
  ] as const)('rejects non-positive %s', (name, value) => {
    expect(checkParameters({ ...VALID, [name]: value })).toEqual({
      passed: false,
      name,
      value,
      reason: 'must be strictly positive',
    });
  });

  it('rejects non-finite values, rate included', () => {
    const check = checkParameters({ ...VALID, rate: Infinity });
    expect(check).toEqual({ passed: false, name: 'rate', value: Infinity, reason: 'must be a finite number' });
  });

  it('reports the first failing field in parameter order', () => {
    const check = checkParameters({ ...VALID, maturity: 0, strike: -1 });
    expect(check.passed).toBe(false);
    if (!check.passed) {
      expect(check.name).toBe('strike');
    }
  });
});

describe('assertValidParameters', () => {
  it('does nothing for valid inputs', () => {
    expect(() => assertValidParameters(VALID)).not.toThrow();
  });

  it('throws InvalidParameterError naming the field, value and reason', () => {
    let caught: unknown;
    try {
      assertValidParameters({ ...VALID, maturity: -1 });
    } catch (e) {
      caught = e;
    }

    expect(caught).toBeInstanceOf(InvalidParameterError);
    if (caught instanceof InvalidParameterError) {
      expect(caught.parameter).toBe('maturity');
      expect(caught.value).toBe(-1);
      expect(caught.reason).toBe('must be strictly positive');
      expect(caught.message).toBe('Invalid maturity (-1): must be strictly positive');
    }
  });
});
