import { describe, it, expect } from 'vitest';

import { BUILTIN_DEFAULTS, loadPricerConfig, validatePricerConfig } from '../config';

describe('loadPricerConfig', () => {
  it('uses built-in defaults for an empty environment', () => {
    expect(loadPricerConfig({})).toEqual({
      defaults: { spot: 100, strike: 100, rate: 0.05, volatility: 0.2, maturity: 1 },
      strict: false,
    });
  });

  it('reads overrides and the strict flag', () => {
    const config = loadPricerConfig({
      PRICER_SPOT: '150',
      PRICER_STRIKE: '140',
      PRICER_RATE: '-0.005',
      PRICER_VOL: '0.35',
      PRICER_MATURITY: '0.25',
      PRICER_STRICT: 'true',
    });
    expect(config).toEqual({
      defaults: { spot: 150, strike: 140, rate: -0.005, volatility: 0.35, maturity: 0.25 },
      strict: true,
    });
  });

  it('treats blank values as unset and anything but "true" as lenient', () => {
    const config = loadPricerConfig({ PRICER_SPOT: '  ', PRICER_STRICT: '1' });
    expect(config.defaults.spot).toBe(BUILTIN_DEFAULTS.spot);
    expect(config.strict).toBe(false);
  });
});

describe('validatePricerConfig', () => {
  it('accepts the built-in defaults', () => {
    expect(() => validatePricerConfig(loadPricerConfig({}))).not.toThrow();
  });

  it('rejects a non-numeric default', () => {
    expect(() => validatePricerConfig(loadPricerConfig({ PRICER_STRIKE: 'atm' })))
      .toThrow('Default strike must be a finite number (got NaN); check PRICER_* in .env');
  });
});
