/**
 * Black-Scholes Pricing Engine - European Calls and Puts
 *
 * Closed-form price and delta:
 *   d₁ = [ln(S/K) + (r + σ²/2)T] / (σ√T)
 *   d₂ = d₁ - σ√T
 *   Call = S·N(d₁) - K·e^(-rT)·N(d₂)
 *   Put  = K·e^(-rT)·N(-d₂) - S·N(-d₁)
 *   Δcall = N(d₁), Δput = N(d₁) - 1
 *
 * Every function is pure and recomputes d₁/d₂ on each call.
 * Out-of-domain inputs (S, K, σ or T ≤ 0) are not rejected here: they surface
 * as NaN or ±Infinity. See core/validation.ts for explicit checks.
 *
 * Usage:
 *   const call = callPrice(100, 100, 0.05, 0.2, 1);  // ≈ 10.4506
 *   const quote = quoteOption({ spot: 100, strike: 100, rate: 0.05, volatility: 0.2, maturity: 1 });
 */

import { erf } from 'mathjs';

import { D1D2, OptionParameters, OptionQuote, OptionType } from './types';

// =============================================================================
// MATH UTILITIES
// =============================================================================

/**
 * Standard normal CDF: N(x) = ½·(1 + erf(x/√2))
 * erf is odd, so N(x) + N(-x) = 1 holds to rounding.
 */
export function normalCDF(x: number): number {
  return 0.5 * (1 + erf(x / Math.SQRT2));
}

export function computeD1D2(
  spot: number,
  strike: number,
  rate: number,
  volatility: number,
  maturity: number
): D1D2 {
  const sigmaT = volatility * Math.sqrt(maturity);
  const d1 = (Math.log(spot / strike) + (rate + 0.5 * volatility * volatility) * maturity) / sigmaT;
  return { d1, d2: d1 - sigmaT };
}

// =============================================================================
// PRICES
// =============================================================================

export function callPrice(
  spot: number,
  strike: number,
  rate: number,
  volatility: number,
  maturity: number
): number {
  const { d1, d2 } = computeD1D2(spot, strike, rate, volatility, maturity);
  return spot * normalCDF(d1) - strike * Math.exp(-rate * maturity) * normalCDF(d2);
}

export function putPrice(
  spot: number,
  strike: number,
  rate: number,
  volatility: number,
  maturity: number
): number {
  const { d1, d2 } = computeD1D2(spot, strike, rate, volatility, maturity);
  return strike * Math.exp(-rate * maturity) * normalCDF(-d2) - spot * normalCDF(-d1);
}

// =============================================================================
// DELTAS
// =============================================================================

export function callDelta(
  spot: number,
  strike: number,
  rate: number,
  volatility: number,
  maturity: number
): number {
  const { d1 } = computeD1D2(spot, strike, rate, volatility, maturity);
  return normalCDF(d1);
}

export function putDelta(
  spot: number,
  strike: number,
  rate: number,
  volatility: number,
  maturity: number
): number {
  const { d1 } = computeD1D2(spot, strike, rate, volatility, maturity);
  return normalCDF(d1) - 1;
}

// =============================================================================
// PARAMETER-OBJECT HELPERS
// =============================================================================

export function priceOption(type: OptionType, params: OptionParameters): number {
  const { spot, strike, rate, volatility, maturity } = params;
  return type === 'call'
    ? callPrice(spot, strike, rate, volatility, maturity)
    : putPrice(spot, strike, rate, volatility, maturity);
}

export function optionDelta(type: OptionType, params: OptionParameters): number {
  const { spot, strike, rate, volatility, maturity } = params;
  return type === 'call'
    ? callDelta(spot, strike, rate, volatility, maturity)
    : putDelta(spot, strike, rate, volatility, maturity);
}

/**
 * Price and delta for both sides of the same contract.
 */
export function quoteOption(params: OptionParameters): OptionQuote {
  return {
    callPrice: priceOption('call', params),
    putPrice: priceOption('put', params),
    callDelta: optionDelta('call', params),
    putDelta: optionDelta('put', params),
  };
}
