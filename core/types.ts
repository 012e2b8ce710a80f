/**
 * Black-Scholes Pricer - Types
 */

export type OptionType = 'call' | 'put';

/**
 * Inputs of one closed-form evaluation.
 * spot, strike, volatility and maturity must be > 0 for the formula to be defined.
 */
export interface OptionParameters {
  spot: number;        // S - underlying price
  strike: number;      // K
  rate: number;        // r - continuously compounded risk-free rate (decimal)
  volatility: number;  // σ - annualized (decimal, e.g., 0.20 for 20%)
  maturity: number;    // T - years to expiry
}

export interface D1D2 {
  d1: number;
  d2: number;
}

export interface OptionQuote {
  callPrice: number;
  putPrice: number;
  callDelta: number;  // in [0, 1]
  putDelta: number;   // in [-1, 0]
}
