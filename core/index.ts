/**
 * Pricing Core - Exports
 */

export {
  normalCDF,
  computeD1D2,
  callPrice,
  putPrice,
  callDelta,
  putDelta,
  priceOption,
  optionDelta,
  quoteOption,
} from './black-scholes';
export { EuropeanOption } from './european-option';
export {
  checkParameters,
  assertValidParameters,
  InvalidParameterError,
} from './validation';
export type { ParameterCheck, ParameterName } from './validation';
export type { OptionType, OptionParameters, D1D2, OptionQuote } from './types';
