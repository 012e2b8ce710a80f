/**
 * Console output for a quote: one labeled line per figure, 4 decimals.
 */

import { OptionQuote } from '../core/types';

const DECIMALS = 4;

export function formatQuote(quote: OptionQuote): string[] {
  return [
    `Call Price: ${quote.callPrice.toFixed(DECIMALS)}`,
    `Put Price: ${quote.putPrice.toFixed(DECIMALS)}`,
    `Call Delta: ${quote.callDelta.toFixed(DECIMALS)}`,
    `Put Delta: ${quote.putDelta.toFixed(DECIMALS)}`,
  ];
}
