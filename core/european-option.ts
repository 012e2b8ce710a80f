/**
 * European Option - immutable value object over the pricing engine.
 *
 * Usage:
 *   const opt = EuropeanOption.call({ spot: 100, strike: 105, rate: 0.05, volatility: 0.2, maturity: 0.5 });
 *   opt.price();
 *   opt.withSpot(110).delta();
 */

import { optionDelta, priceOption } from './black-scholes';
import { OptionParameters, OptionType } from './types';

export class EuropeanOption {
  readonly params: Readonly<OptionParameters>;

  constructor(params: OptionParameters, readonly type: OptionType) {
    this.params = Object.freeze({ ...params });
  }

  static call(params: OptionParameters): EuropeanOption {
    return new EuropeanOption(params, 'call');
  }

  static put(params: OptionParameters): EuropeanOption {
    return new EuropeanOption(params, 'put');
  }

  get isCall(): boolean {
    return this.type === 'call';
  }

  price(): number {
    return priceOption(this.type, this.params);
  }

  delta(): number {
    return optionDelta(this.type, this.params);
  }

  /** Same contract, different underlying price. */
  withSpot(spot: number): EuropeanOption {
    return new EuropeanOption({ ...this.params, spot }, this.type);
  }
}
