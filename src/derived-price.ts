// Index → TAIEX futures estimate, via a fixed linear coefficient.

export const FUTURES_COEFFICIENT = 12.28065515714918;
export const FUTURES_BASELINE = 27556;

export interface DerivedPrices {
  readonly derivedPrice: number;
  readonly derivedOffset: number;
}

export function derivePrices(price: number): DerivedPrices {
  const derivedPrice = Math.round(price * FUTURES_COEFFICIENT);
  return {
    derivedPrice,
    derivedOffset: Math.round(derivedPrice - FUTURES_BASELINE),
  };
}
