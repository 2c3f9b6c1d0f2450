import type { OptionChainSnapshot, StrikeQuote } from "../types/models";

export const roundToStrike = (price: number, strikeGap: number): number =>
  Math.round(price / strikeGap) * strikeGap;

/**
 * Quote at the rounded ATM strike, or the nearest listed strike when the
 * chain does not carry it.
 */
export const atmQuote = (snapshot: OptionChainSnapshot, strikeGap: number): StrikeQuote | null => {
  const atm = roundToStrike(snapshot.underlyingPrice, strikeGap);
  let best: StrikeQuote | null = null;
  for (const quote of snapshot.strikes) {
    if (best === null || Math.abs(quote.strike - atm) < Math.abs(best.strike - atm)) {
      best = quote;
    }
  }
  return best;
};
