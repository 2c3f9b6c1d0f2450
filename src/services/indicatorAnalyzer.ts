import { PCR_SENTINEL_CAP } from "../constants/scenarios";
import type {
  IndicatorSet,
  OptionChainSnapshot,
  PriceDirection,
  VwapSample
} from "../types/models";
import { clamp, nonNegative, percentChange, sum } from "../utils/statistics";
import type { RollingWindow } from "../utils/rollingWindow";
import type { SignalPolicy } from "./runtimePolicyService";

interface IndicatorPolicySource {
  getPolicy(): SignalPolicy;
}

interface OiTotals {
  call: number;
  put: number;
}

const oiTotals = (snapshot: OptionChainSnapshot): OiTotals => ({
  call: sum(snapshot.strikes.map((quote) => nonNegative(quote.callOi))),
  put: sum(snapshot.strikes.map((quote) => nonNegative(quote.putOi)))
});

const totalVolume = (snapshot: OptionChainSnapshot): number =>
  sum(
    snapshot.strikes.map((quote) => nonNegative(quote.callVolume) + nonNegative(quote.putVolume))
  );

export const putCallRatio = (totalPutOi: number, totalCallOi: number): number => {
  if (totalCallOi <= 0) return PCR_SENTINEL_CAP;
  return clamp(totalPutOi / totalCallOi, 0, PCR_SENTINEL_CAP);
};

/** Falls back to `currentPrice` until the window is warm or while it carries no volume. */
export const volumeWeightedPrice = (
  samples: readonly VwapSample[],
  currentPrice: number,
  minSamples: number
): number => {
  if (samples.length < minSamples) return currentPrice;
  const volume = sum(samples.map((sample) => sample.volume));
  if (volume <= 0) return currentPrice;
  return sum(samples.map((sample) => sample.price * sample.volume)) / volume;
};

export const classifyDirection = (priceVsVwapPct: number, bandPct: number): PriceDirection => {
  if (priceVsVwapPct > bandPct) return "UP";
  if (priceVsVwapPct < -bandPct) return "DOWN";
  return "SIDEWAYS";
};

export class IndicatorAnalyzer {
  constructor(private readonly runtimePolicy: IndicatorPolicySource) {}

  /**
   * Pushes the current sample into `history` before computing VWAP.
   * Degenerate inputs (non-finite, negative) count as zero; this never throws.
   */
  derive(
    previous: OptionChainSnapshot | null,
    current: OptionChainSnapshot,
    history: RollingWindow<VwapSample>
  ): IndicatorSet {
    const policy = this.runtimePolicy.getPolicy();
    const price = nonNegative(current.underlyingPrice);
    const totals = oiTotals(current);
    const prior = previous ? oiTotals(previous) : null;

    history.push({ timestamp: current.timestamp, price, volume: totalVolume(current) });

    const vwap = volumeWeightedPrice(history.toArray(), price, policy.minVwapSamples);
    const priceVsVwapPct = vwap > 0 ? ((price - vwap) / vwap) * 100 : 0;

    return {
      timestamp: current.timestamp,
      underlyingPrice: price,
      totalCallOi: totals.call,
      totalPutOi: totals.put,
      callOiDelta: prior ? totals.call - prior.call : 0,
      putOiDelta: prior ? totals.put - prior.put : 0,
      callOiDeltaPct: prior ? percentChange(prior.call, totals.call) : 0,
      putOiDeltaPct: prior ? percentChange(prior.put, totals.put) : 0,
      pcr: putCallRatio(totals.put, totals.call),
      vwap,
      vwapSamples: history.size,
      priceVsVwapPct,
      priceDirection: prior ? classifyDirection(priceVsVwapPct, policy.directionBandPct) : "SIDEWAYS"
    };
  }
}
