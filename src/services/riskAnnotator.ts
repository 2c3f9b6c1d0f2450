import { RiskAnnotationError } from "../core/errors";
import type { MatchedScenario, RiskProfile } from "../types/models";
import { round } from "../utils/statistics";
import type { SignalPolicy } from "./runtimePolicyService";

interface RiskPolicySource {
  getPolicy(): SignalPolicy;
}

export class RiskAnnotator {
  constructor(private readonly runtimePolicy: RiskPolicySource) {}

  /** Expiry day swaps in the tighter stop and target fractions. */
  annotate(matched: MatchedScenario, currentPremium: number, isExpiryDay: boolean): RiskProfile {
    if (!Number.isFinite(currentPremium) || currentPremium <= 0) {
      throw new RiskAnnotationError(
        `No usable premium for ${matched.scenarioId} (got ${currentPremium})`
      );
    }

    const policy = this.runtimePolicy.getPolicy();
    const stopPct = isExpiryDay ? policy.expiryStopLossPct : policy.stopLossPct;
    const targetPct = isExpiryDay ? policy.expiryTargetPct : policy.targetPct;

    const entryPrice = currentPremium;
    const stopLossPrice = round(entryPrice * (1 - stopPct));
    const targetPrice = round(entryPrice * (1 + targetPct));
    const risk = entryPrice - stopLossPrice;

    return Object.freeze({
      entryPrice,
      stopLossPrice,
      targetPrice,
      riskReward: risk > 0 ? round((targetPrice - entryPrice) / risk) : 0,
      expiryAdjusted: isExpiryDay
    });
  }
}
