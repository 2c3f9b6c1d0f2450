import type { GovernorState, MatchedScenario } from "../types/models";
import { nowIso, secondsBetween } from "../utils/time";
import type { SignalPolicy } from "./runtimePolicyService";
import type { TradingDay } from "./tradingDay";

export type SuppressionReason =
  | "daily_limit_reached"
  | "expiry_day_low_confidence"
  | "below_min_confidence"
  | "cooldown_active";

export type GovernorDecision =
  | { admitted: true; reason: null }
  | { admitted: false; reason: SuppressionReason };

interface GovernorPolicySource {
  getPolicy(): SignalPolicy;
}

export class TradeGovernor {
  constructor(
    private readonly day: TradingDay,
    private readonly runtimePolicy: GovernorPolicySource
  ) {}

  state(): GovernorState {
    const { signalsEmitted } = this.day.state();
    return signalsEmitted >= this.runtimePolicy.getPolicy().dailySignalCeiling
      ? "LIMIT_REACHED"
      : "OPEN";
  }

  evaluate(candidate: MatchedScenario, now: string = nowIso()): GovernorDecision {
    const policy = this.runtimePolicy.getPolicy();
    const day = this.day.state();

    if (day.signalsEmitted >= policy.dailySignalCeiling) {
      return { admitted: false, reason: "daily_limit_reached" };
    }
    if (day.isExpiryDay && candidate.confidence < policy.expiryMinConfidence) {
      return { admitted: false, reason: "expiry_day_low_confidence" };
    }
    if (candidate.confidence < policy.minConfidence) {
      return { admitted: false, reason: "below_min_confidence" };
    }
    if (
      day.lastSignalAt !== null &&
      secondsBetween(day.lastSignalAt, now) < policy.signalCooldownSeconds
    ) {
      return { admitted: false, reason: "cooldown_active" };
    }
    return { admitted: true, reason: null };
  }

  admit(candidate: MatchedScenario, now?: string): boolean {
    return this.evaluate(candidate, now).admitted;
  }
}
