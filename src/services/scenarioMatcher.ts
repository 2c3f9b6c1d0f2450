import { SCENARIO_RULES } from "../constants/scenarios";
import type {
  IndicatorSet,
  MatchedScenario,
  ScenarioId,
  ScenarioRule,
  ScenarioThresholds
} from "../types/models";

interface ThresholdSource {
  getThresholds(): ScenarioThresholds;
}

export interface RuleVerdict {
  scenarioId: ScenarioId;
  label: string;
  priority: number;
  matched: boolean;
}

export class ScenarioMatcher {
  constructor(
    private readonly thresholds: ThresholdSource,
    private readonly rules: readonly ScenarioRule[] = SCENARIO_RULES
  ) {}

  match(indicators: IndicatorSet): MatchedScenario | null {
    const thresholds = this.thresholds.getThresholds();
    const winner = this.rules.find((rule) => rule.predicate(indicators, thresholds));
    if (!winner) return null;

    return Object.freeze({
      scenarioId: winner.id,
      label: winner.label,
      bias: winner.bias,
      confidence: winner.baseConfidence,
      indicators,
      timestamp: indicators.timestamp
    });
  }

  evaluate(indicators: IndicatorSet): RuleVerdict[] {
    const thresholds = this.thresholds.getThresholds();
    return this.rules.map((rule, index) => ({
      scenarioId: rule.id,
      label: rule.label,
      priority: index + 1,
      matched: rule.predicate(indicators, thresholds)
    }));
  }
}
