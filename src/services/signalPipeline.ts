import type { OptionChainSource } from "../adapters/upstoxAdapter";
import type { SignalNotifier } from "../adapters/telegramAdapter";
import { DataFetchError, RiskAnnotationError, errorMessage } from "../core/errors";
import { logger } from "../core/logger";
import type {
  IndicatorSet,
  MatchedScenario,
  OptionChainSnapshot,
  PaperDaySummary,
  PaperTrade,
  RiskProfile,
  ScenarioBias,
  Signal,
  TradingDayState,
  VwapSample
} from "../types/models";
import type { PaperTradeLedger } from "../storage/paperTradeStore";
import { RollingWindow } from "../utils/rollingWindow";
import { atmQuote, roundToStrike } from "../utils/strikes";
import { nowIso } from "../utils/time";
import type { IndicatorAnalyzer } from "./indicatorAnalyzer";
import type { PaperTradeTracker } from "./paperTradeTracker";
import type { RiskAnnotator } from "./riskAnnotator";
import type { ScenarioMatcher } from "./scenarioMatcher";
import type { AuditSink, SignalEmitter } from "./signalEmitter";
import type { SignalFormatter } from "./signalFormatter";
import type { SuppressionReason, TradeGovernor } from "./tradeGovernor";
import type { TradingDay } from "./tradingDay";

interface CycleBase {
  at: string;
  dayKey: string;
  resolvedTrades: PaperTrade[];
}

export type CycleOutcome =
  | (CycleBase & { status: "skipped"; reason: "fetch_failed" | "cycle_error"; error: string })
  | (CycleBase & { status: "no_match"; indicators: IndicatorSet })
  | (CycleBase & {
      status: "suppressed";
      reason: SuppressionReason | "no_premium";
      indicators: IndicatorSet;
      matched: MatchedScenario;
    })
  | (CycleBase & {
      status: "emitted";
      indicators: IndicatorSet;
      matched: MatchedScenario;
      signal: Signal;
    });

export interface DayRolloverResult {
  closed: TradingDayState;
  summary: PaperDaySummary;
  closedTrades: PaperTrade[];
  current: TradingDayState;
}

export interface PipelineDependencies {
  source: OptionChainSource;
  analyzer: IndicatorAnalyzer;
  matcher: ScenarioMatcher;
  annotator: RiskAnnotator;
  governor: TradeGovernor;
  emitter: SignalEmitter;
  day: TradingDay;
  ledger: PaperTradeLedger;
  tracker: PaperTradeTracker;
  auditStore: AuditSink;
  notifier: SignalNotifier;
  formatter: SignalFormatter;
}

export interface PipelineSettings {
  instrument: string;
  strikeGap: number;
  rollingWindowSize: number;
}

const log = logger.scope("pipeline");

/** The strike is the one whose quote supplied the premium, not the rounded spot. */
export const premiumFor = (
  snapshot: OptionChainSnapshot,
  bias: ScenarioBias,
  strikeGap: number
): { strike: number; premium: number } => {
  const quote = atmQuote(snapshot, strikeGap);
  if (!quote) return { strike: roundToStrike(snapshot.underlyingPrice, strikeGap), premium: 0 };
  return { strike: quote.strike, premium: bias === "BULLISH" ? quote.callLtp : quote.putLtp };
};

/** One fetch -> analyze -> match -> annotate -> govern -> emit pass per call. */
export class SignalPipeline {
  private readonly history: RollingWindow<VwapSample>;
  private previous: OptionChainSnapshot | null = null;
  private lastOutcome: CycleOutcome | null = null;

  constructor(
    private readonly deps: PipelineDependencies,
    private readonly config: PipelineSettings
  ) {
    this.history = new RollingWindow<VwapSample>(config.rollingWindowSize);
  }

  get dayKey(): string {
    return this.deps.day.dayKey;
  }

  getLastOutcome(): CycleOutcome | null {
    return this.lastOutcome;
  }

  getHistory(): VwapSample[] {
    return this.history.toArray();
  }

  /** Never rejects; every failure is folded into the returned outcome. */
  async runCycle(): Promise<CycleOutcome> {
    const outcome = await this.runCycleInternal();
    this.lastOutcome = outcome;
    if (outcome.status === "skipped") {
      log.warn(`Cycle skipped: ${outcome.reason}`, outcome.error);
    } else if (outcome.status === "suppressed") {
      log.info(`Cycle suppressed ${outcome.matched.scenarioId}: ${outcome.reason}`);
    } else if (outcome.status === "no_match") {
      log.debug("Cycle finished without a matching scenario", {
        pcr: outcome.indicators.pcr,
        direction: outcome.indicators.priceDirection
      });
    }
    return outcome;
  }

  private async runCycleInternal(): Promise<CycleOutcome> {
    const at = nowIso();
    const dayKey = this.deps.day.dayKey;

    let snapshot: OptionChainSnapshot;
    try {
      snapshot = await this.deps.source.fetchOptionChain(this.config.instrument);
    } catch (error) {
      this.deps.auditStore.logEvent("cycle_skipped", {
        reason: "fetch_failed",
        failure: error instanceof DataFetchError ? error.failure : "unknown",
        error: errorMessage(error)
      });
      return {
        status: "skipped",
        reason: "fetch_failed",
        error: errorMessage(error),
        at,
        dayKey,
        resolvedTrades: []
      };
    }

    try {
      const resolvedTrades = this.deps.tracker.resolveOpen(dayKey, snapshot);
      const indicators = this.deps.analyzer.derive(this.previous, snapshot, this.history);
      this.previous = snapshot;
      const base: CycleBase = { at, dayKey, resolvedTrades };

      const matched = this.deps.matcher.match(indicators);
      if (!matched) return { ...base, status: "no_match", indicators };

      const { strike, premium } = premiumFor(snapshot, matched.bias, this.config.strikeGap);
      let risk: RiskProfile;
      try {
        risk = this.deps.annotator.annotate(matched, premium, this.deps.day.isExpiryDay);
      } catch (error) {
        if (!(error instanceof RiskAnnotationError)) throw error;
        this.deps.auditStore.logEvent("signal_suppressed", {
          scenarioId: matched.scenarioId,
          reason: "no_premium",
          error: error.message
        });
        return { ...base, status: "suppressed", reason: "no_premium", indicators, matched };
      }

      const decision = this.deps.governor.evaluate(matched, at);
      if (!decision.admitted) {
        this.deps.auditStore.logEvent("signal_suppressed", {
          scenarioId: matched.scenarioId,
          confidence: matched.confidence,
          reason: decision.reason
        });
        return { ...base, status: "suppressed", reason: decision.reason, indicators, matched };
      }

      const signal = await this.deps.emitter.emit(matched, risk, { strike, at });
      return { ...base, status: "emitted", indicators, matched, signal };
    } catch (error) {
      log.error("Cycle failed", error);
      this.deps.auditStore.logEvent("cycle_failed", { error: errorMessage(error) });
      return {
        status: "skipped",
        reason: "cycle_error",
        error: errorMessage(error),
        at,
        dayKey,
        resolvedTrades: []
      };
    }
  }

  /**
   * Closes the current day (paper trades, summary, notification) and opens
   * `dayKey`. Indicator history does not carry across days.
   */
  async rolloverDay(dayKey: string, isExpiryDay: boolean): Promise<DayRolloverResult> {
    const closingDay = this.deps.day.dayKey;
    const closedTrades = this.deps.tracker.closeDay(closingDay);
    const summary = this.deps.ledger.summarize(closingDay);
    const closed = this.deps.day.rollover(dayKey, isExpiryDay);
    this.history.clear();
    this.previous = null;

    this.deps.auditStore.logEvent("day_rollover", {
      closedDayKey: closed.dayKey,
      signalsEmitted: closed.signalsEmitted,
      dayKey,
      isExpiryDay,
      summary
    });
    log.info(`Rolled over ${closed.dayKey} -> ${dayKey}`, summary);

    try {
      await this.deps.notifier.sendText(this.deps.formatter.formatDailySummary(summary));
    } catch (error) {
      log.warn("Daily summary notification failed", errorMessage(error));
      this.deps.auditStore.logEvent("notification_failed", {
        kind: "daily_summary",
        dayKey: closed.dayKey,
        error: errorMessage(error)
      });
    }

    return { closed, summary, closedTrades, current: this.deps.day.state() };
  }
}
