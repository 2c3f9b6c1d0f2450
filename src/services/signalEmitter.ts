import { errorMessage } from "../core/errors";
import { logger } from "../core/logger";
import type {
  MatchedScenario,
  RiskProfile,
  ScenarioBias,
  Signal,
  SignalAction
} from "../types/models";
import type { SignalNotifier } from "../adapters/telegramAdapter";
import type { PaperTradeLedger } from "../storage/paperTradeStore";
import { makeId } from "../utils/id";
import { roundToStrike } from "../utils/strikes";
import { nowIso } from "../utils/time";
import type { SignalPolicy } from "./runtimePolicyService";
import type { TradingDay } from "./tradingDay";

export interface AuditSink {
  logEvent(eventType: string, payload: Record<string, unknown>): unknown;
}

interface EmitterPolicySource {
  getPolicy(): SignalPolicy;
}

export interface EmitterSettings {
  instrument: string;
  strikeGap: number;
  lotSize: number;
}

/** Defaults to the rounded spot strike and the current time. */
export interface SignalPlacement {
  strike?: number;
  /** Cycle start; the cooldown is measured against it. */
  at?: string;
}

const log = logger.scope("emitter");

export const actionForBias = (bias: ScenarioBias): SignalAction =>
  bias === "BULLISH" ? "CE_BUY" : "PE_BUY";

export class SignalEmitter {
  constructor(
    private readonly day: TradingDay,
    private readonly ledger: PaperTradeLedger,
    private readonly auditStore: AuditSink,
    private readonly notifier: SignalNotifier,
    private readonly runtimePolicy: EmitterPolicySource,
    private readonly config: EmitterSettings
  ) {}

  /**
   * Records the signal on the trading day, books it in the paper ledger when
   * enabled, audits it and hands it to the notifier. A failed notification
   * is audited and does not undo the signal.
   */
  async emit(
    matched: MatchedScenario,
    risk: RiskProfile,
    placement: SignalPlacement = {}
  ): Promise<Signal> {
    const createdAt = placement.at ?? nowIso();
    const signal: Signal = Object.freeze({
      id: makeId(),
      createdAt,
      instrument: this.config.instrument,
      action: actionForBias(matched.bias),
      strike:
        placement.strike ?? roundToStrike(matched.indicators.underlyingPrice, this.config.strikeGap),
      matched,
      risk
    });

    this.day.recordSignal(matched, createdAt);

    if (this.runtimePolicy.getPolicy().paperTrading) {
      this.ledger.append({
        signalId: signal.id,
        dayKey: this.day.dayKey,
        instrument: signal.instrument,
        action: signal.action,
        strike: signal.strike,
        scenarioId: matched.scenarioId,
        confidence: matched.confidence,
        entryPrice: risk.entryPrice,
        stopLossPrice: risk.stopLossPrice,
        targetPrice: risk.targetPrice,
        quantity: this.config.lotSize,
        openedAt: createdAt
      });
    }

    this.auditStore.logEvent("signal_emitted", { dayKey: this.day.dayKey, signal });
    log.info(`${signal.action} ${signal.strike} via ${matched.scenarioId}`, {
      confidence: matched.confidence,
      entry: risk.entryPrice,
      stop: risk.stopLossPrice,
      target: risk.targetPrice
    });

    try {
      await this.notifier.send(signal);
    } catch (error) {
      log.warn("Signal notification failed", errorMessage(error));
      this.auditStore.logEvent("notification_failed", {
        signalId: signal.id,
        error: errorMessage(error)
      });
    }

    return signal;
  }
}
