import { type AppSettings, settings } from "../core/config";
import { logger } from "../core/logger";
import { type SignalPolicyPatch, signalPolicyFieldsSchema } from "../types/schemas";
import type { ScenarioThresholds } from "../types/models";
import { clamp } from "../utils/statistics";

export interface SignalPolicy {
  directionBandPct: number;
  minVwapSamples: number;
  oiChangeThresholdPct: number;
  pcrSupportZone: number;
  pcrResistanceZone: number;
  stopLossPct: number;
  targetPct: number;
  expiryStopLossPct: number;
  expiryTargetPct: number;
  dailySignalCeiling: number;
  minConfidence: number;
  expiryMinConfidence: number;
  signalCooldownSeconds: number;
  paperTrading: boolean;
}

export interface PolicyGuideline {
  label: string;
  description: string;
  min?: number;
  max?: number;
}

interface PolicyPersistenceStore {
  getAppState(key: string): unknown;
  setAppState(key: string, payload: unknown): void;
}

const log = logger.scope("policy");

export class RuntimePolicyService {
  private static readonly policyStateKey = "signal_policy_v1";
  private readonly defaults: SignalPolicy;
  private readonly rollingWindowSize: number;
  private policy: SignalPolicy;

  constructor(
    private readonly persistence?: PolicyPersistenceStore,
    config: AppSettings = settings
  ) {
    this.rollingWindowSize = config.rollingWindowSize;
    this.defaults = {
      directionBandPct: config.directionBandPct,
      minVwapSamples: config.minVwapSamples,
      oiChangeThresholdPct: config.oiChangeThresholdPct,
      pcrSupportZone: config.pcrSupportZone,
      pcrResistanceZone: config.pcrResistanceZone,
      stopLossPct: config.stopLossPct,
      targetPct: config.targetPct,
      expiryStopLossPct: config.expiryStopLossPct,
      expiryTargetPct: config.expiryTargetPct,
      dailySignalCeiling: config.dailySignalCeiling,
      minConfidence: config.minConfidence,
      expiryMinConfidence: config.expiryMinConfidence,
      signalCooldownSeconds: config.signalCooldownSeconds,
      paperTrading: config.paperTrading
    };
    this.policy = { ...this.defaults };
    this.loadPersistedPolicy();
  }

  private buildPolicy(current: SignalPolicy, patch: SignalPolicyPatch): SignalPolicy {
    const next: SignalPolicy = {
      directionBandPct: clamp(patch.directionBandPct ?? current.directionBandPct, 0, 10),
      minVwapSamples: clamp(
        Math.round(patch.minVwapSamples ?? current.minVwapSamples),
        1,
        this.rollingWindowSize
      ),
      oiChangeThresholdPct: clamp(patch.oiChangeThresholdPct ?? current.oiChangeThresholdPct, 0, 100),
      pcrSupportZone: clamp(patch.pcrSupportZone ?? current.pcrSupportZone, 0.01, 50),
      pcrResistanceZone: clamp(patch.pcrResistanceZone ?? current.pcrResistanceZone, 0.01, 50),
      stopLossPct: clamp(patch.stopLossPct ?? current.stopLossPct, 0.01, 0.95),
      targetPct: clamp(patch.targetPct ?? current.targetPct, 0.01, 10),
      expiryStopLossPct: clamp(patch.expiryStopLossPct ?? current.expiryStopLossPct, 0.01, 0.95),
      expiryTargetPct: clamp(patch.expiryTargetPct ?? current.expiryTargetPct, 0.01, 10),
      dailySignalCeiling: clamp(
        Math.round(patch.dailySignalCeiling ?? current.dailySignalCeiling),
        1,
        100
      ),
      minConfidence: clamp(patch.minConfidence ?? current.minConfidence, 0, 100),
      expiryMinConfidence: clamp(patch.expiryMinConfidence ?? current.expiryMinConfidence, 0, 100),
      signalCooldownSeconds: clamp(
        Math.round(patch.signalCooldownSeconds ?? current.signalCooldownSeconds),
        0,
        86_400
      ),
      paperTrading: patch.paperTrading ?? current.paperTrading
    };

    if (next.pcrResistanceZone >= next.pcrSupportZone) {
      next.pcrResistanceZone = current.pcrResistanceZone;
      next.pcrSupportZone = current.pcrSupportZone;
    }
    if (next.expiryStopLossPct > next.stopLossPct) {
      next.expiryStopLossPct = next.stopLossPct;
    }
    if (next.expiryTargetPct > next.targetPct) {
      next.expiryTargetPct = next.targetPct;
    }
    if (next.expiryMinConfidence < next.minConfidence) {
      next.expiryMinConfidence = next.minConfidence;
    }

    return next;
  }

  private persistPolicy(): void {
    if (!this.persistence) return;
    this.persistence.setAppState(RuntimePolicyService.policyStateKey, this.policy);
  }

  private loadPersistedPolicy(): void {
    if (!this.persistence) return;
    const persisted = this.persistence.getAppState(RuntimePolicyService.policyStateKey);
    if (persisted === null || persisted === undefined) return;
    const parsed = signalPolicyFieldsSchema.safeParse(persisted);
    if (!parsed.success) {
      log.warn("Ignoring persisted signal policy", parsed.error.issues);
      return;
    }
    this.policy = this.buildPolicy(this.defaults, parsed.data);
  }

  getPolicy(): SignalPolicy {
    return { ...this.policy };
  }

  getThresholds(): ScenarioThresholds {
    return {
      oiChangeThresholdPct: this.policy.oiChangeThresholdPct,
      pcrSupportZone: this.policy.pcrSupportZone,
      pcrResistanceZone: this.policy.pcrResistanceZone
    };
  }

  getGuidelines(): Record<keyof SignalPolicy, PolicyGuideline> {
    return {
      directionBandPct: {
        label: "Direction Band %",
        description: "Distance from VWAP, in percent, inside which price is treated as sideways.",
        min: 0,
        max: 10
      },
      minVwapSamples: {
        label: "Min VWAP Samples",
        description: "Samples required before VWAP departs from the current price.",
        min: 1,
        max: this.rollingWindowSize
      },
      oiChangeThresholdPct: {
        label: "OI Change Threshold %",
        description: "Open-interest change needed before a side counts as rising or falling.",
        min: 0,
        max: 100
      },
      pcrSupportZone: {
        label: "PCR Support Zone",
        description: "Sideways market with PCR above this reads as a support zone.",
        min: 0.01,
        max: 50
      },
      pcrResistanceZone: {
        label: "PCR Resistance Zone",
        description: "Sideways market with PCR below this reads as a resistance zone.",
        min: 0.01,
        max: 50
      },
      stopLossPct: {
        label: "Stop Loss %",
        description: "Fraction of the entry premium given up before the stop triggers.",
        min: 0.01,
        max: 0.95
      },
      targetPct: {
        label: "Target %",
        description: "Fraction of the entry premium added for the target.",
        min: 0.01,
        max: 10
      },
      expiryStopLossPct: {
        label: "Expiry Stop Loss %",
        description: "Stop loss fraction used on expiry day. Never wider than the regular stop.",
        min: 0.01,
        max: 0.95
      },
      expiryTargetPct: {
        label: "Expiry Target %",
        description: "Target fraction used on expiry day. Never above the regular target.",
        min: 0.01,
        max: 10
      },
      dailySignalCeiling: {
        label: "Daily Signal Ceiling",
        description: "Signals allowed per trading day.",
        min: 1,
        max: 100
      },
      minConfidence: {
        label: "Min Confidence",
        description: "Scenarios below this confidence are suppressed.",
        min: 0,
        max: 100
      },
      expiryMinConfidence: {
        label: "Expiry Min Confidence",
        description: "Confidence floor on expiry day. Never below the regular floor.",
        min: 0,
        max: 100
      },
      signalCooldownSeconds: {
        label: "Signal Cooldown (seconds)",
        description: "Minimum gap between two emitted signals.",
        min: 0,
        max: 86_400
      },
      paperTrading: {
        label: "Paper Trading",
        description: "Book every emitted signal in the paper-trade ledger."
      }
    };
  }

  updatePolicy(patch: SignalPolicyPatch): SignalPolicy {
    this.policy = this.buildPolicy(this.getPolicy(), patch);
    this.persistPolicy();
    return this.getPolicy();
  }

  resetPolicy(): SignalPolicy {
    this.policy = { ...this.defaults };
    this.persistPolicy();
    return this.getPolicy();
  }
}
