export type PriceDirection = "UP" | "DOWN" | "SIDEWAYS";
export type ScenarioBias = "BULLISH" | "BEARISH";
export type SignalAction = "CE_BUY" | "PE_BUY";
export type GovernorState = "OPEN" | "LIMIT_REACHED";
export type PaperTradeOutcome = "TARGET_HIT" | "STOP_HIT" | "CLOSED_AT_DAY_END";

export type ScenarioId =
  | "PUT_UNWINDING_BULLISH"
  | "CALL_UNWINDING_BULLISH"
  | "CALL_UNWINDING_BEARISH"
  | "PUT_UNWINDING_BEARISH"
  | "SUPPORT_ZONE"
  | "RESISTANCE_ZONE"
  | "SUPPORT_BUILDING"
  | "RESISTANCE_BUILDING"
  | "SHORT_BUILDUP";

export interface StrikeQuote {
  strike: number;
  callOi: number;
  putOi: number;
  callVolume: number;
  putVolume: number;
  callLtp: number;
  putLtp: number;
}

export interface OptionChainSnapshot {
  instrument: string;
  timestamp: string;
  expiry: string;
  underlyingPrice: number;
  strikes: readonly StrikeQuote[];
}

export interface VwapSample {
  timestamp: string;
  price: number;
  volume: number;
}

export interface IndicatorSet {
  timestamp: string;
  underlyingPrice: number;
  totalCallOi: number;
  totalPutOi: number;
  callOiDelta: number;
  putOiDelta: number;
  callOiDeltaPct: number;
  putOiDeltaPct: number;
  pcr: number;
  vwap: number;
  vwapSamples: number;
  priceVsVwapPct: number;
  priceDirection: PriceDirection;
}

export interface ScenarioThresholds {
  oiChangeThresholdPct: number;
  pcrSupportZone: number;
  pcrResistanceZone: number;
}

export interface ScenarioRule {
  id: ScenarioId;
  label: string;
  bias: ScenarioBias;
  baseConfidence: number;
  predicate: (indicators: IndicatorSet, thresholds: ScenarioThresholds) => boolean;
}

export interface MatchedScenario {
  scenarioId: ScenarioId;
  label: string;
  bias: ScenarioBias;
  confidence: number;
  indicators: IndicatorSet;
  timestamp: string;
}

export interface RiskProfile {
  entryPrice: number;
  stopLossPrice: number;
  targetPrice: number;
  riskReward: number;
  expiryAdjusted: boolean;
}

export interface TradingDayState {
  dayKey: string;
  isExpiryDay: boolean;
  signalsEmitted: number;
  actedOn: MatchedScenario[];
  lastSignalAt: string | null;
}

export interface Signal {
  id: string;
  createdAt: string;
  instrument: string;
  action: SignalAction;
  strike: number;
  matched: MatchedScenario;
  risk: RiskProfile;
}

export interface PaperTradeEntry {
  signalId: string;
  dayKey: string;
  instrument: string;
  action: SignalAction;
  strike: number;
  scenarioId: ScenarioId;
  confidence: number;
  entryPrice: number;
  stopLossPrice: number;
  targetPrice: number;
  quantity: number;
  openedAt: string;
}

export interface PaperTrade extends PaperTradeEntry {
  id: string;
  outcome: PaperTradeOutcome | null;
  exitPrice: number | null;
  pnl: number | null;
  resolvedAt: string | null;
}

export interface PaperDaySummary {
  dayKey: string;
  signals: number;
  resolved: number;
  open: number;
  wins: number;
  losses: number;
  winRate: number;
  pnl: number;
  bestTrade: number;
  worstTrade: number;
}

export interface AuditRecord {
  id: string;
  timestamp: string;
  eventType: string;
  payload: Record<string, unknown>;
}
