import type { ScenarioRule, ScenarioThresholds } from "../types/models";

export const PCR_SENTINEL_CAP = 10;

const oiFalling = (deltaPct: number, thresholds: ScenarioThresholds): boolean =>
  deltaPct < -thresholds.oiChangeThresholdPct;

const oiRising = (deltaPct: number, thresholds: ScenarioThresholds): boolean =>
  deltaPct > thresholds.oiChangeThresholdPct;

const rule = (definition: ScenarioRule): ScenarioRule => Object.freeze(definition);

/** Evaluated top to bottom; the first rule whose predicate holds wins. */
export const SCENARIO_RULES: readonly ScenarioRule[] = Object.freeze([
  rule({
    id: "PUT_UNWINDING_BULLISH",
    label: "Put unwinding with rising price",
    bias: "BULLISH",
    baseConfidence: 90,
    predicate: (ind, t) => ind.priceDirection === "UP" && oiFalling(ind.putOiDeltaPct, t)
  }),
  rule({
    id: "CALL_UNWINDING_BULLISH",
    label: "Call writers covering into a rally",
    bias: "BULLISH",
    baseConfidence: 90,
    predicate: (ind, t) => ind.priceDirection === "UP" && oiFalling(ind.callOiDeltaPct, t)
  }),
  rule({
    id: "CALL_UNWINDING_BEARISH",
    label: "Call unwinding with falling price",
    bias: "BEARISH",
    baseConfidence: 90,
    predicate: (ind, t) => ind.priceDirection === "DOWN" && oiFalling(ind.callOiDeltaPct, t)
  }),
  rule({
    id: "PUT_UNWINDING_BEARISH",
    label: "Put writers exiting into a decline",
    bias: "BEARISH",
    baseConfidence: 90,
    predicate: (ind, t) => ind.priceDirection === "DOWN" && oiFalling(ind.putOiDeltaPct, t)
  }),
  rule({
    id: "SUPPORT_ZONE",
    label: "Sideways market at heavy put support",
    bias: "BULLISH",
    baseConfidence: 80,
    predicate: (ind, t) => ind.priceDirection === "SIDEWAYS" && ind.pcr > t.pcrSupportZone
  }),
  rule({
    id: "RESISTANCE_ZONE",
    label: "Sideways market under heavy call resistance",
    bias: "BEARISH",
    baseConfidence: 80,
    predicate: (ind, t) => ind.priceDirection === "SIDEWAYS" && ind.pcr < t.pcrResistanceZone
  }),
  rule({
    id: "SUPPORT_BUILDING",
    label: "Put writing on a dip",
    bias: "BULLISH",
    baseConfidence: 75,
    predicate: (ind, t) => ind.priceDirection === "DOWN" && oiRising(ind.putOiDeltaPct, t)
  }),
  rule({
    id: "RESISTANCE_BUILDING",
    label: "Call writing into strength",
    bias: "BEARISH",
    baseConfidence: 75,
    predicate: (ind, t) => ind.priceDirection === "UP" && oiRising(ind.callOiDeltaPct, t)
  }),
  rule({
    id: "SHORT_BUILDUP",
    label: "Short build-up with falling price",
    bias: "BEARISH",
    baseConfidence: 75,
    predicate: (ind, t) => ind.priceDirection === "DOWN" && oiRising(ind.callOiDeltaPct, t)
  })
]);
