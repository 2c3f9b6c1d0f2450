import { afterEach, describe, expect, test } from "vitest";

import { DataFetchError, NotificationDeliveryError } from "../core/errors";
import { type ServiceContainer, buildContainer } from "../services/container";
import type { CycleOutcome } from "../services/signalPipeline";
import { FakeChainSource, FakeNotifier, TEST_DAY, chain, testSettings } from "./fixtures";

let container: ServiceContainer | null = null;

afterEach(() => {
  container?.close();
  container = null;
});

const setup = (isExpiryDay = false) => {
  const source = new FakeChainSource();
  const notifier = new FakeNotifier();
  container = buildContainer({
    settings: testSettings(),
    source,
    notifier,
    dayKey: TEST_DAY,
    isExpiryDay
  });
  return { source, notifier, services: container };
};

const flat = () => chain({ price: 20_000, callOi: 80_000, putOi: 100_000, volume: 1_000 });
const breakout = () =>
  chain({ price: 20_100, callOi: 80_000, putOi: 95_000, volume: 1_000, callLtp: 120 });

const runAll = async (services: ServiceContainer, count: number): Promise<CycleOutcome[]> => {
  const outcomes: CycleOutcome[] = [];
  for (let index = 0; index < count; index += 1) {
    outcomes.push(await services.pipeline.runCycle());
  }
  return outcomes;
};

describe("SignalPipeline.runCycle", () => {
  test("emits CE_BUY on put unwinding above VWAP", async () => {
    const { source, notifier, services } = setup();
    source.enqueue(flat(), flat(), flat(), breakout());

    const outcomes = await runAll(services, 4);

    expect(outcomes.slice(0, 3).map((outcome) => outcome.status)).toEqual([
      "no_match",
      "no_match",
      "no_match"
    ]);
    const last = outcomes[3];
    if (last?.status !== "emitted") throw new Error(`expected emitted, got ${last?.status}`);

    expect(last.indicators.vwap).toBe(20_025);
    expect(last.indicators.priceDirection).toBe("UP");
    expect(last.indicators.putOiDeltaPct).toBeCloseTo(-5, 10);
    expect(last.signal.action).toBe("CE_BUY");
    expect(last.signal.strike).toBe(20_100);
    expect(last.matched.scenarioId).toBe("PUT_UNWINDING_BULLISH");
    expect(last.matched.confidence).toBe(90);
    expect(last.signal.risk).toEqual({
      entryPrice: 120,
      stopLossPrice: 84,
      targetPrice: 192,
      riskReward: 2,
      expiryAdjusted: false
    });

    expect(services.tradingDay.state().signalsEmitted).toBe(1);
    expect(notifier.signals).toHaveLength(1);
    expect(services.paperTradeStore.listOpen(TEST_DAY)).toHaveLength(1);
  });

  test("emits CE_BUY on a sideways market at heavy put support", async () => {
    const { source, services } = setup();
    source.enqueue(chain({ price: 20_000, callOi: 10_000, putOi: 30_000 }));

    const [outcome] = await runAll(services, 1);
    if (outcome?.status !== "emitted") throw new Error(`expected emitted, got ${outcome?.status}`);

    expect(outcome.indicators.pcr).toBe(3);
    expect(outcome.indicators.priceDirection).toBe("SIDEWAYS");
    expect(outcome.matched.scenarioId).toBe("SUPPORT_ZONE");
    expect(outcome.matched.confidence).toBe(80);
    expect(outcome.signal.action).toBe("CE_BUY");
  });

  test("stamps the signal with the cycle start so the cooldown reads one clock", async () => {
    const { source, services } = setup();
    source.enqueue(chain({ price: 20_000, callOi: 10_000, putOi: 30_000 }));

    const [outcome] = await runAll(services, 1);
    if (outcome?.status !== "emitted") throw new Error(`expected emitted, got ${outcome?.status}`);

    expect(outcome.signal.createdAt).toBe(outcome.at);
    expect(services.tradingDay.state().lastSignalAt).toBe(outcome.at);
    expect(services.paperTradeStore.listOpen(TEST_DAY)[0]?.openedAt).toBe(outcome.at);
  });

  test("books the strike whose quote priced the signal when ATM is missing", async () => {
    const { source, services } = setup();
    const offAtm = (callLtp: number) => {
      const base = chain({ price: 20_000, callOi: 10_000, putOi: 30_000, callLtp });
      return { ...base, strikes: base.strikes.map((quote) => ({ ...quote, strike: 20_050 })) };
    };
    source.enqueue(offAtm(120), offAtm(200));

    const [first, second] = await runAll(services, 2);
    if (first?.status !== "emitted") throw new Error(`expected emitted, got ${first?.status}`);

    expect(first.signal.strike).toBe(20_050);
    expect(first.signal.risk.entryPrice).toBe(120);
    expect(second?.resolvedTrades).toHaveLength(1);
    expect(second?.resolvedTrades[0]).toMatchObject({
      strike: 20_050,
      outcome: "TARGET_HIT",
      exitPrice: 200
    });
  });

  test("suppresses once the daily ceiling is reached", async () => {
    const { source, services } = setup();
    services.runtimePolicy.updatePolicy({ signalCooldownSeconds: 0 });
    source.enqueue(flat(), flat(), flat());
    for (let index = 0; index < 4; index += 1) {
      source.enqueue(
        chain({ price: 20_000, callOi: 80_000, putOi: 100_000 }),
        chain({ price: 20_100, callOi: 80_000, putOi: 95_000 })
      );
    }

    const outcomes = await runAll(services, 11);
    const emitted = outcomes.filter((outcome) => outcome.status === "emitted");
    const suppressed = outcomes.filter((outcome) => outcome.status === "suppressed");

    expect(emitted).toHaveLength(3);
    expect(services.tradingDay.state().signalsEmitted).toBe(3);
    expect(services.governor.state()).toBe("LIMIT_REACHED");
    const lastSuppressed = suppressed[suppressed.length - 1];
    expect(lastSuppressed?.status === "suppressed" && lastSuppressed.reason).toBe(
      "daily_limit_reached"
    );
  });

  test("a failed notification still records the signal", async () => {
    const { source, notifier, services } = setup();
    notifier.failWith = new NotificationDeliveryError("Telegram request failed: offline");
    source.enqueue(flat(), flat(), flat(), breakout());

    const outcomes = await runAll(services, 4);

    expect(outcomes[3]?.status).toBe("emitted");
    expect(services.tradingDay.state().signalsEmitted).toBe(1);
    const events = services.auditStore.listAuditRecords().map((record) => record.eventType);
    expect(events).toEqual(["signal_emitted", "notification_failed"]);
  });

  test("a fetch failure skips the cycle without touching day state or history", async () => {
    const { source, services } = setup();
    source.enqueue(flat(), new DataFetchError("Option chain request timed out after 10000ms", "timeout"));

    await services.pipeline.runCycle();
    const outcome = await services.pipeline.runCycle();

    expect(outcome).toMatchObject({
      status: "skipped",
      reason: "fetch_failed",
      error: "Option chain request timed out after 10000ms"
    });
    expect(services.pipeline.getHistory()).toHaveLength(1);
    expect(services.tradingDay.state().signalsEmitted).toBe(0);
    expect(services.pipeline.getLastOutcome()).toBe(outcome);
    const skipped = services.auditStore.listAuditRecords({ eventTypes: ["cycle_skipped"] });
    expect(skipped[0]?.payload).toMatchObject({ reason: "fetch_failed", failure: "timeout" });
  });

  test("expiry day suppresses 80-confidence zone scenarios", async () => {
    const { source, services } = setup(true);
    source.enqueue(
      chain({ price: 20_000, callOi: 10_000, putOi: 30_000 }),
      chain({ price: 20_000, callOi: 10_000, putOi: 30_000 })
    );

    const outcomes = await runAll(services, 2);
    const second = outcomes[1];

    expect(second?.status).toBe("suppressed");
    if (second?.status !== "suppressed") return;
    expect(second.matched.scenarioId).toBe("SUPPORT_ZONE");
    expect(second.reason).toBe("expiry_day_low_confidence");
  });

  test("a matched scenario without a premium is suppressed as no_premium", async () => {
    const { source, services } = setup();
    source.enqueue(
      flat(),
      flat(),
      flat(),
      chain({ price: 20_100, callOi: 80_000, putOi: 95_000, callLtp: 0 })
    );

    const outcomes = await runAll(services, 4);

    expect(outcomes[3]).toMatchObject({ status: "suppressed", reason: "no_premium" });
    expect(services.tradingDay.state().signalsEmitted).toBe(0);
  });
});

describe("SignalPipeline.rolloverDay", () => {
  test("closes paper trades, summarizes, notifies and resets state", async () => {
    const { source, notifier, services } = setup();
    source.enqueue(flat(), flat(), flat(), breakout());
    await runAll(services, 4);

    const result = await services.pipeline.rolloverDay("2026-10-20", true);

    expect(result.closed.dayKey).toBe(TEST_DAY);
    expect(result.closed.signalsEmitted).toBe(1);
    expect(result.closedTrades).toHaveLength(1);
    expect(result.closedTrades[0]?.outcome).toBe("CLOSED_AT_DAY_END");
    expect(result.summary).toMatchObject({ dayKey: TEST_DAY, signals: 1, resolved: 1, open: 0, pnl: 0 });
    expect(result.current).toEqual({
      dayKey: "2026-10-20",
      isExpiryDay: true,
      signalsEmitted: 0,
      actedOn: [],
      lastSignalAt: null
    });
    expect(services.pipeline.getHistory()).toEqual([]);
    expect(notifier.texts).toHaveLength(1);
    expect(notifier.texts[0]).toContain("Daily summary 2026-10-19");
  });
});
