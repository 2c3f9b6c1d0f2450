import { afterEach, describe, expect, test } from "vitest";

import { buildApp } from "../server";
import { FakeChainSource, FakeNotifier, chain, testSettings } from "./fixtures";

let app: Awaited<ReturnType<typeof buildApp>> | null = null;

afterEach(async () => {
  if (app) {
    await app.close();
    app = null;
  }
});

const start = async (source = new FakeChainSource()) => {
  app = await buildApp({
    settings: testSettings(),
    source,
    notifier: new FakeNotifier(),
    isExpiryDay: false
  });
  return app;
};

// The day key follows the wall clock so manual cycles never trigger a rollover.

const flat = () => chain({ price: 20_000, callOi: 80_000, putOi: 100_000 });

describe("API routes", () => {
  test("health endpoint responds ok", async () => {
    const server = await start();
    const response = await server.inject({ method: "GET", url: "/health" });

    expect(response.statusCode).toBe(200);
    expect(response.json().status).toBe("ok");
  });

  test("run-status reports scheduler and governor state", async () => {
    const server = await start();
    const response = await server.inject({ method: "GET", url: "/run-status" });

    expect(response.statusCode).toBe(200);
    const payload = response.json();
    expect(payload.scheduler.running).toBe(false);
    expect(payload.governor).toBe("OPEN");
    expect(payload.dayKey).toBe(server.services.calendar.dayKey());
    expect(payload.lastCycle).toBeNull();
  });

  test("cycle/run runs one cycle and the signal shows up everywhere", async () => {
    const source = new FakeChainSource().enqueue(
      flat(),
      flat(),
      flat(),
      chain({ price: 20_100, callOi: 80_000, putOi: 95_000, callLtp: 120 })
    );
    const server = await start(source);

    for (let index = 0; index < 3; index += 1) {
      const response = await server.inject({ method: "POST", url: "/cycle/run" });
      expect(response.json().outcome.status).toBe("no_match");
    }
    const emitted = await server.inject({ method: "POST", url: "/cycle/run" });
    expect(emitted.statusCode).toBe(200);
    expect(emitted.json().outcome.signal.action).toBe("CE_BUY");

    const dayState = (await server.inject({ method: "GET", url: "/day-state" })).json();
    expect(dayState.day.signalsEmitted).toBe(1);

    const signals = (await server.inject({ method: "GET", url: "/signals" })).json();
    expect(signals.signals).toHaveLength(1);
    expect(signals.signals[0].signal.strike).toBe(20_100);

    const trades = (await server.inject({ method: "GET", url: "/paper-trades?status=open" })).json();
    expect(trades.trades).toHaveLength(1);

    const summary = (await server.inject({ method: "GET", url: "/paper-summary" })).json();
    expect(summary.summary).toMatchObject({
      dayKey: server.services.tradingDay.dayKey,
      signals: 1,
      open: 1
    });
  });

  test("cycle/run reports a fetch failure as a skipped cycle", async () => {
    const server = await start(new FakeChainSource());
    const response = await server.inject({ method: "POST", url: "/cycle/run" });

    expect(response.statusCode).toBe(200);
    expect(response.json().outcome).toMatchObject({ status: "skipped", reason: "fetch_failed" });
  });

  test("bot-policy can be patched, validated and reset", async () => {
    const server = await start();

    const patched = await server.inject({
      method: "PATCH",
      url: "/bot-policy",
      payload: { minConfidence: 80 }
    });
    expect(patched.statusCode).toBe(200);
    expect(patched.json().policy.minConfidence).toBe(80);
    expect(patched.json().policy.expiryMinConfidence).toBe(85);

    const invalid = await server.inject({ method: "PATCH", url: "/bot-policy", payload: {} });
    expect(invalid.statusCode).toBe(400);

    const outOfRange = await server.inject({
      method: "PATCH",
      url: "/bot-policy",
      payload: { stopLossPct: 2 }
    });
    expect(outOfRange.statusCode).toBe(400);

    const reset = await server.inject({ method: "POST", url: "/bot-policy/reset" });
    expect(reset.json().policy.minConfidence).toBe(70);
  });

  test("day/rollover closes the day", async () => {
    const server = await start();
    const openDay = server.services.tradingDay.dayKey;
    const response = await server.inject({
      method: "POST",
      url: "/day/rollover",
      payload: { dayKey: "2099-01-02", isExpiryDay: true }
    });

    expect(response.statusCode).toBe(200);
    const payload = response.json();
    expect(payload.closed.dayKey).toBe(openDay);
    expect(payload.current).toMatchObject({ dayKey: "2099-01-02", isExpiryDay: true });
  });

  test("day/rollover validates the day key", async () => {
    const server = await start();
    const response = await server.inject({
      method: "POST",
      url: "/day/rollover",
      payload: { dayKey: "20-10-2026" }
    });
    expect(response.statusCode).toBe(400);
  });

  test("api-request-logs records inbound requests", async () => {
    const server = await start();
    await server.inject({ method: "GET", url: "/health" });

    const response = await server.inject({
      method: "GET",
      url: "/api-request-logs?direction=internal&endpointContains=health"
    });
    const logs = response.json().logs;
    expect(logs).toHaveLength(1);
    expect(logs[0]).toMatchObject({
      direction: "internal",
      method: "GET",
      endpoint: "/health",
      statusCode: 200,
      reason: "Health check request"
    });
  });

  test("config hides credentials", async () => {
    const server = await start();
    const payload = (await server.inject({ method: "GET", url: "/config" })).json();

    expect(payload.upstoxConfigured).toBe(true);
    expect(payload.telegramConfigured).toBe(true);
    expect(JSON.stringify(payload)).not.toContain("test-secret");
  });
});
