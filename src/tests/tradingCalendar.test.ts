import { describe, expect, test } from "vitest";

import { TradingCalendar } from "../services/tradingCalendar";
import { testSettings } from "./fixtures";

const calendar = new TradingCalendar(testSettings());
const at = (iso: string): Date => new Date(iso);

describe("TradingCalendar", () => {
  test("derives the day key in the market timezone", () => {
    expect(calendar.dayKey(at("2026-10-19T04:00:00.000Z"))).toBe("2026-10-19");
    expect(calendar.dayKey(at("2026-10-19T19:00:00.000Z"))).toBe("2026-10-20");
  });

  test("session bounds are inclusive", () => {
    expect(calendar.isWithinSession(at("2026-10-19T03:44:00.000Z"))).toBe(false);
    expect(calendar.isWithinSession(at("2026-10-19T03:45:00.000Z"))).toBe(true);
    expect(calendar.isWithinSession(at("2026-10-19T10:00:00.000Z"))).toBe(true);
    expect(calendar.isWithinSession(at("2026-10-19T10:01:00.000Z"))).toBe(false);
  });

  test("weekends are closed", () => {
    expect(calendar.isWithinSession(at("2026-10-24T05:00:00.000Z"))).toBe(false);
    expect(calendar.isWithinSession(at("2026-10-25T05:00:00.000Z"))).toBe(false);
  });

  test("Tuesday is the weekly expiry", () => {
    expect(calendar.isExpiryDay(at("2026-10-19T05:00:00.000Z"))).toBe(false);
    expect(calendar.isExpiryDay(at("2026-10-20T05:00:00.000Z"))).toBe(true);
  });

  test("next expiry rolls to the following week after the expiry session closes", () => {
    expect(calendar.nextExpiry(at("2026-10-19T05:00:00.000Z"))).toBe("2026-10-20");
    expect(calendar.nextExpiry(at("2026-10-20T09:00:00.000Z"))).toBe("2026-10-20");
    expect(calendar.nextExpiry(at("2026-10-20T10:31:00.000Z"))).toBe("2026-10-27");
    expect(calendar.nextExpiry(at("2026-10-24T05:00:00.000Z"))).toBe("2026-10-27");
  });

  test("honours a different expiry weekday", () => {
    const thursday = new TradingCalendar(testSettings({ expiryWeekday: 4 }));
    expect(thursday.nextExpiry(at("2026-10-19T05:00:00.000Z"))).toBe("2026-10-22");
  });
});
