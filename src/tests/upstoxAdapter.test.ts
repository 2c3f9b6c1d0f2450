import { afterEach, describe, expect, test, vi } from "vitest";

import { UpstoxAdapter } from "../adapters/upstoxAdapter";
import { DataFetchError } from "../core/errors";
import { ApiRequestLogStore } from "../storage/apiRequestLogStore";
import { testSettings } from "./fixtures";

const calendar = { nextExpiry: () => "2026-10-20" };

const row = (strike: number) => ({
  expiry: "2026-10-20",
  strike_price: strike,
  underlying_key: "NSE_INDEX|Nifty 50",
  underlying_spot_price: 20_040,
  pcr: 1.1,
  call_options: {
    instrument_key: `NSE_FO|C${strike}`,
    market_data: { ltp: 150 - (strike - 20_000) / 10, volume: 1_000, oi: 50_000 }
  },
  put_options: {
    instrument_key: `NSE_FO|P${strike}`,
    market_data: { ltp: 90, volume: 800, oi: null }
  }
});

const payload = {
  status: "success",
  data: [20_200, 19_900, 20_000, 19_950, 20_100, 20_050, 20_150].map(row)
};

const stores: ApiRequestLogStore[] = [];

const setup = (overrides: Parameters<typeof testSettings>[0] = {}) => {
  const logStore = new ApiRequestLogStore(":memory:");
  stores.push(logStore);
  return { logStore, adapter: new UpstoxAdapter(testSettings(overrides), calendar, logStore) };
};

const respondWith = (body: unknown, status = 200) => {
  const fetchMock = vi.fn(
    async (_input: string | URL | Request, _init?: RequestInit) =>
      new Response(typeof body === "string" ? body : JSON.stringify(body), { status })
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
};

afterEach(() => {
  vi.unstubAllGlobals();
  for (const store of stores.splice(0)) store.close();
});

describe("UpstoxAdapter", () => {
  test("keeps ATM +/- two strikes, sorted, with missing fields as zero", async () => {
    respondWith(payload);
    const { adapter } = setup();

    const snapshot = await adapter.fetchOptionChain("NSE_INDEX|Nifty 50");

    expect(snapshot.underlyingPrice).toBe(20_040);
    expect(snapshot.expiry).toBe("2026-10-20");
    expect(snapshot.strikes.map((quote) => quote.strike)).toEqual([
      19_950, 20_000, 20_050, 20_100, 20_150
    ]);
    expect(snapshot.strikes[1]).toEqual({
      strike: 20_000,
      callOi: 50_000,
      putOi: 0,
      callVolume: 1_000,
      putVolume: 800,
      callLtp: 150,
      putLtp: 90
    });
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.strikes)).toBe(true);
  });

  test("sends the instrument, expiry and bearer token", async () => {
    const fetchMock = respondWith(payload);
    const { adapter, logStore } = setup();

    await adapter.fetchOptionChain("NSE_INDEX|Nifty 50");

    const [input, init] = fetchMock.mock.calls[0] ?? [];
    const url = new URL(String(input));
    expect(url.pathname).toBe("/v2/option/chain");
    expect(url.searchParams.get("instrument_key")).toBe("NSE_INDEX|Nifty 50");
    expect(url.searchParams.get("expiry_date")).toBe("2026-10-20");
    expect(new Headers(init?.headers).get("Authorization")).toBe("Bearer test-token");

    const logs = logStore.list({ provider: "upstox" });
    expect(logs).toHaveLength(1);
    expect(logs[0]).toMatchObject({ direction: "external", status: "success", statusCode: 200 });
  });

  test("fails with auth when no token is configured", async () => {
    const fetchMock = respondWith(payload);
    const { adapter } = setup({ upstoxAccessToken: "" });

    await expect(adapter.fetchOptionChain("NSE_INDEX|Nifty 50")).rejects.toMatchObject({
      name: "DataFetchError",
      failure: "auth"
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  test("maps 401 to auth and 5xx to http_status", async () => {
    respondWith({ status: "error" }, 401);
    await expect(setup().adapter.fetchOptionChain("X")).rejects.toMatchObject({
      failure: "auth",
      statusCode: 401
    });

    respondWith({ status: "error" }, 503);
    await expect(setup().adapter.fetchOptionChain("X")).rejects.toMatchObject({
      failure: "http_status",
      statusCode: 503
    });
  });

  test("rejects payloads that fail validation", async () => {
    respondWith({ status: "success", data: "nope" });
    await expect(setup().adapter.fetchOptionChain("X")).rejects.toBeInstanceOf(DataFetchError);

    respondWith("<html>maintenance</html>");
    await expect(setup().adapter.fetchOptionChain("X")).rejects.toMatchObject({
      failure: "invalid_payload"
    });
  });

  test("rejects a chain without an underlying price", async () => {
    respondWith({ status: "success", data: [] });
    await expect(setup().adapter.fetchOptionChain("X")).rejects.toMatchObject({
      failure: "invalid_payload",
      message: "Option chain carries no underlying price."
    });
  });

  test("reports a timeout distinctly from other network failures", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw Object.assign(new Error("The operation was aborted due to timeout"), {
          name: "TimeoutError"
        });
      })
    );
    await expect(setup().adapter.fetchOptionChain("X")).rejects.toMatchObject({
      failure: "timeout",
      message: "Option chain request timed out after 10000ms"
    });

    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      })
    );
    await expect(setup().adapter.fetchOptionChain("X")).rejects.toMatchObject({
      failure: "network",
      message: "Option chain request failed: fetch failed"
    });
  });
});
