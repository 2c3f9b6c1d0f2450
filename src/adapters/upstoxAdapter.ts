import type { AppSettings } from "../core/config";
import { DataFetchError, errorMessage } from "../core/errors";
import type { OptionChainSnapshot, StrikeQuote } from "../types/models";
import { type UpstoxOptionChainResponse, upstoxOptionChainResponseSchema } from "../types/schemas";
import { type ApiRequestLogSink, fetchWithApiLog } from "../utils/fetchWithApiLog";
import { nonNegative } from "../utils/statistics";
import { roundToStrike } from "../utils/strikes";
import { nowIso } from "../utils/time";

export interface OptionChainSource {
  fetchOptionChain(instrument: string): Promise<OptionChainSnapshot>;
}

interface ExpiryCalendar {
  nextExpiry(at?: Date): string;
}

type UpstoxSettings = Pick<
  AppSettings,
  "upstoxBaseUrl" | "upstoxAccessToken" | "fetchTimeoutMs" | "strikeGap" | "strikeRange"
>;

type UpstoxChainRow = UpstoxOptionChainResponse["data"][number];

const isTimeout = (error: unknown): boolean =>
  error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");

const toQuote = (row: UpstoxChainRow): StrikeQuote => {
  const call = row.call_options?.market_data;
  const put = row.put_options?.market_data;
  return Object.freeze({
    strike: row.strike_price,
    callOi: nonNegative(call?.oi ?? 0),
    putOi: nonNegative(put?.oi ?? 0),
    callVolume: nonNegative(call?.volume ?? 0),
    putVolume: nonNegative(put?.volume ?? 0),
    callLtp: nonNegative(call?.ltp ?? 0),
    putLtp: nonNegative(put?.ltp ?? 0)
  });
};

/** Option chain from the Upstox v2 REST API, trimmed to ATM +/- `strikeRange` strikes. */
export class UpstoxAdapter implements OptionChainSource {
  constructor(
    private readonly config: UpstoxSettings,
    private readonly calendar: ExpiryCalendar,
    private readonly logSink: ApiRequestLogSink
  ) {}

  async fetchOptionChain(instrument: string): Promise<OptionChainSnapshot> {
    if (!this.config.upstoxAccessToken) {
      throw new DataFetchError("UPSTOX_ACCESS_TOKEN not configured.", "auth");
    }

    const expiry = this.calendar.nextExpiry();
    const params = new URLSearchParams({ instrument_key: instrument, expiry_date: expiry });
    const url = `${this.config.upstoxBaseUrl}/v2/option/chain?${params.toString()}`;

    let response: Response;
    try {
      response = await fetchWithApiLog(
        url,
        {
          headers: {
            Accept: "application/json",
            Authorization: `Bearer ${this.config.upstoxAccessToken}`
          },
          signal: AbortSignal.timeout(this.config.fetchTimeoutMs)
        },
        {
          provider: "upstox",
          endpoint: "/v2/option/chain",
          reason: `Fetch option chain ${instrument} ${expiry}`,
          requestPayload: { instrument, expiry }
        },
        this.logSink
      );
    } catch (error) {
      if (isTimeout(error)) {
        throw new DataFetchError(
          `Option chain request timed out after ${this.config.fetchTimeoutMs}ms`,
          "timeout",
          { cause: error }
        );
      }
      throw new DataFetchError(`Option chain request failed: ${errorMessage(error)}`, "network", {
        cause: error
      });
    }

    if (response.status === 401 || response.status === 403) {
      throw new DataFetchError("Upstox rejected the access token.", "auth", {
        statusCode: response.status
      });
    }
    if (!response.ok) {
      throw new DataFetchError(`Upstox responded ${response.status}.`, "http_status", {
        statusCode: response.status
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new DataFetchError("Option chain body is not JSON.", "invalid_payload", {
        cause: error
      });
    }

    const parsed = upstoxOptionChainResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new DataFetchError("Option chain payload failed validation.", "invalid_payload", {
        cause: parsed.error
      });
    }

    return this.toSnapshot(instrument, expiry, parsed.data);
  }

  private toSnapshot(
    instrument: string,
    expiry: string,
    payload: UpstoxOptionChainResponse
  ): OptionChainSnapshot {
    const rows = payload.data;
    const spot = rows.find((row) => typeof row.underlying_spot_price === "number")
      ?.underlying_spot_price;
    if (rows.length === 0 || spot === undefined || spot === null || !(spot > 0)) {
      throw new DataFetchError("Option chain carries no underlying price.", "invalid_payload");
    }

    const atm = roundToStrike(spot, this.config.strikeGap);
    const reach = this.config.strikeRange * this.config.strikeGap;
    const strikes = rows
      .filter((row) => Math.abs(row.strike_price - atm) <= reach)
      .sort((left, right) => left.strike_price - right.strike_price)
      .map(toQuote);

    return Object.freeze({
      instrument,
      timestamp: nowIso(),
      expiry: rows[0].expiry ?? expiry,
      underlyingPrice: spot,
      strikes: Object.freeze(strikes)
    });
  }
}
