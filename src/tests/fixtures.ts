import type { SignalNotifier } from "../adapters/telegramAdapter";
import type { OptionChainSource } from "../adapters/upstoxAdapter";
import { type AppSettings, loadSettings } from "../core/config";
import type {
  IndicatorSet,
  MatchedScenario,
  OptionChainSnapshot,
  Signal,
  StrikeQuote
} from "../types/models";
import { roundToStrike } from "../utils/strikes";

export const TEST_DAY = "2026-10-19";

export const testSettings = (overrides: Partial<AppSettings> = {}): AppSettings => ({
  ...loadSettings({ APP_ENV: "test" }),
  dbPath: ":memory:",
  upstoxAccessToken: "test-token",
  telegramBotToken: "test-secret",
  telegramChatId: "test-chat",
  ...overrides
});

export interface ChainInput {
  price: number;
  callOi: number;
  putOi: number;
  volume?: number;
  callLtp?: number;
  putLtp?: number;
  timestamp?: string;
  instrument?: string;
}

/** One strike at the rounded ATM carrying the whole chain's OI and volume. */
export const chain = (input: ChainInput): OptionChainSnapshot => {
  const volume = input.volume ?? 1_000;
  const quote: StrikeQuote = {
    strike: roundToStrike(input.price, 50),
    callOi: input.callOi,
    putOi: input.putOi,
    callVolume: volume / 2,
    putVolume: volume / 2,
    callLtp: input.callLtp ?? 120,
    putLtp: input.putLtp ?? 110
  };
  return {
    instrument: input.instrument ?? "NSE_INDEX|Nifty 50",
    timestamp: input.timestamp ?? "2026-10-19T04:30:00.000Z",
    expiry: "2026-10-20",
    underlyingPrice: input.price,
    strikes: [quote]
  };
};

export const indicators = (overrides: Partial<IndicatorSet> = {}): IndicatorSet => ({
  timestamp: "2026-10-19T04:30:00.000Z",
  underlyingPrice: 20_000,
  totalCallOi: 80_000,
  totalPutOi: 100_000,
  callOiDelta: 0,
  putOiDelta: 0,
  callOiDeltaPct: 0,
  putOiDeltaPct: 0,
  pcr: 1.25,
  vwap: 20_000,
  vwapSamples: 3,
  priceVsVwapPct: 0,
  priceDirection: "SIDEWAYS",
  ...overrides
});

export const matched = (overrides: Partial<MatchedScenario> = {}): MatchedScenario => ({
  scenarioId: "PUT_UNWINDING_BULLISH",
  label: "Put unwinding with rising price",
  bias: "BULLISH",
  confidence: 90,
  indicators: indicators({ underlyingPrice: 20_100, priceDirection: "UP" }),
  timestamp: "2026-10-19T04:30:00.000Z",
  ...overrides
});

export class FakeChainSource implements OptionChainSource {
  readonly calls: string[] = [];
  private readonly queue: Array<OptionChainSnapshot | Error> = [];

  enqueue(...items: Array<OptionChainSnapshot | Error>): this {
    this.queue.push(...items);
    return this;
  }

  async fetchOptionChain(instrument: string): Promise<OptionChainSnapshot> {
    this.calls.push(instrument);
    const next = this.queue.shift();
    if (next === undefined) throw new Error("no snapshot queued");
    if (next instanceof Error) throw next;
    return next;
  }
}

export class FakeNotifier implements SignalNotifier {
  readonly signals: Signal[] = [];
  readonly texts: string[] = [];
  failWith: Error | null = null;

  async send(signal: Signal): Promise<boolean> {
    if (this.failWith) throw this.failWith;
    this.signals.push(signal);
    return true;
  }

  async sendText(text: string): Promise<boolean> {
    if (this.failWith) throw this.failWith;
    this.texts.push(text);
    return true;
  }
}
