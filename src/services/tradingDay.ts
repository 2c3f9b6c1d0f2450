import type { MatchedScenario, TradingDayState } from "../types/models";

/**
 * Single owner of the per-day counters. Only the emitter records signals,
 * and only an explicit rollover clears them.
 */
export class TradingDay {
  private current: TradingDayState;

  constructor(dayKey: string, isExpiryDay: boolean) {
    this.current = TradingDay.fresh(dayKey, isExpiryDay);
  }

  private static fresh(dayKey: string, isExpiryDay: boolean): TradingDayState {
    return { dayKey, isExpiryDay, signalsEmitted: 0, actedOn: [], lastSignalAt: null };
  }

  state(): TradingDayState {
    return { ...this.current, actedOn: [...this.current.actedOn] };
  }

  get dayKey(): string {
    return this.current.dayKey;
  }

  get isExpiryDay(): boolean {
    return this.current.isExpiryDay;
  }

  recordSignal(matched: MatchedScenario, at: string): TradingDayState {
    this.current = {
      ...this.current,
      signalsEmitted: this.current.signalsEmitted + 1,
      actedOn: [...this.current.actedOn, matched],
      lastSignalAt: at
    };
    return this.state();
  }

  /** Returns the state of the day that just closed. */
  rollover(dayKey: string, isExpiryDay: boolean): TradingDayState {
    const closed = this.state();
    this.current = TradingDay.fresh(dayKey, isExpiryDay);
    return closed;
  }
}
