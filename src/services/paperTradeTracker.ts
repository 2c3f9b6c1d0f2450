import { logger } from "../core/logger";
import type { OptionChainSnapshot, PaperTrade, PaperTradeOutcome } from "../types/models";
import type { PaperTradeLedger } from "../storage/paperTradeStore";
import { nowIso } from "../utils/time";

const log = logger.scope("paper");

const premiumOf = (trade: PaperTrade, snapshot: OptionChainSnapshot): number | null => {
  const quote = snapshot.strikes.find((entry) => entry.strike === trade.strike);
  if (!quote) return null;
  const ltp = trade.action === "CE_BUY" ? quote.callLtp : quote.putLtp;
  return ltp > 0 ? ltp : null;
};

/**
 * Marks open paper trades against each new snapshot and closes whatever is
 * left at the end of the day at the last premium seen.
 */
export class PaperTradeTracker {
  private readonly lastPremium = new Map<string, number>();

  constructor(private readonly ledger: PaperTradeLedger) {}

  resolveOpen(dayKey: string, snapshot: OptionChainSnapshot): PaperTrade[] {
    const resolved: PaperTrade[] = [];
    for (const trade of this.ledger.listOpen(dayKey)) {
      if (trade.instrument !== snapshot.instrument) continue;
      const premium = premiumOf(trade, snapshot);
      if (premium === null) continue;
      this.lastPremium.set(trade.id, premium);

      let outcome: PaperTradeOutcome | null = null;
      if (premium >= trade.targetPrice) outcome = "TARGET_HIT";
      else if (premium <= trade.stopLossPrice) outcome = "STOP_HIT";
      if (!outcome) continue;

      const closed = this.ledger.resolve(trade.id, outcome, premium, snapshot.timestamp);
      if (closed) {
        this.lastPremium.delete(trade.id);
        log.info(`${closed.action} ${closed.strike} ${outcome}`, { pnl: closed.pnl });
        resolved.push(closed);
      }
    }
    return resolved;
  }

  closeDay(dayKey: string, at: string = nowIso()): PaperTrade[] {
    const closed: PaperTrade[] = [];
    for (const trade of this.ledger.listOpen(dayKey)) {
      const exitPrice = this.lastPremium.get(trade.id) ?? trade.entryPrice;
      const result = this.ledger.resolve(trade.id, "CLOSED_AT_DAY_END", exitPrice, at);
      this.lastPremium.delete(trade.id);
      if (result) closed.push(result);
    }
    return closed;
  }
}
