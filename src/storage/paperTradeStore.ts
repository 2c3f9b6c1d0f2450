import Database from "better-sqlite3";

import { settings } from "../core/config";
import { logger } from "../core/logger";
import type {
  PaperDaySummary,
  PaperTrade,
  PaperTradeEntry,
  PaperTradeOutcome
} from "../types/models";
import { paperTradeRowSchema } from "../types/schemas";
import { makeId } from "../utils/id";
import { round } from "../utils/statistics";
import { nowIso } from "../utils/time";

export interface PaperTradeQuery {
  dayKey?: string;
  status?: "open" | "resolved";
  limit?: number;
}

export interface PaperTradeLedger {
  append(entry: PaperTradeEntry): PaperTrade;
  resolve(
    tradeId: string,
    outcome: PaperTradeOutcome,
    exitPrice: number,
    resolvedAt?: string
  ): PaperTrade | null;
  listOpen(dayKey?: string): PaperTrade[];
  list(query?: PaperTradeQuery): PaperTrade[];
  summarize(dayKey: string): PaperDaySummary;
}

const log = logger.scope("paper");

const SELECT_TRADES = `
  SELECT
    t.id, t.signal_id, t.day_key, t.instrument, t.action, t.strike, t.scenario_id,
    t.confidence, t.entry_price, t.stop_loss_price, t.target_price, t.quantity, t.opened_at,
    r.outcome, r.exit_price, r.pnl, r.resolved_at
  FROM paper_trades t
  LEFT JOIN paper_trade_resolutions r ON r.trade_id = t.id
`;

const toPaperTrade = (row: unknown): PaperTrade | null => {
  const parsed = paperTradeRowSchema.safeParse(row);
  if (!parsed.success) {
    log.warn("Skipping malformed paper trade row", parsed.error.issues);
    return null;
  }
  const data = parsed.data;
  return {
    id: data.id,
    signalId: data.signal_id,
    dayKey: data.day_key,
    instrument: data.instrument,
    action: data.action,
    strike: data.strike,
    scenarioId: data.scenario_id,
    confidence: data.confidence,
    entryPrice: data.entry_price,
    stopLossPrice: data.stop_loss_price,
    targetPrice: data.target_price,
    quantity: data.quantity,
    openedAt: data.opened_at,
    outcome: data.outcome,
    exitPrice: data.exit_price,
    pnl: data.pnl,
    resolvedAt: data.resolved_at
  };
};

const isPresent = <T>(value: T | null): value is T => value !== null;

/**
 * Append-only ledger: an entry row is never updated; its outcome lives in a
 * separate resolution row keyed by trade id.
 */
export class PaperTradeStore implements PaperTradeLedger {
  private readonly db: Database.Database;

  constructor(dbPath = settings.dbPath) {
    this.db = new Database(dbPath);
    this.init();
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS paper_trades (
        id TEXT PRIMARY KEY,
        signal_id TEXT NOT NULL UNIQUE,
        day_key TEXT NOT NULL,
        instrument TEXT NOT NULL,
        action TEXT NOT NULL,
        strike REAL NOT NULL,
        scenario_id TEXT NOT NULL,
        confidence REAL NOT NULL,
        entry_price REAL NOT NULL,
        stop_loss_price REAL NOT NULL,
        target_price REAL NOT NULL,
        quantity INTEGER NOT NULL,
        opened_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_paper_trades_day_key
        ON paper_trades (day_key, opened_at);

      CREATE TABLE IF NOT EXISTS paper_trade_resolutions (
        trade_id TEXT PRIMARY KEY REFERENCES paper_trades (id),
        outcome TEXT NOT NULL,
        exit_price REAL NOT NULL,
        pnl REAL NOT NULL,
        resolved_at TEXT NOT NULL
      );
    `);
  }

  append(entry: PaperTradeEntry): PaperTrade {
    const trade: PaperTrade = {
      ...entry,
      id: makeId(),
      outcome: null,
      exitPrice: null,
      pnl: null,
      resolvedAt: null
    };

    this.db
      .prepare(
        `INSERT INTO paper_trades
         (id, signal_id, day_key, instrument, action, strike, scenario_id, confidence,
          entry_price, stop_loss_price, target_price, quantity, opened_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        trade.id,
        trade.signalId,
        trade.dayKey,
        trade.instrument,
        trade.action,
        trade.strike,
        trade.scenarioId,
        trade.confidence,
        trade.entryPrice,
        trade.stopLossPrice,
        trade.targetPrice,
        trade.quantity,
        trade.openedAt
      );

    return trade;
  }

  get(tradeId: string): PaperTrade | null {
    const row: unknown = this.db.prepare(`${SELECT_TRADES} WHERE t.id = ?`).get(tradeId);
    return row === undefined ? null : toPaperTrade(row);
  }

  /** Returns null when the trade is unknown or already resolved. */
  resolve(
    tradeId: string,
    outcome: PaperTradeOutcome,
    exitPrice: number,
    resolvedAt: string = nowIso()
  ): PaperTrade | null {
    const trade = this.get(tradeId);
    if (!trade || trade.outcome !== null) return null;

    const pnl = round((exitPrice - trade.entryPrice) * trade.quantity);
    this.db
      .prepare(
        `INSERT INTO paper_trade_resolutions (trade_id, outcome, exit_price, pnl, resolved_at)
         VALUES (?, ?, ?, ?, ?)`
      )
      .run(tradeId, outcome, exitPrice, pnl, resolvedAt);

    return { ...trade, outcome, exitPrice, pnl, resolvedAt };
  }

  listOpen(dayKey?: string): PaperTrade[] {
    return this.list({ dayKey, status: "open", limit: 2_000 });
  }

  list(query: PaperTradeQuery = {}): PaperTrade[] {
    const limit = Math.max(1, Math.min(query.limit ?? 200, 2_000));
    const clauses: string[] = [];
    const params: Array<string | number> = [];

    if (query.dayKey) {
      clauses.push("t.day_key = ?");
      params.push(query.dayKey);
    }
    if (query.status === "open") clauses.push("r.trade_id IS NULL");
    if (query.status === "resolved") clauses.push("r.trade_id IS NOT NULL");

    const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
    const rows: unknown[] = this.db
      .prepare(`${SELECT_TRADES} ${where} ORDER BY t.opened_at ASC, t.rowid ASC LIMIT ?`)
      .all(...params, limit);

    return rows.map(toPaperTrade).filter(isPresent);
  }

  summarize(dayKey: string): PaperDaySummary {
    const trades = this.list({ dayKey, limit: 2_000 });
    const resolved = trades.filter((trade) => trade.pnl !== null);
    const pnls = resolved.map((trade) => trade.pnl ?? 0);
    const wins = pnls.filter((pnl) => pnl > 0).length;
    const losses = pnls.filter((pnl) => pnl < 0).length;

    return {
      dayKey,
      signals: trades.length,
      resolved: resolved.length,
      open: trades.length - resolved.length,
      wins,
      losses,
      winRate: resolved.length > 0 ? round((wins / resolved.length) * 100) : 0,
      pnl: round(pnls.reduce((acc, pnl) => acc + pnl, 0)),
      bestTrade: pnls.length > 0 ? Math.max(...pnls) : 0,
      worstTrade: pnls.length > 0 ? Math.min(...pnls) : 0
    };
  }

  close(): void {
    this.db.close();
  }
}
