import type { PaperDaySummary, Signal } from "../types/models";

const escapeHtml = (value: string): string =>
  value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");

const fixed = (value: number, digits = 2): string => value.toFixed(digits);

const signed = (value: number, digits = 2): string =>
  `${value >= 0 ? "+" : ""}${value.toFixed(digits)}`;

const clock = (iso: string, timezone: string): string =>
  new Intl.DateTimeFormat("en-GB", {
    timeZone: timezone,
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23"
  }).format(new Date(iso));

export interface StartupDetails {
  instrument: string;
  sessionStart: string;
  sessionEnd: string;
  pollIntervalSeconds: number;
  paperTrading: boolean;
  nextExpiry: string;
}

/** Telegram HTML message bodies. */
export class SignalFormatter {
  constructor(private readonly timezone: string) {}

  formatSignal(signal: Signal): string {
    const { matched, risk } = signal;
    const ind = matched.indicators;
    const icon = signal.action === "CE_BUY" ? "🟢" : "🔴";
    const lines = [
      `${icon} <b>${signal.action} ${signal.strike}</b> ${escapeHtml(signal.instrument)}`,
      `<b>${escapeHtml(matched.label)}</b> (${matched.scenarioId})`,
      `Confidence: <b>${matched.confidence}%</b>`,
      "",
      `Entry: ${fixed(risk.entryPrice)}`,
      `Stop: ${fixed(risk.stopLossPrice)}`,
      `Target: ${fixed(risk.targetPrice)}`,
      `R:R 1:${fixed(risk.riskReward, 1)}${risk.expiryAdjusted ? " (expiry day)" : ""}`,
      "",
      `Spot: ${fixed(ind.underlyingPrice)} | VWAP: ${fixed(ind.vwap)} (${signed(ind.priceVsVwapPct)}%)`,
      `PCR: ${fixed(ind.pcr, 3)}`,
      `Call OI: ${signed(ind.callOiDeltaPct)}% | Put OI: ${signed(ind.putOiDeltaPct)}%`,
      "",
      `Time: ${clock(signal.createdAt, this.timezone)}`
    ];
    return lines.join("\n");
  }

  formatDailySummary(summary: PaperDaySummary): string {
    return [
      `📊 <b>Daily summary ${summary.dayKey}</b>`,
      `Signals: ${summary.signals}`,
      `Wins: ${summary.wins} | Losses: ${summary.losses} | Open: ${summary.open}`,
      `Win rate: ${fixed(summary.winRate, 1)}%`,
      `P&amp;L: ${signed(summary.pnl)}`,
      `Best: ${signed(summary.bestTrade)} | Worst: ${signed(summary.worstTrade)}`
    ].join("\n");
  }

  formatStartup(details: StartupDetails): string {
    return [
      `🚀 <b>Signal bot started</b>`,
      `Instrument: ${escapeHtml(details.instrument)}`,
      `Session: ${details.sessionStart}-${details.sessionEnd}`,
      `Scan every ${details.pollIntervalSeconds}s`,
      `Next expiry: ${details.nextExpiry}`,
      `Paper trading: ${details.paperTrading ? "on" : "off"}`
    ].join("\n");
  }
}
