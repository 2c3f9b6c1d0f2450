import type { AppSettings } from "../core/config";
import { addDaysToDayKey, parseClockMinutes } from "../utils/time";

type CalendarSettings = Pick<
  AppSettings,
  "timezone" | "sessionStart" | "sessionEnd" | "expiryWeekday"
>;

interface ZonedParts {
  dayKey: string;
  weekday: number;
  minutes: number;
}

const WEEKDAYS: Record<string, number> = {
  Sun: 0,
  Mon: 1,
  Tue: 2,
  Wed: 3,
  Thu: 4,
  Fri: 5,
  Sat: 6
};

const isWeekday = (weekday: number): boolean => weekday >= 1 && weekday <= 5;

/** Day keys, session hours and weekly expiry, all in the market timezone. */
export class TradingCalendar {
  private readonly formatter: Intl.DateTimeFormat;
  private readonly sessionStartMinutes: number;
  private readonly sessionEndMinutes: number;

  constructor(private readonly config: CalendarSettings) {
    this.formatter = new Intl.DateTimeFormat("en-US", {
      timeZone: config.timezone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      weekday: "short",
      hour: "2-digit",
      minute: "2-digit",
      hourCycle: "h23"
    });
    this.sessionStartMinutes = parseClockMinutes(config.sessionStart);
    this.sessionEndMinutes = parseClockMinutes(config.sessionEnd);
  }

  private parts(at: Date): ZonedParts {
    const values = new Map(this.formatter.formatToParts(at).map((part) => [part.type, part.value]));
    const field = (type: Intl.DateTimeFormatPartTypes): string => values.get(type) ?? "";
    return {
      dayKey: `${field("year")}-${field("month")}-${field("day")}`,
      weekday: WEEKDAYS[field("weekday")] ?? 0,
      minutes: Number(field("hour")) * 60 + Number(field("minute"))
    };
  }

  dayKey(at: Date = new Date()): string {
    return this.parts(at).dayKey;
  }

  /** Session bounds are inclusive on both ends. */
  isWithinSession(at: Date = new Date()): boolean {
    const { weekday, minutes } = this.parts(at);
    if (!isWeekday(weekday)) return false;
    return minutes >= this.sessionStartMinutes && minutes <= this.sessionEndMinutes;
  }

  isExpiryDay(at: Date = new Date()): boolean {
    return this.parts(at).weekday === this.config.expiryWeekday;
  }

  /** On expiry day the current contract counts until the session closes. */
  nextExpiry(at: Date = new Date()): string {
    const { dayKey, weekday, minutes } = this.parts(at);
    let daysAhead = (this.config.expiryWeekday - weekday + 7) % 7;
    if (daysAhead === 0 && minutes > this.sessionEndMinutes) daysAhead = 7;
    return addDaysToDayKey(dayKey, daysAhead);
  }
}
