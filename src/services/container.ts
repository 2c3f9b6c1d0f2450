import { type AppSettings, assertValidSettings, settings } from "../core/config";
import { TelegramAdapter, type SignalNotifier } from "../adapters/telegramAdapter";
import { type OptionChainSource, UpstoxAdapter } from "../adapters/upstoxAdapter";
import { AuditStore } from "../storage/auditStore";
import { ApiRequestLogStore } from "../storage/apiRequestLogStore";
import { PaperTradeStore } from "../storage/paperTradeStore";
import { IndicatorAnalyzer } from "./indicatorAnalyzer";
import { PaperTradeTracker } from "./paperTradeTracker";
import { RiskAnnotator } from "./riskAnnotator";
import { RuntimePolicyService } from "./runtimePolicyService";
import { ScenarioMatcher } from "./scenarioMatcher";
import { BotScheduler } from "./scheduler";
import { SignalEmitter } from "./signalEmitter";
import { SignalFormatter } from "./signalFormatter";
import { SignalPipeline } from "./signalPipeline";
import { TradeGovernor } from "./tradeGovernor";
import { TradingCalendar } from "./tradingCalendar";
import { TradingDay } from "./tradingDay";

export interface ServiceContainer {
  settings: AppSettings;
  auditStore: AuditStore;
  apiRequestLogStore: ApiRequestLogStore;
  paperTradeStore: PaperTradeStore;
  runtimePolicy: RuntimePolicyService;
  calendar: TradingCalendar;
  tradingDay: TradingDay;
  governor: TradeGovernor;
  matcher: ScenarioMatcher;
  formatter: SignalFormatter;
  source: OptionChainSource;
  notifier: SignalNotifier;
  pipeline: SignalPipeline;
  scheduler: BotScheduler;
  close: () => void;
}

export interface ContainerOverrides {
  settings?: AppSettings;
  source?: OptionChainSource;
  notifier?: SignalNotifier;
  /** Defaults to the calendar's reading of the current date. */
  dayKey?: string;
  isExpiryDay?: boolean;
}

/** Validates settings first; a bad configuration never reaches the first cycle. */
export const buildContainer = (overrides: ContainerOverrides = {}): ServiceContainer => {
  const config = assertValidSettings(overrides.settings ?? settings);

  const auditStore = new AuditStore(config.dbPath, config.appEnv === "test" ? null : config.jsonlAuditPath);
  const apiRequestLogStore = new ApiRequestLogStore(config.dbPath, config.apiLogRetentionDays);
  const paperTradeStore = new PaperTradeStore(config.dbPath);
  const runtimePolicy = new RuntimePolicyService(auditStore, config);
  const calendar = new TradingCalendar(config);
  const formatter = new SignalFormatter(config.timezone);

  const source =
    overrides.source ?? new UpstoxAdapter(config, calendar, apiRequestLogStore);
  const notifier =
    overrides.notifier ?? new TelegramAdapter(config, formatter, apiRequestLogStore);

  const tradingDay = new TradingDay(
    overrides.dayKey ?? calendar.dayKey(),
    overrides.isExpiryDay ?? calendar.isExpiryDay()
  );
  const governor = new TradeGovernor(tradingDay, runtimePolicy);
  const matcher = new ScenarioMatcher(runtimePolicy);
  const emitter = new SignalEmitter(tradingDay, paperTradeStore, auditStore, notifier, runtimePolicy, {
    instrument: config.underlyingInstrument,
    strikeGap: config.strikeGap,
    lotSize: config.lotSize
  });

  const pipeline = new SignalPipeline(
    {
      source,
      analyzer: new IndicatorAnalyzer(runtimePolicy),
      matcher,
      annotator: new RiskAnnotator(runtimePolicy),
      governor,
      emitter,
      day: tradingDay,
      ledger: paperTradeStore,
      tracker: new PaperTradeTracker(paperTradeStore),
      auditStore,
      notifier,
      formatter
    },
    {
      instrument: config.underlyingInstrument,
      strikeGap: config.strikeGap,
      rollingWindowSize: config.rollingWindowSize
    }
  );
  const scheduler = new BotScheduler(pipeline, calendar, config.pollIntervalSeconds);

  return {
    settings: config,
    auditStore,
    apiRequestLogStore,
    paperTradeStore,
    runtimePolicy,
    calendar,
    tradingDay,
    governor,
    matcher,
    formatter,
    source,
    notifier,
    pipeline,
    scheduler,
    close: () => {
      scheduler.stop();
      auditStore.close();
      apiRequestLogStore.close();
      paperTradeStore.close();
    }
  };
};
