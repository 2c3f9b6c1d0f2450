import { z } from "zod";

import { parseClockMinutes } from "../utils/time";

const clockTime = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "Expected HH:MM (24h).");

export const settingsSchema = z
  .object({
    appPort: z.number().int().min(1).max(65_535),
    pollIntervalSeconds: z.number().min(5).max(3_600),
    fetchTimeoutMs: z.number().int().min(500),
    apiLogRetentionDays: z.number().int().min(1).max(365),
    underlyingInstrument: z.string().min(1),
    strikeGap: z.number().positive(),
    strikeRange: z.number().int().min(0).max(20),
    lotSize: z.number().int().positive(),
    sessionStart: clockTime,
    sessionEnd: clockTime,
    expiryWeekday: z.number().int().min(0).max(6),
    rollingWindowSize: z.number().int().min(1).max(1_000),
    minVwapSamples: z.number().int().min(1),
    directionBandPct: z.number().min(0).max(10),
    oiChangeThresholdPct: z.number().min(0).max(100),
    pcrSupportZone: z.number().positive(),
    pcrResistanceZone: z.number().positive(),
    stopLossPct: z.number().gt(0).lt(1),
    targetPct: z.number().gt(0).max(10),
    expiryStopLossPct: z.number().gt(0).lt(1),
    expiryTargetPct: z.number().gt(0).max(10),
    dailySignalCeiling: z.number().int().min(1).max(100),
    minConfidence: z.number().min(0).max(100),
    expiryMinConfidence: z.number().min(0).max(100),
    signalCooldownSeconds: z.number().min(0)
  })
  .superRefine((value, ctx) => {
    if (value.fetchTimeoutMs >= value.pollIntervalSeconds * 1_000) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["fetchTimeoutMs"],
        message: "Fetch timeout must be shorter than the poll interval."
      });
    }
    if (value.minVwapSamples > value.rollingWindowSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["minVwapSamples"],
        message: "Minimum VWAP samples cannot exceed the rolling window size."
      });
    }
    if (value.pcrResistanceZone >= value.pcrSupportZone) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["pcrResistanceZone"],
        message: "PCR resistance zone must sit below the support zone."
      });
    }
    if (value.expiryStopLossPct > value.stopLossPct) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["expiryStopLossPct"],
        message: "Expiry-day stop loss must be at most the regular stop loss."
      });
    }
    if (value.expiryTargetPct > value.targetPct) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["expiryTargetPct"],
        message: "Expiry-day target must be at most the regular target."
      });
    }
    if (value.expiryMinConfidence < value.minConfidence) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["expiryMinConfidence"],
        message: "Expiry-day confidence floor must be at least the regular floor."
      });
    }
    if (
      clockTime.safeParse(value.sessionStart).success &&
      clockTime.safeParse(value.sessionEnd).success &&
      parseClockMinutes(value.sessionStart) >= parseClockMinutes(value.sessionEnd)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["sessionEnd"],
        message: "Session end must be after session start."
      });
    }
  });

export const signalPolicyFieldsSchema = z.object({
  directionBandPct: z.number().min(0).max(10).optional(),
  minVwapSamples: z.number().int().min(1).max(1_000).optional(),
  oiChangeThresholdPct: z.number().min(0).max(100).optional(),
  pcrSupportZone: z.number().positive().max(50).optional(),
  pcrResistanceZone: z.number().positive().max(50).optional(),
  stopLossPct: z.number().min(0.01).max(0.95).optional(),
  targetPct: z.number().min(0.01).max(10).optional(),
  expiryStopLossPct: z.number().min(0.01).max(0.95).optional(),
  expiryTargetPct: z.number().min(0.01).max(10).optional(),
  dailySignalCeiling: z.number().int().min(1).max(100).optional(),
  minConfidence: z.number().min(0).max(100).optional(),
  expiryMinConfidence: z.number().min(0).max(100).optional(),
  signalCooldownSeconds: z.number().int().min(0).max(86_400).optional(),
  paperTrading: z.boolean().optional()
});

export const signalPolicyPatchSchema = signalPolicyFieldsSchema.refine(
  (value) => Object.keys(value).length > 0,
  { message: "At least one policy field must be provided." }
);

export type SignalPolicyPatch = z.infer<typeof signalPolicyFieldsSchema>;

export const dayRolloverRequestSchema = z.object({
  dayKey: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD.")
    .optional(),
  isExpiryDay: z.boolean().optional()
});

export const signalsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50)
});

export const paperTradesQuerySchema = z.object({
  dayKey: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD.")
    .optional(),
  status: z.enum(["open", "resolved"]).optional(),
  limit: z.coerce.number().int().min(1).max(2_000).default(200)
});

export const paperSummaryQuerySchema = z.object({
  dayKey: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD.")
    .optional()
});

export const apiRequestLogsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(2_000).optional(),
  direction: z.enum(["internal", "external"]).optional(),
  status: z.enum(["success", "error"]).optional(),
  provider: z.string().trim().min(1).max(128).optional(),
  endpointContains: z.string().trim().min(1).max(256).optional(),
  sinceTimestamp: z.string().datetime().optional()
});

const marketDataSchema = z
  .object({
    ltp: z.number().nullish(),
    volume: z.number().nullish(),
    oi: z.number().nullish()
  })
  .passthrough();

const optionSideSchema = z
  .object({
    instrument_key: z.string().optional(),
    market_data: marketDataSchema.nullish()
  })
  .passthrough();

export const upstoxOptionChainResponseSchema = z.object({
  status: z.string().optional(),
  data: z.array(
    z
      .object({
        expiry: z.string().optional(),
        strike_price: z.number(),
        underlying_key: z.string().optional(),
        underlying_spot_price: z.number().nullish(),
        pcr: z.number().nullish(),
        call_options: optionSideSchema.nullish(),
        put_options: optionSideSchema.nullish()
      })
      .passthrough()
  )
});

export type UpstoxOptionChainResponse = z.infer<typeof upstoxOptionChainResponseSchema>;

export const scenarioIdSchema = z.enum([
  "PUT_UNWINDING_BULLISH",
  "CALL_UNWINDING_BULLISH",
  "CALL_UNWINDING_BEARISH",
  "PUT_UNWINDING_BEARISH",
  "SUPPORT_ZONE",
  "RESISTANCE_ZONE",
  "SUPPORT_BUILDING",
  "RESISTANCE_BUILDING",
  "SHORT_BUILDUP"
]);

export const paperTradeRowSchema = z.object({
  id: z.string(),
  signal_id: z.string(),
  day_key: z.string(),
  instrument: z.string(),
  action: z.enum(["CE_BUY", "PE_BUY"]),
  strike: z.number(),
  scenario_id: scenarioIdSchema,
  confidence: z.number(),
  entry_price: z.number(),
  stop_loss_price: z.number(),
  target_price: z.number(),
  quantity: z.number(),
  opened_at: z.string(),
  outcome: z.enum(["TARGET_HIT", "STOP_HIT", "CLOSED_AT_DAY_END"]).nullable(),
  exit_price: z.number().nullable(),
  pnl: z.number().nullable(),
  resolved_at: z.string().nullable()
});
