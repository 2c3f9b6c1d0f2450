import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

import {
  apiRequestLogsQuerySchema,
  dayRolloverRequestSchema,
  paperSummaryQuerySchema,
  paperTradesQuerySchema,
  signalPolicyPatchSchema,
  signalsQuerySchema
} from "../types/schemas";

export const registerRoutes = async (app: FastifyInstance): Promise<void> => {
  app.get("/health", async () => ({ status: "ok", timestamp: new Date().toISOString() }));

  app.get("/run-status", async () => {
    const { scheduler, pipeline, governor, calendar } = app.services;
    return {
      scheduler: scheduler.getRuntimeStatus(),
      governor: governor.state(),
      dayKey: pipeline.dayKey,
      nextExpiry: calendar.nextExpiry(),
      vwapSamples: pipeline.getHistory().length,
      lastCycle: pipeline.getLastOutcome()
    };
  });

  app.get("/day-state", async () => ({
    day: app.services.tradingDay.state(),
    governor: app.services.governor.state(),
    dailySignalCeiling: app.services.runtimePolicy.getPolicy().dailySignalCeiling
  }));

  app.get("/signals", async (request: FastifyRequest, reply: FastifyReply) => {
    const query = signalsQuerySchema.safeParse(request.query ?? {});
    if (!query.success) {
      return reply.code(400).send({ error: query.error.flatten() });
    }
    const records = app.services.auditStore.listAuditRecords({
      eventTypes: ["signal_emitted"],
      limit: query.data.limit
    });
    return {
      signals: records.map((record) => ({ recordedAt: record.timestamp, ...record.payload }))
    };
  });

  app.get("/paper-trades", async (request: FastifyRequest, reply: FastifyReply) => {
    const query = paperTradesQuerySchema.safeParse(request.query ?? {});
    if (!query.success) {
      return reply.code(400).send({ error: query.error.flatten() });
    }
    return { trades: app.services.paperTradeStore.list(query.data) };
  });

  app.get("/paper-summary", async (request: FastifyRequest, reply: FastifyReply) => {
    const query = paperSummaryQuerySchema.safeParse(request.query ?? {});
    if (!query.success) {
      return reply.code(400).send({ error: query.error.flatten() });
    }
    const dayKey = query.data.dayKey ?? app.services.tradingDay.dayKey;
    return { summary: app.services.paperTradeStore.summarize(dayKey) };
  });

  app.get("/bot-policy", async () => {
    return {
      policy: app.services.runtimePolicy.getPolicy(),
      guidelines: app.services.runtimePolicy.getGuidelines()
    };
  });

  app.patch("/bot-policy", async (request: FastifyRequest, reply: FastifyReply) => {
    const body = signalPolicyPatchSchema.safeParse(request.body ?? {});
    if (!body.success) {
      return reply.code(400).send({ error: body.error.flatten() });
    }

    const updated = app.services.runtimePolicy.updatePolicy(body.data);
    app.services.auditStore.logEvent("bot_policy_updated", { policy: updated });
    return {
      policy: updated,
      guidelines: app.services.runtimePolicy.getGuidelines()
    };
  });

  app.post("/bot-policy/reset", async () => {
    const reset = app.services.runtimePolicy.resetPolicy();
    app.services.auditStore.logEvent("bot_policy_reset", { policy: reset });
    return {
      policy: reset,
      guidelines: app.services.runtimePolicy.getGuidelines()
    };
  });

  app.post("/cycle/run", async (_request: FastifyRequest, reply: FastifyReply) => {
    const result = await app.services.scheduler.runNow();
    if (result.status === "in_flight") {
      return reply.code(409).send({ error: "A cycle is already running." });
    }
    if (result.status === "error") {
      return reply.code(500).send({ error: result.error });
    }
    return result;
  });

  app.post("/day/rollover", async (request: FastifyRequest, reply: FastifyReply) => {
    const body = dayRolloverRequestSchema.safeParse(request.body ?? {});
    if (!body.success) {
      return reply.code(400).send({ error: body.error.flatten() });
    }
    const { calendar } = app.services;
    const now = new Date();
    const result = await app.services.scheduler.rollover(
      body.data.dayKey ?? calendar.dayKey(now),
      body.data.isExpiryDay ?? calendar.isExpiryDay(now)
    );
    if (!result) {
      return reply.code(409).send({ error: "A cycle is already running." });
    }
    return result;
  });

  app.get("/api-request-logs", async (request: FastifyRequest, reply: FastifyReply) => {
    const query = apiRequestLogsQuerySchema.safeParse(request.query ?? {});
    if (!query.success) {
      return reply.code(400).send({ error: query.error.flatten() });
    }
    return { logs: app.services.apiRequestLogStore.list(query.data) };
  });

  app.get("/config", async () => {
    const config = app.services.settings;
    return {
      appName: config.appName,
      appEnv: config.appEnv,
      timezone: config.timezone,
      underlyingInstrument: config.underlyingInstrument,
      strikeGap: config.strikeGap,
      strikeRange: config.strikeRange,
      lotSize: config.lotSize,
      pollIntervalSeconds: config.pollIntervalSeconds,
      fetchTimeoutMs: config.fetchTimeoutMs,
      sessionStart: config.sessionStart,
      sessionEnd: config.sessionEnd,
      expiryWeekday: config.expiryWeekday,
      rollingWindowSize: config.rollingWindowSize,
      upstoxConfigured: Boolean(config.upstoxAccessToken),
      telegramConfigured: Boolean(config.telegramBotToken && config.telegramChatId),
      policy: app.services.runtimePolicy.getPolicy()
    };
  });
};
