import Fastify from "fastify";
import type { FastifyRequest } from "fastify";
import cors from "@fastify/cors";

import { registerRoutes } from "./api/routes";
import { buildContainer } from "./services/container";
import type { ContainerOverrides, ServiceContainer } from "./services/container";

declare module "fastify" {
  interface FastifyInstance {
    services: ServiceContainer;
  }
}

interface ApiLogContext {
  startedMs: number;
  startedAt: string;
  path: string;
  reason: string;
  requestPayload?: unknown;
  errorMessage?: string;
}

const requestReasonByPath: Record<string, string> = {
  "/health": "Health check request",
  "/run-status": "Fetch scheduler status and last cycle outcome",
  "/day-state": "Fetch trading day counters and governor state",
  "/signals": "List emitted signals",
  "/paper-trades": "List paper-trade ledger rows",
  "/paper-summary": "Summarize paper trades for a day",
  "/bot-policy": "Read or update signal policy",
  "/bot-policy/reset": "Reset signal policy to defaults",
  "/cycle/run": "Run one signal cycle now",
  "/day/rollover": "Close the trading day and open the next",
  "/api-request-logs": "Inspect internal/external API request logs",
  "/config": "Fetch runtime configuration"
};

const requestPath = (url: string): string => url.split("?")[0] ?? url;

const summarizePayload = (payload: unknown): unknown => {
  if (payload === undefined || payload === null) return undefined;
  if (typeof payload === "string") {
    return payload.length > 1_000 ? `${payload.slice(0, 1_000)}...` : payload;
  }
  try {
    const serialized = JSON.stringify(payload);
    if (!serialized) return undefined;
    if (serialized.length > 4_000) return `${serialized.slice(0, 4_000)}...`;
    return payload;
  } catch {
    return String(payload);
  }
};

export const buildApp = async (overrides: ContainerOverrides = {}) => {
  const app = Fastify({ logger: false });
  app.decorate("services", buildContainer(overrides));

  const apiLogContexts = new WeakMap<FastifyRequest, ApiLogContext>();

  await app.register(cors, { origin: true });

  app.addHook("preHandler", async (request) => {
    const path = requestPath(request.url);
    const startedMs = Date.now();
    const routePath = request.routeOptions.url ?? path;
    apiLogContexts.set(request, {
      startedMs,
      startedAt: new Date(startedMs).toISOString(),
      path: routePath,
      reason:
        requestReasonByPath[routePath] ?? `Handle ${request.method.toUpperCase()} ${routePath}`,
      requestPayload: summarizePayload({
        params: request.params,
        query: request.query,
        body: request.body
      })
    });
  });

  app.addHook("onError", async (request, _reply, error) => {
    const context = apiLogContexts.get(request);
    if (!context) return;
    context.errorMessage = error.message;
  });

  app.addHook("onResponse", async (request, reply) => {
    const context = apiLogContexts.get(request);
    if (!context) return;

    app.services.apiRequestLogStore.log({
      startedAt: context.startedAt,
      finishedAt: new Date().toISOString(),
      durationMs: Date.now() - context.startedMs,
      direction: "internal",
      provider: app.services.settings.appName,
      method: request.method.toUpperCase(),
      endpoint: context.path,
      reason: context.reason,
      status: reply.statusCode >= 400 ? "error" : "success",
      statusCode: reply.statusCode,
      correlationId: String(request.id ?? ""),
      requestPayload: context.requestPayload,
      errorMessage: context.errorMessage
    });
  });

  await registerRoutes(app);

  app.addHook("onClose", async () => {
    app.services.close();
  });

  return app;
};
