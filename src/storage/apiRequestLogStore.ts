import Database from "better-sqlite3";
import { z } from "zod";

import { settings } from "../core/config";
import { errorMessage } from "../core/errors";
import { logger } from "../core/logger";
import { makeId } from "../utils/id";
import { nowIso } from "../utils/time";

export type ApiRequestDirection = "internal" | "external";
export type ApiRequestStatus = "success" | "error";

export interface ApiRequestLogInput {
  startedAt?: string;
  finishedAt?: string;
  durationMs?: number;
  direction: ApiRequestDirection;
  /** `upstox`, `telegram`, or the app name for inbound requests. */
  provider: string;
  method: string;
  endpoint: string;
  reason: string;
  status: ApiRequestStatus;
  statusCode?: number;
  correlationId?: string;
  requestPayload?: unknown;
  errorMessage?: string;
}

export type ApiRequestLogEntry = Omit<ApiRequestLogInput, "startedAt" | "finishedAt" | "durationMs"> & {
  id: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
};

export interface ApiRequestLogQuery {
  limit?: number;
  direction?: ApiRequestDirection;
  status?: ApiRequestStatus;
  provider?: string;
  endpointContains?: string;
  sinceTimestamp?: string;
}

const log = logger.scope("api-log");

const PAYLOAD_LIMIT = 4_000;
const DAY_MS = 86_400_000;

const rowSchema = z.object({
  id: z.string(),
  started_at: z.string(),
  finished_at: z.string(),
  duration_ms: z.number(),
  direction: z.enum(["internal", "external"]),
  provider: z.string(),
  method: z.string(),
  endpoint: z.string(),
  reason: z.string(),
  status: z.enum(["success", "error"]),
  status_code: z.number().nullable(),
  correlation_id: z.string().nullable(),
  request_payload: z.string().nullable(),
  error_message: z.string().nullable()
});

const serialize = (payload: unknown): string | null => {
  if (payload === undefined) return null;
  try {
    const json = JSON.stringify(payload);
    if (json === undefined) return null;
    return json.length > PAYLOAD_LIMIT ? `${json.slice(0, PAYLOAD_LIMIT)}...` : json;
  } catch (error) {
    return `[unserializable: ${errorMessage(error)}]`;
  }
};

const deserialize = (payload: string | null): unknown => {
  if (payload === null) return undefined;
  try {
    return JSON.parse(payload);
  } catch {
    // truncated payloads are kept as text
    return payload;
  }
};

const elapsedMs = (startedAt: string, finishedAt: string): number => {
  const elapsed = new Date(finishedAt).getTime() - new Date(startedAt).getTime();
  return Number.isFinite(elapsed) ? Math.max(0, elapsed) : 0;
};

/** Inbound fastify requests and outbound broker/Telegram calls, pruned by age on open. */
export class ApiRequestLogStore {
  private readonly db: Database.Database;

  constructor(dbPath = settings.dbPath, readonly retentionDays = settings.apiLogRetentionDays) {
    this.db = new Database(dbPath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS api_request_logs (
        id TEXT PRIMARY KEY,
        started_at TEXT NOT NULL,
        finished_at TEXT NOT NULL,
        duration_ms INTEGER NOT NULL,
        direction TEXT NOT NULL,
        provider TEXT NOT NULL,
        method TEXT NOT NULL,
        endpoint TEXT NOT NULL,
        reason TEXT NOT NULL,
        status TEXT NOT NULL,
        status_code INTEGER,
        correlation_id TEXT,
        request_payload TEXT,
        error_message TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_api_request_logs_started_at
        ON api_request_logs (started_at DESC);
    `);
    this.prune();
  }

  log(entry: ApiRequestLogInput): ApiRequestLogEntry {
    const finishedAt = entry.finishedAt ?? nowIso();
    const startedAt = entry.startedAt ?? finishedAt;
    const record: ApiRequestLogEntry = {
      ...entry,
      id: makeId(),
      startedAt,
      finishedAt,
      durationMs: Math.round(entry.durationMs ?? elapsedMs(startedAt, finishedAt)),
      method: entry.method.toUpperCase()
    };

    try {
      this.db
        .prepare(
          `INSERT INTO api_request_logs
           (id, started_at, finished_at, duration_ms, direction, provider, method, endpoint,
            reason, status, status_code, correlation_id, request_payload, error_message)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          record.id,
          record.startedAt,
          record.finishedAt,
          record.durationMs,
          record.direction,
          record.provider,
          record.method,
          record.endpoint,
          record.reason,
          record.status,
          record.statusCode ?? null,
          record.correlationId ?? null,
          serialize(record.requestPayload),
          record.errorMessage ?? null
        );
    } catch (error) {
      log.warn("API request log write failed", errorMessage(error));
    }

    return record;
  }

  /** Deletes rows that started before `now - retentionDays`; returns how many went. */
  prune(now: Date = new Date()): number {
    const cutoff = new Date(now.getTime() - this.retentionDays * DAY_MS).toISOString();
    const removed = this.db
      .prepare("DELETE FROM api_request_logs WHERE started_at < ?")
      .run(cutoff).changes;
    if (removed > 0) log.info(`Pruned ${removed} request log rows older than ${cutoff}`);
    return removed;
  }

  list(query: ApiRequestLogQuery = {}): ApiRequestLogEntry[] {
    const limit = Math.max(1, Math.min(query.limit ?? 200, 2_000));
    const clauses: string[] = [];
    const params: Array<string | number> = [];

    if (query.direction) {
      clauses.push("direction = ?");
      params.push(query.direction);
    }
    if (query.status) {
      clauses.push("status = ?");
      params.push(query.status);
    }
    if (query.provider) {
      clauses.push("provider = ?");
      params.push(query.provider);
    }
    if (query.endpointContains) {
      clauses.push("endpoint LIKE ?");
      params.push(`%${query.endpointContains}%`);
    }
    if (query.sinceTimestamp) {
      clauses.push("started_at >= ?");
      params.push(query.sinceTimestamp);
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
    const rows: unknown[] = this.db
      .prepare(`SELECT * FROM api_request_logs ${where} ORDER BY started_at DESC, rowid DESC LIMIT ?`)
      .all(...params, limit);

    const entries: ApiRequestLogEntry[] = [];
    for (const raw of rows) {
      const parsed = rowSchema.safeParse(raw);
      if (!parsed.success) {
        log.warn("Skipping malformed request log row", parsed.error.issues[0]?.message);
        continue;
      }
      const row = parsed.data;
      entries.push({
        id: row.id,
        startedAt: row.started_at,
        finishedAt: row.finished_at,
        durationMs: row.duration_ms,
        direction: row.direction,
        provider: row.provider,
        method: row.method,
        endpoint: row.endpoint,
        reason: row.reason,
        status: row.status,
        statusCode: row.status_code ?? undefined,
        correlationId: row.correlation_id ?? undefined,
        requestPayload: deserialize(row.request_payload),
        errorMessage: row.error_message ?? undefined
      });
    }
    return entries;
  }

  close(): void {
    this.db.close();
  }
}
