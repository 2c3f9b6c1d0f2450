import { appendFileSync } from "node:fs";
import Database from "better-sqlite3";

import { settings } from "../core/config";
import { makeId } from "../utils/id";
import { nowIso } from "../utils/time";
import type { AuditRecord } from "../types/models";

interface AuditRow {
  id: string;
  timestamp: string;
  event_type: string;
  payload: string;
}

const parseRecordPayload = (payload: string): Record<string, unknown> => {
  try {
    const parsed: unknown = JSON.parse(payload);
    if (parsed !== null && typeof parsed === "object" && !Array.isArray(parsed)) {
      return { ...parsed };
    }
    return { value: parsed };
  } catch {
    return {};
  }
};

export class AuditStore {
  private readonly db: Database.Database;

  /** Pass `null` as `jsonlPath` to skip the JSONL mirror. */
  constructor(
    dbPath = settings.dbPath,
    private readonly jsonlPath: string | null = settings.jsonlAuditPath
  ) {
    this.db = new Database(dbPath);
    this.init();
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS audit_records (
        id TEXT PRIMARY KEY,
        timestamp TEXT NOT NULL,
        event_type TEXT NOT NULL,
        payload TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_audit_records_event_type
        ON audit_records (event_type, timestamp DESC);

      CREATE TABLE IF NOT EXISTS app_state (
        key TEXT PRIMARY KEY,
        payload TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);
  }

  logEvent(eventType: string, payload: Record<string, unknown>): AuditRecord {
    const record: AuditRecord = {
      id: makeId(),
      timestamp: nowIso(),
      eventType,
      payload
    };

    this.db
      .prepare("INSERT INTO audit_records (id, timestamp, event_type, payload) VALUES (?, ?, ?, ?)")
      .run(record.id, record.timestamp, record.eventType, JSON.stringify(record.payload));

    if (this.jsonlPath) {
      appendFileSync(this.jsonlPath, `${JSON.stringify(record)}\n`, { encoding: "utf8" });
    }
    return record;
  }

  /** Oldest first. */
  listAuditRecords(params?: {
    eventTypes?: string[];
    limit?: number;
    sinceTimestamp?: string;
  }): AuditRecord[] {
    const limit = Math.max(1, Math.min(params?.limit ?? 500, 10_000));
    const eventTypes = (params?.eventTypes ?? [])
      .map((eventType) => eventType.trim())
      .filter((eventType) => eventType.length > 0);
    const sinceTimestamp = params?.sinceTimestamp?.trim();

    const clauses: string[] = [];
    const values: Array<string | number> = [];
    if (eventTypes.length > 0) {
      const placeholders = eventTypes.map(() => "?").join(", ");
      clauses.push(`event_type IN (${placeholders})`);
      values.push(...eventTypes);
    }
    if (sinceTimestamp && sinceTimestamp.length > 0) {
      clauses.push("timestamp >= ?");
      values.push(sinceTimestamp);
    }
    const whereClause = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";

    const rows = this.db
      .prepare<Array<string | number>, AuditRow>(
        `SELECT id, timestamp, event_type, payload
         FROM audit_records
         ${whereClause}
         ORDER BY timestamp DESC, rowid DESC
         LIMIT ?`
      )
      .all(...values, limit);

    return rows
      .map(
        (row): AuditRecord => ({
          id: row.id,
          timestamp: row.timestamp,
          eventType: row.event_type,
          payload: parseRecordPayload(row.payload)
        })
      )
      .reverse();
  }

  setAppState(key: string, payload: unknown): void {
    this.db
      .prepare("INSERT OR REPLACE INTO app_state (key, payload, updated_at) VALUES (?, ?, ?)")
      .run(key, JSON.stringify(payload), nowIso());
  }

  getAppState(key: string): unknown {
    const row = this.db
      .prepare<[string], { payload: string }>("SELECT payload FROM app_state WHERE key = ?")
      .get(key);
    if (!row?.payload) return null;

    try {
      const parsed: unknown = JSON.parse(row.payload);
      return parsed;
    } catch {
      return null;
    }
  }

  close(): void {
    this.db.close();
  }
}
