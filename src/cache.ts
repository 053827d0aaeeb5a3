import { mkdirSync } from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { StorageError, errorMessage } from "./errors.js";
import { log } from "./logger.js";
import { UnitPayloadSchema } from "./schemas.js";
import { sha256String } from "./fs-utils.js";
import type { UnitPayload } from "./types.js";

export const CACHE_SCHEMA_VERSION = 1 as const;

export const CACHE_TABLES_SQL = `
CREATE TABLE IF NOT EXISTS meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS unit_cache (
  document_id TEXT NOT NULL,
  content_fingerprint TEXT NOT NULL,
  model_id TEXT NOT NULL,
  response_json TEXT NOT NULL,
  created_at TEXT NOT NULL,
  PRIMARY KEY (document_id, content_fingerprint, model_id)
);
`;

/** Truncated content hash; the unit id plays no part in the key. */
export function fingerprint(unitText: string): string {
  return sha256String(unitText).sha256.slice(0, 16);
}

/** What the orchestrator needs from a cache. */
export interface UnitCache {
  get(documentId: string, unitText: string, model: string): UnitPayload | undefined;
  put(documentId: string, unitText: string, model: string, payload: UnitPayload): void;
}

interface CacheRow {
  response_json: string;
}

interface StatsRow {
  model_id: string;
  entries: number;
}

/**
 * Durable (document, fingerprint, model) → payload store. Entries never
 * expire; reprocessing with `force` is the only way around them.
 */
export class ResultCache implements UnitCache {
  private readonly db: Database.Database;
  private readonly selectStmt: Database.Statement<[string, string, string], CacheRow>;
  private readonly upsert: (row: [string, string, string, string, string]) => void;

  constructor(filePath: string) {
    try {
      if (filePath !== ":memory:") mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
      this.db = new Database(filePath);
      this.db.exec("PRAGMA journal_mode=WAL;");
      this.db.exec(CACHE_TABLES_SQL);
      this.db
        .prepare("INSERT OR REPLACE INTO meta(key,value) VALUES (?,?)")
        .run("schemaVersion", String(CACHE_SCHEMA_VERSION));
    } catch (err) {
      throw new StorageError(`cannot open result cache ${filePath}: ${errorMessage(err)}`, { cause: err });
    }

    this.selectStmt = this.db.prepare<[string, string, string], CacheRow>(
      "SELECT response_json FROM unit_cache WHERE document_id = ? AND content_fingerprint = ? AND model_id = ?",
    );
    const insert = this.db.prepare<[string, string, string, string, string]>(
      "INSERT OR REPLACE INTO unit_cache(document_id, content_fingerprint, model_id, response_json, created_at) VALUES (?,?,?,?,?)",
    );
    this.upsert = this.db.transaction((row: [string, string, string, string, string]) => {
      insert.run(...row);
    });
  }

  get(documentId: string, unitText: string, model: string): UnitPayload | undefined {
    let row: CacheRow | undefined;
    try {
      row = this.selectStmt.get(documentId, fingerprint(unitText), model);
    } catch (err) {
      throw new StorageError(`cache read failed for ${documentId} (${model}): ${errorMessage(err)}`, {
        cause: err,
      });
    }
    if (!row) return undefined;

    let json: unknown;
    try {
      json = JSON.parse(row.response_json);
    } catch (err) {
      log.warn(`ignoring unreadable cache entry for ${documentId} (${model}): ${errorMessage(err)}`);
      return undefined;
    }
    const parsed = UnitPayloadSchema.safeParse(json);
    if (!parsed.success) {
      log.warn(`ignoring cache entry with unexpected shape for ${documentId} (${model})`);
      return undefined;
    }
    return parsed.data;
  }

  put(documentId: string, unitText: string, model: string, payload: UnitPayload): void {
    try {
      this.upsert([documentId, fingerprint(unitText), model, JSON.stringify(payload), new Date().toISOString()]);
    } catch (err) {
      throw new StorageError(`cache write failed for ${documentId} (${model}): ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  stats(): Array<{ model: string; entries: number }> {
    return this.db
      .prepare<[], StatsRow>(
        "SELECT model_id, COUNT(*) AS entries FROM unit_cache GROUP BY model_id ORDER BY model_id",
      )
      .all()
      .map((r) => ({ model: r.model_id, entries: r.entries }));
  }

  close(): void {
    this.db.close();
  }
}
