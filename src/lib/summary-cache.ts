/**
 * Summary Cache
 *
 * SQLite-backed store for finished summaries, keyed by approach, target id,
 * model identity and data fingerprint. Entries never expire: a new dataset
 * or model produces a new key.
 *
 * Cache Key: sha256(approach | targetId | model | dataFingerprint)
 *
 * @module summary-cache
 */

import sqlite3 from "sqlite3";
import { open, type Database } from "sqlite";
import fs from "fs";
import path from "path";
import crypto from "crypto";

// ============================================================================
// TYPES
// ============================================================================

export interface SummaryCacheKeyParts {
  approach: string;
  targetId: string;
  model: string;
  dataFingerprint: string;
}

export interface SummaryCache {
  get(cacheKey: string): Promise<Record<string, unknown> | null>;
  set(cacheKey: string, payload: object): Promise<void>;
  close(): Promise<void>;
}

interface SummaryCacheRow {
  payload: string;
}

// ============================================================================
// CACHE KEY GENERATION
// ============================================================================

export function makeSummaryCacheKey(parts: SummaryCacheKeyParts): string {
  const raw = [parts.approach, parts.targetId, parts.model, parts.dataFingerprint].join("|");
  return crypto.createHash("sha256").update(raw).digest("hex");
}

// ============================================================================
// SQLITE CACHE
// ============================================================================

export class SqliteSummaryCache implements SummaryCache {
  private readonly dbPath: string;
  private db: Database | null = null;
  private dbPromise: Promise<Database> | null = null;

  constructor(dbPath: string) {
    this.dbPath = path.resolve(dbPath);
  }

  private async getDb(): Promise<Database> {
    if (this.db) return this.db;
    if (!this.dbPromise) {
      this.dbPromise = (async () => {
        console.log(`[Summary-Cache] Opening database at ${this.dbPath}`);
        await fs.promises.mkdir(path.dirname(this.dbPath), { recursive: true });

        const instance = await open({
          filename: this.dbPath,
          driver: sqlite3.Database,
        });

        await instance.exec("PRAGMA journal_mode=WAL");
        await instance.exec(`
          CREATE TABLE IF NOT EXISTS summary_cache (
            cache_key TEXT PRIMARY KEY,
            payload TEXT NOT NULL,
            created_at TEXT NOT NULL
          );
        `);

        this.db = instance;
        return instance;
      })();
    }
    return this.dbPromise;
  }

  /**
   * Cached payload, or null on a miss, unreadable row or database error.
   */
  async get(cacheKey: string): Promise<Record<string, unknown> | null> {
    try {
      const database = await this.getDb();
      const row = await database.get<SummaryCacheRow>("SELECT payload FROM summary_cache WHERE cache_key = ?", [
        cacheKey,
      ]);
      if (!row) return null;

      const parsed: unknown = JSON.parse(row.payload);
      if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
        return null;
      }
      console.log(`[Summary-Cache] Cache HIT for ${cacheKey.slice(0, 12)}`);
      return { ...parsed };
    } catch (err) {
      console.error("[Summary-Cache] Error reading cache:", err);
      return null;
    }
  }

  async set(cacheKey: string, payload: object): Promise<void> {
    try {
      const database = await this.getDb();
      await database.run(
        `INSERT INTO summary_cache (cache_key, payload, created_at)
         VALUES (?, ?, ?)
         ON CONFLICT(cache_key) DO UPDATE SET payload = excluded.payload, created_at = excluded.created_at`,
        [cacheKey, JSON.stringify(payload), new Date().toISOString()],
      );
      console.log(`[Summary-Cache] Cached summary ${cacheKey.slice(0, 12)}`);
    } catch (err) {
      console.error("[Summary-Cache] Error writing cache:", err);
    }
  }

  /**
   * Close the database if it was opened. A failed open has nothing to close.
   */
  async close(): Promise<void> {
    const pending = this.dbPromise;
    this.db = null;
    this.dbPromise = null;
    if (!pending) return;

    let database: Database;
    try {
      database = await pending;
    } catch (err) {
      console.warn("[Summary-Cache] Database was never opened:", err);
      return;
    }
    await database.close();
  }
}

// ============================================================================
// DISABLED CACHE
// ============================================================================

export class NoOpSummaryCache implements SummaryCache {
  async get(_cacheKey: string): Promise<Record<string, unknown> | null> {
    return null;
  }

  async set(_cacheKey: string, _payload: object): Promise<void> {}

  async close(): Promise<void> {}
}
