import fs from "fs";
import path from "path";
import Database from "better-sqlite3";
import { z } from "zod";
import {
  WORKSPACE_SETTING_KEYS,
  type FindWorkspaceSetting,
  type WorkspaceSetting,
  type WorkspaceSettingKey,
  type WorkspaceSettingOf,
  type WorkspaceSettingStore,
} from "../domain/types.js";

const MIGRATION = `
CREATE TABLE IF NOT EXISTS workspace_setting (
  key TEXT NOT NULL PRIMARY KEY,
  value TEXT NOT NULL,
  updated_ts INTEGER NOT NULL
)`;

const settingRow = z.object({ key: z.string(), value: z.string() });

function encodeValue(setting: WorkspaceSetting): string {
  switch (setting.key) {
    case WORKSPACE_SETTING_KEYS.SECRET_SESSION:
      return setting.secretSession;
    case WORKSPACE_SETTING_KEYS.LICENSE_KEY:
      return setting.licenseKey;
  }
}

function decodeSetting<K extends WorkspaceSettingKey>(key: K, value: string): WorkspaceSettingOf<K>;
function decodeSetting(key: WorkspaceSettingKey, value: string): WorkspaceSetting {
  switch (key) {
    case WORKSPACE_SETTING_KEYS.SECRET_SESSION:
      return { key, secretSession: value };
    case WORKSPACE_SETTING_KEYS.LICENSE_KEY:
      return { key, licenseKey: value };
  }
}

/**
 * Workspace settings kept in a SQLite file (or `:memory:`).
 *
 * better-sqlite3 is synchronous; the async surface matches the store
 * interface so a networked driver can stand in without touching callers.
 */
export class SqliteStore implements WorkspaceSettingStore {
  private readonly db: Database.Database;

  constructor(dsn: string) {
    if (dsn !== ":memory:") {
      fs.mkdirSync(path.dirname(dsn), { recursive: true });
    }
    this.db = new Database(dsn);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(MIGRATION);
  }

  async getWorkspaceSetting<K extends WorkspaceSettingKey>(find: FindWorkspaceSetting<K>): Promise<WorkspaceSettingOf<K> | null> {
    const row: unknown = this.db.prepare("SELECT key, value FROM workspace_setting WHERE key = ?").get(find.key);
    if (row === undefined) return null;
    const { value } = settingRow.parse(row);
    return decodeSetting(find.key, value);
  }

  async upsertWorkspaceSetting<S extends WorkspaceSetting>(setting: S): Promise<S> {
    this.db
      .prepare(
        `INSERT INTO workspace_setting (key, value, updated_ts) VALUES (?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_ts = excluded.updated_ts`,
      )
      .run(setting.key, encodeValue(setting), Math.floor(Date.now() / 1000));
    return setting;
  }

  /** Number of stored settings. */
  async countWorkspaceSettings(): Promise<number> {
    const row: unknown = this.db.prepare("SELECT COUNT(*) AS count FROM workspace_setting").get();
    return z.object({ count: z.number() }).parse(row).count;
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }
}
