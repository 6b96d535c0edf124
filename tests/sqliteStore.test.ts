import fs from "fs";
import os from "os";
import path from "path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { WORKSPACE_SETTING_KEYS } from "../src/domain/types.js";
import { SqliteStore } from "../src/infrastructure/sqliteStore.js";

describe("SqliteStore", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "linkhold-store-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should return null for a missing setting", async () => {
    const store = new SqliteStore(":memory:");
    await expect(store.getWorkspaceSetting({ key: WORKSPACE_SETTING_KEYS.LICENSE_KEY })).resolves.toBeNull();
    await store.close();
  });

  it("should overwrite on upsert instead of adding a row", async () => {
    const store = new SqliteStore(":memory:");
    await store.upsertWorkspaceSetting({ key: WORKSPACE_SETTING_KEYS.LICENSE_KEY, licenseKey: "first" });
    await store.upsertWorkspaceSetting({ key: WORKSPACE_SETTING_KEYS.LICENSE_KEY, licenseKey: "second" });

    const setting = await store.getWorkspaceSetting({ key: WORKSPACE_SETTING_KEYS.LICENSE_KEY });
    expect(setting).toEqual({ key: "LICENSE_KEY", licenseKey: "second" });
    expect(await store.countWorkspaceSettings()).toBe(1);
    await store.close();
  });

  it("should keep settings of different keys apart", async () => {
    const store = new SqliteStore(":memory:");
    await store.upsertWorkspaceSetting({ key: WORKSPACE_SETTING_KEYS.LICENSE_KEY, licenseKey: "test-license" });
    await store.upsertWorkspaceSetting({ key: WORKSPACE_SETTING_KEYS.SECRET_SESSION, secretSession: "test-secret" });

    expect(await store.getWorkspaceSetting({ key: WORKSPACE_SETTING_KEYS.SECRET_SESSION })).toEqual({
      key: "SECRET_SESSION",
      secretSession: "test-secret",
    });
    expect(await store.countWorkspaceSettings()).toBe(2);
    await store.close();
  });

  it("should create the data directory and persist across reopen", async () => {
    const dsn = path.join(tmpDir, "nested", "linkhold_prod.db");
    const first = new SqliteStore(dsn);
    await first.upsertWorkspaceSetting({ key: WORKSPACE_SETTING_KEYS.SECRET_SESSION, secretSession: "test-secret" });
    await first.close();

    const second = new SqliteStore(dsn);
    const setting = await second.getWorkspaceSetting({ key: WORKSPACE_SETTING_KEYS.SECRET_SESSION });
    expect(setting?.secretSession).toBe("test-secret");
    await second.close();
  });

  it("should tolerate a second close", async () => {
    const store = new SqliteStore(":memory:");
    await store.close();
    await expect(store.close()).resolves.toBeUndefined();
  });
});
