export type Mode = "dev" | "prod" | "demo";

export const WORKSPACE_SETTING_KEYS = {
  SECRET_SESSION: "SECRET_SESSION",
  LICENSE_KEY: "LICENSE_KEY",
} as const;

export type WorkspaceSettingKey = typeof WORKSPACE_SETTING_KEYS[keyof typeof WORKSPACE_SETTING_KEYS];

export interface SecretSessionSetting {
  key: typeof WORKSPACE_SETTING_KEYS.SECRET_SESSION;
  secretSession: string;
}

export interface LicenseKeySetting {
  key: typeof WORKSPACE_SETTING_KEYS.LICENSE_KEY;
  licenseKey: string;
}

export type WorkspaceSetting = SecretSessionSetting | LicenseKeySetting;

/** Narrows a setting union to the member carrying key `K`. */
export type WorkspaceSettingOf<K extends WorkspaceSettingKey> = Extract<WorkspaceSetting, { key: K }>;

export interface FindWorkspaceSetting<K extends WorkspaceSettingKey = WorkspaceSettingKey> {
  key: K;
}

/**
 * Persistence handle shared by the route handlers and the lifecycle manager.
 *
 * Only the lifecycle manager may call `close()`, and only once the HTTP
 * listener has stopped accepting work.
 */
export interface WorkspaceSettingStore {
  getWorkspaceSetting<K extends WorkspaceSettingKey>(find: FindWorkspaceSetting<K>): Promise<WorkspaceSettingOf<K> | null>;
  /** Create-if-absent, overwrite-if-present. Resolves with the stored value. */
  upsertWorkspaceSetting<S extends WorkspaceSetting>(setting: S): Promise<S>;
  close(): Promise<void>;
}

export interface Profile {
  mode: Mode;
  /** HTTP bind address; empty string binds every interface. The gRPC listener always binds every interface. */
  addr: string;
  /** General HTTP port. The gRPC listener uses port + 1. */
  port: number;
  data: string;
  driver: "sqlite";
  dsn: string;
  version: string;
  publicDir: string;
}

export type PlanType = "FREE" | "PRO";

export interface Subscription {
  plan: PlanType;
  expiresAt?: string;
}
