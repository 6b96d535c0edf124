import net from "net";
import type { Profile, WorkspaceSetting, WorkspaceSettingStore } from "../src/domain/types.js";
import { createLogger, type Logger } from "../src/infrastructure/logger.js";

export function silentLogger(): Logger {
  return createLogger({ level: "silent" });
}

/** Collects written lines; stands in for stdout in access-log and logger tests. */
export class MemoryStream {
  readonly lines: string[] = [];

  write(chunk: string): void {
    for (const line of chunk.split("\n")) {
      if (line) this.lines.push(line);
    }
  }
}

/** Map-backed store for lifecycle tests that need no SQLite file. */
export class MemorySettingStore implements WorkspaceSettingStore {
  readonly settings = new Map<string, WorkspaceSetting>();
  closed = 0;

  async getWorkspaceSetting<K extends WorkspaceSetting["key"]>(find: { key: K }) {
    const setting = this.settings.get(find.key);
    return setting ? narrow(setting, find.key) : null;
  }

  async upsertWorkspaceSetting<S extends WorkspaceSetting>(setting: S): Promise<S> {
    this.settings.set(setting.key, setting);
    return setting;
  }

  async close(): Promise<void> {
    this.closed++;
  }
}

function narrow<K extends WorkspaceSetting["key"]>(setting: WorkspaceSetting, key: K): Extract<WorkspaceSetting, { key: K }> | null {
  const matches = (s: WorkspaceSetting): s is Extract<WorkspaceSetting, { key: K }> => s.key === key;
  return matches(setting) ? setting : null;
}

export function testProfile(overrides: Partial<Profile> = {}): Profile {
  return {
    mode: "dev",
    addr: "127.0.0.1",
    port: 18082,
    data: "/tmp",
    driver: "sqlite",
    dsn: ":memory:",
    version: "0.0.0-test",
    publicDir: "/nonexistent/linkhold-web",
    ...overrides,
  };
}

function isFree(port: number, host: string): Promise<boolean> {
  return new Promise((resolve) => {
    const candidate = net.createServer();
    candidate.once("error", () => resolve(false));
    candidate.listen(port, host, () => candidate.close(() => resolve(true)));
  });
}

function ephemeralPort(host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    const candidate = net.createServer();
    candidate.once("error", reject);
    candidate.listen(0, host, () => {
      const address = candidate.address();
      const port = address && typeof address === "object" ? address.port : 0;
      candidate.close(() => resolve(port));
    });
  });
}

/** A port P free on `host` whose P+1 is free on every interface, where the gRPC listener binds. */
export async function freePortPair(host = "127.0.0.1"): Promise<number> {
  for (let attempt = 0; attempt < 20; attempt++) {
    const port = await ephemeralPort(host);
    if (port > 0 && port < 65535 && (await isFree(port + 1, "0.0.0.0"))) return port;
  }
  throw new Error("no free port pair found");
}
