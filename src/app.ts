#!/usr/bin/env node
import { errorMessage } from "./domain/errors.js";
import { createLogger } from "./infrastructure/logger.js";
import { loadProfile, rpcPortOf } from "./infrastructure/profile.js";
import { SqliteStore } from "./infrastructure/sqliteStore.js";
import { Server } from "./server.js";

const logger = createLogger();

async function main(): Promise<void> {
  const profile = loadProfile();
  logger.info(
    { mode: profile.mode, version: profile.version, port: profile.port, rpcPort: rpcPortOf(profile), dsn: profile.dsn },
    "[lifecycle] starting",
  );

  const store = new SqliteStore(profile.dsn);
  let server: Server;
  try {
    server = await Server.create({ profile, store, logger });
  } catch (error) {
    logger.fatal({ err: error }, `[lifecycle] failed to create server: ${errorMessage(error)}`);
    await store.close();
    process.exitCode = 1;
    return;
  }

  const graceful = (signal: NodeJS.Signals) => {
    logger.info(`[lifecycle] ${signal} → graceful shutdown`);
    void server.shutdown();
  };
  process.once("SIGINT", graceful);
  process.once("SIGTERM", graceful);

  try {
    await server.start();
  } catch (error) {
    logger.error({ err: error }, `[lifecycle] failed to start server: ${errorMessage(error)}`);
    await server.shutdown();
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, `[lifecycle] fatal: ${errorMessage(error)}`);
  process.exitCode = 1;
});
