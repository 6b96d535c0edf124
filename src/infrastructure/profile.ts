import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { SERVER_VERSION } from "../domain/constants.js";
import type { Profile } from "../domain/types.js";

const DEFAULT_PUBLIC_DIR = fileURLToPath(new URL("../../web/dist", import.meta.url));

const envSchema = z.object({
  LINKHOLD_MODE: z.enum(["dev", "prod", "demo"]).default("dev"),
  LINKHOLD_ADDR: z.string().default(""),
  // P+1 is the gRPC port, so P stops one short of the top of the range
  LINKHOLD_PORT: z.coerce.number().int().min(1).max(65534).default(8082),
  LINKHOLD_DATA: z.string().optional(),
  LINKHOLD_DRIVER: z.literal("sqlite").default("sqlite"),
  LINKHOLD_DSN: z.string().optional(),
  LINKHOLD_PUBLIC_DIR: z.string().optional(),
});

/**
 * Build the server profile from environment variables.
 *
 * Throws a ZodError naming the offending variable when a value is invalid.
 */
export function loadProfile(env: NodeJS.ProcessEnv = process.env): Profile {
  const parsed = envSchema.parse(env);
  const mode = parsed.LINKHOLD_MODE;
  const data = path.resolve(parsed.LINKHOLD_DATA || (mode === "prod" ? "/var/opt/linkhold" : process.cwd()));
  const dsn = parsed.LINKHOLD_DSN || path.join(data, `linkhold_${mode}.db`);

  return {
    mode,
    addr: parsed.LINKHOLD_ADDR,
    port: parsed.LINKHOLD_PORT,
    data,
    driver: parsed.LINKHOLD_DRIVER,
    dsn,
    version: SERVER_VERSION,
    publicDir: parsed.LINKHOLD_PUBLIC_DIR ? path.resolve(parsed.LINKHOLD_PUBLIC_DIR) : DEFAULT_PUBLIC_DIR,
  };
}

export function rpcPortOf(profile: Pick<Profile, "port">): number {
  return profile.port + 1;
}
