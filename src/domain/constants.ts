/** Fixed session secret used in dev mode so sign-ins survive restarts. */
export const DEV_SECRET = "linkhold";

export const SERVER_VERSION = "0.4.0";

export const TELEMETRY_EVENTS = {
  SERVER_START: "server start",
  SERVER_STOP: "server stop",
} as const;

export type TelemetryEvent = typeof TELEMETRY_EVENTS[keyof typeof TELEMETRY_EVENTS];

// Lifecycle budgets (milliseconds)
export const REQUEST_TIMEOUT_MS = 30_000;
export const SHUTDOWN_TIMEOUT_MS = 10_000;

export const RATE_LIMIT = {
  /** Tokens refilled per second. */
  rate: 30,
  burst: 60,
  expiresInMs: 3 * 60 * 1000,
} as const;
