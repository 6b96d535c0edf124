import cors from "cors";
import type { Express } from "express";
import { RATE_LIMIT, REQUEST_TIMEOUT_MS } from "../../domain/constants.js";
import type { ServerMetrics } from "../../domain/metrics/serverMetrics.js";
import { RateLimiterMemoryStore, type RateLimiterStore } from "../../infrastructure/rateLimiterStore.js";
import { classifyRequest, rpcRequestSkipper } from "./classifier.js";
import { CORS_ALLOWED_METHODS } from "./constants.js";
import { accessLog, type AccessLogStream } from "./middleware/accessLog.js";
import { rateLimit, type IdentifierExtractor } from "./middleware/rateLimit.js";
import { unless } from "./middleware/skip.js";
import { timeout } from "./middleware/timeout.js";

export interface PipelineOptions {
  metrics: ServerMetrics;
  accessLogStream?: AccessLogStream;
  timeoutMs?: number;
  rateLimiterStore?: RateLimiterStore;
  identifierExtractor?: IdentifierExtractor;
}

/**
 * Install the general-listener interceptors, in order:
 * classification, access log, CORS, timeout, rate limit.
 *
 * Classification runs once; the three skippable stages all consult the tag
 * it leaves through `rpcRequestSkipper`.
 */
export function applyMiddlewarePipeline(app: Express, options: PipelineOptions): void {
  const { metrics } = options;
  const store = options.rateLimiterStore ?? new RateLimiterMemoryStore(RATE_LIMIT);

  app.use(classifyRequest(metrics));
  app.use(accessLog(options.accessLogStream));
  app.use(unless(rpcRequestSkipper, cors({ origin: "*", methods: [...CORS_ALLOWED_METHODS] })));
  app.use(unless(rpcRequestSkipper, timeout({ timeoutMs: options.timeoutMs ?? REQUEST_TIMEOUT_MS, metrics })));
  app.use(unless(rpcRequestSkipper, rateLimit({ store, identifierExtractor: options.identifierExtractor, metrics })));
}
