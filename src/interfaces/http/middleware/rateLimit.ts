import type { NextFunction, Request, Response } from "express";
import type { ServerMetrics } from "../../../domain/metrics/serverMetrics.js";
import type { RateLimiterStore } from "../../../infrastructure/rateLimiterStore.js";
import { HTTP_STATUS } from "../constants.js";

export type IdentifierExtractor = (req: Request) => string;

export interface RateLimitOptions {
  store: RateLimiterStore;
  identifierExtractor?: IdentifierExtractor;
  metrics?: ServerMetrics;
}

/**
 * Client address as seen through proxies: first X-Forwarded-For hop, then
 * X-Real-IP, then the socket peer.
 */
export const realIp: IdentifierExtractor = (req) => {
  const forwarded = req.get("x-forwarded-for");
  if (forwarded) {
    const first = forwarded.split(",")[0]?.trim();
    if (first) return first;
  }
  const real = req.get("x-real-ip");
  if (real) return real.trim();
  const remote = req.socket.remoteAddress;
  if (!remote) throw new Error("request has no remote address");
  return remote;
};

/**
 * Token-bucket admission. Exhausted buckets get 429; a limiter that cannot
 * decide (identifier or store failure) gets 403. Both bodies are empty.
 */
export function rateLimit({ store, identifierExtractor = realIp, metrics }: RateLimitOptions) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const reject = (reason: "denied" | "error") => {
      metrics?.recordRateLimit(reason);
      res.status(reason === "denied" ? HTTP_STATUS.TOO_MANY_REQUESTS : HTTP_STATUS.FORBIDDEN).end();
    };

    void new Promise<boolean>((resolve) => resolve(store.allow(identifierExtractor(req)))).then(
      (allowed) => (allowed ? next() : reject("denied")),
      () => reject("error"),
    );
  };
}
