import type { NextFunction, Request, Response } from "express";
import type { ServerMetrics } from "../../domain/metrics/serverMetrics.js";

/** Path namespace of the gRPC services, i.e. `/<package>.` of linkhold.api.v2. */
export const RPC_PATH_PREFIX = "/linkhold.api.v2.";

export type TrafficClass = "rpc" | "http";

declare global {
  namespace Express {
    interface Request {
      /** Set once by classifyRequest, read by every stage that skips RPC traffic. */
      trafficClass?: TrafficClass;
      /** Set by the timeout guard once the request budget is spent. */
      timedout?: boolean;
    }
  }
}

export function isRpcPath(path: string): boolean {
  return path.startsWith(RPC_PATH_PREFIX);
}

/** Decides whether a pipeline stage should pass a request through untouched. */
export type Skipper = (req: Request) => boolean;

/**
 * The single skipper shared by CORS, timeout and rate limiting.
 *
 * Stages mounted on their own (without classifyRequest in front) fall back
 * to the same prefix test.
 */
export const rpcRequestSkipper: Skipper = (req) =>
  (req.trafficClass ?? (isRpcPath(req.path) ? "rpc" : "http")) === "rpc";

export function classifyRequest(metrics?: ServerMetrics) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    req.trafficClass = isRpcPath(req.path) ? "rpc" : "http";
    metrics?.recordRequest(req.trafficClass === "rpc");
    next();
  };
}
