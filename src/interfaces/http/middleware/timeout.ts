import type { NextFunction, Request, Response } from "express";
import type { ServerMetrics } from "../../../domain/metrics/serverMetrics.js";
import { HTTP_STATUS } from "../constants.js";

export interface TimeoutOptions {
  timeoutMs: number;
  metrics?: ServerMetrics;
}

/**
 * Aborts requests that outlive `timeoutMs`.
 *
 * A request still waiting on its handler gets a 503; one that already sent
 * headers has its response destroyed. Either way `req.timedout` is set so a
 * late handler can tell its work is no longer wanted.
 */
export function timeout({ timeoutMs, metrics }: TimeoutOptions) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const timer = setTimeout(() => {
      req.timedout = true;
      res.locals.error = "request timed out";
      metrics?.recordTimeout();
      if (res.headersSent) {
        res.destroy();
        return;
      }
      res.status(HTTP_STATUS.SERVICE_UNAVAILABLE).json({ message: "Service Unavailable" });
    }, timeoutMs);

    const clear = () => clearTimeout(timer);
    res.once("finish", clear);
    res.once("close", clear);
    next();
  };
}
