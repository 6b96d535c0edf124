import morgan from "morgan";
import type { Request, Response } from "express";

export interface AccessLogLine {
  time: string;
  method: string;
  uri: string;
  status: number;
  error: string;
}

export interface AccessLogStream {
  write(line: string): void;
}

/** Error text a handler (or the timeout guard) left on `res.locals.error`. */
function errorOf(res: Response): string {
  const error: unknown = res.locals.error;
  return typeof error === "string" ? error : "";
}

export function formatAccessLine(req: Request, res: Response, now: Date = new Date()): string {
  const line: AccessLogLine = {
    time: now.toISOString(),
    method: req.method,
    uri: req.originalUrl,
    status: res.statusCode,
    error: errorOf(res),
  };
  return JSON.stringify(line);
}

/**
 * One JSON line per finished request. Runs after the response, so it can
 * neither delay nor reject the request.
 */
export function accessLog(stream: AccessLogStream = process.stdout) {
  return morgan<Request, Response>((_tokens, req, res) => formatAccessLine(req, res), { stream });
}
