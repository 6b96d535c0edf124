import type { ErrorRequestHandler, Response } from "express";
import { errorMessage } from "../../domain/errors.js";
import type { Logger } from "../../infrastructure/logger.js";
import { HTTP_STATUS } from "./constants.js";

export function sendError(res: Response, error: unknown, defaultMessage: string) {
  const message = error instanceof Error ? error.message : String(error);
  res.locals.error = message || defaultMessage;
  res.status(HTTP_STATUS.INTERNAL_ERROR).json({ error: message || defaultMessage });
}

/**
 * The 4xx status carried by an http-errors style error (body-parser and
 * friends), or null when the error is not an exposed client error.
 */
export function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== "object" || error === null || !("status" in error)) return null;
  if ("expose" in error && error.expose === false) return null;
  const { status } = error;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
}

/** Client errors keep their status and message; anything else is a 500. */
export function sendRouteError(res: Response, error: unknown, defaultMessage: string) {
  const status = clientErrorStatus(error);
  if (status === null) return sendError(res, error, defaultMessage);
  const message = errorMessage(error) || defaultMessage;
  res.locals.error = message;
  res.status(status).json({ error: message });
}

export function sendSuccess(res: Response, data: unknown) {
  res.status(HTTP_STATUS.OK).json(data);
}

/** Last handler on the app: logs server faults and answers every error once. */
export function routeErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, _req, res, next) => {
    if (res.headersSent) return next(err);
    if (clientErrorStatus(err) === null) logger.error({ err }, "unhandled route error");
    sendRouteError(res, err, "internal error");
  };
}
