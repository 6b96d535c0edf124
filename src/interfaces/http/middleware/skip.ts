import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { Skipper } from "../classifier.js";

export function unless(skipper: Skipper, handler: RequestHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (skipper(req)) return next();
    return handler(req, res, next);
  };
}
