import express, { Router, type NextFunction, type Request, type Response } from "express";
import * as grpc from "@grpc/grpc-js";
import { GatewayRegistrationError } from "../../domain/errors.js";
import { isRpcPath } from "./classifier.js";
import { HTTP_STATUS } from "./constants.js";
import { clientErrorStatus } from "./responseHelper.js";
import type { Logger } from "../../infrastructure/logger.js";
import type { RpcServices } from "../../infrastructure/protoLoader.js";

const BODY_LIMIT = "4mb";

/** Request headers copied into gRPC metadata. */
const FORWARDED_HEADERS = ["authorization", "cookie"] as const;

const GRPC_TO_HTTP_STATUS: Record<grpc.status, number> = {
  [grpc.status.OK]: HTTP_STATUS.OK,
  [grpc.status.CANCELLED]: HTTP_STATUS.CLIENT_CLOSED_REQUEST,
  [grpc.status.UNKNOWN]: HTTP_STATUS.INTERNAL_ERROR,
  [grpc.status.INVALID_ARGUMENT]: HTTP_STATUS.BAD_REQUEST,
  [grpc.status.DEADLINE_EXCEEDED]: HTTP_STATUS.GATEWAY_TIMEOUT,
  [grpc.status.NOT_FOUND]: HTTP_STATUS.NOT_FOUND,
  [grpc.status.ALREADY_EXISTS]: HTTP_STATUS.CONFLICT,
  [grpc.status.PERMISSION_DENIED]: HTTP_STATUS.FORBIDDEN,
  [grpc.status.RESOURCE_EXHAUSTED]: HTTP_STATUS.TOO_MANY_REQUESTS,
  [grpc.status.FAILED_PRECONDITION]: HTTP_STATUS.BAD_REQUEST,
  [grpc.status.ABORTED]: HTTP_STATUS.CONFLICT,
  [grpc.status.OUT_OF_RANGE]: HTTP_STATUS.BAD_REQUEST,
  [grpc.status.UNIMPLEMENTED]: HTTP_STATUS.NOT_IMPLEMENTED,
  [grpc.status.INTERNAL]: HTTP_STATUS.INTERNAL_ERROR,
  [grpc.status.UNAVAILABLE]: HTTP_STATUS.SERVICE_UNAVAILABLE,
  [grpc.status.DATA_LOSS]: HTTP_STATUS.INTERNAL_ERROR,
  [grpc.status.UNAUTHENTICATED]: HTTP_STATUS.UNAUTHORIZED,
};

export function httpStatusFromGrpc(code: grpc.status): number {
  return GRPC_TO_HTTP_STATUS[code] ?? HTTP_STATUS.INTERNAL_ERROR;
}

interface GatewayRoute {
  client: grpc.Client;
  method: grpc.MethodDefinition<object, object>;
}

export interface GatewayOptions {
  services: RpcServices;
  /** host:port of the gRPC listener. */
  target: string;
  logger: Logger;
}

export interface RpcGateway {
  router: Router;
  /** RPC paths the gateway forwards, e.g. /linkhold.api.v2.WorkspaceService/GetWorkspaceProfile */
  paths(): string[];
  close(): void;
}

function sendRpcError(res: Response, status: number, code: string, message: string) {
  res.locals.error = message;
  res.status(status).json({ code, message });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * HTTP-to-gRPC translation for clients that cannot speak the native wire
 * format. Each `POST /<package>.<Service>/<Method>` with a JSON body becomes a
 * unary call against the gRPC listener; the reply comes back as JSON.
 *
 * Clients connect lazily, so the gateway can be registered before the gRPC
 * listener is up.
 */
export function createRpcGateway({ services, target, logger }: GatewayOptions): RpcGateway {
  if (services.size === 0) {
    throw new GatewayRegistrationError("no RPC services to expose through the gateway");
  }

  const clients: grpc.Client[] = [];
  const routes = new Map<string, GatewayRoute>();
  for (const ctor of services.values()) {
    const client = new ctor(target, grpc.credentials.createInsecure());
    clients.push(client);
    for (const method of Object.values(ctor.service)) {
      routes.set(method.path, { client, method });
    }
  }

  const forward = (req: Request, res: Response) => {
    const route = routes.get(req.path);
    if (!route) {
      return sendRpcError(res, HTTP_STATUS.NOT_FOUND, "not_found", `unknown RPC method ${req.path}`);
    }
    const { client, method } = route;
    if (method.requestStream || method.responseStream) {
      return sendRpcError(res, HTTP_STATUS.NOT_IMPLEMENTED, "unimplemented", "streaming methods are not available over HTTP");
    }

    const metadata = new grpc.Metadata();
    for (const header of FORWARDED_HEADERS) {
      const value = req.get(header);
      if (value) metadata.set(header, value);
    }
    const body: object = isRecord(req.body) ? req.body : {};

    const call = client.makeUnaryRequest(
      method.path,
      method.requestSerialize,
      method.responseDeserialize,
      body,
      metadata,
      (error, response) => {
        if (res.headersSent) return;
        if (error) {
          const codeName = grpc.status[error.code] ?? "UNKNOWN";
          logger.debug({ path: method.path, code: codeName }, "gateway call failed");
          return sendRpcError(res, httpStatusFromGrpc(error.code), codeName.toLowerCase(), error.details || error.message);
        }
        res.status(HTTP_STATUS.OK).json(response ?? {});
      },
    );
    res.once("close", () => {
      if (!res.writableEnded) call.cancel();
    });
  };

  // body-parser rejections arrive here with their own 4xx status
  const rejectBody = (err: unknown, req: Request, res: Response, next: NextFunction) => {
    const status = clientErrorStatus(err);
    if (status === null || res.headersSent) return next(err);
    logger.debug({ err, path: req.path, status }, "gateway rejected request body");
    const message =
      status === HTTP_STATUS.PAYLOAD_TOO_LARGE ? `request body exceeds ${BODY_LIMIT}` : "malformed JSON request body";
    sendRpcError(res, status, "invalid_argument", message);
  };

  const router = Router();
  router.use((req, _res, next) => (isRpcPath(req.path) ? next() : next("router")));
  router.use(express.json({ limit: BODY_LIMIT }));
  router.post("*", forward);
  router.use(rejectBody);

  return {
    router,
    paths: () => [...routes.keys()],
    close: () => {
      for (const client of clients) client.close();
    },
  };
}
